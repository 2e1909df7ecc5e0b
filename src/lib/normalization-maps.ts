import type { CountryMapping } from "./types";

// ===== Country Override Map =====
// Spellings used by surf guides that the country database does not resolve
// (or resolves to the wrong territory). Keys are matched exactly.

export const COUNTRY_MAPPING: CountryMapping = {
  USA: "United States",
  UAE: "United Arab Emirates",
  UK: "United Kingdom",
  "British Virgin": "British Virgin Islands",
  "Virgin Islands": "US Virgin Islands",
  "Spain (Europe)": "Spain",
  // "&" is dropped by the list page, leaving the run of spaces
  "Turks   Caicos": "Turks and Caicos Islands",
  "St Lucia": "Saint Lucia",
  "St Kitts": "Saint Kitts and Nevis",
  "Ivory Coast": "Côte d'Ivoire",
  "St Barthelemy": "Saint Barthélemy",
  Christmas: "Christmas Island",
  Tobago: "Trinidad and Tobago",
  Solomon: "Solomon Islands",
  Brunei: "Brunei Darussalam",
  "Northern Mariana Islands": "Mariana Islands",
  Congo: "Republic of the Congo",
  Cook: "Cook Islands",
  Faroe: "Faroe Islands",
  "Samoa American": "American Samoa",
  "Samoa Western": "Samoa",
  Cayman: "Cayman Islands",
  "Hong Kong": "China",
  "Spain (Africa)": "Canary Islands",
};

// ===== Column Aliases =====
// Header spellings of the alternate-name column seen in secondary sources,
// compared after standardizeColumnName().

export const ALTERNATE_NAME_COLUMNS: readonly string[] = [
  "alternate_name",
  "alternative_name",
  "alt_name",
  "other_name",
];

// ===== Detail Page Fields =====

export const DETAIL_FIELDS = [
  "region",
  "type",
  "rating",
  "reliability",
  "swell_direction",
  "wind_direction",
  "best_month",
  "best_season",
  "summary",
  "time_of_year",
] as const;

export type DetailField = (typeof DETAIL_FIELDS)[number];
