import { createCountryCanonicalizer } from "../../lib/countries/canonicalizer";
import { createStaticCountryDatabase } from "../../lib/countries/database";
import type { CountryRecord } from "../../lib/types";

export const TEST_COUNTRIES: CountryRecord[] = [
  { name: "United States", officialName: "United States of America", commonNames: ["America"] },
  { name: "United Kingdom", officialName: "United Kingdom of Great Britain and Northern Ireland" },
  { name: "South Africa", officialName: "Republic of South Africa" },
  { name: "Bolivia, Plurinational State of", commonNames: ["Bolivia"] },
  { name: "Côte d'Ivoire", officialName: "Republic of Côte d'Ivoire" },
];

export const TEST_MAPPING = {
  USA: "United States",
  "U.S.": "United States",
  UK: "United Kingdom",
  "Ivory Coast": "Côte d'Ivoire",
  "Samoa Western": "Samoa",
  Merica: "America",
};

export const testDatabase = createStaticCountryDatabase(TEST_COUNTRIES);

export const testCanonicalizer = createCountryCanonicalizer({
  mapping: TEST_MAPPING,
  database: testDatabase,
});
