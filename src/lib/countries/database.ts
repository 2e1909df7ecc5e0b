import countries from "i18n-iso-countries";
import english from "i18n-iso-countries/langs/en.json";
import { config } from "../config";
import { ConfigurationError } from "../errors";
import type { CountryDatabase, CountryRecord } from "../types";

countries.registerLocale(english);

/**
 * Country database backed by the ISO 3166 names shipped with
 * i18n-iso-countries. The first registered name of a country in the chosen
 * language is its canonical name; every other registered name ("USA",
 * "Great Britain", ...) is a common name.
 */
export function createIsoCountryDatabase(
  language: string = config.countryNameLanguage
): CountryDatabase {
  if (!countries.langs().includes(language)) {
    throw new ConfigurationError(
      `No country names registered for language "${language}" (available: ${countries.langs().join(", ")})`
    );
  }

  const byName = new Map<string, CountryRecord>();
  for (const [code, name] of Object.entries(countries.getNames(language))) {
    if (typeof name === "string") byName.set(name, { code, name });
  }

  return {
    findByName(name: string): CountryRecord | undefined {
      return byName.get(name);
    },

    findByCommonName(name: string): CountryRecord | undefined {
      // getAlpha2Code compares case-insensitively against every registered name
      const code = countries.getAlpha2Code(name, language);
      if (!code) return undefined;
      const canonical = countries.getName(code, language);
      return typeof canonical === "string" ? { code, name: canonical } : undefined;
    },
  };
}

/**
 * In-memory database over caller-supplied records. `findByName` matches the
 * canonical or official name exactly, `findByCommonName` matches any listed
 * common name exactly.
 */
export function createStaticCountryDatabase(records: CountryRecord[]): CountryDatabase {
  const byName = new Map<string, CountryRecord>();
  const byCommonName = new Map<string, CountryRecord>();

  for (const record of records) {
    if (!byName.has(record.name)) byName.set(record.name, record);
    if (record.officialName && !byName.has(record.officialName)) {
      byName.set(record.officialName, record);
    }
    for (const common of record.commonNames ?? []) {
      if (!byCommonName.has(common)) byCommonName.set(common, record);
    }
  }

  return {
    findByName: (name) => byName.get(name),
    findByCommonName: (name) => byCommonName.get(name),
  };
}

let defaultDatabase: CountryDatabase | null = null;

export function getDefaultCountryDatabase(): CountryDatabase {
  if (!defaultDatabase) defaultDatabase = createIsoCountryDatabase();
  return defaultDatabase;
}
