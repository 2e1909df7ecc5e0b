import fs from "fs";
import { config } from "../config";
import { ConfigurationError } from "../errors";
import { COUNTRY_MAPPING } from "../normalization-maps";
import { coerceToString } from "../normalization";
import type { CountryDatabase, CountryMapping } from "../types";
import { getDefaultCountryDatabase } from "./database";

export interface CountryCanonicalizer {
  standardize(raw: unknown): string;
}

export interface CanonicalizerOptions {
  mapping?: CountryMapping;
  database?: CountryDatabase;
}

function lookupCanonicalName(database: CountryDatabase, name: string): string | undefined {
  return database.findByName(name)?.name ?? database.findByCommonName(name)?.name;
}

function cleanCountry(raw: unknown): string {
  return coerceToString(raw).replace(/_/g, " ").trim();
}

/**
 * Build a country standardizer over an override table and a reference
 * database. Each step tries the exact override key, then the database name,
 * then the database common name, and keeps the value when none applies.
 *
 * Steps repeat until the value stops changing, so a database name that is
 * itself an override key ("hong kong" -> "Hong Kong" -> override) is followed
 * through and `standardize(standardize(x)) === standardize(x)`. A cycle of
 * overrides settles on its alphabetically first member.
 */
export function createCountryCanonicalizer(
  options: CanonicalizerOptions = {}
): CountryCanonicalizer {
  const mapping = options.mapping ?? COUNTRY_MAPPING;
  const database = options.database ?? getDefaultCountryDatabase();
  const overrides = new Map(Object.entries(mapping));

  const step = (name: string): string =>
    cleanCountry(overrides.get(name) ?? lookupCanonicalName(database, name) ?? name);

  return {
    standardize(raw: unknown): string {
      let current = cleanCountry(raw);
      if (!current) return current;

      const path: string[] = [];
      while (!path.includes(current)) {
        path.push(current);
        const next = step(current);
        if (next === current || !next) return current;
        current = next;
      }

      return path.slice(path.indexOf(current)).sort()[0];
    },
  };
}

/**
 * Read an override table from a JSON object file ({ "spelling": "Country" }).
 */
export function loadCountryMapping(filePath: string): CountryMapping {
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (err) {
    throw new ConfigurationError(
      `Cannot read country mapping ${filePath}: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new ConfigurationError(`Country mapping ${filePath} must be a JSON object`);
  }

  const mapping: Record<string, string> = {};
  for (const [spelling, target] of Object.entries(parsed)) {
    if (typeof target !== "string") {
      throw new ConfigurationError(
        `Country mapping ${filePath}: value for "${spelling}" must be a string`
      );
    }
    mapping[spelling] = target;
  }
  return mapping;
}

let defaultCanonicalizer: CountryCanonicalizer | null = null;

/** Built-in overrides, extended by the file at COUNTRY_MAPPING_PATH when set. */
export function getDefaultCanonicalizer(): CountryCanonicalizer {
  if (defaultCanonicalizer) return defaultCanonicalizer;

  const mapping = config.countryMappingPath
    ? { ...COUNTRY_MAPPING, ...loadCountryMapping(config.countryMappingPath) }
    : COUNTRY_MAPPING;
  defaultCanonicalizer = createCountryCanonicalizer({ mapping });
  return defaultCanonicalizer;
}

export function standardizeCountry(raw: unknown): string {
  return getDefaultCanonicalizer().standardize(raw);
}
