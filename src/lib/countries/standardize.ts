import { readTable, writeTable } from "../csv";
import { assertColumns } from "../table-utils";
import type { Table } from "../types";
import { standardizeCountry } from "./canonicalizer";
import type { CountryCanonicalizer } from "./canonicalizer";

export interface StandardizeResult {
  table: Table;
  uniqueBefore: number;
  uniqueAfter: number;
}

function countUnique(table: Table, column: string): number {
  return new Set(table.rows.map((row) => row[column] ?? null)).size;
}

/**
 * Copy of `table` with `column` rewritten to standardized country names.
 * Without a canonicalizer the built-in overrides and ISO names are used.
 */
export function standardizeTableCountries(
  table: Table,
  canonicalizer?: CountryCanonicalizer,
  column = "country"
): StandardizeResult {
  assertColumns(table, [column], "input");
  const standardize = canonicalizer
    ? (raw: unknown) => canonicalizer.standardize(raw)
    : standardizeCountry;

  const standardized: Table = {
    columns: [...table.columns],
    rows: table.rows.map((row) => ({ ...row, [column]: standardize(row[column]) })),
  };

  return {
    table: standardized,
    uniqueBefore: countUnique(table, column),
    uniqueAfter: countUnique(standardized, column),
  };
}

export function standardizeCountriesInFile(
  inputPath: string,
  outputPath: string,
  options: { canonicalizer?: CountryCanonicalizer; column?: string } = {}
): StandardizeResult {
  console.log(`[standardize] Standardizing country names in ${inputPath}`);

  const result = standardizeTableCountries(
    readTable(inputPath),
    options.canonicalizer,
    options.column
  );
  console.log(
    `[standardize] ${result.uniqueBefore} unique countries before, ${result.uniqueAfter} after`
  );

  writeTable(outputPath, result.table);
  console.log(`[standardize] Saved ${outputPath}`);
  return result;
}
