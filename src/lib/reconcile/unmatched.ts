import { normalizeName } from "../normalization";
import { assertColumns } from "../table-utils";
import type { ColumnSuffixes, ReconcileFields, Table } from "../types";
import { DEFAULT_FIELDS, DEFAULT_SUFFIXES } from "./engine";

export interface UnmatchedOptions {
  fields?: Partial<Pick<ReconcileFields, "name">>;
  suffixes?: Partial<ColumnSuffixes>;
}

/**
 * Rows of each source whose normalized name does not appear among that
 * source's names in the merged table (`name_source1` / `name_source2` by
 * default). Only the name is compared, so a row that shares its name with a
 * merged row from another country is not reported here; the engine's
 * `remainingA` / `remainingB` are the exact per-row leftovers.
 */
export function extractUnmatched(
  tableA: Table,
  tableB: Table,
  merged: Table,
  options: UnmatchedOptions = {}
): { leftoverA: Table; leftoverB: Table } {
  const nameField = options.fields?.name ?? DEFAULT_FIELDS.name;
  const suffixes: ColumnSuffixes = { ...DEFAULT_SUFFIXES, ...options.suffixes };
  const mergedNameA = `${nameField}${suffixes.sourceA}`;
  const mergedNameB = `${nameField}${suffixes.sourceB}`;

  assertColumns(tableA, [nameField], "source A");
  assertColumns(tableB, [nameField], "source B");
  assertColumns(merged, [mergedNameA, mergedNameB], "merged");

  const leftover = (source: Table, mergedColumn: string): Table => {
    const matchedNames = new Set(merged.rows.map((row) => normalizeName(row[mergedColumn])));
    return {
      columns: [...source.columns],
      rows: source.rows.filter((row) => !matchedNames.has(normalizeName(row[nameField]))),
    };
  };

  return {
    leftoverA: leftover(tableA, mergedNameA),
    leftoverB: leftover(tableB, mergedNameB),
  };
}
