import { TableSchemaError } from "./errors";
import { cleanText, coerceToString, standardizeColumnName } from "./normalization";
import type { BreakRecord, Table } from "./types";

export function assertColumns(table: Table, required: string[], label: string): void {
  const present = new Set(table.columns);
  const missing = required.filter((column) => !present.has(column));
  if (missing.length > 0) throw new TableSchemaError(label, missing);
}

export function standardizeColumnNames(table: Table): Table {
  const renames = table.columns.map((column) => [column, standardizeColumnName(column)] as const);
  return {
    columns: [...new Set(renames.map(([, to]) => to))],
    rows: table.rows.map((row) => {
      const out: BreakRecord = {};
      for (const [from, to] of renames) out[to] = row[from];
      return out;
    }),
  };
}

/** Rename one column, keeping its position. No-op when `from` is absent. */
export function renameColumn(table: Table, from: string, to: string): Table {
  if (!table.columns.includes(from) || from === to) return table;
  return {
    columns: table.columns.filter((c) => c !== to).map((c) => (c === from ? to : c)),
    rows: table.rows.map((row) => {
      const { [from]: value, ...rest } = row;
      return { ...rest, [to]: value };
    }),
  };
}

export interface DuplicateGroup {
  values: string[];
  count: number;
}

/**
 * Rows sharing the same values on `columns` (every member of a group is
 * returned, not just the repeats), plus one entry per duplicated key.
 */
export function findDuplicates(
  table: Table,
  columns: string[] = table.columns
): { duplicates: BreakRecord[]; groups: DuplicateGroup[] } {
  const keyOf = (row: BreakRecord) => columns.map((c) => coerceToString(row[c]));
  const counts = new Map<string, DuplicateGroup>();

  for (const row of table.rows) {
    const values = keyOf(row);
    const key = values.join("\u0000");
    const group = counts.get(key);
    if (group) group.count++;
    else counts.set(key, { values, count: 1 });
  }

  const duplicates = table.rows.filter(
    (row) => (counts.get(keyOf(row).join("\u0000"))?.count ?? 0) > 1
  );
  const groups = [...counts.values()].filter((g) => g.count > 1);
  return { duplicates, groups };
}

/**
 * Values of `column` found in both tables and in only one of them, sorted.
 * With `clean` the values are compared after punctuation removal and lowercasing.
 */
export function compareColumnValues(
  tableA: Table,
  tableB: Table,
  column: string,
  clean = true
): { common: string[]; unique: string[] } {
  const valuesOf = (table: Table) =>
    new Set(
      table.rows.map((row) => (clean ? cleanText(row[column]) : coerceToString(row[column])))
    );
  const a = valuesOf(tableA);
  const b = valuesOf(tableB);

  const common = [...a].filter((v) => b.has(v)).sort();
  const unique = [...[...a].filter((v) => !b.has(v)), ...[...b].filter((v) => !a.has(v))].sort();
  return { common, unique };
}
