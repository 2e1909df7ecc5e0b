import fs from "fs";
import path from "path";
import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import { coerceToString } from "./normalization";
import type { BreakRecord, Table } from "./types";

function isStringMatrix(value: unknown): value is string[][] {
  return (
    Array.isArray(value) &&
    value.every((row) => Array.isArray(row) && row.every((cell) => typeof cell === "string"))
  );
}

export function parseTable(text: string): Table {
  const records: unknown = parse(text, {
    bom: true,
    skip_empty_lines: true,
    relax_column_count: true,
  });
  if (!isStringMatrix(records)) throw new Error("CSV parser returned an unexpected shape");
  if (records.length === 0) return { columns: [], rows: [] };

  const [header, ...body] = records;
  return {
    columns: header,
    rows: body.map((cells) => {
      const row: BreakRecord = {};
      header.forEach((column, i) => {
        row[column] = cells[i] ?? "";
      });
      return row;
    }),
  };
}

export function formatTable(table: Table): string {
  return stringify(
    table.rows.map((row) => table.columns.map((column) => coerceToString(row[column]))),
    { header: true, columns: table.columns }
  );
}

export function readTable(filePath: string): Table {
  return parseTable(fs.readFileSync(filePath, "utf-8"));
}

export function writeTable(filePath: string, table: Table): void {
  const dir = path.dirname(filePath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
  fs.writeFileSync(filePath, formatTable(table), "utf-8");
}
