import type { CellValue } from "./types";

// ASCII punctuation plus every Unicode punctuation code point (curly quotes, dashes, ...)
const PUNCTUATION = /[\p{P}!-\/:-@\[-`{-~]/gu;
const WHITESPACE = /\s+/gu;

export function coerceToString(value: unknown): string {
  if (value === null || value === undefined) return "";
  return String(value);
}

/** True for absent cells and cells holding only whitespace. */
export function isMissing(value: CellValue): boolean {
  return coerceToString(value).trim() === "";
}

export function cleanText(
  text: unknown,
  options: { removeSpaces?: boolean; lowercase?: boolean } = {}
): string {
  const { removeSpaces = false, lowercase = true } = options;
  let cleaned = coerceToString(text).replace(PUNCTUATION, "");
  if (removeSpaces) cleaned = cleaned.replace(WHITESPACE, "");
  return lowercase ? cleaned.toLowerCase() : cleaned;
}

/**
 * Comparison key for a break name: no punctuation, no whitespace, lowercase.
 * "St. Clair's Bay" and "ST CLAIRS BAY" both become "stclairsbay".
 */
export function normalizeName(raw: unknown): string {
  return cleanText(raw, { removeSpaces: true, lowercase: true });
}

/** "Alternative name" -> "alternative_name", "Best-Month" -> "best_month" */
export function standardizeColumnName(column: string): string {
  return column.trim().toLowerCase().replace(/[\s-]/g, "_");
}
