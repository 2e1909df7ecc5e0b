// ===== Tables =====

export type CellValue = string | number | boolean | null | undefined;

/**
 * One surf break as collected from a source. Always carries `name` and
 * `country`; `alternate_name` and any scraped attributes ride along untouched.
 */
export type BreakRecord = Record<string, CellValue>;

/** Ordered rows sharing one column layout (the header of a CSV file). */
export interface Table {
  columns: string[];
  rows: BreakRecord[];
}

// ===== Country reference data =====

/** Exact-match overrides from a non-standard spelling to a standardized name. */
export type CountryMapping = Readonly<Record<string, string>>;

export interface CountryRecord {
  /** Canonical name returned by standardization */
  name: string;
  code?: string;
  officialName?: string;
  commonNames?: string[];
}

/**
 * Lookup capability of a reference country database. Both queries return
 * `undefined` on a miss; neither throws for an unknown name.
 */
export interface CountryDatabase {
  findByName(name: string): CountryRecord | undefined;
  findByCommonName(name: string): CountryRecord | undefined;
}

// ===== Reconciliation =====

export enum MatchPass {
  DIRECT = "direct",
  NAME_TO_ALTERNATE = "name_to_alternate",
  ALTERNATE_TO_NAME = "alternate_to_name",
}

/** One A row paired with one B row by a matching pass. */
export interface MergedRecord {
  readonly pass: MatchPass;
  readonly sourceIndexA: number;
  readonly sourceIndexB: number;
  readonly values: Readonly<BreakRecord>;
}

export interface MergeStatistics {
  directMatches: number;
  nameToAlternateMatches: number;
  alternateToNameMatches: number;
  totalMerged: number;
  unmatchedA: number;
  unmatchedB: number;
}

export interface ColumnSuffixes {
  sourceA: string;
  sourceB: string;
}

export interface ReconcileFields {
  name: string;
  country: string;
  alternateName: string;
}
