import { getDefaultCanonicalizer } from "../countries/canonicalizer";
import type { CountryCanonicalizer } from "../countries/canonicalizer";
import { isMissing, normalizeName } from "../normalization";
import { assertColumns } from "../table-utils";
import { MatchPass } from "../types";
import type {
  BreakRecord,
  ColumnSuffixes,
  MergedRecord,
  MergeStatistics,
  ReconcileFields,
  Table,
} from "../types";

export const DEFAULT_FIELDS: ReconcileFields = {
  name: "name",
  country: "country",
  alternateName: "alternate_name",
};

export const DEFAULT_SUFFIXES: ColumnSuffixes = {
  sourceA: "_source1",
  sourceB: "_source2",
};

export interface ReconcileOptions {
  canonicalizer?: CountryCanonicalizer;
  fields?: Partial<ReconcileFields>;
  suffixes?: Partial<ColumnSuffixes>;
}

/** Where each input column lands in a merged row. */
export interface MergedLayout {
  columns: string[];
  fromA: [source: string, target: string][];
  fromB: [source: string, target: string][];
  countryColumn: string;
  nameColumnA: string;
  nameColumnB: string;
}

export interface ReconcileResult {
  merged: MergedRecord[];
  table: Table;
  layout: MergedLayout;
  stats: MergeStatistics;
  remainingA: BreakRecord[];
  remainingB: BreakRecord[];
}

/** A source row with its transient match keys; a null key never matches. */
interface KeyedRow {
  index: number;
  row: BreakRecord;
  name: string | null;
  alternate: string | null;
  country: string | null;
}

type KeySide = "name" | "alternate";

interface JoinStage {
  pass: MatchPass;
  keyA: KeySide;
  keyB: KeySide;
}

const STAGES: readonly JoinStage[] = [
  { pass: MatchPass.DIRECT, keyA: "name", keyB: "name" },
  { pass: MatchPass.NAME_TO_ALTERNATE, keyA: "name", keyB: "alternate" },
  { pass: MatchPass.ALTERNATE_TO_NAME, keyA: "alternate", keyB: "name" },
];

interface Pairing {
  pass: MatchPass;
  a: KeyedRow;
  b: KeyedRow;
}

interface StageResult {
  matches: Pairing[];
  remainingA: KeyedRow[];
  remainingB: KeyedRow[];
}

function keyRows(
  table: Table,
  fields: ReconcileFields,
  canonicalizer: CountryCanonicalizer
): KeyedRow[] {
  const hasAlternate = table.columns.includes(fields.alternateName);

  return table.rows.map((row, index) => {
    const rawName = row[fields.name];
    const rawCountry = row[fields.country];
    const rawAlternate = hasAlternate ? row[fields.alternateName] : undefined;

    const name = isMissing(rawName) ? null : normalizeName(rawName) || null;
    const country = isMissing(rawCountry) ? null : canonicalizer.standardize(rawCountry) || null;
    // A row without a name never matches, whatever its alternate says. No
    // alternate column, or an empty alternate cell: the primary name stands in
    const alternate =
      name === null ? null : isMissing(rawAlternate) ? name : normalizeName(rawAlternate) || name;

    return { index, row, name, alternate, country };
  });
}

function joinKey(row: KeyedRow, side: KeySide): string | null {
  const name = row[side];
  if (name === null || row.country === null) return null;
  return `${name}\u0000${row.country}`;
}

/**
 * Hash equi-join of the unconsumed rows on (name key, country key). Rows in
 * a key group pair up one-to-one in table order; a surplus row on either side
 * is handed on to the next stage.
 */
function runStage(stage: JoinStage, rowsA: KeyedRow[], rowsB: KeyedRow[]): StageResult {
  const buckets = new Map<string, KeyedRow[]>();
  for (const b of rowsB) {
    const key = joinKey(b, stage.keyB);
    if (key === null) continue;
    const bucket = buckets.get(key);
    if (bucket) bucket.push(b);
    else buckets.set(key, [b]);
  }

  const matches: Pairing[] = [];
  const consumedB = new Set<number>();
  const remainingA: KeyedRow[] = [];

  for (const a of rowsA) {
    const key = joinKey(a, stage.keyA);
    const partner = key === null ? undefined : buckets.get(key)?.shift();
    if (partner) {
      matches.push({ pass: stage.pass, a, b: partner });
      consumedB.add(partner.index);
    } else {
      remainingA.push(a);
    }
  }

  return {
    matches,
    remainingA,
    remainingB: rowsB.filter((b) => !consumedB.has(b.index)),
  };
}

export function buildMergedLayout(
  columnsA: string[],
  columnsB: string[],
  fields: ReconcileFields = DEFAULT_FIELDS,
  suffixes: ColumnSuffixes = DEFAULT_SUFFIXES
): MergedLayout {
  const inA = new Set(columnsA);
  const inB = new Set(columnsB);
  const target = (column: string, suffix: string, other: Set<string>) =>
    other.has(column) ? `${column}${suffix}` : column;

  const fromA: [string, string][] = [];
  const fromB: [string, string][] = [];
  const columns: string[] = [];

  for (const column of columnsA) {
    if (column === fields.country) {
      columns.push(fields.country);
      continue;
    }
    const to = target(column, suffixes.sourceA, inB);
    fromA.push([column, to]);
    columns.push(to);
  }

  for (const column of columnsB) {
    if (column === fields.country) continue;
    const to = target(column, suffixes.sourceB, inA);
    fromB.push([column, to]);
    columns.push(to);
  }

  return {
    columns,
    fromA,
    fromB,
    countryColumn: fields.country,
    nameColumnA: target(fields.name, suffixes.sourceA, inB),
    nameColumnB: target(fields.name, suffixes.sourceB, inA),
  };
}

function toMergedRecord(pairing: Pairing, layout: MergedLayout): MergedRecord {
  const values: BreakRecord = {};
  for (const column of layout.columns) values[column] = undefined;
  for (const [from, to] of layout.fromA) values[to] = pairing.a.row[from];
  for (const [from, to] of layout.fromB) values[to] = pairing.b.row[from];
  values[layout.countryColumn] = pairing.a.country;

  return Object.freeze({
    pass: pairing.pass,
    sourceIndexA: pairing.a.index,
    sourceIndexB: pairing.b.index,
    values: Object.freeze(values),
  });
}

/**
 * Merge two break tables in three passes (name↔name, name→alternate,
 * alternate→name), each joining on normalized name plus standardized country.
 * Every source row ends up in at most one merged record.
 */
export function reconcile(
  tableA: Table,
  tableB: Table,
  options: ReconcileOptions = {}
): ReconcileResult {
  const fields: ReconcileFields = { ...DEFAULT_FIELDS, ...options.fields };
  const suffixes: ColumnSuffixes = { ...DEFAULT_SUFFIXES, ...options.suffixes };
  const canonicalizer = options.canonicalizer ?? getDefaultCanonicalizer();

  assertColumns(tableA, [fields.name, fields.country], "source A");
  assertColumns(tableB, [fields.name, fields.country], "source B");

  const initial: StageResult = {
    matches: [],
    remainingA: keyRows(tableA, fields, canonicalizer),
    remainingB: keyRows(tableB, fields, canonicalizer),
  };

  const outcome = STAGES.reduce<StageResult>((state, stage) => {
    const result = runStage(stage, state.remainingA, state.remainingB);
    return {
      matches: [...state.matches, ...result.matches],
      remainingA: result.remainingA,
      remainingB: result.remainingB,
    };
  }, initial);

  const layout = buildMergedLayout(tableA.columns, tableB.columns, fields, suffixes);
  const merged = outcome.matches.map((pairing) => toMergedRecord(pairing, layout));
  const countPass = (pass: MatchPass) => merged.filter((m) => m.pass === pass).length;

  const stats: MergeStatistics = {
    directMatches: countPass(MatchPass.DIRECT),
    nameToAlternateMatches: countPass(MatchPass.NAME_TO_ALTERNATE),
    alternateToNameMatches: countPass(MatchPass.ALTERNATE_TO_NAME),
    totalMerged: merged.length,
    unmatchedA: outcome.remainingA.length,
    unmatchedB: outcome.remainingB.length,
  };

  return {
    merged,
    table: { columns: layout.columns, rows: merged.map((m) => ({ ...m.values })) },
    layout,
    stats,
    remainingA: outcome.remainingA.map((k) => k.row),
    remainingB: outcome.remainingB.map((k) => k.row),
  };
}
