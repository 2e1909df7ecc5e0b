import fs from "fs";
import path from "path";
import { config } from "./config";
import { getDefaultCanonicalizer } from "./countries/canonicalizer";
import type { CountryCanonicalizer } from "./countries/canonicalizer";
import { standardizeCountriesInFile } from "./countries/standardize";
import { readTable, writeTable } from "./csv";
import { ConfigurationError } from "./errors";
import { ALTERNATE_NAME_COLUMNS, DETAIL_FIELDS } from "./normalization-maps";
import { coerceToString } from "./normalization";
import { DEFAULT_FIELDS, reconcile } from "./reconcile/engine";
import { extractUnmatched } from "./reconcile/unmatched";
import { scrapeBreakDetails } from "./scrapers/break-detail";
import { scrapeBreakList } from "./scrapers/break-list";
import type { BreakListEntry } from "./scrapers/types";
import { pruneHttpCache } from "./scraping/http-cache";
import {
  assertColumns,
  compareColumnValues,
  findDuplicates,
  renameColumn,
  standardizeColumnNames,
} from "./table-utils";
import type { MergeStatistics, Table } from "./types";

export enum PipelineStage {
  SCRAPE_BREAKS = "scrape_breaks",
  SCRAPE_DETAILS = "scrape_details",
  STANDARDIZE = "standardize",
  MERGE = "merge",
}

export interface PipelineOptions {
  scrapeBreaks?: boolean;
  scrapeDetails?: boolean;
  standardize?: boolean;
  merge?: boolean;
  secondSource?: string | null;
  pages?: number;
  dataDir?: string;
  canonicalizer?: CountryCanonicalizer;
}

export interface PipelineSummary {
  stagesRun: PipelineStage[];
  mergeStats: MergeStatistics | null;
  outputs: string[];
}

export function pipelinePaths(dataDir: string) {
  const file = (name: string) => path.join(dataDir, name);
  return {
    breaksList: file("surf_breaks_list.csv"),
    breaksComplete: file("surf_breaks_complete.csv"),
    breaksStandardized: file("surf_breaks_complete_standardized.csv"),
    secondStandardized: file("additional_source_complete_standardized.csv"),
    merged: file("merged_surf_breaks.csv"),
    unmatchedA: file("source1_unmatched.csv"),
    unmatchedB: file("source2_unmatched.csv"),
  };
}

function requireFile(filePath: string, producedBy: string): void {
  if (!fs.existsSync(filePath)) {
    throw new ConfigurationError(`${filePath} not found; run the ${producedBy} stage first`);
  }
}

/**
 * Header cleanup for a secondary source: snake_case column names and a single
 * `alternate_name` column whatever the source called it.
 */
export function prepareSecondSource(table: Table): Table {
  let prepared = standardizeColumnNames(table);
  const alias = ALTERNATE_NAME_COLUMNS.find((c) => prepared.columns.includes(c));
  if (alias) prepared = renameColumn(prepared, alias, DEFAULT_FIELDS.alternateName);
  return prepared;
}

function toBreakListEntries(table: Table): BreakListEntry[] {
  assertColumns(table, ["name", "link", "country"], "break list");
  return table.rows.map((row) => ({
    name: coerceToString(row.name),
    link: coerceToString(row.link),
    country: coerceToString(row.country),
  }));
}

function reportSourceOverlap(tableA: Table, tableB: Table): void {
  const { common, unique } = compareColumnValues(tableA, tableB, "country");
  console.log(
    `[merge] ${common.length} countries appear in both sources, ${unique.length} in only one`
  );

  for (const [label, table] of [["source 1", tableA], ["source 2", tableB]] as const) {
    const { groups } = findDuplicates(table, ["name", "country"]);
    if (groups.length > 0) {
      console.warn(
        `[merge] ${label} has ${groups.length} repeated (name, country) pairs; ` +
          `each extra row can pair with at most one row of the other source`
      );
    }
  }
}

function mergeSources(
  paths: ReturnType<typeof pipelinePaths>,
  canonicalizer: CountryCanonicalizer
): MergeStatistics {
  const tableA = readTable(paths.breaksStandardized);
  const tableB = readTable(paths.secondStandardized);
  reportSourceOverlap(tableA, tableB);

  const result = reconcile(tableA, tableB, { canonicalizer });
  const { stats } = result;
  console.log(`[merge] ${stats.directMatches} direct matches`);
  console.log(`[merge] ${stats.nameToAlternateMatches} name-to-alternative matches`);
  console.log(`[merge] ${stats.alternateToNameMatches} alternative-to-name matches`);

  writeTable(paths.merged, {
    columns: [...result.table.columns, "match_pass"],
    rows: result.merged.map((m) => ({ ...m.values, match_pass: m.pass })),
  });
  console.log(`[merge] Merged data saved to ${paths.merged} (${stats.totalMerged} rows)`);

  const { leftoverA, leftoverB } = extractUnmatched(tableA, tableB, result.table);
  writeTable(paths.unmatchedA, leftoverA);
  writeTable(paths.unmatchedB, leftoverB);
  console.log(
    `[merge] Unmatched rows saved to ${paths.unmatchedA} (${leftoverA.rows.length}) and ${paths.unmatchedB} (${leftoverB.rows.length})`
  );

  if (leftoverA.rows.length !== stats.unmatchedA || leftoverB.rows.length !== stats.unmatchedB) {
    console.warn(
      `[merge] Name-only leftovers (${leftoverA.rows.length}/${leftoverB.rows.length}) differ from ` +
        `unpaired rows (${stats.unmatchedA}/${stats.unmatchedB}); some names are shared across countries`
    );
  }

  return stats;
}

export async function runPipeline(options: PipelineOptions = {}): Promise<PipelineSummary> {
  const {
    scrapeBreaks = true,
    scrapeDetails = true,
    standardize = true,
    merge = true,
    secondSource = null,
    pages,
    dataDir = config.dataDir,
  } = options;
  const canonicalizer = options.canonicalizer ?? getDefaultCanonicalizer();
  const paths = pipelinePaths(dataDir);
  const stagesRun: PipelineStage[] = [];
  const outputs: string[] = [];
  let mergeStats: MergeStatistics | null = null;

  fs.mkdirSync(dataDir, { recursive: true });
  console.log(`[pipeline] Starting surf data pipeline at ${new Date().toISOString()}`);

  // Step 1: list of breaks
  if (scrapeBreaks) {
    console.log("\n=== Step 1: Scraping list of surf breaks ===");
    const entries = await scrapeBreakList({ pages });
    writeTable(paths.breaksList, { columns: ["name", "link", "country"], rows: entries });
    outputs.push(paths.breaksList);
    stagesRun.push(PipelineStage.SCRAPE_BREAKS);
  } else {
    console.log("\n=== Step 1: Skipping scraping of surf breaks list ===");
  }

  // Step 2: detail pages
  if (scrapeDetails) {
    console.log("\n=== Step 2: Scraping detailed break information ===");
    requireFile(paths.breaksList, PipelineStage.SCRAPE_BREAKS);
    const breaks = await scrapeBreakDetails(toBreakListEntries(readTable(paths.breaksList)));
    writeTable(paths.breaksComplete, {
      columns: ["name", "link", "country", ...DETAIL_FIELDS],
      rows: breaks,
    });
    outputs.push(paths.breaksComplete);
    stagesRun.push(PipelineStage.SCRAPE_DETAILS);
  } else {
    console.log("\n=== Step 2: Skipping scraping of break details ===");
  }

  if (scrapeBreaks || scrapeDetails) pruneHttpCache();

  // Step 3: country names
  if (standardize) {
    console.log("\n=== Step 3: Standardizing country names ===");
    requireFile(paths.breaksComplete, PipelineStage.SCRAPE_DETAILS);
    standardizeCountriesInFile(paths.breaksComplete, paths.breaksStandardized, { canonicalizer });
    outputs.push(paths.breaksStandardized);

    if (secondSource && fs.existsSync(secondSource)) {
      console.log(`[pipeline] Standardizing second source: ${path.basename(secondSource)}`);
      writeTable(paths.secondStandardized, prepareSecondSource(readTable(secondSource)));
      standardizeCountriesInFile(paths.secondStandardized, paths.secondStandardized, {
        canonicalizer,
      });
      outputs.push(paths.secondStandardized);
    } else if (secondSource) {
      console.warn(`[pipeline] Second source ${secondSource} not found, skipping it`);
    }
    stagesRun.push(PipelineStage.STANDARDIZE);
  } else {
    console.log("\n=== Step 3: Skipping country name standardization ===");
  }

  // Step 4: merge
  if (merge) {
    console.log("\n=== Step 4: Merging datasets ===");
    requireFile(paths.breaksStandardized, PipelineStage.STANDARDIZE);

    if (secondSource && fs.existsSync(paths.secondStandardized)) {
      mergeStats = mergeSources(paths, canonicalizer);
      outputs.push(paths.merged, paths.unmatchedA, paths.unmatchedB);
    } else {
      console.log("[pipeline] No second source data found. Using only the primary source.");
      fs.copyFileSync(paths.breaksStandardized, paths.merged);
      outputs.push(paths.merged);
    }
    stagesRun.push(PipelineStage.MERGE);
  } else {
    console.log("\n=== Step 4: Skipping dataset merging ===");
  }

  console.log(`\n[pipeline] Surf data pipeline completed at ${new Date().toISOString()}`);
  return { stagesRun, mergeStats, outputs };
}
