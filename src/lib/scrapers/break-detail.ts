import * as cheerio from "cheerio";
import type { CheerioAPI } from "cheerio";
import { isText } from "domhandler";
import { config } from "../config";
import { DETAIL_FIELDS } from "../normalization-maps";
import type { DetailField } from "../normalization-maps";
import { fetchPage, resolveUrl } from "../scraping/utils";
import { requireBaseUrl } from "./break-list";
import type { BreakDetail, BreakListEntry, CompleteBreak, ScrapeOptions } from "./types";

function emptyDetailFields(): Record<DetailField, string> {
  return {
    region: "",
    type: "",
    rating: "",
    reliability: "",
    swell_direction: "",
    wind_direction: "",
    best_month: "",
    best_season: "",
    summary: "",
    time_of_year: "",
  };
}

function selectedOption($: CheerioAPI, selectId: string): string | null {
  const select = $(`select#${selectId}`);
  if (select.length === 0) return null;
  return select.find("option[selected]").first().text().trim();
}

/** Text node right after the break-type icon: `<img class="...--break"> Reef break` */
function textAfter($: CheerioAPI, selector: string): string {
  const node = $(selector).first().get(0)?.nextSibling;
  return node && isText(node) ? node.data.trim() : "";
}

function extractHeaderTable($: CheerioAPI, detail: BreakDetail): void {
  const table = $("table.guide-header__information").first();
  if (table.length === 0) return;

  detail.type = textAfter(
    $,
    "table.guide-header__information img.guide-header__type-icon.guide-header__type-icon--break"
  );
  detail.rating = table
    .find("img.guide-header__type-icon.guide-header__type-icon--stars")
    .first()
    .nextAll("span")
    .first()
    .text();

  const cells = table.find("td");
  if (cells.length > 2) detail.reliability = cells.eq(2).text().trim();
}

function extractConditions($: CheerioAPI, detail: BreakDetail): void {
  const directions = $("div.guide-header__best-surf").first().find("p").first().find("span.guide-header__dir");
  if (directions.length > 0) detail.swell_direction = directions.eq(0).text();
  if (directions.length > 1) detail.wind_direction = directions.eq(1).text();

  const bestMonth = $("div.guide-page__best-month").first();
  if (bestMonth.length > 0) {
    detail.best_month = bestMonth.text().split("Best")[0].trim();
    const season = bestMonth.find("span").first().text();
    if (season.includes(":")) detail.best_season = (season.split(": ")[1] ?? "").trim();
  }

  detail.summary = $("div.guide-header__summary__text").first().text().trim();
  detail.time_of_year = $("div.guide-page__text").first().text().trim();
}

/**
 * Read the attributes of one break guide page. Each field is looked up on its
 * own; an element missing from the page leaves only that field empty.
 */
export function parseBreakDetail(html: string): BreakDetail {
  const $ = cheerio.load(html);
  const detail: BreakDetail = { ...emptyDetailFields(), country: null };

  detail.region = selectedOption($, "region_id") ?? "";
  const country = selectedOption($, "country_id");
  detail.country = country ? country : null;

  extractHeaderTable($, detail);
  extractConditions($, detail);
  return detail;
}

function mergeDetail(entry: BreakListEntry, detail: BreakDetail | null): CompleteBreak {
  const fields = emptyDetailFields();
  if (detail) {
    for (const field of DETAIL_FIELDS) fields[field] = detail[field];
  }
  return {
    ...entry,
    ...fields,
    country: detail?.country ?? entry.country,
  };
}

/**
 * Fetch every break's guide page and add its attributes to the list row.
 * A page that fails keeps the list values with empty detail fields.
 */
export async function scrapeBreakDetails(
  entries: BreakListEntry[],
  options: ScrapeOptions = {}
): Promise<CompleteBreak[]> {
  const baseUrl = requireBaseUrl(options.baseUrl);
  const concurrency = Math.max(1, options.concurrency ?? config.maxConcurrentRequests);
  const results: CompleteBreak[] = [];
  let failed = 0;

  console.log(`[break-detail] Scraping details for ${entries.length} breaks`);

  for (let i = 0; i < entries.length; i += concurrency) {
    const batch = entries.slice(i, i + concurrency);
    const details = await Promise.all(
      batch.map(async (entry) => {
        try {
          const html = await fetchPage(resolveUrl(entry.link, baseUrl), {
            politeDelayMs: options.politeDelayMs,
          });
          return parseBreakDetail(html);
        } catch (err) {
          failed++;
          console.error(
            `[break-detail] Error scraping break ${entry.name}:`,
            err instanceof Error ? err.message : err
          );
          return null;
        }
      })
    );
    batch.forEach((entry, j) => results.push(mergeDetail(entry, details[j])));

    if (Math.floor((i + batch.length) / 100) > Math.floor(i / 100)) {
      console.log(`[break-detail] Processed ${i + batch.length}/${entries.length}`);
    }
  }

  console.log(`[break-detail] Done: ${results.length - failed} enriched, ${failed} failed`);
  return results;
}
