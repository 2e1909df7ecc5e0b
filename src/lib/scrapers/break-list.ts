import * as cheerio from "cheerio";
import { config } from "../config";
import { ConfigurationError } from "../errors";
import { fetchPage, resolveUrl } from "../scraping/utils";
import type { BreakListEntry, ScrapeOptions } from "./types";

export const BREAK_LIST_PATH = "/breaks";

export function requireBaseUrl(baseUrl: string | undefined): string {
  const url = baseUrl ?? config.surfGuideBaseUrl;
  if (!url) {
    throw new ConfigurationError(
      "SURF_GUIDE_BASE_URL is not set; it is required to scrape the break guide"
    );
  }
  return url;
}

/**
 * Each list cell holding both a link and a `span.rem` describes one break:
 * the link text is its name, the span its country.
 */
export function parseBreakListPage(html: string): BreakListEntry[] {
  const $ = cheerio.load(html);
  const entries: BreakListEntry[] = [];

  $("td").each((_, el) => {
    const cell = $(el);
    const anchor = cell.find("a").first();
    const countrySpan = cell.find("span.rem").first();
    const link = anchor.attr("href");
    if (anchor.length === 0 || countrySpan.length === 0 || !link) return;

    entries.push({
      name: anchor.text().trim(),
      link,
      country: countrySpan.text().trim(),
    });
  });

  return entries;
}

export async function scrapeBreakList(options: ScrapeOptions = {}): Promise<BreakListEntry[]> {
  const baseUrl = requireBaseUrl(options.baseUrl);
  const pages = options.pages ?? config.breakListPages;
  const entries: BreakListEntry[] = [];

  console.log(`[break-list] Scraping ${pages} list pages from ${baseUrl}`);

  for (let page = 1; page <= pages; page++) {
    const url = resolveUrl(`${BREAK_LIST_PATH}?page=${page}`, baseUrl);
    try {
      const html = await fetchPage(url, { politeDelayMs: options.politeDelayMs });
      const found = parseBreakListPage(html);
      entries.push(...found);
      console.log(`[break-list] Page ${page}/${pages}: ${found.length} breaks`);
    } catch (err) {
      console.error(
        `[break-list] Failed page ${page}:`,
        err instanceof Error ? err.message : err
      );
    }
  }

  console.log(`[break-list] Scraped ${entries.length} surf breaks`);
  return entries;
}
