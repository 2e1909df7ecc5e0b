import type { DetailField } from "../normalization-maps";
import type { BreakRecord } from "../types";

/** One row of the paginated break list */
export type BreakListEntry = {
  name: string;
  link: string;
  country: string;
};

/** Attributes read from a break's guide page (raw strings, "" when absent) */
export type BreakDetail = Record<DetailField, string> & {
  /** Country as selected on the guide page; null when the page has no selector */
  country: string | null;
};

export interface ScrapeOptions {
  baseUrl?: string;
  pages?: number;
  concurrency?: number;
  politeDelayMs?: number;
}

/** A break list row enriched with its detail fields */
export type CompleteBreak = BreakRecord & BreakListEntry & Record<DetailField, string>;
