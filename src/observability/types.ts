export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogFields {
  term?: string;
  url?: string;
  language?: string;
  [key: string]: unknown;
}

export type MetricCounterName =
  | "terms_extracted"
  | "terms_skipped"
  | "terms_failed"
  | "pages_saved"
  | "docs_indexed"
  | "docs_failed"
  | "searches_served";

export type MetricTimerName = "page_fetch_ms" | "sync_ms" | "search_ms";
