export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogFields {
  region?: string;
  url?: string;
  pageUrl?: string;
  attempt?: number;
  [key: string]: unknown;
}

export type MetricCounterName =
  | "pages_crawled"
  | "candidates_probed"
  | "search_queries"
  | "sections_discovered"
  | "site_searches"
  | "reports_found"
  | "attachments_found"
  | "downloads_ok"
  | "downloads_skipped"
  | "downloads_failed"
  | "regions_succeeded"
  | "regions_failed";

export type MetricTimerName = "page_fetch_ms" | "download_ms" | "region_ms";
