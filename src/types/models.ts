export type SiteKind = "gov" | "fin";

export interface Region {
  name: string;
  baseName: string;
  variants: string[];
}

export interface Transliteration {
  full: string;
  abbr: string;
}

export interface SiteMapping {
  gov?: string;
  fin?: string;
}

export interface SearchResult {
  root: string;
  engine: string;
  query: string;
}

export interface SectionLink {
  url: string;
  anchorText: string;
  depth: number;
  fromPublicSection: boolean;
}

export interface ReportLink {
  url: string;
  title: string;
  sourceUrl: string;
  fromPublicSection: boolean;
}

export interface Attachment {
  url: string;
  title: string;
  extension: string;
  sourcePageUrl: string;
}

export interface DownloadRecord {
  url: string;
  sourcePageUrl: string;
  path: string;
  status: "downloaded" | "skipped" | "failed";
  bytes?: number;
  sha256?: string;
  contentType?: string;
  attempts: number;
  error?: string;
  finishedAt: string;
}

export interface CrawlResult {
  region: string;
  success: boolean;
  website?: string;
  reportsFound: number;
  filesDownloaded: number;
  errors: string[];
  finishedAt?: string;
}

export interface ProgressFile {
  lastUpdate: string;
  totalRegions: number;
  results: CrawlResult[];
}

export type RunMode = "full" | "quick";

export interface RunSummary {
  targetYear: number;
  mode: RunMode;
  totalRegions: number;
  successCount: number;
  failedCount: number;
  totalFiles: number;
  startedAt: string;
  finishedAt: string;
  interrupted: boolean;
  results: CrawlResult[];
}
