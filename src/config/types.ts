import type { RetryPolicy } from "../core/retry";
import type { LogLevel } from "../observability/types";

export interface OutputDirs {
  data: string;
  downloads: string;
  manifests: string;
}

export interface DelayRange {
  minMs: number;
  maxMs: number;
}

export interface MappingStoreConfig {
  driver: "json" | "sqlite";
  path: string;
}

export interface RetryPolicies {
  probe: RetryPolicy;
  search: RetryPolicy;
  download: RetryPolicy;
}

export interface AppConfig {
  targetYear: number;
  userAgent: string;
  requestHeaders: Record<string, string>;
  ignoreHttpsErrors: boolean;
  logLevel: LogLevel;
  probeTimeoutMs: number;
  requestTimeoutMs: number;
  downloadTimeoutMs: number;
  requestDelayMs: number;
  searchDelayMs: DelayRange;
  workers?: number;
  maxWorkers: number;
  connectionsPerOrigin: number;
  progressFlushEvery: number;
  maxPaginationPages: number;
  sectionHopLimit: number;
  exploreMaxPages: number;
  exploreMaxDepth: number;
  searchVerifyLimit: number;
  searchEngines: string[];
  requireFinanceTitle: boolean;
  financeTitleKeyword: string;
  retryUnresolved: boolean;
  probeCommonSectionPaths: boolean;
  commonSectionPaths: string[];
  /** Submit a site's own GET search form when its sections list no report. */
  siteSearch: boolean;
  /** Pages tried for a search form when the root page has none. */
  siteSearchPaths: string[];
  targetFileExtensions: string[];
  retry: RetryPolicies;
  regionsPath: string;
  quickRegions: string[];
  mappingStore: MappingStoreConfig;
  sinkType: "local_jsonl" | "none";
  outputDirs: OutputDirs;
}

export type ConfigOverrides = Partial<
  Omit<AppConfig, "outputDirs" | "mappingStore" | "retry" | "searchDelayMs">
> & {
  outputDirs?: Partial<OutputDirs>;
  mappingStore?: Partial<MappingStoreConfig>;
  retry?: Partial<Record<keyof RetryPolicies, Partial<RetryPolicy>>>;
  searchDelayMs?: Partial<DelayRange>;
};
