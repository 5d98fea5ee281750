import fs from "node:fs";
import path from "node:path";
import type { LogLevel } from "../observability/types";
import type { AppConfig, ConfigOverrides, RetryPolicies } from "./types";

const DEFAULT_CONFIG: AppConfig = {
  targetYear: 2024,
  userAgent:
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
  requestHeaders: {
    accept: "text/html,application/xhtml+xml,application/xml;q=0.9,image/webp,*/*;q=0.8",
    "accept-language": "zh-CN,zh;q=0.9,en;q=0.8",
    "upgrade-insecure-requests": "1",
  },
  ignoreHttpsErrors: false,
  logLevel: "info",
  probeTimeoutMs: 5_000,
  requestTimeoutMs: 30_000,
  downloadTimeoutMs: 120_000,
  requestDelayMs: 2_000,
  searchDelayMs: { minMs: 2_000, maxMs: 6_000 },
  workers: undefined,
  maxWorkers: 8,
  connectionsPerOrigin: 4,
  progressFlushEvery: 5,
  maxPaginationPages: 100,
  sectionHopLimit: 50,
  exploreMaxPages: 120,
  exploreMaxDepth: 2,
  searchVerifyLimit: 10,
  searchEngines: ["baidu", "bing", "sogou"],
  requireFinanceTitle: false,
  financeTitleKeyword: "财政",
  retryUnresolved: false,
  probeCommonSectionPaths: true,
  commonSectionPaths: [
    "/zfxxgk/",
    "/zwgk/",
    "/xxgk/",
    "/zfxxgk/fdzdgknr/",
    "/zfxxgk/zdlyxxgk/",
    "/zdlyxxgk/",
    "/czxxgk/",
    "/czgk/",
    "/czzj/",
    "/ysjs/",
    "/ysjsgk/",
    "/yujuesuan/",
    "/bmxxgk/czj/",
    "/czj/",
  ],
  siteSearch: true,
  siteSearchPaths: ["/search", "/search.html", "/so", "/s"],
  targetFileExtensions: [".pdf", ".doc", ".docx", ".xls", ".xlsx", ".wps", ".et", ".rar", ".zip"],
  retry: {
    probe: { maxAttempts: 1, baseDelayMs: 500, multiplier: 2, maxDelayMs: 2_000, jitter: 0 },
    search: { maxAttempts: 3, baseDelayMs: 2_000, multiplier: 2, maxDelayMs: 20_000, jitter: 2 },
    download: { maxAttempts: 3, baseDelayMs: 2_000, multiplier: 2, maxDelayMs: 10_000, jitter: 0.25 },
  },
  regionsPath: "data/regions.json",
  quickRegions: ["赣州市", "北京市", "上海市", "杭州市", "深圳市"],
  mappingStore: {
    driver: "json",
    path: "data/site-mappings.json",
  },
  sinkType: "local_jsonl",
  outputDirs: {
    data: "data",
    downloads: "data/downloads",
    manifests: "data/manifests",
  },
};

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

function readConfigFile(configPath?: string): ConfigOverrides {
  if (!configPath) {
    return {};
  }

  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw new Error(`Config file not found: ${absolutePath}`);
  }

  const raw = fs.readFileSync(absolutePath, "utf-8");
  const parsed: unknown = JSON.parse(raw);
  if (parsed === null || typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new Error(`Config file must contain a JSON object: ${absolutePath}`);
  }
  return parsed;
}

function toInt(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function toOptionalInt(value: string | undefined, fallback: number | undefined): number | undefined {
  if (!value) {
    return fallback;
  }
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function toBool(value: string | undefined, fallback: boolean): boolean {
  if (!value) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes") {
    return true;
  }
  if (normalized === "0" || normalized === "false" || normalized === "no") {
    return false;
  }
  return fallback;
}

function toList(value: string | undefined, fallback: string[]): string[] {
  if (!value) {
    return fallback;
  }
  const items = value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
  return items.length > 0 ? items : fallback;
}

function toLogLevel(value: string | undefined, fallback: LogLevel): LogLevel {
  const match = LOG_LEVELS.find((level) => level === value?.trim().toLowerCase());
  return match ?? fallback;
}

function mergeRetry(overrides: ConfigOverrides["retry"]): RetryPolicies {
  return {
    probe: { ...DEFAULT_CONFIG.retry.probe, ...(overrides?.probe ?? {}) },
    search: { ...DEFAULT_CONFIG.retry.search, ...(overrides?.search ?? {}) },
    download: { ...DEFAULT_CONFIG.retry.download, ...(overrides?.download ?? {}) },
  };
}

export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const fileConfig = readConfigFile(configPath);

  const merged: AppConfig = {
    ...DEFAULT_CONFIG,
    ...fileConfig,
    searchDelayMs: {
      ...DEFAULT_CONFIG.searchDelayMs,
      ...(fileConfig.searchDelayMs ?? {}),
    },
    retry: mergeRetry(fileConfig.retry),
    mappingStore: {
      ...DEFAULT_CONFIG.mappingStore,
      ...(fileConfig.mappingStore ?? {}),
    },
    outputDirs: {
      ...DEFAULT_CONFIG.outputDirs,
      ...(fileConfig.outputDirs ?? {}),
    },
  };

  const dataDir = env.DATA_DIR ?? merged.outputDirs.data;

  return {
    ...merged,
    targetYear: toInt(env.TARGET_YEAR, merged.targetYear),
    userAgent: env.USER_AGENT ?? merged.userAgent,
    ignoreHttpsErrors: toBool(env.IGNORE_HTTPS_ERRORS, merged.ignoreHttpsErrors),
    logLevel: toLogLevel(env.LOG_LEVEL, merged.logLevel),
    probeTimeoutMs: toInt(env.PROBE_TIMEOUT_MS, merged.probeTimeoutMs),
    requestTimeoutMs: toInt(env.REQUEST_TIMEOUT_MS, merged.requestTimeoutMs),
    downloadTimeoutMs: toInt(env.DOWNLOAD_TIMEOUT_MS, merged.downloadTimeoutMs),
    requestDelayMs: toInt(env.REQUEST_DELAY_MS, merged.requestDelayMs),
    workers: toOptionalInt(env.WORKERS, merged.workers),
    maxWorkers: toInt(env.MAX_WORKERS, merged.maxWorkers),
    progressFlushEvery: toInt(env.PROGRESS_FLUSH_EVERY, merged.progressFlushEvery),
    maxPaginationPages: toInt(env.MAX_PAGINATION_PAGES, merged.maxPaginationPages),
    exploreMaxPages: toInt(env.EXPLORE_MAX_PAGES, merged.exploreMaxPages),
    exploreMaxDepth: toInt(env.EXPLORE_MAX_DEPTH, merged.exploreMaxDepth),
    searchEngines: toList(env.SEARCH_ENGINES, merged.searchEngines),
    requireFinanceTitle: toBool(env.REQUIRE_FINANCE_TITLE, merged.requireFinanceTitle),
    retryUnresolved: toBool(env.RETRY_UNRESOLVED, merged.retryUnresolved),
    probeCommonSectionPaths: toBool(env.PROBE_COMMON_SECTION_PATHS, merged.probeCommonSectionPaths),
    siteSearch: toBool(env.SITE_SEARCH, merged.siteSearch),
    regionsPath: env.REGIONS_PATH ?? merged.regionsPath,
    sinkType: env.SINK_TYPE === "none" || env.SINK_TYPE === "local_jsonl" ? env.SINK_TYPE : merged.sinkType,
    mappingStore: {
      driver:
        env.MAPPING_STORE_DRIVER === "json" || env.MAPPING_STORE_DRIVER === "sqlite"
          ? env.MAPPING_STORE_DRIVER
          : merged.mappingStore.driver,
      path: env.MAPPING_STORE_PATH ?? merged.mappingStore.path,
    },
    outputDirs: {
      data: dataDir,
      downloads: env.DOWNLOADS_DIR ?? merged.outputDirs.downloads,
      manifests: env.MANIFESTS_DIR ?? merged.outputDirs.manifests,
    },
  };
}

export { DEFAULT_CONFIG };
