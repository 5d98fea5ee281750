import path from "node:path";
import { StoreError, describeError } from "../core/errors";
import { Logger } from "../observability";
import { CrawlResult, ProgressFile, RunSummary } from "../types";
import { readJsonIfExists, writeJsonAtomic } from "./atomicFile";

function isCrawlResult(value: unknown): value is CrawlResult {
  return (
    typeof value === "object" &&
    value !== null &&
    "region" in value &&
    typeof value.region === "string" &&
    "success" in value &&
    typeof value.success === "boolean"
  );
}

function normalizeResult(result: CrawlResult): CrawlResult {
  return {
    region: result.region,
    success: result.success,
    website: result.website,
    reportsFound: Number.isFinite(result.reportsFound) ? result.reportsFound : 0,
    filesDownloaded: Number.isFinite(result.filesDownloaded) ? result.filesDownloaded : 0,
    errors: Array.isArray(result.errors) ? result.errors.filter((item) => typeof item === "string") : [],
    finishedAt: result.finishedAt,
  };
}

export interface RunStatistics {
  totalRegions: number;
  successCount: number;
  failedCount: number;
  totalFiles: number;
  source: "summary" | "progress" | "none";
}

/**
 * Progress and summary files under the data directory. Saves rewrite the whole file
 * atomically; a failed save is logged and reported back so the caller keeps its in-memory
 * results for the next attempt.
 */
export class ProgressStore {
  readonly progressPath: string;

  constructor(
    private readonly dataDir: string,
    private readonly logger?: Logger,
  ) {
    this.progressPath = path.join(dataDir, "progress.json");
  }

  summaryPath(mode: RunSummary["mode"]): string {
    return path.join(this.dataDir, mode === "quick" ? "test-summary.json" : "summary.json");
  }

  load(): Map<string, CrawlResult> {
    const results = new Map<string, CrawlResult>();
    let raw: unknown;
    try {
      raw = readJsonIfExists(this.progressPath);
    } catch (error) {
      this.logger?.warn("progress_load_failed", { path: this.progressPath, error: describeError(error) });
      return results;
    }

    if (typeof raw !== "object" || raw === null || !("results" in raw) || !Array.isArray(raw.results)) {
      return results;
    }
    for (const entry of raw.results) {
      if (isCrawlResult(entry)) {
        results.set(entry.region, normalizeResult(entry));
      }
    }
    return results;
  }

  completedRegions(): Set<string> {
    const completed = new Set<string>();
    for (const [region, result] of this.load()) {
      if (result.success) {
        completed.add(region);
      }
    }
    return completed;
  }

  async save(results: CrawlResult[], totalRegions: number): Promise<boolean> {
    const payload: ProgressFile = {
      lastUpdate: new Date().toISOString(),
      totalRegions,
      results,
    };
    return this.write(this.progressPath, payload);
  }

  async writeSummary(summary: RunSummary): Promise<boolean> {
    return this.write(this.summaryPath(summary.mode), summary);
  }

  statistics(): RunStatistics {
    const summary = this.readSummary();
    if (summary) {
      return {
        totalRegions: summary.totalRegions,
        successCount: summary.successCount,
        failedCount: summary.failedCount,
        totalFiles: summary.totalFiles,
        source: "summary",
      };
    }

    const results = [...this.load().values()];
    if (results.length === 0) {
      return { totalRegions: 0, successCount: 0, failedCount: 0, totalFiles: 0, source: "none" };
    }
    const successCount = results.filter((result) => result.success).length;
    return {
      totalRegions: results.length,
      successCount,
      failedCount: results.length - successCount,
      totalFiles: results.reduce((sum, result) => sum + result.filesDownloaded, 0),
      source: "progress",
    };
  }

  readSummary(): RunSummary | undefined {
    let raw: unknown;
    try {
      raw = readJsonIfExists(this.summaryPath("full"));
    } catch (error) {
      this.logger?.warn("summary_load_failed", { error: describeError(error) });
      return undefined;
    }
    if (!isRunSummary(raw)) {
      return undefined;
    }
    return raw;
  }

  private async write(filePath: string, payload: unknown): Promise<boolean> {
    try {
      await writeJsonAtomic(filePath, payload);
      return true;
    } catch (error) {
      const storeError = new StoreError(filePath, `failed to write ${path.basename(filePath)}: ${describeError(error)}`);
      this.logger?.error("progress_store_write_failed", { path: filePath, error: storeError.message });
      return false;
    }
  }
}

function isRunSummary(value: unknown): value is RunSummary {
  return (
    typeof value === "object" &&
    value !== null &&
    "totalRegions" in value &&
    typeof value.totalRegions === "number" &&
    "successCount" in value &&
    typeof value.successCount === "number" &&
    "failedCount" in value &&
    typeof value.failedCount === "number" &&
    "totalFiles" in value &&
    typeof value.totalFiles === "number" &&
    "results" in value &&
    Array.isArray(value.results)
  );
}
