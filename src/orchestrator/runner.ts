import os from "node:os";
import { AppConfig } from "../config";
import { processWithConcurrency } from "../core/concurrency";
import { createWorkerContext, WorkerContext, WorkerContextOptions } from "../core/context";
import { Logger, MetricsRegistry } from "../observability";
import { SearchResultCache } from "../resolve";
import { Sink } from "../sink";
import { MappingStore, ProgressStore } from "../store";
import { CrawlResult, Region, RunMode, RunSummary } from "../types";
import { crawlRegion, failedResult } from "./regionPipeline";

export type ProcessRegion = (ctx: WorkerContext, region: Region) => Promise<CrawlResult>;

export interface RunOptions {
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  regions: Region[];
  mode: RunMode;
  store: MappingStore;
  progress: ProgressStore;
  sink: Sink;
  searchCache?: SearchResultCache;
  signal?: AbortSignal;
  /** Transport and clock overrides handed to every worker context. */
  contextOverrides?: Pick<WorkerContextOptions, "dispatcher" | "fetchFn" | "sleep" | "random" | "resolveHost">;
  processRegion?: ProcessRegion;
}

export function workerCount(config: AppConfig): number {
  if (config.workers !== undefined && config.workers > 0) {
    return config.workers;
  }
  return Math.max(1, Math.min(os.availableParallelism(), config.maxWorkers));
}

/**
 * Crawls regions on a bounded pool. Each slot owns one worker context (and so one
 * connection pool) for its lifetime; every region sees it with a logger bound to its name. In full mode, regions already successful in the
 * progress file are skipped and progress is rewritten every `progressFlushEvery`
 * completions and once more at the end; saves are queued so only one is in flight.
 * Quick mode neither reads nor writes progress.
 */
export async function runRegions(options: RunOptions): Promise<RunSummary> {
  const { config, logger, metrics, regions, mode, progress, signal } = options;
  const startedAt = new Date().toISOString();

  const results = mode === "full" ? progress.load() : new Map<string, CrawlResult>();
  const pending = regions.filter((region) => !(results.get(region.name)?.success ?? false));
  if (pending.length < regions.length) {
    logger.info("regions_skipped_completed", { skipped: regions.length - pending.length, pending: pending.length });
  }

  const processRegion: ProcessRegion =
    options.processRegion ??
    ((ctx, region) =>
      crawlRegion(ctx, region, { store: options.store, sink: options.sink, searchCache: options.searchCache }));

  let saveQueue: Promise<void> = Promise.resolve();
  const flushProgress = (): Promise<void> => {
    if (mode === "quick") {
      return saveQueue;
    }
    saveQueue = saveQueue.then(async () => {
      await progress.save([...results.values()], regions.length);
    });
    return saveQueue;
  };

  const concurrency = workerCount(config);
  logger.info("run_start", { mode, regions: regions.length, pending: pending.length, workers: concurrency });

  let sinceFlush = 0;
  await processWithConcurrency<Region, WorkerContext>(
    pending,
    async (region, ctx) => {
      const regionCtx: WorkerContext = { ...ctx, logger: ctx.logger.withFields({ region: region.name }) };
      const stopTimer = metrics.startTimer("region_ms");
      let result: CrawlResult;
      try {
        result = await processRegion(regionCtx, region);
      } catch (error) {
        result = failedResult(region, error);
        regionCtx.logger.error("region_failed_unexpectedly", { error: result.errors[0] });
      }
      stopTimer();

      results.set(region.name, result);
      metrics.incrementCounter(result.success ? "regions_succeeded" : "regions_failed", 1);

      sinceFlush += 1;
      if (sinceFlush >= config.progressFlushEvery) {
        sinceFlush = 0;
        await flushProgress();
      }
    },
    {
      concurrency,
      setup: (slotIndex) =>
        createWorkerContext({
          config,
          logger: logger.child(`worker-${slotIndex}`),
          metrics,
          signal,
          ...options.contextOverrides,
        }),
      teardown: (ctx) => ctx.http.close(),
      shouldStop: () => signal?.aborted ?? false,
    },
  );

  await flushProgress();

  const runResults = regions
    .map((region) => results.get(region.name))
    .filter((result): result is CrawlResult => result !== undefined);
  const successCount = runResults.filter((result) => result.success).length;
  const summary: RunSummary = {
    targetYear: config.targetYear,
    mode,
    totalRegions: regions.length,
    successCount,
    failedCount: runResults.length - successCount,
    totalFiles: runResults.reduce((sum, result) => sum + result.filesDownloaded, 0),
    startedAt,
    finishedAt: new Date().toISOString(),
    interrupted: signal?.aborted ?? false,
    results: runResults,
  };
  await progress.writeSummary(summary);

  logger.info("run_finished", {
    mode,
    totalRegions: summary.totalRegions,
    successCount,
    failedCount: summary.failedCount,
    totalFiles: summary.totalFiles,
    interrupted: summary.interrupted,
  });
  return summary;
}
