import { AppConfig } from "../config";
import { Logger, MetricsRegistry } from "../observability";
import { runRegions } from "../orchestrator";
import { createRegion, loadRegionList } from "../regions";
import { InMemorySearchCache, searchForRoot, verifyCandidate } from "../resolve";
import { Sink } from "../sink";
import { MappingStore, ProgressStore, RunStatistics } from "../store";
import { Region, RunMode, RunSummary, SiteKind, SiteMapping } from "../types";
import { createWorkerContext, isAborted, WorkerContextOptions } from "./context";

export interface CommandContext {
  runId: string;
  config: AppConfig;
  store: MappingStore;
  progress: ProgressStore;
  logger: Logger;
  metrics: MetricsRegistry;
  sink: Sink;
  signal?: AbortSignal;
  contextOverrides?: Pick<WorkerContextOptions, "dispatcher" | "fetchFn" | "sleep" | "random" | "resolveHost">;
}

function selectRegions(config: AppConfig, mode: RunMode, explicit: string[] | undefined): Region[] {
  if (explicit && explicit.length > 0) {
    return explicit.map(createRegion);
  }
  const names = mode === "quick" ? config.quickRegions : loadRegionList(config.regionsPath);
  return names.map(createRegion);
}

export async function runCrawl(ctx: CommandContext, mode: RunMode, regionNames?: string[]): Promise<RunSummary> {
  const regions = selectRegions(ctx.config, mode, regionNames);
  ctx.logger.info("crawl_start", { mode, regions: regions.length, targetYear: ctx.config.targetYear });

  const summary = await runRegions({
    config: ctx.config,
    logger: ctx.logger,
    metrics: ctx.metrics,
    regions,
    mode,
    store: ctx.store,
    progress: ctx.progress,
    sink: ctx.sink,
    searchCache: new InMemorySearchCache(),
    signal: ctx.signal,
    contextOverrides: ctx.contextOverrides,
  });

  for (const result of summary.results.filter((item) => !item.success)) {
    ctx.logger.warn("region_unsuccessful", { region: result.region, errors: result.errors });
  }
  ctx.logger.info("crawl_complete", {
    successCount: summary.successCount,
    failedCount: summary.failedCount,
    totalFiles: summary.totalFiles,
    summaryPath: ctx.progress.summaryPath(mode),
  });
  return summary;
}

const SITE_KINDS: SiteKind[] = ["gov", "fin"];

export type MappingCheck = "ok" | "suggested" | "missing";

export interface MappingVerification {
  region: string;
  mapped: SiteMapping;
  gov: MappingCheck;
  fin: MappingCheck;
  suggestion: SiteMapping;
}

export interface VerifyMappingsReport {
  checked: number;
  applied: number;
  verifications: MappingVerification[];
}

/**
 * Re-probes every stored root and asks the search fallback for a replacement where one
 * fails. Suggestions are only logged unless `apply` is set, in which case they go through
 * the store's merge so a known root is never cleared.
 */
export async function runVerifyMappings(
  ctx: CommandContext,
  apply: boolean,
  regionNames?: string[],
): Promise<VerifyMappingsReport> {
  const regions = selectRegions(ctx.config, "full", regionNames);
  const worker = createWorkerContext({
    config: ctx.config,
    logger: ctx.logger,
    metrics: ctx.metrics,
    signal: ctx.signal,
    ...ctx.contextOverrides,
  });
  const searchCache = new InMemorySearchCache();
  const verifications: MappingVerification[] = [];
  let applied = 0;

  ctx.logger.info("verify_mappings_start", { regions: regions.length, apply });
  try {
    for (const region of regions) {
      if (isAborted(worker)) {
        break;
      }
      const mapped = (await ctx.store.get(region.name)) ?? {};
      const verification: MappingVerification = { region: region.name, mapped, gov: "missing", fin: "missing", suggestion: {} };

      for (const kind of SITE_KINDS) {
        const current = mapped[kind];
        if (current) {
          const alive = await verifyCandidate(worker, current, {
            requireTitleKeyword:
              kind === "fin" && ctx.config.requireFinanceTitle ? ctx.config.financeTitleKeyword : undefined,
          });
          if (alive.ok) {
            verification[kind] = "ok";
            continue;
          }
        }
        const searched = await searchForRoot(worker, region, kind, searchCache);
        if (searched.ok && searched.value.root !== current) {
          verification[kind] = "suggested";
          verification.suggestion[kind] = searched.value.root;
        }
      }

      verifications.push(verification);
      const hasSuggestion = Boolean(verification.suggestion.gov || verification.suggestion.fin);
      if (hasSuggestion) {
        ctx.logger.info("mapping_suggestion", {
          region: region.name,
          gov: verification.suggestion.gov ?? mapped.gov ?? "",
          fin: verification.suggestion.fin ?? mapped.fin ?? "",
        });
        if (apply) {
          await ctx.store.put(region.name, verification.suggestion);
          applied += 1;
        }
      } else if (verification.gov === "missing" && verification.fin === "missing") {
        ctx.logger.warn("mapping_missing", { region: region.name });
      } else {
        ctx.logger.info("mapping_ok", { region: region.name, gov: verification.gov, fin: verification.fin });
      }
    }
  } finally {
    await worker.http.close();
  }

  if (apply) {
    await ctx.store.flush();
  }
  ctx.logger.info("verify_mappings_complete", { checked: verifications.length, applied });
  return { checked: verifications.length, applied, verifications };
}

export async function runStatus(ctx: CommandContext): Promise<RunStatistics> {
  ctx.logger.info("status_start");
  const stats = ctx.progress.statistics();
  ctx.logger.info("status_complete", { stats });
  return stats;
}
