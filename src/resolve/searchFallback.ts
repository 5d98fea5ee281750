import { WorkerContext, isAborted } from "../core/context";
import { FetchError } from "../core/errors";
import { err, ok, Result } from "../core/result";
import { retryResult } from "../core/retry";
import { fileExtensionOf, hostOf, normalizeRoot } from "../core/url";
import { Region, SearchResult, SiteKind } from "../types";
import { verifyCandidate } from "./verifier";

export interface SearchEngine {
  name: string;
  buildUrl: (query: string) => string;
}

export const SEARCH_ENGINES: Record<string, SearchEngine> = {
  baidu: { name: "baidu", buildUrl: (query) => `https://www.baidu.com/s?wd=${encodeURIComponent(query)}` },
  bing: { name: "bing", buildUrl: (query) => `https://cn.bing.com/search?q=${encodeURIComponent(query)}` },
  sogou: { name: "sogou", buildUrl: (query) => `https://www.sogou.com/web?query=${encodeURIComponent(query)}` },
};

const GOV_URL_PATTERN = /https?:\/\/[\w.-]*\.gov\.cn[^\s"'<>]*/gi;
const DIRECT_FILE_EXTENSIONS = [".pdf", ".doc", ".docx", ".xls", ".xlsx", ".rar", ".zip", ".wps", ".et"];

/** Memo of search outcomes keyed by region and kind. `null` records a search that found nothing. */
export interface SearchResultCache {
  get(key: string): SearchResult | null | undefined;
  set(key: string, value: SearchResult | null): void;
}

export class InMemorySearchCache implements SearchResultCache {
  private readonly entries = new Map<string, SearchResult | null>();

  get(key: string): SearchResult | null | undefined {
    return this.entries.get(key);
  }

  set(key: string, value: SearchResult | null): void {
    this.entries.set(key, value);
  }
}

export function buildSearchQueries(region: Region, kind: SiteKind): string[] {
  const name = region.name;
  if (kind === "gov") {
    return [`site:.gov.cn ${name} 人民政府`, `${name} 人民政府 官网`, `${name} 政府网站`];
  }
  return [`site:.gov.cn ${name} 财政局`, `${name} 财政局 官网`, `${name} 财政局 网站`];
}

/** `.gov.cn` roots mentioned in a results page, in first-seen order, with file links dropped. */
export function extractGovRoots(html: string): string[] {
  const roots: string[] = [];
  for (const match of html.matchAll(GOV_URL_PATTERN)) {
    const url = match[0];
    if (fileExtensionOf(url, DIRECT_FILE_EXTENSIONS)) {
      continue;
    }
    const root = normalizeRoot(url);
    if (!root || !(hostOf(root) ?? "").endsWith(".gov.cn") || roots.includes(root)) {
      continue;
    }
    roots.push(root);
  }
  return roots;
}

function shuffled<T>(items: readonly T[], random: () => number): T[] {
  const copy = [...items];
  for (let i = copy.length - 1; i > 0; i -= 1) {
    const j = Math.floor(random() * (i + 1));
    [copy[i], copy[j]] = [copy[j], copy[i]];
  }
  return copy;
}

function politenessDelay(ctx: WorkerContext): number {
  const { minMs, maxMs } = ctx.config.searchDelayMs;
  return Math.floor(minMs + (Math.max(maxMs, minMs) - minMs) * ctx.random());
}

async function queryEngine(
  ctx: WorkerContext,
  engine: SearchEngine,
  query: string,
): Promise<Result<string[], FetchError>> {
  const url = engine.buildUrl(query);
  return retryResult(
    ctx.config.retry.search,
    async () => {
      ctx.metrics.incrementCounter("search_queries", 1);
      const page = await ctx.http.getPage(url, ctx.config.requestTimeoutMs);
      return page.ok ? ok(extractGovRoots(page.value.html)) : page;
    },
    {
      isRetryable: (error) => error.kind === "transient",
      sleep: ctx.sleep,
      random: ctx.random,
      shouldStop: () => isAborted(ctx),
      onRetry: (error, attempt, delayMs) =>
        ctx.logger.debug("search_retry", { url, attempt, delayMs, error: error.message }),
    },
  );
}

async function firstVerifiedRoot(ctx: WorkerContext, roots: string[]): Promise<string | undefined> {
  for (const root of roots.slice(0, ctx.config.searchVerifyLimit)) {
    const host = hostOf(root);
    if (!host || !(await ctx.resolveHost(host))) {
      continue;
    }
    const verified = await verifyCandidate(ctx, root);
    if (verified.ok) {
      return verified.value;
    }
  }
  return undefined;
}

/**
 * Asks public search engines for the region's portal. Each query tries the configured
 * engines in a random order, waiting a random interval before every request. The outcome,
 * including "nothing found", is memoized in the injected cache.
 */
export async function searchForRoot(
  ctx: WorkerContext,
  region: Region,
  kind: SiteKind,
  cache?: SearchResultCache,
): Promise<Result<SearchResult, FetchError>> {
  const cacheKey = `${region.name}:${kind}`;
  const cached = cache?.get(cacheKey);
  if (cached) {
    return ok(cached);
  }
  if (cached === null) {
    return err(new FetchError("definitive", cacheKey, "search previously found nothing"));
  }

  const engines = ctx.config.searchEngines
    .map((name) => SEARCH_ENGINES[name])
    .filter((engine): engine is SearchEngine => engine !== undefined);

  let lastError: FetchError | undefined;
  for (const query of buildSearchQueries(region, kind)) {
    for (const engine of shuffled(engines, ctx.random)) {
      if (isAborted(ctx)) {
        return err(new FetchError("transient", cacheKey, "search aborted"));
      }
      await ctx.sleep(politenessDelay(ctx));

      const roots = await queryEngine(ctx, engine, query);
      if (!roots.ok) {
        lastError = roots.error;
        ctx.logger.warn("search_engine_failed", { region: region.name, engine: engine.name, error: roots.error.message });
        continue;
      }

      const root = await firstVerifiedRoot(ctx, roots.value);
      if (root) {
        const result: SearchResult = { root, engine: engine.name, query };
        cache?.set(cacheKey, result);
        ctx.logger.info("search_root_found", { region: region.name, kind, engine: engine.name, root });
        return ok(result);
      }
    }
  }

  cache?.set(cacheKey, null);
  return err(lastError ?? new FetchError("definitive", cacheKey, `no ${kind} portal found by search`));
}
