import { WorkerContext, isAborted } from "../core/context";
import { FetchError } from "../core/errors";
import { err, ok, Result } from "../core/result";
import { retryResult } from "../core/retry";
import { normalizeRoot } from "../core/url";
import { HtmlDocument } from "../crawl/htmlParser";

export interface VerifyOptions {
  /** When set, the landing page's `<title>` must contain this keyword. */
  requireTitleKeyword?: string;
}

/** Servers that refuse HEAD with one of these get a GET instead. */
const HEAD_REFUSED = new Set([403, 405, 501]);

/** Final URL a HEAD request lands on, retried as GET where HEAD is refused. */
export async function probeOnce(ctx: WorkerContext, url: string): Promise<Result<string, FetchError>> {
  const head = await ctx.http.head(url, ctx.config.probeTimeoutMs);
  if (head.ok) {
    return ok(head.value.url);
  }
  if (head.error.status === undefined || !HEAD_REFUSED.has(head.error.status)) {
    return head;
  }

  const page = await ctx.http.getPage(url, ctx.config.probeTimeoutMs);
  return page.ok ? ok(page.value.url) : page;
}

async function titleContains(ctx: WorkerContext, url: string, keyword: string): Promise<Result<true, FetchError>> {
  const page = await ctx.http.getPage(url, ctx.config.probeTimeoutMs);
  if (!page.ok) {
    return page;
  }
  const title = HtmlDocument.parse(page.value.html, page.value.url).title() ?? "";
  if (!title.includes(keyword)) {
    return err(new FetchError("definitive", url, `title "${title}" lacks "${keyword}"`));
  }
  return ok(true);
}

/** Root (scheme://host) of the final URL a candidate lands on, or the reason it was rejected. */
export async function verifyCandidate(
  ctx: WorkerContext,
  url: string,
  options: VerifyOptions = {},
): Promise<Result<string, FetchError>> {
  ctx.metrics.incrementCounter("candidates_probed", 1);
  const landed = await retryResult(ctx.config.retry.probe, () => probeOnce(ctx, url), {
    isRetryable: (error) => error.kind === "transient",
    sleep: ctx.sleep,
    random: ctx.random,
    shouldStop: () => isAborted(ctx),
  });
  if (!landed.ok) {
    return landed;
  }

  const root = normalizeRoot(landed.value);
  if (!root) {
    return err(new FetchError("definitive", url, `unusable final URL ${landed.value}`));
  }

  if (options.requireTitleKeyword) {
    const titled = await titleContains(ctx, root, options.requireTitleKeyword);
    if (!titled.ok) {
      return titled;
    }
  }
  return ok(root);
}

/** First candidate, in order, that verifies; undefined once all are exhausted. */
export async function findFirstLive(
  ctx: WorkerContext,
  urls: string[],
  options: VerifyOptions = {},
): Promise<string | undefined> {
  for (const url of urls) {
    if (isAborted(ctx)) {
      return undefined;
    }
    const verified = await verifyCandidate(ctx, url, options);
    if (verified.ok) {
      ctx.logger.debug("candidate_live", { url, root: verified.value });
      return verified.value;
    }
    ctx.logger.debug("candidate_rejected", { url, error: verified.error.message });
  }
  return undefined;
}
