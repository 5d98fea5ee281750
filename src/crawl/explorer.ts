import { WorkerContext, isAborted } from "../core/context";
import { fileExtensionOf, isSameHost } from "../core/url";
import { ReportLink } from "../types";
import { anchorLabel, HtmlDocument } from "./htmlParser";
import { matchesReport, ReportFilter } from "./matcher";

export interface ExploreOptions {
  maxPages?: number;
  maxDepth?: number;
}

interface QueueEntry {
  url: string;
  depth: number;
}

/**
 * Breadth-first walk from the seeds, used when no section produced a report. File links
 * are tested wherever they point; only same-host pages are enqueued.
 */
export async function exploreBreadthFirst(
  ctx: WorkerContext,
  seeds: string[],
  filter: ReportFilter,
  options: ExploreOptions = {},
): Promise<ReportLink[]> {
  const maxPages = options.maxPages ?? ctx.config.exploreMaxPages;
  const maxDepth = options.maxDepth ?? ctx.config.exploreMaxDepth;
  const extensions = ctx.config.targetFileExtensions;

  const queue: QueueEntry[] = [];
  const enqueued = new Set<string>();
  for (const seed of seeds) {
    if (!enqueued.has(seed)) {
      enqueued.add(seed);
      queue.push({ url: seed, depth: 0 });
    }
  }

  const reports: ReportLink[] = [];
  const reported = new Set<string>();
  let pagesFetched = 0;

  while (queue.length > 0 && pagesFetched < maxPages) {
    if (isAborted(ctx)) {
      break;
    }
    const entry = queue.shift();
    if (!entry) {
      break;
    }

    if (pagesFetched > 0) {
      await ctx.sleep(ctx.config.requestDelayMs);
    }
    pagesFetched += 1;
    const page = await ctx.http.getPage(entry.url, ctx.config.requestTimeoutMs);
    if (!page.ok) {
      ctx.logger.debug("explore_fetch_failed", { pageUrl: entry.url, error: page.error.message });
      continue;
    }
    ctx.metrics.incrementCounter("pages_crawled", 1);

    const doc = HtmlDocument.parse(page.value.html, entry.url);
    for (const anchor of doc.anchors()) {
      const title = anchorLabel(anchor);
      const isFile = fileExtensionOf(anchor.url, extensions) !== undefined;
      const sameHost = isSameHost(anchor.url, entry.url);

      if ((isFile || sameHost) && !reported.has(anchor.url)) {
        if (matchesReport(`${title} ${anchor.blockText}`, filter)) {
          reported.add(anchor.url);
          reports.push({ url: anchor.url, title, sourceUrl: entry.url, fromPublicSection: false });
        }
      }

      if (!isFile && sameHost && entry.depth < maxDepth && !enqueued.has(anchor.url)) {
        enqueued.add(anchor.url);
        queue.push({ url: anchor.url, depth: entry.depth + 1 });
      }
    }
  }

  ctx.logger.info("explore_finished", { pages: pagesFetched, reports: reports.length, queued: queue.length });
  return reports;
}
