import { WorkerContext, isAborted } from "../core/context";
import { resolveHref } from "../core/url";
import { ReportLink } from "../types";
import { anchorLabel, findNextPageUrl, HtmlDocument } from "./htmlParser";
import { matchesReport, ReportFilter } from "./matcher";

export interface PaginationOptions {
  fromPublicSection: boolean;
  maxPages?: number;
}

export interface PaginationOutcome {
  reports: ReportLink[];
  pagesVisited: number;
  stopReason: "last_page" | "fetch_failed" | "cycle" | "page_limit" | "aborted";
}

export function extractMatchingLinks(doc: HtmlDocument, filter: ReportFilter, fromPublicSection: boolean): ReportLink[] {
  const reports: ReportLink[] = [];
  const seen = new Set<string>();
  for (const anchor of doc.anchors()) {
    if (seen.has(anchor.url)) {
      continue;
    }
    seen.add(anchor.url);

    const title = anchorLabel(anchor);
    const combined = `${title} ${anchor.blockText}`;
    if (matchesReport(combined, filter)) {
      reports.push({ url: anchor.url, title, sourceUrl: doc.pageUrl, fromPublicSection });
    }
  }
  return reports;
}

/**
 * Walks a listing forward page by page. Stops on the last page (no next link), a failed
 * fetch, a next link already visited, or the page ceiling; whatever was collected is
 * returned in every case.
 */
export async function extractPaginated(
  ctx: WorkerContext,
  startUrl: string,
  filter: ReportFilter,
  options: PaginationOptions,
): Promise<PaginationOutcome> {
  const maxPages = options.maxPages ?? ctx.config.maxPaginationPages;
  const visited = new Set<string>();
  const reports: ReportLink[] = [];
  let current: string | undefined = resolveHref(startUrl, startUrl) ?? startUrl;
  let stopReason: PaginationOutcome["stopReason"] = "last_page";

  while (current) {
    if (visited.size >= maxPages) {
      stopReason = "page_limit";
      ctx.logger.warn("pagination_page_limit", { pageUrl: current, maxPages });
      break;
    }
    if (isAborted(ctx)) {
      stopReason = "aborted";
      break;
    }
    visited.add(current);

    const stopTimer = ctx.metrics.startTimer("page_fetch_ms");
    const page = await ctx.http.getPage(current, ctx.config.requestTimeoutMs);
    stopTimer();
    if (!page.ok) {
      ctx.logger.warn("pagination_fetch_failed", { pageUrl: current, error: page.error.message });
      stopReason = "fetch_failed";
      break;
    }
    ctx.metrics.incrementCounter("pages_crawled", 1);

    const doc = HtmlDocument.parse(page.value.html, current);
    const pageReports = extractMatchingLinks(doc, filter, options.fromPublicSection);
    reports.push(...pageReports);
    ctx.logger.debug("pagination_page_parsed", { pageUrl: current, page: visited.size, matches: pageReports.length });

    const next = findNextPageUrl(doc, current);
    if (!next) {
      break;
    }
    if (visited.has(next)) {
      ctx.logger.info("pagination_cycle_detected", { pageUrl: current, next });
      stopReason = "cycle";
      break;
    }
    current = next;
    await ctx.sleep(ctx.config.requestDelayMs);
  }

  return { reports, pagesVisited: visited.size, stopReason };
}
