import { WorkerContext } from "../core/context";
import { fileExtensionOf, lastPathSegment } from "../core/url";
import { Attachment } from "../types";
import { anchorLabel, HtmlDocument } from "./htmlParser";
import { matchesReport, ReportFilter } from "./matcher";

export interface LocateOptions {
  /** When false, attachments must satisfy the report predicate on `title + href`. */
  downloadAll: boolean;
  /** Title used when the page itself is a file. */
  reportTitle?: string;
}

function collectFileAnchors(
  doc: HtmlDocument,
  pageUrl: string,
  extensions: readonly string[],
  accept: (text: string) => boolean,
  into: Map<string, Attachment>,
): void {
  for (const anchor of doc.anchors()) {
    const extension = fileExtensionOf(anchor.url, extensions);
    if (!extension || into.has(anchor.url)) {
      continue;
    }
    const title = anchorLabel(anchor);
    if (!accept(`${title} ${anchor.href}`)) {
      continue;
    }
    into.set(anchor.url, { url: anchor.url, title, extension, sourcePageUrl: pageUrl });
  }
}

/**
 * Downloadable files behind a report page: file anchors on the page, plus embedded frames
 * that are files themselves or that carry file anchors one level down. A report URL that
 * is already a file is returned as its own attachment without fetching.
 */
export async function locateAttachments(
  ctx: WorkerContext,
  pageUrl: string,
  filter: ReportFilter,
  options: LocateOptions,
): Promise<Attachment[]> {
  const extensions = ctx.config.targetFileExtensions;
  const direct = fileExtensionOf(pageUrl, extensions);
  if (direct) {
    return [
      {
        url: pageUrl,
        title: options.reportTitle ?? lastPathSegment(pageUrl),
        extension: direct,
        sourcePageUrl: pageUrl,
      },
    ];
  }

  const page = await ctx.http.getPage(pageUrl, ctx.config.requestTimeoutMs);
  if (!page.ok) {
    ctx.logger.warn("attachment_page_fetch_failed", { pageUrl, error: page.error.message });
    return [];
  }
  ctx.metrics.incrementCounter("pages_crawled", 1);

  const accept = (text: string): boolean => options.downloadAll || matchesReport(text, filter);
  const found = new Map<string, Attachment>();
  const doc = HtmlDocument.parse(page.value.html, pageUrl);
  collectFileAnchors(doc, pageUrl, extensions, accept, found);

  for (const frameUrl of doc.frameSources()) {
    const frameExtension = fileExtensionOf(frameUrl, extensions);
    if (frameExtension) {
      const title = options.reportTitle ?? lastPathSegment(frameUrl);
      if (!found.has(frameUrl) && accept(`${title} ${frameUrl}`)) {
        found.set(frameUrl, { url: frameUrl, title, extension: frameExtension, sourcePageUrl: pageUrl });
      }
      continue;
    }

    const framePage = await ctx.http.getPage(frameUrl, ctx.config.requestTimeoutMs);
    if (!framePage.ok) {
      ctx.logger.debug("frame_fetch_failed", { pageUrl, url: frameUrl, error: framePage.error.message });
      continue;
    }
    collectFileAnchors(HtmlDocument.parse(framePage.value.html, frameUrl), frameUrl, extensions, accept, found);
  }

  const attachments = [...found.values()];
  ctx.metrics.incrementCounter("attachments_found", attachments.length);
  ctx.logger.debug("attachments_located", { pageUrl, attachments: attachments.length });
  return attachments;
}
