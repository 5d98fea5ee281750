import { WorkerContext, isAborted } from "../core/context";
import { isSameHost, resolveHref } from "../core/url";
import { probeOnce } from "../resolve/verifier";
import { Region, SectionLink } from "../types";
import { anchorLabel, HtmlDocument } from "./htmlParser";

export const DISCLOSURE_KEYWORDS = [
  "信息公开",
  "政务公开",
  "政府信息公开",
  "财政信息",
  "财政公开",
  "预决算",
  "预算决算",
  "财政资金",
  "zfxxgk",
  "zwgk",
  "xxgk",
  "czxx",
  "czgk",
  "zdlyxxgk",
] as const;

function isDisclosureLink(text: string, href: string): boolean {
  const haystack = `${text} ${href}`.toLowerCase();
  return DISCLOSURE_KEYWORDS.some((keyword) => haystack.includes(keyword));
}

async function scanForSections(
  ctx: WorkerContext,
  pageUrl: string,
  rootUrl: string,
  depth: number,
): Promise<SectionLink[]> {
  const page = await ctx.http.getPage(pageUrl, ctx.config.requestTimeoutMs);
  if (!page.ok) {
    ctx.logger.debug("section_page_fetch_failed", { pageUrl, error: page.error.message });
    return [];
  }
  ctx.metrics.incrementCounter("pages_crawled", 1);

  const doc = HtmlDocument.parse(page.value.html, page.value.url);
  const found: SectionLink[] = [];
  for (const anchor of doc.anchors()) {
    if (!isSameHost(anchor.url, rootUrl)) {
      continue;
    }
    const text = anchorLabel(anchor);
    if (isDisclosureLink(text, anchor.href)) {
      found.push({ url: anchor.url, anchorText: text, depth, fromPublicSection: true });
    }
  }
  return found;
}

async function probeCommonPaths(ctx: WorkerContext, rootUrl: string): Promise<SectionLink[]> {
  const found: SectionLink[] = [];
  for (const sectionPath of ctx.config.commonSectionPaths) {
    if (isAborted(ctx)) {
      break;
    }
    const url = resolveHref(sectionPath, `${rootUrl}/`);
    if (!url) {
      continue;
    }
    const landed = await probeOnce(ctx, url);
    if (landed.ok && isSameHost(landed.value, rootUrl)) {
      found.push({ url: landed.value, anchorText: sectionPath, depth: 1, fromPublicSection: false });
    }
  }
  return found;
}

/**
 * Section start URLs for a root: keyword-matched disclosure links on the root page, one
 * more hop from the first `sectionHopLimit` of them, optional well-known paths, and the root
 * itself last so the next stage always has a start.
 */
export async function discoverSections(
  ctx: WorkerContext,
  rootUrl: string,
  region: Region,
): Promise<SectionLink[]> {
  const sections: SectionLink[] = [];
  const seen = new Set<string>();
  const add = (link: SectionLink): void => {
    if (!seen.has(link.url)) {
      seen.add(link.url);
      sections.push(link);
    }
  };

  const firstHop = await scanForSections(ctx, rootUrl, rootUrl, 1);
  firstHop.forEach(add);

  for (const section of firstHop.slice(0, ctx.config.sectionHopLimit)) {
    if (isAborted(ctx)) {
      break;
    }
    await ctx.sleep(ctx.config.requestDelayMs);
    const nested = await scanForSections(ctx, section.url, rootUrl, 2);
    nested.forEach(add);
  }

  if (ctx.config.probeCommonSectionPaths) {
    (await probeCommonPaths(ctx, rootUrl)).forEach(add);
  }

  const rootKey = resolveHref(rootUrl, rootUrl) ?? rootUrl;
  add({ url: rootKey, anchorText: "", depth: 0, fromPublicSection: false });

  ctx.metrics.incrementCounter("sections_discovered", sections.length);
  ctx.logger.info("sections_discovered", {
    region: region.name,
    url: rootUrl,
    sections: sections.length,
    publicSections: sections.filter((section) => section.fromPublicSection).length,
  });
  return sections;
}
