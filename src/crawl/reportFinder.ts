import { WorkerContext, isAborted } from "../core/context";
import { Region, ReportLink, SectionLink } from "../types";
import { exploreBreadthFirst } from "./explorer";
import { ReportFilter } from "./matcher";
import { extractPaginated } from "./paginator";
import { discoverSections } from "./sections";
import { searchSite } from "./siteSearch";

export interface ReportSearch {
  reports: ReportLink[];
  sections: SectionLink[];
  usedSiteSearch: boolean;
  usedExplorer: boolean;
}

/**
 * Sections of every root are walked as paginated listings; reports are deduplicated by URL
 * across sections and roots. When that finds nothing each root's own search form is tried,
 * and the breadth explorer runs only when the search found nothing either.
 */
export async function findReports(
  ctx: WorkerContext,
  roots: string[],
  region: Region,
  filter: ReportFilter,
): Promise<ReportSearch> {
  const reports: ReportLink[] = [];
  const seenReports = new Set<string>();
  const sections: SectionLink[] = [];
  const collect = (found: ReportLink[]): void => {
    for (const report of found) {
      if (!seenReports.has(report.url)) {
        seenReports.add(report.url);
        reports.push(report);
      }
    }
  };

  for (const root of roots) {
    if (isAborted(ctx)) {
      break;
    }
    const rootSections = await discoverSections(ctx, root, region);
    sections.push(...rootSections);

    for (const section of rootSections) {
      if (isAborted(ctx)) {
        break;
      }
      const outcome = await extractPaginated(ctx, section.url, filter, {
        fromPublicSection: section.fromPublicSection,
      });
      collect(outcome.reports);
    }
  }

  let usedSiteSearch = false;
  if (reports.length === 0 && ctx.config.siteSearch && !isAborted(ctx)) {
    usedSiteSearch = true;
    ctx.logger.info("site_search_fallback_started", { region: region.name, roots: roots.length });
    for (const root of roots) {
      if (isAborted(ctx)) {
        break;
      }
      collect(await searchSite(ctx, root, filter));
    }
  }

  let usedExplorer = false;
  if (reports.length === 0 && sections.length > 0 && !isAborted(ctx)) {
    usedExplorer = true;
    ctx.logger.info("explore_fallback_started", { region: region.name, seeds: sections.length });
    const explored = await exploreBreadthFirst(
      ctx,
      sections.map((section) => section.url),
      filter,
    );
    collect(explored);
  }

  ctx.metrics.incrementCounter("reports_found", reports.length);
  return { reports, sections, usedSiteSearch, usedExplorer };
}
