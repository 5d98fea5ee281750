import path from "node:path";
import { WorkerContext, isAborted } from "../core/context";
import { describeError, DiscoveryError } from "../core/errors";
import { locateAttachments } from "../crawl/attachments";
import { buildReportFilter, FINAL_ACCOUNTS_TERM, ReportFilter } from "../crawl/matcher";
import { findReports } from "../crawl/reportFinder";
import { buildArtifactPath, downloadFile, uniquePath, writeProvenance } from "../download";
import { resolveSiteMapping, SearchResultCache } from "../resolve";
import { Sink } from "../sink";
import { MappingStore } from "../store";
import { Attachment, CrawlResult, DownloadRecord, Region, ReportLink } from "../types";

export interface PipelineDeps {
  store: MappingStore;
  sink: Sink;
  searchCache?: SearchResultCache;
}

function attachmentTitle(report: ReportLink, attachment: Attachment): string {
  if (attachment.url === report.url) {
    return report.title;
  }
  if (attachment.title.includes(FINAL_ACCOUNTS_TERM)) {
    return attachment.title;
  }
  return `${report.title}_${attachment.title}`;
}

async function downloadReports(
  ctx: WorkerContext,
  region: Region,
  reports: ReportLink[],
  filter: ReportFilter,
  result: CrawlResult,
): Promise<DownloadRecord[]> {
  const records: DownloadRecord[] = [];
  const takenPaths = new Set<string>();
  const seenFiles = new Set<string>();

  for (const report of reports) {
    if (isAborted(ctx)) {
      break;
    }
    const attachments = await locateAttachments(ctx, report.url, filter, {
      downloadAll: report.fromPublicSection,
      reportTitle: report.title,
    });
    if (attachments.length === 0) {
      ctx.logger.debug("report_without_attachments", { region: region.name, url: report.url });
    }

    for (const attachment of attachments) {
      if (isAborted(ctx)) {
        break;
      }
      if (seenFiles.has(attachment.url)) {
        continue;
      }
      seenFiles.add(attachment.url);

      const destination = uniquePath(
        buildArtifactPath(ctx.config.outputDirs.downloads, {
          region,
          year: ctx.config.targetYear,
          title: attachmentTitle(report, attachment),
          extension: attachment.extension,
        }),
        takenPaths,
      );
      const record = await downloadFile(ctx, attachment.url, destination, attachment.sourcePageUrl);
      records.push(record);

      if (record.status === "failed") {
        result.errors.push(`download failed: ${path.basename(destination)} (${record.error ?? "unknown error"})`);
        continue;
      }
      result.filesDownloaded += 1;
      if (record.status === "downloaded") {
        await writeProvenance(destination, {
          url: record.url,
          sourcePageUrl: record.sourcePageUrl,
          downloadedAt: record.finishedAt,
          bytes: record.bytes,
          sha256: record.sha256,
          contentType: record.contentType,
        });
        await ctx.sleep(ctx.config.requestDelayMs);
      }
    }
  }
  return records;
}

/**
 * One region from name to files: resolve its sites, find report pages, download their
 * attachments. A stage that comes up empty ends the region with a diagnostic; nothing here
 * stops other regions.
 */
export async function crawlRegion(ctx: WorkerContext, region: Region, deps: PipelineDeps): Promise<CrawlResult> {
  const result: CrawlResult = {
    region: region.name,
    success: false,
    reportsFound: 0,
    filesDownloaded: 0,
    errors: [],
  };
  const finish = (): CrawlResult => {
    if (!result.success && result.errors.length === 0) {
      result.errors.push(isAborted(ctx) ? "interrupted" : "no files downloaded");
    }
    result.finishedAt = new Date().toISOString();
    return result;
  };

  ctx.logger.info("region_start", { region: region.name });

  const resolution = await resolveSiteMapping(ctx, region, deps);
  if (!resolution.ok) {
    result.errors.push(`website not found: ${resolution.error.message}`, ...resolution.error.details);
    ctx.logger.warn("region_website_not_found", { region: region.name, reason: resolution.error.reason });
    return finish();
  }
  const { mapping } = resolution.value;
  result.website = mapping.gov ?? mapping.fin;
  const roots = [mapping.gov, mapping.fin].filter((root): root is string => Boolean(root));
  ctx.logger.info("region_website_resolved", {
    region: region.name,
    gov: mapping.gov,
    fin: mapping.fin,
    fromStore: resolution.value.fromStore,
  });

  const filter = buildReportFilter(region, ctx.config.targetYear);
  const search = await findReports(ctx, roots, region, filter);
  result.reportsFound = search.reports.length;
  if (search.reports.length === 0) {
    const error = new DiscoveryError(
      isAborted(ctx) ? "interrupted while searching for reports" : `no ${ctx.config.targetYear} final accounts reports found`,
    );
    result.errors.push(error.message);
    ctx.logger.warn("region_reports_not_found", {
      region: region.name,
      code: error.code,
      sections: search.sections.length,
      usedSiteSearch: search.usedSiteSearch,
      usedExplorer: search.usedExplorer,
    });
    return finish();
  }
  await deps.sink.publishReports(region.name, search.reports);
  ctx.logger.info("region_reports_found", {
    region: region.name,
    reports: search.reports.length,
    usedSiteSearch: search.usedSiteSearch,
    usedExplorer: search.usedExplorer,
  });

  const records = await downloadReports(ctx, region, search.reports, filter, result);
  await deps.sink.publishDownloads(region.name, records);

  result.success = result.filesDownloaded > 0;
  if (!result.success) {
    result.errors.push(isAborted(ctx) ? "interrupted before any file was downloaded" : "no files downloaded");
  }
  ctx.logger.info("region_done", {
    region: region.name,
    success: result.success,
    filesDownloaded: result.filesDownloaded,
    errors: result.errors.length,
  });
  return finish();
}

/** Unexpected exceptions from a pipeline become a failed result rather than ending the run. */
export function failedResult(region: Region, error: unknown): CrawlResult {
  return {
    region: region.name,
    success: false,
    reportsFound: 0,
    filesDownloaded: 0,
    errors: [`crawl failed: ${describeError(error)}`],
    finishedAt: new Date().toISOString(),
  };
}
