import { WorkerContext, isAborted } from "../core/context";
import { resolveHref, tryParseUrl } from "../core/url";
import { ReportLink } from "../types";
import { HtmlDocument, SearchForm } from "./htmlParser";
import { ReportFilter } from "./matcher";
import { extractPaginated } from "./paginator";

/** GET submission of `form`: its default fields with the keyword filled in, replacing the action's query. */
export function buildSearchUrl(form: SearchForm, keyword: string): string | undefined {
  const url = tryParseUrl(form.action);
  if (!url) {
    return undefined;
  }
  url.search = "";
  url.hash = "";
  let keywordSet = false;
  for (const [name, value] of form.fields) {
    if (name === form.inputName) {
      if (!keywordSet) {
        url.searchParams.append(name, keyword);
        keywordSet = true;
      }
      continue;
    }
    url.searchParams.append(name, value);
  }
  if (!keywordSet) {
    url.searchParams.append(form.inputName, keyword);
  }
  return url.toString();
}

async function findSearchForm(ctx: WorkerContext, rootUrl: string): Promise<SearchForm | undefined> {
  const pages = [rootUrl];
  for (const searchPath of ctx.config.siteSearchPaths) {
    const url = resolveHref(searchPath, `${rootUrl}/`);
    if (url) {
      pages.push(url);
    }
  }

  for (const pageUrl of pages) {
    if (isAborted(ctx)) {
      break;
    }
    const page = await ctx.http.getPage(pageUrl, ctx.config.requestTimeoutMs);
    if (!page.ok) {
      ctx.logger.debug("search_page_fetch_failed", { pageUrl, error: page.error.message });
      continue;
    }
    const forms = HtmlDocument.parse(page.value.html, page.value.url).searchForms();
    const usable = forms.find((form) => form.method === "get");
    if (usable) {
      return usable;
    }
    if (forms.length > 0) {
      ctx.logger.debug("search_form_not_get", { pageUrl, method: forms[0].method });
    }
  }
  return undefined;
}

/**
 * Submits a site's own search form with the final-accounts term and walks the results as
 * a paginated listing. Only GET forms are used; a site whose search needs POST yields nothing.
 */
export async function searchSite(ctx: WorkerContext, rootUrl: string, filter: ReportFilter): Promise<ReportLink[]> {
  const form = await findSearchForm(ctx, rootUrl);
  if (!form) {
    ctx.logger.info("site_search_form_not_found", { root: rootUrl });
    return [];
  }
  const resultsUrl = buildSearchUrl(form, filter.term);
  if (!resultsUrl) {
    return [];
  }

  ctx.metrics.incrementCounter("site_searches", 1);
  const outcome = await extractPaginated(ctx, resultsUrl, filter, { fromPublicSection: false });
  ctx.logger.info("site_search_finished", {
    root: rootUrl,
    url: resultsUrl,
    pages: outcome.pagesVisited,
    reports: outcome.reports.length,
  });
  return outcome.reports;
}
