import { load, type CheerioAPI } from "cheerio";
import { resolveHref, tryParseUrl } from "../core/url";

export interface AnchorInfo {
  href: string;
  url: string;
  text: string;
  titleAttr?: string;
  className: string;
  id: string;
  blockText: string;
}

export interface SearchForm {
  /** Resolved submission URL; the page itself when the form names none. */
  action: string;
  method: string;
  /** Field the keyword goes into. */
  inputName: string;
  /** Named fields with their default values, in document order. */
  fields: Array<[string, string]>;
}

const SEARCH_FIELD_NAME = /(q|keyword|search|word|query|key|wd|text|input)/i;
const SEARCH_FIELD_HINTS = ["搜索", "查询", "search", "query", "word"] as const;
const SKIPPED_INPUT_TYPES = new Set(["submit", "button", "image", "reset", "file"]);

function cleanText(value: string | undefined): string {
  return (value ?? "").replace(/\s+/g, " ").trim();
}

/**
 * Read-only view over an arbitrary HTML page. Every attribute access is optional; anchors
 * without a navigational href are skipped rather than assumed.
 */
export class HtmlDocument {
  private readonly $: CheerioAPI;
  readonly pageUrl: string;

  private constructor($: CheerioAPI, pageUrl: string) {
    this.$ = $;
    this.pageUrl = pageUrl;
  }

  static parse(html: string, pageUrl: string): HtmlDocument {
    return new HtmlDocument(load(html), pageUrl);
  }

  title(): string | undefined {
    const title = cleanText(this.$("title").first().text());
    return title.length > 0 ? title : undefined;
  }

  anchors(): AnchorInfo[] {
    const $ = this.$;
    const anchors: AnchorInfo[] = [];
    $("a[href]").each((_, element) => {
      const node = $(element);
      const href = node.attr("href");
      if (!href) {
        return;
      }
      const url = resolveHref(href, this.pageUrl);
      if (!url) {
        return;
      }

      const text = cleanText(node.text());
      const parentText = cleanText(node.parent().text());
      const titleAttr = cleanText(node.attr("title"));
      anchors.push({
        href: href.trim(),
        url,
        text,
        titleAttr: titleAttr.length > 0 ? titleAttr : undefined,
        className: node.attr("class") ?? "",
        id: node.attr("id") ?? "",
        blockText: parentText.length > text.length ? parentText : text,
      });
    });
    return anchors;
  }

  /**
   * Forms that carry a keyword field: a text or search input named like one, failing that
   * one whose placeholder, name or id mentions searching.
   */
  searchForms(): SearchForm[] {
    const $ = this.$;
    const forms: SearchForm[] = [];
    $("form").each((_, formElement) => {
      const form = $(formElement);
      const textInputs = form
        .find("input, textarea")
        .toArray()
        .map((element) => $(element))
        .filter((input) => {
          const type = (input.attr("type") ?? "text").toLowerCase();
          return input.is("textarea") || type === "text" || type === "search";
        });

      const byName = textInputs.find((input) => SEARCH_FIELD_NAME.test(input.attr("name") ?? ""));
      const byHint = textInputs.find((input) => {
        const hint = `${input.attr("placeholder") ?? ""} ${input.attr("name") ?? ""} ${input.attr("id") ?? ""}`;
        return SEARCH_FIELD_HINTS.some((token) => hint.toLowerCase().includes(token));
      });
      const keywordInput = byName ?? byHint;
      if (!keywordInput) {
        return;
      }

      const fields: Array<[string, string]> = [];
      form.find("input[name], select[name], textarea[name]").each((_, element) => {
        const field = $(element);
        const name = field.attr("name");
        if (!name) {
          return;
        }
        if (field.is("select")) {
          const selected = field.find("option[selected]").first();
          const option = selected.length > 0 ? selected : field.find("option").first();
          fields.push([name, option.attr("value") ?? cleanText(option.text())]);
          return;
        }
        if (field.is("textarea")) {
          fields.push([name, field.text().trim()]);
          return;
        }
        const type = (field.attr("type") ?? "text").toLowerCase();
        if (SKIPPED_INPUT_TYPES.has(type)) {
          return;
        }
        if ((type === "checkbox" || type === "radio") && field.attr("checked") === undefined) {
          return;
        }
        fields.push([name, field.attr("value") ?? ""]);
      });

      const actionAttr = form.attr("action")?.trim();
      forms.push({
        action: (actionAttr ? resolveHref(actionAttr, this.pageUrl) : undefined) ?? this.pageUrl,
        method: (form.attr("method") ?? "get").trim().toLowerCase(),
        inputName: keywordInput.attr("name") ?? keywordInput.attr("id") ?? "q",
        fields,
      });
    });
    return forms;
  }

  /** Resolved sources of iframe, frame and embed elements. */
  frameSources(): string[] {
    const $ = this.$;
    const sources: string[] = [];
    $("iframe[src], frame[src], embed[src]").each((_, element) => {
      const src = $(element).attr("src");
      const url = src ? resolveHref(src, this.pageUrl) : undefined;
      if (url && !sources.includes(url)) {
        sources.push(url);
      }
    });
    return sources;
  }
}

/** Visible label for a link: its text, its title attribute, or the last URL segment. */
export function anchorLabel(anchor: AnchorInfo): string {
  if (anchor.text) {
    return anchor.text;
  }
  if (anchor.titleAttr) {
    return anchor.titleAttr;
  }
  const segment = anchor.href.split(/[?#]/)[0].split("/").filter((part) => part.length > 0).pop();
  return segment ?? anchor.url;
}

const NEXT_TEXT_TOKENS = /(下一页|下页|后页|next|more)/i;
const NEXT_ATTR_TOKENS = /(next|page-next)/i;
const PAGE_PARAM_NAMES = ["pageNum", "page", "p", "pn", "currentPage", "pageIndex"] as const;

/** Page number carried by a listing URL (`?page=3`, `page_3`, `index_3.html`), if any. */
export function currentPageNumber(pageUrl: string): number | undefined {
  const queryMatch = pageUrl.match(/[?&]page[=_]?(\d+)/i);
  if (queryMatch) {
    return Number.parseInt(queryMatch[1], 10);
  }
  const suffixMatch = pageUrl.split(/[?#]/)[0].match(/_(\d+)\.s?html?$/i);
  return suffixMatch ? Number.parseInt(suffixMatch[1], 10) : undefined;
}

function byText(anchors: AnchorInfo[], pageUrl: string): string | undefined {
  return anchors.find((anchor) => NEXT_TEXT_TOKENS.test(anchor.text) && anchor.url !== pageUrl)?.url;
}

function byClass(anchors: AnchorInfo[], pageUrl: string): string | undefined {
  return anchors.find((anchor) => NEXT_ATTR_TOKENS.test(anchor.className) && anchor.url !== pageUrl)?.url;
}

function byId(anchors: AnchorInfo[], pageUrl: string): string | undefined {
  return anchors.find((anchor) => NEXT_ATTR_TOKENS.test(anchor.id) && anchor.url !== pageUrl)?.url;
}

function byPageNumber(anchors: AnchorInfo[], pageUrl: string): string | undefined {
  const current = currentPageNumber(pageUrl);
  if (current === undefined) {
    return undefined;
  }

  let best: { page: number; url: string } | undefined;
  for (const anchor of anchors) {
    if (!/^\d+$/.test(anchor.text) || anchor.url === pageUrl) {
      continue;
    }
    const page = Number.parseInt(anchor.text, 10);
    if (page > current && (!best || page < best.page)) {
      best = { page, url: anchor.url };
    }
  }
  return best?.url;
}

function byQueryIncrement(pageUrl: string): string | undefined {
  const parsed = tryParseUrl(pageUrl);
  if (!parsed) {
    return undefined;
  }
  for (const name of PAGE_PARAM_NAMES) {
    const value = parsed.searchParams.get(name);
    if (value === null || !/^\d+$/.test(value)) {
      continue;
    }
    parsed.searchParams.set(name, String(Number.parseInt(value, 10) + 1));
    return parsed.toString();
  }
  return undefined;
}

/**
 * Next listing page, trying in order: link text, link class, link id, a numbered link
 * above the current page, then incrementing a known page parameter.
 */
export function findNextPageUrl(doc: HtmlDocument, pageUrl: string): string | undefined {
  const anchors = doc.anchors();
  const candidates = [
    () => byText(anchors, pageUrl),
    () => byClass(anchors, pageUrl),
    () => byId(anchors, pageUrl),
    () => byPageNumber(anchors, pageUrl),
    () => byQueryIncrement(pageUrl),
  ];
  for (const candidate of candidates) {
    const next = candidate();
    if (next && next !== pageUrl) {
      return next;
    }
  }
  return undefined;
}
