import { describe, expect, it } from "vitest";
import { createRegion } from "../regions";
import { FakeWeb } from "../testing/fakeWeb";
import { createTestContext } from "../testing/testContext";
import { SearchForm } from "./htmlParser";
import { buildReportFilter } from "./matcher";
import { buildSearchUrl, searchSite } from "./siteSearch";

const ROOT = "https://www.ganzhou.gov.cn";
const KEYWORD = "%E5%86%B3%E7%AE%97";
const filter = buildReportFilter(createRegion("赣州市"), 2024);

describe("buildSearchUrl", () => {
  it("replaces the action's query with the form fields and the keyword", () => {
    const form: SearchForm = {
      action: `${ROOT}/jsearch/search.do?old=1#top`,
      method: "get",
      inputName: "q",
      fields: [
        ["siteid", "12"],
        ["q", "请输入"],
        ["scope", "title"],
      ],
    };
    expect(buildSearchUrl(form, "决算")).toBe(`${ROOT}/jsearch/search.do?siteid=12&q=${KEYWORD}&scope=title`);
  });

  it("appends the keyword when the form lists no field for it", () => {
    const form: SearchForm = { action: `${ROOT}/so`, method: "get", inputName: "wd", fields: [] };
    expect(buildSearchUrl(form, "决算")).toBe(`${ROOT}/so?wd=${KEYWORD}`);
  });
});

describe("searchSite", () => {
  it("submits the root page's GET form and collects matching results", async () => {
    const resultsUrl = `${ROOT}/jsearch/search.do?siteid=12&q=${KEYWORD}`;
    const web = new FakeWeb()
      .page(
        ROOT,
        `<form action="/jsearch/search.do"><input type="hidden" name="siteid" value="12"><input name="q"></form>`,
      )
      .page(
        resultsUrl,
        `<ul>
          <li><a href="/art/2025/6/1/art_9.html">2024年赣州市本级决算公开</a></li>
          <li><a href="/art/2025/6/1/art_8.html">2024年赣州市财政局部门决算</a></li>
        </ul>`,
      );
    const ctx = createTestContext(web);

    expect(await searchSite(ctx, ROOT, filter)).toEqual([
      {
        url: `${ROOT}/art/2025/6/1/art_9.html`,
        title: "2024年赣州市本级决算公开",
        sourceUrl: resultsUrl,
        fromPublicSection: false,
      },
    ]);
    expect(ctx.metrics.getCounter("site_searches")).toBe(1);
  });

  it("looks for a form on the usual search pages when the root has none", async () => {
    const resultsUrl = `${ROOT}/search?keyword=${KEYWORD}`;
    const web = new FakeWeb()
      .page(ROOT, `<p>首页</p>`)
      .page(`${ROOT}/search`, `<form><input type="search" name="keyword"></form>`)
      .page(resultsUrl, `<ul><li><a href="/art/1.html">2024年本市决算草案</a></li></ul>`);
    const ctx = createTestContext(web);

    const reports = await searchSite(ctx, ROOT, filter);
    expect(reports.map((report) => report.url)).toEqual([`${ROOT}/art/1.html`]);
    expect(web.callsTo(`${ROOT}/search.html`)).toBe(0);
  });

  it("does not submit a POST form", async () => {
    const web = new FakeWeb().page(
      ROOT,
      `<form action="/jsearch/search.do" method="post"><input type="text" name="q"></form>`,
    );
    const ctx = createTestContext(web);

    expect(await searchSite(ctx, ROOT, filter)).toEqual([]);
    expect(web.calls.map((call) => call.url)).toEqual([
      ROOT,
      `${ROOT}/search`,
      `${ROOT}/search.html`,
      `${ROOT}/so`,
      `${ROOT}/s`,
    ]);
    expect(ctx.metrics.getCounter("site_searches")).toBe(0);
  });
});
