import { describe, expect, it } from "vitest";
import { createRegion } from "../regions";
import { FakeWeb } from "../testing/fakeWeb";
import { createTestContext, testConfig } from "../testing/testContext";
import { discoverSections } from "./sections";

const ROOT = "https://www.ganzhou.gov.cn";
const region = createRegion("赣州市");

describe("discoverSections", () => {
  it("follows disclosure links one hop further and ends with the root", async () => {
    const web = new FakeWeb()
      .page(
        ROOT,
        `<ul>
          <li><a href="/zfxxgk/">政府信息公开</a></li>
          <li><a href="/czyjs/">财政预决算</a></li>
          <li><a href="https://www.other.gov.cn/zfxxgk/">外站公开</a></li>
          <li><a href="/news/">新闻动态</a></li>
        </ul>`,
      )
      .page(`${ROOT}/zfxxgk/`, `<ul><li><a href="/zfxxgk/fdzdgknr/czxx/">财政信息</a></li></ul>`)
      .page(`${ROOT}/czyjs/`, `<ul><li><a href="/zfxxgk/">政府信息公开</a></li></ul>`);
    const ctx = createTestContext(web);

    const sections = await discoverSections(ctx, ROOT, region);
    expect(sections.map((section) => [section.url, section.depth, section.fromPublicSection])).toEqual([
      [`${ROOT}/zfxxgk/`, 1, true],
      [`${ROOT}/czyjs/`, 1, true],
      [`${ROOT}/zfxxgk/fdzdgknr/czxx/`, 2, true],
      [`${ROOT}/`, 0, false],
    ]);
    expect(ctx.metrics.getCounter("sections_discovered")).toBe(4);
  });

  it("still returns the root when the root page cannot be fetched", async () => {
    const ctx = createTestContext(new FakeWeb());
    const sections = await discoverSections(ctx, ROOT, region);
    expect(sections).toEqual([{ url: `${ROOT}/`, anchorText: "", depth: 0, fromPublicSection: false }]);
  });

  it("adds well-known paths that answer a request", async () => {
    const web = new FakeWeb().page(ROOT, "<p>首页</p>").on(`${ROOT}/czgk/`, { status: 200 }, "HEAD");
    const config = testConfig({ probeCommonSectionPaths: true, commonSectionPaths: ["/zfxxgk/", "/czgk/"] });
    const ctx = createTestContext(web, config);

    const sections = await discoverSections(ctx, ROOT, region);
    expect(sections).toEqual([
      { url: `${ROOT}/czgk/`, anchorText: "/czgk/", depth: 1, fromPublicSection: false },
      { url: `${ROOT}/`, anchorText: "", depth: 0, fromPublicSection: false },
    ]);
    expect(web.callsTo(`${ROOT}/zfxxgk/`, "HEAD")).toBe(1);
  });

  it("falls back to GET for a well-known path whose server refuses HEAD", async () => {
    const web = new FakeWeb()
      .page(ROOT, "<p>首页</p>")
      .on(`${ROOT}/czgk/`, { status: 405 }, "HEAD")
      .on(`${ROOT}/czgk/`, { body: "<p>财政公开</p>", headers: { "content-type": "text/html; charset=utf-8" } });
    const config = testConfig({ probeCommonSectionPaths: true, commonSectionPaths: ["/czgk/"] });
    const ctx = createTestContext(web, config);

    const sections = await discoverSections(ctx, ROOT, region);
    expect(sections).toEqual([
      { url: `${ROOT}/czgk/`, anchorText: "/czgk/", depth: 1, fromPublicSection: false },
      { url: `${ROOT}/`, anchorText: "", depth: 0, fromPublicSection: false },
    ]);
    expect(web.callsTo(`${ROOT}/czgk/`, "GET")).toBe(1);
  });
});
