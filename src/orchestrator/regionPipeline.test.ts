import fs from "node:fs";
import path from "node:path";
import { beforeEach, describe, expect, it } from "vitest";
import { createRegion } from "../regions";
import { Sink } from "../sink";
import { InMemoryMappingStore } from "../store";
import { FakeWeb } from "../testing/fakeWeb";
import { createTestContext, makeTempDir, testConfig } from "../testing/testContext";
import { DownloadRecord, ReportLink } from "../types";
import { crawlRegion, failedResult } from "./regionPipeline";

const ROOT = "https://www.ganzhou.gov.cn";

class RecordingSink implements Sink {
  readonly reports: Array<{ region: string; reports: ReportLink[] }> = [];
  readonly downloads: Array<{ region: string; records: DownloadRecord[] }> = [];

  async publishReports(region: string, reports: ReportLink[]): Promise<void> {
    this.reports.push({ region, reports });
  }

  async publishDownloads(region: string, records: DownloadRecord[]): Promise<void> {
    this.downloads.push({ region, records });
  }
}

let dir: string;

beforeEach(() => {
  dir = makeTempDir();
});

describe("crawlRegion", () => {
  it("goes from a stored website to a downloaded file", async () => {
    const web = new FakeWeb()
      .page(ROOT, `<ul><li><a href="/zfxxgk/">政府信息公开</a></li></ul>`)
      .page(`${ROOT}/zfxxgk/`, `<ul><li><a href="/art/2025/6/1/art_1.html">2024年赣州市本级决算</a></li></ul>`)
      .page(`${ROOT}/art/2025/6/1/art_1.html`, `<ul><li><a href="/files/js2024.pdf">2024年赣州市本级决算</a></li></ul>`)
      .on(`${ROOT}/files/js2024.pdf`, { body: "PDFDATA", headers: { "content-type": "application/pdf" } });
    const ctx = createTestContext(web, testConfig({}, dir));
    const sink = new RecordingSink();
    const store = new InMemoryMappingStore({ 赣州市: { gov: ROOT } });

    const result = await crawlRegion(ctx, createRegion("赣州市"), { store, sink });

    expect(result).toMatchObject({
      region: "赣州市",
      success: true,
      website: ROOT,
      reportsFound: 1,
      filesDownloaded: 1,
      errors: [],
    });
    const filePath = path.join(dir, "downloads", "赣州市", "2024赣州市本级决算.pdf");
    expect(fs.readFileSync(filePath, "utf-8")).toBe("PDFDATA");
    expect(fs.existsSync(`${filePath}.source.json`)).toBe(true);
    expect(sink.reports).toHaveLength(1);
    expect(sink.reports[0].reports[0].fromPublicSection).toBe(true);
    expect(sink.downloads[0].records.map((record) => record.status)).toEqual(["downloaded"]);
  });

  it("ends with a diagnostic when no website is known", async () => {
    const web = new FakeWeb();
    const ctx = createTestContext(web, testConfig({}, dir));
    const store = new InMemoryMappingStore({ 吉安市: {} });

    const result = await crawlRegion(ctx, createRegion("吉安市"), { store, sink: new RecordingSink() });
    expect(result.success).toBe(false);
    expect(result.errors).toEqual(["website not found: no website found in an earlier run"]);
    expect(web.calls).toHaveLength(0);
  });

  it("reports when no listing mentions the year's final accounts", async () => {
    const web = new FakeWeb().page(ROOT, `<ul><li><a href="/news/">新闻动态</a></li></ul>`);
    const ctx = createTestContext(web, testConfig({}, dir));
    const sink = new RecordingSink();
    const store = new InMemoryMappingStore({ 赣州市: { gov: ROOT } });

    const result = await crawlRegion(ctx, createRegion("赣州市"), { store, sink });
    expect(result.success).toBe(false);
    expect(result.errors).toEqual(["no 2024 final accounts reports found"]);
    expect(sink.reports).toHaveLength(0);
  });
});

describe("failedResult", () => {
  it("turns an exception into a failed region", () => {
    expect(failedResult(createRegion("赣州市"), new Error("boom"))).toMatchObject({
      region: "赣州市",
      success: false,
      errors: ["crawl failed: boom"],
    });
  });
});
