import { describe, expect, it } from "vitest";
import { createRegion } from "../regions";
import { FakeWeb } from "../testing/fakeWeb";
import { createTestContext } from "../testing/testContext";
import { locateAttachments } from "./attachments";
import { buildReportFilter } from "./matcher";

const ROOT = "https://www.ganzhou.gov.cn";
const REPORT = `${ROOT}/art/1.html`;
const filter = buildReportFilter(createRegion("赣州市"), 2024);

function reportSite(): FakeWeb {
  return new FakeWeb()
    .page(
      REPORT,
      `<ul>
        <li><a href="/files/js2024.pdf">2024年赣州市本级决算</a></li>
        <li><a href="/files/other.doc">附表说明</a></li>
        <li><a href="/news/n.html">新闻</a></li>
      </ul>
      <iframe src="/files/viewer.pdf"></iframe>
      <iframe src="/frames/list.html"></iframe>`,
    )
    .page(`${ROOT}/frames/list.html`, `<ul><li><a href="/files/js2024-b.xls">2024年本级决算表</a></li></ul>`);
}

describe("locateAttachments", () => {
  it("takes every file on a page from a public section", async () => {
    const ctx = createTestContext(reportSite());
    const attachments = await locateAttachments(ctx, REPORT, filter, { downloadAll: true, reportTitle: "决算公开" });

    expect(attachments).toEqual([
      { url: `${ROOT}/files/js2024.pdf`, title: "2024年赣州市本级决算", extension: ".pdf", sourcePageUrl: REPORT },
      { url: `${ROOT}/files/other.doc`, title: "附表说明", extension: ".doc", sourcePageUrl: REPORT },
      { url: `${ROOT}/files/viewer.pdf`, title: "决算公开", extension: ".pdf", sourcePageUrl: REPORT },
      {
        url: `${ROOT}/files/js2024-b.xls`,
        title: "2024年本级决算表",
        extension: ".xls",
        sourcePageUrl: `${ROOT}/frames/list.html`,
      },
    ]);
    expect(ctx.metrics.getCounter("attachments_found")).toBe(4);
  });

  it("filters file links by the report predicate otherwise", async () => {
    const ctx = createTestContext(reportSite());
    const attachments = await locateAttachments(ctx, REPORT, filter, { downloadAll: false });

    expect(attachments.map((attachment) => attachment.url)).toEqual([
      `${ROOT}/files/js2024.pdf`,
      `${ROOT}/files/js2024-b.xls`,
    ]);
  });

  it("keeps an embedded file whose title satisfies the report predicate", async () => {
    const ctx = createTestContext(reportSite());
    const attachments = await locateAttachments(ctx, REPORT, filter, {
      downloadAll: false,
      reportTitle: "2024年赣州市本级决算公开",
    });

    expect(attachments.map((attachment) => attachment.url)).toEqual([
      `${ROOT}/files/js2024.pdf`,
      `${ROOT}/files/viewer.pdf`,
      `${ROOT}/files/js2024-b.xls`,
    ]);
    expect(attachments[1]).toEqual({
      url: `${ROOT}/files/viewer.pdf`,
      title: "2024年赣州市本级决算公开",
      extension: ".pdf",
      sourcePageUrl: REPORT,
    });
  });

  it("drops an embedded file named for another kind of report", async () => {
    const web = new FakeWeb().page(REPORT, `<iframe src="/files/2023部门预算.pdf"></iframe>`);
    const ctx = createTestContext(web);

    expect(await locateAttachments(ctx, REPORT, filter, { downloadAll: false })).toEqual([]);
  });

  it("returns a file URL as its own attachment without fetching", async () => {
    const web = new FakeWeb();
    const ctx = createTestContext(web);
    const attachments = await locateAttachments(ctx, `${ROOT}/files/a.PDF`, filter, {
      downloadAll: false,
      reportTitle: "2024年决算",
    });

    expect(attachments).toEqual([
      { url: `${ROOT}/files/a.PDF`, title: "2024年决算", extension: ".pdf", sourcePageUrl: `${ROOT}/files/a.PDF` },
    ]);
    expect(web.calls).toHaveLength(0);
  });

  it("returns nothing when the page cannot be fetched", async () => {
    const ctx = createTestContext(new FakeWeb());
    expect(await locateAttachments(ctx, REPORT, filter, { downloadAll: true })).toEqual([]);
  });
});
