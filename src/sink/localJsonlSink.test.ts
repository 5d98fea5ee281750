import fs from "node:fs";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { makeTempDir, testConfig } from "../testing/testContext";
import { createSink } from "./index";
import { LocalJsonlSink } from "./localJsonlSink";
import { NoopSink } from "./noopSink";

describe("LocalJsonlSink", () => {
  it("appends one stamped line per report", async () => {
    const dir = makeTempDir();
    const sink = new LocalJsonlSink(testConfig({}, dir), "run-1");
    const report = {
      url: "https://www.example.gov.cn/art/1.html",
      title: "2024年本级决算",
      sourceUrl: "https://www.example.gov.cn/zfxxgk/",
      fromPublicSection: true,
    };

    await sink.publishReports("赣州市", [report]);
    await sink.publishReports("吉安市", []);
    await sink.publishReports("吉安市", [report]);

    const lines = fs.readFileSync(path.join(dir, "manifests", "reports.jsonl"), "utf-8").trimEnd().split("\n");
    expect(lines.map((line) => JSON.parse(line))).toEqual([
      { runId: "run-1", region: "赣州市", ...report },
      { runId: "run-1", region: "吉安市", ...report },
    ]);
  });
});

describe("createSink", () => {
  it("returns a no-op sink when manifests are disabled", () => {
    expect(createSink(testConfig({ sinkType: "none" }), "run-1")).toBeInstanceOf(NoopSink);
  });
});
