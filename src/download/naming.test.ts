import fs from "node:fs";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { createRegion } from "../regions";
import { makeTempDir } from "../testing/testContext";
import { buildArtifactPath, provenancePath, sanitizeTitle, uniquePath, writeProvenance } from "./naming";

const ganzhou = createRegion("赣州市");

describe("sanitizeTitle", () => {
  it("replaces characters that are not allowed in file names", () => {
    expect(sanitizeTitle('a/b:c*d?  e ')).toBe("a_b_c_d_ e");
  });

  it("truncates long titles", () => {
    expect(sanitizeTitle("决".repeat(200))).toHaveLength(120);
  });
});

describe("buildArtifactPath", () => {
  it("prefixes year and region once", () => {
    const filePath = buildArtifactPath("/downloads", {
      region: ganzhou,
      year: 2024,
      title: "2024年赣州市本级决算",
      extension: ".PDF",
    });
    expect(filePath).toBe(path.join("/downloads", "赣州市", "2024赣州市本级决算.pdf"));
  });

  it("strips the short region name too", () => {
    const filePath = buildArtifactPath("/downloads", { region: ganzhou, year: 2024, title: "赣州本级决算", extension: ".xls" });
    expect(path.basename(filePath)).toBe("2024赣州市本级决算.xls");
  });

  it("falls back to a generic title", () => {
    const filePath = buildArtifactPath("/downloads", { region: ganzhou, year: 2024, title: "2024年度", extension: ".pdf" });
    expect(path.basename(filePath)).toBe("2024赣州市report.pdf");
  });
});

describe("uniquePath", () => {
  it("numbers later collisions", () => {
    const taken = new Set<string>();
    expect(uniquePath("/d/x.pdf", taken)).toBe("/d/x.pdf");
    expect(uniquePath("/d/x.pdf", taken)).toBe("/d/x_2.pdf");
    expect(uniquePath("/d/x.pdf", taken)).toBe("/d/x_3.pdf");
  });
});

describe("writeProvenance", () => {
  it("writes a sidecar next to the file", async () => {
    const dir = makeTempDir();
    const filePath = path.join(dir, "a.pdf");
    await writeProvenance(filePath, {
      url: "https://www.example.gov.cn/a.pdf",
      sourcePageUrl: "https://www.example.gov.cn/art/1.html",
      downloadedAt: "2025-06-01T00:00:00.000Z",
      bytes: 3,
    });

    expect(JSON.parse(fs.readFileSync(provenancePath(filePath), "utf-8"))).toEqual({
      url: "https://www.example.gov.cn/a.pdf",
      sourcePageUrl: "https://www.example.gov.cn/art/1.html",
      downloadedAt: "2025-06-01T00:00:00.000Z",
      bytes: 3,
    });
  });
});
