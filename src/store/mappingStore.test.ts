import fs from "node:fs";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { makeTempDir } from "../testing/testContext";
import { InMemoryMappingStore } from "./memoryMappingStore";
import { JsonMappingStore } from "./jsonMappingStore";
import { mergeSiteMapping } from "./merge";
import { SqliteMappingStore } from "./sqliteMappingStore";
import { MappingStore } from "./types";

describe("mergeSiteMapping", () => {
  it("never downgrades a known root to empty", () => {
    expect(mergeSiteMapping({ gov: "https://gov.example.gov.cn" }, { gov: "", fin: "https://fin.example.gov.cn" })).toEqual({
      gov: "https://gov.example.gov.cn",
      fin: "https://fin.example.gov.cn",
    });
  });

  it("replaces a field with a non-empty incoming value, normalized to its root", () => {
    expect(mergeSiteMapping({ gov: "https://old.example.gov.cn" }, { gov: "https://new.example.gov.cn/index.html" })).toEqual({
      gov: "https://new.example.gov.cn",
    });
  });
});

const stores: Array<[string, () => MappingStore]> = [
  ["in-memory", () => new InMemoryMappingStore()],
  ["json", () => new JsonMappingStore(path.join(makeTempDir(), "site-mappings.json"))],
  ["sqlite", () => new SqliteMappingStore(":memory:")],
];

describe.each(stores)("%s mapping store", (_name, createStore) => {
  it("keeps both fields across complementary puts", async () => {
    const store = createStore();
    await store.put("赣州市", { gov: "https://www.ganzhou.gov.cn", fin: "" });
    const merged = await store.put("赣州市", { gov: "", fin: "https://czj.ganzhou.gov.cn" });

    expect(merged).toEqual({ gov: "https://www.ganzhou.gov.cn", fin: "https://czj.ganzhou.gov.cn" });
    expect(await store.get("赣州市")).toEqual(merged);
    await store.close();
  });

  it("tells unattempted regions apart from attempted ones", async () => {
    const store = createStore();
    await store.put("某市", {});

    expect(await store.get("某市")).toEqual({});
    expect(await store.get("别市")).toBeUndefined();
    await store.close();
  });
});

describe("JsonMappingStore", () => {
  it("writes the persisted layout with empty strings and reloads it", async () => {
    const file = path.join(makeTempDir(), "site-mappings.json");
    const store = new JsonMappingStore(file);
    await store.put("赣州市", { gov: "https://www.ganzhou.gov.cn" });
    await store.close();

    expect(JSON.parse(fs.readFileSync(file, "utf-8"))).toEqual({
      赣州市: { gov: "https://www.ganzhou.gov.cn", fin: "" },
    });
    expect(await new JsonMappingStore(file).get("赣州市")).toEqual({ gov: "https://www.ganzhou.gov.cn" });
  });

  it("keeps every put when writes overlap", async () => {
    const file = path.join(makeTempDir(), "site-mappings.json");
    const store = new JsonMappingStore(file);
    await Promise.all([
      store.put("甲市", { gov: "https://a.example.gov.cn" }),
      store.put("乙市", { fin: "https://b.example.gov.cn" }),
      store.put("甲市", { fin: "https://c.example.gov.cn" }),
    ]);

    expect(JSON.parse(fs.readFileSync(file, "utf-8"))).toEqual({
      乙市: { gov: "", fin: "https://b.example.gov.cn" },
      甲市: { gov: "https://a.example.gov.cn", fin: "https://c.example.gov.cn" },
    });
  });

  it("refuses a file that is not an object", () => {
    const file = path.join(makeTempDir(), "site-mappings.json");
    fs.writeFileSync(file, "[]");
    expect(() => new JsonMappingStore(file)).toThrow(/not a JSON object/);
  });
});
