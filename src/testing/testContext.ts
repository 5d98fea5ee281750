import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { AppConfig, DEFAULT_CONFIG } from "../config";
import { createWorkerContext, WorkerContext } from "../core/context";
import { Logger, MetricsRegistry } from "../observability";
import { FakeWeb } from "./fakeWeb";

export function makeTempDir(prefix = "fiscal-crawler-"): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

/** Defaults with every wait and retry cut down, and output under `baseDir` when given. */
export function testConfig(overrides: Partial<AppConfig> = {}, baseDir?: string): AppConfig {
  const outputDirs = baseDir
    ? {
        data: baseDir,
        downloads: path.join(baseDir, "downloads"),
        manifests: path.join(baseDir, "manifests"),
      }
    : DEFAULT_CONFIG.outputDirs;
  return {
    ...DEFAULT_CONFIG,
    requestDelayMs: 0,
    searchDelayMs: { minMs: 0, maxMs: 0 },
    probeCommonSectionPaths: false,
    searchEngines: ["baidu"],
    mappingStore: { driver: "json", path: path.join(baseDir ?? os.tmpdir(), "site-mappings.json") },
    outputDirs,
    ...overrides,
  };
}

export function testLogger(): Logger {
  return new Logger({ component: "test", runId: "test-run", minLevel: "error" });
}

export interface TestContextOptions {
  signal?: AbortSignal;
  resolveHost?: (hostname: string) => Promise<boolean>;
}

export function createTestContext(web: FakeWeb, config: AppConfig = testConfig(), options: TestContextOptions = {}): WorkerContext {
  return createWorkerContext({
    config,
    logger: testLogger(),
    metrics: new MetricsRegistry(),
    fetchFn: web.fetch,
    sleep: async () => {},
    random: () => 0,
    resolveHost: options.resolveHost ?? (async () => true),
    signal: options.signal,
  });
}
