import { describe, expect, it, vi } from "vitest";
import { Logger } from "./logger";
import { MetricsRegistry } from "./metrics";

describe("MetricsRegistry", () => {
  it("counts and summarizes timers", () => {
    const now = vi.spyOn(Date, "now");
    const metrics = new MetricsRegistry();
    for (const duration of [30, 10, 20, 40]) {
      now.mockReturnValueOnce(1_000).mockReturnValueOnce(1_000 + duration);
      metrics.startTimer("download_ms")();
    }
    now.mockRestore();
    metrics.incrementCounter("downloads_ok", 2);
    metrics.incrementCounter("downloads_ok");

    const snapshot = metrics.snapshot();
    expect(snapshot.counters.downloads_ok).toBe(3);
    expect(snapshot.counters.regions_failed).toBe(0);
    expect(snapshot.timers.download_ms).toEqual({ count: 4, min: 10, max: 40, avg: 25, p50: 20, p95: 40 });
    expect(snapshot.timers.region_ms.count).toBe(0);
  });
});

describe("Logger", () => {
  it("writes one JSON line with bound fields and drops lines below the minimum level", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const logger = new Logger({ component: "runner", runId: "run-1", minLevel: "info" })
      .child("worker-0")
      .withFields({ region: "赣州市" });

    logger.debug("hidden");
    logger.info("region_start", { attempt: 1 });

    expect(log).toHaveBeenCalledTimes(1);
    const line: unknown = JSON.parse(String(log.mock.calls[0][0]));
    expect(line).toMatchObject({ level: "info", msg: "region_start", component: "worker-0", runId: "run-1", region: "赣州市", attempt: 1 });
    log.mockRestore();
  });
});
