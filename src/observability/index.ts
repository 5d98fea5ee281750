export * from "./logger";
export * from "./metrics";
export * from "./runId";
export type { LogFields, LogLevel, MetricCounterName, MetricTimerName } from "./types";
