import { lookup } from "node:dns/promises";
import type { Dispatcher, fetch } from "undici";
import { AppConfig } from "../config";
import { Logger, MetricsRegistry } from "../observability";
import { HttpSession } from "./fetch";
import { sleep } from "./retry";

/**
 * Everything one region worker needs, created when the worker starts and owned by it alone.
 * Nothing in here is shared with another worker; the HTTP session in particular carries its
 * own connection pool.
 */
export interface WorkerContext {
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  http: HttpSession;
  sleep: (ms: number) => Promise<void>;
  random: () => number;
  resolveHost: (hostname: string) => Promise<boolean>;
  signal?: AbortSignal;
}

export interface WorkerContextOptions {
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  signal?: AbortSignal;
  dispatcher?: Dispatcher;
  fetchFn?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  resolveHost?: (hostname: string) => Promise<boolean>;
}

export async function dnsResolves(hostname: string): Promise<boolean> {
  try {
    await lookup(hostname);
    return true;
  } catch {
    return false;
  }
}

export function createWorkerContext(options: WorkerContextOptions): WorkerContext {
  const { config } = options;
  return {
    config,
    logger: options.logger,
    metrics: options.metrics,
    http: new HttpSession({
      userAgent: config.userAgent,
      headers: config.requestHeaders,
      ignoreHttpsErrors: config.ignoreHttpsErrors,
      connectionsPerOrigin: config.connectionsPerOrigin,
      dispatcher: options.dispatcher,
      fetchFn: options.fetchFn,
    }),
    sleep: options.sleep ?? sleep,
    random: options.random ?? Math.random,
    resolveHost: options.resolveHost ?? dnsResolves,
    signal: options.signal,
  };
}

export function isAborted(ctx: WorkerContext): boolean {
  return ctx.signal?.aborted ?? false;
}
