export type CrawlErrorCode = "resolution" | "discovery" | "fetch" | "integrity" | "store";

export abstract class CrawlError extends Error {
  abstract readonly code: CrawlErrorCode;
}

export type ResolutionReason = "no_transliteration" | "not_found" | "previously_unresolved";

export class ResolutionError extends CrawlError {
  readonly code = "resolution";
  readonly reason: ResolutionReason;
  readonly details: string[];

  constructor(reason: ResolutionReason, message: string, details: string[] = []) {
    super(message);
    this.name = "ResolutionError";
    this.reason = reason;
    this.details = details;
  }
}

export class DiscoveryError extends CrawlError {
  readonly code = "discovery";

  constructor(message: string) {
    super(message);
    this.name = "DiscoveryError";
  }
}

/**
 * Transient failures (timeouts, resets, 5xx, 429) are worth retrying; definitive ones
 * (404 and other client errors, unusable content) only abort the current link.
 */
export class FetchError extends CrawlError {
  readonly code = "fetch";
  readonly kind: "transient" | "definitive";
  readonly url: string;
  readonly status?: number;

  constructor(kind: "transient" | "definitive", url: string, message: string, status?: number) {
    super(message);
    this.name = "FetchError";
    this.kind = kind;
    this.url = url;
    this.status = status;
  }

  static fromStatus(url: string, status: number): FetchError {
    const transient = status === 408 || status === 429 || status >= 500;
    return new FetchError(transient ? "transient" : "definitive", url, `HTTP ${status}`, status);
  }

  static fromCause(url: string, cause: unknown): FetchError {
    return new FetchError("transient", url, describeError(cause));
  }
}

export class IntegrityError extends CrawlError {
  readonly code = "integrity";
  readonly url: string;

  constructor(url: string, message: string) {
    super(message);
    this.name = "IntegrityError";
    this.url = url;
  }
}

export class StoreError extends CrawlError {
  readonly code = "store";
  readonly location: string;

  constructor(location: string, message: string) {
    super(message);
    this.name = "StoreError";
    this.location = location;
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    const cause = error.cause instanceof Error ? `: ${error.cause.message}` : "";
    if (error.name === "AbortError") {
      return "request timed out";
    }
    return `${error.message}${cause}`;
  }
  return String(error);
}
