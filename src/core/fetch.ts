import { Agent, fetch, type Dispatcher, type Response } from "undici";
import { TextDecoder } from "node:util";
import { CrawlError, FetchError } from "./errors";
import { err, ok, Result } from "./result";

export interface HttpSessionOptions {
  userAgent: string;
  headers?: Record<string, string>;
  ignoreHttpsErrors?: boolean;
  connectionsPerOrigin?: number;
  dispatcher?: Dispatcher;
  fetchFn?: typeof fetch;
}

export interface HttpHead {
  url: string;
  status: number;
}

export interface HttpPage {
  url: string;
  status: number;
  contentType: string;
  html: string;
}

export interface HttpStreamMeta {
  url: string;
  status: number;
  contentType: string;
  contentLength?: number;
}

export type StreamBody = NonNullable<Response["body"]>;

const HTML_ACCEPT = "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8";

/**
 * One session per worker. It owns a keep-alive connection pool (an undici Agent) unless a
 * dispatcher is injected, and never throws for network failures: every call resolves to a
 * Result carrying either the response or a FetchError.
 */
export class HttpSession {
  private readonly dispatcher: Dispatcher;
  private readonly ownsDispatcher: boolean;
  private readonly fetchFn: typeof fetch;
  private readonly headers: Record<string, string>;

  constructor(options: HttpSessionOptions) {
    this.fetchFn = options.fetchFn ?? fetch;
    this.headers = { ...(options.headers ?? {}), "user-agent": options.userAgent };
    if (options.dispatcher) {
      this.dispatcher = options.dispatcher;
      this.ownsDispatcher = false;
    } else {
      this.dispatcher = new Agent({
        connections: options.connectionsPerOrigin ?? 4,
        keepAliveTimeout: 10_000,
        connect: {
          rejectUnauthorized: !options.ignoreHttpsErrors,
        },
      });
      this.ownsDispatcher = true;
    }
  }

  async head(url: string, timeoutMs: number): Promise<Result<HttpHead, FetchError>> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);
    try {
      const response = await this.fetchFn(url, {
        method: "HEAD",
        headers: this.headers,
        redirect: "follow",
        dispatcher: this.dispatcher,
        signal: controller.signal,
      });
      if (!response.ok) {
        return err(FetchError.fromStatus(url, response.status));
      }
      return ok({ url: response.url || url, status: response.status });
    } catch (error) {
      return err(FetchError.fromCause(url, error));
    } finally {
      clearTimeout(timeout);
    }
  }

  async getPage(url: string, timeoutMs: number): Promise<Result<HttpPage, FetchError>> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);
    try {
      const response = await this.fetchFn(url, {
        method: "GET",
        headers: { accept: HTML_ACCEPT, ...this.headers },
        redirect: "follow",
        dispatcher: this.dispatcher,
        signal: controller.signal,
      });
      if (!response.ok) {
        await response.body?.cancel();
        return err(FetchError.fromStatus(url, response.status));
      }

      const contentType = response.headers.get("content-type") ?? "";
      const buffer = Buffer.from(await response.arrayBuffer());
      return ok({
        url: response.url || url,
        status: response.status,
        contentType,
        html: decodeHtml(buffer, contentType),
      });
    } catch (error) {
      return err(FetchError.fromCause(url, error));
    } finally {
      clearTimeout(timeout);
    }
  }

  /**
   * Opens a GET and hands the body to `consume` while the timeout is still armed. Transport
   * failures during consumption become a transient FetchError; CrawlErrors raised by
   * `consume` itself are rethrown for the caller to classify.
   */
  async stream<T>(
    url: string,
    timeoutMs: number,
    accept: string,
    consume: (body: StreamBody, meta: HttpStreamMeta) => Promise<T>,
  ): Promise<Result<T, FetchError>> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);
    try {
      const response = await this.fetchFn(url, {
        method: "GET",
        headers: { ...this.headers, accept },
        redirect: "follow",
        dispatcher: this.dispatcher,
        signal: controller.signal,
      });
      if (!response.ok) {
        await response.body?.cancel();
        return err(FetchError.fromStatus(url, response.status));
      }
      if (!response.body) {
        return err(new FetchError("transient", url, "empty response body", response.status));
      }

      const declaredLength = Number.parseInt(response.headers.get("content-length") ?? "", 10);
      const meta: HttpStreamMeta = {
        url: response.url || url,
        status: response.status,
        contentType: response.headers.get("content-type") ?? "",
        contentLength: Number.isFinite(declaredLength) ? declaredLength : undefined,
      };
      return ok(await consume(response.body, meta));
    } catch (error) {
      if (error instanceof CrawlError) {
        throw error;
      }
      return err(FetchError.fromCause(url, error));
    } finally {
      clearTimeout(timeout);
    }
  }

  async close(): Promise<void> {
    if (this.ownsDispatcher) {
      await this.dispatcher.close();
    }
  }
}

const CHARSET_HEADER = /charset\s*=\s*["']?([\w-]+)/i;
const CHARSET_META = /<meta[^>]+charset\s*=\s*["']?([\w-]+)/i;

function pickDecoder(label: string | undefined): TextDecoder | undefined {
  if (!label) {
    return undefined;
  }
  try {
    return new TextDecoder(label.toLowerCase());
  } catch {
    return undefined;
  }
}

/** Decodes by the header charset, then a `<meta>` charset in the first 2 KB, else UTF-8. */
export function decodeHtml(buffer: Buffer, contentType: string): string {
  const fromHeader = pickDecoder(contentType.match(CHARSET_HEADER)?.[1]);
  if (fromHeader) {
    return fromHeader.decode(buffer);
  }

  const head = buffer.subarray(0, 2048).toString("latin1");
  const fromMeta = pickDecoder(head.match(CHARSET_META)?.[1]);
  return (fromMeta ?? new TextDecoder("utf-8")).decode(buffer);
}
