import crypto from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { WorkerContext, isAborted } from "../core/context";
import { CrawlError, describeError, FetchError, IntegrityError } from "../core/errors";
import { StreamBody, HttpStreamMeta } from "../core/fetch";
import { err, ok, Result } from "../core/result";
import { retryResult } from "../core/retry";
import { fileExtensionOf } from "../core/url";
import { DownloadRecord } from "../types";

type DownloadError = FetchError | IntegrityError;

interface WrittenFile {
  bytes: number;
  sha256: string;
  contentType: string;
}

const FILE_ACCEPT = "application/pdf,application/msword,application/vnd.ms-excel,application/octet-stream,*/*;q=0.8";

function existingSize(filePath: string): number {
  try {
    return fs.statSync(filePath).size;
  } catch {
    return 0;
  }
}

async function writeBody(
  ctx: WorkerContext,
  url: string,
  destination: string,
  body: StreamBody,
  meta: HttpStreamMeta,
): Promise<WrittenFile> {
  const isHtml = meta.contentType.toLowerCase().includes("text/html");
  const extensions = ctx.config.targetFileExtensions;
  const namesFile = Boolean(fileExtensionOf(url, extensions) || fileExtensionOf(meta.url, extensions));
  if (isHtml && !namesFile) {
    await body.cancel();
    throw new FetchError("definitive", url, "response is an HTML page, not a file", meta.status);
  }

  const tempPath = `${destination}.part`;
  const hash = crypto.createHash("sha256");
  let bytes = 0;

  const readable = Readable.fromWeb(body);
  readable.on("data", (chunk: Buffer) => {
    hash.update(chunk);
    bytes += chunk.length;
  });

  try {
    await pipeline(readable, fs.createWriteStream(tempPath, { flags: "w" }));
    if (meta.contentLength !== undefined && meta.contentLength > 0 && bytes !== meta.contentLength) {
      throw new IntegrityError(url, `size mismatch: expected ${meta.contentLength} bytes, got ${bytes}`);
    }
    if (bytes === 0) {
      throw new IntegrityError(url, "downloaded file is empty");
    }
    await fs.promises.rename(tempPath, destination);
  } catch (error) {
    await fs.promises.rm(tempPath, { force: true });
    throw error;
  }

  return { bytes, sha256: hash.digest("hex"), contentType: meta.contentType };
}

async function downloadAttempt(
  ctx: WorkerContext,
  url: string,
  destination: string,
): Promise<Result<WrittenFile, DownloadError>> {
  try {
    return await ctx.http.stream(url, ctx.config.downloadTimeoutMs, FILE_ACCEPT, (body, meta) =>
      writeBody(ctx, url, destination, body, meta),
    );
  } catch (error) {
    if (error instanceof FetchError || error instanceof IntegrityError) {
      return err(error);
    }
    if (error instanceof CrawlError) {
      throw error;
    }
    return err(FetchError.fromCause(url, error));
  }
}

function isRetryable(error: DownloadError): boolean {
  return error instanceof IntegrityError || error.kind === "transient";
}

/**
 * Fetches one file to `destination`. An existing non-empty file is reported as skipped
 * without any request. Bytes go to `{destination}.part` and are renamed into place only
 * after the size checks pass.
 */
export async function downloadFile(
  ctx: WorkerContext,
  url: string,
  destination: string,
  sourcePageUrl: string,
): Promise<DownloadRecord> {
  const base = { url, sourcePageUrl, path: destination };

  const size = existingSize(destination);
  if (size > 0) {
    ctx.metrics.incrementCounter("downloads_skipped", 1);
    ctx.logger.info("download_skipped_existing", { url, path: destination, bytes: size });
    return { ...base, status: "skipped", bytes: size, attempts: 0, finishedAt: new Date().toISOString() };
  }

  await fs.promises.mkdir(path.dirname(destination), { recursive: true });
  let attempts = 0;
  const stopTimer = ctx.metrics.startTimer("download_ms");
  const outcome = await retryResult(
    ctx.config.retry.download,
    async (attempt) => {
      attempts = attempt;
      return downloadAttempt(ctx, url, destination);
    },
    {
      isRetryable,
      sleep: ctx.sleep,
      random: ctx.random,
      shouldStop: () => isAborted(ctx),
      onRetry: (error, attempt, delayMs) =>
        ctx.logger.warn("download_retry", { url, attempt, delayMs, error: error.message }),
    },
  );
  const durationMs = stopTimer();

  if (!outcome.ok) {
    ctx.metrics.incrementCounter("downloads_failed", 1);
    ctx.logger.warn("download_failed", { url, attempts, durationMs, error: outcome.error.message });
    return {
      ...base,
      status: "failed",
      attempts,
      error: describeError(outcome.error),
      finishedAt: new Date().toISOString(),
    };
  }

  ctx.metrics.incrementCounter("downloads_ok", 1);
  ctx.logger.info("download_ok", { url, path: destination, bytes: outcome.value.bytes, attempts, durationMs });
  return {
    ...base,
    status: "downloaded",
    bytes: outcome.value.bytes,
    sha256: outcome.value.sha256,
    contentType: outcome.value.contentType,
    attempts,
    finishedAt: new Date().toISOString(),
  };
}
