import { mkdir, open, rename, stat, type FileHandle } from "fs/promises";
import { join } from "path";
import { nodeFetch } from "./adapters/node-fetch-http.js";
import {
  downloadHttpError,
  downloadInterrupted,
  downloadTransportFailure,
  ioError,
  rangeNotSatisfiable,
} from "./errors/catalog.js";
import { describeCause } from "./errors/types.js";
import {
  filenameFromUrl,
  parseContentDisposition,
  parseContentLength,
  parseContentRange,
} from "./headers.js";
import { createNoopLogger, type Logger } from "./logger.js";
import type { FetchFn, HttpHeaders, HttpResponse } from "./ports/http.js";
import type { ProgressReporter } from "./ports/progress.js";
import { SilentProgress } from "./progress.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Appended to the final path while a transfer is in progress */
export const PARTIAL_SUFFIX = ".part";

export interface DownloadRequest {
  /** Session token sent as the USER_TOKEN cookie; omitted for anonymous downloads */
  token?: string;
  sourceUrl: string;
  destinationDir: string;
  /** Used verbatim when given; otherwise resolved from the server response */
  filename?: string;
}

export interface DownloadDeps {
  fetchImpl?: FetchFn;
  progress?: ProgressReporter;
  logger?: Logger;
}

export interface TransferState {
  sourceUrl: string;
  filename: string;
  finalPath: string;
  temporaryPath: string;
  resumeOffset: number;
  /** 0 when the server didn't tell us */
  totalSize: number;
}

export interface DownloadResult {
  filename: string;
  path: string;
  bytesWritten: number;
  resumedFrom: number;
  totalSize: number;
}

export type TransferPlan =
  | { action: "write"; truncate: boolean; resumeOffset: number; totalSize: number }
  | { action: "complete"; resumeOffset: number; totalSize: number };

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function partialPathFor(finalPath: string): string {
  return `${finalPath}${PARTIAL_SUFFIX}`;
}

export function requestHeaders(token: string | undefined, offset: number): Record<string, string> {
  const headers: Record<string, string> = {};
  if (token) {
    headers.Cookie = `USER_TOKEN=${token}`;
  }
  if (offset > 0) {
    headers.Range = `bytes=${offset}-`;
  }
  return headers;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

async function* emptyBody(): AsyncGenerator<Uint8Array> {}

async function send(fetchImpl: FetchFn, url: string, headers: Record<string, string>): Promise<HttpResponse> {
  try {
    return await fetchImpl(url, { method: "GET", headers });
  } catch (err) {
    throw downloadTransportFailure(url, err);
  }
}

async function ensureDirectory(dir: string): Promise<void> {
  try {
    await mkdir(dir, { recursive: true });
  } catch (err) {
    throw ioError("create directory", dir, err);
  }
}

async function partialSize(path: string): Promise<number> {
  try {
    return (await stat(path)).size;
  } catch (err) {
    if (isErrnoException(err) && err.code === "ENOENT") {
      return 0;
    }
    throw ioError("inspect", path, err);
  }
}

/**
 * Work out where writing starts and how large the file will be,
 * from the status and headers of the transfer response.
 */
export function planTransfer(
  status: number,
  statusText: string,
  headers: HttpHeaders,
  existing: number,
  state: Pick<TransferState, "sourceUrl" | "temporaryPath">
): TransferPlan {
  const range = parseContentRange(headers.get("content-range"));

  if (status === 416 && existing > 0) {
    if (range?.total === existing) {
      return { action: "complete", resumeOffset: existing, totalSize: existing };
    }
    throw rangeNotSatisfiable(state.temporaryPath, existing, range?.total);
  }

  if (status < 200 || status > 299) {
    throw downloadHttpError(state.sourceUrl, status, statusText);
  }

  const length = parseContentLength(headers.get("content-length"));

  if (status === 206) {
    const start = range?.start ?? existing;
    if (start !== existing) {
      throw rangeNotSatisfiable(state.temporaryPath, existing, range?.total);
    }
    const total = range?.total ?? (length === undefined ? 0 : existing + length);
    return {
      action: "write",
      truncate: false,
      resumeOffset: existing,
      totalSize: total < existing ? 0 : total,
    };
  }

  // Full body: either a fresh download or the server ignored Range
  return {
    action: "write",
    truncate: existing > 0,
    resumeOffset: 0,
    totalSize: length ?? 0,
  };
}

/**
 * Append the body to the temporary file chunk by chunk, in arrival order.
 * Returns the number of bytes written.
 */
async function streamToFile(
  response: HttpResponse,
  state: TransferState,
  truncate: boolean,
  progress: ProgressReporter
): Promise<number> {
  let handle: FileHandle;
  try {
    handle = await open(state.temporaryPath, truncate ? "w" : "a");
  } catch (err) {
    throw ioError("open", state.temporaryPath, err);
  }

  const iterator = (response.body ?? emptyBody())[Symbol.asyncIterator]();
  let written = 0;
  let done = false;

  try {
    while (!done) {
      let next: IteratorResult<Uint8Array>;
      try {
        next = await iterator.next();
      } catch (err) {
        done = true;
        throw downloadInterrupted(state.temporaryPath, state.resumeOffset + written, err);
      }

      if (next.done) {
        done = true;
        break;
      }

      const chunk = next.value;
      if (chunk.byteLength === 0) continue;

      try {
        await handle.appendFile(chunk);
      } catch (err) {
        throw ioError("write to", state.temporaryPath, err);
      }
      written += chunk.byteLength;
      progress.advance(chunk.byteLength);
    }
  } finally {
    try {
      if (!done) {
        await iterator.return?.();
      }
    } finally {
      await handle.close();
    }
  }

  return written;
}

/**
 * Pick the filename: explicit name, then Content-Disposition, then the URL path.
 * Returns the probe response when one was needed so it can be reused.
 */
async function resolveFilename(
  request: DownloadRequest,
  fetchImpl: FetchFn,
  log: Logger
): Promise<{ filename: string; probe?: HttpResponse }> {
  if (request.filename) {
    log.debug("Using specified filename", { filename: request.filename });
    return { filename: request.filename };
  }

  const probe = await send(fetchImpl, request.sourceUrl, requestHeaders(request.token, 0));
  if (!probe.ok) {
    await probe.discard();
    throw downloadHttpError(request.sourceUrl, probe.status, probe.statusText);
  }

  const fromHeader = parseContentDisposition(probe.headers.get("content-disposition"));
  if (fromHeader) {
    log.debug("Filename from Content-Disposition", { filename: fromHeader });
    return { filename: fromHeader, probe };
  }

  const fromUrl = filenameFromUrl(request.sourceUrl);
  log.info("Falling back to URL filename", { filename: fromUrl });
  return { filename: fromUrl, probe };
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Download `sourceUrl` into `destinationDir`, resuming from any `.part` file
 * left by an earlier run. The file only appears under its final name once
 * every byte has been written.
 *
 * Concurrent runs against the same destination are not coordinated.
 */
export async function download(
  request: DownloadRequest,
  deps: DownloadDeps = {}
): Promise<DownloadResult> {
  const {
    fetchImpl = nodeFetch,
    progress = new SilentProgress(),
    logger = createNoopLogger(),
  } = deps;
  const log = logger.child({ url: request.sourceUrl });

  await ensureDirectory(request.destinationDir);

  try {
    const { filename, probe } = await resolveFilename(request, fetchImpl, log);
    const finalPath = join(request.destinationDir, filename);
    const temporaryPath = partialPathFor(finalPath);
    const existing = await partialSize(temporaryPath);

    let response: HttpResponse;
    if (probe && existing === 0) {
      response = probe;
    } else {
      if (probe) await probe.discard();
      if (existing > 0) {
        log.info("Resuming download", { offset: existing, path: temporaryPath });
      }
      response = await send(fetchImpl, request.sourceUrl, requestHeaders(request.token, existing));
    }

    const state: TransferState = {
      sourceUrl: request.sourceUrl,
      filename,
      finalPath,
      temporaryPath,
      resumeOffset: existing,
      totalSize: 0,
    };

    let plan: TransferPlan;
    try {
      plan = planTransfer(response.status, response.statusText, response.headers, existing, state);
    } catch (err) {
      await response.discard();
      throw err;
    }

    if (existing > 0 && plan.resumeOffset === 0) {
      log.warn("Server ignored the Range request; restarting from the first byte", {
        status: response.status,
        discarded: existing,
      });
    }

    state.resumeOffset = plan.resumeOffset;
    state.totalSize = plan.totalSize;
    progress.start(filename, state.totalSize, state.resumeOffset);

    let bytesWritten = 0;
    if (plan.action === "write") {
      bytesWritten = await streamToFile(response, state, plan.truncate, progress);
    } else {
      log.info("Partial file already complete", { bytes: existing });
      await response.discard();
    }

    try {
      await rename(temporaryPath, finalPath);
    } catch (err) {
      throw ioError("rename", temporaryPath, err);
    }

    progress.finish(filename);
    log.debug("Download complete", { path: finalPath, bytesWritten });

    return {
      filename,
      path: finalPath,
      bytesWritten,
      resumedFrom: state.resumeOffset,
      totalSize: state.totalSize,
    };
  } catch (err) {
    progress.fail(describeCause(err));
    throw err;
  }
}
