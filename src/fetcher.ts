// CHANGE: Stream the resolved binary into the deterministic output path.
// WHY: The artifact is written chunk by chunk and never held whole in memory.
// SOURCE: internal reasoning

import path from "node:path";
import { Transform } from "node:stream";
import { pipeline } from "node:stream/promises";
import fs from "fs-extra";
import sanitize from "sanitize-filename";
import { StageContext, headersFor, isSuccessStatus } from "./context.js";
import { StageResult, TransportError, fail, guardStage, succeed, toTransportError } from "./errors.js";
import { debug, info, warn } from "./logger.js";
import { MirrorConfig, RetrievalRequest, RetrievedArtifact } from "./types.js";

/**
 * File name of the artifact, e.g. `YouTube-19.45.38.apk`.
 */
export function artifactFileName(request: RetrievalRequest): string {
  return sanitize(`${request.app.displayName}-${request.version}.${request.app.format}`);
}

export function artifactPath(request: RetrievalRequest, config: MirrorConfig): string {
  return path.join(config.outputDir, artifactFileName(request));
}

/**
 * Re-slice an incoming byte stream into fixed-size chunks (the last one may be shorter).
 *
 * @param size - Chunk size in bytes.
 * @param onChunk - Receives the length of every emitted chunk.
 */
export function rechunk(size: number, onChunk: (length: number) => void = () => undefined) {
  return async function* (source: AsyncIterable<Buffer | string>): AsyncGenerator<Buffer> {
    let pending: Buffer = Buffer.alloc(0);
    for await (const piece of source) {
      pending = Buffer.concat([pending, typeof piece === "string" ? Buffer.from(piece) : piece]);
      while (pending.length >= size) {
        const chunk = pending.subarray(0, size);
        pending = pending.subarray(size);
        onChunk(chunk.length);
        yield chunk;
      }
    }
    if (pending.length > 0) {
      onChunk(pending.length);
      yield pending;
    }
  };
}

/**
 * Pass bytes through unchanged, failing the transfer when no chunk arrives for `idleMs`.
 * The clock restarts on every chunk, so a slow but steady download never trips it.
 */
export function stallGuard(idleMs: number, url: string): Transform {
  let timer: NodeJS.Timeout | undefined;
  const guard = new Transform({
    transform(chunk: Buffer, _encoding, callback) {
      arm();
      callback(null, chunk);
    },
    flush(callback) {
      clearTimeout(timer);
      callback();
    },
    destroy(cause, callback) {
      clearTimeout(timer);
      callback(cause);
    }
  });
  const arm = () => {
    clearTimeout(timer);
    timer = setTimeout(() => {
      guard.destroy(new TransportError(`Stalled for ${idleMs}ms fetching ${url}`, "download", url));
    }, idleMs);
  };
  arm();
  return guard;
}

/**
 * Download the binary at `binaryUrl` into the output directory.
 *
 * The status is checked before the file is created, so a rejected request leaves nothing behind.
 * A transfer that fails midway leaves its partial file in place. The download timeout is an
 * idle limit between chunks, not a deadline for the whole transfer.
 *
 * @param request - Application and version naming the file.
 * @param binaryUrl - Final URL from the redirect chain.
 * @param context - Stage collaborators.
 */
export async function downloadArtifact(
  request: RetrievalRequest,
  binaryUrl: string,
  context: StageContext
): Promise<StageResult<RetrievedArtifact>> {
  return guardStage(async () => {
    const response = await context.artifacts.openStream(binaryUrl, headersFor(request.app)).catch((cause: unknown) => {
      throw toTransportError(cause, "download", binaryUrl);
    });
    if (!isSuccessStatus(response.status)) {
      response.stream.destroy();
      return fail(new TransportError(`HTTP ${response.status} for ${binaryUrl}`, "download", binaryUrl, response.status));
    }

    const { config } = context;
    const target = artifactPath(request, config);
    await fs.ensureDir(config.outputDir);
    info(`Downloading ${path.basename(target)}`);
    if (response.headers["content-length"]) {
      debug(`Expected size: ${response.headers["content-length"]} bytes`);
    }

    let bytes = 0;
    const writer = fs.createWriteStream(target, { highWaterMark: config.chunkSize });
    try {
      await pipeline(
        response.stream,
        stallGuard(config.downloadTimeoutMs, binaryUrl),
        rechunk(config.chunkSize, length => {
          bytes += length;
        }),
        writer
      );
    } catch (cause) {
      warn(`Partial file left at ${target} after ${bytes} bytes`);
      throw toTransportError(cause, "download", binaryUrl);
    }

    info(`Downloaded ${bytes} bytes to ${target}`);
    return succeed({ path: target, bytes });
  });
}
