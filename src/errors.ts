// CHANGE: Introduce terminal error taxonomy and tagged stage results.
// WHY: Every failure ends the run with one diagnostic naming the stage that failed.
// SOURCE: internal reasoning

import { AxiosError } from "axios";

export type FailureKind = "configuration" | "not-found" | "variant-unavailable" | "chain-broken" | "transport";

export type Stage = "config" | "locate" | "select" | "resolve" | "download";

/**
 * Base class for every terminal failure of a retrieval run.
 */
export abstract class RetrievalError extends Error {
  abstract readonly kind: FailureKind;

  constructor(
    message: string,
    readonly stage: Stage
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ConfigurationError extends RetrievalError {
  readonly kind = "configuration";

  constructor(message: string) {
    super(message, "config");
  }
}

export class NotFoundError extends RetrievalError {
  readonly kind = "not-found";

  constructor(
    readonly slug: string,
    readonly pagesScanned: number
  ) {
    super(`Version slug "${slug}" not found in ${pagesScanned} upload pages`, "locate");
  }
}

export class VariantUnavailableError extends RetrievalError {
  readonly kind = "variant-unavailable";

  constructor(readonly rowsScanned: number) {
    super(`No acceptable variant among ${rowsScanned} rows`, "select");
  }
}

export class ChainBrokenError extends RetrievalError {
  readonly kind = "chain-broken";

  constructor(
    readonly hop: 1 | 2,
    readonly url: string
  ) {
    super(`${hop === 1 ? "Download action missing" : "Final link missing"} on ${url}`, "resolve");
  }
}

export class TransportError extends RetrievalError {
  readonly kind = "transport";

  constructor(
    message: string,
    stage: Stage,
    readonly url: string,
    readonly status?: number
  ) {
    super(message, stage);
  }
}

/**
 * Translate an HTTP client failure into a TransportError for the given stage.
 *
 * @param cause - Error thrown by axios or the stream.
 * @param stage - Stage that issued the request.
 * @param url - Requested URL.
 */
export function toTransportError(cause: unknown, stage: Stage, url: string): TransportError {
  if (cause instanceof TransportError) {
    return cause;
  }
  if (cause instanceof AxiosError) {
    const status = cause.response?.status;
    if (status !== undefined) {
      return new TransportError(`HTTP ${status} for ${url}`, stage, url, status);
    }
    if (cause.code === "ECONNABORTED" || cause.code === "ETIMEDOUT" || cause.code === "ERR_CANCELED") {
      return new TransportError(`Timed out fetching ${url}`, stage, url);
    }
    return new TransportError(`Request failed for ${url}: ${cause.message}`, stage, url);
  }
  const message = cause instanceof Error ? cause.message : String(cause);
  return new TransportError(`Request failed for ${url}: ${message}`, stage, url);
}

export type StageResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: RetrievalError };

export function succeed<T>(value: T): StageResult<T> {
  return { ok: true, value };
}

export function fail<T>(error: RetrievalError): StageResult<T> {
  return { ok: false, error };
}

/**
 * Run an async stage body, turning thrown RetrievalErrors into a failed result.
 * Anything else is a programming error and propagates.
 */
export async function guardStage<T>(body: () => Promise<StageResult<T>>): Promise<StageResult<T>> {
  try {
    return await body();
  } catch (error) {
    if (error instanceof RetrievalError) {
      return fail(error);
    }
    throw error;
  }
}
