// CHANGE: Provide the page and binary fetch capabilities on top of one axios client.
// WHY: Runs are strictly sequential; a single gate keeps at most one request in flight.
// SOURCE: internal reasoning

import { Readable } from "node:stream";
import axios, { AxiosInstance, AxiosResponse } from "axios";
import pLimit from "p-limit";
import { debug } from "../logger.js";
import { MirrorConfig, PageResponse } from "../types.js";

export type RequestHeaders = Readonly<Record<string, string>>;

/**
 * Streaming response whose status has been inspected before the body is read.
 */
export interface StreamResponse {
  readonly status: number;
  readonly headers: Record<string, string>;
  readonly stream: Readable;
}

/**
 * Fetches HTML documents.
 */
export interface PageSource {
  fetchPage(url: string, headers: RequestHeaders): Promise<PageResponse>;
}

/**
 * Opens streaming downloads.
 */
export interface ArtifactSource {
  openStream(url: string, headers: RequestHeaders): Promise<StreamResponse>;
}

const requestGate = pLimit(1);

const httpClient: AxiosInstance = axios.create({
  maxRedirects: 5,
  headers: {
    Accept: "text/html,application/xhtml+xml,*/*"
  }
});

function normaliseHeaders(headers: AxiosResponse["headers"]): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (Array.isArray(value)) {
      out[key.toLowerCase()] = value.join(", ");
    } else if (typeof value === "string") {
      out[key.toLowerCase()] = value;
    } else if (typeof value === "number") {
      out[key.toLowerCase()] = String(value);
    }
  }
  return out;
}

/**
 * Perform GET request expecting an HTML document.
 *
 * @param url - Target URL.
 * @param headers - Header set of the application profile.
 * @param timeoutMs - Abort the request after this many milliseconds.
 * @returns Status and body text.
 */
export async function getPage(url: string, headers: RequestHeaders, timeoutMs: number): Promise<PageResponse> {
  const response = await requestGate(() =>
    httpClient.get<string>(url, {
      headers: { ...headers },
      timeout: timeoutMs,
      responseType: "text",
      transformResponse: [data => data]
    })
  );
  debug(`GET ${url} -> ${response.status}`);
  return {
    status: response.status,
    body: typeof response.data === "string" ? response.data : String(response.data)
  };
}

/**
 * Open a streaming GET request. The gate is released once headers arrive;
 * the body is consumed by the caller, which also polices stalls between chunks.
 *
 * @param url - Binary URL.
 * @param headers - Header set of the application profile.
 * @param timeoutMs - Socket idle limit; the transfer as a whole has no deadline.
 */
export async function getStream(url: string, headers: RequestHeaders, timeoutMs: number): Promise<StreamResponse> {
  const response = await requestGate(() =>
    httpClient.get<Readable>(url, {
      headers: { ...headers },
      timeout: timeoutMs,
      responseType: "stream"
    })
  );
  debug(`GET (stream) ${url} -> ${response.status}`);
  return {
    status: response.status,
    headers: normaliseHeaders(response.headers),
    stream: response.data
  };
}

/**
 * Bind the HTTP helpers to the timeouts of a mirror configuration.
 */
export function createHttpSource(config: MirrorConfig): PageSource & ArtifactSource {
  return {
    fetchPage: (url, headers) => getPage(url, headers, config.pageTimeoutMs),
    openStream: (url, headers) => getStream(url, headers, config.downloadTimeoutMs)
  };
}

export { httpClient };
