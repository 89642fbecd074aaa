// CHANGE: Bundle the collaborators every stage receives.
// WHY: Configuration and I/O capabilities are passed explicitly so runs for different apps never share state.
// SOURCE: internal reasoning

import { HEADERS } from "./config.js";
import { Stage, TransportError, toTransportError } from "./errors.js";
import { HtmlParser } from "./html.js";
import { AppProfile, MirrorConfig } from "./types.js";
import { ArtifactSource, PageSource, RequestHeaders } from "./utils/http.js";

export interface StageContext {
  readonly config: MirrorConfig;
  readonly pages: PageSource;
  readonly artifacts: ArtifactSource;
  readonly parser: HtmlParser;
}

export function headersFor(app: AppProfile): RequestHeaders {
  return HEADERS[app.headers];
}

export function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}

/**
 * Fetch one page and return its body, failing with TransportError on any non-success outcome.
 *
 * @param context - Stage collaborators.
 * @param url - Absolute page URL.
 * @param app - Profile whose header set is sent.
 * @param stage - Stage reported in the diagnostic.
 */
export async function fetchDocument(context: StageContext, url: string, app: AppProfile, stage: Stage): Promise<string> {
  const { status, body } = await context.pages.fetchPage(url, headersFor(app)).catch((cause: unknown) => {
    throw toTransportError(cause, stage, url);
  });
  if (!isSuccessStatus(status)) {
    throw new TransportError(`HTTP ${status} for ${url}`, stage, url, status);
  }
  return body;
}
