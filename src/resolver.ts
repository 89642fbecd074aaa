// CHANGE: Walk the two hops from a variant page to the final binary URL.
// WHY: The mirror reveals the binary only behind a download button and a nofollow confirmation link.
// SOURCE: internal reasoning

import { StageContext, fetchDocument } from "./context.js";
import { ChainBrokenError, StageResult, fail, guardStage, succeed } from "./errors.js";
import { info } from "./logger.js";
import { DownloadChain, RetrievalRequest } from "./types.js";
import { resolveUrl } from "./utils/url.js";

export const DOWNLOAD_BUTTON_SELECTOR = "a.downloadButton";

/**
 * The genuine final-download anchor is the one marked `rel="nofollow"`.
 */
export const FINAL_LINK_SELECTOR = "a[rel='nofollow']";

/**
 * Observer notified when a hop starts, so the caller can track run state.
 */
export type HopListener = (hop: 1 | 2) => void;

/**
 * Resolve variant page → confirmation page → binary URL with exactly one fetch per hop.
 *
 * @param request - Application whose header set is sent.
 * @param variantPage - Absolute URL of the selected variant.
 * @param context - Stage collaborators.
 * @param onHop - Called before each hop's fetch.
 * @returns The full chain, or ChainBrokenError naming the hop whose element was missing.
 */
export async function resolveDownloadChain(
  request: RetrievalRequest,
  variantPage: string,
  context: StageContext,
  onHop: HopListener = () => undefined
): Promise<StageResult<DownloadChain>> {
  return guardStage(async () => {
    const { baseUrl } = context.config;

    onHop(1);
    const variantHtml = await fetchDocument(context, variantPage, request.app, "resolve");
    const buttonHref = context.parser.firstLink(variantHtml, DOWNLOAD_BUTTON_SELECTOR);
    if (!buttonHref) {
      return fail(new ChainBrokenError(1, variantPage));
    }
    const confirmationPage = resolveUrl(baseUrl, buttonHref);
    info(`Confirmation page: ${confirmationPage}`);

    onHop(2);
    const confirmationHtml = await fetchDocument(context, confirmationPage, request.app, "resolve");
    const finalHref = context.parser.firstLink(confirmationHtml, FINAL_LINK_SELECTOR);
    if (!finalHref) {
      return fail(new ChainBrokenError(2, confirmationPage));
    }
    const binaryUrl = resolveUrl(baseUrl, finalHref);
    info("Final download URL resolved");

    return succeed({ variantPage, confirmationPage, binaryUrl });
  });
}
