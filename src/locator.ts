// CHANGE: Locate the release listing by scanning the category's upload index page by page.
// WHY: The first page containing the slug wins; later pages are never requested.
// SOURCE: internal reasoning

import { StageContext, fetchDocument } from "./context.js";
import { NotFoundError, StageResult, guardStage, succeed, fail } from "./errors.js";
import { debug, info } from "./logger.js";
import { LinkRef, RetrievalRequest } from "./types.js";
import { versionSlug } from "./utils/slug.js";
import { resolveUrl, uploadsPageUrl } from "./utils/url.js";

/**
 * First link whose target contains the slug, in document order.
 */
export function findSlugLink(links: readonly LinkRef[], slug: string): LinkRef | undefined {
  return links.find(link => link.href.includes(slug));
}

/**
 * Scan upload pages 1..maxPages for the release page of the requested version.
 *
 * @param request - Application and version to locate.
 * @param context - Stage collaborators.
 * @returns Absolute release page URL, NotFoundError after the cap, or TransportError on the first failed page.
 */
export async function locateRelease(request: RetrievalRequest, context: StageContext): Promise<StageResult<string>> {
  return guardStage(async () => {
    const { config, parser } = context;
    const slug = versionSlug(request);
    info(`Looking for slug: ${slug}`);

    for (let page = 1; page <= config.maxPages; page += 1) {
      const pageUrl = uploadsPageUrl(config.baseUrl, request.app.category, page);
      info(`Scanning uploads page ${page}`);
      const html = await fetchDocument(context, pageUrl, request.app, "locate");
      const links = parser.parseLinks(html);
      debug(`Uploads page ${page} carries ${links.length} links`);
      const match = findSlugLink(links, slug);
      if (match) {
        const releaseUrl = resolveUrl(config.baseUrl, match.href);
        info(`Found release page: ${releaseUrl}`);
        return succeed(releaseUrl);
      }
    }

    return fail(new NotFoundError(slug, config.maxPages));
  });
}
