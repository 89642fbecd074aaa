// CHANGE: Pick one variant row of a release page by an ordered priority list.
// WHY: Variants differ by architecture, density bucket and package format; each app ranks them differently.
// SOURCE: internal reasoning

import { describeRule } from "./apps.js";
import { StageContext, fetchDocument } from "./context.js";
import { StageResult, VariantUnavailableError, fail, guardStage, succeed } from "./errors.js";
import { debug, info } from "./logger.js";
import { RetrievalRequest, SelectedVariant, VariantCandidate, VariantRule } from "./types.js";
import { resolveUrl } from "./utils/url.js";

export const VARIANT_ROW_SELECTOR = "div.table-row";

/**
 * Test one row against one rule: every included tag present, no excluded tag present.
 */
export function matchesRule(text: string, rule: VariantRule): boolean {
  const included = rule.include.every(tag => text.includes(tag.toLowerCase()));
  const excluded = (rule.exclude ?? []).some(tag => text.includes(tag.toLowerCase()));
  return included && !excluded;
}

/**
 * Choose the first row matching the highest-priority rule that matches anything.
 *
 * Invariant: a lower-priority rule is never consulted once a higher one has selected a row.
 *
 * @param rows - Rows in displayed order.
 * @param priorities - Rules, most-preferred first.
 * @returns The chosen row with the rule that selected it, or undefined.
 */
export function pickVariant(
  rows: readonly VariantCandidate[],
  priorities: readonly VariantRule[]
): { readonly rule: VariantRule; readonly candidate: VariantCandidate & { readonly href: string } } | undefined {
  for (const rule of priorities) {
    for (const candidate of rows) {
      const { href } = candidate;
      if (href && matchesRule(candidate.text, rule)) {
        return { rule, candidate: { ...candidate, href } };
      }
    }
    debug(`No row matched ${describeRule(rule)}`);
  }
  return undefined;
}

/**
 * Fetch the release page and select the variant for the request's application.
 *
 * @param request - Application whose priority list applies.
 * @param releaseUrl - Located release page.
 * @param context - Stage collaborators.
 */
export async function selectVariant(
  request: RetrievalRequest,
  releaseUrl: string,
  context: StageContext
): Promise<StageResult<SelectedVariant>> {
  return guardStage(async () => {
    const html = await fetchDocument(context, releaseUrl, request.app, "select");
    const rows = context.parser.parseRows(html, VARIANT_ROW_SELECTOR);
    debug(`Release page lists ${rows.length} variant rows`);

    const picked = pickVariant(rows, request.app.priorities);
    if (!picked) {
      return fail(new VariantUnavailableError(rows.length));
    }

    const url = resolveUrl(context.config.baseUrl, picked.candidate.href);
    info(`Selected variant (${describeRule(picked.rule)}): ${url}`);
    return succeed({ rule: picked.rule, candidate: picked.candidate, url });
  });
}
