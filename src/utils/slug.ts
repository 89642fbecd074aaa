// CHANGE: Derive the mirror's release slug from a retrieval request.
// WHY: The upload index is matched by substring, so the slug must be deterministic and collision-free.
// SOURCE: internal reasoning

import { ConfigurationError } from "../errors.js";
import { AppProfile, RetrievalRequest } from "../types.js";

const VERSION_PATTERN = /^[0-9a-z]+(?:\.[0-9a-z]+)*$/i;

/**
 * Validate a version string before it is turned into a slug.
 *
 * Invariant: accepted versions contain no `-`, so replacing `.` with `-` cannot merge two versions.
 * The result is lower-cased, so the slug and the file name derive from the same string.
 *
 * @throws ConfigurationError if the version is empty or contains other separators.
 */
export function assertVersion(version: string): string {
  const trimmed = version.trim();
  if (!VERSION_PATTERN.test(trimmed)) {
    throw new ConfigurationError(`Invalid version "${version}": expected dot-separated alphanumeric parts`);
  }
  return trimmed.toLowerCase();
}

/**
 * Build a retrieval request from a profile and a raw version string.
 */
export function createRequest(app: AppProfile, version: string): RetrievalRequest {
  return Object.freeze({ app, version: assertVersion(version) });
}

/**
 * Compute the release slug, e.g. `youtube-19-45-38-release`.
 */
export function versionSlug(request: RetrievalRequest): string {
  return `${request.app.slugPrefix}-${request.version.replace(/\./g, "-")}-release`;
}
