// CHANGE: Describe every supported application as a static profile.
// WHY: One engine serves all applications; only category, slug, output name and priorities differ.
// SOURCE: internal reasoning

import { ConfigurationError } from "./errors.js";
import { AppProfile, VariantRule } from "./types.js";

export const APP_PROFILES: readonly AppProfile[] = [
  {
    id: "youtube",
    displayName: "YouTube",
    category: "youtube",
    slugPrefix: "youtube",
    versionEnv: "YOUTUBE_VERSION",
    format: "apk",
    // Universal nodpi single-file APK only; bundle rows also mention "apk".
    priorities: [{ include: ["apk", "nodpi", "universal"], exclude: ["bundle"] }],
    headers: "ci",
    emitPathKey: "APK_PATH"
  },
  {
    id: "youtube-music",
    displayName: "Music",
    category: "youtube-music",
    slugPrefix: "youtube-music",
    versionEnv: "MUSIC_VERSION",
    format: "apk",
    priorities: [{ include: ["apk", "nodpi", "arm64-v8a"] }, { include: ["apk", "nodpi", "armeabi-v7a"] }],
    headers: "ci"
  },
  {
    id: "reddit",
    displayName: "Reddit",
    category: "reddit",
    slugPrefix: "reddit",
    versionEnv: "REDDIT_VERSION",
    format: "apkm",
    priorities: [
      { include: ["bundle", "universal", "120-640dpi"] },
      { include: ["bundle", "arm64-v8a", "120-640dpi"] },
      { include: ["bundle", "universal", "480dpi"] },
      { include: ["bundle", "arm64-v8a", "480dpi"] }
    ],
    headers: "browser"
  }
];

/**
 * Look up an application profile by its CLI identifier.
 *
 * @throws ConfigurationError for unknown identifiers.
 */
export function findProfile(id: string): AppProfile {
  const profile = APP_PROFILES.find(candidate => candidate.id === id.toLowerCase());
  if (!profile) {
    const known = APP_PROFILES.map(candidate => candidate.id).join(", ");
    throw new ConfigurationError(`Unknown application "${id}" (known: ${known})`);
  }
  return profile;
}

/**
 * Human-readable summary of a variant rule, e.g. `apk+nodpi+universal -bundle`.
 */
export function describeRule(rule: VariantRule): string {
  const excluded = (rule.exclude ?? []).map(tag => ` -${tag}`).join("");
  return `${rule.include.join("+")}${excluded}`;
}
