// CHANGE: Centralise mirror configuration with environment validation.
// WHY: Stages receive one frozen configuration value instead of reading process-wide globals.
// SOURCE: internal reasoning

import * as dotenv from "dotenv";
import { ConfigurationError } from "./errors.js";
import { HeaderProfile, MirrorConfig } from "./types.js";

dotenv.config();

/**
 * Defaults applied when the environment leaves a setting unset.
 */
export const DEFAULTS = {
  BASE_URL: "https://www.apkmirror.com",
  MAX_PAGES: 25,
  PAGE_TIMEOUT_MS: 30_000,
  DOWNLOAD_TIMEOUT_MS: 120_000,
  CHUNK_SIZE: 8 * 1024,
  OUTPUT_DIR: "tmp"
} as const;

/**
 * Header sets sent with every mirror request, keyed by profile.
 */
export const HEADERS: Record<HeaderProfile, Readonly<Record<string, string>>> = {
  ci: {
    "User-Agent": "ci-artifact-index/1.0"
  },
  browser: {
    "User-Agent":
      "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
    Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
    "Accept-Language": "en-US,en;q=0.5",
    Referer: "https://www.apkmirror.com/",
    Connection: "keep-alive"
  }
};

type Env = Readonly<Record<string, string | undefined>>;

function positiveInt(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError(`${key} must be a positive integer, got "${raw}"`);
  }
  return value;
}

function pageCap(env: Env): number {
  const value = positiveInt(env, "APKMIRROR_MAX_PAGES", DEFAULTS.MAX_PAGES);
  if (value > DEFAULTS.MAX_PAGES) {
    throw new ConfigurationError(`APKMIRROR_MAX_PAGES must be at most ${DEFAULTS.MAX_PAGES}, got "${value}"`);
  }
  return value;
}

/**
 * Build the mirror configuration from environment variables.
 *
 * @param env - Variables to read, `process.env` by default.
 * @param overrides - Values that take precedence over the environment (CLI flags).
 * @throws ConfigurationError when a numeric setting is malformed or the page cap exceeds 25.
 */
export function loadMirrorConfig(env: Env = process.env, overrides: Partial<MirrorConfig> = {}): MirrorConfig {
  const baseUrl = (env.APKMIRROR_BASE_URL?.trim() || DEFAULTS.BASE_URL).replace(/\/+$/, "");
  try {
    new URL(baseUrl);
  } catch {
    throw new ConfigurationError(`APKMIRROR_BASE_URL is not a valid URL: "${baseUrl}"`);
  }
  return Object.freeze({
    baseUrl,
    maxPages: pageCap(env),
    pageTimeoutMs: positiveInt(env, "HTTP_TIMEOUT", DEFAULTS.PAGE_TIMEOUT_MS),
    downloadTimeoutMs: positiveInt(env, "DOWNLOAD_TIMEOUT", DEFAULTS.DOWNLOAD_TIMEOUT_MS),
    chunkSize: DEFAULTS.CHUNK_SIZE,
    outputDir: env.OUTPUT_DIR?.trim() || DEFAULTS.OUTPUT_DIR,
    ...overrides
  });
}
