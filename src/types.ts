// CHANGE: Define typed models for the locate → select → resolve → download pipeline.
// WHY: Every stage consumes the previous stage's single output; the types pin that chain down.
// SOURCE: internal reasoning

/**
 * Package format published on the mirror. `apk` is a single installable file,
 * `apkm` is the multi-part bundle container.
 */
export type PackageFormat = "apk" | "apkm";

/**
 * Named header sets. The upload index rejects plain agents for some
 * categories with 403, hence the browser-like set.
 */
export type HeaderProfile = "ci" | "browser";

/**
 * One entry of a variant priority list.
 *
 * @property include - Tags that must all appear in the row text.
 * @property exclude - Tags that must not appear in the row text.
 */
export interface VariantRule {
  readonly include: readonly string[];
  readonly exclude?: readonly string[];
}

/**
 * Static description of one application fetched from the mirror.
 *
 * Invariant: `priorities` is ordered most-preferred first and never mutated.
 */
export interface AppProfile {
  readonly id: string;
  readonly displayName: string;
  readonly category: string;
  readonly slugPrefix: string;
  readonly versionEnv: string;
  readonly format: PackageFormat;
  readonly priorities: readonly VariantRule[];
  readonly headers: HeaderProfile;
  readonly emitPathKey?: string;
}

export interface RetrievalRequest {
  readonly app: AppProfile;
  readonly version: string;
}

/**
 * Immutable configuration value handed to every stage.
 */
export interface MirrorConfig {
  readonly baseUrl: string;
  readonly maxPages: number;
  readonly pageTimeoutMs: number;
  readonly downloadTimeoutMs: number;
  readonly chunkSize: number;
  readonly outputDir: string;
}

export interface PageResponse {
  readonly status: number;
  readonly body: string;
}

export interface LinkRef {
  readonly href: string;
  readonly text: string;
}

/**
 * Row of the release page's variant table.
 *
 * @property text - Lower-cased, whitespace-normalised row text.
 * @property href - First anchor target inside the row, if any.
 */
export interface VariantCandidate {
  readonly text: string;
  readonly href?: string;
}

export interface SelectedVariant {
  readonly rule: VariantRule;
  readonly candidate: VariantCandidate;
  readonly url: string;
}

export interface DownloadChain {
  readonly variantPage: string;
  readonly confirmationPage: string;
  readonly binaryUrl: string;
}

export interface RetrievedArtifact {
  readonly path: string;
  readonly bytes: number;
}

export type RunState =
  | "START"
  | "LOCATING"
  | "LOCATED"
  | "SELECTING"
  | "SELECTED"
  | "RESOLVING_HOP1"
  | "RESOLVING_HOP2"
  | "DOWNLOADING"
  | "DONE"
  | "FAILED";
