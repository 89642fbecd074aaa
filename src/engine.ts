// CHANGE: Drive locate → select → resolve → download as an explicit forward-only state machine.
// WHY: Each stage hands a tagged result to the next; the first failure moves the run to FAILED and stops it.
// SOURCE: internal reasoning

import { StageContext } from "./context.js";
import { RetrievalError, StageResult } from "./errors.js";
import { downloadArtifact } from "./fetcher.js";
import { locateRelease } from "./locator.js";
import { debug, info } from "./logger.js";
import { resolveDownloadChain } from "./resolver.js";
import { selectVariant } from "./selector.js";
import { DownloadChain, RetrievalRequest, RetrievedArtifact, RunState, SelectedVariant } from "./types.js";

const TRANSITIONS: Record<RunState, readonly RunState[]> = {
  START: ["LOCATING"],
  LOCATING: ["LOCATED"],
  LOCATED: ["SELECTING"],
  SELECTING: ["SELECTED"],
  SELECTED: ["RESOLVING_HOP1"],
  RESOLVING_HOP1: ["RESOLVING_HOP2"],
  // DONE directly from hop 2 only for dry runs.
  RESOLVING_HOP2: ["DOWNLOADING", "DONE"],
  DOWNLOADING: ["DONE"],
  DONE: [],
  FAILED: []
};

/**
 * Records the states a run passes through and rejects backward or skipping moves.
 */
export class RunTracker {
  private current: RunState = "START";
  private readonly visited: RunState[] = ["START"];

  get state(): RunState {
    return this.current;
  }

  history(): readonly RunState[] {
    return [...this.visited];
  }

  /**
   * Move to `next`. FAILED is reachable from every non-terminal state.
   *
   * @throws Error on a transition the machine does not allow.
   */
  advance(next: RunState): void {
    const terminal = this.current === "DONE" || this.current === "FAILED";
    const allowed = next === "FAILED" ? !terminal : TRANSITIONS[this.current].includes(next);
    if (!allowed) {
      throw new Error(`Illegal run transition ${this.current} -> ${next}`);
    }
    debug(`State ${this.current} -> ${next}`);
    this.current = next;
    this.visited.push(next);
  }
}

export interface RunOptions {
  /** Stop after the binary URL is resolved; nothing is written. */
  readonly dryRun?: boolean;
}

interface RunTrail {
  readonly history: readonly RunState[];
  readonly releaseUrl?: string;
  readonly variant?: SelectedVariant;
  readonly chain?: DownloadChain;
}

export type RunOutcome =
  | (RunTrail & { readonly ok: true; readonly artifact?: RetrievedArtifact })
  | (RunTrail & { readonly ok: false; readonly failedAt: RunState; readonly error: RetrievalError });

/**
 * Execute one retrieval run for a single application and version.
 *
 * @param request - What to retrieve.
 * @param context - Configuration and I/O capabilities.
 * @param options - Run options.
 * @returns The final outcome with the visited states; never throws for RetrievalErrors.
 */
export async function runRetrieval(
  request: RetrievalRequest,
  context: StageContext,
  options: RunOptions = {}
): Promise<RunOutcome> {
  const tracker = new RunTracker();
  let trail: Omit<RunTrail, "history"> = {};

  const failWith = (error: RetrievalError): RunOutcome => {
    const failedAt = tracker.state;
    tracker.advance("FAILED");
    return { ...trail, ok: false, failedAt, error, history: tracker.history() };
  };

  const step = async <T>(running: RunState, body: () => Promise<StageResult<T>>) => {
    tracker.advance(running);
    return body();
  };

  info(`Target ${request.app.displayName} version: ${request.version}`);

  const located = await step("LOCATING", () => locateRelease(request, context));
  if (!located.ok) {
    return failWith(located.error);
  }
  tracker.advance("LOCATED");
  trail = { ...trail, releaseUrl: located.value };

  const selected = await step("SELECTING", () => selectVariant(request, located.value, context));
  if (!selected.ok) {
    return failWith(selected.error);
  }
  tracker.advance("SELECTED");
  trail = { ...trail, variant: selected.value };

  const resolved = await step("RESOLVING_HOP1", () =>
    resolveDownloadChain(request, selected.value.url, context, hop => {
      if (hop === 2) {
        tracker.advance("RESOLVING_HOP2");
      }
    })
  );
  if (!resolved.ok) {
    return failWith(resolved.error);
  }
  trail = { ...trail, chain: resolved.value };

  if (options.dryRun) {
    info(`Dry-run: binary URL ${resolved.value.binaryUrl}`);
    tracker.advance("DONE");
    return { ...trail, ok: true, history: tracker.history() };
  }

  const downloaded = await step("DOWNLOADING", () => downloadArtifact(request, resolved.value.binaryUrl, context));
  if (!downloaded.ok) {
    return failWith(downloaded.error);
  }
  tracker.advance("DONE");
  return { ...trail, ok: true, artifact: downloaded.value, history: tracker.history() };
}
