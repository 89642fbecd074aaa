#!/usr/bin/env node
// CHANGE: Delegate execution to modular CLI runner.
// WHY: Allows importing the engine and CLI helpers without triggering command parsing.
// SOURCE: internal reasoning

import { pathToFileURL } from "url";
import { runCli } from "./cli.js";

const executedDirectly = process.argv[1]
  ? pathToFileURL(process.argv[1]).href === import.meta.url
  : false;

if (executedDirectly) {
  void runCli(process.argv);
}

export { runCli };
export { APP_PROFILES, findProfile } from "./apps.js";
export { loadMirrorConfig } from "./config.js";
export { runRetrieval, RunTracker } from "./engine.js";
export type { RunOutcome, RunOptions } from "./engine.js";
export * from "./errors.js";
export type * from "./types.js";
