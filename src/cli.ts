// CHANGE: Expose the retrieval engine through commander subcommands.
// WHY: A CI job invokes one app and one version per run and reads the exit status and KEY=value lines.
// SOURCE: internal reasoning

import { Command } from "commander";
import { APP_PROFILES, describeRule, findProfile } from "./apps.js";
import { loadMirrorConfig } from "./config.js";
import { StageContext } from "./context.js";
import { RunOutcome, runRetrieval } from "./engine.js";
import { ConfigurationError, RetrievalError } from "./errors.js";
import { cheerioParser } from "./html.js";
import { emitOutput, error as logError, info, setLogLevel } from "./logger.js";
import { MirrorConfig, RetrievalRequest } from "./types.js";
import { createHttpSource } from "./utils/http.js";
import { createRequest, versionSlug } from "./utils/slug.js";

type Env = Readonly<Record<string, string | undefined>>;

export interface GlobalOptions {
  readonly output?: string;
  readonly verbose?: boolean;
}

interface VersionOption {
  readonly version?: string;
}

export type ContextFactory = (config: MirrorConfig) => StageContext;

/**
 * Wire the production collaborators: axios for I/O, cheerio for parsing.
 */
export function createContext(config: MirrorConfig): StageContext {
  const http = createHttpSource(config);
  return { config, pages: http, artifacts: http, parser: cheerioParser };
}

/**
 * Build the retrieval request from the CLI argument or the profile's environment variable.
 *
 * @throws ConfigurationError when no version is supplied or the app is unknown.
 */
export function resolveRequest(appId: string, version: string | undefined, env: Env = process.env): RetrievalRequest {
  const app = findProfile(appId);
  const raw = version ?? env[app.versionEnv];
  if (!raw || raw.trim() === "") {
    throw new ConfigurationError(`${app.versionEnv} missing`);
  }
  return createRequest(app, raw);
}

/**
 * Print the result of a run and set the exit status.
 */
export function reportOutcome(request: RetrievalRequest, outcome: RunOutcome): void {
  if (!outcome.ok) {
    logError(`[${outcome.error.stage}] ${outcome.error.message}`);
    process.exitCode = 1;
    return;
  }
  if (outcome.artifact) {
    info(`${request.app.format.toUpperCase()} downloaded: ${outcome.artifact.path}`);
    if (request.app.emitPathKey) {
      emitOutput(request.app.emitPathKey, outcome.artifact.path);
    }
    return;
  }
  if (outcome.chain) {
    info(`Variant page: ${outcome.chain.variantPage}`);
    info(`Confirmation page: ${outcome.chain.confirmationPage}`);
    emitOutput("DOWNLOAD_URL", outcome.chain.binaryUrl);
  }
}

/**
 * Fetch mode entry point: locate, select, resolve and download one artifact.
 */
export async function fetchAction(
  appId: string,
  version: string | undefined,
  options: GlobalOptions,
  env: Env = process.env,
  makeContext: ContextFactory = createContext
): Promise<RunOutcome> {
  const request = resolveRequest(appId, version, env);
  const config = loadMirrorConfig(env, options.output ? { outputDir: options.output } : {});
  const outcome = await runRetrieval(request, makeContext(config));
  reportOutcome(request, outcome);
  return outcome;
}

/**
 * Resolve mode entry point: run the chain up to the binary URL without downloading.
 */
export async function resolveAction(
  appId: string,
  version: string | undefined,
  env: Env = process.env,
  makeContext: ContextFactory = createContext
): Promise<RunOutcome> {
  const request = resolveRequest(appId, version, env);
  const outcome = await runRetrieval(request, makeContext(loadMirrorConfig(env)), { dryRun: true });
  reportOutcome(request, outcome);
  return outcome;
}

/**
 * Slug mode entry point: print the slug the upload index is searched for.
 */
export function slugAction(appId: string, version: string): void {
  console.log(versionSlug(createRequest(findProfile(appId), version)));
}

/**
 * Apps mode entry point: list known application profiles.
 */
export function appsAction(): void {
  console.table(
    APP_PROFILES.map(profile => ({
      id: profile.id,
      env: profile.versionEnv,
      format: profile.format,
      priorities: profile.priorities.map(describeRule).join(" > ")
    }))
  );
}

/**
 * Construct commander program with configured commands.
 *
 * @returns Ready-to-use commander instance.
 */
export function buildProgram(): Command {
  const program = new Command();
  program
    .name("apkmirror-sync")
    .description("Download a specific APK/APKM release variant from APKMirror")
    .version("1.0.0", "-V, --cli-version", "print the tool version")
    .option("-o, --output <dir>", "directory the artifact is written to")
    .option("--verbose", "log HTTP and state machine details")
    .hook("preAction", command => {
      if (command.opts<GlobalOptions>().verbose) {
        setLogLevel("debug");
      }
    });

  program
    .command("fetch")
    .description("Locate, resolve and download one release artifact")
    .argument("<app>", "application id (see `apps`)")
    .argument("[version]", "target version; defaults to the app's version environment variable")
    .option("--version <v>", "target version (same as the positional argument)")
    .action(async (app: string, version: string | undefined, options: VersionOption) => {
      await fetchAction(app, options.version ?? version, program.opts<GlobalOptions>());
    });

  program
    .command("resolve")
    .description("Resolve the final download URL without downloading")
    .argument("<app>", "application id")
    .argument("[version]", "target version")
    .option("--version <v>", "target version (same as the positional argument)")
    .action(async (app: string, version: string | undefined, options: VersionOption) => {
      await resolveAction(app, options.version ?? version);
    });

  program
    .command("slug")
    .description("Print the release slug searched for in the upload index")
    .argument("<app>", "application id")
    .argument("<version>", "target version")
    .action((app: string, version: string) => slugAction(app, version));

  program.command("apps").description("List supported applications").action(() => appsAction());

  return program;
}

/**
 * Execute CLI with provided argv array.
 *
 * @param argv - Process arguments.
 */
export async function runCli(argv: readonly string[]): Promise<void> {
  const program = buildProgram();
  try {
    await program
      .configureOutput({
        outputError: (str: string) => logError(str.trim())
      })
      .parseAsync([...argv]);
  } catch (cause) {
    if (cause instanceof RetrievalError) {
      logError(`[${cause.stage}] ${cause.message}`);
    } else {
      logError(`CLI failed: ${cause instanceof Error ? cause.message : String(cause)}`);
    }
    process.exitCode = 1;
  }
}
