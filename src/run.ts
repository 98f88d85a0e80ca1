import { Command, CommanderError } from "commander";
import {
  expandPath,
  formatConfigError,
  getConfiguredOutputRoot,
  getDefaultMirrorRoot,
  getDefaultOutputRoot,
  loadConfig,
  type LoadConfigResult,
  type PaletteToolConfig,
} from "./lib/config/index.js";
import { createApplicationEntry } from "./lib/desktop-entry.js";
import { errorMessage, ProfileError } from "./lib/errors.js";
import { matchApplication } from "./lib/matcher.js";
import { createPaletteTool, type PaletteTool } from "./lib/palette-tool.js";
import { generateAll, generateProfile, removeProfile, type LifecycleContext } from "./lib/profiles.js";
import { discoverApplications, type DiscoveryOptions } from "./lib/registry.js";
import { ProfileStore } from "./lib/state.js";
import type { ApplicationEntry, BatchSummary } from "./lib/types.js";
import { createInkOutput, type Output } from "./output.js";

export const EXIT_OK = 0;
export const EXIT_NO_ACTION = 1;
export const EXIT_GEN_FAILED = 2;
export const EXIT_UNGEN_FAILED = 3;
export const EXIT_BATCH_FAILED = 4;

const MAX_LISTED_FAILURES = 5;

type CliOptions = {
  gen?: string;
  ungen?: string;
  genAll?: boolean;
  listApps?: boolean;
  exact?: boolean;
  dryRun?: boolean;
  verbose?: boolean;
  force?: boolean;
  outputDir?: string;
  end4Dir?: string;
  image?: string;
  config?: string;
};

export interface CliDeps {
  discover: (options: DiscoveryOptions) => ApplicationEntry[];
  createStore: () => ProfileStore;
  createPaletteTool: (config: PaletteToolConfig) => PaletteTool;
  loadConfig: (configPath?: string) => LoadConfigResult;
  createOutput: (verbose: boolean) => Output;
  writeOut: (text: string) => void;
  writeErr: (text: string) => void;
}

const DEFAULT_DEPS: CliDeps = {
  discover: discoverApplications,
  createStore: () => new ProfileStore(),
  createPaletteTool,
  loadConfig,
  createOutput: createInkOutput,
  writeOut: (text) => process.stdout.write(text),
  writeErr: (text) => process.stderr.write(text),
};

function buildProgram(deps: CliDeps): Command {
  return new Command()
    .name("apptint")
    .description("App-aware palette generation helper.")
    .option("--gen <name>", "Generate colors for one app.")
    .option("--ungen <name>", "Remove generated profile for app.")
    .option("--gen-all", "Generate colors for all detected desktop apps.")
    .option("--list-apps", "List detected apps.")
    .option("--exact", "Use exact app matching.")
    .option("--dry-run", "Preview actions only.")
    .option("--verbose", "Show detailed command output.")
    .option("--force", "Regenerate even when profile already exists in state.")
    .option("--output-dir <path>", "Override managed output directory.")
    .option("--end4-dir <path>", "End-4 dotfiles root to receive app color copies.")
    .option("--image <path>", "Fallback image path when app icon cannot be resolved.")
    .option("--config <path>", "Config file to load instead of the default.")
    .exitOverride()
    .configureOutput({ writeOut: deps.writeOut, writeErr: deps.writeErr });
}

function resolveTarget(name: string, apps: readonly ApplicationEntry[], exact: boolean): ApplicationEntry {
  if (!name.trim()) {
    throw new ProfileError("INVALID_INPUT", "App name cannot be empty.");
  }
  if (apps.length > 0) {
    return matchApplication(name, apps, exact);
  }
  return createApplicationEntry({ identity: name, displayName: name });
}

async function runGen(name: string, apps: readonly ApplicationEntry[], ctx: LifecycleContext, opts: CliOptions, output: Output): Promise<number> {
  try {
    const app = resolveTarget(name, apps, Boolean(opts.exact));
    output.log("detail", `match: ${app.displayName} (${app.identity})`);
    const outcome = await generateProfile(app, ctx);
    if (outcome.status === "skipped") {
      output.log("warn", `Profile already exists for ${app.displayName}. Use --force to regenerate.`);
      return EXIT_OK;
    }
    output.log("detail", `command: ${outcome.result.command.join(" ")}`);
    if (outcome.status === "planned") {
      output.log("info", `Dry run: would generate profile for ${app.displayName} -> ${outcome.result.outputDirectory}`);
      return EXIT_OK;
    }
    output.log("info", `Generated profile for ${app.displayName} -> ${outcome.result.outputDirectory}`);
    return EXIT_OK;
  } catch (error) {
    output.log("error", errorMessage(error));
    return EXIT_GEN_FAILED;
  }
}

function runUngen(query: string, apps: readonly ApplicationEntry[], ctx: LifecycleContext, opts: CliOptions, output: Output): number {
  try {
    const outcome = removeProfile(query, ctx, apps, Boolean(opts.exact));
    if (outcome.matchMiss) {
      output.log("detail", `match miss: ${outcome.matchMiss}`);
    }
    if (outcome.status === "absent") {
      output.log("warn", `No managed profile found for ${query}`);
      return EXIT_OK;
    }
    if (outcome.status === "planned") {
      output.log("info", `Dry run: would remove profile for ${outcome.record.name}`);
      return EXIT_OK;
    }
    output.log("info", `Removed profile for ${outcome.record.name}`);
    return EXIT_OK;
  } catch (error) {
    output.log("error", errorMessage(error));
    return EXIT_UNGEN_FAILED;
  }
}

function reportFailures(summary: BatchSummary, verbose: boolean, output: Output): void {
  const shown = verbose ? summary.failures.length : Math.min(MAX_LISTED_FAILURES, summary.failures.length);
  for (const failure of summary.failures.slice(0, shown)) {
    output.log("warn", `${failure.app.displayName}: ${failure.message}`);
  }
  const remaining = summary.failures.length - shown;
  if (remaining > 0) {
    output.log("warn", `... and ${remaining} more failure(s). Re-run with --verbose for full details.`);
  }
}

async function runGenAll(apps: readonly ApplicationEntry[], ctx: LifecycleContext, opts: CliOptions, output: Output): Promise<number> {
  if (apps.length === 0) {
    output.log("warn", "No installed desktop applications detected.");
    return EXIT_OK;
  }
  output.log("info", `Starting gen-all for ${apps.length} detected app(s)`);
  const summary = await generateAll(apps, ctx, (event) => {
    output.batchProgress(event);
    if (event.type === "skip") output.log("detail", `[skip] ${event.app.displayName} (exists)`);
    if (event.type === "ok") output.log("detail", `[ok] ${event.app.displayName}`);
    if (event.type === "fail") output.log("detail", `[fail] ${event.app.displayName}: ${event.message}`);
  });
  output.log(
    "info",
    `gen-all complete: success=${summary.succeeded} failed=${summary.failed} skipped=${summary.skipped}`
  );
  reportFailures(summary, Boolean(opts.verbose), output);
  return summary.failed === 0 ? EXIT_OK : EXIT_BATCH_FAILED;
}

function buildContext(opts: CliOptions, config: LoadConfigResult["config"], deps: CliDeps, output: Output): LifecycleContext {
  const { settings } = config;
  const verbose = Boolean(opts.verbose);
  return {
    store: deps.createStore(),
    paletteTool: deps.createPaletteTool(settings.palette_tool),
    outputRoot: opts.outputDir ? expandPath(opts.outputDir) : getDefaultOutputRoot(settings.output_dir),
    managedRoot: opts.outputDir ? expandPath(opts.outputDir) : getConfiguredOutputRoot(settings.output_dir),
    mirrorRoot: opts.end4Dir ? expandPath(opts.end4Dir) : getDefaultMirrorRoot(settings.end4_dir),
    fallbackImage: opts.image ?? settings.fallback_image,
    iconSearch: { iconDirs: settings.icon_dirs, extensions: settings.icon_extensions },
    mode: { dryRun: Boolean(opts.dryRun), force: Boolean(opts.force) },
    onProgress: (event) => {
      if (!verbose) return;
      if (event.type === "stdout" || event.type === "stderr") {
        output.log("detail", event.data.trimEnd());
      }
    },
  };
}

function parseOptions(program: Command, argv: string[]): CliOptions | number {
  try {
    program.parse(argv, { from: "user" });
    const opts = program.opts<CliOptions>();
    const actions = [opts.gen, opts.ungen, opts.genAll, opts.listApps].filter(
      (selected) => selected !== undefined && selected !== false
    );
    if (actions.length === 0) {
      program.outputHelp();
      return EXIT_NO_ACTION;
    }
    if (actions.length > 1) {
      program.error("Choose only one action at a time.", { exitCode: EXIT_NO_ACTION });
    }
    return opts;
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }
}

/** Parse `argv` (without the node and script entries) and run one action. Returns the exit code. */
export async function run(argv: string[], overrides: Partial<CliDeps> = {}): Promise<number> {
  const deps: CliDeps = { ...DEFAULT_DEPS, ...overrides };
  const program = buildProgram(deps);

  const parsed = parseOptions(program, argv);
  if (typeof parsed === "number") {
    return parsed;
  }
  const opts = parsed;

  const output = deps.createOutput(Boolean(opts.verbose));
  try {
    const loaded = deps.loadConfig(opts.config ? expandPath(opts.config) : undefined);
    for (const configError of loaded.errors) {
      output.log("warn", formatConfigError(configError));
    }
    const apps = deps.discover({ desktopDirs: loaded.config.settings.desktop_dirs });
    const ctx = buildContext(opts, loaded.config, deps, output);

    if (opts.listApps) {
      output.log("info", `Detected applications: ${apps.length}`);
      for (const app of apps) {
        output.log("plain", `- ${app.displayName} (${app.identity}) [${app.iconToken ? "icon" : "no-icon"}]`);
      }
      return EXIT_OK;
    }
    if (opts.gen !== undefined) {
      return await runGen(opts.gen, apps, ctx, opts, output);
    }
    if (opts.ungen !== undefined) {
      return runUngen(opts.ungen, apps, ctx, opts, output);
    }
    return await runGenAll(apps, ctx, opts, output);
  } finally {
    await output.flush();
  }
}
