import { copyFileSync, existsSync, mkdirSync, rmSync } from "fs";
import { dirname, join } from "path";
import { APP_DIR_NAME } from "./config/path.js";
import { errorMessage, ProfileError } from "./errors.js";
import { isStrictlyWithin, pruneEmptyDirsSync } from "./fs-utils.js";
import { DEFAULT_ICON_SEARCH, resolveSourceImage, type IconSearchOptions } from "./icons.js";
import { matchApplication } from "./matcher.js";
import type { PaletteTool, ProgressEvent } from "./palette-tool.js";
import { normalizeProfileKey, type ProfileRecord, type ProfileStore } from "./state.js";
import type {
  ApplicationEntry,
  BatchEvent,
  BatchSummary,
  ExecutionMode,
  GenerationOutcome,
  GenerationResult,
} from "./types.js";

export const COLORS_FILE = "colors.json";

export interface LifecycleContext {
  store: ProfileStore;
  paletteTool: PaletteTool;
  /** Parent of every per-application output directory. */
  outputRoot: string;
  /** Root that receives mirrored palettes; null disables mirroring. */
  mirrorRoot: string | null;
  /** Removal refuses to touch output directories outside this root. Null skips the check. */
  managedRoot: string | null;
  fallbackImage?: string;
  iconSearch?: IconSearchOptions;
  mode: ExecutionMode;
  onProgress?: (event: ProgressEvent) => void;
}

export type RemovalOutcome =
  | { status: "removed" | "planned"; profileKey: string; record: ProfileRecord; matchMiss?: string }
  | { status: "absent"; matchMiss?: string };

export function profileKeyFor(app: ApplicationEntry): string {
  return normalizeProfileKey(app.identity || app.displayName);
}

export function mirrorPathFor(mirrorRoot: string, profileKey: string): string {
  return join(mirrorRoot, APP_DIR_NAME, "apps", profileKey, COLORS_FILE);
}

function toRecord(app: ApplicationEntry, result: GenerationResult): ProfileRecord {
  const record: ProfileRecord = {
    name: app.displayName,
    desktop_id: app.identity,
    output_dir: result.outputDirectory,
    source_image: result.sourceImage,
  };
  if (result.mirrorPath) {
    record.end4_json_path = result.mirrorPath;
  }
  return record;
}

function mirrorColors(colorsJsonPath: string, mirrorRoot: string, profileKey: string): string {
  const target = mirrorPathFor(mirrorRoot, profileKey);
  if (!isStrictlyWithin(mirrorRoot, target)) {
    throw new ProfileError("SAFETY_VIOLATION", `Computed mirror path is unsafe: ${target}`);
  }
  mkdirSync(dirname(target), { recursive: true });
  copyFileSync(colorsJsonPath, target);
  return target;
}

/**
 * Generate one application's profile. Already-recorded applications are
 * skipped unless `mode.force` is set; dry runs resolve everything but touch
 * neither the filesystem nor the store.
 */
export async function generateProfile(
  app: ApplicationEntry,
  ctx: LifecycleContext
): Promise<GenerationOutcome> {
  const profileKey = profileKeyFor(app);
  if (!ctx.mode.force && ctx.store.getProfile(profileKey)) {
    return { status: "skipped", app, profileKey };
  }

  await ctx.paletteTool.ensureAvailable();
  const sourceImage = resolveSourceImage(app.iconToken, ctx.fallbackImage, ctx.iconSearch ?? DEFAULT_ICON_SEARCH);
  const outputDirectory = join(ctx.outputRoot, profileKey);
  const colorsFile = join(outputDirectory, COLORS_FILE);
  const result: GenerationResult = {
    profileKey,
    outputDirectory,
    sourceImage,
    command: ctx.paletteTool.buildCommand(sourceImage),
    colorsJsonPath: null,
    mirrorPath: null,
  };

  if (ctx.mode.dryRun) {
    return { status: "planned", app, result };
  }

  mkdirSync(outputDirectory, { recursive: true });
  await ctx.paletteTool.run(sourceImage, outputDirectory, ctx.onProgress);

  if (existsSync(colorsFile)) {
    result.colorsJsonPath = colorsFile;
    if (ctx.mirrorRoot) {
      result.mirrorPath = mirrorColors(colorsFile, ctx.mirrorRoot, profileKey);
    }
  }

  ctx.store.recordProfile(profileKey, toRecord(app, result));
  return { status: "recorded", app, result };
}

/**
 * Generate every application in order. A failure is recorded and the batch
 * moves on to the next application.
 */
export async function generateAll(
  apps: readonly ApplicationEntry[],
  ctx: LifecycleContext,
  onEvent: (event: BatchEvent) => void = () => {}
): Promise<BatchSummary> {
  const summary: BatchSummary = { succeeded: 0, failed: 0, skipped: 0, failures: [] };

  for (const [index, app] of apps.entries()) {
    onEvent({ type: "start", app, index, total: apps.length });
    try {
      const outcome = await generateProfile(app, ctx);
      if (outcome.status === "skipped") {
        summary.skipped += 1;
        onEvent({ type: "skip", app });
      } else {
        summary.succeeded += 1;
        onEvent({ type: "ok", app });
      }
    } catch (error) {
      const message = errorMessage(error);
      summary.failed += 1;
      summary.failures.push({ app, message });
      onEvent({ type: "fail", app, message });
    }
  }

  return summary;
}

function resolveRemovalKey(
  query: string,
  ctx: LifecycleContext,
  apps: readonly ApplicationEntry[],
  exact: boolean
): { profileKey?: string; matchMiss?: string } {
  const direct = ctx.store.findProfileKey(query);
  if (direct) {
    return { profileKey: direct };
  }
  try {
    return { profileKey: profileKeyFor(matchApplication(query, apps, exact)) };
  } catch (error) {
    return { matchMiss: errorMessage(error) };
  }
}

/**
 * Remove a recorded profile and the files it produced. Every target is
 * checked against its root before anything is deleted.
 */
export function removeProfile(
  query: string,
  ctx: LifecycleContext,
  apps: readonly ApplicationEntry[] = [],
  exact = false
): RemovalOutcome {
  const { profileKey, matchMiss } = resolveRemovalKey(query, ctx, apps, exact);
  const record = profileKey ? ctx.store.getProfile(profileKey) : undefined;
  if (!profileKey || !record) {
    return { status: "absent", matchMiss };
  }

  const outputDir = record.output_dir && existsSync(record.output_dir) ? record.output_dir : null;
  const mirrorFile = record.end4_json_path && existsSync(record.end4_json_path) ? record.end4_json_path : null;

  if (outputDir && ctx.managedRoot && !isStrictlyWithin(ctx.managedRoot, outputDir)) {
    throw new ProfileError("SAFETY_VIOLATION", `Refusing to remove unmanaged path: ${outputDir}`);
  }
  if (mirrorFile && ctx.mirrorRoot && !isStrictlyWithin(ctx.mirrorRoot, mirrorFile)) {
    throw new ProfileError("SAFETY_VIOLATION", `Refusing to remove unmanaged path: ${mirrorFile}`);
  }

  if (ctx.mode.dryRun) {
    return { status: "planned", profileKey, record, matchMiss };
  }

  if (outputDir) {
    rmSync(outputDir, { recursive: true, force: true });
  }
  if (mirrorFile) {
    rmSync(mirrorFile, { force: true });
    pruneEmptyDirsSync(dirname(mirrorFile), 2);
  }
  ctx.store.removeProfile(profileKey);
  return { status: "removed", profileKey, record, matchMiss };
}
