import { existsSync } from "fs";
import { homedir } from "os";
import { basename, extname, join } from "path";
import fg from "fast-glob";
import { expandPath } from "./config/path.js";
import { DEFAULT_DESKTOP_DIRS } from "./config/schema.js";
import { createApplicationEntry, readDesktopEntry } from "./desktop-entry.js";
import type { ApplicationEntry, Platform } from "./types.js";

export interface DiscoveryOptions {
  platform?: Platform;
  /** Structured-entry search roots, highest priority first. */
  desktopDirs?: string[];
  /** Roots holding `*.app` bundles. */
  bundleRoots?: string[];
  /** Roots searched recursively for `*.lnk` shortcuts. */
  shortcutRoots?: string[];
}

export function currentPlatform(): Platform {
  if (process.platform === "darwin") return "darwin";
  if (process.platform === "win32") return "win32";
  return "linux";
}

export function defaultBundleRoots(): string[] {
  return ["/Applications", join(homedir(), "Applications")];
}

export function defaultShortcutRoots(): string[] {
  const roots: string[] = [];
  const programData = process.env.PROGRAMDATA;
  const appData = process.env.APPDATA;
  if (programData) roots.push(join(programData, "Microsoft", "Windows", "Start Menu", "Programs"));
  if (appData) roots.push(join(appData, "Microsoft", "Windows", "Start Menu", "Programs"));
  return roots;
}

function listMatches(root: string, pattern: string, onlyDirectories: boolean): string[] {
  if (!existsSync(root)) return [];
  try {
    return fg
      .sync(pattern, {
        cwd: root,
        absolute: true,
        onlyFiles: !onlyDirectories,
        onlyDirectories,
        dot: true,
        unique: true,
        suppressErrors: true,
      })
      .sort();
  } catch {
    return [];
  }
}

function compareByName(left: ApplicationEntry, right: ApplicationEntry): number {
  const a = left.displayName.toLowerCase();
  const b = right.displayName.toLowerCase();
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/** First root to yield an identity wins; result sorted case-insensitively by name. */
function collect(entries: Iterable<ApplicationEntry>): ApplicationEntry[] {
  const byIdentity = new Map<string, ApplicationEntry>();
  for (const entry of entries) {
    if (!byIdentity.has(entry.identity)) {
      byIdentity.set(entry.identity, entry);
    }
  }
  return [...byIdentity.values()].sort(compareByName);
}

function* desktopEntries(dirs: string[]): Generator<ApplicationEntry> {
  for (const dir of dirs) {
    for (const file of listMatches(expandPath(dir), "*.desktop", false)) {
      const entry = readDesktopEntry(file);
      if (entry) yield entry;
    }
  }
}

function entryFromPath(path: string, extension: string): ApplicationEntry {
  const name = basename(path, extname(path));
  return createApplicationEntry({
    identity: `${name}${extension}`,
    displayName: name,
    sourceRecordPath: path,
  });
}

function* bundleEntries(roots: string[]): Generator<ApplicationEntry> {
  for (const root of roots) {
    for (const bundle of listMatches(root, "*.app", true)) {
      yield entryFromPath(bundle, ".app");
    }
  }
}

function* shortcutEntries(roots: string[]): Generator<ApplicationEntry> {
  for (const root of roots) {
    for (const shortcut of listMatches(root, "**/*.lnk", false)) {
      yield entryFromPath(shortcut, ".lnk");
    }
  }
}

/**
 * Enumerate installed applications for the current (or given) platform.
 * Missing roots and unreadable records are skipped; never throws.
 */
export function discoverApplications(options: DiscoveryOptions = {}): ApplicationEntry[] {
  const platform = options.platform ?? currentPlatform();
  if (platform === "darwin") {
    return collect(bundleEntries(options.bundleRoots ?? defaultBundleRoots()));
  }
  if (platform === "win32") {
    return collect(shortcutEntries(options.shortcutRoots ?? defaultShortcutRoots()));
  }
  return collect(desktopEntries(options.desktopDirs ?? DEFAULT_DESKTOP_DIRS));
}
