import { existsSync } from "fs";
import { homedir } from "os";
import { join } from "path";

export const APP_DIR_NAME = "apptint";
export const OUTPUT_DIR_ENV = "APPTINT_OUTPUT_DIR";
export const MIRROR_DIR_ENV = "APPTINT_END4_DIR";

export function expandPath(pathValue: string): string {
  if (pathValue === "~") return homedir();
  if (pathValue.startsWith("~/")) return join(homedir(), pathValue.slice(2));
  return pathValue;
}

export function getConfigDir(): string {
  const xdgConfig = process.env.XDG_CONFIG_HOME;
  const base = xdgConfig || join(homedir(), ".config");
  return join(base, APP_DIR_NAME);
}

export function getStateDir(): string {
  const xdgState = process.env.XDG_STATE_HOME;
  const base = xdgState || join(homedir(), ".local", "state");
  return join(base, APP_DIR_NAME);
}

export function getDefaultStatePath(): string {
  return join(getStateDir(), "state.json");
}

/** Environment override, or the output root set in config. Null when neither is set. */
export function getConfiguredOutputRoot(configured?: string): string | null {
  const override = process.env[OUTPUT_DIR_ENV];
  if (override) return expandPath(override);
  if (configured) return expandPath(configured);
  return null;
}

export function getDefaultOutputRoot(configured?: string): string {
  return getConfiguredOutputRoot(configured) ?? join(getConfigDir(), "generated");
}

/**
 * Mirror root for palette copies. Falls back to `~/.config/end-4`
 * only when that directory already exists.
 */
export function getDefaultMirrorRoot(configured?: string): string | null {
  const override = process.env[MIRROR_DIR_ENV];
  if (override) return expandPath(override);
  if (configured) return expandPath(configured);
  const candidate = join(homedir(), ".config", "end-4");
  return existsSync(candidate) ? candidate : null;
}
