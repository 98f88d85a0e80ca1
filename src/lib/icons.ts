import { existsSync } from "fs";
import { join } from "path";
import { expandPath } from "./config/path.js";
import { DEFAULT_ICON_DIRS, DEFAULT_ICON_EXTENSIONS } from "./config/schema.js";
import { ProfileError } from "./errors.js";

export interface IconSearchOptions {
  iconDirs: string[];
  extensions: string[];
}

export const DEFAULT_ICON_SEARCH: IconSearchOptions = {
  iconDirs: DEFAULT_ICON_DIRS,
  extensions: DEFAULT_ICON_EXTENSIONS,
};

/**
 * An icon token that is already a path is used as-is. Otherwise each icon
 * directory is probed with each extension in order; first hit wins.
 */
export function resolveIconSource(
  iconToken: string,
  options: IconSearchOptions = DEFAULT_ICON_SEARCH
): string | null {
  if (!iconToken) return null;
  if (existsSync(iconToken)) return iconToken;

  for (const dir of options.iconDirs) {
    const iconDir = expandPath(dir);
    if (!existsSync(iconDir)) continue;
    for (const ext of options.extensions) {
      const candidate = join(iconDir, `${iconToken}${ext}`);
      if (existsSync(candidate)) return candidate;
    }
  }
  return null;
}

export function resolveSourceImage(
  iconToken: string,
  fallbackImage: string | undefined,
  options: IconSearchOptions = DEFAULT_ICON_SEARCH
): string {
  const icon = resolveIconSource(iconToken, options);
  if (icon) return icon;

  const fallback = fallbackImage ? expandPath(fallbackImage) : "";
  if (!fallback || !existsSync(fallback)) {
    throw new ProfileError(
      "INPUT_RESOLUTION",
      "Could not resolve a valid icon/image source. Use --image with a path to any wallpaper/icon image."
    );
  }
  return fallback;
}
