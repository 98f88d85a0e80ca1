import { z } from "zod";

// ─────────────────────────────────────────────────────────────────────────────
// Palette tool invocation
// ─────────────────────────────────────────────────────────────────────────────

export const PaletteToolSchema = z.object({
  command: z.string().min(1).default("matugen"),
  mode: z.enum(["dark", "light"]).default("dark"),
  json_format: z.string().min(1).default("hex"),
});

export type PaletteToolConfig = z.infer<typeof PaletteToolSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Settings
// ─────────────────────────────────────────────────────────────────────────────

export const DEFAULT_DESKTOP_DIRS = [
  "/usr/share/applications",
  "/usr/local/share/applications",
  "~/.local/share/applications",
  "~/.local/share/flatpak/exports/share/applications",
  "/var/lib/flatpak/exports/share/applications",
];

export const DEFAULT_ICON_DIRS = [
  "~/.local/share/icons",
  "~/.icons",
  "/usr/share/icons",
  "/usr/share/pixmaps",
];

export const DEFAULT_ICON_EXTENSIONS = [".png", ".svg", ".jpg", ".jpeg", ".webp"];

// zod v4 injects raw .default() values without re-parsing, so nested
// defaults are parsed up front.
const PALETTE_TOOL_DEFAULT = PaletteToolSchema.parse({});

export const SettingsSchema = z.object({
  output_dir: z.string().min(1).optional(),
  end4_dir: z.string().min(1).optional(),
  fallback_image: z.string().min(1).optional(),
  palette_tool: PaletteToolSchema.default(PALETTE_TOOL_DEFAULT),
  desktop_dirs: z.array(z.string().min(1)).default(DEFAULT_DESKTOP_DIRS),
  icon_dirs: z.array(z.string().min(1)).default(DEFAULT_ICON_DIRS),
  icon_extensions: z.array(z.string().regex(/^\.[A-Za-z0-9]+$/)).default(DEFAULT_ICON_EXTENSIONS),
});

export type Settings = z.infer<typeof SettingsSchema>;

const SETTINGS_DEFAULT = SettingsSchema.parse({});

export const ConfigSchema = z.object({
  settings: SettingsSchema.default(SETTINGS_DEFAULT),
});

export type AppTintConfig = z.infer<typeof ConfigSchema>;
