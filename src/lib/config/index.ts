export { ConfigSchema, SettingsSchema, PaletteToolSchema } from "./schema.js";
export type { AppTintConfig, Settings, PaletteToolConfig } from "./schema.js";
export { loadConfig, getConfigPath, formatConfigError } from "./loader.js";
export type { LoadConfigResult, ConfigLoadError } from "./loader.js";
export { deepMerge } from "./merge.js";
export {
  expandPath,
  getConfigDir,
  getStateDir,
  getDefaultStatePath,
  getConfiguredOutputRoot,
  getDefaultOutputRoot,
  getDefaultMirrorRoot,
} from "./path.js";
