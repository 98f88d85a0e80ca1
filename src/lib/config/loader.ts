import { readFileSync, existsSync } from "fs";
import { join } from "path";
import { parse as parseYaml } from "yaml";
import { ConfigSchema, type AppTintConfig } from "./schema.js";
import { deepMerge, type JsonValue } from "./merge.js";
import { getConfigDir } from "./path.js";

export interface LoadConfigResult {
  config: AppTintConfig;
  configPath: string;
  errors: ConfigLoadError[];
}

export interface ConfigLoadError {
  source: string;
  message: string;
  path?: string[];
}

export function getConfigPath(): string {
  return join(getConfigDir(), "config.yaml");
}

function parseYamlFile(filePath: string): { data: Record<string, JsonValue>; errors: ConfigLoadError[] } {
  const errors: ConfigLoadError[] = [];
  try {
    const content = readFileSync(filePath, "utf-8");
    const data: unknown = parseYaml(content);
    if (data === null || data === undefined) {
      return { data: {}, errors };
    }
    if (typeof data !== "object" || Array.isArray(data)) {
      errors.push({
        source: filePath,
        message: "Config must be a YAML mapping (object), not a scalar or sequence",
      });
      return { data: {}, errors };
    }
    // YAML mappings only ever hold JSON-compatible values here.
    return { data: data as Record<string, JsonValue>, errors };
  } catch (error) {
    const msg = error instanceof Error ? error.message : String(error);
    errors.push({ source: filePath, message: msg });
    return { data: {}, errors };
  }
}

/**
 * Load and validate config from YAML files.
 * 1. Parse config.yaml (or provided path)
 * 2. If config.local.yaml exists beside the default path, deep-merge it
 * 3. Validate with zod schema, falling back to defaults on failure
 */
export function loadConfig(configPath?: string): LoadConfigResult {
  const path = configPath || getConfigPath();
  const allErrors: ConfigLoadError[] = [];

  if (!existsSync(path)) {
    return { config: ConfigSchema.parse({}), configPath: path, errors: [] };
  }

  const base = parseYamlFile(path);
  allErrors.push(...base.errors);
  let merged = base.data;

  if (!configPath) {
    const localPath = join(getConfigDir(), "config.local.yaml");
    if (existsSync(localPath)) {
      const local = parseYamlFile(localPath);
      allErrors.push(...local.errors);
      if (Object.keys(local.data).length > 0) {
        merged = deepMerge(merged, local.data);
      }
    }
  }

  const result = ConfigSchema.safeParse(merged);
  if (!result.success) {
    for (const issue of result.error.issues) {
      allErrors.push({
        source: path,
        message: issue.message,
        path: issue.path.map(String),
      });
    }
    return { config: ConfigSchema.parse({}), configPath: path, errors: allErrors };
  }

  return { config: result.data, configPath: path, errors: allErrors };
}

export function formatConfigError(error: ConfigLoadError): string {
  return error.path ? `${error.source}: ${error.path.join(".")}: ${error.message}` : `${error.source}: ${error.message}`;
}
