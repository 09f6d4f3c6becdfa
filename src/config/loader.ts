// Config loader: reads <config-root>/daily-by-hostname/config.yaml when present.
// The file is never written; the unit file pair stays the only persisted state.
// A broken file is reported and ignored so the run path keeps working from a timer.
import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { parse as parseYaml } from "yaml";
import type { EnvironmentSnapshot } from "../types/env.js";
import { DEFAULT_CONFIG, ToolConfigSchema, type ToolConfig } from "./schema.js";
import { logger } from "../logger.js";

export const CONFIG_PATH_ENV = "DAILY_BY_HOSTNAME_CONFIG";

export interface ConfigResult {
  config: ToolConfig;
  configPath: string;
  fromFile: boolean;
}

/** $XDG_CONFIG_HOME when set, otherwise ~/.config. */
export function userConfigRoot(env: EnvironmentSnapshot): string {
  const xdg = env.vars.XDG_CONFIG_HOME;
  return xdg ? xdg : join(env.homeDir, ".config");
}

export function defaultConfigPath(env: EnvironmentSnapshot): string {
  return env.vars[CONFIG_PATH_ENV] ?? join(userConfigRoot(env), "daily-by-hostname", "config.yaml");
}

export async function loadConfig(env: EnvironmentSnapshot): Promise<ConfigResult> {
  const configPath = defaultConfigPath(env);

  let raw: string;
  try {
    raw = await readFile(configPath, "utf-8");
  } catch (err) {
    logger.debug({ configPath, error: err }, "No config file, using defaults");
    return { config: DEFAULT_CONFIG, configPath, fromFile: false };
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(raw);
  } catch (err) {
    logger.warn({ configPath, error: err }, "Failed to parse config, using defaults");
    return { config: DEFAULT_CONFIG, configPath, fromFile: false };
  }

  // An empty YAML document parses to null
  const result = ToolConfigSchema.safeParse(parsed ?? {});
  if (!result.success) {
    logger.warn({ configPath, issues: result.error.issues }, "Invalid config, using defaults");
    return { config: DEFAULT_CONFIG, configPath, fromFile: false };
  }

  logger.debug({ configPath }, "Configuration loaded");
  return { config: result.data, configPath, fromFile: true };
}
