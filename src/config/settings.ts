/**
 * Settings and Configuration Manager
 * Loads systrack.yaml (or .json), validates it against the zod schema and
 * applies environment overrides.
 */

import fs from "fs";
import path from "path";
import YAML from "yaml";
import type { ZodTypeAny } from "zod";
import { ConfigError, describeError } from "../types/errors";
import {
  LogLevelSchema,
  SysTrackConfig,
  SysTrackConfigSchema,
  validateConfigSafe
} from "../types/schemas";

export const DEFAULT_CONFIG_FILE = "systrack.yaml";

export interface LoadOptions {
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

export function defaultConfig(): SysTrackConfig {
  return SysTrackConfigSchema.parse({});
}

export function parseConfigFile(filePath: string): SysTrackConfig {
  const raw = fs.readFileSync(filePath, "utf8");
  let data: unknown;
  try {
    data = filePath.endsWith(".json") ? JSON.parse(raw) : YAML.parse(raw);
  } catch (parseError) {
    throw new ConfigError(`Config parse error in ${filePath}: ${describeError(parseError)}`);
  }

  // An empty YAML document parses to null
  const result = validateConfigSafe(data ?? {});
  if (!result.success) {
    const issues = result.error.issues.map(issue => {
      const where = issue.path.length > 0 ? issue.path.join(".") : "root";
      return `${where}: ${issue.message}`;
    });
    throw new ConfigError(`Config validation failed for ${filePath}`, issues);
  }
  return result.data;
}

export function loadConfig(opts: LoadOptions = {}): SysTrackConfig {
  const env = opts.env ?? process.env;
  const cwd = opts.cwd ?? process.cwd();
  const explicit = opts.configPath ?? env.SYSTRACK_CONFIG;
  const p = path.resolve(cwd, explicit ?? DEFAULT_CONFIG_FILE);

  let config: SysTrackConfig;
  if (fs.existsSync(p)) {
    config = parseConfigFile(p);
  } else if (explicit) {
    throw new ConfigError(`Config file not found: ${p}`);
  } else {
    config = defaultConfig();
  }

  return applyEnvOverrides(config, env);
}

export function applyEnvOverrides(config: SysTrackConfig, env: NodeJS.ProcessEnv): SysTrackConfig {
  const reportsDir = env.SYSTRACK_REPORTS_DIR;
  const level = LogLevelSchema.safeParse(env.SYSTRACK_LOG_LEVEL);
  return {
    ...config,
    reports: reportsDir ? { ...config.reports, directory: reportsDir } : config.reports,
    logging: level.success ? { ...config.logging, level: level.data } : config.logging
  };
}

/** JSON Schema of the config file, for editors and external validation. */
export async function configJsonSchema(): Promise<object> {
  const { zodToJsonSchema } = await import("zod-to-json-schema");
  // Widened so the converter does not instantiate the full config type
  const schema: ZodTypeAny = SysTrackConfigSchema;
  return zodToJsonSchema(schema, "SysTrackConfig");
}

export class SettingsManager {
  private config: SysTrackConfig;

  constructor(initialConfig: SysTrackConfig = defaultConfig()) {
    this.config = initialConfig;
  }

  static load(opts: LoadOptions = {}): SettingsManager {
    return new SettingsManager(loadConfig(opts));
  }

  getConfig(): SysTrackConfig {
    return this.config;
  }

  updateConfig(updates: Partial<SysTrackConfig>): void {
    this.config = SysTrackConfigSchema.parse({ ...this.config, ...updates });
  }
}
