/**
 * Config loading: optional rescaffold.yaml, validated, with env overrides.
 */

import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import { ConfigError, formatError } from "../infra/errors.js";
import { RescaffoldConfigSchema, type RescaffoldConfig } from "./zod-schema.js";

export const CONFIG_FILENAME = "rescaffold.yaml";

const GO_ENV = "RESCAFFOLD_GO";
const GENERATOR_ENV = "RESCAFFOLD_GENERATOR";

export type LoadConfigOptions = {
  /** Explicit config path (--config); must exist when given */
  configPath?: string;
  /** Directory searched for rescaffold.yaml when no path is given */
  cwd: string;
  env?: NodeJS.ProcessEnv;
};

export function parseConfig(raw: unknown, source = "config"): RescaffoldConfig {
  const result = RescaffoldConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `  ${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("\n");
    throw new ConfigError(`Invalid ${source}:\n${issues}`);
  }
  return result.data;
}

function readConfigFile(file: string): unknown {
  let text: string;
  try {
    text = fs.readFileSync(file, "utf-8");
  } catch (err) {
    throw new ConfigError(`Cannot read config file ${file}: ${formatError(err)}`);
  }
  try {
    return YAML.parse(text);
  } catch (err) {
    throw new ConfigError(`Cannot parse config file ${file}: ${formatError(err)}`);
  }
}

function applyEnvOverrides(config: RescaffoldConfig, env: NodeJS.ProcessEnv): RescaffoldConfig {
  const go = env[GO_ENV]?.trim();
  const generator = env[GENERATOR_ENV]?.trim();
  if (!go && !generator) {
    return config;
  }
  return {
    ...config,
    toolchain: {
      ...config.toolchain,
      go: go || config.toolchain.go,
      generator: generator || config.toolchain.generator,
    },
  };
}

/**
 * Resolve the effective config.
 *
 * Priority: env overrides file; file overrides defaults.
 */
export function loadConfig(opts: LoadConfigOptions): RescaffoldConfig {
  const env = opts.env ?? process.env;
  let raw: unknown = {};
  let source = "defaults";

  if (opts.configPath) {
    const file = path.resolve(opts.cwd, opts.configPath);
    if (!fs.existsSync(file)) {
      throw new ConfigError(`Config file not found: ${file}`);
    }
    raw = readConfigFile(file);
    source = file;
  } else {
    const candidate = path.join(opts.cwd, CONFIG_FILENAME);
    if (fs.existsSync(candidate)) {
      raw = readConfigFile(candidate);
      source = candidate;
    }
  }

  return applyEnvOverrides(parseConfig(raw, source), env);
}
