/**
 * Configuration Loading
 *
 * Reads `fleet.config.json`, validates it and resolves relative paths
 * against the directory holding the file.
 */

import { readFile } from "node:fs/promises";
import { dirname, isAbsolute, resolve } from "node:path";
import type { ZodIssue } from "zod";
import { ArgumentError, formatErrorMessage } from "../errors.js";
import { fleetConfigSchema, type FleetConfig } from "./schema.js";

export const DEFAULT_CONFIG_FILE = "fleet.config.json";

function formatIssue(issue: ZodIssue): string {
  const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
  return `${path}: ${issue.message}`;
}

/**
 * Validate a raw configuration object. Paths are left untouched.
 */
export function parseConfig(raw: unknown): FleetConfig {
  const result = fleetConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(formatIssue);
    throw new ArgumentError(`Invalid configuration:\n  ${issues.join("\n  ")}`, issues);
  }
  return result.data;
}

function resolveFrom(baseDir: string, path: string): string {
  return isAbsolute(path) ? path : resolve(baseDir, path);
}

/**
 * Resolve every filesystem path in the configuration against `baseDir`.
 */
export function resolveConfigPaths(config: FleetConfig, baseDir: string): FleetConfig {
  const environments: FleetConfig["environments"] = {};
  for (const [name, env] of Object.entries(config.environments)) {
    environments[name] = {
      ...env,
      varFile: env.varFile ? resolveFrom(baseDir, env.varFile) : undefined,
    };
  }

  return {
    ...config,
    terraform: {
      ...config.terraform,
      dir: resolveFrom(baseDir, config.terraform.dir),
      varFile: config.terraform.varFile ? resolveFrom(baseDir, config.terraform.varFile) : undefined,
    },
    ansible: {
      ...config.ansible,
      dir: resolveFrom(baseDir, config.ansible.dir),
    },
    credentials: {
      ...config.credentials,
      files: config.credentials.files.map((f) => resolveFrom(baseDir, f)),
    },
    state: { file: config.state.file === ":memory:" ? ":memory:" : resolveFrom(baseDir, config.state.file) },
    logging: {
      ...config.logging,
      file: config.logging.file ? resolveFrom(baseDir, config.logging.file) : undefined,
    },
    environments,
  };
}

/**
 * Load, validate and path-resolve a configuration file.
 */
export async function loadConfig(path: string = DEFAULT_CONFIG_FILE): Promise<FleetConfig> {
  const absolute = resolve(path);
  let text: string;
  try {
    text = await readFile(absolute, "utf-8");
  } catch (err) {
    throw new ArgumentError(`Cannot read configuration file ${absolute}: ${formatErrorMessage(err)}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ArgumentError(`Configuration file ${absolute} is not valid JSON: ${formatErrorMessage(err)}`);
  }

  return resolveConfigPaths(parseConfig(raw), dirname(absolute));
}

export type EnvironmentSettings = {
  sizing: Record<string, string>;
  varFile?: string;
};

/**
 * Settings for one environment: shared sizing overlaid with the environment's
 * own. When `environments` is non-empty the name must be listed.
 */
export function environmentSettings(config: FleetConfig, environment: string): EnvironmentSettings {
  const names = Object.keys(config.environments);
  const env = Object.hasOwn(config.environments, environment) ? config.environments[environment] : undefined;
  if (names.length > 0 && !env) {
    throw new ArgumentError(
      `Unknown environment "${environment}" (configured: ${names.join(", ")})`,
    );
  }
  return {
    sizing: { ...config.sizing, ...(env?.sizing ?? {}) },
    varFile: env?.varFile ?? config.terraform.varFile,
  };
}
