/**
 * Shared command-line options and their validation.
 */

import { InvalidArgumentError, Option, type Command } from "commander";
import { z, type ZodType, type ZodTypeDef } from "zod";
import { DEFAULT_CONFIG_FILE } from "../config/index.js";
import { ArgumentError } from "../errors.js";
import { LOG_LEVELS } from "../logging/index.js";

/** Commander collector for repeatable `key=value` options. */
export function collectPair(value: string, previous: Record<string, string>): Record<string, string> {
  const index = value.indexOf("=");
  if (index <= 0) throw new InvalidArgumentError(`expected key=value, got "${value}"`);
  return { ...previous, [value.slice(0, index)]: value.slice(index + 1) };
}

export function addCommonOptions(command: Command): Command {
  return command
    .option("-e, --env <name>", "target environment", "staging")
    .option("-c, --config <path>", "configuration file", DEFAULT_CONFIG_FILE)
    .option("--dry-run", "report what would happen without changing anything")
    .option("--force", "DANGEROUS: skip every typed confirmation")
    .option("--credential <key=value>", "credential override, highest precedence (repeatable)", collectPair, {})
    .option("--var <key=value>", "sizing variable for the provisioning tool (repeatable)", collectPair, {})
    .addOption(new Option("--log-level <level>", "minimum log level").choices(LOG_LEVELS));
}

const pairsSchema = z.record(z.string(), z.string());

export const commonOptionsSchema = z.object({
  env: z.string(),
  config: z.string(),
  dryRun: z.boolean().default(false),
  force: z.boolean().default(false),
  credential: pairsSchema.default({}),
  var: pairsSchema.default({}),
  logLevel: z.enum(["trace", "debug", "info", "warn", "error", "fatal"]).optional(),
});

export const upOptionsSchema = commonOptionsSchema.extend({
  skipProvision: z.boolean().default(false),
  skipConfigure: z.boolean().default(false),
});

export const downOptionsSchema = commonOptionsSchema.extend({
  deleteStorage: z.boolean().default(false),
});

export type CommonOptions = z.infer<typeof commonOptionsSchema>;
export type UpOptions = z.infer<typeof upOptionsSchema>;
export type DownOptions = z.infer<typeof downOptionsSchema>;

/** Validate parsed option values. */
export function parseOptions<T>(schema: ZodType<T, ZodTypeDef, unknown>, values: unknown): T {
  const result = schema.safeParse(values);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `--${i.path.join(".")}: ${i.message}`);
    throw new ArgumentError(`Invalid options: ${issues.join("; ")}`, issues);
  }
  return result.data;
}
