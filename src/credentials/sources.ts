/**
 * Credential Sources
 *
 * Each source reports the catalog keys it can supply. Sources never decide
 * precedence; the resolver asks them in order and keeps the first value.
 */

import { readFile } from "node:fs/promises";
import { parse as parseIni } from "ini";
import { BootstrapError, formatErrorMessage } from "../errors.js";
import type { Logger } from "../logging/index.js";
import type { CredentialSourceKind } from "../types.js";
import { namesFor, type CredentialDefinition } from "./catalog.js";

export interface CredentialSource {
  readonly kind: CredentialSourceKind;
  /**
   * Values this source holds, keyed by catalog key. `resolved` carries the
   * values found so far by higher-precedence sources.
   */
  load(
    catalog: readonly CredentialDefinition[],
    resolved: ReadonlyMap<string, string>,
  ): Promise<Record<string, string>>;
}

/** Pick catalog values out of a flat name → value lookup. */
function collect(
  catalog: readonly CredentialDefinition[],
  lookup: (name: string) => string | undefined,
): Record<string, string> {
  const values: Record<string, string> = {};
  for (const def of catalog) {
    for (const name of namesFor(def)) {
      const value = lookup(name)?.trim();
      if (value) {
        values[def.key] = value;
        break;
      }
    }
  }
  return values;
}

// ── Command line ────────────────────────────────────────────────

export class OverrideSource implements CredentialSource {
  readonly kind = "cli";

  constructor(private readonly overrides: Readonly<Record<string, string>>) {}

  async load(catalog: readonly CredentialDefinition[]): Promise<Record<string, string>> {
    return collect(catalog, (name) => this.overrides[name]);
  }
}

// ── Environment ─────────────────────────────────────────────────

export class EnvironmentSource implements CredentialSource {
  readonly kind = "env";

  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  async load(catalog: readonly CredentialDefinition[]): Promise<Record<string, string>> {
    // Only the dedicated env name; catalog keys such as aws_region are too generic.
    const values: Record<string, string> = {};
    for (const def of catalog) {
      const value = this.env[def.env]?.trim();
      if (value) values[def.key] = value;
    }
    return values;
  }
}

// ── Local secrets files ─────────────────────────────────────────

/**
 * Parse `.env` / `terraform.tfvars` style text into a flat map. Section
 * headers, nested blocks and non-scalar values are ignored.
 */
export function parseSecretsFile(text: string): Map<string, string> {
  const parsed: Record<string, unknown> = parseIni(text);
  const values = new Map<string, string>();
  for (const [rawKey, value] of Object.entries(parsed)) {
    const key = rawKey.replace(/^export\s+/, "").trim();
    if (typeof value === "string") {
      values.set(key, value);
    } else if (typeof value === "number" || typeof value === "boolean") {
      values.set(key, String(value));
    }
  }
  return values;
}

function isMissingFile(err: unknown): boolean {
  return typeof err === "object" && err !== null && Reflect.get(err, "code") === "ENOENT";
}

export class SecretsFileSource implements CredentialSource {
  readonly kind = "file";

  /** Earlier files win over later ones. */
  constructor(
    private readonly paths: readonly string[],
    private readonly logger: Logger,
  ) {}

  async load(catalog: readonly CredentialDefinition[]): Promise<Record<string, string>> {
    const values: Record<string, string> = {};
    for (const path of this.paths) {
      let text: string;
      try {
        text = await readFile(path, "utf-8");
      } catch (err) {
        if (isMissingFile(err)) {
          this.logger.debug("Secrets file not found, skipping", { path });
          continue;
        }
        throw new BootstrapError(
          `Cannot read secrets file ${path}: ${formatErrorMessage(err)}`,
          "CREDENTIAL_INVALID",
          { cause: err },
        );
      }
      const parsed = parseSecretsFile(text);
      const found = collect(catalog, (name) => parsed.get(name));
      for (const [key, value] of Object.entries(found)) {
        values[key] ??= value;
      }
      this.logger.debug("Loaded secrets file", { path, keys: Object.keys(found) });
    }
    return values;
  }
}
