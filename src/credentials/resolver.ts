/**
 * Credential Resolver
 *
 * Merges the configured sources in fixed precedence order
 * (cli > env > file > parameter-store). A lower source only fills keys that
 * are still empty. Values are registered with the logger's redactor as soon
 * as they resolve and are never logged.
 */

import { access } from "node:fs/promises";
import { homedir } from "node:os";
import { join } from "node:path";
import { ArgumentError, CredentialError } from "../errors.js";
import type { Logger } from "../logging/index.js";
import {
  CREDENTIAL_SOURCE_PRECEDENCE,
  type CredentialEntry,
  type CredentialSourceKind,
} from "../types.js";
import { DEFAULT_CREDENTIAL_CATALOG, findDefinition, type CredentialDefinition } from "./catalog.js";
import { Credentials } from "./credentials.js";
import type { IdentityVerifier } from "./identity.js";
import { ParameterStoreSource } from "./parameter-store.js";
import {
  EnvironmentSource,
  OverrideSource,
  SecretsFileSource,
  type CredentialSource,
} from "./sources.js";

export type CredentialResolverOptions = {
  logger: Logger;
  catalog?: readonly CredentialDefinition[];
  /** Catalog keys that must resolve in addition to the catalog's own. */
  required?: readonly string[];
  /** Checks the resolved cloud keys; skipped when absent. */
  identityVerifier?: IdentityVerifier;
  fileExists?: (path: string) => Promise<boolean>;
  homeDir?: string;
};

async function defaultFileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/** Expand a leading `~` to the home directory. */
export function expandHome(path: string, home: string = homedir()): string {
  if (path === "~") return home;
  if (path.startsWith("~/")) return join(home, path.slice(2));
  return path;
}

function precedenceOf(kind: CredentialSourceKind): number {
  return CREDENTIAL_SOURCE_PRECEDENCE.indexOf(kind);
}

export class CredentialResolver {
  private readonly catalog: readonly CredentialDefinition[];
  private readonly logger: Logger;

  constructor(private readonly options: CredentialResolverOptions) {
    this.catalog = options.catalog ?? DEFAULT_CREDENTIAL_CATALOG;
    this.logger = options.logger.child("credentials");
  }

  async resolve(sources: readonly CredentialSource[]): Promise<Credentials> {
    const ordered = [...sources].sort((a, b) => precedenceOf(a.kind) - precedenceOf(b.kind));
    const found = new Map<string, { value: string; provenance: CredentialSourceKind }>();
    const values = new Map<string, string>();

    for (const source of ordered) {
      const supplied = await source.load(this.catalog, values);
      for (const def of this.catalog) {
        const value = supplied[def.key];
        if (!value || found.has(def.key)) continue;
        found.set(def.key, { value, provenance: source.kind });
        values.set(def.key, value);
        if (def.secure) this.logger.redactValues([value]);
      }
    }

    const required = new Set(this.options.required ?? []);
    const entries: CredentialEntry[] = [];
    const missing: string[] = [];

    for (const def of this.catalog) {
      const hit = found.get(def.key);
      if (hit) {
        const value = def.kind === "path" ? expandHome(hit.value, this.options.homeDir) : hit.value;
        entries.push({ key: def.key, value, provenance: hit.provenance, secure: def.secure });
      } else if (def.default !== undefined) {
        entries.push({ key: def.key, value: def.default, provenance: "default", secure: def.secure });
      } else if (def.required || required.has(def.key)) {
        missing.push(def.key);
      } else {
        this.logger.warn(`Optional credential ${def.key} is not set`, { key: def.key });
        entries.push({ key: def.key, value: "", provenance: "unset", secure: def.secure });
      }
    }

    if (missing.length > 0) {
      for (const key of missing) {
        this.logger.error(`Required credential ${key} was not found`, { key });
      }
      throw new CredentialError("Missing", missing[0] ?? "");
    }

    const fileExists = this.options.fileExists ?? defaultFileExists;
    for (const entry of entries) {
      const def = findDefinition(this.catalog, entry.key);
      if (def?.kind !== "path" || entry.value === "") continue;
      if (!(await fileExists(entry.value))) {
        throw new CredentialError("Invalid", entry.key, `file not found: ${entry.value}`);
      }
    }

    const credentials = new Credentials(entries);
    this.logger.info("Credentials resolved", { provenance: credentials.toJSON() });

    if (this.options.identityVerifier) {
      const identity = await this.options.identityVerifier.verify(credentials);
      this.logger.info(`Cloud identity verified (account ${identity.accountId})`, {
        accountId: identity.accountId,
      });
    }

    return credentials;
  }
}

// ── Source assembly ─────────────────────────────────────────────

export type SourceSettings = {
  overrides: Readonly<Record<string, string>>;
  files: readonly string[];
  parameterNamespace: string;
  logger: Logger;
  env?: NodeJS.ProcessEnv;
  region?: string;
  catalog?: readonly CredentialDefinition[];
};

/** Override keys must be catalog keys, env names or aliases. */
export function assertKnownCredentialKeys(
  overrides: Readonly<Record<string, string>>,
  catalog: readonly CredentialDefinition[] = DEFAULT_CREDENTIAL_CATALOG,
): void {
  const unknown = Object.keys(overrides).filter((name) => !findDefinition(catalog, name));
  if (unknown.length > 0) {
    throw new ArgumentError(
      `Unknown credential key${unknown.length > 1 ? "s" : ""}: ${unknown.join(", ")}`,
      unknown,
    );
  }
}

/** Build the sources named by a request. */
export function createCredentialSources(
  kinds: readonly CredentialSourceKind[],
  settings: SourceSettings,
): CredentialSource[] {
  assertKnownCredentialKeys(settings.overrides, settings.catalog);

  const logger = settings.logger.child("credentials");
  return [...new Set(kinds)].map((kind): CredentialSource => {
    switch (kind) {
      case "cli":
        return new OverrideSource(settings.overrides);
      case "env":
        return new EnvironmentSource(settings.env);
      case "file":
        return new SecretsFileSource(settings.files, logger);
      case "parameter-store":
        return new ParameterStoreSource({
          namespace: settings.parameterNamespace,
          region: settings.region,
          logger,
        });
    }
  });
}

// ── Tool exports ────────────────────────────────────────────────

/** Environment variables handed to the provisioning tool. */
export function provisioningEnvironment(
  credentials: Credentials,
  catalog: readonly CredentialDefinition[] = DEFAULT_CREDENTIAL_CATALOG,
): Record<string, string> {
  const env: Record<string, string> = {};
  for (const def of catalog) {
    if (def.exportEnv && credentials.has(def.key)) env[def.exportEnv] = credentials.get(def.key);
  }
  return env;
}

/** Playbook variables for the given credential keys, under their playbook names. */
export function playbookVariables(
  credentials: Credentials,
  keys: Iterable<string>,
  catalog: readonly CredentialDefinition[] = DEFAULT_CREDENTIAL_CATALOG,
): Record<string, string> {
  const vars: Record<string, string> = {};
  for (const key of keys) {
    if (!credentials.has(key)) continue;
    const def = findDefinition(catalog, key);
    vars[def?.ansibleVar ?? key] = credentials.get(key);
  }
  return vars;
}
