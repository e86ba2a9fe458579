/**
 * Credential Resolver Tests
 */

import { describe, it, expect, vi } from "vitest";
import { CredentialError, ArgumentError } from "../errors.js";
import { createLogger, MemoryTransport } from "../logging/index.js";
import type { CredentialSourceKind } from "../types.js";
import type { CredentialDefinition } from "./catalog.js";
import type { IdentityVerifier } from "./identity.js";
import {
  CredentialResolver,
  createCredentialSources,
  expandHome,
  playbookVariables,
  provisioningEnvironment,
} from "./resolver.js";
import type { CredentialSource } from "./sources.js";

class StaticSource implements CredentialSource {
  readonly seen: Array<ReadonlyMap<string, string>> = [];

  constructor(
    readonly kind: CredentialSourceKind,
    private readonly values: Record<string, string>,
  ) {}

  async load(
    _catalog: readonly CredentialDefinition[],
    resolved: ReadonlyMap<string, string>,
  ): Promise<Record<string, string>> {
    this.seen.push(new Map(resolved));
    return this.values;
  }
}

const REQUIRED = {
  aws_access_key_id: "test-access-key",
  aws_secret_access_key: "test-secret",
  ssh_private_key_path: "/keys/deploy.pem",
};

function setup(options: { verifier?: IdentityVerifier; exists?: boolean; required?: string[] } = {}) {
  const memory = new MemoryTransport();
  const { logger } = createLogger({ level: "trace" }, { transports: [memory] });
  const resolver = new CredentialResolver({
    logger,
    identityVerifier: options.verifier,
    required: options.required,
    fileExists: async () => options.exists ?? true,
    homeDir: "/home/tester",
  });
  return { memory, logger, resolver };
}

describe("CredentialResolver", () => {
  // ── Precedence ──────────────────────────────────────────────

  it("keeps the higher-precedence value when two sources define a key", async () => {
    const { resolver } = setup();
    const env = new StaticSource("env", { ...REQUIRED, github_token: "from-env" });
    const file = new StaticSource("file", { github_token: "from-file" });

    const creds = await resolver.resolve([file, env]);

    expect(creds.get("github_token")).toBe("from-env");
    expect(creds.provenanceOf("github_token")).toBe("env");
  });

  it("lets a lower source fill keys the higher ones left empty", async () => {
    const { resolver } = setup();
    const cli = new StaticSource("cli", REQUIRED);
    const store = new StaticSource("parameter-store", { jira_api_token: "test-jira-token" });

    const creds = await resolver.resolve([cli, store]);

    expect(creds.get("jira_api_token")).toBe("test-jira-token");
    expect(creds.provenanceOf("jira_api_token")).toBe("parameter-store");
    expect(creds.provenanceOf("aws_access_key_id")).toBe("cli");
  });

  it("hands values found so far to later sources", async () => {
    const { resolver } = setup();
    const env = new StaticSource("env", REQUIRED);
    const store = new StaticSource("parameter-store", {});

    await resolver.resolve([store, env]);

    expect(store.seen[0]?.get("aws_access_key_id")).toBe("test-access-key");
  });

  it("treats empty strings as absent", async () => {
    const { resolver } = setup();
    const cli = new StaticSource("cli", { ...REQUIRED, github_token: "" });
    const env = new StaticSource("env", { github_token: "from-env" });

    const creds = await resolver.resolve([cli, env]);

    expect(creds.provenanceOf("github_token")).toBe("env");
  });

  // ── Defaults and absence ────────────────────────────────────

  it("applies catalog defaults when no source has a value", async () => {
    const { resolver } = setup();
    const creds = await resolver.resolve([new StaticSource("env", REQUIRED)]);

    expect(creds.get("aws_region")).toBe("us-east-1");
    expect(creds.provenanceOf("aws_region")).toBe("default");
    expect(creds.get("smtp_port")).toBe("587");
  });

  it("marks missing optional secrets unset and warns by name", async () => {
    const { resolver, memory } = setup();
    const creds = await resolver.resolve([new StaticSource("env", REQUIRED)]);

    expect(creds.get("docker_hub_token")).toBe("");
    expect(creds.has("docker_hub_token")).toBe(false);
    expect(creds.provenanceOf("docker_hub_token")).toBe("unset");
    expect(memory.messages("warn")).toContain("Optional credential docker_hub_token is not set");
  });

  it("throws Missing for the first absent required key", async () => {
    const { resolver } = setup();
    const source = new StaticSource("env", { aws_secret_access_key: "test-secret" });

    const err = await resolver.resolve([source]).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(CredentialError);
    expect(err).toMatchObject({ kind: "Missing", key: "aws_access_key_id", code: "CREDENTIAL_MISSING" });
  });

  it("honours extra required keys from configuration", async () => {
    const { resolver } = setup({ required: ["github_token"] });

    await expect(resolver.resolve([new StaticSource("env", REQUIRED)])).rejects.toMatchObject({
      kind: "Missing",
      key: "github_token",
    });
  });

  // ── Path validation ─────────────────────────────────────────

  it("throws Invalid when a path secret names no file", async () => {
    const { resolver } = setup({ exists: false });

    await expect(resolver.resolve([new StaticSource("env", REQUIRED)])).rejects.toMatchObject({
      kind: "Invalid",
      key: "ssh_private_key_path",
      message: 'Credential "ssh_private_key_path" is invalid: file not found: /keys/deploy.pem',
    });
  });

  it("expands ~ in path secrets", async () => {
    const { resolver } = setup();
    const creds = await resolver.resolve([
      new StaticSource("env", { ...REQUIRED, ssh_private_key_path: "~/.ssh/deploy.pem" }),
    ]);

    expect(creds.get("ssh_private_key_path")).toBe("/home/tester/.ssh/deploy.pem");
  });

  // ── Secrecy ─────────────────────────────────────────────────

  it("masks secure values in subsequent log output", async () => {
    const { resolver, logger, memory } = setup();
    await resolver.resolve([new StaticSource("env", REQUIRED)]);

    logger.info("secret is test-secret", { value: "test-access-key" });

    const last = memory.entries.at(-1);
    expect(last?.message).toBe("secret is [REDACTED]");
    expect(last?.metadata).toEqual({ value: "[REDACTED]" });
  });

  it("logs provenance without values", async () => {
    const { resolver, memory } = setup();
    await resolver.resolve([new StaticSource("env", REQUIRED)]);

    const entry = memory.entries.find((e) => e.message === "Credentials resolved");
    expect(entry?.metadata?.provenance).toMatchObject({ aws_access_key_id: "env", aws_region: "default" });
    expect(JSON.stringify(memory.entries)).not.toContain("test-access-key");
  });

  // ── Identity ────────────────────────────────────────────────

  it("verifies the cloud identity once credentials resolve", async () => {
    const verify = vi.fn().mockResolvedValue({ accountId: "123456789012", arn: "arn:test" });
    const { resolver, memory } = setup({ verifier: { verify } });

    await resolver.resolve([new StaticSource("env", REQUIRED)]);

    expect(verify).toHaveBeenCalledTimes(1);
    expect(memory.messages("info")).toContain("Cloud identity verified (account 123456789012)");
  });

  it("propagates identity failures", async () => {
    const verify = vi.fn().mockRejectedValue(new CredentialError("Invalid", "aws_access_key_id", "denied"));
    const { resolver } = setup({ verifier: { verify } });

    await expect(resolver.resolve([new StaticSource("env", REQUIRED)])).rejects.toMatchObject({
      kind: "Invalid",
      key: "aws_access_key_id",
    });
  });
});

describe("createCredentialSources", () => {
  const { logger } = createLogger({}, { transports: [] });

  it("builds one source per requested kind", () => {
    const sources = createCredentialSources(["parameter-store", "cli", "env", "cli"], {
      overrides: {},
      files: [],
      parameterNamespace: "/devops",
      logger,
    });

    expect(sources.map((s) => s.kind)).toEqual(["parameter-store", "cli", "env"]);
  });

  it("rejects override keys outside the catalog", () => {
    expect(() =>
      createCredentialSources(["cli"], {
        overrides: { not_a_secret: "x", AWS_ACCESS_KEY_ID: "y" },
        files: [],
        parameterNamespace: "/devops",
        logger,
      }),
    ).toThrow(ArgumentError);
  });
});

describe("tool exports", () => {
  it("maps credentials to provisioning env vars and playbook vars", async () => {
    const { resolver } = setup();
    const creds = await resolver.resolve([
      new StaticSource("env", { ...REQUIRED, github_token: "test-gh-token" }),
    ]);

    expect(provisioningEnvironment(creds)).toEqual({
      AWS_ACCESS_KEY_ID: "test-access-key",
      AWS_SECRET_ACCESS_KEY: "test-secret",
      AWS_DEFAULT_REGION: "us-east-1",
    });
    expect(playbookVariables(creds, ["aws_access_key_id", "github_token", "docker_hub_token"])).toEqual({
      aws_access_key: "test-access-key",
      github_token: "test-gh-token",
    });
  });

  it("expands only a leading tilde", () => {
    expect(expandHome("~/a", "/h")).toBe("/h/a");
    expect(expandHome("/x/~/a", "/h")).toBe("/x/~/a");
  });
});
