/**
 * Configuration Loading Tests
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { ArgumentError } from "../errors.js";
import { environmentSettings, loadConfig, parseConfig, resolveConfigPaths } from "./loader.js";
import type { FleetConfigInput } from "./schema.js";

function minimal(overrides: Partial<FleetConfigInput> = {}): FleetConfigInput {
  return {
    terraform: { dir: "infra/terraform" },
    ansible: { dir: "infra/ansible", playbooks: [{ file: "playbooks/setup.yml", hosts: "app" }] },
    targets: [{ role: "app", name: "app-server", group: "app", addressOutput: "app_public_ip" }],
    ...overrides,
  };
}

describe("parseConfig", () => {
  it("fills defaults for timeouts, probes and sources", () => {
    const config = parseConfig(minimal());

    expect(config.readiness).toEqual({
      timeoutMs: 300_000,
      intervalMs: 10_000,
      settleMs: 45_000,
      attemptTimeoutMs: 5_000,
    });
    expect(config.targets[0]?.probe).toEqual({ type: "tcp", port: 22 });
    expect(config.credentials.sources).toEqual(["cli", "env", "file", "parameter-store"]);
    expect(config.credentials.parameterNamespace).toBe("/devops");
    expect(config.terraform.commandTimeoutMs).toBe(1_800_000);
    expect(config.ansible.user).toBe("ec2-user");
  });

  it("rejects playbooks aimed at unknown groups", () => {
    const raw = minimal({
      ansible: { dir: "a", playbooks: [{ file: "setup.yml", hosts: "web" }] },
    });

    try {
      parseConfig(raw);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ArgumentError);
      expect(err).toMatchObject({ issues: ['ansible.playbooks.0.hosts: unknown target group "web"'] });
    }
  });

  it("rejects duplicate target names", () => {
    const target = { role: "app", name: "app-server", group: "app", addressOutput: "app_public_ip" };
    expect(() => parseConfig(minimal({ targets: [target, { ...target, role: "ci" }] }))).toThrow(
      /duplicate target name "app-server"/,
    );
  });
});

describe("resolveConfigPaths", () => {
  it("resolves relative paths against the config directory", () => {
    const config = resolveConfigPaths(
      parseConfig(minimal({ credentials: { files: [".env", "/etc/fleet/secrets"] } })),
      "/srv/fleet",
    );

    expect(config.terraform.dir).toBe("/srv/fleet/infra/terraform");
    expect(config.ansible.dir).toBe("/srv/fleet/infra/ansible");
    expect(config.credentials.files).toEqual(["/srv/fleet/.env", "/etc/fleet/secrets"]);
    expect(config.state.file).toBe("/srv/fleet/.fleet-bootstrap/state.db");
  });

  it("keeps the in-memory state marker", () => {
    const config = resolveConfigPaths(parseConfig(minimal({ state: { file: ":memory:" } })), "/srv");
    expect(config.state.file).toBe(":memory:");
  });
});

describe("loadConfig", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "fleet-config-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("reads, validates and resolves a file", async () => {
    const path = join(dir, "fleet.config.json");
    await writeFile(path, JSON.stringify(minimal()));

    const config = await loadConfig(path);

    expect(config.terraform.dir).toBe(join(dir, "infra/terraform"));
  });

  it("reports malformed JSON as an argument error", async () => {
    const path = join(dir, "fleet.config.json");
    await writeFile(path, "{ not json");

    await expect(loadConfig(path)).rejects.toBeInstanceOf(ArgumentError);
  });

  it("reports a missing file as an argument error", async () => {
    await expect(loadConfig(join(dir, "absent.json"))).rejects.toThrow(/Cannot read configuration file/);
  });
});

describe("environmentSettings", () => {
  const config = parseConfig(
    minimal({
      sizing: { instance_type: "t3.micro", volume_size: "20" },
      environments: { production: { sizing: { instance_type: "t3.large" }, varFile: "prod.tfvars" } },
    }),
  );

  it("overlays environment sizing on shared sizing", () => {
    expect(environmentSettings(config, "production")).toEqual({
      sizing: { instance_type: "t3.large", volume_size: "20" },
      varFile: "prod.tfvars",
    });
  });

  it("rejects environments that are not listed", () => {
    expect(() => environmentSettings(config, "staging")).toThrow(
      'Unknown environment "staging" (configured: production)',
    );
  });

  it("does not treat inherited object keys as environments", () => {
    expect(() => environmentSettings(config, "constructor")).toThrow(
      'Unknown environment "constructor" (configured: production)',
    );
    expect(() => environmentSettings(config, "toString")).toThrow(ArgumentError);
  });

  it("accepts any environment when none are listed", () => {
    expect(environmentSettings(parseConfig(minimal()), "staging")).toEqual({ sizing: {}, varFile: undefined });
  });
});
