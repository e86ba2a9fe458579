/**
 * CLI Tests
 *
 * Runs whole invocations against fake tool runners and an in-process TCP
 * server standing in for the provisioned host.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { createServer, type AddressInfo, type Server } from "node:net";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { MemoryTransport } from "../logging/index.js";
import { InMemoryRunStateStore, fixedConfirm, type Confirm, type RunStateStore } from "../orchestrator/index.js";
import type { CommandResult, CommandRunner } from "../process/exec.js";
import { runCli } from "./program.js";
import type { CliRuntime } from "./runtime.js";

function result(exitCode: number, stdout = ""): CommandResult {
  return { success: exitCode === 0, stdout, stderr: "", exitCode, timedOut: false, durationMs: 10 };
}

describe("runCli", () => {
  let dir: string;
  let configPath: string;
  let server: Server;
  let calls: string[][];
  let ansibleReply: (args: readonly string[]) => CommandResult;
  let store: InMemoryRunStateStore;
  let memory: MemoryTransport;
  let out: string;
  let err: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "fleet-cli-test-"));
    const keyFile = join(dir, "deploy.pem");
    await writeFile(keyFile, "placeholder key\n");
    await mkdir(join(dir, "terraform"));
    await mkdir(join(dir, "ansible"));

    server = createServer((socket) => socket.end());
    await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
    const { port } = addressOf(server);

    configPath = join(dir, "fleet.config.json");
    await writeFile(
      configPath,
      JSON.stringify({
        terraform: { dir: join(dir, "terraform") },
        ansible: { dir: join(dir, "ansible"), playbooks: [{ file: "setup.yml", hosts: "app" }] },
        targets: [
          {
            role: "app",
            name: "app-server",
            group: "app",
            addressOutput: "app_public_ip",
            probe: { type: "tcp", port },
          },
        ],
        readiness: { settleMs: 0, intervalMs: 20, timeoutMs: 2_000, attemptTimeoutMs: 500 },
        verify: [{ name: "service", role: "app", probe: { type: "tcp", port } }],
        credentials: { sources: ["cli", "env"], files: [], verifyIdentity: false },
        state: { file: ":memory:" },
      }),
    );

    calls = [];
    ansibleReply = () => result(0);
    store = new InMemoryRunStateStore();
    memory = new MemoryTransport();
    out = "";
    err = "";
    process.env.FLEET_TEST_KEY = keyFile;
  });

  afterEach(async () => {
    delete process.env.FLEET_TEST_KEY;
    await new Promise<void>((resolve) => server.close(() => resolve()));
    await rm(dir, { recursive: true, force: true });
  });

  function addressOf(s: Server): AddressInfo {
    const address = s.address();
    if (address === null || typeof address === "string") throw new Error("server is not listening on TCP");
    return address;
  }

  const runner: CommandRunner = async (bin, args) => {
    calls.push([bin, ...args]);
    if (args[0] === "version" || args[0] === "--version") return result(0, `${bin} 1.0.0`);
    if (bin !== "terraform") return ansibleReply(args);
    switch (args[0]) {
      case "plan":
        return result(2, "Plan: 1 to add, 0 to change, 0 to destroy.");
      case "output":
        return result(0, JSON.stringify({ app_public_ip: { value: "127.0.0.1" } }));
      default:
        return result(0);
    }
  };

  function runtime(confirm: Confirm = fixedConfirm(true)): CliRuntime {
    const shared: RunStateStore = {
      load: (environment) => store.load(environment),
      save: (state) => store.save(state),
      clear: (environment) => store.clear(environment),
      close: async () => undefined,
    };
    return {
      writeOut: (text) => {
        out += text;
      },
      writeErr: (text) => {
        err += text;
      },
      transports: [memory],
      confirm,
      runner,
      env: {
        AWS_ACCESS_KEY_ID: "test-access-key",
        AWS_SECRET_ACCESS_KEY: "test-secret",
        SSH_KEY_PATH: process.env.FLEET_TEST_KEY,
      },
      openStore: async () => shared,
    };
  }

  function ran(tool: string, subcommand: string): boolean {
    return calls.some((call) => call[0] === tool && call[1] === subcommand);
  }

  it("brings an environment up and exits 0", async () => {
    const code = await runCli(["up", "--config", configPath], runtime());

    expect(code).toBe(0);
    expect(ran("terraform", "apply")).toBe(true);
    expect(ran("ansible-playbook", "setup.yml")).toBe(true);
    expect(memory.messages("info")).toContain("Deployment of staging complete");
    const saved = await store.load("staging");
    expect(saved?.phases.map((p) => p.outcome)).toEqual(["success", "success", "success", "success", "success"]);
    expect(saved?.targets[0]).toMatchObject({ address: "127.0.0.1", status: "ready" });
    expect(err).toBe("");
  });

  it("exits 1 with the failing playbook and a resume command", async () => {
    ansibleReply = () => ({ ...result(2, "fatal: [app-server]: FAILED! => {}"), success: false });

    const code = await runCli(["up", "--config", configPath], runtime());

    expect(code).toBe(1);
    expect(memory.messages("error")).toContain(
      "Failed(Configured): Playbook setup.yml failed on 127.0.0.1 (exit code 2)",
    );
    expect(err).toBe(`\nResume with:\n  fleet-bootstrap up --env staging --config ${configPath} --skip-provision\n`);
  });

  it("only plans and syntax-checks in dry-run", async () => {
    const code = await runCli(["up", "--config", configPath, "--dry-run"], runtime());

    expect(code).toBe(0);
    expect(ran("terraform", "plan")).toBe(true);
    expect(ran("terraform", "apply")).toBe(false);
    const playbookRuns = calls.filter((c) => c[0] === "ansible-playbook" && c[1] !== "--version");
    expect(playbookRuns.length).toBe(1);
    expect(playbookRuns[0]).toContain("--syntax-check");
    await expect(store.load("staging")).resolves.toBeNull();
  });

  it("cancels a destroy that was not confirmed and exits 0", async () => {
    const code = await runCli(["down", "--config", configPath], runtime(fixedConfirm(false)));

    expect(code).toBe(0);
    expect(ran("terraform", "destroy")).toBe(false);
    expect(memory.messages("warn")).toContain("Destroy of staging cancelled; nothing was changed");
  });

  it("destroys under --force", async () => {
    const code = await runCli(["down", "--config", configPath, "--force"], runtime(fixedConfirm(false)));

    expect(code).toBe(0);
    expect(ran("terraform", "destroy")).toBe(true);
  });

  it("exits 2 for a malformed --var", async () => {
    const code = await runCli(["up", "--config", configPath, "--var", "size"], runtime());

    expect(code).toBe(2);
    expect(err).toContain('expected key=value, got "size"');
    expect(calls).toEqual([]);
  });

  it("exits 2 for an unknown --credential key before running anything", async () => {
    const code = await runCli(["up", "--config", configPath, "--credential", "not_a_key=x"], runtime());

    expect(code).toBe(2);
    expect(err).toBe("Unknown credential key: not_a_key\n");
    expect(calls).toEqual([]);
    await expect(store.load("staging")).resolves.toBeNull();
  });

  it("rejects an unknown --credential key on down without prompting", async () => {
    const confirm = vi.fn<Confirm>(async () => true);

    const code = await runCli(["down", "--config", configPath, "--credential", "not_a_key=x"], runtime(confirm));

    expect(code).toBe(2);
    expect(confirm).not.toHaveBeenCalled();
    expect(ran("terraform", "destroy")).toBe(false);
  });

  it("exits 1 naming a provisioning tool that is not installed", async () => {
    const missing: CommandRunner = async (bin, args) =>
      bin === "terraform" && args[0] === "version"
        ? { ...result(1), success: false, exitCode: null, stderr: "spawn terraform ENOENT" }
        : runner(bin, args, { cwd: dir });

    const code = await runCli(["up", "--config", configPath], { ...runtime(), runner: missing });

    expect(code).toBe(1);
    expect(memory.messages("error")).toContain(
      "Failed(CredentialsResolved): Missing prerequisites: terraform (not found on PATH)",
    );
    expect(ran("terraform", "apply")).toBe(false);
  });

  it("exits 2 for an invalid environment name", async () => {
    const code = await runCli(["up", "--config", configPath, "--env", "bad env"], runtime());

    expect(code).toBe(2);
    expect(err).toBe('Invalid environment "bad env": use letters, digits, "-" and "_"\n');
  });

  it("exits 2 when the configuration file is missing", async () => {
    const code = await runCli(["up", "--config", join(dir, "missing.json")], runtime());

    expect(code).toBe(2);
    expect(err).toContain(`Cannot read configuration file ${join(dir, "missing.json")}`);
  });

  it("exits 2 for an unknown log level or command", async () => {
    await expect(runCli(["up", "--config", configPath, "--log-level", "loud"], runtime())).resolves.toBe(2);
    await expect(runCli(["deploy"], runtime())).resolves.toBe(2);
  });

  it("prints help with exit code 0 and marks --force as dangerous", async () => {
    const code = await runCli(["down", "--help"], runtime());

    expect(code).toBe(0);
    expect(out).toContain("--delete-storage");
    expect(out).toContain("DANGEROUS: skip every typed confirmation");
  });
});
