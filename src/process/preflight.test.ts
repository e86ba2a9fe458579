import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { PrerequisiteError } from "../errors.js";
import { createLogger, MemoryTransport } from "../logging/index.js";
import type { CommandResult, CommandRunner } from "./exec.js";
import { PrerequisiteChecker } from "./preflight.js";

function result(partial: Partial<CommandResult>): CommandResult {
  return { success: true, stdout: "", stderr: "", exitCode: 0, timedOut: false, durationMs: 5, ...partial };
}

describe("PrerequisiteChecker", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "fleet-preflight-test-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function checker(runner: CommandRunner) {
    const memory = new MemoryTransport();
    const { logger } = createLogger({}, { transports: [memory] });
    return { checker: new PrerequisiteChecker({ logger, runner }), memory };
  }

  it("passes when every tool answers and every path exists", async () => {
    const varFile = join(dir, "staging.tfvars");
    await writeFile(varFile, "instance_type = \"t3.small\"\n");
    const runner = vi.fn<CommandRunner>(async () => result({}));
    const { checker: preflight, memory } = checker(runner);

    await preflight.check({
      tools: [
        { bin: "terraform", args: ["version"] },
        { bin: "ansible-playbook", args: ["--version"] },
      ],
      paths: [dir, varFile],
    });

    expect(runner.mock.calls.map(([bin, args]) => [bin, ...args])).toEqual([
      ["terraform", "version"],
      ["ansible-playbook", "--version"],
    ]);
    expect(memory.messages("info")).toContain("All prerequisites met");
  });

  it("reports every missing tool and path in one error", async () => {
    const runner: CommandRunner = async (bin) =>
      bin === "terraform"
        ? result({ success: false, exitCode: null, stderr: "spawn terraform ENOENT" })
        : result({ success: false, exitCode: 3 });
    const { checker: preflight } = checker(runner);
    const missingFile = join(dir, "prod.tfvars");

    const error = await preflight
      .check({
        tools: [
          { bin: "terraform", args: ["version"] },
          { bin: "ansible-playbook", args: ["--version"] },
        ],
        paths: [missingFile],
      })
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(PrerequisiteError);
    expect(error).toMatchObject({
      code: "PREREQUISITE_MISSING",
      missing: [
        "terraform (not found on PATH)",
        "ansible-playbook (`ansible-playbook --version` failed: exit code 3)",
        `${missingFile} (not found)`,
      ],
    });
  });

  it("names a tool that timed out", async () => {
    const runner: CommandRunner = async () => result({ success: false, exitCode: null, timedOut: true });
    const { checker: preflight } = checker(runner);

    await expect(preflight.check({ tools: [{ bin: "terraform", args: ["version"] }], paths: [] })).rejects.toThrow(
      "Missing prerequisites: terraform (`terraform version` failed: timed out)",
    );
  });
});
