/**
 * Prerequisite checks run before a run changes anything: the external tools
 * answer a version query and the directories and files the run reads exist.
 */

import { access } from "node:fs/promises";
import { PrerequisiteError } from "../errors.js";
import type { Logger } from "../logging/index.js";
import { execCommand, type CommandRunner } from "./exec.js";

export type ToolRequirement = {
  bin: string;
  /** Cheap invocation that succeeds when the tool is usable, e.g. `version`. */
  args: readonly string[];
};

export type Prerequisites = {
  tools: readonly ToolRequirement[];
  paths: readonly string[];
};

export type PrerequisiteCheckerOptions = {
  logger: Logger;
  runner?: CommandRunner;
  timeoutMs?: number;
};

export class PrerequisiteChecker {
  private readonly logger: Logger;
  private readonly runner: CommandRunner;

  constructor(private readonly options: PrerequisiteCheckerOptions) {
    this.logger = options.logger.child("preflight");
    this.runner = options.runner ?? execCommand;
  }

  /** Check everything and report every missing item in one error. */
  async check(prerequisites: Prerequisites): Promise<void> {
    const missing: string[] = [];

    for (const tool of prerequisites.tools) {
      const result = await this.runner(tool.bin, tool.args, {
        cwd: process.cwd(),
        timeoutMs: this.options.timeoutMs ?? 30_000,
      });
      if (result.success) {
        this.logger.debug(`${tool.bin} found`);
      } else if (result.exitCode === null && !result.timedOut) {
        missing.push(`${tool.bin} (not found on PATH)`);
      } else {
        const reason = result.timedOut ? "timed out" : `exit code ${result.exitCode ?? "unknown"}`;
        missing.push(`${tool.bin} (\`${[tool.bin, ...tool.args].join(" ")}\` failed: ${reason})`);
      }
    }

    for (const path of prerequisites.paths) {
      try {
        await access(path);
      } catch {
        missing.push(`${path} (not found)`);
      }
    }

    if (missing.length > 0) {
      const error = new PrerequisiteError(missing);
      this.logger.error(error.message);
      throw error;
    }
    this.logger.info("All prerequisites met");
  }
}
