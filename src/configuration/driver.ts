/**
 * Configuration Driver
 *
 * Runs the convergence tool's playbooks against provisioned targets, one
 * playbook at a time. Secrets reach the tool only through a vars file that
 * is readable by the owner alone and removed as soon as the playbook exits.
 */

import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { FleetConfig, PlaybookDefinition, TargetDefinition } from "../config/index.js";
import { playbookVariables, type Credentials } from "../credentials/index.js";
import { ConfigError } from "../errors.js";
import type { Logger } from "../logging/index.js";
import { execCommand, resultTail, type CommandResult, type CommandRunner } from "../process/exec.js";
import type { ProvisionedTarget } from "../types.js";
import { renderInventory } from "./inventory.js";

export type ConfigureOptions = {
  dryRun?: boolean;
};

export type PlaybookRun = {
  file: string;
  status: "applied" | "syntax-checked";
  durationMs: number;
};

export type ConfigureReport = {
  playbooks: PlaybookRun[];
};

export interface ConfigurationDriver {
  configure(
    targets: readonly ProvisionedTarget[],
    credentials: Credentials,
    playbooks: readonly PlaybookDefinition[],
    options?: ConfigureOptions,
  ): Promise<ConfigureReport>;
}

export type AnsibleDriverOptions = {
  ansible: FleetConfig["ansible"];
  /** Target definitions, for the address variables they export. */
  definitions: readonly TargetDefinition[];
  logger: Logger;
  runner?: CommandRunner;
  /** Parent of the private temp directory (default: the OS temp dir). */
  tempRoot?: string;
};

/**
 * Host the tool reported as failing: `fatal: [host]`, an UNREACHABLE line,
 * or a recap line with failures.
 */
export function failingHost(output: string): string | undefined {
  const fatal = /fatal: \[([^\]]+)\]/.exec(output);
  if (fatal) return fatal[1];
  const unreachable = /\[([^\]]+)\][^\n]*UNREACHABLE!/.exec(output);
  if (unreachable) return unreachable[1];
  const recap = /^(\S+)\s+:\s+ok=\d+\s+changed=\d+\s+unreachable=(\d+)\s+failed=(\d+)/m;
  for (const line of output.split(/\r?\n/)) {
    const match = recap.exec(line);
    if (match && (match[2] !== "0" || match[3] !== "0")) return match[1];
  }
  return undefined;
}

export class AnsibleConfigurationDriver implements ConfigurationDriver {
  private readonly logger: Logger;
  private readonly runner: CommandRunner;

  constructor(private readonly options: AnsibleDriverOptions) {
    this.logger = options.logger.child("configuration");
    this.runner = options.runner ?? execCommand;
  }

  async configure(
    targets: readonly ProvisionedTarget[],
    credentials: Credentials,
    playbooks: readonly PlaybookDefinition[],
    options: ConfigureOptions = {},
  ): Promise<ConfigureReport> {
    const { ansible } = this.options;
    const keyPath = credentials.get("ssh_private_key_path");
    const dir = await mkdtemp(join(this.options.tempRoot ?? tmpdir(), "fleet-ansible-"));
    const report: ConfigureReport = { playbooks: [] };

    try {
      const inventory = join(dir, "inventory.ini");
      await writeFile(
        inventory,
        renderInventory(targets, { user: ansible.user, sshKeyPath: keyPath, sshCommonArgs: ansible.sshCommonArgs }),
        { mode: 0o600 },
      );

      for (const [index, playbook] of playbooks.entries()) {
        const scoped = playbook.hosts ? targets.filter((t) => t.group === playbook.hosts) : [...targets];
        const args = [playbook.file, "-i", inventory];
        if (playbook.hosts) args.push("--limit", playbook.hosts);

        if (options.dryRun) {
          const result = await this.run([...args, "--syntax-check"]);
          if (!result.success) throw this.failure(playbook, scoped, result);
          this.logger.info(`Syntax check passed for ${playbook.file}`);
          report.playbooks.push({ file: playbook.file, status: "syntax-checked", durationMs: result.durationMs });
          continue;
        }

        const varsFile = join(dir, `vars-${index + 1}.json`);
        await writeFile(varsFile, JSON.stringify(this.variables(targets, scoped, credentials), null, 2), {
          mode: 0o600,
        });
        if (keyPath) args.push("--private-key", keyPath);
        args.push("-e", `@${varsFile}`);

        this.logger.info(`Running ${playbook.file} on ${scoped.map((t) => t.name).join(", ") || "no hosts"}`);
        let result: CommandResult;
        try {
          result = await this.run(args);
        } finally {
          await rm(varsFile, { force: true });
        }
        if (!result.success) throw this.failure(playbook, scoped, result);

        this.logger.info(`${playbook.file} completed in ${Math.round(result.durationMs / 1000)}s`);
        report.playbooks.push({ file: playbook.file, status: "applied", durationMs: result.durationMs });
      }
    } finally {
      await rm(dir, { recursive: true, force: true });
    }

    return report;
  }

  /** Credentials for the scoped targets plus every exported address variable. */
  private variables(
    all: readonly ProvisionedTarget[],
    scoped: readonly ProvisionedTarget[],
    credentials: Credentials,
  ): Record<string, string> {
    const keys = new Set(scoped.flatMap((t) => t.credentialKeys));
    const vars = playbookVariables(credentials, keys);
    for (const def of this.options.definitions) {
      if (!def.addressVar) continue;
      const first = all.find((t) => t.role === def.role);
      if (first) vars[def.addressVar] = first.address;
    }
    return vars;
  }

  private run(args: string[]): Promise<CommandResult> {
    return this.runner(this.options.ansible.bin, args, {
      cwd: this.options.ansible.dir,
      env: { ANSIBLE_HOST_KEY_CHECKING: "False" },
      timeoutMs: this.options.ansible.commandTimeoutMs,
    });
  }

  private failure(
    playbook: PlaybookDefinition,
    scoped: readonly ProvisionedTarget[],
    result: Pick<CommandResult, "stdout" | "stderr" | "exitCode">,
  ): ConfigError {
    const host = failingHost(`${result.stdout}\n${result.stderr}`);
    const matched = host ? scoped.find((t) => t.name === host || t.address === host) : undefined;
    const target = matched?.address ?? host ?? scoped[0]?.address ?? "all";
    const error = new ConfigError(target, playbook.file, result.exitCode, resultTail(result));
    this.logger.error(error.message, { exitCode: result.exitCode });
    return error;
  }
}
