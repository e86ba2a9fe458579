/**
 * Provisioning Driver
 *
 * Drives the declarative infra tool through init → plan → apply → output.
 * Apply only runs when the plan reports pending changes, so applying an
 * unchanged configuration is a no-op that still returns the targets.
 */

import { rm } from "node:fs/promises";
import { join } from "node:path";
import type { FleetConfig, TargetDefinition } from "../config/index.js";
import { provisioningEnvironment, type Credentials } from "../credentials/index.js";
import { ProvisionError, type ProvisionErrorKind, type ProvisionStage } from "../errors.js";
import type { Logger } from "../logging/index.js";
import { resultTail, type CommandRunner } from "../process/exec.js";
import type { ProvisionedTarget } from "../types.js";
import {
  isStateLockError,
  parsePlanSummary,
  parseStateList,
  tfApply,
  tfDestroy,
  tfInit,
  tfOutput,
  tfPlan,
  tfStateList,
  type PlanSummary,
  type TfCliOptions,
  type TfCliResult,
  type TfVarFlags,
} from "./cli-wrapper.js";
import { parseOutputJson, targetsFromOutputs } from "./outputs.js";

// ── Types ───────────────────────────────────────────────────────

export type ProvisionRequest = {
  environment: string;
  sizing: Readonly<Record<string, string>>;
  credentials: Credentials;
  /** Overrides the configured var file. */
  varFile?: string;
};

export type PlanReport = {
  /** True when the plan exited 2. */
  changes: boolean;
  summary: PlanSummary | null;
  outputTail: string[];
};

export type ApplyOptions = {
  /** Asked before applying a plan that has changes; false leaves everything as is. */
  approve?: (report: PlanReport) => Promise<boolean>;
};

export type ApplyResult =
  | { status: "applied" | "unchanged"; report: PlanReport; targets: ProvisionedTarget[] }
  | { status: "declined"; report: PlanReport };

export interface ProvisioningDriver {
  apply(request: ProvisionRequest, options?: ApplyOptions): Promise<ApplyResult>;
  plan(request: ProvisionRequest): Promise<PlanReport>;
  outputs(request: ProvisionRequest): Promise<ProvisionedTarget[]>;
  destroy(request: ProvisionRequest): Promise<void>;
  planDestroy(request: ProvisionRequest): Promise<PlanReport>;
  listResources(request: ProvisionRequest): Promise<string[]>;
}

export type TerraformDriverOptions = {
  terraform: FleetConfig["terraform"];
  targets: readonly TargetDefinition[];
  logger: Logger;
  runner?: CommandRunner;
};

// ── Terraform ───────────────────────────────────────────────────

export class TerraformProvisioningDriver implements ProvisioningDriver {
  private readonly logger: Logger;

  constructor(private readonly options: TerraformDriverOptions) {
    this.logger = options.logger.child("provisioning");
  }

  async apply(request: ProvisionRequest, options: ApplyOptions = {}): Promise<ApplyResult> {
    const cli = this.cliOptions(request);
    await this.init(cli);

    const planFile = `.fleet-${request.environment}.tfplan`;
    try {
      const report = await this.runPlan(cli, { ...this.varFlags(request), out: planFile });
      if (!report.changes) {
        this.logger.info("No infrastructure changes; skipping apply");
        return { status: "unchanged", report, targets: await this.readTargets(cli) };
      }

      if (options.approve && !(await options.approve(report))) {
        this.logger.warn("Apply declined; infrastructure left unchanged");
        return { status: "declined", report };
      }

      this.logger.info("Applying plan", { summary: report.summary });
      const applied = await tfApply(cli, planFile);
      if (!applied.success) throw this.failure("ApplyFailed", "apply", applied);

      return { status: "applied", report, targets: await this.readTargets(cli) };
    } finally {
      await rm(join(this.options.terraform.dir, planFile), { force: true });
    }
  }

  async plan(request: ProvisionRequest): Promise<PlanReport> {
    const cli = this.cliOptions(request);
    await this.init(cli);
    return this.runPlan(cli, this.varFlags(request));
  }

  async outputs(request: ProvisionRequest): Promise<ProvisionedTarget[]> {
    const cli = this.cliOptions(request);
    await this.init(cli);
    return this.readTargets(cli);
  }

  async destroy(request: ProvisionRequest): Promise<void> {
    const cli = this.cliOptions(request);
    await this.init(cli);

    this.logger.info("Destroying infrastructure", { environment: request.environment });
    const result = await tfDestroy(cli, this.varFlags(request));
    if (result.success) return;

    if (isStateLockError(result)) throw this.failure("DestroyFailed", "destroy", result);
    const remaining = await this.stateList(cli);
    throw new ProvisionError({
      kind: "DestroyFailed",
      stage: "destroy",
      exitCode: result.exitCode,
      lastOutputLines: resultTail(result),
      timedOut: result.timedOut,
      remainingResources: remaining ?? undefined,
    });
  }

  async planDestroy(request: ProvisionRequest): Promise<PlanReport> {
    const cli = this.cliOptions(request);
    await this.init(cli);
    return this.runPlan(cli, { ...this.varFlags(request), destroy: true });
  }

  async listResources(request: ProvisionRequest): Promise<string[]> {
    const cli = this.cliOptions(request);
    await this.init(cli);
    const result = await tfStateList(cli);
    if (!result.success) throw this.failure("OutputFailed", "state", result);
    return parseStateList(result.stdout);
  }

  // ── Steps ─────────────────────────────────────────────────────

  private async init(cli: TfCliOptions): Promise<void> {
    this.logger.info("Initializing working directory", { dir: cli.cwd });
    const result = await tfInit(cli, {
      upgrade: this.options.terraform.upgrade,
      backendConfig: this.options.terraform.backendConfig,
    });
    if (!result.success) throw this.failure("InitFailed", "init", result);
  }

  private async runPlan(cli: TfCliOptions, flags: Parameters<typeof tfPlan>[1]): Promise<PlanReport> {
    const result = await tfPlan(cli, flags);
    if (result.exitCode !== 0 && result.exitCode !== 2) {
      throw this.failure("PlanFailed", "plan", result);
    }
    const report: PlanReport = {
      changes: result.exitCode === 2,
      summary: parsePlanSummary(result.stdout),
      outputTail: resultTail(result, 5),
    };
    this.logger.info(report.changes ? "Plan has changes" : "Plan has no changes", {
      summary: report.summary,
    });
    return report;
  }

  private async readTargets(cli: TfCliOptions): Promise<ProvisionedTarget[]> {
    const result = await tfOutput(cli);
    if (!result.success) throw this.failure("OutputFailed", "output", result);
    const targets = targetsFromOutputs(parseOutputJson(result.stdout), this.options.targets);
    for (const target of targets) {
      this.logger.info(`Target ${target.name} (${target.role}) at ${target.address}`);
    }
    return targets;
  }

  /** Resources left in state; null when even listing fails. */
  private async stateList(cli: TfCliOptions): Promise<string[] | null> {
    const result = await tfStateList(cli);
    if (!result.success) {
      this.logger.warn("Could not list remaining resources after failed destroy");
      return null;
    }
    const remaining = parseStateList(result.stdout);
    this.logger.error(`${remaining.length} resources remain in state`, { resources: remaining });
    return remaining;
  }

  // ── Helpers ───────────────────────────────────────────────────

  private cliOptions(request: ProvisionRequest): TfCliOptions {
    return {
      cwd: this.options.terraform.dir,
      terraformBin: this.options.terraform.bin,
      timeoutMs: this.options.terraform.commandTimeoutMs,
      runner: this.options.runner,
      env: {
        ...provisioningEnvironment(request.credentials),
        TF_VAR_environment: request.environment,
      },
    };
  }

  private varFlags(request: ProvisionRequest): TfVarFlags {
    return {
      vars: { ...request.sizing },
      varFile: request.varFile ?? this.options.terraform.varFile,
    };
  }

  private failure(kind: ProvisionErrorKind, stage: ProvisionStage, result: TfCliResult): ProvisionError {
    const lastOutputLines = resultTail(result);
    if (isStateLockError(result)) {
      return new ProvisionError({ kind: "Locked", stage: "locked", exitCode: result.exitCode, lastOutputLines });
    }
    return new ProvisionError({
      kind,
      stage,
      exitCode: result.exitCode,
      lastOutputLines,
      timedOut: result.timedOut,
    });
  }
}
