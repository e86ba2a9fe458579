/**
 * Orchestrator
 *
 * Runs the `up` and `down` state machines over the components. It is the
 * only place that decides to abort: components throw, the orchestrator
 * records the phase, persists the run and reports how to resume.
 */

import type { FleetConfig } from "../config/index.js";
import { environmentSettings, type EnvironmentSettings } from "../config/loader.js";
import type { ConfigurationDriver } from "../configuration/index.js";
import type { Credentials } from "../credentials/index.js";
import { PhaseError, ProvisionError, formatErrorMessage, toBootstrapError } from "../errors.js";
import type { Logger } from "../logging/index.js";
import type { PrerequisiteChecker, Prerequisites, ToolRequirement } from "../process/preflight.js";
import type { ApplyResult, PlanReport, ProvisioningDriver, ProvisionRequest } from "../provisioning/index.js";
import type { ReadinessProber } from "../readiness/index.js";
import type { EnsureReport, StorageReconciler } from "../storage/index.js";
import type { HealthVerifier } from "../verification/index.js";
import type {
  DeploymentRequest,
  Phase,
  ProvisionedTarget,
  RunState,
  StorageHandle,
  TargetSnapshot,
} from "../types.js";
import type { Confirm } from "./confirm.js";
import type { RunStateStore } from "./run-state-store.js";
import { PHASE_STATES, RunStateMachine, type Clock } from "./state-machine.js";
import { COMMAND_NAME, describePlan, resumeCommand, summarizeTargets, type TargetSummary } from "./summary.js";

// =============================================================================
// Types
// =============================================================================

export type ExitCode = 0 | 1 | 2;

/** Resolves the credential set for one request. */
export interface CredentialProvider {
  /** Reject overrides the provider cannot map; throws ArgumentError. */
  validate(request: DeploymentRequest): void;
  resolve(request: DeploymentRequest): Promise<Credentials>;
}

export type ReadinessService = Pick<ReadinessProber, "waitReady">;
export type StorageService = Pick<StorageReconciler, "resolveHandle" | "ensure" | "destroy">;
export type VerificationService = Pick<HealthVerifier, "verify">;
export type PrerequisiteService = Pick<PrerequisiteChecker, "check">;

export type OrchestratorOptions = {
  config: FleetConfig;
  logger: Logger;
  credentials: CredentialProvider;
  preflight: PrerequisiteService;
  provisioner: ProvisioningDriver;
  prober: ReadinessService;
  configurator: ConfigurationDriver;
  verifier: VerificationService;
  storage: StorageService;
  store: RunStateStore;
  confirm: Confirm;
  clock?: Clock;
  /** Config path repeated in resume hints; omitted for the default file. */
  configPath?: string;
};

export type UpResult = {
  status: "done" | "failed" | "cancelled";
  /** Final machine state: `Done`, `Failed(Configured)`, ... */
  state: string;
  exitCode: ExitCode;
  run: RunState;
  targets: TargetSummary[];
  error?: PhaseError;
  resumeCommand?: string;
};

export type DownState = "Start" | "ConfirmedDestroy" | "Destroyed" | "StorageDeleted" | "Done";

export type DownResult = {
  status: "done" | "failed" | "cancelled";
  state: string;
  exitCode: ExitCode;
  /** `partial` when deletion started and then failed. */
  storage: "untouched" | "kept" | "deleted" | "partial" | "planned";
  /** Resources listed in dry-run, or left behind by a failed destroy. */
  resources: string[];
  error?: PhaseError;
};

export type StorageInitResult = {
  status: "done" | "failed";
  exitCode: ExitCode;
  handle?: StorageHandle;
  report?: EnsureReport;
  error?: PhaseError;
};

type PhaseOutput<T> = {
  value: T;
  detail: string;
  /** Record the phase as skipped even outside dry-run. */
  skipped?: boolean;
};

const NEXT_DOWN_STATE: Readonly<Record<DownState, DownState>> = {
  Start: "ConfirmedDestroy",
  ConfirmedDestroy: "Destroyed",
  Destroyed: "StorageDeleted",
  StorageDeleted: "Done",
  Done: "Done",
};

// =============================================================================
// Orchestrator
// =============================================================================

export class Orchestrator {
  private readonly logger: Logger;

  constructor(private readonly options: OrchestratorOptions) {
    this.logger = options.logger.child("orchestrator");
  }

  // ── up ────────────────────────────────────────────────────────

  async up(request: DeploymentRequest): Promise<UpResult> {
    const { config } = this.options;
    const settings = environmentSettings(config, request.environment);
    this.options.credentials.validate(request);
    const { dryRun } = request.flags;
    const machine = RunStateMachine.start(request.environment, { clock: this.options.clock });
    const log = this.logger.withContext({ environment: request.environment, runId: machine.runId });
    let targets: ProvisionedTarget[] = [];

    log.info(dryRun ? `Dry run of up for ${request.environment}` : `Bringing up ${request.environment}`);

    try {
      const credentials = await this.phase(machine, "credentials_resolved", dryRun, async () => {
        await this.options.preflight.check(this.prerequisites(request, settings));
        const resolved = await this.options.credentials.resolve(request);
        return { value: resolved, detail: `${resolved.keys().length} credentials resolved` };
      });

      const provisioned = await this.provision(machine, request, settings, credentials);
      if (provisioned === null) {
        log.warn("Apply declined; infrastructure left unchanged");
        return {
          status: "cancelled",
          state: machine.label(),
          exitCode: 0,
          run: machine.snapshot(),
          targets: [],
        };
      }
      targets = provisioned;
      machine.setTargets(targets);

      await this.phase(machine, "ready", dryRun, async () => {
        await this.options.prober.waitReady(targets, { ...config.readiness, dryRun });
        return {
          value: undefined,
          detail: dryRun ? `would wait for ${targets.length} targets` : `${targets.length} targets ready`,
        };
      });
      machine.setTargets(targets);

      if (request.flags.skipConfigure) {
        machine.skip("configured", "skipped by --skip-configure");
        log.info("Skipping configuration (--skip-configure)");
      } else {
        await this.phase(machine, "configured", dryRun, async () => {
          const report = await this.options.configurator.configure(
            targets,
            credentials,
            config.ansible.playbooks,
            { dryRun },
          );
          const verb = dryRun ? "syntax-checked" : "applied";
          return { value: report, detail: `${report.playbooks.length} playbooks ${verb}` };
        });
      }

      await this.phase(machine, "verified", dryRun, async () => {
        const report = await this.options.verifier.verify(targets, {
          intervalMs: config.readiness.intervalMs,
          attemptTimeoutMs: config.readiness.attemptTimeoutMs,
          dryRun,
        });
        if (dryRun) return { value: report, detail: `would run ${config.verify.length} checks` };
        const passed = report.results.filter((r) => r.passed).length;
        return { value: report, detail: `${passed}/${report.results.length} checks passed` };
      });

      await this.persist(machine, dryRun);
      const summary = summarizeTargets(targets, {
        user: config.ansible.user,
        keyPath: credentials.get("ssh_private_key_path") || undefined,
      });
      log.info(
        dryRun
          ? `Dry run of ${request.environment} complete; nothing was changed`
          : `Deployment of ${request.environment} complete`,
      );
      for (const line of summary) log.info(`  ${line.role} ${line.address}  ${line.ssh}`);
      return { status: "done", state: machine.label(), exitCode: 0, run: machine.snapshot(), targets: summary };
    } catch (err) {
      return this.upFailed(machine, request, targets, err);
    }
  }

  private async provision(
    machine: RunStateMachine,
    request: DeploymentRequest,
    settings: EnvironmentSettings,
    credentials: Credentials,
  ): Promise<ProvisionedTarget[] | null> {
    const { provisioner } = this.options;
    const { flags, environment } = request;
    const provisionRequest = this.provisionRequest(request, settings, credentials);

    if (flags.skipProvision) {
      const previous = await this.loadRunState(environment);
      const provisioned = previous?.phases.some((p) => p.phase === "provisioned" && p.outcome !== "failure");
      if (!provisioned) {
        this.logger.warn(`No earlier run of ${environment} recorded provisioning; reading current outputs`);
      }
      const recorded = previous ? this.restoreTargets(previous.targets) : [];

      return this.phase(machine, "provisioned", flags.dryRun, async () => {
        try {
          const targets = await provisioner.outputs(provisionRequest);
          return { value: targets, detail: `reused outputs for ${targets.length} targets`, skipped: true };
        } catch (err) {
          if (err instanceof ProvisionError && err.kind === "OutputFailed" && recorded.length > 0) {
            this.logger.warn(`Could not read outputs (${err.message}); using the ${recorded.length} recorded targets`);
            return { value: recorded, detail: `reused ${recorded.length} recorded targets`, skipped: true };
          }
          throw err;
        }
      });
    }

    if (flags.dryRun) {
      return this.phase(machine, "provisioned", true, async () => {
        await this.ensureStorage(environment, credentials, true);
        const report = await provisioner.plan(provisionRequest);
        return { value: await this.existingTargets(provisionRequest), detail: `plan ${describePlan(report)}` };
      });
    }

    machine.begin("provisioned");
    let result: ApplyResult;
    try {
      await this.ensureStorage(environment, credentials, false);
      result = await provisioner.apply(provisionRequest, {
        approve: flags.force ? undefined : (report) => this.approveApply(environment, report),
      });
    } catch (err) {
      throw this.phaseFailure(machine, "provisioned", err);
    }
    if (result.status === "declined") {
      machine.abandon("provisioned");
      return null;
    }
    machine.succeed(
      "provisioned",
      result.status === "applied" ? `applied: ${describePlan(result.report)}` : "no changes",
    );
    return result.targets;
  }

  /** Asks before applying a plan that destroys anything. */
  private async approveApply(environment: string, report: PlanReport): Promise<boolean> {
    const destroying = report.summary?.destroy ?? 0;
    if (destroying === 0) return true;
    this.logger.warn(`The plan for ${environment} destroys ${destroying} resource(s)`);
    return this.options.confirm(
      `Applying this plan destroys ${destroying} resource(s) in ${environment}.`,
      `apply ${environment}`,
    );
  }

  /** Targets from existing outputs, or none when nothing was applied yet. */
  private async existingTargets(request: ProvisionRequest): Promise<ProvisionedTarget[]> {
    try {
      return await this.options.provisioner.outputs(request);
    } catch (err) {
      if (err instanceof ProvisionError && err.kind === "OutputFailed") {
        this.logger.warn(`No existing outputs (${err.message}); later phases have no targets to list`);
        return [];
      }
      throw err;
    }
  }

  private async ensureStorage(environment: string, credentials: Credentials, dryRun: boolean): Promise<void> {
    if (!this.options.config.storage.ensureOnUp) return;
    const handle = await this.options.storage.resolveHandle(credentials, environment);
    const report = await this.options.storage.ensure(handle, credentials, { dryRun });
    this.logger.info(`State storage: bucket ${report.bucket}, lock table ${report.lockTable}`, {
      bucket: handle.bucket,
      lockTable: handle.lockTable,
    });
  }

  private async upFailed(
    machine: RunStateMachine,
    request: DeploymentRequest,
    targets: readonly ProvisionedTarget[],
    err: unknown,
  ): Promise<UpResult> {
    const error = err instanceof PhaseError ? err : new PhaseError(machine.label(), toBootstrapError(err));
    const state = machine.failedPhase ? machine.label() : `Failed(${machine.label()})`;
    machine.setTargets(targets);
    await this.persist(machine, request.flags.dryRun);

    this.reportFailure(state, error);
    const resume = resumeCommand(request.environment, machine.lastCompleted, this.options.configPath);
    this.logger.info(`Resume with: ${resume}`);

    return {
      status: "failed",
      state,
      exitCode: 1,
      run: machine.snapshot(),
      targets: summarizeTargets(targets, { user: this.options.config.ansible.user }),
      error,
      resumeCommand: resume,
    };
  }

  // ── down ──────────────────────────────────────────────────────

  async down(request: DeploymentRequest): Promise<DownResult> {
    const settings = environmentSettings(this.options.config, request.environment);
    const { dryRun, force, deleteStorage } = request.flags;
    const environment = request.environment;
    const { provisioner, storage, confirm } = this.options;
    this.options.credentials.validate(request);
    let state: DownState = "Start";
    let storageOutcome: DownResult["storage"] = "untouched";
    let resources: string[] = [];

    try {
      await this.options.preflight.check(this.prerequisites(request, settings));

      if (dryRun) {
        state = "ConfirmedDestroy";
        const credentials = await this.options.credentials.resolve(request);
        const provisionRequest = this.provisionRequest(request, settings, credentials);
        resources = await provisioner.listResources(provisionRequest);
        this.logger.info(`${resources.length} resources recorded in state for ${environment}`);
        for (const resource of resources) this.logger.info(`  ${resource}`);
        const plan = await provisioner.planDestroy(provisionRequest);
        this.logger.info(`Destroy plan: ${describePlan(plan)}`);
        if (deleteStorage) {
          const handle = await storage.resolveHandle(credentials, environment);
          await storage.destroy(handle, credentials, { dryRun: true });
        }
        this.logger.info(`Dry run of down for ${environment} complete; nothing was changed`);
        return { status: "done", state: "Done", exitCode: 0, storage: deleteStorage ? "planned" : "untouched", resources };
      }

      if (!force) {
        const confirmed = await confirm(
          `This destroys every resource in ${environment}. It cannot be undone.`,
          `destroy ${environment}`,
        );
        if (!confirmed) {
          this.logger.warn(`Destroy of ${environment} cancelled; nothing was changed`);
          return { status: "cancelled", state: "Start", exitCode: 0, storage: "untouched", resources: [] };
        }
      }
      state = "ConfirmedDestroy";

      const credentials = await this.options.credentials.resolve(request);
      await provisioner.destroy(this.provisionRequest(request, settings, credentials));
      state = "Destroyed";
      this.logger.info(`Infrastructure for ${environment} destroyed`);
      await this.clearRunState(environment);

      if (deleteStorage) {
        const confirmed =
          force ||
          (await confirm(
            `This permanently deletes the state bucket, lock table and stored secrets for ${environment}.`,
            `delete storage ${environment}`,
          ));
        if (confirmed) {
          const handle = await storage.resolveHandle(credentials, environment);
          storageOutcome = "partial";
          await storage.destroy(handle, credentials);
          state = "StorageDeleted";
          storageOutcome = "deleted";
        } else {
          this.logger.warn("Storage deletion cancelled; state storage kept");
          storageOutcome = "kept";
        }
      }

      return { status: "done", state: "Done", exitCode: 0, storage: storageOutcome, resources };
    } catch (err) {
      const error = new PhaseError(NEXT_DOWN_STATE[state], toBootstrapError(err));
      const failedState = `Failed(${error.phase})`;
      this.reportFailure(failedState, error);
      if (err instanceof ProvisionError && err.remainingResources) {
        resources = [...err.remainingResources];
        for (const resource of resources) this.logger.error(`  still in state: ${resource}`);
      }
      this.logger.info(`Re-run to retry: ${COMMAND_NAME} down --env ${environment}`);
      return { status: "failed", state: failedState, exitCode: 1, storage: storageOutcome, resources, error };
    }
  }

  // ── storage init ──────────────────────────────────────────────

  async initStorage(request: DeploymentRequest): Promise<StorageInitResult> {
    const { storage } = this.options;
    this.options.credentials.validate(request);
    try {
      const credentials = await this.options.credentials.resolve(request);
      const handle = await storage.resolveHandle(credentials, request.environment);
      const report = await storage.ensure(handle, credentials, { dryRun: request.flags.dryRun });
      this.logger.info(`State storage for ${request.environment}: bucket ${handle.bucket} (${report.bucket}), ` +
        `lock table ${handle.lockTable} (${report.lockTable})`);
      return { status: "done", exitCode: 0, handle, report };
    } catch (err) {
      const error = new PhaseError("StorageReady", toBootstrapError(err));
      this.reportFailure("Failed(StorageReady)", error);
      return { status: "failed", exitCode: 1, error };
    }
  }

  // ── Helpers ───────────────────────────────────────────────────

  private async phase<T>(
    machine: RunStateMachine,
    phase: Phase,
    dryRun: boolean,
    work: () => Promise<PhaseOutput<T>>,
  ): Promise<T> {
    machine.begin(phase);
    let output: PhaseOutput<T>;
    try {
      output = await work();
    } catch (err) {
      throw this.phaseFailure(machine, phase, err);
    }
    if (dryRun) machine.skip(phase, `dry-run: ${output.detail}`);
    else if (output.skipped) machine.skip(phase, output.detail);
    else machine.succeed(phase, output.detail);
    this.logger.info(`${PHASE_STATES[phase]}: ${output.detail}`, { phase });
    return output.value;
  }

  private phaseFailure(machine: RunStateMachine, phase: Phase, err: unknown): PhaseError {
    const error = toBootstrapError(err);
    machine.fail(phase, error.message);
    return new PhaseError(PHASE_STATES[phase], error);
  }

  /** Tools and paths a run needs; Ansible only when configuration runs. */
  private prerequisites(request: DeploymentRequest, settings: EnvironmentSettings): Prerequisites {
    const { terraform, ansible } = this.options.config;
    const tools: ToolRequirement[] = [{ bin: terraform.bin, args: ["version"] }];
    const paths = [terraform.dir];
    if (settings.varFile) paths.push(settings.varFile);
    if (request.action === "up" && !request.flags.skipConfigure) {
      tools.push({ bin: ansible.bin, args: ["--version"] });
      paths.push(ansible.dir);
    }
    return { tools, paths };
  }

  /** Persisted targets, re-probed before use. */
  private restoreTargets(snapshots: readonly TargetSnapshot[]): ProvisionedTarget[] {
    return snapshots.map((snapshot): ProvisionedTarget => ({
      ...snapshot,
      credentialKeys: this.options.config.targets.find((t) => t.role === snapshot.role)?.credentials ?? [],
      status: "unknown",
    }));
  }

  private provisionRequest(
    request: DeploymentRequest,
    settings: EnvironmentSettings,
    credentials: Credentials,
  ): ProvisionRequest {
    return {
      environment: request.environment,
      sizing: { ...settings.sizing, ...request.sizing },
      credentials,
      varFile: settings.varFile,
    };
  }

  private reportFailure(state: string, error: PhaseError): void {
    this.logger.error(`${state}: ${error.error.message}`, { code: error.error.code });
    for (const line of error.outputLines) this.logger.error(`  ${line}`);
  }

  private async loadRunState(environment: string): Promise<RunState | null> {
    try {
      return await this.options.store.load(environment);
    } catch (err) {
      this.logger.warn(`Could not load run state: ${formatErrorMessage(err)}`);
      return null;
    }
  }

  private async persist(machine: RunStateMachine, dryRun: boolean): Promise<void> {
    if (dryRun) return;
    try {
      await this.options.store.save(machine.snapshot());
    } catch (err) {
      this.logger.error(`Could not save run state: ${formatErrorMessage(err)}`);
    }
  }

  private async clearRunState(environment: string): Promise<void> {
    try {
      await this.options.store.clear(environment);
    } catch (err) {
      this.logger.error(`Could not clear run state: ${formatErrorMessage(err)}`);
    }
  }
}
