/**
 * fleet-bootstrap: Error Taxonomy
 *
 * Every component throws a subclass of BootstrapError. The orchestrator wraps
 * component errors in PhaseError and is the only place that decides to abort.
 */

export type ErrorCode =
  | "CREDENTIAL_MISSING"
  | "CREDENTIAL_INVALID"
  | "PROVISION_FAILED"
  | "PROVISION_LOCKED"
  | "READINESS_TIMEOUT"
  | "CONFIG_FAILED"
  | "VERIFICATION_FAILED"
  | "STORAGE_FAILED"
  | "INVALID_ARGUMENT"
  | "PREREQUISITE_MISSING"
  | "INVALID_TRANSITION"
  | "PHASE_FAILED";

export class BootstrapError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "BootstrapError";
  }

  /** Captured tool output worth showing the operator, newest last. */
  get outputLines(): readonly string[] {
    return [];
  }
}

// ── Credentials ─────────────────────────────────────────────────

export type CredentialErrorKind = "Missing" | "Invalid";

export class CredentialError extends BootstrapError {
  constructor(
    public readonly kind: CredentialErrorKind,
    public readonly key: string,
    reason?: string,
  ) {
    super(
      kind === "Missing"
        ? `Required credential "${key}" was not found in any source`
        : `Credential "${key}" is invalid${reason ? `: ${reason}` : ""}`,
      kind === "Missing" ? "CREDENTIAL_MISSING" : "CREDENTIAL_INVALID",
    );
    this.name = "CredentialError";
  }
}

// ── Provisioning ────────────────────────────────────────────────

export type ProvisionErrorKind =
  | "InitFailed"
  | "PlanFailed"
  | "ApplyFailed"
  | "OutputFailed"
  | "DestroyFailed"
  | "Locked";

export type ProvisionStage = "init" | "plan" | "apply" | "output" | "destroy" | "state" | "locked";

export class ProvisionError extends BootstrapError {
  public readonly kind: ProvisionErrorKind;
  public readonly stage: ProvisionStage;
  public readonly exitCode: number | null;
  public readonly lastOutputLines: readonly string[];
  public readonly timedOut: boolean;
  /** Resources still recorded in state after a failed destroy, when known. */
  public readonly remainingResources?: readonly string[];

  constructor(params: {
    kind: ProvisionErrorKind;
    stage: ProvisionStage;
    exitCode: number | null;
    lastOutputLines?: readonly string[];
    timedOut?: boolean;
    remainingResources?: readonly string[];
    message?: string;
  }) {
    super(
      params.message ?? describeProvisionFailure(params.kind, params.stage, params.exitCode, params.timedOut ?? false),
      params.kind === "Locked" ? "PROVISION_LOCKED" : "PROVISION_FAILED",
    );
    this.name = "ProvisionError";
    this.kind = params.kind;
    this.stage = params.stage;
    this.exitCode = params.exitCode;
    this.lastOutputLines = params.lastOutputLines ?? [];
    this.timedOut = params.timedOut ?? false;
    this.remainingResources = params.remainingResources;
  }

  override get outputLines(): readonly string[] {
    return this.lastOutputLines;
  }
}

function describeProvisionFailure(
  kind: ProvisionErrorKind,
  stage: ProvisionStage,
  exitCode: number | null,
  timedOut: boolean,
): string {
  if (kind === "Locked") {
    return "State is locked by another run; someone else is deploying this environment";
  }
  if (timedOut) return `Provisioning ${stage} timed out`;
  return `Provisioning ${stage} failed (exit code ${exitCode ?? "unknown"})`;
}

// ── Readiness ───────────────────────────────────────────────────

export class TimeoutError extends BootstrapError {
  constructor(
    public readonly target: string,
    public readonly elapsedMs: number,
  ) {
    super(
      `Target ${target} did not become ready after ${Math.round(elapsedMs / 1000)}s`,
      "READINESS_TIMEOUT",
    );
    this.name = "TimeoutError";
  }
}

// ── Configuration ───────────────────────────────────────────────

export class ConfigError extends BootstrapError {
  public readonly lastOutputLines: readonly string[];

  constructor(
    public readonly target: string,
    public readonly playbook: string,
    public readonly exitCode: number | null,
    lastOutputLines: readonly string[] = [],
  ) {
    super(
      `Playbook ${playbook} failed on ${target} (exit code ${exitCode ?? "unknown"})`,
      "CONFIG_FAILED",
    );
    this.name = "ConfigError";
    this.lastOutputLines = lastOutputLines;
  }

  override get outputLines(): readonly string[] {
    return this.lastOutputLines;
  }
}

// ── Verification ────────────────────────────────────────────────

export class VerificationError extends BootstrapError {
  constructor(public readonly failedChecks: readonly string[]) {
    super(`Verification failed: ${failedChecks.join(", ")}`, "VERIFICATION_FAILED");
    this.name = "VerificationError";
  }
}

// ── Storage ─────────────────────────────────────────────────────

export class StorageError extends BootstrapError {
  constructor(
    public readonly resource: string,
    public readonly operation: string,
    cause?: unknown,
  ) {
    super(
      `Storage ${operation} failed for ${resource}: ${formatErrorMessage(cause)}`,
      "STORAGE_FAILED",
      { cause },
    );
    this.name = "StorageError";
  }
}

// ── Arguments ───────────────────────────────────────────────────

export class ArgumentError extends BootstrapError {
  constructor(message: string, public readonly issues: readonly string[] = []) {
    super(message, "INVALID_ARGUMENT");
    this.name = "ArgumentError";
  }
}

// ── Prerequisites ───────────────────────────────────────────────

/** Tools or files the run needs before it touches anything. */
export class PrerequisiteError extends BootstrapError {
  constructor(public readonly missing: readonly string[]) {
    super(`Missing prerequisites: ${missing.join("; ")}`, "PREREQUISITE_MISSING");
    this.name = "PrerequisiteError";
  }
}

// ── Phase wrapper ───────────────────────────────────────────────

/** A run tried to record phases out of order. */
export class TransitionError extends BootstrapError {
  constructor(message: string) {
    super(message, "INVALID_TRANSITION");
    this.name = "TransitionError";
  }
}

/** A component error annotated with the orchestration phase it broke. */
export class PhaseError extends BootstrapError {
  constructor(
    public readonly phase: string,
    public readonly error: BootstrapError,
  ) {
    super(`${phase}: ${error.message}`, "PHASE_FAILED", { cause: error });
    this.name = "PhaseError";
  }

  override get outputLines(): readonly string[] {
    return this.error.outputLines;
  }
}

// ── Helpers ─────────────────────────────────────────────────────

/**
 * Format error message from any error type
 */
export function formatErrorMessage(err: unknown): string {
  if (err instanceof Error) {
    return err.message || err.name || "Error";
  }
  if (typeof err === "string") return err;
  if (typeof err === "number" || typeof err === "boolean" || typeof err === "bigint") {
    return String(err);
  }
  if (err === undefined) return "unknown error";
  try {
    return JSON.stringify(err);
  } catch {
    return Object.prototype.toString.call(err);
  }
}

/** Normalize anything thrown by a component into a BootstrapError. */
export function toBootstrapError(err: unknown, fallbackCode: ErrorCode = "PHASE_FAILED"): BootstrapError {
  if (err instanceof BootstrapError) return err;
  return new BootstrapError(formatErrorMessage(err), fallbackCode, { cause: err });
}
