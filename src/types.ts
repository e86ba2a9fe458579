/**
 * fleet-bootstrap: Type Definitions
 *
 * Deployment requests, resolved credentials, provisioned targets, run state
 * and storage handles shared by every phase of a run.
 */

import { ArgumentError } from "./errors.js";

// ── Deployment Request ──────────────────────────────────────────

export type DeploymentAction = "up" | "down";

/** Where a credential value may come from, highest precedence first. */
export type CredentialSourceKind = "cli" | "env" | "file" | "parameter-store";

export const CREDENTIAL_SOURCE_PRECEDENCE: readonly CredentialSourceKind[] = [
  "cli",
  "env",
  "file",
  "parameter-store",
];

export interface DeploymentFlags {
  readonly dryRun: boolean;
  readonly force: boolean;
  readonly skipProvision: boolean;
  readonly skipConfigure: boolean;
  readonly deleteStorage: boolean;
}

export interface DeploymentRequest {
  readonly environment: string;
  readonly action: DeploymentAction;
  readonly credentialSources: readonly CredentialSourceKind[];
  readonly credentialOverrides: Readonly<Record<string, string>>;
  /** Opaque key/value pairs handed to the provisioning tool as variables. */
  readonly sizing: Readonly<Record<string, string>>;
  readonly flags: DeploymentFlags;
}

export type DeploymentRequestInput = {
  environment: string;
  action: DeploymentAction;
  credentialSources?: CredentialSourceKind[];
  credentialOverrides?: Record<string, string>;
  sizing?: Record<string, string>;
  flags?: Partial<DeploymentFlags>;
};

const ENVIRONMENT_PATTERN = /^[A-Za-z0-9_-]+$/;

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const child of Object.values(value)) {
    if (child !== null && typeof child === "object" && !Object.isFrozen(child)) deepFreeze(child);
  }
  return Object.freeze(value);
}

/**
 * Validate and freeze the request for one invocation. Source kinds keep
 * the caller's order with duplicates removed; precedence is applied later.
 */
export function createDeploymentRequest(input: DeploymentRequestInput): DeploymentRequest {
  if (!ENVIRONMENT_PATTERN.test(input.environment)) {
    throw new ArgumentError(
      `Invalid environment "${input.environment}": use letters, digits, "-" and "_"`,
    );
  }
  const sources = input.credentialSources ?? [...CREDENTIAL_SOURCE_PRECEDENCE];
  if (sources.length === 0) {
    throw new ArgumentError("At least one credential source is required");
  }

  const request: DeploymentRequest = {
    environment: input.environment,
    action: input.action,
    credentialSources: [...new Set(sources)],
    credentialOverrides: { ...input.credentialOverrides },
    sizing: { ...input.sizing },
    flags: {
      dryRun: input.flags?.dryRun ?? false,
      force: input.flags?.force ?? false,
      skipProvision: input.flags?.skipProvision ?? false,
      skipConfigure: input.flags?.skipConfigure ?? false,
      deleteStorage: input.flags?.deleteStorage ?? false,
    },
  };
  return deepFreeze(request);
}

// ── Credentials ─────────────────────────────────────────────────

/** Which source supplied a credential value. */
export type CredentialProvenance = CredentialSourceKind | "default" | "unset";

export interface CredentialEntry {
  readonly key: string;
  readonly value: string;
  readonly provenance: CredentialProvenance;
  /** Secure values are masked in every log destination. */
  readonly secure: boolean;
}

// ── Provisioned Targets ─────────────────────────────────────────

export type TargetStatus = "unknown" | "unreachable" | "ready" | "failed";

export interface ProvisionedTarget {
  /** `<role>:<address>`; stable across idempotent re-applies. */
  readonly id: string;
  readonly role: string;
  /** Inventory host name. */
  readonly name: string;
  /** Inventory group the target belongs to. */
  readonly group: string;
  readonly address: string;
  readonly privateAddress?: string;
  /** Credential keys the configuration step needs for this target. */
  readonly credentialKeys: readonly string[];
  status: TargetStatus;
}

/** Persisted form of a target, used to resume a run. */
export type TargetSnapshot = {
  id: string;
  role: string;
  name: string;
  group: string;
  address: string;
  privateAddress?: string;
  status: TargetStatus;
};

// ── Run State ───────────────────────────────────────────────────

export type Phase =
  | "credentials_resolved"
  | "provisioned"
  | "ready"
  | "configured"
  | "verified";

export const PHASE_ORDER: readonly Phase[] = [
  "credentials_resolved",
  "provisioned",
  "ready",
  "configured",
  "verified",
];

export type PhaseOutcome = "success" | "failure" | "skipped";

export interface PhaseRecord {
  phase: Phase;
  outcome: PhaseOutcome;
  startedAt: string;
  completedAt: string;
  detail?: string;
  error?: string;
}

export interface RunState {
  runId: string;
  environment: string;
  startedAt: string;
  updatedAt: string;
  phases: PhaseRecord[];
  targets: TargetSnapshot[];
}

// ── Storage ─────────────────────────────────────────────────────

export interface StorageHandle {
  readonly region: string;
  readonly bucket: string;
  readonly lockTable: string;
  readonly stateKey: string;
  readonly secretNamespace: string;
}

// ── Probes ──────────────────────────────────────────────────────

export type ProbeSpec =
  | { type: "tcp"; port: number }
  | { type: "http"; port: number; path: string; expectStatus?: number; expectBody?: string };
