/**
 * Backend Configuration Helpers
 *
 * Renders the S3 `backend {}` block written to `backend.tf` once the state
 * bucket and lock table exist.
 */

import type { StorageHandle } from "../types.js";

// ── Backend Types ──────────────────────────────────────────────────────────────

export interface S3BackendConfig {
  type: "s3";
  bucket: string;
  key: string;
  region: string;
  dynamodb_table?: string;
  encrypt?: boolean;
}

// ── Defaults ───────────────────────────────────────────────────────────────────

const S3_DEFAULTS: Partial<S3BackendConfig> = {
  encrypt: true,
};

export const BACKEND_FILE = "backend.tf";

// ── HCL Generation ─────────────────────────────────────────────────────────────

/**
 * Generate HCL for an S3 backend block.
 *
 * @example
 * ```ts
 * const hcl = generateBackendHCL({
 *   type: "s3",
 *   bucket: "fleet-tfstate-123456789012",
 *   key: "staging/terraform.tfstate",
 *   region: "us-east-1",
 *   dynamodb_table: "fleet-tf-locks",
 * });
 * ```
 */
export function generateBackendHCL(config: S3BackendConfig): string {
  const merged = { ...S3_DEFAULTS, ...config };
  const lines: string[] = [
    `terraform {`,
    `  backend "s3" {`,
    `    bucket = "${merged.bucket}"`,
    `    key    = "${merged.key}"`,
    `    region = "${merged.region}"`,
  ];

  if (merged.dynamodb_table) {
    lines.push(`    dynamodb_table = "${merged.dynamodb_table}"`);
  }
  if (merged.encrypt !== undefined) {
    lines.push(`    encrypt = ${merged.encrypt}`);
  }

  lines.push(`  }`, `}`);
  return lines.join("\n") + "\n";
}

/**
 * Backend configuration for a storage handle.
 */
export function backendFromHandle(handle: StorageHandle): S3BackendConfig {
  return {
    type: "s3",
    bucket: handle.bucket,
    key: handle.stateKey,
    region: handle.region,
    dynamodb_table: handle.lockTable,
    ...S3_DEFAULTS,
  };
}

/**
 * Validate a backend configuration. Returns a list of problems, empty when valid.
 */
export function validateBackendConfig(config: S3BackendConfig): string[] {
  const errors: string[] = [];
  if (!config.bucket) errors.push("S3 backend requires 'bucket'");
  if (!config.key) errors.push("S3 backend requires 'key'");
  if (!config.region) errors.push("S3 backend requires 'region'");
  if (config.bucket && !/^[a-z0-9][a-z0-9.-]{1,61}[a-z0-9]$/.test(config.bucket)) {
    errors.push(`S3 bucket name "${config.bucket}" is not valid`);
  }
  return errors;
}
