/**
 * Post-configuration health checks.
 *
 * Each configured check probes every target of its role, either once or
 * repeatedly for up to `waitMs`. Only required checks can fail a run.
 */

import type { VerifyCheckDefinition } from "../config/index.js";
import { VerificationError, formatErrorMessage } from "../errors.js";
import type { Logger } from "../logging/index.js";
import { pollUntil, withAttemptTimeout } from "../readiness/poll.js";
import { createProbe, describeProbe, type ProbeFactory } from "../readiness/probes.js";
import type { ProvisionedTarget } from "../types.js";

export type CheckResult = {
  name: string;
  target: string;
  required: boolean;
  passed: boolean;
  detail?: string;
};

export type VerificationReport = {
  dryRun: boolean;
  results: CheckResult[];
};

export type VerifyOptions = {
  intervalMs: number;
  attemptTimeoutMs: number;
  dryRun?: boolean;
};

export type HealthVerifierOptions = {
  checks: readonly VerifyCheckDefinition[];
  logger: Logger;
  createProbe?: ProbeFactory;
};

export class HealthVerifier {
  private readonly logger: Logger;
  private readonly createProbe: ProbeFactory;

  constructor(private readonly options: HealthVerifierOptions) {
    this.logger = options.logger.child("verification");
    this.createProbe = options.createProbe ?? createProbe;
  }

  async verify(targets: readonly ProvisionedTarget[], options: VerifyOptions): Promise<VerificationReport> {
    const results: CheckResult[] = [];

    for (const check of this.options.checks) {
      const scoped = targets.filter((t) => t.role === check.role);
      if (scoped.length === 0) {
        results.push({ name: check.name, target: check.role, required: check.required, passed: false, detail: "no targets" });
        continue;
      }
      for (const target of scoped) {
        if (options.dryRun) {
          this.logger.info(`Would check ${check.name} on ${target.address} (${describeProbe(check.probe)})`);
          continue;
        }
        results.push(await this.runCheck(check, target, options));
      }
    }

    if (options.dryRun) return { dryRun: true, results };

    const failed = results.filter((r) => !r.passed);
    for (const result of failed) {
      const line = `${result.name} failed on ${result.target}${result.detail ? `: ${result.detail}` : ""}`;
      if (result.required) this.logger.error(line);
      else this.logger.warn(`${line} (optional)`);
    }

    const requiredFailures = failed.filter((r) => r.required);
    if (requiredFailures.length > 0) {
      throw new VerificationError(requiredFailures.map((r) => `${r.name}@${r.target}`));
    }
    this.logger.info(`${results.length - failed.length}/${results.length} health checks passed`);
    return { dryRun: false, results };
  }

  private async runCheck(
    check: VerifyCheckDefinition,
    target: ProvisionedTarget,
    options: VerifyOptions,
  ): Promise<CheckResult> {
    const probe = this.createProbe(check.probe);
    const attempt = (signal: AbortSignal) => probe(target.address, signal);
    const base = { name: check.name, target: target.address, required: check.required };

    try {
      if (check.waitMs > 0) {
        await pollUntil(attempt, {
          intervalMs: Math.min(options.intervalMs, check.waitMs),
          timeoutMs: check.waitMs,
          attemptTimeoutMs: options.attemptTimeoutMs,
        });
      } else {
        await withAttemptTimeout(attempt, options.attemptTimeoutMs);
      }
      this.logger.info(`${check.name} passed on ${target.address}`);
      return { ...base, passed: true };
    } catch (err) {
      const cause = err instanceof Error && err.cause !== undefined ? err.cause : err;
      return { ...base, passed: false, detail: formatErrorMessage(cause) };
    }
  }
}
