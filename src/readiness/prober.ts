/**
 * Readiness Prober
 *
 * Waits for every provisioned target to answer its probe. Each target is
 * polled by its own task, and only that task writes the target's status.
 */

import type { ReadinessConfig } from "../config/index.js";
import { TimeoutError } from "../errors.js";
import type { Logger } from "../logging/index.js";
import type { ProbeSpec, ProvisionedTarget } from "../types.js";
import { PollTimeoutError, pollUntil, sleep } from "./poll.js";
import { createProbe, describeProbe, type ProbeFactory } from "./probes.js";

export type WaitReadyOptions = ReadinessConfig & { dryRun?: boolean };

export type ReadinessReport = {
  dryRun: boolean;
  /** Attempts needed per target id. */
  attempts: Record<string, number>;
};

export type ReadinessProberOptions = {
  logger: Logger;
  /** Probe per role; roles not listed use SSH on port 22. */
  probes?: Readonly<Record<string, ProbeSpec>>;
  createProbe?: ProbeFactory;
};

const SSH_PROBE: ProbeSpec = { type: "tcp", port: 22 };

export class ReadinessProber {
  private readonly logger: Logger;
  private readonly createProbe: ProbeFactory;

  constructor(private readonly options: ReadinessProberOptions) {
    this.logger = options.logger.child("readiness");
    this.createProbe = options.createProbe ?? createProbe;
  }

  probeFor(target: ProvisionedTarget): ProbeSpec {
    return this.options.probes?.[target.role] ?? SSH_PROBE;
  }

  async waitReady(targets: readonly ProvisionedTarget[], options: WaitReadyOptions): Promise<ReadinessReport> {
    if (options.dryRun) {
      for (const target of targets) {
        this.logger.info(
          `Would wait for ${target.name} at ${target.address} (${describeProbe(this.probeFor(target))})`,
        );
      }
      return { dryRun: true, attempts: {} };
    }

    const settled = await Promise.allSettled(targets.map((target) => this.waitOne(target, options)));

    const attempts: Record<string, number> = {};
    const failures: unknown[] = [];
    settled.forEach((outcome, index) => {
      const target = targets[index];
      if (!target) return;
      if (outcome.status === "fulfilled") {
        attempts[target.id] = outcome.value;
      } else {
        failures.push(outcome.reason);
        this.logger.error(`${target.name} at ${target.address} never became ready`, {
          target: target.id,
        });
      }
    });

    if (failures.length > 0) throw failures[0];

    if (options.settleMs > 0) {
      this.logger.info(`All targets reachable; waiting ${Math.round(options.settleMs / 1000)}s for boot scripts to settle`);
      await sleep(options.settleMs);
    }
    return { dryRun: false, attempts };
  }

  /** Poll one target; resolves with the attempt count. */
  private async waitOne(target: ProvisionedTarget, options: WaitReadyOptions): Promise<number> {
    const spec = this.probeFor(target);
    const probe = this.createProbe(spec);
    const log = this.logger.withContext({ target: target.name });
    log.info(`Waiting for ${target.address} (${describeProbe(spec)})`);

    try {
      const result = await pollUntil((signal) => probe(target.address, signal), {
        intervalMs: options.intervalMs,
        timeoutMs: options.timeoutMs,
        attemptTimeoutMs: options.attemptTimeoutMs,
        onAttemptFailed: (_err, attempt) => {
          target.status = "unreachable";
          log.debug(`Not reachable yet (attempt ${attempt})`);
        },
      });
      target.status = "ready";
      log.info(`${target.address} is ready after ${result.attempts} attempt(s)`);
      return result.attempts;
    } catch (err) {
      target.status = "failed";
      if (err instanceof PollTimeoutError) throw new TimeoutError(target.address, err.elapsedMs);
      throw err;
    }
  }
}
