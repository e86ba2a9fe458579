/**
 * Run summaries: resume commands, SSH hints and plan one-liners.
 */

import type { PlanReport } from "../provisioning/index.js";
import { PHASE_ORDER, type Phase, type ProvisionedTarget } from "../types.js";

export const COMMAND_NAME = "fleet-bootstrap";

export type TargetSummary = {
  role: string;
  name: string;
  address: string;
  ssh: string;
};

/**
 * The `up` invocation that continues after the last completed phase.
 * Phases already past provisioning are not re-applied.
 */
export function resumeCommand(environment: string, lastCompleted: Phase | undefined, configPath?: string): string {
  const parts = [COMMAND_NAME, "up", "--env", environment];
  if (configPath) parts.push("--config", configPath);
  const reached = lastCompleted ? PHASE_ORDER.indexOf(lastCompleted) : -1;
  if (reached >= PHASE_ORDER.indexOf("provisioned")) parts.push("--skip-provision");
  if (reached >= PHASE_ORDER.indexOf("configured")) parts.push("--skip-configure");
  return parts.join(" ");
}

export function sshCommand(address: string, user: string, keyPath?: string): string {
  return keyPath ? `ssh -i ${keyPath} ${user}@${address}` : `ssh ${user}@${address}`;
}

export function summarizeTargets(
  targets: readonly ProvisionedTarget[],
  options: { user: string; keyPath?: string },
): TargetSummary[] {
  return targets.map((t) => ({
    role: t.role,
    name: t.name,
    address: t.address,
    ssh: sshCommand(t.address, options.user, options.keyPath),
  }));
}

export function describePlan(report: PlanReport): string {
  if (report.summary) {
    const { add, change, destroy } = report.summary;
    return `${add} to add, ${change} to change, ${destroy} to destroy`;
  }
  return report.changes ? "changes pending" : "no changes";
}
