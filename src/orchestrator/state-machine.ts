/**
 * Run State Machine
 *
 * Records phase outcomes for one `up` run. Phases complete strictly in
 * declared order, timestamps never go backwards, and nothing can start
 * after a failure.
 */

import { randomUUID } from "node:crypto";
import { TransitionError } from "../errors.js";
import {
  PHASE_ORDER,
  type Phase,
  type PhaseOutcome,
  type PhaseRecord,
  type ProvisionedTarget,
  type RunState,
} from "../types.js";

export type UpState =
  | "Start"
  | "CredentialsResolved"
  | "Provisioned"
  | "Ready"
  | "Configured"
  | "Verified"
  | "Done";

/** The state a phase leads to once it completes. */
export const PHASE_STATES: Readonly<Record<Phase, UpState>> = {
  credentials_resolved: "CredentialsResolved",
  provisioned: "Provisioned",
  ready: "Ready",
  configured: "Configured",
  verified: "Verified",
};

export type Clock = () => Date;

const systemClock: Clock = () => new Date();

export class RunStateMachine {
  private active: { phase: Phase; startedAt: string } | undefined;
  private lastTime: number;

  constructor(
    private readonly state: RunState,
    private readonly clock: Clock = systemClock,
  ) {
    this.lastTime = Date.parse(state.updatedAt);
  }

  static start(environment: string, options: { runId?: string; clock?: Clock } = {}): RunStateMachine {
    const clock = options.clock ?? systemClock;
    const now = clock().toISOString();
    return new RunStateMachine(
      {
        runId: options.runId ?? randomUUID(),
        environment,
        startedAt: now,
        updatedAt: now,
        phases: [],
        targets: [],
      },
      clock,
    );
  }

  get runId(): string {
    return this.state.runId;
  }

  /** Phase that failed, if any. */
  get failedPhase(): Phase | undefined {
    return this.state.phases.find((p) => p.outcome === "failure")?.phase;
  }

  /** Last phase recorded as success or skipped. */
  get lastCompleted(): Phase | undefined {
    const done = this.state.phases.filter((p) => p.outcome !== "failure");
    return done[done.length - 1]?.phase;
  }

  get isComplete(): boolean {
    return this.state.phases.length === PHASE_ORDER.length && this.failedPhase === undefined;
  }

  /** `Ready`, `Failed(Configured)`, `Done` and so on. */
  label(): string {
    const failed = this.failedPhase;
    if (failed) return `Failed(${PHASE_STATES[failed]})`;
    if (this.isComplete) return "Done";
    const last = this.lastCompleted;
    return last ? PHASE_STATES[last] : "Start";
  }

  begin(phase: Phase): void {
    if (this.failedPhase) {
      throw new TransitionError(`Cannot start ${phase}: run already failed in ${this.failedPhase}`);
    }
    if (this.active) {
      throw new TransitionError(`Cannot start ${phase}: ${this.active.phase} is still running`);
    }
    const expected = PHASE_ORDER[this.state.phases.length];
    if (phase !== expected) {
      throw new TransitionError(`Cannot start ${phase}: next phase is ${expected ?? "none"}`);
    }
    this.active = { phase, startedAt: this.stamp() };
  }

  succeed(phase: Phase, detail?: string): void {
    const earlier = this.state.phases.find((p) => p.outcome === "failure");
    if (earlier) {
      throw new TransitionError(`Cannot mark ${phase} successful after ${earlier.phase} failed`);
    }
    this.complete(phase, "success", { detail });
  }

  /** Record a phase as skipped, starting it first when needed. */
  skip(phase: Phase, detail: string): void {
    if (this.active?.phase !== phase) this.begin(phase);
    this.complete(phase, "skipped", { detail });
  }

  fail(phase: Phase, error: string): void {
    this.complete(phase, "failure", { error });
  }

  /** Drop the running phase without recording it. */
  abandon(phase: Phase): void {
    if (this.active?.phase === phase) this.active = undefined;
  }

  setTargets(targets: readonly ProvisionedTarget[]): void {
    this.state.targets = targets.map((t) => ({
      id: t.id,
      role: t.role,
      name: t.name,
      group: t.group,
      address: t.address,
      ...(t.privateAddress ? { privateAddress: t.privateAddress } : {}),
      status: t.status,
    }));
    this.state.updatedAt = this.stamp();
  }

  snapshot(): RunState {
    return structuredClone(this.state);
  }

  private complete(phase: Phase, outcome: PhaseOutcome, extra: Pick<PhaseRecord, "detail" | "error">): void {
    if (this.active?.phase !== phase) {
      throw new TransitionError(`Cannot complete ${phase}: it was not started`);
    }
    const completedAt = this.stamp();
    const record: PhaseRecord = { phase, outcome, startedAt: this.active.startedAt, completedAt };
    if (extra.detail !== undefined) record.detail = extra.detail;
    if (extra.error !== undefined) record.error = extra.error;
    this.state.phases.push(record);
    this.state.updatedAt = completedAt;
    this.active = undefined;
  }

  /** Current time, never earlier than the last recorded one. */
  private stamp(): string {
    this.lastTime = Math.max(this.lastTime, this.clock().getTime());
    return new Date(this.lastTime).toISOString();
  }
}
