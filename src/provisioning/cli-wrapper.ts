/**
 * Terraform CLI wrapper. Runs `terraform` subcommands through a CommandRunner.
 *
 * All commands run in the configured working directory with
 * `TF_IN_AUTOMATION=1`. Supports:
 * - init, plan, apply, destroy
 * - output, state list
 *
 * Failures are returned in the result, never thrown.
 */

import { execCommand, type CommandResult, type CommandRunner } from "../process/exec.js";

/** Options for Terraform CLI invocations. */
export interface TfCliOptions {
  /** Working directory containing .tf files. */
  cwd: string;
  /** Path to terraform binary (default: "terraform"). */
  terraformBin?: string;
  /** Extra environment variables. */
  env?: Record<string, string>;
  /** Hard timeout in ms. */
  timeoutMs?: number;
  runner?: CommandRunner;
}

/** Input variables shared by plan, apply and destroy. */
export type TfVarFlags = {
  vars?: Record<string, string>;
  varFile?: string;
};

export type TfCliResult = CommandResult;

/** Core exec helper. */
async function run(args: string[], opts: TfCliOptions): Promise<TfCliResult> {
  const runner = opts.runner ?? execCommand;
  return runner(opts.terraformBin ?? "terraform", args, {
    cwd: opts.cwd,
    env: { ...opts.env, TF_IN_AUTOMATION: "1" },
    timeoutMs: opts.timeoutMs,
  });
}

function pushVars(args: string[], flags?: TfVarFlags): void {
  if (flags?.varFile) args.push(`-var-file=${flags.varFile}`);
  for (const [key, value] of Object.entries(flags?.vars ?? {})) {
    args.push("-var", `${key}=${value}`);
  }
}

// ─── Individual Commands ────────────────────────────────────────

/** `terraform init`: initialize providers, modules and backend. */
export async function tfInit(
  opts: TfCliOptions,
  flags?: { upgrade?: boolean; reconfigure?: boolean; backendConfig?: string[] },
): Promise<TfCliResult> {
  const args = ["init", "-input=false", "-no-color"];
  if (flags?.upgrade) args.push("-upgrade");
  if (flags?.reconfigure) args.push("-reconfigure");
  for (const bc of flags?.backendConfig ?? []) args.push(`-backend-config=${bc}`);
  return run(args, opts);
}

/**
 * `terraform plan -detailed-exitcode`: exit 0 means no changes, 2 means
 * changes are pending, anything else is an error.
 */
export async function tfPlan(
  opts: TfCliOptions,
  flags?: TfVarFlags & { destroy?: boolean; out?: string },
): Promise<TfCliResult> {
  const args = ["plan", "-input=false", "-no-color", "-detailed-exitcode"];
  if (flags?.destroy) args.push("-destroy");
  pushVars(args, flags);
  if (flags?.out) args.push(`-out=${flags.out}`);
  return run(args, opts);
}

/** `terraform apply <planFile>`: apply a saved plan. */
export async function tfApply(opts: TfCliOptions, planFile: string): Promise<TfCliResult> {
  return run(["apply", "-input=false", "-no-color", "-auto-approve", planFile], opts);
}

/** `terraform destroy -auto-approve`: destroy all resources. */
export async function tfDestroy(opts: TfCliOptions, flags?: TfVarFlags): Promise<TfCliResult> {
  const args = ["destroy", "-input=false", "-no-color", "-auto-approve"];
  pushVars(args, flags);
  return run(args, opts);
}

/** `terraform output -json`: read all outputs. */
export async function tfOutput(opts: TfCliOptions): Promise<TfCliResult> {
  return run(["output", "-no-color", "-json"], opts);
}

/** `terraform state list`: list resource addresses in state. */
export async function tfStateList(opts: TfCliOptions): Promise<TfCliResult> {
  return run(["state", "list"], opts);
}

// ─── Output helpers ─────────────────────────────────────────────

/** Whether a failed command lost the race for the state lock. */
export function isStateLockError(result: Pick<CommandResult, "stdout" | "stderr">): boolean {
  return /Error acquiring the state lock/i.test(`${result.stdout}\n${result.stderr}`);
}

export type PlanSummary = {
  add: number;
  change: number;
  destroy: number;
};

/**
 * Parse `Plan: A to add, C to change, D to destroy.` from plan output.
 * "No changes." yields zeros; unrecognised output yields null.
 */
export function parsePlanSummary(output: string): PlanSummary | null {
  const match = /Plan: (\d+) to add, (\d+) to change, (\d+) to destroy\./.exec(output);
  if (match) {
    return { add: Number(match[1]), change: Number(match[2]), destroy: Number(match[3]) };
  }
  if (/No changes\./.test(output)) return { add: 0, change: 0, destroy: 0 };
  return null;
}

/** Resource addresses from `state list` output. */
export function parseStateList(output: string): string[] {
  return output
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}
