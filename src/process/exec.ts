/**
 * Subprocess Runner
 *
 * Executes external tools via child_process with a hard wall-clock timeout
 * and returns structured results with captured stdout/stderr. Drivers accept
 * a CommandRunner so tests can substitute a fake.
 */

import { execFile as execFileCb } from "node:child_process";
import { promisify } from "node:util";

const execFile = promisify(execFileCb);

/** Options for a single subprocess invocation. */
export interface CommandOptions {
  /** Working directory for the tool. */
  cwd: string;
  /** Extra environment variables, layered over process.env. */
  env?: Record<string, string>;
  /** Hard timeout in ms (default: 1_800_000 = 30 min). */
  timeoutMs?: number;
}

/** Result of a subprocess invocation. Never thrown. */
export interface CommandResult {
  success: boolean;
  stdout: string;
  stderr: string;
  /** Null when the process was killed or could not be started. */
  exitCode: number | null;
  timedOut: boolean;
  durationMs: number;
}

export type CommandRunner = (
  bin: string,
  args: readonly string[],
  options: CommandOptions,
) => Promise<CommandResult>;

export const DEFAULT_COMMAND_TIMEOUT_MS = 1_800_000;

function field(err: unknown, key: string): unknown {
  return typeof err === "object" && err !== null ? Reflect.get(err, key) : undefined;
}

/**
 * Run a command to completion. Non-zero exits, timeouts and spawn failures
 * are reported in the result, not thrown.
 */
export const execCommand: CommandRunner = async (bin, args, options) => {
  const timeout = options.timeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS;
  const env = { ...process.env, ...options.env };
  const started = Date.now();

  try {
    const { stdout, stderr } = await execFile(bin, [...args], {
      cwd: options.cwd,
      env,
      timeout,
      maxBuffer: 50 * 1024 * 1024, // 50 MB
    });
    return { success: true, stdout, stderr, exitCode: 0, timedOut: false, durationMs: Date.now() - started };
  } catch (err: unknown) {
    const code = field(err, "code");
    const killed = field(err, "killed") === true;
    const stdout = field(err, "stdout");
    const stderr = field(err, "stderr");
    const message = err instanceof Error ? err.message : String(err);
    return {
      success: false,
      stdout: typeof stdout === "string" ? stdout : "",
      stderr: typeof stderr === "string" && stderr.length > 0 ? stderr : message,
      exitCode: typeof code === "number" ? code : null,
      timedOut: killed,
      durationMs: Date.now() - started,
    };
  }
};

/**
 * Last `count` non-empty lines of combined tool output.
 */
export function tailLines(text: string, count = 20): string[] {
  const lines = text.split(/\r?\n/).filter((line) => line.trim().length > 0);
  return lines.slice(-count);
}

/** Last lines of stdout followed by stderr, as shown after a failure. */
export function resultTail(result: Pick<CommandResult, "stdout" | "stderr">, count = 20): string[] {
  return tailLines(`${result.stdout}\n${result.stderr}`, count);
}
