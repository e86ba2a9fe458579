/**
 * CLI Program
 *
 * Exit codes: 0 success (a cancelled destroy included), 1 a phase failed,
 * 2 invalid arguments or configuration.
 */

import { Command, CommanderError } from "commander";
import { ArgumentError, formatErrorMessage } from "../errors.js";
import { COMMAND_NAME, type ExitCode } from "../orchestrator/index.js";
import { VERSION } from "../version.js";
import { registerDownCommand } from "./program/register.down.js";
import { registerStorageCommand } from "./program/register.storage.js";
import { registerUpCommand } from "./program/register.up.js";
import { defaultRuntime, type CliRuntime } from "./runtime.js";

export function buildProgram(runtime: CliRuntime, done: (code: ExitCode) => void): Command {
  const program = new Command(COMMAND_NAME)
    .description("Bring a small cloud fleet up and down, idempotently")
    .version(VERSION)
    // Set before registering: subcommands copy these settings when created.
    .exitOverride()
    .configureOutput({
      writeOut: (text) => runtime.writeOut(text),
      writeErr: (text) => runtime.writeErr(text),
    });

  registerUpCommand(program, runtime, done);
  registerDownCommand(program, runtime, done);
  registerStorageCommand(program, runtime, done);
  return program;
}

/** Run one invocation; `args` excludes the node binary and script path. */
export async function runCli(args: readonly string[], runtime: CliRuntime = defaultRuntime): Promise<ExitCode> {
  let exitCode: ExitCode = 0;
  const program = buildProgram(runtime, (code) => {
    exitCode = code;
  });

  try {
    await program.parseAsync([...args], { from: "user" });
    return exitCode;
  } catch (err) {
    if (err instanceof CommanderError) return err.exitCode === 0 ? 0 : 2;
    if (err instanceof ArgumentError) {
      runtime.writeErr(`${err.message}\n`);
      return 2;
    }
    runtime.writeErr(`${formatErrorMessage(err)}\n`);
    return 1;
  }
}
