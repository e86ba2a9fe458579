import type { Command } from "commander";

import { downCommand } from "../../commands/down.js";
import type { ExitCode } from "../../orchestrator/index.js";
import { addCommonOptions, downOptionsSchema, parseOptions } from "../options.js";
import type { CliRuntime } from "../runtime.js";

export function registerDownCommand(program: Command, runtime: CliRuntime, done: (code: ExitCode) => void) {
  addCommonOptions(
    program
      .command("down")
      .description("Destroy an environment after a typed confirmation"),
  )
    .option("--delete-storage", "also delete the state bucket, lock table and stored secrets")
    .addHelpText(
      "after",
      "\nDestroying requires typing `destroy <env>`; --delete-storage asks again for `delete storage <env>`.\n",
    )
    .action(async (opts: unknown) => {
      done(await downCommand(parseOptions(downOptionsSchema, opts), runtime));
    });
}
