import type { Command } from "commander";

import { storageInitCommand } from "../../commands/storage.js";
import type { ExitCode } from "../../orchestrator/index.js";
import { addCommonOptions, commonOptionsSchema, parseOptions } from "../options.js";
import type { CliRuntime } from "../runtime.js";

export function registerStorageCommand(program: Command, runtime: CliRuntime, done: (code: ExitCode) => void) {
  const storage = program.command("storage").description("Manage provisioning state storage");

  addCommonOptions(
    storage.command("init").description("Create the state bucket and lock table if missing"),
  ).action(async (opts: unknown) => {
    done(await storageInitCommand(parseOptions(commonOptionsSchema, opts), runtime));
  });
}
