import type { Command } from "commander";

import { upCommand } from "../../commands/up.js";
import type { ExitCode } from "../../orchestrator/index.js";
import { addCommonOptions, parseOptions, upOptionsSchema } from "../options.js";
import type { CliRuntime } from "../runtime.js";

export function registerUpCommand(program: Command, runtime: CliRuntime, done: (code: ExitCode) => void) {
  addCommonOptions(
    program
      .command("up")
      .description("Provision, wait for, configure and verify an environment"),
  )
    .option("--skip-provision", "reuse existing infrastructure outputs instead of applying")
    .option("--skip-configure", "skip the playbooks (readiness and verification still run)")
    .action(async (opts: unknown) => {
      done(await upCommand(parseOptions(upOptionsSchema, opts), runtime));
    });
}
