/**
 * `storage init`: create the state bucket and lock table ahead of a first run.
 */

import type { CommonOptions } from "../cli/options.js";
import type { CliRuntime } from "../cli/runtime.js";
import type { ExitCode } from "../orchestrator/index.js";
import { withSession } from "./session.js";

export async function storageInitCommand(options: CommonOptions, runtime: CliRuntime): Promise<ExitCode> {
  return withSession(options, "up", {}, runtime, async ({ orchestrator, request }) => {
    const result = await orchestrator.initStorage(request);
    if (result.handle) {
      runtime.writeOut(
        `bucket=${result.handle.bucket}\nlock_table=${result.handle.lockTable}\nregion=${result.handle.region}\n`,
      );
    }
    return result.exitCode;
  });
}
