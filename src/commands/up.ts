/**
 * `up`: credentials, provisioning, readiness, configuration, verification.
 */

import type { UpOptions } from "../cli/options.js";
import type { CliRuntime } from "../cli/runtime.js";
import type { ExitCode } from "../orchestrator/index.js";
import { withSession } from "./session.js";

export async function upCommand(options: UpOptions, runtime: CliRuntime): Promise<ExitCode> {
  return withSession(
    options,
    "up",
    { skipProvision: options.skipProvision, skipConfigure: options.skipConfigure },
    runtime,
    async ({ orchestrator, request }) => {
      const result = await orchestrator.up(request);
      if (result.resumeCommand) runtime.writeErr(`\nResume with:\n  ${result.resumeCommand}\n`);
      return result.exitCode;
    },
  );
}
