/**
 * `down`: destroy the environment, then optionally its state storage.
 */

import type { DownOptions } from "../cli/options.js";
import type { CliRuntime } from "../cli/runtime.js";
import type { ExitCode } from "../orchestrator/index.js";
import { withSession } from "./session.js";

export async function downCommand(options: DownOptions, runtime: CliRuntime): Promise<ExitCode> {
  return withSession(options, "down", { deleteStorage: options.deleteStorage }, runtime, async (session) => {
    const result = await session.orchestrator.down(session.request);
    return result.exitCode;
  });
}
