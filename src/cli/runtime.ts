/**
 * What the CLI needs from its host. Tests swap in memory transports,
 * fake tool runners and canned confirmations.
 */

import type { LogTransport } from "../logging/index.js";
import type { Confirm, RunStateStore } from "../orchestrator/index.js";
import type { CommandRunner } from "../process/exec.js";

export type CliRuntime = {
  writeOut(text: string): void;
  writeErr(text: string): void;
  /** Root logger transports; console plus the configured log file when absent. */
  transports?: LogTransport[];
  confirm?: Confirm;
  runner?: CommandRunner;
  env?: NodeJS.ProcessEnv;
  openStore?: (file: string) => Promise<RunStateStore>;
};

export const defaultRuntime: CliRuntime = {
  writeOut: (text) => {
    process.stdout.write(text);
  },
  writeErr: (text) => {
    process.stderr.write(text);
  },
};
