/**
 * fleet-bootstrap
 *
 * Library entry: everything the CLI uses, for embedding the orchestrator in
 * other tooling.
 */

export * from "./types.js";
export * from "./errors.js";
export * from "./config/index.js";
export * from "./logging/index.js";
export * from "./credentials/index.js";
export * from "./provisioning/index.js";
export * from "./readiness/index.js";
export * from "./configuration/index.js";
export * from "./verification/index.js";
export * from "./storage/index.js";
export * from "./orchestrator/index.js";
export {
  execCommand,
  resultTail,
  tailLines,
  DEFAULT_COMMAND_TIMEOUT_MS,
  type CommandOptions,
  type CommandResult,
  type CommandRunner,
} from "./process/exec.js";
export {
  PrerequisiteChecker,
  type PrerequisiteCheckerOptions,
  type Prerequisites,
  type ToolRequirement,
} from "./process/preflight.js";
export { runCli, buildProgram } from "./cli/program.js";
export { defaultRuntime, type CliRuntime } from "./cli/runtime.js";
export { VERSION } from "./version.js";
