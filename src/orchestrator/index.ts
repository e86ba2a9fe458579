/**
 * Orchestrator Module Index
 */

export {
  Orchestrator,
  type CredentialProvider,
  type DownResult,
  type DownState,
  type ExitCode,
  type OrchestratorOptions,
  type PrerequisiteService,
  type ReadinessService,
  type StorageInitResult,
  type StorageService,
  type UpResult,
  type VerificationService,
} from "./orchestrator.js";
export { RunStateMachine, PHASE_STATES, type Clock, type UpState } from "./state-machine.js";
export {
  InMemoryRunStateStore,
  SQLiteRunStateStore,
  openRunStateStore,
  type RunStateStore,
} from "./run-state-store.js";
export { createPromptConfirm, fixedConfirm, type Confirm, type PromptStreams } from "./confirm.js";
export {
  COMMAND_NAME,
  resumeCommand,
  sshCommand,
  summarizeTargets,
  describePlan,
  type TargetSummary,
} from "./summary.js";
export {
  ConfiguredCredentialProvider,
  createOrchestrator,
  type CredentialProviderOptions,
  type RuntimeOptions,
} from "./factory.js";
