/**
 * Provisioning Module Index
 */

export {
  TerraformProvisioningDriver,
  type ProvisioningDriver,
  type ProvisionRequest,
  type PlanReport,
  type ApplyOptions,
  type ApplyResult,
  type TerraformDriverOptions,
} from "./driver.js";
export {
  tfInit,
  tfPlan,
  tfApply,
  tfDestroy,
  tfOutput,
  tfStateList,
  isStateLockError,
  parsePlanSummary,
  parseStateList,
  type TfCliOptions,
  type TfCliResult,
  type TfVarFlags,
  type PlanSummary,
} from "./cli-wrapper.js";
export { parseOutputJson, targetsFromOutputs } from "./outputs.js";
export {
  BACKEND_FILE,
  generateBackendHCL,
  backendFromHandle,
  validateBackendConfig,
  type S3BackendConfig,
} from "./backend-configs.js";
