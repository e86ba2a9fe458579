/**
 * Verification Module Index
 */

export {
  HealthVerifier,
  type CheckResult,
  type HealthVerifierOptions,
  type VerificationReport,
  type VerifyOptions,
} from "./health.js";
