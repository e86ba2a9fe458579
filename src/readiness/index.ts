/**
 * Readiness Module Index
 */

export {
  pollUntil,
  withAttemptTimeout,
  sleep,
  PollTimeoutError,
  AttemptTimeoutError,
  type PollOptions,
  type PollResult,
} from "./poll.js";
export {
  tcpProbe,
  httpProbe,
  createProbe,
  describeProbe,
  type HttpExpectation,
  type Probe,
  type ProbeFactory,
} from "./probes.js";
export {
  ReadinessProber,
  type ReadinessProberOptions,
  type ReadinessReport,
  type WaitReadyOptions,
} from "./prober.js";
