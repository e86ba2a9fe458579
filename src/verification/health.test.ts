/**
 * Health Verification Tests
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import { verifyCheckSchema } from "../config/index.js";
import { VerificationError } from "../errors.js";
import { createLogger, MemoryTransport } from "../logging/index.js";
import type { Probe } from "../readiness/probes.js";
import type { ProbeSpec, ProvisionedTarget } from "../types.js";
import { HealthVerifier } from "./health.js";

const jenkins: ProvisionedTarget = {
  id: "jenkins:10.0.1.9",
  role: "jenkins",
  name: "jenkins-server",
  group: "jenkins",
  address: "10.0.1.9",
  credentialKeys: [],
  status: "ready",
};
const app: ProvisionedTarget = { ...jenkins, id: "app:10.0.1.5", role: "app", name: "app-server", group: "app", address: "10.0.1.5" };

const checks = [
  verifyCheckSchema.parse({ name: "jenkins-login", role: "jenkins", probe: { type: "http", port: 8080, path: "/login" } }),
  verifyCheckSchema.parse({
    name: "app-health",
    role: "app",
    probe: { type: "http", port: 5000, path: "/health" },
    required: false,
  }),
];

function setup(healthy: (spec: ProbeSpec, address: string) => boolean) {
  const memory = new MemoryTransport();
  const { logger } = createLogger({}, { transports: [memory] });
  const factory = vi.fn((spec: ProbeSpec): Probe => async (address) => {
    if (!healthy(spec, address)) throw new Error(`${address} unhealthy`);
  });
  return { verifier: new HealthVerifier({ checks, logger, createProbe: factory }), memory, factory };
}

const options = { intervalMs: 1_000, attemptTimeoutMs: 500 };

describe("HealthVerifier", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("passes when every check answers", async () => {
    const { verifier, memory } = setup(() => true);

    const report = await verifier.verify([jenkins, app], options);

    expect(report.results.map((r) => [r.name, r.target, r.passed])).toEqual([
      ["jenkins-login", "10.0.1.9", true],
      ["app-health", "10.0.1.5", true],
    ]);
    expect(memory.messages("info")).toContain("2/2 health checks passed");
  });

  it("fails on required checks only", async () => {
    const { verifier } = setup((spec) => spec.port !== 8080);

    await expect(verifier.verify([jenkins, app], options)).rejects.toMatchObject({
      failedChecks: ["jenkins-login@10.0.1.9"],
      code: "VERIFICATION_FAILED",
    });
  });

  it("warns on optional failures", async () => {
    const { verifier, memory } = setup((spec) => spec.port !== 5000);

    const report = await verifier.verify([jenkins, app], options);

    expect(report.results.find((r) => r.name === "app-health")).toMatchObject({
      passed: false,
      detail: "10.0.1.5 unhealthy",
    });
    expect(memory.messages("warn")).toEqual(["app-health failed on 10.0.1.5: 10.0.1.5 unhealthy (optional)"]);
  });

  it("fails a required check whose role has no targets", async () => {
    const { verifier } = setup(() => true);

    const err = await verifier.verify([app], options).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(VerificationError);
    expect(err).toMatchObject({ failedChecks: ["jenkins-login@jenkins"] });
  });

  it("keeps retrying a check for its wait window", async () => {
    vi.useFakeTimers();
    let calls = 0;
    const memory = new MemoryTransport();
    const { logger } = createLogger({}, { transports: [memory] });
    const verifier = new HealthVerifier({
      checks: [verifyCheckSchema.parse({ name: "api", role: "app", probe: { type: "tcp", port: 5000 }, waitMs: 5_000 })],
      logger,
      createProbe: () => async () => {
        calls++;
        if (calls < 3) throw new Error("not yet");
      },
    });

    const pending = verifier.verify([app], options);
    await vi.advanceTimersByTimeAsync(2_000);
    const report = await pending;

    expect(calls).toBe(3);
    expect(report.results[0]?.passed).toBe(true);
  });

  it("lists checks without probing in dry-run", async () => {
    const { verifier, memory, factory } = setup(() => false);

    const report = await verifier.verify([jenkins, app], { ...options, dryRun: true });

    expect(report).toEqual({ dryRun: true, results: [] });
    expect(factory).not.toHaveBeenCalled();
    expect(memory.messages("info")).toEqual([
      "Would check jenkins-login on 10.0.1.9 (http:8080/login)",
      "Would check app-health on 10.0.1.5 (http:5000/health)",
    ]);
  });
});
