import { describe, it, expect } from "vitest";
import { ArgumentError } from "./errors.js";
import { CREDENTIAL_SOURCE_PRECEDENCE, createDeploymentRequest } from "./types.js";

describe("createDeploymentRequest", () => {
  it("fills defaults for omitted fields", () => {
    const request = createDeploymentRequest({ environment: "staging", action: "up" });

    expect(request).toEqual({
      environment: "staging",
      action: "up",
      credentialSources: [...CREDENTIAL_SOURCE_PRECEDENCE],
      credentialOverrides: {},
      sizing: {},
      flags: { dryRun: false, force: false, skipProvision: false, skipConfigure: false, deleteStorage: false },
    });
  });

  it("freezes the request and everything inside it", () => {
    const overrides = { github_token: "test-token" };
    const request = createDeploymentRequest({
      environment: "prod",
      action: "down",
      credentialOverrides: overrides,
      sizing: { instance_type: "t3.small" },
      flags: { force: true },
    });

    expect(Object.isFrozen(request)).toBe(true);
    expect(Object.isFrozen(request.flags)).toBe(true);
    expect(Object.isFrozen(request.sizing)).toBe(true);
    expect(Object.isFrozen(request.credentialSources)).toBe(true);
    expect(Object.isFrozen(request.credentialOverrides)).toBe(true);

    overrides.github_token = "changed";
    expect(request.credentialOverrides.github_token).toBe("test-token");
    expect(request.flags.force).toBe(true);
  });

  it("drops repeated source kinds", () => {
    const request = createDeploymentRequest({
      environment: "staging",
      action: "up",
      credentialSources: ["env", "file", "env"],
    });

    expect(request.credentialSources).toEqual(["env", "file"]);
  });

  it("rejects malformed environment names and empty source lists", () => {
    expect(() => createDeploymentRequest({ environment: "", action: "up" })).toThrow(ArgumentError);
    expect(() => createDeploymentRequest({ environment: "stag ing", action: "up" })).toThrow(
      'Invalid environment "stag ing": use letters, digits, "-" and "_"',
    );
    expect(() => createDeploymentRequest({ environment: "staging", action: "up", credentialSources: [] })).toThrow(
      "At least one credential source is required",
    );
  });
});
