/**
 * Wires the real components from a loaded configuration.
 */

import type { FleetConfig } from "../config/index.js";
import { AnsibleConfigurationDriver } from "../configuration/index.js";
import {
  CredentialResolver,
  StsIdentityVerifier,
  assertKnownCredentialKeys,
  createCredentialSources,
  type Credentials,
  type IdentityVerifier,
} from "../credentials/index.js";
import type { Logger } from "../logging/index.js";
import type { CommandRunner } from "../process/exec.js";
import { PrerequisiteChecker } from "../process/preflight.js";
import { TerraformProvisioningDriver } from "../provisioning/index.js";
import { ReadinessProber } from "../readiness/index.js";
import { StorageReconciler } from "../storage/index.js";
import type { DeploymentRequest, ProbeSpec } from "../types.js";
import { HealthVerifier } from "../verification/index.js";
import { createPromptConfirm, type Confirm } from "./confirm.js";
import { Orchestrator, type CredentialProvider } from "./orchestrator.js";
import type { RunStateStore } from "./run-state-store.js";

export type CredentialProviderOptions = {
  config: FleetConfig;
  logger: Logger;
  env?: NodeJS.ProcessEnv;
  /** Replaces the STS check when `credentials.verifyIdentity` is on. */
  identityVerifier?: IdentityVerifier;
};

/** Resolves credentials from the sources a request names. */
export class ConfiguredCredentialProvider implements CredentialProvider {
  constructor(private readonly options: CredentialProviderOptions) {}

  validate(request: DeploymentRequest): void {
    assertKnownCredentialKeys(request.credentialOverrides);
  }

  resolve(request: DeploymentRequest): Promise<Credentials> {
    const { config, logger, env } = this.options;
    const settings = config.credentials;
    const sources = createCredentialSources(request.credentialSources, {
      overrides: request.credentialOverrides,
      files: settings.files,
      parameterNamespace: settings.parameterNamespace,
      region: config.storage.region,
      logger,
      env,
    });
    const resolver = new CredentialResolver({
      logger,
      required: settings.required,
      identityVerifier: settings.verifyIdentity
        ? (this.options.identityVerifier ?? new StsIdentityVerifier())
        : undefined,
    });
    return resolver.resolve(sources);
  }
}

export type RuntimeOptions = {
  logger: Logger;
  store: RunStateStore;
  confirm?: Confirm;
  runner?: CommandRunner;
  env?: NodeJS.ProcessEnv;
  configPath?: string;
};

export function createOrchestrator(config: FleetConfig, runtime: RuntimeOptions): Orchestrator {
  const { logger, runner } = runtime;
  const probes: Record<string, ProbeSpec> = {};
  for (const target of config.targets) probes[target.role] = target.probe;

  return new Orchestrator({
    config,
    logger,
    credentials: new ConfiguredCredentialProvider({ config, logger, env: runtime.env }),
    preflight: new PrerequisiteChecker({ logger, runner }),
    provisioner: new TerraformProvisioningDriver({
      terraform: config.terraform,
      targets: config.targets,
      logger,
      runner,
    }),
    prober: new ReadinessProber({ logger, probes }),
    configurator: new AnsibleConfigurationDriver({
      ansible: config.ansible,
      definitions: config.targets,
      logger,
      runner,
    }),
    verifier: new HealthVerifier({ checks: config.verify, logger }),
    storage: new StorageReconciler({
      project: config.project,
      storage: config.storage,
      parameterNamespace: config.credentials.parameterNamespace,
      terraformDir: config.terraform.dir,
      logger,
    }),
    store: runtime.store,
    confirm: runtime.confirm ?? createPromptConfirm(),
    configPath: runtime.configPath,
  });
}
