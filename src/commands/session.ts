/**
 * Per-invocation setup shared by every command: configuration, logger,
 * run-state store and orchestrator, torn down in reverse order.
 */

import type { CommonOptions } from "../cli/options.js";
import type { CliRuntime } from "../cli/runtime.js";
import { DEFAULT_CONFIG_FILE, loadConfig, type FleetConfig } from "../config/index.js";
import { createLogger, type Logger, type LogTransport } from "../logging/index.js";
import {
  InMemoryRunStateStore,
  createOrchestrator,
  openRunStateStore,
  type Orchestrator,
  type RunStateStore,
} from "../orchestrator/index.js";
import {
  createDeploymentRequest,
  type DeploymentAction,
  type DeploymentFlags,
  type DeploymentRequest,
} from "../types.js";

export type Session = {
  config: FleetConfig;
  logger: Logger;
  orchestrator: Orchestrator;
  request: DeploymentRequest;
};

export async function withSession<T>(
  options: CommonOptions,
  action: DeploymentAction,
  flags: Partial<DeploymentFlags>,
  runtime: CliRuntime,
  fn: (session: Session) => Promise<T>,
): Promise<T> {
  const config = await loadConfig(options.config);
  const request = createDeploymentRequest({
    environment: options.env,
    action,
    credentialSources: config.credentials.sources,
    credentialOverrides: options.credential,
    sizing: options.var,
    flags: { ...flags, dryRun: options.dryRun, force: options.force },
  });

  const { logger, transports } = createLogger(
    { ...config.logging, level: options.logLevel ?? config.logging.level },
    runtime.transports ? { transports: runtime.transports } : undefined,
  );

  let store: RunStateStore | undefined;
  try {
    store = options.dryRun
      ? new InMemoryRunStateStore()
      : await (runtime.openStore ?? openRunStateStore)(config.state.file);
    const orchestrator = createOrchestrator(config, {
      logger,
      store,
      confirm: runtime.confirm,
      runner: runtime.runner,
      env: runtime.env,
      configPath: options.config === DEFAULT_CONFIG_FILE ? undefined : options.config,
    });
    return await fn({ config, logger, orchestrator, request });
  } finally {
    await store?.close();
    await closeTransports(transports);
  }
}

async function closeTransports(transports: readonly LogTransport[]): Promise<void> {
  for (const transport of transports) await transport.close?.();
}
