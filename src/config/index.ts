/**
 * Configuration Module Index
 */

export {
  fleetConfigSchema,
  probeSchema,
  targetDefinitionSchema,
  playbookSchema,
  verifyCheckSchema,
  loggingConfigSchema,
  type FleetConfig,
  type FleetConfigInput,
  type TargetDefinition,
  type PlaybookDefinition,
  type VerifyCheckDefinition,
  type LoggingConfig,
  type ReadinessConfig,
} from "./schema.js";
export {
  DEFAULT_CONFIG_FILE,
  parseConfig,
  resolveConfigPaths,
  loadConfig,
  environmentSettings,
  type EnvironmentSettings,
} from "./loader.js";
