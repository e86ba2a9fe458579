/**
 * Credentials Module Index
 */

export {
  DEFAULT_CREDENTIAL_CATALOG,
  namesFor,
  findDefinition,
  type CredentialDefinition,
  type CredentialKind,
} from "./catalog.js";
export { Credentials } from "./credentials.js";
export {
  OverrideSource,
  EnvironmentSource,
  SecretsFileSource,
  parseSecretsFile,
  type CredentialSource,
} from "./sources.js";
export { ParameterStoreSource, parameterName, type ParameterStoreOptions } from "./parameter-store.js";
export {
  StsIdentityVerifier,
  createStsClient,
  type CallerIdentity,
  type IdentityVerifier,
} from "./identity.js";
export {
  CredentialResolver,
  assertKnownCredentialKeys,
  createCredentialSources,
  provisioningEnvironment,
  playbookVariables,
  expandHome,
  type CredentialResolverOptions,
  type SourceSettings,
} from "./resolver.js";
