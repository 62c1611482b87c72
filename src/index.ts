export { createAuthorizerProvider } from "./provider/factory.js";
export type { AuthorizerProviderOptions } from "./provider/factory.js";
export type { AuthorizerProvider } from "./provider/authorizer-provider.js";

export { AuthorizerResolver } from "./credentials/resolver.js";
export { ManagementAuthorizerCache } from "./credentials/cache.js";
export { TokenAuthorizer, resourceToScope } from "./credentials/authorizer.js";
export {
  FileCredentialSource,
  CliCredentialSource,
  EnvironmentCredentialSource,
  TokenCredentialSource,
  DEFAULT_AUTH_FILE_PATH,
} from "./credentials/sources/index.js";

export { ClientBinder, appendUserAgent } from "./client/binder.js";
export { AuthorizedClient } from "./client/authorized-client.js";

export type { ConfigurationSource } from "./config/source.js";
export { EnvironmentSource, AppConfigSource } from "./config/sources/index.js";
export type { EnvironmentSettings } from "./config/configuration.js";
export {
  AzurePublicCloud,
  AzureChinaCloud,
  AzureUSGovernmentCloud,
  AzureGermanCloud,
  environmentFromName,
  type CloudEnvironment,
} from "./config/environments.js";

export {
  SourceUnavailableError,
  NoAuthorizerAvailableError,
  SettingsUnavailableError,
  InvalidUserAgentError,
} from "./errors.js";

export type {
  Authorizer,
  AuthorizableClient,
  CredentialSourceAdapter,
  ResolutionAttempt,
  ResolutionResult,
} from "./types.js";
export { CredentialSource, CREDENTIAL_SOURCE_PRIORITY } from "./types.js";

export {
  getLogger,
  setRootLogger,
  createLogger,
  fromPino,
} from "./utils/logging.js";
export type { Logger } from "./types/logger.js";
