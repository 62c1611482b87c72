import { ConfigurationManager } from "../config/manager.js";
import { type ConfigurationSource } from "../config/source.js";
import { AuthorizerResolver } from "../credentials/resolver.js";
import {
  CliCredentialSource,
  EnvironmentCredentialSource,
  FileCredentialSource,
} from "../credentials/sources/index.js";
import { type Logger } from "../types/logger.js";
import { getLogger } from "../utils/logging.js";
import {
  AuthorizerProviderImpl,
  type AuthorizerProvider,
} from "./authorizer-provider.js";

export interface AuthorizerProviderOptions {
  /** Appended to client user agents on bind. Overrides configuration. */
  userAgent?: string;
  configSource?: ConfigurationSource;
  logger?: Logger;
}

/**
 * Loads environment settings and wires the file, CLI and environment
 * sources into a provider. Rejects with `SettingsUnavailableError` when
 * settings cannot be loaded.
 */
export async function createAuthorizerProvider(
  options: AuthorizerProviderOptions = {},
): Promise<AuthorizerProvider> {
  const logger = options.logger || getLogger("authorizer");
  const configManager = new ConfigurationManager(
    options.configSource,
    logger,
  );

  const settings = await configManager.getEnvironmentSettings();
  const resolverOptions = await configManager.getResolverOptions();
  const sourceOptions = {
    verifyCredentials: resolverOptions.verifyCredentials,
  };

  const resolver = new AuthorizerResolver(
    [
      new FileCredentialSource(
        { ...sourceOptions, filePath: settings.authLocation },
        logger,
      ),
      new CliCredentialSource(
        {
          ...sourceOptions,
          processTimeoutMs: resolverOptions.cliProcessTimeoutMs,
        },
        logger,
      ),
      new EnvironmentCredentialSource(settings, sourceOptions, logger),
    ],
    settings.resource,
    logger,
  );

  return new AuthorizerProviderImpl(
    settings,
    options.userAgent || resolverOptions.userAgent,
    resolver,
    logger,
  );
}
