import {
  configSchema,
  type AuthorizerConfiguration,
  type EnvironmentSettings,
  type ResolverOptions,
} from "./configuration.js";
import { environmentFromName, type CloudEnvironment } from "./environments.js";
import { ConfigurationSource } from "./source.js";
import { EnvironmentSource, AppConfigSource } from "./sources/index.js";
import { SettingsUnavailableError } from "../errors.js";
import { type Logger } from "../types/logger.js";
import { errorMessage, getLogger } from "../utils/logging.js";

/**
 * Loads and validates configuration once. Every failure, whether the source
 * cannot be read, the values do not parse, or the cloud name is unknown,
 * surfaces as a `SettingsUnavailableError`.
 */
export class ConfigurationManager {
  private source: ConfigurationSource;
  private configPromise?: Promise<AuthorizerConfiguration>;

  constructor(
    source?: ConfigurationSource,
    private readonly logger: Logger = getLogger("config-manager"),
  ) {
    this.source = source || this.createConfigSource();
  }

  async getConfiguration(): Promise<AuthorizerConfiguration> {
    if (!this.configPromise) {
      this.logger.debug("Loading configuration for first time");
      this.configPromise = this.loadAndValidateConfig();
    }
    return this.configPromise;
  }

  private async loadAndValidateConfig(): Promise<AuthorizerConfiguration> {
    try {
      this.logger.debug("Loading raw configuration from source");
      const raw = await this.source.load();
      return configSchema.parse(raw);
    } catch (error) {
      this.logger.error("Failed to load configuration", {
        error: errorMessage(error),
      });
      throw new SettingsUnavailableError(error);
    }
  }

  private createConfigSource(): ConfigurationSource {
    if (process.env.AZURE_APPCONFIG_ENDPOINT) {
      this.logger.debug("Using AppConfigSource", {
        endpoint: process.env.AZURE_APPCONFIG_ENDPOINT,
      });
      return new AppConfigSource(process.env, this.logger);
    }
    return new EnvironmentSource();
  }

  async getEnvironmentSettings(): Promise<EnvironmentSettings> {
    const { azure } = await this.getConfiguration();

    let environment: CloudEnvironment;
    try {
      environment = environmentFromName(azure.environment);
    } catch (error) {
      this.logger.error("Failed to resolve cloud environment", {
        environment: azure.environment,
        error: errorMessage(error),
      });
      throw new SettingsUnavailableError(error);
    }

    const { environment: _name, resource, ...identity } = azure;
    return {
      ...identity,
      environment,
      resource: resource || environment.resourceManagerEndpoint,
    };
  }

  async getResolverOptions(): Promise<ResolverOptions> {
    const { authorizer } = await this.getConfiguration();
    return {
      userAgent: authorizer.userAgent,
      verifyCredentials: authorizer.verifyCredentials,
      cliProcessTimeoutMs: authorizer.cliProcessTimeoutMs,
    };
  }
}
