import { load } from "@azure/app-configuration-provider";
import {
  AzureCliCredential,
  ManagedIdentityCredential,
  ChainedTokenCredential,
  type TokenCredential,
} from "@azure/identity";
import { ConfigurationSource } from "../source.js";
import { type Logger } from "../../types/logger.js";
import { errorMessage, getLogger } from "../../utils/logging.js";

const DEFAULT_KEY_PREFIX = "authorizer:";

/**
 * Reads settings from Azure App Configuration. Keys under the prefix map onto
 * the configuration object with `:` as the separator, so
 * `authorizer:azure:tenantId` becomes `azure.tenantId`.
 */
export class AppConfigSource implements ConfigurationSource {
  private endpoint: string;
  private keyPrefix: string;
  private labelFilter: string;
  private managedIdentityClientId: string | undefined;

  constructor(
    env: NodeJS.ProcessEnv = process.env,
    private readonly logger: Logger = getLogger("app-config-source"),
  ) {
    const endpoint = env.AZURE_APPCONFIG_ENDPOINT;
    if (!endpoint) {
      throw new Error(
        "AZURE_APPCONFIG_ENDPOINT environment variable is required",
      );
    }
    this.endpoint = endpoint;
    this.keyPrefix = env.AZURE_APPCONFIG_KEY_PREFIX || DEFAULT_KEY_PREFIX;
    this.labelFilter = env.AZURE_APPCONFIG_LABEL_FILTER || "";
    this.managedIdentityClientId = env.AZURE_MANAGED_IDENTITY_CLIENT_ID;

    this.logger.debug("AppConfigSource initialized", {
      endpoint: this.endpoint,
      keyPrefix: this.keyPrefix,
      labelFilter: this.labelFilter || "(none)",
    });
  }

  async load() {
    this.logger.debug("Loading configuration from Azure App Configuration");
    const credential = this.createCredential();

    try {
      const settings = await load(this.endpoint, credential, {
        selectors: [
          {
            keyFilter: this.keyPrefix + "*",
            ...(this.labelFilter && { labelFilter: this.labelFilter }),
          },
        ],
        trimKeyPrefixes: [this.keyPrefix],
        keyVaultOptions: {
          credential: credential,
        },
      });

      const config = settings.constructConfigurationObject({ separator: ":" });
      this.logger.debug("Configuration loaded from App Configuration", {
        configKeys: Object.keys(config),
      });
      return config;
    } catch (error) {
      this.logger.error("Failed to load configuration from App Configuration", {
        error: errorMessage(error),
        stack: error instanceof Error ? error.stack : undefined,
      });
      throw error;
    }
  }

  private createCredential(): TokenCredential {
    const credentials: TokenCredential[] = [new AzureCliCredential()];

    if (this.managedIdentityClientId) {
      this.logger.debug("Adding ManagedIdentityCredential with client ID", {
        managedIdentityClientId: this.managedIdentityClientId,
      });
      credentials.push(
        new ManagedIdentityCredential({
          clientId: this.managedIdentityClientId,
        }),
      );
    } else {
      credentials.push(new ManagedIdentityCredential());
    }

    return new ChainedTokenCredential(...credentials);
  }
}
