import {
  ClientCertificateCredential,
  ClientSecretCredential,
  ManagedIdentityCredential,
  UsernamePasswordCredential,
  type TokenCredential,
} from "@azure/identity";
import { type EnvironmentSettings } from "../../config/configuration.js";
import { CredentialSource } from "../../types.js";
import { type Logger } from "../../types/logger.js";
import {
  TokenCredentialSource,
  type CredentialSourceOptions,
} from "./base.js";

/**
 * Picks the first usable combination from the environment settings:
 * client secret, client certificate, username and password, then managed
 * identity when it is enabled.
 */
export class EnvironmentCredentialSource extends TokenCredentialSource {
  readonly source = CredentialSource.Environment;

  constructor(
    private readonly settings: EnvironmentSettings,
    options: CredentialSourceOptions,
    logger: Logger,
  ) {
    super(options, logger);
  }

  protected async createCredential(): Promise<TokenCredential> {
    const {
      tenantId,
      clientId,
      clientSecret,
      certificatePath,
      certificatePassword,
      username,
      password,
      managedIdentityClientId,
      useManagedIdentity,
    } = this.settings;
    const options = {
      authorityHost: this.settings.environment.activeDirectoryEndpoint,
    };

    if (tenantId && clientId) {
      if (clientSecret) {
        this.logger.debug("Using client secret from environment", {
          clientId,
          tenantId,
        });
        return new ClientSecretCredential(
          tenantId,
          clientId,
          clientSecret,
          options,
        );
      }

      if (certificatePath) {
        this.logger.debug("Using client certificate from environment", {
          clientId,
          tenantId,
        });
        return new ClientCertificateCredential(
          tenantId,
          clientId,
          {
            certificatePath,
            ...(certificatePassword && { certificatePassword }),
          },
          options,
        );
      }

      if (username && password) {
        this.logger.debug("Using username and password from environment", {
          clientId,
          tenantId,
        });
        return new UsernamePasswordCredential(
          tenantId,
          clientId,
          username,
          password,
          options,
        );
      }
    }

    if (useManagedIdentity || managedIdentityClientId) {
      this.logger.debug("Using managed identity", {
        clientId: managedIdentityClientId,
      });
      return new ManagedIdentityCredential(
        managedIdentityClientId
          ? { clientId: managedIdentityClientId }
          : undefined,
      );
    }

    throw new Error(
      "no credentials in environment: set AZURE_TENANT_ID and AZURE_CLIENT_ID " +
        "with AZURE_CLIENT_SECRET, AZURE_CERTIFICATE_PATH, or AZURE_USERNAME " +
        "and AZURE_PASSWORD, or enable managed identity",
    );
  }
}
