import { ConfigurationSource } from "../source.js";

/** Unset and empty variables both read as absent. */
function value(raw: string | undefined): string | undefined {
  return raw || undefined;
}

export class EnvironmentSource implements ConfigurationSource {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  async load() {
    const env = this.env;
    return {
      azure: {
        environment: value(env.AZURE_ENVIRONMENT),
        tenantId: value(env.AZURE_TENANT_ID),
        clientId: value(env.AZURE_CLIENT_ID),
        clientSecret: value(env.AZURE_CLIENT_SECRET),
        certificatePath: value(env.AZURE_CERTIFICATE_PATH),
        certificatePassword: value(env.AZURE_CERTIFICATE_PASSWORD),
        username: value(env.AZURE_USERNAME),
        password: value(env.AZURE_PASSWORD),
        subscriptionId: value(env.AZURE_SUBSCRIPTION_ID),
        resource: value(env.AZURE_AD_RESOURCE),
        authLocation: value(env.AZURE_AUTH_LOCATION),
        managedIdentityClientId: value(env.AZURE_MANAGED_IDENTITY_CLIENT_ID),
        useManagedIdentity: value(env.AZURE_USE_MANAGED_IDENTITY),
      },
      authorizer: {
        userAgent: value(env.AZURE_AUTHORIZER_USER_AGENT),
        verifyCredentials: value(env.AZURE_AUTHORIZER_VERIFY_CREDENTIALS),
        cliProcessTimeoutMs: value(env.AZURE_CLI_PROCESS_TIMEOUT_MS),
      },
    };
  }
}
