import { type AccessToken, type TokenCredential } from "@azure/identity";
import { type Authorizer, type CredentialSource } from "../types.js";

const DEFAULT_SCOPE_SUFFIX = "/.default";

/**
 * Maps a resource (audience) onto the v2 scope form identity expects:
 * `https://management.azure.com/` becomes
 * `https://management.azure.com/.default`.
 */
export function resourceToScope(resource: string): string {
  if (resource.endsWith(DEFAULT_SCOPE_SUFFIX)) {
    return resource;
  }
  return resource.replace(/\/+$/, "") + DEFAULT_SCOPE_SUFFIX;
}

export class TokenAuthorizer implements Authorizer {
  readonly scope: string;

  constructor(
    readonly credential: TokenCredential,
    readonly resource: string,
    readonly source: CredentialSource,
  ) {
    this.scope = resourceToScope(resource);
  }

  async getAccessToken(): Promise<AccessToken> {
    const token = await this.credential.getToken(this.scope);
    if (!token) {
      throw new Error(
        `${this.source} credential returned no access token for ${this.scope}`,
      );
    }
    return token;
  }

  async getAuthorizationHeader(): Promise<string> {
    const { token } = await this.getAccessToken();
    return `Bearer ${token}`;
  }
}
