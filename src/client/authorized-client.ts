import { type AuthorizableClient, type Authorizer } from "../types.js";

/**
 * Minimal client that carries a bound authorizer and user agent and turns
 * them into request headers.
 */
export class AuthorizedClient implements AuthorizableClient {
  authorizer?: Authorizer;

  constructor(
    readonly baseUrl: string,
    public userAgent: string = "",
  ) {}

  async getRequestHeaders(): Promise<Record<string, string>> {
    if (!this.authorizer) {
      throw new Error(`Client for ${this.baseUrl} has no authorizer bound`);
    }

    const headers: Record<string, string> = {
      Authorization: await this.authorizer.getAuthorizationHeader(),
    };
    if (this.userAgent) {
      headers["User-Agent"] = this.userAgent;
    }
    return headers;
  }
}
