import { type AuthorizableClient, type Authorizer } from "../types.js";
import { type Logger } from "../types/logger.js";
import { InvalidUserAgentError } from "../errors.js";

export function appendUserAgent(current: string, extension: string): string {
  const trimmed = extension.trim();
  if (!trimmed) {
    throw new InvalidUserAgentError(current);
  }
  return current ? `${current} ${trimmed}` : trimmed;
}

/**
 * Installs authorizers on clients. A bind either sets both the authorizer
 * and the user agent, or leaves the client untouched.
 */
export class ClientBinder {
  constructor(
    private readonly defaultUserAgent: string,
    private readonly logger: Logger,
  ) {}

  async bind<TClient extends AuthorizableClient>(
    client: TClient,
    getAuthorizer: () => Promise<Authorizer>,
    userAgent: string = this.defaultUserAgent,
  ): Promise<TClient> {
    const nextUserAgent = appendUserAgent(client.userAgent, userAgent);
    const authorizer = await getAuthorizer();

    client.authorizer = authorizer;
    client.userAgent = nextUserAgent;

    this.logger.debug("Client authorized", {
      resource: authorizer.resource,
      source: authorizer.source,
      userAgent: nextUserAgent,
    });
    return client;
  }
}
