import { type TokenCredential } from "@azure/identity";
import {
  type Authorizer,
  type CredentialSource,
  type CredentialSourceAdapter,
} from "../../types.js";
import { type Logger } from "../../types/logger.js";
import { SourceUnavailableError } from "../../errors.js";
import { TokenAuthorizer } from "../authorizer.js";

export interface CredentialSourceOptions {
  verifyCredentials: boolean;
}

/**
 * Builds an identity credential and, when verification is on, acquires one
 * token with it so that rejected credentials fail here rather than on first
 * use. Any failure is reported as a `SourceUnavailableError`.
 */
export abstract class TokenCredentialSource implements CredentialSourceAdapter {
  abstract readonly source: CredentialSource;

  constructor(
    protected readonly options: CredentialSourceOptions,
    protected readonly logger: Logger,
  ) {}

  protected abstract createCredential(
    resource: string,
  ): Promise<TokenCredential>;

  async resolve(resource: string): Promise<Authorizer> {
    try {
      const credential = await this.createCredential(resource);
      const authorizer = new TokenAuthorizer(credential, resource, this.source);

      if (this.options.verifyCredentials) {
        this.logger.debug("Verifying credential", {
          source: this.source,
          scope: authorizer.scope,
        });
        await authorizer.getAccessToken();
      }

      return authorizer;
    } catch (error) {
      if (error instanceof SourceUnavailableError) {
        throw error;
      }
      throw new SourceUnavailableError(this.source, error);
    }
  }
}
