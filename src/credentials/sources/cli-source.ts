import { AzureCliCredential, type TokenCredential } from "@azure/identity";
import { CredentialSource } from "../../types.js";
import { type Logger } from "../../types/logger.js";
import {
  TokenCredentialSource,
  type CredentialSourceOptions,
} from "./base.js";

/**
 * Uses the session cached by `az login`. Building the credential never
 * fails; a missing session or missing rights surface on the first token
 * request.
 */
export class CliCredentialSource extends TokenCredentialSource {
  readonly source = CredentialSource.Cli;

  constructor(
    private readonly cliOptions: CredentialSourceOptions & {
      processTimeoutMs: number;
    },
    logger: Logger,
  ) {
    super(cliOptions, logger);
  }

  protected async createCredential(): Promise<TokenCredential> {
    this.logger.debug("Using Azure CLI credential", {
      processTimeoutMs: this.cliOptions.processTimeoutMs,
    });
    return new AzureCliCredential({
      processTimeoutInMs: this.cliOptions.processTimeoutMs,
    });
  }
}
