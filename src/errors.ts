import { type CredentialSource } from "./types.js";
import { errorMessage } from "./utils/logging.js";

export const NO_AUTHORIZER_MESSAGE = "no authorizer available";

/**
 * A single credential source could not produce an authorizer. Only ever
 * logged; the resolver never lets it escape.
 */
export class SourceUnavailableError extends Error {
  readonly name = "SourceUnavailableError";

  constructor(
    readonly source: CredentialSource,
    cause: unknown,
  ) {
    super(`${source} credential source unavailable: ${errorMessage(cause)}`, {
      cause,
    });
  }
}

/**
 * Every credential source failed. Carries no per-source detail; the
 * resolution attempt log holds that.
 */
export class NoAuthorizerAvailableError extends Error {
  readonly name = "NoAuthorizerAvailableError";

  constructor() {
    super(NO_AUTHORIZER_MESSAGE);
  }
}

export class SettingsUnavailableError extends Error {
  readonly name = "SettingsUnavailableError";

  constructor(cause: unknown) {
    super(`environment settings unavailable: ${errorMessage(cause)}`, {
      cause,
    });
  }
}

export class InvalidUserAgentError extends Error {
  readonly name = "InvalidUserAgentError";

  constructor(current: string) {
    super(`user agent extension was empty, user agent stayed as "${current}"`);
  }
}
