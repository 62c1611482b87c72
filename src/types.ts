import { type AccessToken, type TokenCredential } from "@azure/identity";

export const CredentialSource = {
  File: "file",
  Cli: "cli",
  Environment: "env",
} as const;

export type CredentialSource =
  (typeof CredentialSource)[keyof typeof CredentialSource];

/** Order in which the resolver consults credential sources. */
export const CREDENTIAL_SOURCE_PRIORITY: readonly CredentialSource[] = [
  CredentialSource.File,
  CredentialSource.Cli,
  CredentialSource.Environment,
];

/**
 * A resource-scoped token provider. Instances are immutable and safe to share.
 */
export interface Authorizer {
  readonly resource: string;
  readonly source: CredentialSource;
  readonly credential: TokenCredential;
  getAccessToken(): Promise<AccessToken>;
  getAuthorizationHeader(): Promise<string>;
}

export interface CredentialSourceAdapter {
  readonly source: CredentialSource;
  /**
   * Produces an authorizer for `resource` or rejects with a
   * `SourceUnavailableError`.
   */
  resolve(resource: string): Promise<Authorizer>;
}

export type ResolutionResult =
  | {
      readonly ok: true;
      readonly authorizer: Authorizer;
      readonly source: CredentialSource;
    }
  | { readonly ok: false };

export const AttemptOutcome = {
  Success: "success",
  Failure: "failure",
} as const;

export type AttemptOutcome =
  (typeof AttemptOutcome)[keyof typeof AttemptOutcome];

export interface ResolutionAttempt {
  readonly source: CredentialSource;
  readonly outcome: AttemptOutcome;
  readonly durationMs: number;
  readonly error?: string;
}

export interface AuthorizableClient {
  authorizer?: Authorizer;
  userAgent: string;
}
