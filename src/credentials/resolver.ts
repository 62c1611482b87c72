import {
  AttemptOutcome,
  CREDENTIAL_SOURCE_PRIORITY,
  type Authorizer,
  type CredentialSource,
  type CredentialSourceAdapter,
  type ResolutionAttempt,
  type ResolutionResult,
} from "../types.js";
import { type Logger } from "../types/logger.js";
import { NoAuthorizerAvailableError } from "../errors.js";
import { childLogger, errorMessage } from "../utils/logging.js";

function byPriority(
  a: CredentialSourceAdapter,
  b: CredentialSourceAdapter,
): number {
  return (
    CREDENTIAL_SOURCE_PRIORITY.indexOf(a.source) -
    CREDENTIAL_SOURCE_PRIORITY.indexOf(b.source)
  );
}

/**
 * Tries credential sources one after another (file, CLI, environment) and
 * returns the first authorizer produced. Per-source failures are logged and
 * collapsed into a single `NoAuthorizerAvailableError`.
 */
export class AuthorizerResolver {
  private readonly adapters: readonly CredentialSourceAdapter[];

  constructor(
    adapters: readonly CredentialSourceAdapter[],
    private readonly defaultResource: string,
    private readonly logger: Logger,
  ) {
    this.adapters = [...adapters].sort(byPriority);
  }

  get sources(): CredentialSource[] {
    return this.adapters.map((adapter) => adapter.source);
  }

  async resolveForResource(resource: string): Promise<Authorizer> {
    const result = await this.tryResolveForResource(resource);
    if (!result.ok) {
      throw new NoAuthorizerAvailableError();
    }
    return result.authorizer;
  }

  async tryResolveForResource(resource: string): Promise<ResolutionResult> {
    return this.resolveWith(this.adapters, resource);
  }

  async resolveDefault(): Promise<Authorizer> {
    return this.resolveForResource(this.defaultResource);
  }

  /** Consults only `source`, still reporting failure generically. */
  async resolveFromSource(
    source: CredentialSource,
    resource: string = this.defaultResource,
  ): Promise<Authorizer> {
    const adapters = this.adapters.filter(
      (adapter) => adapter.source === source,
    );
    const result = await this.resolveWith(adapters, resource);
    if (!result.ok) {
      throw new NoAuthorizerAvailableError();
    }
    return result.authorizer;
  }

  private async resolveWith(
    adapters: readonly CredentialSourceAdapter[],
    resource: string,
  ): Promise<ResolutionResult> {
    const attempts: ResolutionAttempt[] = [];

    for (const adapter of adapters) {
      const log = childLogger(this.logger, { method: adapter.source });
      const startedAt = Date.now();

      try {
        const authorizer = await adapter.resolve(resource);
        attempts.push({
          source: adapter.source,
          outcome: AttemptOutcome.Success,
          durationMs: Date.now() - startedAt,
        });
        log.info("Authorizer resolved", {
          source: adapter.source,
          resource,
          attempts,
        });
        return { ok: true, authorizer, source: adapter.source };
      } catch (error) {
        const message = errorMessage(error);
        attempts.push({
          source: adapter.source,
          outcome: AttemptOutcome.Failure,
          durationMs: Date.now() - startedAt,
          error: message,
        });
        log.warn("Credential source unavailable", {
          source: adapter.source,
          resource,
          error: message,
        });
      }
    }

    this.logger.error("No authorizer available", { resource, attempts });
    return { ok: false };
  }
}
