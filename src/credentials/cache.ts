import { type Authorizer } from "../types.js";
import { type Logger } from "../types/logger.js";

/**
 * Single-slot cache for the management authorizer.
 *
 * The slot has no TTL: once filled it is served until `clear()` is called.
 * Failed resolutions are never stored. Concurrent callers that find the slot
 * empty share one in-flight resolution instead of each resolving.
 */
export class ManagementAuthorizerCache {
  private authorizer?: Authorizer;
  private pending?: Promise<Authorizer>;
  private generation = 0;

  constructor(
    private readonly resolve: () => Promise<Authorizer>,
    private readonly logger: Logger,
  ) {}

  async get(): Promise<Authorizer> {
    if (this.authorizer) {
      this.logger.debug("Management authorizer cache hit", {
        source: this.authorizer.source,
      });
      return this.authorizer;
    }

    if (this.pending) {
      this.logger.debug("Found pending management authorizer request");
      return this.pending;
    }

    this.logger.debug("Management authorizer cache miss, resolving");

    const generation = this.generation;
    const promise = this.resolve().then((authorizer) => {
      if (generation === this.generation) {
        this.authorizer = authorizer;
      }
      return authorizer;
    });
    this.pending = promise;

    try {
      return await promise;
    } finally {
      if (this.pending === promise) {
        this.pending = undefined;
      }
    }
  }

  peek(): Authorizer | undefined {
    return this.authorizer;
  }

  clear(): void {
    this.authorizer = undefined;
    this.pending = undefined;
    this.generation++;
    this.logger.debug("Management authorizer cache cleared");
  }
}
