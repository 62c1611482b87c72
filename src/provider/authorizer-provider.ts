import {
  type AuthorizableClient,
  type Authorizer,
  type CredentialSource,
  type ResolutionResult,
} from "../types.js";
import { type EnvironmentSettings } from "../config/configuration.js";
import { AuthorizerResolver } from "../credentials/resolver.js";
import { ManagementAuthorizerCache } from "../credentials/cache.js";
import { ClientBinder } from "../client/binder.js";
import { type Logger } from "../types/logger.js";

export interface AuthorizerProvider {
  readonly settings: EnvironmentSettings;
  readonly userAgent: string;
  resolveForResource(resource: string): Promise<Authorizer>;
  tryResolveForResource(resource: string): Promise<ResolutionResult>;
  resolveDefault(): Promise<Authorizer>;
  resolveFromSource(
    source: CredentialSource,
    resource?: string,
  ): Promise<Authorizer>;
  getManagementAuthorizer(): Promise<Authorizer>;
  bindResource<TClient extends AuthorizableClient>(
    resource: string,
    client: TClient,
    userAgent?: string,
  ): Promise<TClient>;
  bindManagement<TClient extends AuthorizableClient>(
    client: TClient,
    userAgent?: string,
  ): Promise<TClient>;
  clearCache(): void;
}

export class AuthorizerProviderImpl implements AuthorizerProvider {
  private readonly cache: ManagementAuthorizerCache;
  private readonly binder: ClientBinder;

  constructor(
    readonly settings: EnvironmentSettings,
    readonly userAgent: string,
    private readonly resolver: AuthorizerResolver,
    logger: Logger,
  ) {
    this.cache = new ManagementAuthorizerCache(
      () => this.resolver.resolveDefault(),
      logger,
    );
    this.binder = new ClientBinder(userAgent, logger);

    logger.debug("Authorizer provider initialized", {
      environment: settings.environment.name,
      resource: settings.resource,
      sources: resolver.sources,
      userAgent,
    });
  }

  resolveForResource(resource: string): Promise<Authorizer> {
    return this.resolver.resolveForResource(resource);
  }

  tryResolveForResource(resource: string): Promise<ResolutionResult> {
    return this.resolver.tryResolveForResource(resource);
  }

  resolveDefault(): Promise<Authorizer> {
    return this.resolver.resolveDefault();
  }

  resolveFromSource(
    source: CredentialSource,
    resource?: string,
  ): Promise<Authorizer> {
    return this.resolver.resolveFromSource(source, resource);
  }

  getManagementAuthorizer(): Promise<Authorizer> {
    return this.cache.get();
  }

  bindResource<TClient extends AuthorizableClient>(
    resource: string,
    client: TClient,
    userAgent?: string,
  ): Promise<TClient> {
    return this.binder.bind(
      client,
      () => this.resolver.resolveForResource(resource),
      userAgent,
    );
  }

  bindManagement<TClient extends AuthorizableClient>(
    client: TClient,
    userAgent?: string,
  ): Promise<TClient> {
    return this.binder.bind(client, () => this.cache.get(), userAgent);
  }

  clearCache(): void {
    this.cache.clear();
  }
}
