import { z } from "zod";
import { type CloudEnvironment } from "./environments.js";

const SECONDS = 1000;

export const DEFAULT_CONFIG = {
  azure: {
    environment: "AzurePublicCloud",
    useManagedIdentity: false,
  },
  authorizer: {
    userAgent: "azure-authorizer",
    verifyCredentials: true,
    cliProcessTimeoutMs: 10 * SECONDS,
  },
} as const;

const booleanString = z
  .union([
    z.boolean(),
    z.string().trim().toLowerCase().pipe(z.enum(["true", "false"])),
  ])
  .transform((value) => value === true || value === "true");

const azureSchema = z
  .object({
    environment: z.string().default(DEFAULT_CONFIG.azure.environment),
    tenantId: z.string().optional(),
    clientId: z.string().optional(),
    clientSecret: z.string().optional(),
    certificatePath: z.string().optional(),
    certificatePassword: z.string().optional(),
    username: z.string().optional(),
    password: z.string().optional(),
    subscriptionId: z.string().optional(),
    resource: z.string().optional(),
    authLocation: z.string().optional(),
    managedIdentityClientId: z.string().optional(),
    useManagedIdentity: booleanString.default(
      DEFAULT_CONFIG.azure.useManagedIdentity,
    ),
  })
  .default({});

const authorizerSchema = z
  .object({
    userAgent: z.string().min(1).default(DEFAULT_CONFIG.authorizer.userAgent),
    verifyCredentials: booleanString.default(
      DEFAULT_CONFIG.authorizer.verifyCredentials,
    ),
    cliProcessTimeoutMs: z.coerce
      .number()
      .int()
      .positive()
      .default(DEFAULT_CONFIG.authorizer.cliProcessTimeoutMs),
  })
  .default({});

export const configSchema = z.object({
  azure: azureSchema,
  authorizer: authorizerSchema,
});

export type AuthorizerConfiguration = z.infer<typeof configSchema>;

/**
 * Cloud, identity and resource values read from the ambient environment.
 * `resource` is the resource-management scope used for the cached
 * authorizer.
 */
export interface EnvironmentSettings {
  environment: CloudEnvironment;
  resource: string;
  tenantId?: string;
  clientId?: string;
  clientSecret?: string;
  certificatePath?: string;
  certificatePassword?: string;
  username?: string;
  password?: string;
  subscriptionId?: string;
  authLocation?: string;
  managedIdentityClientId?: string;
  useManagedIdentity: boolean;
}

export interface ResolverOptions {
  userAgent: string;
  verifyCredentials: boolean;
  cliProcessTimeoutMs: number;
}
