import {
  ClientCertificateCredential,
  ClientSecretCredential,
  type TokenCredential,
} from "@azure/identity";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { z } from "zod";
import { CredentialSource } from "../../types.js";
import { type Logger } from "../../types/logger.js";
import {
  TokenCredentialSource,
  type CredentialSourceOptions,
} from "./base.js";

export const DEFAULT_AUTH_FILE_PATH = path.join(
  os.homedir(),
  ".azure",
  "sdk-auth.json",
);

/** Shape written by `az ad sp create-for-rbac --sdk-auth`. */
export const authFileSchema = z
  .object({
    clientId: z.string().min(1),
    tenantId: z.string().min(1),
    clientSecret: z.string().optional(),
    clientCertificate: z.string().optional(),
    clientCertificatePassword: z.string().optional(),
    subscriptionId: z.string().optional(),
    activeDirectoryEndpointUrl: z.string().url().optional(),
    resourceManagerEndpointUrl: z.string().optional(),
    activeDirectoryGraphResourceId: z.string().optional(),
    sqlManagementEndpointUrl: z.string().optional(),
    galleryEndpointUrl: z.string().optional(),
    managementEndpointUrl: z.string().optional(),
  })
  .refine((file) => !!file.clientSecret || !!file.clientCertificate, {
    message: "auth file must contain clientSecret or clientCertificate",
  });

export type AuthFile = z.infer<typeof authFileSchema>;

export function decodeAuthFile(buffer: Buffer): string {
  if (buffer[0] === 0xef && buffer[1] === 0xbb && buffer[2] === 0xbf) {
    return buffer.subarray(3).toString("utf8");
  }
  if (buffer[0] === 0xff && buffer[1] === 0xfe) {
    return buffer.subarray(2).toString("utf16le");
  }
  if (buffer[0] === 0xfe && buffer[1] === 0xff) {
    const swapped = Buffer.from(buffer.subarray(2));
    swapped.swap16();
    return swapped.toString("utf16le");
  }
  return buffer.toString("utf8");
}

export async function readAuthFile(filePath: string): Promise<AuthFile> {
  const buffer = await fs.promises.readFile(filePath);
  const parsed: unknown = JSON.parse(decodeAuthFile(buffer));
  return authFileSchema.parse(parsed);
}

export class FileCredentialSource extends TokenCredentialSource {
  readonly source = CredentialSource.File;
  private readonly filePath: string;

  constructor(
    options: CredentialSourceOptions & { filePath?: string },
    logger: Logger,
  ) {
    super(options, logger);
    this.filePath = options.filePath || DEFAULT_AUTH_FILE_PATH;
  }

  protected async createCredential(): Promise<TokenCredential> {
    this.logger.debug("Reading auth file", { filePath: this.filePath });
    const file = await readAuthFile(this.filePath);

    const options = file.activeDirectoryEndpointUrl
      ? { authorityHost: file.activeDirectoryEndpointUrl }
      : {};

    if (file.clientSecret) {
      this.logger.debug("Using client secret from auth file", {
        clientId: file.clientId,
        tenantId: file.tenantId,
      });
      return new ClientSecretCredential(
        file.tenantId,
        file.clientId,
        file.clientSecret,
        options,
      );
    }

    if (file.clientCertificate) {
      this.logger.debug("Using client certificate from auth file", {
        clientId: file.clientId,
        tenantId: file.tenantId,
      });
      return new ClientCertificateCredential(
        file.tenantId,
        file.clientId,
        {
          certificatePath: file.clientCertificate,
          ...(file.clientCertificatePassword && {
            certificatePassword: file.clientCertificatePassword,
          }),
        },
        options,
      );
    }

    throw new Error("auth file contains no client secret or certificate");
  }
}
