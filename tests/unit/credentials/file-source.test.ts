import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import * as identity from "../../utils/identity-mock.js";
import {
  FileCredentialSource,
  decodeAuthFile,
} from "../../../src/credentials/sources/file-source.js";
import { SourceUnavailableError } from "../../../src/errors.js";
import { createMockLogger } from "../../utils/test-helpers.js";

vi.mock("@azure/identity", () => import("../../utils/identity-mock.js"));

const MANAGEMENT = "https://management.azure.com/";

const secretAuthFile = {
  clientId: "test-client-id",
  clientSecret: "test-secret",
  subscriptionId: "test-subscription-id",
  tenantId: "test-tenant-id",
  activeDirectoryEndpointUrl: "https://login.microsoftonline.com",
  resourceManagerEndpointUrl: "https://management.azure.com/",
};

describe("FileCredentialSource", () => {
  let dir: string;

  beforeEach(() => {
    identity.resetIdentityMock();
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "authorizer-file-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function writeAuthFile(contents: string | Buffer): string {
    const filePath = path.join(dir, "sdk-auth.json");
    fs.writeFileSync(filePath, contents);
    return filePath;
  }

  function createSource(filePath: string, verifyCredentials = true) {
    return new FileCredentialSource(
      { verifyCredentials, filePath },
      createMockLogger(),
    );
  }

  it("should build a client secret credential from the auth file", async () => {
    const filePath = writeAuthFile(JSON.stringify(secretAuthFile));

    const authorizer = await createSource(filePath).resolve(MANAGEMENT);

    expect(authorizer.source).toBe("file");
    expect(authorizer.resource).toBe(MANAGEMENT);
    expect(authorizer.credential).toBeInstanceOf(
      identity.ClientSecretCredential,
    );
    expect(authorizer.credential).toMatchObject({
      args: [
        "test-tenant-id",
        "test-client-id",
        "test-secret",
        { authorityHost: "https://login.microsoftonline.com" },
      ],
    });
    expect(identity.getToken).toHaveBeenCalledWith(
      "https://management.azure.com/.default",
    );
  });

  it("should build a certificate credential when no secret is present", async () => {
    const filePath = writeAuthFile(
      JSON.stringify({
        clientId: "test-client-id",
        tenantId: "test-tenant-id",
        clientCertificate: "/certs/test.pem",
        clientCertificatePassword: "test-password",
      }),
    );

    const authorizer = await createSource(filePath).resolve(MANAGEMENT);

    expect(authorizer.credential).toBeInstanceOf(
      identity.ClientCertificateCredential,
    );
    expect(authorizer.credential).toMatchObject({
      args: [
        "test-tenant-id",
        "test-client-id",
        {
          certificatePath: "/certs/test.pem",
          certificatePassword: "test-password",
        },
        {},
      ],
    });
  });

  it("should read a UTF-16 auth file with a byte order mark", async () => {
    const body = Buffer.from(JSON.stringify(secretAuthFile), "utf16le");
    const filePath = writeAuthFile(
      Buffer.concat([Buffer.from([0xff, 0xfe]), body]),
    );

    const authorizer = await createSource(filePath).resolve(MANAGEMENT);

    expect(authorizer.credential).toBeInstanceOf(
      identity.ClientSecretCredential,
    );
  });

  it("should pass the requested resource through, not the management endpoint", async () => {
    const filePath = writeAuthFile(JSON.stringify(secretAuthFile));

    const authorizer = await createSource(filePath).resolve(
      "https://vault.azure.net",
    );

    expect(authorizer.resource).toBe("https://vault.azure.net");
    expect(identity.getToken).toHaveBeenCalledWith(
      "https://vault.azure.net/.default",
    );
  });

  it("should skip verification when it is disabled", async () => {
    const filePath = writeAuthFile(JSON.stringify(secretAuthFile));

    await createSource(filePath, false).resolve(MANAGEMENT);

    expect(identity.getToken).not.toHaveBeenCalled();
  });

  it("should fail when the file is missing", async () => {
    const source = createSource(path.join(dir, "missing.json"));

    await expect(source.resolve(MANAGEMENT)).rejects.toThrow(
      SourceUnavailableError,
    );
  });

  it("should fail when the file is not JSON", async () => {
    const filePath = writeAuthFile("not json");

    const error = await createSource(filePath)
      .resolve(MANAGEMENT)
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SourceUnavailableError);
    expect(error).toMatchObject({
      source: "file",
      cause: expect.any(SyntaxError),
    });
  });

  it("should fail when the file has neither secret nor certificate", async () => {
    const filePath = writeAuthFile(
      JSON.stringify({ clientId: "test-client-id", tenantId: "test-tenant-id" }),
    );

    await expect(createSource(filePath).resolve(MANAGEMENT)).rejects.toThrow(
      "auth file must contain clientSecret or clientCertificate",
    );
  });

  it("should fail when the identity provider rejects the credentials", async () => {
    identity.getToken.mockRejectedValueOnce(
      new Error("AADSTS7000215: Invalid client secret provided."),
    );
    const filePath = writeAuthFile(JSON.stringify(secretAuthFile));

    await expect(createSource(filePath).resolve(MANAGEMENT)).rejects.toThrow(
      "file credential source unavailable: AADSTS7000215: Invalid client secret provided.",
    );
  });
});

describe("decodeAuthFile", () => {
  it("should strip a UTF-8 byte order mark", () => {
    const buffer = Buffer.concat([
      Buffer.from([0xef, 0xbb, 0xbf]),
      Buffer.from('{"a":1}', "utf8"),
    ]);

    expect(decodeAuthFile(buffer)).toBe('{"a":1}');
  });

  it("should decode big-endian UTF-16", () => {
    const little = Buffer.from('{"a":1}', "utf16le");
    const big = Buffer.from(little);
    big.swap16();

    expect(decodeAuthFile(Buffer.concat([Buffer.from([0xfe, 0xff]), big]))).toBe(
      '{"a":1}',
    );
  });
});
