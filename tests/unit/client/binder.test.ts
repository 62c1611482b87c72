import { describe, it, expect, beforeEach, vi } from "vitest";
import { ClientBinder, appendUserAgent } from "../../../src/client/binder.js";
import { AuthorizedClient } from "../../../src/client/authorized-client.js";
import {
  InvalidUserAgentError,
  NoAuthorizerAvailableError,
} from "../../../src/errors.js";
import { type Authorizer, CredentialSource } from "../../../src/types.js";
import {
  createMockAuthorizer,
  createMockLogger,
} from "../../utils/test-helpers.js";

describe("appendUserAgent", () => {
  it("should append the extension after a space", () => {
    expect(appendUserAgent("base/1.0", "azure-authorizer")).toBe(
      "base/1.0 azure-authorizer",
    );
  });

  it("should use the extension alone when the current value is empty", () => {
    expect(appendUserAgent("", "azure-authorizer")).toBe("azure-authorizer");
  });

  it("should reject an empty extension", () => {
    expect(() => appendUserAgent("base/1.0", "  ")).toThrow(
      new InvalidUserAgentError("base/1.0"),
    );
  });
});

describe("ClientBinder", () => {
  let binder: ClientBinder;

  beforeEach(() => {
    binder = new ClientBinder("default-agent", createMockLogger());
  });

  it("should install the authorizer and append the user agent", async () => {
    const authorizer = createMockAuthorizer(CredentialSource.Cli);
    const client = new AuthorizedClient("https://example.test", "base/1.0");

    const bound = await binder.bind(client, async () => authorizer, "tool/2.0");

    expect(bound).toBe(client);
    expect(client.authorizer).toBe(authorizer);
    expect(client.userAgent).toBe("base/1.0 tool/2.0");
  });

  it("should fall back to the configured user agent", async () => {
    const client = new AuthorizedClient("https://example.test");

    await binder.bind(client, async () =>
      createMockAuthorizer(CredentialSource.File),
    );

    expect(client.userAgent).toBe("default-agent");
  });

  it("should leave the client untouched when resolution fails", async () => {
    const existing = createMockAuthorizer(CredentialSource.File);
    const client = new AuthorizedClient("https://example.test", "base/1.0");
    client.authorizer = existing;

    await expect(
      binder.bind(
        client,
        async (): Promise<Authorizer> => {
          throw new NoAuthorizerAvailableError();
        },
        "tool/2.0",
      ),
    ).rejects.toThrow(NoAuthorizerAvailableError);

    expect(client.authorizer).toBe(existing);
    expect(client.userAgent).toBe("base/1.0");
  });

  it("should reject an empty user agent without resolving or mutating", async () => {
    const getAuthorizer = vi.fn(async () =>
      createMockAuthorizer(CredentialSource.Cli),
    );
    const client = new AuthorizedClient("https://example.test", "base/1.0");

    await expect(binder.bind(client, getAuthorizer, "")).rejects.toThrow(
      InvalidUserAgentError,
    );

    expect(getAuthorizer).not.toHaveBeenCalled();
    expect(client.authorizer).toBeUndefined();
    expect(client.userAgent).toBe("base/1.0");
  });

  it("should work with any object exposing the client slots", async () => {
    const authorizer = createMockAuthorizer(CredentialSource.Environment);
    const client: { authorizer?: Authorizer; userAgent: string; id: number } =
      { userAgent: "sdk/3.1", id: 7 };

    const bound = await binder.bind(client, async () => authorizer);

    expect(bound.id).toBe(7);
    expect(bound.authorizer).toBe(authorizer);
    expect(bound.userAgent).toBe("sdk/3.1 default-agent");
  });
});

describe("AuthorizedClient", () => {
  it("should build request headers from the bound authorizer", async () => {
    const client = new AuthorizedClient("https://example.test", "base/1.0");
    client.authorizer = createMockAuthorizer(CredentialSource.Cli);

    await expect(client.getRequestHeaders()).resolves.toEqual({
      Authorization: "Bearer cli-token",
      "User-Agent": "base/1.0",
    });
  });

  it("should omit an empty user agent header", async () => {
    const client = new AuthorizedClient("https://example.test");
    client.authorizer = createMockAuthorizer(CredentialSource.File);

    await expect(client.getRequestHeaders()).resolves.toEqual({
      Authorization: "Bearer file-token",
    });
  });

  it("should refuse to build headers without an authorizer", async () => {
    const client = new AuthorizedClient("https://example.test");

    await expect(client.getRequestHeaders()).rejects.toThrow(
      "Client for https://example.test has no authorizer bound",
    );
  });
});
