import { describe, expect, test } from "vitest";
import {
  ApiKeyAuthMiddleware,
  authConfigFromEnvironment,
  BasicAuthMiddleware,
  ClientConfigError,
  createAuthMiddleware,
  mergeEnvironment,
  parseClientConfig,
  parseEnvText,
} from "../src";

describe("parseClientConfig", () => {
  test("returns null for missing or blank text", () => {
    expect(parseClientConfig(undefined)).toBeNull();
    expect(parseClientConfig("  \n")).toBeNull();
  });

  test("parses auth and timeout", () => {
    const config = parseClientConfig(
      '{"auth":{"type":"bearer","apiKey":"test-key"},"timeoutMs":5000}',
    );

    expect(config).toEqual({ auth: { type: "bearer", apiKey: "test-key" }, timeoutMs: 5000 });
  });

  test("rejects malformed JSON", () => {
    expect(() => parseClientConfig("{")).toThrow(ClientConfigError);
    expect(() => parseClientConfig("{")).toThrow(/^Invalid client config format: /);
  });

  test("rejects unknown keys and invalid values", () => {
    expect(() => parseClientConfig('{"retries":3}')).toThrow(
      "Unrecognized key(s) in object: 'retries'",
    );
    expect(() =>
      parseClientConfig('{"auth":{"type":"basic","username":"a:b","password":"x"}}'),
    ).toThrow("Basic auth username must not contain ':'");
  });
});

describe("createAuthMiddleware", () => {
  test("maps each auth type to its middleware", () => {
    const basic = createAuthMiddleware({ type: "basic", username: "demo", password: "test-secret" });
    const bearer = createAuthMiddleware({ type: "bearer", apiKey: "test-key" });

    expect(basic).toBeInstanceOf(BasicAuthMiddleware);
    expect(basic.name).toBe("basic-auth");
    expect(bearer).toBeInstanceOf(ApiKeyAuthMiddleware);
    expect(bearer.name).toBe("api-key-auth");
  });
});

describe("parseEnvText and mergeEnvironment", () => {
  test("skips comments and strips quotes", () => {
    const parsed = parseEnvText(
      '# credentials\nLAYERHTTP_USERNAME="demo"\n\nLAYERHTTP_PASSWORD=\'test-secret\'\nnot a pair',
    );

    expect(parsed).toEqual({ LAYERHTTP_USERNAME: "demo", LAYERHTTP_PASSWORD: "test-secret" });
  });

  test("override values win", () => {
    const merged = mergeEnvironment({ A: "file", B: "file" }, { B: "process" });
    expect(merged).toEqual({ A: "file", B: "process" });
  });
});

describe("authConfigFromEnvironment", () => {
  test("reads an API key", () => {
    expect(authConfigFromEnvironment({ LAYERHTTP_API_KEY: "test-key" })).toEqual({
      type: "bearer",
      apiKey: "test-key",
    });
  });

  test("reads basic credentials with an empty default password", () => {
    expect(
      authConfigFromEnvironment({ LAYERHTTP_USERNAME: "demo", LAYERHTTP_PASSWORD: "test-secret" }),
    ).toEqual({ type: "basic", username: "demo", password: "test-secret" });
    expect(authConfigFromEnvironment({ LAYERHTTP_USERNAME: "demo" })).toEqual({
      type: "basic",
      username: "demo",
      password: "",
    });
  });

  test("returns undefined without credentials and rejects both kinds at once", () => {
    expect(authConfigFromEnvironment({})).toBeUndefined();
    expect(() =>
      authConfigFromEnvironment({ LAYERHTTP_API_KEY: "test-key", LAYERHTTP_USERNAME: "demo" }),
    ).toThrow("Set either LAYERHTTP_API_KEY or LAYERHTTP_USERNAME, not both.");
  });
});
