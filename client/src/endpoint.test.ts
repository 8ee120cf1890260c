import { describe, it, expect } from "vitest";
import { describeEndpoint, formatServiceUrl, parseServiceUrl, readEndpoint } from "./endpoint.js";
import { defaultManagementClientConfig } from "./config.js";

const SOURCE = { host: "mgmt.example", port: "4222", login: "admin", password: "test-secret" };

describe("readEndpoint", () => {
  it("should read all four keys", () => {
    expect(readEndpoint(SOURCE)).toEqual(SOURCE);
  });

  it("should ignore unrelated keys", () => {
    expect(readEndpoint({ ...SOURCE, extra: "x" })).toEqual(SOURCE);
  });

  it("should name the missing key", () => {
    const { password: _password, ...rest } = SOURCE;

    expect(() => readEndpoint(rest)).toThrow("mbeankit-client:endpoint:readEndpoint - The property password does not exist.");
  });

  it("should report the first missing key in host, port, login, password order", () => {
    expect(() => readEndpoint({ password: "test-secret" })).toThrow(/The property host does not exist/);
    expect(() => readEndpoint({ host: "h", password: "test-secret" })).toThrow(/The property port does not exist/);
  });

  it("should treat a missing source as missing host", () => {
    let caught: unknown;
    try {
      readEndpoint(undefined);
    } catch (err) {
      caught = err;
    }

    expect(caught).toMatchObject({
      name: "ManagementError",
      code: "INVALID_ARGUMENT",
      details: { missingKey: "host" },
    });
  });

  it("should accept empty strings as present", () => {
    expect(readEndpoint({ host: "h", port: "1", login: "", password: "" })).toEqual({
      host: "h",
      port: "1",
      login: "",
      password: "",
    });
  });
});

describe("describeEndpoint", () => {
  it("should drop the password", () => {
    expect(describeEndpoint(readEndpoint(SOURCE))).toEqual({ host: "mgmt.example", port: "4222", login: "admin" });
  });
});

describe("formatServiceUrl", () => {
  it("should repeat host and port in both segments", () => {
    expect(formatServiceUrl(readEndpoint(SOURCE), defaultManagementClientConfig)).toBe(
      "service:jmx:nats://mgmt.example:4222/registry/nats://mgmt.example:4222/mbeanserver",
    );
  });

  it("should use the configured registry name", () => {
    const url = formatServiceUrl(readEndpoint(SOURCE), { ...defaultManagementClientConfig, registryName: "ops" });

    expect(url).toBe("service:jmx:nats://mgmt.example:4222/registry/nats://mgmt.example:4222/ops");
  });
});

describe("parseServiceUrl", () => {
  it("should split a formatted URL into its parts", () => {
    expect(parseServiceUrl("service:jmx:nats://mgmt.example:4222/registry/nats://mgmt.example:4222/mbeanserver")).toEqual({
      protocol: "jmx",
      transport: "nats",
      host: "mgmt.example",
      port: 4222,
      registryPath: "registry/nats",
      registryHost: "mgmt.example",
      registryPort: 4222,
      registryName: "mbeanserver",
    });
  });

  it("should reject a malformed URL", () => {
    expect(() => parseServiceUrl("nats://mgmt.example:4222")).toThrow(
      'mbeankit-client:endpoint:parseServiceUrl - Malformed service URL "nats://mgmt.example:4222".',
    );
  });

  it("should reject a non-numeric port", () => {
    expect(() => parseServiceUrl("service:jmx:nats://h:abc/registry/nats://h:abc/mbeanserver")).toThrow(/Malformed/);
  });
});
