import { describe, it, expect, vi } from "vitest";
import {
  LocalRegistry,
  ManagementError,
  ObjectName,
  defineManagedInterface,
  silentLogger,
  type RemoteRegistryConnection,
} from "@mbeankit/core";
import type { RegistryConnector } from "./connection.js";
import type { Endpoint } from "./endpoint.js";
import { createRemoteCaller, createRemoteProxy, listRemoteBeans } from "./remote-proxy.js";

// ── Fixtures ────────────────────────────────────────────────────────

interface CounterMXBean {
  increment(by: number): number;
  getCount(): number;
  hold(): Promise<string>;
  fail(): void;
}

const Counter = defineManagedInterface<CounterMXBean>({
  namespace: "org.example",
  name: "CounterMXBean",
  operations: ["increment", "getCount", "hold", "fail"],
});

const Thing = defineManagedInterface<object>({ namespace: "org.example", name: "Thing", operations: [] });

const NAME = ObjectName.parse("org.example:type=CounterMXBean");
const SOURCE = { host: "mgmt.example", port: "4222", login: "admin", password: "test-secret" };
const FAILURE = new Error("boom");

class CounterImpl implements CounterMXBean {
  count = 0;
  started = 0;
  private gate: Promise<void>;

  constructor(gate: Promise<void> = Promise.resolve()) {
    this.gate = gate;
  }

  increment(by: number): number {
    this.count += by;
    return this.count;
  }

  getCount(): number {
    return this.count;
  }

  async hold(): Promise<string> {
    this.started++;
    await this.gate;
    return "released";
  }

  fail(): void {
    throw FAILURE;
  }
}

/** Connector whose connections talk straight to an in-process registry. */
class FakeConnector implements RegistryConnector {
  connects = 0;
  closes = 0;
  open = 0;
  maxOpen = 0;
  failConnect = false;
  failClose = false;
  private registry: LocalRegistry;

  constructor(registry: LocalRegistry) {
    this.registry = registry;
  }

  serviceUrl(endpoint: Endpoint): string {
    return `fake://${endpoint.host}:${endpoint.port}`;
  }

  async connect(_endpoint: Endpoint): Promise<RemoteRegistryConnection> {
    this.connects++;
    if (this.failConnect) throw new Error("connection refused");
    this.open++;
    this.maxOpen = Math.max(this.maxOpen, this.open);

    const registry = this.registry;
    return {
      isRegistered: (name) => registry.isRegistered(name),
      isInstanceOf: (name, typeName) => registry.isInstanceOf(name, typeName),
      queryAll: () => registry.queryAll(),
      invoke: (name, operation, args) => registry.invoke(name, operation, args),
      close: async () => {
        this.closes++;
        this.open--;
        if (this.failClose) throw new Error("close failed");
      },
    };
  }
}

function setup(impl: CounterImpl = new CounterImpl()) {
  const registry = new LocalRegistry();
  registry.registerObject(impl, NAME, [Counter]);
  const connector = new FakeConnector(registry);
  return { registry, connector, impl, options: { connector, loggerFactory: silentLogger } };
}

// ── Tests ───────────────────────────────────────────────────────────

describe("createRemoteProxy", () => {
  describe("preflight", () => {
    it("should fail on a missing endpoint key without connecting", async () => {
      const { connector, options } = setup();
      const { login: _login, ...source } = SOURCE;

      await expect(createRemoteProxy(Counter, NAME, source, options)).rejects.toThrow(
        "mbeankit-client:endpoint:readEndpoint - The property login does not exist.",
      );
      expect(connector.connects).toBe(0);
    });

    it("should fail on a non-managed interface without connecting", async () => {
      const { connector, options } = setup();

      await expect(createRemoteProxy(Thing, NAME, SOURCE, options)).rejects.toMatchObject({
        code: "INVALID_ARGUMENT",
        message: "mbeankit-client:validate:validate - The interface org.example.Thing is not a managed interface.",
      });
      expect(connector.connects).toBe(0);
    });

    it("should fail on an unregistered name and close the preflight connection", async () => {
      const { connector, options } = setup();
      const other = ObjectName.parse("org.example:type=CounterMXBean,instance=2");

      await expect(createRemoteProxy(Counter, other, SOURCE, options)).rejects.toMatchObject({
        code: "INVALID_ARGUMENT",
        message:
          "mbeankit-client:validate:validate - The object name org.example:instance=2,type=CounterMXBean is not registered.",
      });
      expect(connector.connects).toBe(1);
      expect(connector.closes).toBe(1);
    });

    it("should report a preflight connect failure as OPERATION_FAILED", async () => {
      const { connector, options } = setup();
      connector.failConnect = true;

      const err = await createRemoteProxy(Counter, NAME, SOURCE, options).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(ManagementError);
      expect(err).toMatchObject({
        code: "OPERATION_FAILED",
        message:
          "mbeankit-client:remote-proxy:createRemoteCaller - Unable to create the proxy for interface org.example.CounterMXBean and object name org.example:type=CounterMXBean.",
        cause: {
          code: "CONNECT_FAILED",
          message: "mbeankit-client:connection:connect - Unable to connect to fake://mgmt.example:4222: connection refused",
        },
      });
    });

    it("should validate once and hold no connection afterwards", async () => {
      const { connector, options } = setup();

      await createRemoteProxy(Counter, NAME, SOURCE, options);

      expect(connector.connects).toBe(1);
      expect(connector.closes).toBe(1);
      expect(connector.open).toBe(0);
    });
  });

  describe("calls", () => {
    it("should open and close one connection per call", async () => {
      const { connector, options, impl } = setup();
      const counter = await createRemoteProxy(Counter, NAME, SOURCE, options);

      expect(await counter.increment(2)).toBe(2);
      expect(await counter.increment(3)).toBe(5);
      expect(await counter.getCount()).toBe(5);

      expect(impl.count).toBe(5);
      expect(connector.connects).toBe(4);
      expect(connector.closes).toBe(4);
      expect(connector.open).toBe(0);
    });

    it("should give concurrent calls their own connections", async () => {
      let release: () => void = () => undefined;
      const gate = new Promise<void>((resolve) => {
        release = resolve;
      });
      const { connector, options, impl } = setup(new CounterImpl(gate));
      const counter = await createRemoteProxy(Counter, NAME, SOURCE, options);

      const calls = Array.from({ length: 5 }, () => counter.hold());
      await vi.waitFor(() => expect(impl.started).toBe(5));

      expect(connector.open).toBe(5);
      release();
      await expect(Promise.all(calls)).resolves.toEqual(["released", "released", "released", "released", "released"]);

      expect(connector.connects).toBe(6);
      expect(connector.closes).toBe(6);
      expect(connector.maxOpen).toBe(5);
      expect(connector.open).toBe(0);
    });

    it("should surface the operation's own error unchanged and still close", async () => {
      const { connector, options } = setup();
      const counter = await createRemoteProxy(Counter, NAME, SOURCE, options);

      await expect(counter.fail()).rejects.toBe(FAILURE);
      expect(connector.open).toBe(0);
    });

    it("should return the result when close fails", async () => {
      const { connector, options } = setup();
      const counter = await createRemoteProxy(Counter, NAME, SOURCE, options);
      connector.failClose = true;

      await expect(counter.increment(1)).resolves.toBe(1);
      expect(connector.closes).toBe(2);
    });

    it("should surface a per-call connect failure as CONNECT_FAILED", async () => {
      const { connector, options } = setup();
      const counter = await createRemoteProxy(Counter, NAME, SOURCE, options);
      connector.failConnect = true;

      await expect(counter.getCount()).rejects.toMatchObject({ code: "CONNECT_FAILED", retryable: true });
    });

    it("should not revalidate before each call", async () => {
      const { registry, options } = setup();
      const isRegistered = vi.spyOn(registry, "isRegistered");
      const counter = await createRemoteProxy(Counter, NAME, SOURCE, options);
      registry.unregisterObject(NAME);

      await expect(counter.getCount()).rejects.toMatchObject({
        name: "RegistryError",
        code: "INSTANCE_NOT_FOUND",
      });
      expect(isRegistered).toHaveBeenCalledTimes(1);
    });
  });
});

describe("createRemoteCaller", () => {
  it("should reject undeclared operations without connecting", async () => {
    const { connector, options } = setup();
    const caller = await createRemoteCaller(Counter, NAME, SOURCE, options);

    await expect(caller.call("reset", [])).rejects.toMatchObject({ code: "INVALID_ARGUMENT" });
    expect(connector.connects).toBe(1);
  });

  it("should keep the triple it was created with", async () => {
    const { options } = setup();
    const caller = await createRemoteCaller(Counter, NAME, SOURCE, options);

    expect(caller.descriptor).toBe(Counter);
    expect(caller.name).toBe(NAME);
  });
});

describe("listRemoteBeans", () => {
  it("should list the remote registry in one connect/close cycle", async () => {
    const { connector, options } = setup();

    const beans = await listRemoteBeans(SOURCE, options);

    expect(beans.map((bean) => `${bean.typeName} ${bean.name.canonicalName}`)).toEqual([
      "org.example.CounterMXBean org.example:type=CounterMXBean",
    ]);
    expect(connector.connects).toBe(1);
    expect(connector.closes).toBe(1);
  });

  it("should wrap registry failures as OPERATION_FAILED", async () => {
    const { registry, options } = setup();
    const cause = new Error("registry unavailable");
    vi.spyOn(registry, "queryAll").mockRejectedValue(cause);

    await expect(listRemoteBeans(SOURCE, options)).rejects.toMatchObject({
      code: "OPERATION_FAILED",
      message: "mbeankit-client:remote-proxy:listRemoteBeans - Unable to query the remote registry.",
      cause,
    });
  });
});
