import { describe, it, expect } from "vitest";
import { defineManagedInterface } from "@mbeankit/core";
import { ImplementationRegistry } from "./implementations.js";

interface ClockMXBean {
  now(): number;
}

const Clock = defineManagedInterface<ClockMXBean>({ namespace: "org.example", name: "ClockMXBean", operations: ["now"] });

describe("ImplementationRegistry", () => {
  it("should build the single provided implementation", () => {
    const impls = new ImplementationRegistry().provide(Clock, () => ({ now: () => 42 }));

    expect(impls.resolve(Clock)).toEqual({ now: expect.any(Function) });
    expect(impls.count(Clock)).toBe(1);
  });

  it("should call the factory on every resolve", () => {
    let built = 0;
    const impls = new ImplementationRegistry().provide(Clock, () => {
      built++;
      return { now: () => built };
    });

    impls.resolve(Clock);
    impls.resolve(Clock);

    expect(built).toBe(2);
  });

  it("should fail when no implementation is provided", () => {
    expect(() => new ImplementationRegistry().resolve(Clock)).toThrow(
      "mbeankit-client:implementations:resolve - No managed object implementation found for org.example.ClockMXBean.",
    );
  });

  it("should fail when more than one implementation is provided", () => {
    const impls = new ImplementationRegistry()
      .provide(Clock, () => ({ now: () => 1 }))
      .provide(Clock, () => ({ now: () => 2 }));

    let caught: unknown;
    try {
      impls.resolve(Clock);
    } catch (err) {
      caught = err;
    }

    expect(caught).toMatchObject({
      code: "INVALID_ARGUMENT",
      message:
        "mbeankit-client:implementations:resolve - More than one managed object implementation found for org.example.ClockMXBean.",
      details: { count: 2 },
    });
  });

  it("should forget everything on clear", () => {
    const impls = new ImplementationRegistry().provide(Clock, () => ({ now: () => 1 }));
    impls.clear();

    expect(impls.count(Clock)).toBe(0);
  });
});
