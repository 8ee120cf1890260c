import { describe, it, expect } from "vitest";
import {
  defineManagedInterface,
  hasOperation,
  isManagedInterface,
  typeNameOf,
  type ManagedInterfaceDescriptor,
} from "./descriptor.js";

interface CounterMXBean {
  increment(by: number): number;
  getCount(): number;
  label: string;
}

const Counter = defineManagedInterface<CounterMXBean>({
  namespace: "org.example",
  name: "CounterMXBean",
  operations: ["increment", "getCount"],
});

describe("defineManagedInterface", () => {
  it("should freeze the descriptor and its operations", () => {
    expect(Object.isFrozen(Counter)).toBe(true);
    expect(Object.isFrozen(Counter.operations)).toBe(true);
  });

  it("should copy the operations list", () => {
    const operations: Array<"getCount"> = ["getCount"];
    const descriptor = defineManagedInterface<CounterMXBean>({ namespace: "org.example", name: "CounterMXBean", operations });
    operations.push("getCount");

    expect(descriptor.operations).toEqual(["getCount"]);
  });
});

describe("typeNameOf", () => {
  it("should join namespace and name", () => {
    expect(typeNameOf(Counter)).toBe("org.example.CounterMXBean");
  });

  it("should return the bare name without a namespace", () => {
    expect(typeNameOf({ namespace: "", name: "Plain", operations: [] })).toBe("Plain");
  });
});

describe("isManagedInterface", () => {
  it("should accept names ending in MXBean", () => {
    expect(isManagedInterface(Counter)).toBe(true);
  });

  it("should reject other names unless flagged", () => {
    const thing: ManagedInterfaceDescriptor = { namespace: "org.example", name: "Thing", operations: [] };

    expect(isManagedInterface(thing)).toBe(false);
    expect(isManagedInterface({ ...thing, mxbean: true })).toBe(true);
  });

  it("should let the flag opt an MXBean name out", () => {
    expect(isManagedInterface({ ...Counter, mxbean: false })).toBe(false);
  });

  it("should reject malformed descriptors", () => {
    expect(isManagedInterface({ namespace: "org..example", name: "ThingMXBean", operations: [] })).toBe(false);
    expect(isManagedInterface({ namespace: "org.example", name: "Bad Name MXBean", operations: [] })).toBe(false);
    expect(isManagedInterface({ namespace: "org.example", name: "ThingMXBean", operations: ["not-an-op"] })).toBe(false);
  });
});

describe("hasOperation", () => {
  it("should match declared operations only", () => {
    expect(hasOperation(Counter, "increment")).toBe(true);
    expect(hasOperation(Counter, "label")).toBe(false);
    expect(hasOperation(Counter, "toString")).toBe(false);
  });
});
