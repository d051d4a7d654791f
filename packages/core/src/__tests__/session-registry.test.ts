import { describe, it, expect, beforeEach, vi } from "vitest";
import { SessionRegistry } from "../session-registry";
import { MockCapabilitySession } from "../__fixtures__/mock-capability-session";
import { ConsoleLogger, RegistrationError } from "../types";

describe("SessionRegistry", () => {
  let registry: SessionRegistry;

  beforeEach(() => {
    registry = new SessionRegistry(new ConsoleLogger("error"));
  });

  it("lists sessions in registration order", () => {
    registry.add(new MockCapabilitySession("b"));
    registry.add(new MockCapabilitySession("a"));

    expect(registry.list().map((s) => s.name)).toEqual(["b", "a"]);
    expect(registry.size).toBe(2);
    expect(registry.get("a")?.name).toBe("a");
    expect(registry.get("missing")).toBeUndefined();
  });

  it("rejects a second session with the same name", () => {
    registry.add(new MockCapabilitySession("fs"));
    expect(() => registry.add(new MockCapabilitySession("fs"))).toThrow('Session "fs" is already registered');
    expect(() => registry.add(new MockCapabilitySession("fs"))).toThrow(RegistrationError);
  });

  it("closes every session and empties itself", async () => {
    const a = new MockCapabilitySession("a");
    const b = new MockCapabilitySession("b");
    registry.add(a);
    registry.add(b);

    await registry.closeAll();

    expect(a.closed).toBe(true);
    expect(b.closed).toBe(true);
    expect(registry.size).toBe(0);
  });

  it("keeps closing after one session fails to close", async () => {
    const failing = new MockCapabilitySession("failing");
    vi.spyOn(failing, "close").mockRejectedValue(new Error("stuck"));
    const after = new MockCapabilitySession("after");
    registry.add(failing);
    registry.add(after);

    await expect(registry.closeAll()).resolves.toBeUndefined();
    expect(after.closed).toBe(true);
    expect(registry.size).toBe(0);
  });
});
