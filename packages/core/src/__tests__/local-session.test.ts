import { describe, it, expect, beforeEach } from "vitest";
import { LocalCapabilitySession } from "../local-session";
import { RegistrationError, ToolrelayError } from "../types";

describe("LocalCapabilitySession", () => {
  let session: LocalCapabilitySession;

  beforeEach(() => {
    session = new LocalCapabilitySession("local");
    session
      .register(
        {
          name: "echo",
          description: "Echo the input back",
          inputSchema: { type: "object", properties: { text: { type: "string" } }, required: ["text"] },
        },
        async (args) => String(args.text),
      )
      .register({ name: "boom" }, async () => {
        throw new Error("exploded");
      });
  });

  it("lists registered capabilities in registration order", async () => {
    const listed = await session.listCapabilities();
    expect(listed.map((d) => d.name)).toEqual(["echo", "boom"]);
    expect(session.size).toBe(2);
    expect(session.has("echo")).toBe(true);
    expect(session.has("missing")).toBe(false);
  });

  it("rejects duplicate registration", () => {
    expect(() => session.register({ name: "echo" }, async () => "again")).toThrow(
      'Capability "echo" is already registered on session "local"',
    );
    expect(() => session.register({ name: "echo" }, async () => "again")).toThrow(RegistrationError);
  });

  it("wraps a string handler result as text content", async () => {
    const result = await session.invoke("echo", { text: "hi" });
    expect(result).toEqual({ content: [{ type: "text", text: "hi" }] });
  });

  it("passes structured handler results through", async () => {
    session.register({ name: "stat" }, async () => ({ content: [{ type: "json", value: { size: 3 } }] }));
    expect(await session.invoke("stat", {})).toEqual({ content: [{ type: "json", value: { size: 3 } }] });
  });

  it("turns handler exceptions into an error result", async () => {
    const result = await session.invoke("boom", {});
    expect(result).toEqual({
      content: [{ type: "text", text: 'Error executing "boom": exploded' }],
      isError: true,
    });
  });

  it("rejects unknown capabilities", async () => {
    const error: unknown = await session.invoke("missing", {}).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ToolrelayError);
    if (!(error instanceof ToolrelayError)) return;
    expect(error.code).toBe("CAPABILITY_NOT_FOUND");
    expect(error.message).toBe('Unknown capability "missing" on session "local"');
  });

  it("hands the call signal to the handler", async () => {
    const controller = new AbortController();
    let received: AbortSignal | undefined;
    session.register({ name: "probe" }, async (_args, options) => {
      received = options.signal;
      return "ok";
    });

    await session.invoke("probe", {}, { signal: controller.signal });

    expect(received).toBe(controller.signal);
  });
});
