import { describe, expect, test } from "vitest";
import { ToolrelayConfigSchema } from "../schema";
import { defaultConfig } from "../defaults";
import { DEFAULT_SYSTEM_PROMPT } from "../constants";

describe("ToolrelayConfigSchema", () => {
  test("parses empty object to full defaults", () => {
    expect(ToolrelayConfigSchema.parse({})).toEqual({
      version: 1,
      logLevel: "info",
      systemPrompt: DEFAULT_SYSTEM_PROMPT,
      identity: { paramName: "uid", userId: null },
      catalog: { duplicateNames: "shadow" },
      dispatch: { callTimeoutMs: null, maxResultChars: 50_000 },
      loop: { maxRounds: 30 },
    });
  });

  test("accepts partial overrides", () => {
    const config = ToolrelayConfigSchema.parse({
      identity: { userId: "user123" },
      dispatch: { callTimeoutMs: 15_000 },
    });
    expect(config.identity).toEqual({ paramName: "uid", userId: "user123" });
    expect(config.dispatch).toEqual({ callTimeoutMs: 15_000, maxResultChars: 50_000 });
    // Other fields still have defaults
    expect(config.loop.maxRounds).toBe(30);
  });

  test("rejects an unknown log level", () => {
    expect(ToolrelayConfigSchema.safeParse({ logLevel: "trace" }).success).toBe(false);
  });

  test("rejects an unknown duplicate-name policy", () => {
    expect(ToolrelayConfigSchema.safeParse({ catalog: { duplicateNames: "merge" } }).success).toBe(false);
  });

  test("rejects non-positive limits", () => {
    expect(ToolrelayConfigSchema.safeParse({ loop: { maxRounds: 0 } }).success).toBe(false);
    expect(ToolrelayConfigSchema.safeParse({ dispatch: { maxResultChars: -1 } }).success).toBe(false);
    expect(ToolrelayConfigSchema.safeParse({ dispatch: { callTimeoutMs: 1.5 } }).success).toBe(false);
  });

  test("rejects an empty identity parameter name", () => {
    expect(ToolrelayConfigSchema.safeParse({ identity: { paramName: "" } }).success).toBe(false);
  });

  test("rejects an unsupported version", () => {
    expect(ToolrelayConfigSchema.safeParse({ version: 2 }).success).toBe(false);
  });
});

describe("defaultConfig", () => {
  test("returns a fresh object each time", () => {
    const a = defaultConfig();
    const b = defaultConfig();
    expect(a).toEqual(b);
    expect(a).not.toBe(b);
  });
});
