import { describe, expect, test } from "vitest";
import { ConfigError } from "@toolrelay/core";
import { loadConfig } from "../env";
import { defaultConfig } from "../defaults";

describe("loadConfig", () => {
  test("returns defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({ ok: true, value: defaultConfig() });
  });

  test("overlays every supported variable", () => {
    const result = loadConfig({
      TOOLRELAY_LOG_LEVEL: "debug",
      TOOLRELAY_SYSTEM_PROMPT: "Be brief.",
      TOOLRELAY_USER_ID: "user123",
      TOOLRELAY_IDENTITY_PARAM: "user_id",
      TOOLRELAY_CALL_TIMEOUT_MS: "5000",
      TOOLRELAY_MAX_RESULT_CHARS: "1000",
      TOOLRELAY_MAX_ROUNDS: "5",
      TOOLRELAY_DUPLICATE_NAMES: "reject",
    });

    expect(result).toEqual({
      ok: true,
      value: {
        version: 1,
        logLevel: "debug",
        systemPrompt: "Be brief.",
        identity: { paramName: "user_id", userId: "user123" },
        catalog: { duplicateNames: "reject" },
        dispatch: { callTimeoutMs: 5000, maxResultChars: 1000 },
        loop: { maxRounds: 5 },
      },
    });
  });

  test("treats empty strings as unset", () => {
    const result = loadConfig({ TOOLRELAY_USER_ID: "", TOOLRELAY_MAX_ROUNDS: "" });
    expect(result.ok && result.value.identity.userId).toBeNull();
    expect(result.ok && result.value.loop.maxRounds).toBe(30);
  });

  test("rejects a non-integer numeric variable, naming it", () => {
    const result = loadConfig({ TOOLRELAY_MAX_ROUNDS: "ten" });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(ConfigError);
    expect(result.error.message).toBe("Invalid TOOLRELAY_MAX_ROUNDS: ten (must be an integer)");
  });

  test("rejects a fractional timeout", () => {
    const result = loadConfig({ TOOLRELAY_CALL_TIMEOUT_MS: "2.5" });
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.message).toBe("Invalid TOOLRELAY_CALL_TIMEOUT_MS: 2.5 (must be an integer)");
  });

  test("rejects an unknown log level", () => {
    const result = loadConfig({ TOOLRELAY_LOG_LEVEL: "loud" });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe(
        "Invalid TOOLRELAY_LOG_LEVEL: loud (must be one of: debug, info, warn, error)",
      );
    }
  });

  test("rejects an unknown duplicate-name policy", () => {
    const result = loadConfig({ TOOLRELAY_DUPLICATE_NAMES: "merge" });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe("Invalid TOOLRELAY_DUPLICATE_NAMES: merge (must be one of: shadow, reject)");
    }
  });

  test("reports out-of-range values with their config path", () => {
    const result = loadConfig({ TOOLRELAY_MAX_ROUNDS: "0" });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe("CONFIG_ERROR");
    expect(result.error.message.startsWith("Invalid configuration: loop.maxRounds: ")).toBe(true);
  });
});
