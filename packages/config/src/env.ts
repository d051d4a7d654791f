// Environment overlay: TOOLRELAY_* variables on top of the schema defaults

import { ConfigError, err, isLogLevel, ok, type Result } from "@toolrelay/core";
import { DuplicateNamesEnum, ToolrelayConfigSchema } from "./schema";
import type { EnvSource, ToolrelayConfig } from "./types";

export const ENV_VARS = {
  logLevel: "TOOLRELAY_LOG_LEVEL",
  systemPrompt: "TOOLRELAY_SYSTEM_PROMPT",
  userId: "TOOLRELAY_USER_ID",
  identityParam: "TOOLRELAY_IDENTITY_PARAM",
  callTimeoutMs: "TOOLRELAY_CALL_TIMEOUT_MS",
  maxResultChars: "TOOLRELAY_MAX_RESULT_CHARS",
  maxRounds: "TOOLRELAY_MAX_ROUNDS",
  duplicateNames: "TOOLRELAY_DUPLICATE_NAMES",
} as const;

function optionalEnv(env: EnvSource, key: string): string | undefined {
  const value = env[key];
  return value === undefined || value === "" ? undefined : value;
}

function integerEnv(env: EnvSource, key: string): Result<number | undefined, ConfigError> {
  const raw = optionalEnv(env, key);
  if (raw === undefined) return ok(undefined);
  if (!/^-?\d+$/.test(raw.trim())) {
    return err(new ConfigError(`Invalid ${key}: ${raw} (must be an integer)`));
  }
  return ok(parseInt(raw, 10));
}

/**
 * Load configuration from environment variables over the defaults.
 * Returns a Result and never throws.
 */
export function loadConfig(env: EnvSource = process.env): Result<ToolrelayConfig, ConfigError> {
  const logLevel = optionalEnv(env, ENV_VARS.logLevel);
  if (logLevel !== undefined && !isLogLevel(logLevel)) {
    return err(
      new ConfigError(`Invalid ${ENV_VARS.logLevel}: ${logLevel} (must be one of: debug, info, warn, error)`),
    );
  }

  const duplicateNames = optionalEnv(env, ENV_VARS.duplicateNames);
  if (duplicateNames !== undefined && !DuplicateNamesEnum.safeParse(duplicateNames).success) {
    return err(
      new ConfigError(`Invalid ${ENV_VARS.duplicateNames}: ${duplicateNames} (must be one of: shadow, reject)`),
    );
  }

  const callTimeoutMs = integerEnv(env, ENV_VARS.callTimeoutMs);
  if (!callTimeoutMs.ok) return callTimeoutMs;
  const maxResultChars = integerEnv(env, ENV_VARS.maxResultChars);
  if (!maxResultChars.ok) return maxResultChars;
  const maxRounds = integerEnv(env, ENV_VARS.maxRounds);
  if (!maxRounds.ok) return maxRounds;

  const raw = {
    logLevel,
    systemPrompt: optionalEnv(env, ENV_VARS.systemPrompt),
    identity: {
      paramName: optionalEnv(env, ENV_VARS.identityParam),
      userId: optionalEnv(env, ENV_VARS.userId),
    },
    catalog: { duplicateNames },
    dispatch: {
      callTimeoutMs: callTimeoutMs.value,
      maxResultChars: maxResultChars.value,
    },
    loop: { maxRounds: maxRounds.value },
  };

  const parsed = ToolrelayConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    return err(new ConfigError(`Invalid configuration: ${detail}`, parsed.error));
  }
  return ok(parsed.data);
}
