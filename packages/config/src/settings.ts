import { ConsoleLogger, type Logger, type OrchestratorDeps } from "@toolrelay/core";
import type { ToolrelayConfig } from "./types";

export type OrchestratorSettings = Pick<
  OrchestratorDeps,
  "systemPrompt" | "identity" | "duplicateNames" | "callTimeoutMs" | "maxResultChars" | "maxRounds"
>;

/** Map a loaded config onto the orchestrator's option fields. */
export function toOrchestratorSettings(config: ToolrelayConfig): OrchestratorSettings {
  return {
    systemPrompt: config.systemPrompt,
    identity: {
      paramName: config.identity.paramName,
      userId: config.identity.userId,
    },
    duplicateNames: config.catalog.duplicateNames,
    callTimeoutMs: config.dispatch.callTimeoutMs,
    maxResultChars: config.dispatch.maxResultChars,
    maxRounds: config.loop.maxRounds,
  };
}

export function createLogger(config: ToolrelayConfig, context: Record<string, unknown> = {}): Logger {
  return new ConsoleLogger(config.logLevel, context);
}
