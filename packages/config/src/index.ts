export { ToolrelayConfigSchema, LogLevelEnum, DuplicateNamesEnum } from "./schema";
export { DEFAULT_SYSTEM_PROMPT } from "./constants";
export type { ToolrelayConfig, EnvSource } from "./types";
export { defaultConfig } from "./defaults";
export { ENV_VARS, loadConfig } from "./env";
export { type OrchestratorSettings, toOrchestratorSettings, createLogger } from "./settings";
