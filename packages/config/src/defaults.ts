import { ToolrelayConfigSchema } from "./schema";
import type { ToolrelayConfig } from "./types";

export function defaultConfig(): ToolrelayConfig {
  return ToolrelayConfigSchema.parse({});
}
