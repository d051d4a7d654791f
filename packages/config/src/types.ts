import type { z } from "zod";
import type { ToolrelayConfigSchema } from "./schema";

export type ToolrelayConfig = z.infer<typeof ToolrelayConfigSchema>;

/** Environment lookup; process.env satisfies it. */
export type EnvSource = Readonly<Record<string, string | undefined>>;
