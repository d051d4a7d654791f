import { z } from "zod";
import {
  DEFAULT_IDENTITY_PARAM,
  DEFAULT_MAX_RESULT_CHARS,
  DEFAULT_MAX_ROUNDS,
  LOG_LEVELS,
} from "@toolrelay/core";
import { DEFAULT_SYSTEM_PROMPT } from "./constants";

export const LogLevelEnum = z.enum(LOG_LEVELS);

export const DuplicateNamesEnum = z.enum(["shadow", "reject"]);

const IdentitySchema = z.object({
  paramName: z.string().min(1).default(DEFAULT_IDENTITY_PARAM),
  userId: z.string().nullable().default(null),
});

const CatalogSchema = z.object({
  duplicateNames: DuplicateNamesEnum.default("shadow"),
});

const DispatchSchema = z.object({
  callTimeoutMs: z.number().int().positive().nullable().default(null),
  maxResultChars: z.number().int().positive().default(DEFAULT_MAX_RESULT_CHARS),
});

const LoopSchema = z.object({
  maxRounds: z.number().int().positive().default(DEFAULT_MAX_ROUNDS),
});

export const ToolrelayConfigSchema = z.object({
  version: z.literal(1).default(1),
  logLevel: LogLevelEnum.default("info"),
  systemPrompt: z.string().default(DEFAULT_SYSTEM_PROMPT),
  identity: IdentitySchema.default({}),
  catalog: CatalogSchema.default({}),
  dispatch: DispatchSchema.default({}),
  loop: LoopSchema.default({}),
});
