import { z } from "zod";
import { DEFAULT_READY_LEAD_MINUTES } from "@catering/engine";

const apiConfigSchema = z.object({
  PORT: z.coerce.number().int().positive().default(4000),
  READY_LEAD_MINUTES: z.coerce.number().int().nonnegative().default(DEFAULT_READY_LEAD_MINUTES),
  CATALOG_PATH: z.string().trim().min(1).optional()
});

export type ApiConfig = {
  port: number;
  readyLeadMinutes: number;
  catalogPath?: string;
};

/** Throws a ZodError naming the offending variable when the environment is malformed. */
export function loadApiConfig(env: NodeJS.ProcessEnv = process.env): ApiConfig {
  const parsed = apiConfigSchema.parse(env);
  return {
    port: parsed.PORT,
    readyLeadMinutes: parsed.READY_LEAD_MINUTES,
    catalogPath: parsed.CATALOG_PATH
  };
}
