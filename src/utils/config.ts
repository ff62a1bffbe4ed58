import { z } from "zod";
import { DEFAULT_HORIZON_YEARS, DEFAULT_PORT, MAX_HORIZON_YEARS } from "./constants";

/**
 * Runtime configuration read from the environment.
 */
const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(DEFAULT_PORT),
  DEFAULT_HORIZON_YEARS: z.coerce
    .number()
    .int()
    .min(0)
    .max(MAX_HORIZON_YEARS)
    .default(DEFAULT_HORIZON_YEARS),
});

export interface AppConfig {
  port: number;
  defaultHorizonYears: number;
}

/**
 * Parse configuration from environment variables.
 * Throws when PORT or DEFAULT_HORIZON_YEARS is set to an invalid value.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = ConfigSchema.safeParse(env);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${details}`);
  }
  return {
    port: result.data.PORT,
    defaultHorizonYears: result.data.DEFAULT_HORIZON_YEARS,
  };
}
