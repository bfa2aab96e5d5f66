/**
 * Environment Configuration
 *
 * Purpose:
 * Validates process.env once at startup and exposes a typed config.
 * Genie credentials and the space id are required; everything else has a
 * default or is optional.
 *
 * Layer: Infrastructure
 */

import { z } from "zod";
import { fromZodError } from "zod-validation-error";
import { ConfigurationError } from "../utils/errorHandler";
import { GENIE_CONSTANTS } from "./constants";

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .default("false")
  .transform((v) => v === "true" || v === "1");

const optionalPositiveInt = z.coerce.number().int().positive().optional();

const envSchema = z.object({
  DATABRICKS_HOST: z
    .string({ required_error: "DATABRICKS_HOST environment variable is required" })
    .min(1, "DATABRICKS_HOST environment variable is required")
    .transform((host) => host.replace(/\/+$/, "")),
  DATABRICKS_TOKEN: z
    .string({ required_error: "DATABRICKS_TOKEN environment variable is required" })
    .min(1, "DATABRICKS_TOKEN environment variable is required"),
  DATABRICKS_SPACE_ID: z
    .string({ required_error: "DATABRICKS_SPACE_ID environment variable is required" })
    .min(1, "DATABRICKS_SPACE_ID environment variable is required"),

  MICROSOFT_APP_ID: z.string().default(""),
  MICROSOFT_APP_PASSWORD: z.string().default(""),
  MICROSOFT_APP_TYPE: z.enum(["MultiTenant", "SingleTenant", "UserAssignedMSI"]).default("MultiTenant"),
  MICROSOFT_APP_TENANT_ID: z.string().default(""),

  HOST: z.string().default("localhost"),
  PORT: z.coerce.number().int().min(0).max(65535).default(3978),

  DATABASE_URL: z.string().optional(),
  GENIE_WAIT_TIMEOUT_MS: z.coerce.number().int().positive().default(GENIE_CONSTANTS.DEFAULT_WAIT_TIMEOUT_MS),
  SESSION_MAX_ENTRIES: optionalPositiveInt,
  SESSION_TTL_MINUTES: optionalPositiveInt,
  SERIALIZE_USER_TURNS: booleanFlag,

  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  LOG_DIR: z.string().optional(),
});

export type AppConfig = z.infer<typeof envSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigurationError(fromZodError(result.error).message);
  }
  return result.data;
}
