/**
 * Environment configuration.
 *
 * Validated once per call with zod; callers pass their own env record in
 * tests instead of touching process.env.
 */
import { z } from "zod";
import { InvalidArgumentError } from "./errors.ts";
import { createConsoleLogger, type Logger, type LogSink } from "./logger.ts";

export const DEFAULT_CEREBRAS_BASE_URL = "https://api.cerebras.ai/v1";

const ConfigSchema = z.object({
  CEREBRAS_API_KEY: z
    .string()
    .trim()
    .optional()
    .transform((value) => (value ? value : undefined)),
  CEREBRAS_BASE_URL: z.url().default(DEFAULT_CEREBRAS_BASE_URL),
  CONVERSATION_LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("warn"),
});

export interface ClientConfig {
  /** Credential for the network backend, absent when unset or blank */
  apiKey?: string;
  baseURL: string;
  logLevel: z.infer<typeof ConfigSchema>["CONVERSATION_LOG_LEVEL"];
}

type Env = Record<string, string | undefined>;

// Blank variables count as unset
function variables(env: Env) {
  return {
    CEREBRAS_API_KEY: env.CEREBRAS_API_KEY,
    CEREBRAS_BASE_URL: env.CEREBRAS_BASE_URL || undefined,
    CONVERSATION_LOG_LEVEL: env.CONVERSATION_LOG_LEVEL || undefined,
  };
}

function invalid(error: z.ZodError): InvalidArgumentError {
  const issue = error.issues[0];
  const variable = issue?.path.join(".") ?? "environment";
  return new InvalidArgumentError(
    `Invalid configuration for ${variable}: ${issue?.message ?? "unknown error"}`,
  );
}

export function loadConfig(env: Env = process.env): ClientConfig {
  const result = ConfigSchema.safeParse(variables(env));
  if (!result.success) throw invalid(result.error);

  return {
    apiKey: result.data.CEREBRAS_API_KEY,
    baseURL: result.data.CEREBRAS_BASE_URL,
    logLevel: result.data.CONVERSATION_LOG_LEVEL,
  };
}

/** CEREBRAS_API_KEY alone; other variables are not validated */
export function readApiKey(env: Env = process.env): string | undefined {
  const result = ConfigSchema.pick({ CEREBRAS_API_KEY: true }).safeParse(variables(env));
  if (!result.success) throw invalid(result.error);
  return result.data.CEREBRAS_API_KEY;
}

/** CEREBRAS_BASE_URL alone, or the public endpoint */
export function readBaseURL(env: Env = process.env): string {
  const result = ConfigSchema.pick({ CEREBRAS_BASE_URL: true }).safeParse(variables(env));
  if (!result.success) throw invalid(result.error);
  return result.data.CEREBRAS_BASE_URL;
}

/** Console logger at the level named by CONVERSATION_LOG_LEVEL */
export function createLoggerFromEnv(
  scope: string,
  env: Env = process.env,
  sink?: LogSink,
): Logger {
  return createConsoleLogger(scope, loadConfig(env).logLevel, sink);
}
