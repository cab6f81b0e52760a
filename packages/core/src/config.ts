import { z } from "zod";

import { ConfigurationError } from "./errors";

const LOG_LEVELS = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const configSchema = z.object({
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
  DOCFORMAT_SERVICE: z.string().min(1).default("docformat"),
  DOCFORMAT_REDIS_URL: z.string().url().optional(),
  DOCFORMAT_KEY_PREFIX: z.string().default("docformat:"),
});

const loggingSchema = configSchema.pick({
  LOG_LEVEL: true,
  DOCFORMAT_SERVICE: true,
});

/**
 * Process-level settings read from the environment.
 */
export type FormatConfig = Readonly<{
  logLevel: LogLevel;
  serviceName: string;
  redisUrl?: string;
  keyPrefix: string;
}>;

export type Environment = Readonly<Record<string, string | undefined>>;

const parseEnvironment = <Output>(
  schema: z.ZodType<Output, z.ZodTypeDef, unknown>,
  env: Environment
): Output => {
  const parsed = schema.safeParse(env);

  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(detail, parsed.error);
  }

  return parsed.data;
};

/**
 * Parses the environment, failing fast on values that do not validate.
 */
export const loadConfig = (env: Environment = process.env): FormatConfig => {
  const data = parseEnvironment(configSchema, env);
  return Object.freeze({
    logLevel: data.LOG_LEVEL,
    serviceName: data.DOCFORMAT_SERVICE,
    redisUrl: data.DOCFORMAT_REDIS_URL,
    keyPrefix: data.DOCFORMAT_KEY_PREFIX,
  });
};

/**
 * Reads only the logging settings, so unrelated keys cannot break startup.
 */
export const loadLoggingConfig = (
  env: Environment = process.env
): Pick<FormatConfig, "logLevel" | "serviceName"> => {
  const data = parseEnvironment(loggingSchema, env);
  return Object.freeze({
    logLevel: data.LOG_LEVEL,
    serviceName: data.DOCFORMAT_SERVICE,
  });
};
