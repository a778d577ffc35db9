/**
 * Runtime configuration schema using Zod.
 *
 * The environment is parsed once at start-up into an AppConfig that is passed
 * explicitly to the server, the store and the auth layer. Nothing else reads
 * process.env for application settings.
 *
 * Unknown variables are ignored.
 */

import { z } from 'zod';

/** Minimum HS256 secret length, in bytes. */
export const MIN_SECRET_BYTES = 32;

/** Storage backends the API can run against. */
export const StoreDriverSchema = z.enum(['postgres', 'memory']);
export type StoreDriver = z.infer<typeof StoreDriverSchema>;

/** pino log levels accepted by Fastify's logger. */
export const LogLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

const secretSchema = z
  .string()
  .trim()
  .refine((value) => Buffer.byteLength(value, 'utf-8') >= MIN_SECRET_BYTES, {
    message: `must be at least ${MIN_SECRET_BYTES} bytes`,
  });

const portSchema = z.coerce.number().int().min(0).max(65535);

/** Environment schema. */
export const EnvSchema = z.object({
  PORT: portSchema.default(3000),
  HOST: z.string().min(1).default('::'),
  LOG_LEVEL: LogLevelSchema.default('info'),
  JWT_SECRET: secretSchema,
  JWT_SECRET_PREVIOUS: secretSchema.optional(),
  ACCESS_TOKEN_TTL_SECONDS: z.coerce.number().int().min(60).max(30 * 24 * 60 * 60).default(3600),
  STORE_DRIVER: StoreDriverSchema.default('postgres'),
  DATABASE_URL: z.string().url().optional(),
});

export interface AuthConfig {
  /** Secret used to sign new tokens (and tried first on verification). */
  jwtSecret: string;
  /** Secret still accepted for verification while rotating keys. */
  jwtSecretPrevious?: string;
  /** Lifetime of issued access tokens. */
  accessTokenTtlSeconds: number;
}

export interface AppConfig {
  port: number;
  host: string;
  logLevel: LogLevel;
  auth: AuthConfig;
  store: {
    driver: StoreDriver;
    databaseUrl?: string;
  };
}

/**
 * Thrown when the environment does not describe a runnable configuration.
 * The message lists every offending variable.
 */
export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n${issues.map((i) => `  - ${i}`).join('\n')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Parses environment variables into an AppConfig.
 *
 * @throws {ConfigError} listing each invalid or missing variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // Treat empty strings as unset so `FOO=` in an env file falls back to the default.
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value !== '') cleaned[key] = value;
  }

  const result = EnvSchema.safeParse(cleaned);
  if (!result.success) {
    throw new ConfigError(result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }

  const parsed = result.data;
  return {
    port: parsed.PORT,
    host: parsed.HOST,
    logLevel: parsed.LOG_LEVEL,
    auth: {
      jwtSecret: parsed.JWT_SECRET,
      ...(parsed.JWT_SECRET_PREVIOUS ? { jwtSecretPrevious: parsed.JWT_SECRET_PREVIOUS } : {}),
      accessTokenTtlSeconds: parsed.ACCESS_TOKEN_TTL_SECONDS,
    },
    store: {
      driver: parsed.STORE_DRIVER,
      ...(parsed.DATABASE_URL ? { databaseUrl: parsed.DATABASE_URL } : {}),
    },
  };
}
