import dotenv from 'dotenv';
import { z } from 'zod';
import { LOG_LEVELS, type LogLevel } from './logger.js';
import {
  DEFAULT_HASH_COST,
  DEFAULT_MIN_PASSWORD_LENGTH,
  MAX_HASH_COST,
  MIN_HASH_COST,
} from '../domain/auth/password.js';

export interface AppConfig {
  databaseUrl: string;
  databasePoolMax: number;
  databaseConnectTimeoutMs: number;
  passwordHashCost: number;
  passwordMinLength: number;
  loginMaxAttempts: number;
  loginLockoutMs: number | null;
  airQuality: {
    baseUrl: string;
    token: string;
    timeoutMs: number;
    defaultCity: string;
  };
  logLevel: LogLevel;
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`);
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

const positiveInt = z.coerce.number().int().positive();

const envSchema = z.object({
  DATABASE_URL: z.string().min(1, 'DATABASE_URL is required'),
  DATABASE_POOL_MAX: positiveInt.default(1),
  DATABASE_CONNECT_TIMEOUT_MS: positiveInt.default(2000),
  PASSWORD_HASH_COST: z.coerce
    .number()
    .int()
    .min(MIN_HASH_COST)
    .max(MAX_HASH_COST)
    .default(DEFAULT_HASH_COST),
  PASSWORD_MIN_LENGTH: positiveInt.default(DEFAULT_MIN_PASSWORD_LENGTH),
  LOGIN_MAX_ATTEMPTS: positiveInt.default(3),
  LOGIN_LOCKOUT_MS: positiveInt.optional(),
  AIR_QUALITY_BASE_URL: z.string().url().default('https://api.waqi.info'),
  AIR_QUALITY_TOKEN: z.string().min(1).default('demo'),
  AIR_QUALITY_TIMEOUT_MS: positiveInt.default(10000),
  AIR_QUALITY_DEFAULT_CITY: z.string().min(1).default('Mexico'),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('warn'),
});

export interface PasswordPolicyConfig {
  passwordHashCost: number;
  passwordMinLength: number;
}

const passwordPolicySchema = envSchema.pick({
  PASSWORD_HASH_COST: true,
  PASSWORD_MIN_LENGTH: true,
});

function parseEnv<T extends z.ZodTypeAny>(schema: T, env: NodeJS.ProcessEnv): z.output<T> {
  if (env === process.env) {
    dotenv.config();
  }

  // Empty variables count as unset.
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );

  const result = schema.safeParse(present);
  if (!result.success) {
    throw new ConfigError(
      result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`)
    );
  }
  return result.data;
}

/**
 * Load configuration from the environment (and .env when present).
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = parseEnv(envSchema, env);
  return {
    databaseUrl: parsed.DATABASE_URL,
    databasePoolMax: parsed.DATABASE_POOL_MAX,
    databaseConnectTimeoutMs: parsed.DATABASE_CONNECT_TIMEOUT_MS,
    passwordHashCost: parsed.PASSWORD_HASH_COST,
    passwordMinLength: parsed.PASSWORD_MIN_LENGTH,
    loginMaxAttempts: parsed.LOGIN_MAX_ATTEMPTS,
    loginLockoutMs: parsed.LOGIN_LOCKOUT_MS ?? null,
    airQuality: {
      baseUrl: parsed.AIR_QUALITY_BASE_URL,
      token: parsed.AIR_QUALITY_TOKEN,
      timeoutMs: parsed.AIR_QUALITY_TIMEOUT_MS,
      defaultCity: parsed.AIR_QUALITY_DEFAULT_CITY,
    },
    logLevel: parsed.LOG_LEVEL,
  };
}

/**
 * The hashing settings alone, for tools that never touch the database.
 */
export function loadPasswordPolicy(env: NodeJS.ProcessEnv = process.env): PasswordPolicyConfig {
  const parsed = parseEnv(passwordPolicySchema, env);
  return {
    passwordHashCost: parsed.PASSWORD_HASH_COST,
    passwordMinLength: parsed.PASSWORD_MIN_LENGTH,
  };
}
