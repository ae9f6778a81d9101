import { fileURLToPath } from 'node:url';
import { z } from 'zod';

const DEFAULT_CATALOG_PATH = fileURLToPath(new URL('../data/catalog.json', import.meta.url));

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`);
    this.name = 'ConfigError';
  }
}

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  HOST: z.string().min(1).default('0.0.0.0'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  API_TITLE: z.string().default('Kids Store Cart API'),
  API_VERSION: z.string().default('1.0.0'),
  API_DESCRIPTION: z.string().default('Menu, session cart and checkout for the kids food store'),
  API_BASE_URL: z.string().url().optional(),
  CORS_ORIGIN: z.string().optional(),
  SESSION_SECRET: z.string({ required_error: 'SESSION_SECRET must be provided' }).min(16, 'SESSION_SECRET must be at least 16 characters'),
  SESSION_COOKIE_NAME: z.string().regex(/^[A-Za-z0-9_-]+$/).default('kids_store_session'),
  CART_TTL_MINUTES: z.coerce.number().int().min(0).default(60),
  CART_CLEANUP_INTERVAL_SECONDS: z.coerce.number().int().positive().default(60),
  MAX_QUANTITY: z.coerce.number().int().positive().default(99),
  MAX_CART_ITEMS: z.coerce.number().int().positive().default(50),
  CATALOG_PATH: z.string().min(1).default(DEFAULT_CATALOG_PATH),
});

export type LogLevel = z.infer<typeof envSchema>['LOG_LEVEL'];

export interface AppConfig {
  port: number;
  host: string;
  nodeEnv: 'development' | 'production' | 'test';
  logLevel: LogLevel;
  apiTitle: string;
  apiVersion: string;
  apiDescription: string;
  apiBaseUrl?: string;
  /** `true` reflects the request origin */
  corsOrigin: string[] | true;
  sessionSecret: string;
  sessionCookieName: string;
  cartTtlMinutes: number;
  cartCleanupIntervalSeconds: number;
  maxQuantity: number;
  maxCartItems: number;
  catalogPath: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(env);

  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const parsed = result.data;
  const origins = parsed.CORS_ORIGIN?.split(',').map(origin => origin.trim()).filter(Boolean);

  return {
    port: parsed.PORT,
    host: parsed.HOST,
    nodeEnv: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL,
    apiTitle: parsed.API_TITLE,
    apiVersion: parsed.API_VERSION,
    apiDescription: parsed.API_DESCRIPTION,
    apiBaseUrl: parsed.API_BASE_URL,
    corsOrigin: origins && origins.length > 0 ? origins : true,
    sessionSecret: parsed.SESSION_SECRET,
    sessionCookieName: parsed.SESSION_COOKIE_NAME,
    cartTtlMinutes: parsed.CART_TTL_MINUTES,
    cartCleanupIntervalSeconds: parsed.CART_CLEANUP_INTERVAL_SECONDS,
    maxQuantity: parsed.MAX_QUANTITY,
    maxCartItems: parsed.MAX_CART_ITEMS,
    catalogPath: parsed.CATALOG_PATH,
  };
}
