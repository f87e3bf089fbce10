/**
 * Application configuration.
 *
 * Built once from the environment at process start, frozen, and handed to
 * whatever needs it. Nothing reads `process.env` after this point.
 */

import { z } from 'zod';
import { ConfigError } from './errors.js';

const DEFAULT_CORS_ORIGINS = [
  'http://localhost:3000',
  'http://localhost:8000',
  'http://127.0.0.1:3000',
  'http://127.0.0.1:8000',
];

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const booleanFlag = z
  .string()
  .trim()
  .toLowerCase()
  .transform(v => v === 'true' || v === '1' || v === 'yes' || v === 'on');

const positiveInt = z.coerce.number().int().positive();

const commaList = z
  .string()
  .transform(v => v.split(',').map(s => s.trim()).filter(s => s.length > 0));

const envSchema = z.object({
  APP_NAME: z.string().min(1).default('Task Management API'),
  APP_VERSION: z.string().min(1).default('1.0.0'),
  DEBUG: booleanFlag.default('false'),
  HOST: z.string().min(1).default('0.0.0.0'),
  PORT: z.coerce.number().int().min(0).max(65535).default(8000),
  DATABASE_URL: z.string().min(1).default('sqlite:///./tasks.db'),
  CORS_ORIGINS: commaList.default(DEFAULT_CORS_ORIGINS.join(',')),
  DEFAULT_PAGE_SIZE: positiveInt.default(100),
  MAX_PAGE_SIZE: positiveInt.default(1000),
  LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
}).refine(env => env.DEFAULT_PAGE_SIZE <= env.MAX_PAGE_SIZE, {
  message: 'DEFAULT_PAGE_SIZE must not exceed MAX_PAGE_SIZE',
  path: ['DEFAULT_PAGE_SIZE'],
});

export interface AppConfig {
  readonly appName: string;
  readonly appVersion: string;
  readonly debug: boolean;
  readonly host: string;
  readonly port: number;
  readonly databaseUrl: string;
  /** `*` allows any origin */
  readonly corsOrigins: readonly string[];
  readonly defaultPageSize: number;
  readonly maxPageSize: number;
  readonly logLevel: LogLevel;
}

/** Read and validate configuration. Throws ConfigError naming each bad variable. */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  // Empty strings count as unset
  const present = Object.fromEntries(
    Object.entries(env).filter(([, v]) => v !== undefined && v !== ''),
  );

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const issues = parsed.error.errors.map(issue => ({
      path: issue.path.join('.'),
      message: issue.message,
      code: issue.code,
    }));
    throw new ConfigError(
      `Invalid configuration: ${issues.map(i => `${i.path}: ${i.message}`).join('; ')}`,
      issues,
    );
  }

  const e = parsed.data;
  return Object.freeze({
    appName: e.APP_NAME,
    appVersion: e.APP_VERSION,
    debug: e.DEBUG,
    host: e.HOST,
    port: e.PORT,
    databaseUrl: e.DATABASE_URL,
    corsOrigins: Object.freeze([...e.CORS_ORIGINS]),
    defaultPageSize: e.DEFAULT_PAGE_SIZE,
    maxPageSize: e.MAX_PAGE_SIZE,
    logLevel: e.LOG_LEVEL ?? (e.DEBUG ? 'debug' : 'info'),
  });
}
