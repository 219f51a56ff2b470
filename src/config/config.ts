// src/config/config.ts
import { z } from 'zod';
import type { LogLevel } from '../utils/logger.js';

/**
 * CalDAV connection configuration
 */
export interface CalDavConfig {
  serverUrl: string;
  username: string;
  password: string;
}

/**
 * Server configuration
 */
export interface ServerConfig {
  serverName: string;
  serverVersion: string;
  environment: string;
  host: string;
  port: number;
  logLevel: LogLevel;
}

/**
 * Tuning for the calendar layer
 */
export interface CalendarSettings {
  timezone: string;
  requestTimeoutMs: number;
  maxConcurrency: number;
  defaultEventDurationMinutes: number;
  collectionCacheTtlMs: number;
}

export type Env = Record<string, string | undefined>;

const REQUIRED = ['CALDAV_URL', 'CALDAV_USERNAME', 'CALDAV_PASSWORD'] as const;

const serverEnvSchema = z.object({
  NODE_ENV: z.string().default('development'),
  HOST: z.string().default('0.0.0.0'),
  PORT: z.coerce.number().int().min(1).max(65535).default(8000),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

const calendarEnvSchema = z.object({
  TIMEZONE: z.string().default('America/Denver'),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
  MAX_CONCURRENCY: z.coerce.number().int().positive().default(4),
  DEFAULT_EVENT_DURATION_MINUTES: z.coerce.number().int().positive().default(30),
  COLLECTION_CACHE_TTL_MS: z.coerce.number().int().nonnegative().default(5 * 60 * 1000),
});

/**
 * Drops empty strings so that schema defaults apply to blank variables
 */
function present(env: Env): Env {
  return Object.fromEntries(Object.entries(env).filter(([, value]) => value !== ''));
}

/**
 * Loads CalDAV configuration from environment
 */
export function loadCalDavConfig(env: Env): CalDavConfig {
  const { missing } = validateConfig(env);
  if (missing.length > 0) {
    throw new Error(`CalDAV configuration is incomplete, missing: ${missing.join(', ')}`);
  }
  return {
    serverUrl: env.CALDAV_URL ?? '',
    username: env.CALDAV_USERNAME ?? '',
    password: env.CALDAV_PASSWORD ?? '',
  };
}

/**
 * Loads server configuration from environment
 */
export function loadServerConfig(env: Env): ServerConfig {
  const parsed = serverEnvSchema.parse(present(env));
  return {
    serverName: 'MCP CalDAV Calendar',
    serverVersion: '1.0.0',
    environment: parsed.NODE_ENV,
    host: parsed.HOST,
    port: parsed.PORT,
    logLevel: parsed.LOG_LEVEL,
  };
}

export function loadCalendarSettings(env: Env): CalendarSettings {
  const parsed = calendarEnvSchema.parse(present(env));
  return {
    timezone: parsed.TIMEZONE,
    requestTimeoutMs: parsed.REQUEST_TIMEOUT_MS,
    maxConcurrency: parsed.MAX_CONCURRENCY,
    defaultEventDurationMinutes: parsed.DEFAULT_EVENT_DURATION_MINUTES,
    collectionCacheTtlMs: parsed.COLLECTION_CACHE_TTL_MS,
  };
}

/**
 * Validates environment variables are present
 */
export function validateConfig(env: Env): {
  isValid: boolean;
  missing: string[];
} {
  const missing = REQUIRED.filter((key) => !env[key]);
  return {
    isValid: missing.length === 0,
    missing,
  };
}
