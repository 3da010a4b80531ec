/**
 * Service Configuration
 * Environment variables parsed once into a typed config object
 */

import { z } from 'zod';
import { fromZodError } from './errors.js';

const booleanFlag = z.enum(['true', 'false']).transform((value) => value === 'true');

// Any NODE_ENV is accepted; only 'development' changes behaviour
const loggerEnvSchema = z.object({
  NODE_ENV: z.string().min(1).default('production'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
});

const envSchema = loggerEnvSchema.extend({
  DATABASE_URL: z.string().min(1).optional(),
  REDIS_URL: z.string().min(1).default('redis://localhost:6379'),
  EVENT_CHANNEL_PREFIX: z.string().min(1).default('maturity'),
  RULE_CATALOG_PATH: z.string().min(1).optional(),
  BENCHMARK_MIN_PEER_COUNT: z.coerce.number().int().min(1).default(5),
  ROADMAP_MAX_INITIATIVES: z.coerce.number().int().min(1).default(20),
  PILOT_DEFAULT_DURATION_WEEKS: z.coerce.number().int().min(1).default(8),
  REPORT_INCLUDE_BENCHMARKS: booleanFlag.default('true'),
});

export type LogLevel = z.infer<typeof loggerEnvSchema>['LOG_LEVEL'];

export interface LoggerSettings {
  nodeEnv: string;
  logLevel: LogLevel;
}

export interface AppConfig extends LoggerSettings {
  databaseUrl?: string;
  redisUrl: string;
  eventChannelPrefix: string;
  ruleCatalogPath?: string;
  benchmarkMinPeerCount: number;
  roadmapMaxInitiatives: number;
  pilotDefaultDurationWeeks: number;
  reportIncludeBenchmarks: boolean;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw fromZodError(parsed.error, 'Invalid environment configuration');
  }

  const vars = parsed.data;
  return {
    nodeEnv: vars.NODE_ENV,
    logLevel: vars.LOG_LEVEL,
    databaseUrl: vars.DATABASE_URL,
    redisUrl: vars.REDIS_URL,
    eventChannelPrefix: vars.EVENT_CHANNEL_PREFIX,
    ruleCatalogPath: vars.RULE_CATALOG_PATH,
    benchmarkMinPeerCount: vars.BENCHMARK_MIN_PEER_COUNT,
    roadmapMaxInitiatives: vars.ROADMAP_MAX_INITIATIVES,
    pilotDefaultDurationWeeks: vars.PILOT_DEFAULT_DURATION_WEEKS,
    reportIncludeBenchmarks: vars.REPORT_INCLUDE_BENCHMARKS,
  };
}

/**
 * Just the variables the root logger needs, so that a bad value elsewhere in
 * the environment surfaces from getConfig() rather than from every import.
 */
export function loadLoggerSettings(env: NodeJS.ProcessEnv = process.env): LoggerSettings {
  const parsed = loggerEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw fromZodError(parsed.error, 'Invalid logger configuration');
  }
  return { nodeEnv: parsed.data.NODE_ENV, logLevel: parsed.data.LOG_LEVEL };
}

let cachedConfig: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}
