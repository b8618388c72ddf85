/**
 * Application Configuration
 *
 * Reads every setting from the environment once, validates it and fails fast
 * with a message naming the offending variable.
 */

import type { BackendConfig } from './storage/index.js';
import type { PeakWindow, PregenerationConfig } from './pregeneration/types.js';
import { DEFAULT_PEAK_WINDOWS } from './pregeneration/predictor.js';
import { isLogLevel, type LogLevel } from './logger.js';
import { parseModelSelection, type ModelSelection } from './models/providers.js';

type Env = Record<string, string | undefined>;

// setTimeout fires immediately for delays above 2^31 - 1 ms
const MAX_TIMER_MS = 2_147_483_647;
const MAX_INTERVAL_MINUTES = Math.floor(MAX_TIMER_MS / 60_000);

export interface GeneratorSettings {
  baseUrl: string;
  timeoutMs: number;
  defaultModel?: ModelSelection;
}

export interface PregenerationSettings extends PregenerationConfig {
  enabled: boolean;
  warmOnStartup: boolean;
  relatedFill: boolean;
  intervalMinutes: number;
}

export interface AppConfig {
  port: number;
  logLevel: LogLevel;
  cache: BackendConfig & { ttlSeconds: number };
  generator: GeneratorSettings;
  pregeneration: PregenerationSettings;
}

function readInt(env: Env, name: string, fallback: number, min: number, max: number = Number.MAX_SAFE_INTEGER): number {
  const raw = env[name]?.trim();
  if (!raw) {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isInteger(value) || value < min || value > max) {
    const range = max === Number.MAX_SAFE_INTEGER ? `at least ${min}` : `between ${min} and ${max}`;
    throw new Error(`Invalid ${name} value: ${raw}. Must be an integer ${range}.`);
  }
  return value;
}

function readPercentage(env: Env, name: string, fallback: number): number {
  const raw = env[name]?.trim();
  if (!raw) {
    return fallback;
  }

  const value = Number(raw);
  if (Number.isNaN(value) || value < 0 || value > 100) {
    throw new Error(`Invalid ${name} value: ${raw}. Must be a percentage between 0 and 100.`);
  }
  return value;
}

function readBoolean(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name]?.trim().toLowerCase();
  if (!raw) {
    return fallback;
  }
  if (raw === 'true' || raw === '1' || raw === 'yes') {
    return true;
  }
  if (raw === 'false' || raw === '0' || raw === 'no') {
    return false;
  }
  throw new Error(`Invalid ${name} value: ${raw}. Must be true or false.`);
}

/**
 * Parse peak windows given as comma-separated hour ranges
 *
 * @example
 * ```ts
 * parsePeakHours('6-9,14-17'); // [{ startHour: 6, endHour: 9 }, { startHour: 14, endHour: 17 }]
 * ```
 *
 * @throws {Error} On malformed ranges or hours outside 0-23
 */
export function parsePeakHours(value: string): PeakWindow[] {
  return value
    .split(',')
    .map((part) => part.trim())
    .filter(Boolean)
    .map((part) => {
      const match = /^(\d{1,2})\s*-\s*(\d{1,2})$/.exec(part);
      if (!match) {
        throw new Error(`Invalid PREGEN_PEAK_HOURS range: ${part}. Expected start-end, e.g. 6-9.`);
      }
      const startHour = parseInt(match[1] ?? '', 10);
      const endHour = parseInt(match[2] ?? '', 10);
      if (startHour > 23 || endHour > 23 || startHour > endHour) {
        throw new Error(`Invalid PREGEN_PEAK_HOURS range: ${part}. Hours must be 0-23 and start <= end.`);
      }
      return { startHour, endHour };
    });
}

function readBaseUrl(env: Env): string {
  const raw = env.GENERATOR_URL?.trim() || 'http://localhost:8000';
  try {
    const url = new URL(raw);
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      throw new Error('unsupported protocol');
    }
  } catch {
    throw new Error(`Invalid GENERATOR_URL value: ${raw}. Must be an http(s) URL.`);
  }
  return raw;
}

/**
 * Validate and load application configuration
 *
 * @throws {Error} If any variable is present but invalid
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const logLevelValue = env.LOG_LEVEL?.trim().toLowerCase() || 'info';
  if (!isLogLevel(logLevelValue)) {
    throw new Error(`Invalid LOG_LEVEL value: ${logLevelValue}. Must be one of debug, info, warn, error, silent.`);
  }

  const backendValue = env.CACHE_BACKEND?.trim().toLowerCase() || 'redis';
  if (backendValue !== 'redis' && backendValue !== 'memory') {
    throw new Error(`Invalid CACHE_BACKEND value: ${backendValue}. Must be redis or memory.`);
  }

  let defaultModel: ModelSelection | undefined;
  try {
    defaultModel = parseModelSelection(env.DEFAULT_MODEL_PROVIDER, env.DEFAULT_MODEL_NAME);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Invalid DEFAULT_MODEL_PROVIDER/DEFAULT_MODEL_NAME: ${reason}`);
  }

  const escalateBelowHitRate = readPercentage(env, 'CACHE_HIT_RATE_ESCALATE', 70);
  const maintainAboveHitRate = readPercentage(env, 'CACHE_HIT_RATE_MAINTAIN', 90);
  if (escalateBelowHitRate > maintainAboveHitRate) {
    throw new Error(
      `CACHE_HIT_RATE_ESCALATE (${escalateBelowHitRate}) must not exceed CACHE_HIT_RATE_MAINTAIN (${maintainAboveHitRate}).`
    );
  }

  const peakHours = env.PREGEN_PEAK_HOURS?.trim();

  return {
    port: readInt(env, 'PORT', 3000, 1, 65535),
    logLevel: logLevelValue,
    cache: {
      kind: backendValue,
      ttlSeconds: readInt(env, 'CACHE_TTL_SECONDS', 1800, 1),
      redis: {
        host: env.REDIS_HOST?.trim() || 'localhost',
        port: readInt(env, 'REDIS_PORT', 6379, 1, 65535),
        db: readInt(env, 'REDIS_DB', 0, 0),
        password: env.REDIS_PASSWORD || undefined,
        connectTimeoutMs: readInt(env, 'REDIS_CONNECT_TIMEOUT_MS', 5000, 1, MAX_TIMER_MS),
      },
    },
    generator: {
      baseUrl: readBaseUrl(env),
      timeoutMs: readInt(env, 'GENERATOR_TIMEOUT_MS', 60000, 1, MAX_TIMER_MS),
      defaultModel,
    },
    pregeneration: {
      enabled: readBoolean(env, 'PREGEN_ENABLED', true),
      warmOnStartup: readBoolean(env, 'PREGEN_WARM_ON_STARTUP', true),
      relatedFill: readBoolean(env, 'PREGEN_RELATED_FILL', false),
      intervalMinutes: readInt(env, 'PREGEN_INTERVAL_MINUTES', 30, 1, MAX_INTERVAL_MINUTES),
      batchSize: readInt(env, 'PREGEN_BATCH_SIZE', 3, 1),
      batchDelayMs: readInt(env, 'PREGEN_BATCH_DELAY_MS', 2000, 0, MAX_TIMER_MS),
      escalatedBatchSize: readInt(env, 'PREGEN_ESCALATED_BATCH_SIZE', 5, 1),
      escalatedBatchDelayMs: readInt(env, 'PREGEN_ESCALATED_BATCH_DELAY_MS', 1000, 0, MAX_TIMER_MS),
      warmupCount: readInt(env, 'PREGEN_WARMUP_COUNT', 5, 0),
      warmupBatchSize: readInt(env, 'PREGEN_WARMUP_BATCH_SIZE', 2, 1),
      peakWindows: peakHours ? parsePeakHours(peakHours) : DEFAULT_PEAK_WINDOWS.map((window) => ({ ...window })),
      escalateBelowHitRate,
      maintainAboveHitRate,
      adaptiveLimit: readInt(env, 'PREGEN_ADAPTIVE_LIMIT', 10, 0),
    },
  };
}

/**
 * Application configuration singleton
 * Loaded once on first access to ensure consistency
 */
let cachedConfig: AppConfig | null = null;

/**
 * Reset cached configuration (useful for testing)
 * @internal
 */
export function resetConfig(): void {
  cachedConfig = null;
}

/**
 * Get application configuration from process.env
 */
export function getConfig(): AppConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}
