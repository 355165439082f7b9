/**
 * Introspection configuration.
 *
 * Values come from environment variables so hosts can tune the engine without
 * code changes. Anything missing or malformed falls back to its default.
 */

import { appLogger } from '../services/platform';
import { parseLogLevel } from '../services/platform/logging/types';
import type { LogLevel } from '../services/platform/logging/types';

/**
 * How long a snapshot stays fresh.
 *
 * Capabilities only change when the model or the runner changes, so an hour
 * keeps the runner quiet without hiding a swapped runner for long.
 *
 * @default 3_600_000 (1 hour)
 */
export const DEFAULT_CACHE_TTL_MS = 60 * 60 * 1000;

/**
 * Per-trial timeout for the HTTP runner.
 *
 * Each trial generates at most a handful of tokens, but the first one may
 * wait on the model being paged in.
 *
 * @default 30_000 (30 seconds)
 */
export const DEFAULT_PROBE_TIMEOUT_MS = 30_000;

export interface IntrospectionConfig {
  cacheTtlMs: number;
  probeTimeoutMs: number;
  /** Extra family profile file layered over the bundled profiles */
  familyProfilesPath?: string;
  logLevel: LogLevel;
}

function readPositiveInteger(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    appLogger.warn('config', `Ignoring invalid ${name}; using default`, { value: raw, default: fallback });
    return fallback;
  }
  return value;
}

/**
 * Read the engine configuration from the environment.
 *
 * @example
 * ```typescript
 * // CAPPROBE_CACHE_TTL_MS=60000
 * loadIntrospectionConfig().cacheTtlMs // => 60000
 * ```
 */
export function loadIntrospectionConfig(env: NodeJS.ProcessEnv = process.env): IntrospectionConfig {
  const profilesPath = env.CAPPROBE_FAMILY_PROFILES?.trim();

  const config: IntrospectionConfig = {
    cacheTtlMs: readPositiveInteger(env, 'CAPPROBE_CACHE_TTL_MS', DEFAULT_CACHE_TTL_MS),
    probeTimeoutMs: readPositiveInteger(env, 'CAPPROBE_PROBE_TIMEOUT_MS', DEFAULT_PROBE_TIMEOUT_MS),
    logLevel: parseLogLevel(env.CAPPROBE_LOG_LEVEL, 'info'),
  };
  if (profilesPath) config.familyProfilesPath = profilesPath;

  appLogger.debug('config', 'Loaded introspection config', { ...config });
  return config;
}
