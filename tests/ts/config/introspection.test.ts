/**
 * Tests for environment-driven configuration.
 */

import { describe, it, expect } from 'vitest';
import {
  DEFAULT_CACHE_TTL_MS,
  DEFAULT_PROBE_TIMEOUT_MS,
  loadIntrospectionConfig,
} from '../../../src/config/introspection';
import { appLogger, MemoryTransport } from '../../../src/services/platform';

describe('loadIntrospectionConfig', () => {
  it('uses defaults for an empty environment', () => {
    expect(loadIntrospectionConfig({})).toEqual({
      cacheTtlMs: 3_600_000,
      probeTimeoutMs: 30_000,
      logLevel: 'info',
    });
    expect(DEFAULT_CACHE_TTL_MS).toBe(3_600_000);
    expect(DEFAULT_PROBE_TIMEOUT_MS).toBe(30_000);
  });

  it('reads every variable', () => {
    expect(
      loadIntrospectionConfig({
        CAPPROBE_CACHE_TTL_MS: '60000',
        CAPPROBE_PROBE_TIMEOUT_MS: '5000',
        CAPPROBE_FAMILY_PROFILES: ' /etc/capprobe/profiles.json ',
        CAPPROBE_LOG_LEVEL: 'DEBUG',
      })
    ).toEqual({
      cacheTtlMs: 60_000,
      probeTimeoutMs: 5_000,
      familyProfilesPath: '/etc/capprobe/profiles.json',
      logLevel: 'debug',
    });
  });

  it('falls back to defaults for invalid numbers and says so', () => {
    const memory = new MemoryTransport();
    appLogger.addTransport(memory);

    const config = loadIntrospectionConfig({ CAPPROBE_CACHE_TTL_MS: 'soon', CAPPROBE_PROBE_TIMEOUT_MS: '-5' });

    expect(config.cacheTtlMs).toBe(DEFAULT_CACHE_TTL_MS);
    expect(config.probeTimeoutMs).toBe(DEFAULT_PROBE_TIMEOUT_MS);
    expect(memory.getEntries('config').filter((e) => e.level === 'warn').map((e) => e.message)).toEqual([
      'Ignoring invalid CAPPROBE_CACHE_TTL_MS; using default',
      'Ignoring invalid CAPPROBE_PROBE_TIMEOUT_MS; using default',
    ]);
  });
});
