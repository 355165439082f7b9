/**
 * Engine facade: the two public operations behind one object.
 */

import { DEFAULT_PROBE_TIMEOUT_MS, loadIntrospectionConfig } from '../../config/introspection';
import type { IntrospectionConfig } from '../../config/introspection';
import { appLogger } from '../platform';
import { LlamaServerRunner } from '../runner/llamaServerRunner';
import type { LlamaServerRunnerConfig } from '../runner/llamaServerRunner';
import type { RunnerHandle } from '../runner/types';
import type { AdapterOverlay, ModelCapabilities } from '../../types';
import type { Clock } from '../../utils/clock';
import { CapabilityCache } from './capabilityCache';
import type { CapabilityBuilder } from './capabilityCache';
import { defaultFamilyRegistry, FamilyProfileRegistry } from './familyProfiles';
import { applyOverlays } from './loraOverlay';

export interface IntrospectionEngine {
  /** Cached, deduplicated introspection */
  introspect(modelId: string, runner: RunnerHandle, options?: { signal?: AbortSignal }): Promise<ModelCapabilities>;
  /** Adapter-aware view; not cached */
  applyOverlays(capabilities: ModelCapabilities, adapters: readonly AdapterOverlay[]): ModelCapabilities;
  /** llama-server runner using the engine's per-trial timeout unless one is given */
  createRunner(config: LlamaServerRunnerConfig): LlamaServerRunner;
  readonly cache: CapabilityCache;
  readonly registry: FamilyProfileRegistry;
}

export interface IntrospectionEngineOptions {
  cacheTtlMs?: number;
  probeTimeoutMs?: number;
  registry?: FamilyProfileRegistry;
  clock?: Clock;
  build?: CapabilityBuilder;
}

export function createIntrospectionEngine(options: IntrospectionEngineOptions = {}): IntrospectionEngine {
  const registry = options.registry ?? defaultFamilyRegistry();
  const probeTimeoutMs = options.probeTimeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS;
  const cache = new CapabilityCache({
    ttlMs: options.cacheTtlMs,
    clock: options.clock,
    registry,
    build: options.build,
  });

  return {
    introspect: (modelId, runner, introspectOptions) => cache.introspect(modelId, runner, introspectOptions),
    applyOverlays,
    createRunner: (config) => new LlamaServerRunner({ ...config, timeoutMs: config.timeoutMs ?? probeTimeoutMs }),
    cache,
    registry,
  };
}

/**
 * Engine configured from the environment, with any extra family profile file
 * layered over the bundled profiles. Also applies the configured log level.
 *
 * @throws when CAPPROBE_FAMILY_PROFILES names a file that cannot be read or parsed
 */
export async function createIntrospectionEngineFromConfig(
  config: IntrospectionConfig = loadIntrospectionConfig()
): Promise<IntrospectionEngine> {
  appLogger.setMinLevel(config.logLevel);

  let registry = defaultFamilyRegistry();
  if (config.familyProfilesPath) {
    const extra = await FamilyProfileRegistry.load(config.familyProfilesPath);
    registry = registry.extend(extra);
  }

  appLogger.info('introspection', 'Introspection engine ready', {
    cacheTtlMs: config.cacheTtlMs,
    probeTimeoutMs: config.probeTimeoutMs,
    families: registry.listFamilies(),
  });

  return createIntrospectionEngine({
    cacheTtlMs: config.cacheTtlMs,
    probeTimeoutMs: config.probeTimeoutMs,
    registry,
  });
}
