/**
 * Capability Cache
 *
 * Memoizes snapshots per model identity with a freshness window, and shares
 * one in-flight build between concurrent callers for the same model.
 *
 * State per key: absent -> computing -> fresh -> stale -> computing.
 * Staleness is detected lazily on read.
 */

import { DEFAULT_CACHE_TTL_MS } from '../../config/introspection';
import { appLogger } from '../platform';
import { ProbeError, throwIfAborted } from '../runner/errors';
import type { RunnerHandle } from '../runner/types';
import type { ModelCapabilities } from '../../types';
import { systemClock } from '../../utils/clock';
import type { Clock } from '../../utils/clock';
import { defaultFamilyRegistry } from './familyProfiles';
import type { FamilyProfileRegistry } from './familyProfiles';
import { modelNameFromPath } from './metadataExtractor';
import { introspectModel } from './pipeline';
import type { ModifiabilityTarget } from './modifiabilityValidator';

export type CacheState = 'absent' | 'computing' | 'fresh' | 'stale';

export type CapabilityBuilder = (
  modelId: string,
  runner: RunnerHandle,
  signal: AbortSignal | undefined
) => Promise<ModelCapabilities>;

export interface CapabilityCacheOptions {
  /** Freshness window in milliseconds */
  ttlMs?: number;
  clock?: Clock;
  registry?: FamilyProfileRegistry;
  modifiabilityTargets?: readonly ModifiabilityTarget[];
  /** Replaces the introspection pipeline; used by tests and custom hosts */
  build?: CapabilityBuilder;
}

interface CacheEntry {
  capabilities: ModelCapabilities;
  storedAt: number;
}

/**
 * Reject when the signal fires without cancelling the shared build itself.
 */
function waitWithSignal<T>(promise: Promise<T>, signal: AbortSignal | undefined): Promise<T> {
  if (!signal) return promise;
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new ProbeError('CANCELLED', 'Introspection was cancelled', signal.reason));
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener('abort', onAbort, { once: true });
    void promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

export class CapabilityCache {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly inFlight = new Map<string, Promise<ModelCapabilities>>();
  /** Bumped by invalidate/clear so a build already running does not store its result */
  private readonly generations = new Map<string, number>();
  private readonly ttlMs: number;
  private readonly clock: Clock;
  private readonly build: CapabilityBuilder;

  constructor(options: CapabilityCacheOptions = {}) {
    this.ttlMs = options.ttlMs ?? DEFAULT_CACHE_TTL_MS;
    this.clock = options.clock ?? systemClock;

    const registry = options.registry ?? defaultFamilyRegistry();
    this.build =
      options.build ??
      ((modelId, runner, signal) =>
        introspectModel(modelId, runner, {
          signal,
          registry,
          clock: this.clock,
          modifiabilityTargets: options.modifiabilityTargets,
        }));
  }

  /**
   * Cache key for a model identifier: its file name without directory or extension.
   */
  static keyFor(modelId: string): string {
    return modelNameFromPath(modelId);
  }

  /**
   * Fresh snapshot from cache, the in-flight build for the same model, or a new build.
   *
   * @throws ProbeError CANCELLED when the signal fires; nothing is stored
   */
  async introspect(
    modelId: string,
    runner: RunnerHandle,
    options: { signal?: AbortSignal } = {}
  ): Promise<ModelCapabilities> {
    throwIfAborted(options.signal);
    const key = CapabilityCache.keyFor(modelId);

    const cached = this.readFresh(key);
    if (cached) {
      appLogger.debug('cache', `Using cached capabilities for ${key}`);
      return cached;
    }

    const pending = this.inFlight.get(key);
    if (pending) {
      appLogger.debug('cache', `Joining in-flight introspection for ${key}`);
      return waitWithSignal(pending, options.signal);
    }

    const generation = this.generationOf(key);
    const promise = this.build(modelId, runner, options.signal)
      .then((capabilities) => {
        if (generation !== this.generationOf(key)) {
          appLogger.debug('cache', `Discarding capabilities for ${key} built before invalidation`);
        } else if (capabilities.confidence === 'high') {
          this.entries.set(key, { capabilities, storedAt: this.clock.now() });
          appLogger.debug('cache', `Stored capabilities for ${key}`);
        } else {
          appLogger.debug('cache', `Not caching low-confidence capabilities for ${key}`);
        }
        return capabilities;
      })
      .finally(() => {
        this.inFlight.delete(key);
      });

    this.inFlight.set(key, promise);
    return promise;
  }

  getState(modelId: string): CacheState {
    const key = CapabilityCache.keyFor(modelId);
    if (this.inFlight.has(key)) return 'computing';
    const entry = this.entries.get(key);
    if (!entry) return 'absent';
    return this.isFresh(entry) ? 'fresh' : 'stale';
  }

  /**
   * Cached snapshot without triggering a build, if still fresh.
   */
  peek(modelId: string): ModelCapabilities | undefined {
    return this.readFresh(CapabilityCache.keyFor(modelId));
  }

  /**
   * Drop the entry for a model. A build already running still resolves for its
   * callers but is not stored.
   */
  invalidate(modelId: string): void {
    const key = CapabilityCache.keyFor(modelId);
    if (this.inFlight.has(key)) this.bumpGeneration(key);
    if (this.entries.delete(key)) {
      appLogger.debug('cache', `Invalidated capabilities for ${key}`);
    }
  }

  clear(): void {
    for (const key of this.inFlight.keys()) this.bumpGeneration(key);
    this.entries.clear();
    appLogger.debug('cache', 'Cleared capability cache');
  }

  get size(): number {
    return this.entries.size;
  }

  private generationOf(key: string): number {
    return this.generations.get(key) ?? 0;
  }

  private bumpGeneration(key: string): void {
    this.generations.set(key, this.generationOf(key) + 1);
  }

  private isFresh(entry: CacheEntry): boolean {
    return this.clock.now() - entry.storedAt < this.ttlMs;
  }

  private readFresh(key: string): ModelCapabilities | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (this.isFresh(entry)) return entry.capabilities;
    appLogger.debug('cache', `Cached capabilities for ${key} are stale`);
    return undefined;
  }
}
