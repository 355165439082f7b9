/**
 * Hook for loading a model's capabilities and its adapter-aware view.
 *
 * - Introspection goes through the engine's cache, so components mounting for
 *   the same model share one build
 * - The request is aborted on unmount or when the model changes
 * - The overlay is recomputed only when the adapter set actually changes
 */

import { useState, useEffect, useCallback, useMemo } from 'react';
import type { IntrospectionEngine } from '../services/introspection/engine';
import { appLogger } from '../services/platform';
import { ProbeError } from '../services/runner/errors';
import type { RunnerHandle } from '../services/runner/types';
import type { AdapterOverlay, ModelCapabilities } from '../types';

export interface UseModelCapabilitiesResult {
  /** Adapter-aware capabilities, or the base snapshot when no adapters apply */
  capabilities: ModelCapabilities | null;
  baseCapabilities: ModelCapabilities | null;
  loading: boolean;
  error: string | null;
  /** Drop the cached snapshot and introspect again */
  refresh: () => void;
}

function adapterSetKey(adapters: readonly AdapterOverlay[]): string {
  return adapters
    .map((a) => `${a.id}:${a.category}:${a.weight}:${a.rank}:${a.enabled ? 1 : 0}`)
    .join('|');
}

export function useModelCapabilities(
  engine: IntrospectionEngine,
  modelPath: string | null,
  runner: RunnerHandle | null,
  adapters: readonly AdapterOverlay[] = []
): UseModelCapabilitiesResult {
  const [baseCapabilities, setBaseCapabilities] = useState<ModelCapabilities | null>(null);
  const [loading, setLoading] = useState(false);
  const [error, setError] = useState<string | null>(null);
  const [reloadToken, setReloadToken] = useState(0);

  useEffect(() => {
    if (!modelPath || !runner) {
      setBaseCapabilities(null);
      setLoading(false);
      setError(null);
      return;
    }

    const controller = new AbortController();
    setLoading(true);
    setError(null);

    void engine
      .introspect(modelPath, runner, { signal: controller.signal })
      .then((capabilities) => {
        if (!controller.signal.aborted) setBaseCapabilities(capabilities);
      })
      .catch((err: unknown) => {
        if (ProbeError.hasCode(err, 'CANCELLED')) return;
        const message = err instanceof Error ? err.message : String(err);
        appLogger.error('hook', `Failed to load capabilities for ${modelPath}`, { error: message });
        if (!controller.signal.aborted) setError(`Failed to load capabilities: ${message}`);
      })
      .finally(() => {
        if (!controller.signal.aborted) setLoading(false);
      });

    return () => {
      controller.abort();
    };
  }, [engine, modelPath, runner, reloadToken]);

  const refresh = useCallback(() => {
    if (modelPath) engine.cache.invalidate(modelPath);
    setReloadToken((token) => token + 1);
  }, [engine, modelPath]);

  // Callers usually pass a fresh array every render; key on content instead
  const adapterKey = adapterSetKey(adapters);
  // eslint-disable-next-line react-hooks/exhaustive-deps
  const stableAdapters = useMemo(() => adapters, [adapterKey]);

  const capabilities = useMemo(() => {
    if (!baseCapabilities) return null;
    if (stableAdapters.length === 0) return baseCapabilities;
    return engine.applyOverlays(baseCapabilities, stableAdapters);
  }, [engine, baseCapabilities, stableAdapters]);

  return { capabilities, baseCapabilities, loading, error, refresh };
}
