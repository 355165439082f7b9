// @vitest-environment jsdom
/**
 * Tests for useModelCapabilities hook.
 */

import { describe, it, expect, vi } from 'vitest';
import { renderHook, waitFor, act } from '@testing-library/react';
import { useModelCapabilities } from '../../../src/hooks/useModelCapabilities';
import { createIntrospectionEngine } from '../../../src/services/introspection/engine';
import type { CapabilityBuilder } from '../../../src/services/introspection/capabilityCache';
import type { AdapterOverlay, ModelCapabilities } from '../../../src/types';
import { makeAdapter, makeCapabilities } from '../fixtures/capabilities';
import { FakeRunner } from '../fixtures/fakeRunner';

const runner = new FakeRunner();

function engineWith(build: CapabilityBuilder) {
  const buildMock = vi.fn(build);
  return { engine: createIntrospectionEngine({ build: buildMock }), build: buildMock };
}

describe('useModelCapabilities', () => {
  it('loads capabilities through the engine', async () => {
    const base = makeCapabilities();
    const { engine, build } = engineWith(async () => base);

    const { result } = renderHook(() => useModelCapabilities(engine, 'modelA', runner));

    await waitFor(() => {
      expect(result.current.loading).toBe(false);
    });

    expect(result.current.capabilities).toBe(base);
    expect(result.current.baseCapabilities).toBe(base);
    expect(result.current.error).toBeNull();
    expect(build).toHaveBeenCalledTimes(1);
  });

  it('returns the adapter-aware view when adapters are applied', async () => {
    const base = makeCapabilities();
    const { engine } = engineWith(async () => base);
    const adapters = [makeAdapter({ category: 'style', weight: 1.5 }), makeAdapter({ weight: 1.5 })];

    const { result } = renderHook(() => useModelCapabilities(engine, 'modelA', runner, adapters));

    await waitFor(() => {
      expect(result.current.capabilities).not.toBeNull();
    });

    expect(result.current.baseCapabilities).toBe(base);
    expect(result.current.capabilities).not.toBe(base);
    expect(result.current.capabilities?.recommendedDefaults.temperature).toBeCloseTo(0.4);
  });

  it('keeps the same overlay while the adapter set is unchanged', async () => {
    const { engine } = engineWith(async () => makeCapabilities());
    const initial: AdapterOverlay[] = [makeAdapter({ category: 'style' })];

    const { result, rerender } = renderHook(
      ({ adapters }) => useModelCapabilities(engine, 'modelA', runner, adapters),
      { initialProps: { adapters: initial } }
    );
    await waitFor(() => {
      expect(result.current.capabilities).not.toBeNull();
    });
    const first = result.current.capabilities;

    rerender({ adapters: initial.map((adapter) => ({ ...adapter })) });
    expect(result.current.capabilities).toBe(first);

    rerender({ adapters: [makeAdapter({ category: 'style', weight: 0.5 })] });
    expect(result.current.capabilities).not.toBe(first);
  });

  it('aborts the request on unmount', async () => {
    let captured: AbortSignal | undefined;
    const { engine } = engineWith(
      (_modelId, _runner, signal) =>
        new Promise<ModelCapabilities>(() => {
          captured = signal;
        })
    );

    const { unmount } = renderHook(() => useModelCapabilities(engine, 'modelA', runner));
    await waitFor(() => {
      expect(captured).toBeDefined();
    });

    unmount();

    expect(captured?.aborted).toBe(true);
  });

  it('surfaces failures as an error message', async () => {
    const { engine } = engineWith(async () => {
      throw new Error('boom');
    });

    const { result } = renderHook(() => useModelCapabilities(engine, 'modelA', runner));

    await waitFor(() => {
      expect(result.current.error).toBe('Failed to load capabilities: boom');
    });
    expect(result.current.loading).toBe(false);
    expect(result.current.capabilities).toBeNull();
  });

  it('introspects again on refresh', async () => {
    const { engine, build } = engineWith(async () => makeCapabilities());

    const { result } = renderHook(() => useModelCapabilities(engine, 'modelA', runner));
    await waitFor(() => {
      expect(result.current.loading).toBe(false);
    });

    act(() => {
      result.current.refresh();
    });

    await waitFor(() => {
      expect(build).toHaveBeenCalledTimes(2);
    });
  });

  it('stays idle without a model', () => {
    const { engine, build } = engineWith(async () => makeCapabilities());

    const { result } = renderHook(() => useModelCapabilities(engine, null, runner));

    expect(result.current).toMatchObject({ capabilities: null, loading: false, error: null });
    expect(build).not.toHaveBeenCalled();
  });
});
