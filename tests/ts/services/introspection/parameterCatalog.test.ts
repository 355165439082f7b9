/**
 * Tests for the declarative parameter tables and bounds helpers.
 */

import { describe, it, expect } from 'vitest';
import {
  ADVANCED_PARAMETER_TRIALS,
  catalogNames,
  clampToCapability,
  coreCatalog,
  createCapability,
  fallbackCatalog,
  isWithinBounds,
} from '../../../../src/services/introspection/parameterCatalog';

describe('coreCatalog', () => {
  it('registers the seven core parameters', () => {
    expect(catalogNames(coreCatalog(4096))).toEqual([
      'temperature',
      'topP',
      'topK',
      'maxTokens',
      'frequencyPenalty',
      'presencePenalty',
      'seed',
    ]);
  });

  it('bounds maxTokens by the context length', () => {
    expect(coreCatalog(32768).maxTokens).toMatchObject({ min: 1, max: 32768, defaultValue: 1024 });
    expect(coreCatalog(512).maxTokens).toMatchObject({ min: 1, max: 512, defaultValue: 512 });
  });

  it('keeps every default inside its range', () => {
    for (const capability of Object.values(coreCatalog(2048))) {
      if (capability) expect(isWithinBounds(capability, capability.defaultValue)).toBe(true);
    }
  });
});

describe('fallbackCatalog', () => {
  it('contains exactly temperature and maxTokens', () => {
    const catalog = fallbackCatalog();
    expect(catalogNames(catalog)).toEqual(['temperature', 'maxTokens']);
    expect(catalog.temperature).toMatchObject({ min: 0.1, max: 1.5, defaultValue: 0.7 });
    expect(catalog.maxTokens).toMatchObject({ min: 1, max: 2048, defaultValue: 1024 });
  });
});

describe('ADVANCED_PARAMETER_TRIALS', () => {
  it('applies exactly one parameter per trial', () => {
    for (const trial of ADVANCED_PARAMETER_TRIALS) {
      expect(Object.keys(trial.apply({}))).toEqual([trial.name]);
    }
  });

  it('uses the trial values from the table', () => {
    const applied = ADVANCED_PARAMETER_TRIALS.map((trial) => trial.apply({}));
    expect(applied).toEqual([
      { minP: 0.05 },
      { typicalP: 0.95 },
      { repeatPenalty: 1.1 },
      { tfsZ: 0.95 },
      { mirostatMode: 1 },
      { mirostatTau: 5 },
      { mirostatEta: 0.1 },
    ]);
  });

  it('marks only tfsZ as experimental', () => {
    const experimental = ADVANCED_PARAMETER_TRIALS.filter((trial) => trial.capability().isExperimental);
    expect(experimental.map((trial) => trial.name)).toEqual(['tfsZ']);
  });

  it('declares mirostatMode as a three-way enumeration', () => {
    const trial = ADVANCED_PARAMETER_TRIALS.find((t) => t.name === 'mirostatMode');
    expect(trial?.capability()).toMatchObject({ type: 'enum', allowedValues: [0, 1, 2], defaultValue: 0 });
  });
});

describe('bounds helpers', () => {
  const topK = createCapability('topK', { type: 'integer', min: 1, max: 200, defaultValue: 40 });
  const mode = createCapability('mirostatMode', {
    type: 'enum',
    min: 0,
    max: 2,
    defaultValue: 0,
    allowedValues: [0, 1, 2],
  });
  const temperature = createCapability('temperature', { type: 'float', min: 0, max: 2, defaultValue: 0.7 });

  it('rejects out-of-range, fractional integer and non-member values', () => {
    expect(isWithinBounds(topK, 0)).toBe(false);
    expect(isWithinBounds(topK, 40.5)).toBe(false);
    expect(isWithinBounds(mode, 1.5)).toBe(false);
    expect(isWithinBounds(temperature, Number.NaN)).toBe(false);
    expect(isWithinBounds(temperature, 1.25)).toBe(true);
  });

  it('clamps into range, rounds integers and snaps enumerations', () => {
    expect(clampToCapability(temperature, 3)).toBe(2);
    expect(clampToCapability(temperature, -1)).toBe(0);
    expect(clampToCapability(topK, 40.6)).toBe(41);
    expect(clampToCapability(mode, 1.4)).toBe(1);
    expect(clampToCapability(mode, 9)).toBe(2);
  });
});
