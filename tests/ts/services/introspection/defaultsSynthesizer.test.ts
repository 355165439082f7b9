/**
 * Tests for recommended-default synthesis.
 */

import { describe, it, expect } from 'vitest';
import { synthesizeDefaults } from '../../../../src/services/introspection/defaultsSynthesizer';
import { defaultFamilyRegistry } from '../../../../src/services/introspection/familyProfiles';
import { extractModelMetadata } from '../../../../src/services/introspection/metadataExtractor';
import {
  ADVANCED_PARAMETER_TRIALS,
  catalogNames,
  coreCatalog,
  fallbackCatalog,
  isWithinBounds,
} from '../../../../src/services/introspection/parameterCatalog';
import type { FamilyProfile, ParameterCatalog } from '../../../../src/types';

const registry = defaultFamilyRegistry();

function fullCatalog(contextLength: number): ParameterCatalog {
  const catalog = coreCatalog(contextLength);
  for (const trial of ADVANCED_PARAMETER_TRIALS) {
    catalog[trial.name] = trial.capability();
  }
  return catalog;
}

function profile(overrides: Partial<FamilyProfile>): FamilyProfile {
  return {
    family: 'test',
    defaultTemperature: 0.7,
    defaultTopP: 0.9,
    preferred: [],
    excellent: [],
    problematic: [],
    notes: [],
    ...overrides,
  };
}

describe('synthesizeDefaults', () => {
  it('applies the family profile, the Q4 nudge and the context share', () => {
    const result = synthesizeDefaults(
      extractModelMetadata('llama-3-8b-q4_k_m-32k'),
      fullCatalog(32768),
      registry.get('llama')
    );

    expect(result.recommendedDefaults.temperature).toBeCloseTo(0.9);
    expect(result.recommendedDefaults.topP).toBe(0.9);
    expect(result.recommendedDefaults.maxTokens).toBe(2048);
    expect(result.recommendedDefaults.topK).toBe(40);
    expect(result.recommendedDefaults.mirostatMode).toBe(0);
    expect(result.parameters.mirostatMode?.note).toBe('Works excellently with llama models');
    expect(result.parameters.mirostatMode?.isRecommended).toBe(true);
    expect(result.warnings).toEqual(['Excellent Mirostat support', 'Handles higher temperatures']);
  });

  it('raises randomness for small models and flags problematic parameters', () => {
    const result = synthesizeDefaults(extractModelMetadata('qwen2-1b-f16'), fullCatalog(2048), registry.get('qwen'));

    expect(result.recommendedDefaults.temperature).toBe(0.8);
    expect(result.recommendedDefaults.topP).toBe(0.95);
    expect(result.recommendedDefaults.maxTokens).toBe(512);
    expect(result.parameters.mirostatMode).toMatchObject({
      isRecommended: false,
      note: 'Not recommended for qwen models',
    });
    expect(result.parameters.minP?.note).toBe('Works excellently with qwen models');
  });

  it('lowers randomness for large models before the Q4 nudge', () => {
    const result = synthesizeDefaults(
      extractModelMetadata('mistral-70b-q4_k_m'),
      coreCatalog(2048),
      registry.get('mistral')
    );

    expect(result.recommendedDefaults.temperature).toBeCloseTo(0.7);
    expect(result.recommendedDefaults.topP).toBe(0.85);
    expect(result.recommendedDefaults.maxTokens).toBe(512);
    expect(result.parameters.tfsZ).toBeUndefined();
  });

  it('applies no size shift when the size is unknown', () => {
    const result = synthesizeDefaults(extractModelMetadata('mystery-model'), coreCatalog(2048));

    expect(result.recommendedDefaults.temperature).toBe(0.7);
    expect(result.recommendedDefaults.topP).toBe(0.9);
    expect(result.warnings).toEqual([]);
  });

  it('caps the Q4 nudge at 1.2', () => {
    const result = synthesizeDefaults(
      extractModelMetadata('custom-8b-q4_k_m'),
      coreCatalog(2048),
      profile({ defaultTemperature: 1.15 })
    );

    expect(result.recommendedDefaults.temperature).toBe(1.2);
  });

  it('clamps every default into its range', () => {
    const result = synthesizeDefaults(
      extractModelMetadata('custom-8b'),
      fallbackCatalog(),
      profile({ defaultTemperature: 3 })
    );

    expect(result.recommendedDefaults.temperature).toBe(1.5);
    for (const name of catalogNames(result.parameters)) {
      const capability = result.parameters[name];
      const value = result.recommendedDefaults[name];
      if (capability && value !== undefined) expect(isWithinBounds(capability, value)).toBe(true);
    }
  });

  it('never introduces a parameter outside the catalog', () => {
    const result = synthesizeDefaults(
      extractModelMetadata('qwen2-1b'),
      fallbackCatalog(),
      registry.get('qwen')
    );

    expect(Object.keys(result.recommendedDefaults)).toEqual(['temperature', 'maxTokens']);
    expect(Object.keys(result.parameters)).toEqual(['temperature', 'maxTokens']);
  });

  it('does not modify the input catalog', () => {
    const catalog = fullCatalog(2048);
    synthesizeDefaults(extractModelMetadata('qwen2-1b'), catalog, registry.get('qwen'));
    expect(catalog.mirostatMode?.note).toBeUndefined();
  });
});
