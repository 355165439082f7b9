/**
 * Declarative parameter tables used by the probe.
 *
 * Each advanced parameter carries a typed closure that applies its trial value
 * to a request, so probing never assigns fields by name at runtime.
 */

import type {
  ParameterCapability,
  ParameterCatalog,
  ParameterType,
  SamplingOverrides,
  SamplingParameter,
} from '../../types';

const INT32_MAX = 2_147_483_647;

interface CapabilityDefinition {
  type: ParameterType;
  min: number;
  max: number;
  defaultValue: number;
  allowedValues?: readonly number[];
  step?: number;
  isExperimental?: boolean;
}

/**
 * Build a capability with the flags every freshly probed parameter starts with.
 */
export function createCapability(name: SamplingParameter, definition: CapabilityDefinition): ParameterCapability {
  const capability: ParameterCapability = {
    name,
    type: definition.type,
    min: definition.min,
    max: definition.max,
    defaultValue: definition.defaultValue,
    isModifiable: true,
    isRecommended: true,
    isExperimental: definition.isExperimental ?? false,
  };
  if (definition.allowedValues) capability.allowedValues = [...definition.allowedValues];
  if (definition.step !== undefined) capability.step = definition.step;
  return capability;
}

// ============================================================================
// Core parameters (baseline trial)
// ============================================================================

/**
 * Values sent with the single baseline trial.
 */
export const BASELINE_TRIAL_OVERRIDES: Readonly<SamplingOverrides> = {
  temperature: 0.7,
  topP: 0.9,
  topK: 40,
  frequencyPenalty: 0.1,
  presencePenalty: 0.1,
  seed: 12345,
};

/**
 * Catalog registered when the baseline trial succeeds.
 */
export function coreCatalog(contextLength: number): ParameterCatalog {
  return {
    temperature: createCapability('temperature', { type: 'float', min: 0, max: 2, defaultValue: 0.7, step: 0.05 }),
    topP: createCapability('topP', { type: 'float', min: 0, max: 1, defaultValue: 0.9, step: 0.01 }),
    topK: createCapability('topK', { type: 'integer', min: 1, max: 200, defaultValue: 40, step: 1 }),
    maxTokens: createCapability('maxTokens', {
      type: 'integer',
      min: 1,
      max: contextLength,
      defaultValue: Math.min(1024, contextLength),
      step: 1,
    }),
    frequencyPenalty: createCapability('frequencyPenalty', { type: 'float', min: -2, max: 2, defaultValue: 0, step: 0.05 }),
    presencePenalty: createCapability('presencePenalty', { type: 'float', min: -2, max: 2, defaultValue: 0, step: 0.05 }),
    seed: createCapability('seed', { type: 'integer', min: -1, max: INT32_MAX, defaultValue: -1, step: 1 }),
  };
}

/**
 * The two safest parameters, used whenever probing could not establish more.
 */
export function fallbackCatalog(): ParameterCatalog {
  return {
    temperature: createCapability('temperature', { type: 'float', min: 0.1, max: 1.5, defaultValue: 0.7, step: 0.05 }),
    maxTokens: createCapability('maxTokens', { type: 'integer', min: 1, max: 2048, defaultValue: 1024, step: 1 }),
  };
}

// ============================================================================
// Advanced parameters (one trial each)
// ============================================================================

export interface AdvancedParameterTrial {
  name: SamplingParameter;
  /** Apply this parameter's trial value to an otherwise empty override set. */
  apply: (overrides: SamplingOverrides) => SamplingOverrides;
  capability: () => ParameterCapability;
}

/**
 * Probed in this order, each in isolation.
 */
export const ADVANCED_PARAMETER_TRIALS: readonly AdvancedParameterTrial[] = [
  {
    name: 'minP',
    apply: (o) => ({ ...o, minP: 0.05 }),
    capability: () => createCapability('minP', { type: 'float', min: 0, max: 1, defaultValue: 0.05, step: 0.01 }),
  },
  {
    name: 'typicalP',
    apply: (o) => ({ ...o, typicalP: 0.95 }),
    capability: () => createCapability('typicalP', { type: 'float', min: 0, max: 1, defaultValue: 0.95, step: 0.01 }),
  },
  {
    name: 'repeatPenalty',
    apply: (o) => ({ ...o, repeatPenalty: 1.1 }),
    capability: () => createCapability('repeatPenalty', { type: 'float', min: 0.5, max: 2, defaultValue: 1.1, step: 0.05 }),
  },
  {
    name: 'tfsZ',
    apply: (o) => ({ ...o, tfsZ: 0.95 }),
    capability: () =>
      createCapability('tfsZ', { type: 'float', min: 0, max: 1, defaultValue: 1, step: 0.01, isExperimental: true }),
  },
  {
    name: 'mirostatMode',
    apply: (o) => ({ ...o, mirostatMode: 1 }),
    capability: () =>
      createCapability('mirostatMode', { type: 'enum', min: 0, max: 2, defaultValue: 0, allowedValues: [0, 1, 2] }),
  },
  {
    name: 'mirostatTau',
    apply: (o) => ({ ...o, mirostatTau: 5 }),
    capability: () => createCapability('mirostatTau', { type: 'float', min: 1, max: 10, defaultValue: 5, step: 0.1 }),
  },
  {
    name: 'mirostatEta',
    apply: (o) => ({ ...o, mirostatEta: 0.1 }),
    capability: () => createCapability('mirostatEta', { type: 'float', min: 0.01, max: 1, defaultValue: 0.1, step: 0.01 }),
  },
];

// ============================================================================
// Bounds
// ============================================================================

/**
 * Whether a value is legal for the capability (range, integrality, members).
 */
export function isWithinBounds(capability: ParameterCapability, value: number): boolean {
  if (!Number.isFinite(value) || value < capability.min || value > capability.max) return false;
  if (capability.allowedValues) return capability.allowedValues.includes(value);
  if (capability.type === 'boolean') return value === 0 || value === 1;
  if (capability.type === 'integer') return Number.isInteger(value);
  return true;
}

/**
 * Pull a value into the capability's legal range.
 * Integers round, enumerations snap to the nearest member.
 */
export function clampToCapability(capability: ParameterCapability, value: number): number {
  const clamped = Math.min(capability.max, Math.max(capability.min, value));

  if (capability.allowedValues && capability.allowedValues.length > 0) {
    return capability.allowedValues.reduce((best, member) =>
      Math.abs(member - clamped) < Math.abs(best - clamped) ? member : best
    );
  }
  if (capability.type === 'integer' || capability.type === 'boolean') {
    return Math.min(capability.max, Math.max(capability.min, Math.round(clamped)));
  }
  return clamped;
}

/**
 * Keys of a catalog, typed.
 */
export function catalogNames(catalog: ParameterCatalog): SamplingParameter[] {
  const names: SamplingParameter[] = [];
  for (const capability of Object.values(catalog)) {
    if (capability) names.push(capability.name);
  }
  return names;
}
