/**
 * LoRA Overlay Engine
 *
 * Derives an adapter-aware view of a capability snapshot. Pure and synchronous:
 * the base snapshot is never touched, and the result is a new frozen snapshot.
 */

import { appLogger } from '../platform';
import type {
  AdapterCategory,
  AdapterOverlay,
  AdapterParameterModification,
  ModelCapabilities,
  ModificationKey,
  ParameterCatalog,
  SamplingOverrides,
  SamplingParameter,
} from '../../types';
import { deepFreeze } from '../../utils/freeze';

// ============================================================================
// Constants
// ============================================================================

export const HIGH_ADAPTER_WEIGHT = 1.0;
export const HIGH_COMBINED_ADAPTER_WEIGHT = 2.0;
export const LOW_ADAPTER_RANK = 16;
export const HIGH_ADAPTER_RANK = 64;

const CHARACTER_REPEAT_PENALTY_STEP = 0.05;
const DEFAULT_REPEAT_PENALTY = 1.1;
const MIN_REPEAT_PENALTY = 1.0;

const COMBINED_WEIGHT_TEMPERATURE_STEP = 0.1;
const MIN_TEMPERATURE = 0.1;

interface SensitivityRule {
  parameter: SamplingParameter;
  multiplier: number;
}

/**
 * Sensitivity multipliers per adapter category. Character adapters shift a
 * default instead and are handled separately.
 */
const SENSITIVITY_RULES: Record<AdapterCategory, readonly SensitivityRule[]> = {
  style: [
    { parameter: 'temperature', multiplier: 1.2 },
    { parameter: 'topP', multiplier: 0.9 },
  ],
  character: [],
  concept: [{ parameter: 'topK', multiplier: 0.8 }],
  pose: [{ parameter: 'presencePenalty', multiplier: 1.1 }],
  other: [],
};

function modificationKey(parameter: SamplingParameter, kind: AdapterParameterModification['kind']): ModificationKey {
  return `${parameter}:${kind}`;
}

// ============================================================================
// Working copy
// ============================================================================

interface OverlayDraft {
  parameters: ParameterCatalog;
  recommendedDefaults: SamplingOverrides;
  warnings: string[];
  modifications: Partial<Record<ModificationKey, AdapterParameterModification>>;
}

function annotate(draft: OverlayDraft, parameter: SamplingParameter, adapter: AdapterOverlay): void {
  const capability = draft.parameters[parameter];
  if (!capability) return;
  const suffix = `(Modified by adapter: ${adapter.name})`;
  draft.parameters[parameter] = {
    ...capability,
    note: capability.note ? `${capability.note} ${suffix}` : suffix,
  };
}

function applySensitivity(draft: OverlayDraft, rule: SensitivityRule, adapter: AdapterOverlay): void {
  if (!draft.parameters[rule.parameter]) return;

  const key = modificationKey(rule.parameter, 'sensitivity');
  const existing = draft.modifications[key];
  draft.modifications[key] = existing
    ? {
        ...existing,
        sensitivityMultiplier: (existing.sensitivityMultiplier ?? 1) * rule.multiplier,
        adapters: [...existing.adapters, adapter.name],
      }
    : {
        parameter: rule.parameter,
        kind: 'sensitivity',
        sensitivityMultiplier: rule.multiplier,
        description: 'Parameter sensitivity modified by adapter influence',
        adapters: [adapter.name],
      };
  annotate(draft, rule.parameter, adapter);
}

function applyCharacterShift(draft: OverlayDraft, adapter: AdapterOverlay): void {
  if (!draft.parameters.repeatPenalty) return;

  const current = draft.recommendedDefaults.repeatPenalty ?? DEFAULT_REPEAT_PENALTY;
  const next = Math.max(MIN_REPEAT_PENALTY, current - adapter.weight * CHARACTER_REPEAT_PENALTY_STEP);
  draft.recommendedDefaults.repeatPenalty = next;

  const key = modificationKey('repeatPenalty', 'range-shift');
  const previous = draft.modifications[key];
  draft.modifications[key] = {
    parameter: 'repeatPenalty',
    kind: 'range-shift',
    newDefault: next,
    description: `Reduced from ${current.toFixed(2)} for character consistency`,
    adapters: previous ? [...previous.adapters, adapter.name] : [adapter.name],
  };
  annotate(draft, 'repeatPenalty', adapter);
}

function adapterWarnings(adapter: AdapterOverlay): string[] {
  const warnings: string[] = [];
  if (adapter.weight > HIGH_ADAPTER_WEIGHT) {
    warnings.push(
      `Adapter '${adapter.name}' has high weight (${adapter.weight.toFixed(2)}) - consider reducing temperature`
    );
  }
  if (adapter.rank < LOW_ADAPTER_RANK) {
    warnings.push(`Adapter '${adapter.name}' has low rank (${adapter.rank}) - may have limited expressiveness`);
  } else if (adapter.rank > HIGH_ADAPTER_RANK) {
    warnings.push(`Adapter '${adapter.name}' has high rank (${adapter.rank}) - may cause overfitting`);
  }
  return warnings;
}

function foldAdapter(draft: OverlayDraft, adapter: AdapterOverlay): void {
  appLogger.debug('overlay', `Applying adapter ${adapter.name}`, {
    category: adapter.category,
    weight: adapter.weight,
  });

  if (adapter.category === 'character') {
    applyCharacterShift(draft, adapter);
  }
  for (const rule of SENSITIVITY_RULES[adapter.category]) {
    applySensitivity(draft, rule, adapter);
  }
  draft.warnings.push(...adapterWarnings(adapter));
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Sum of the weights of enabled adapters.
 */
export function totalAdapterWeight(adapters: readonly AdapterOverlay[]): number {
  return adapters.reduce((total, adapter) => (adapter.enabled ? total + adapter.weight : total), 0);
}

/**
 * Derive an adapter-aware snapshot. Disabled adapters are recorded but have no
 * effect. Applying an empty list yields a copy with no modifications added.
 */
export function applyOverlays(base: ModelCapabilities, adapters: readonly AdapterOverlay[]): ModelCapabilities {
  const enabled = adapters.filter((adapter) => adapter.enabled);

  const draft: OverlayDraft = {
    parameters: { ...base.parameters },
    recommendedDefaults: { ...base.recommendedDefaults },
    warnings: [...base.warnings],
    modifications: { ...base.adapterModifications },
  };

  for (const adapter of enabled) {
    foldAdapter(draft, adapter);
  }

  if (enabled.length > 0) {
    const total = totalAdapterWeight(adapters);
    draft.warnings.push(`Model has ${enabled.length} active adapter(s) with total weight ${total.toFixed(2)}`);

    if (total > HIGH_COMBINED_ADAPTER_WEIGHT) {
      draft.warnings.push('High combined adapter weight may cause instability or overtraining artifacts');

      const baseTemperature = draft.recommendedDefaults.temperature;
      if (baseTemperature !== undefined) {
        const adjusted = Math.max(MIN_TEMPERATURE, baseTemperature - total * COMBINED_WEIGHT_TEMPERATURE_STEP);
        draft.recommendedDefaults.temperature = adjusted;
        draft.modifications[modificationKey('temperature', 'range-shift')] = {
          parameter: 'temperature',
          kind: 'range-shift',
          newDefault: adjusted,
          description: `Reduced from ${baseTemperature.toFixed(2)} due to adapter influence`,
          adapters: enabled.map((adapter) => adapter.name),
        };
      }
    }
  }

  appLogger.debug('overlay', `Applied ${enabled.length} of ${adapters.length} adapter(s)`, {
    modelId: base.modelId,
    modifications: Object.keys(draft.modifications),
  });

  const overlaid: ModelCapabilities = {
    ...base,
    parameters: draft.parameters,
    dependencies: [...base.dependencies],
    recommendedDefaults: draft.recommendedDefaults,
    unsupported: new Set(base.unsupported),
    warnings: draft.warnings,
    appliedAdapters: adapters.map((adapter) => ({ ...adapter, targetModules: [...adapter.targetModules] })),
    adapterModifications: draft.modifications,
  };
  return deepFreeze(overlaid);
}

// ============================================================================
// Loose metadata mapping
// ============================================================================

const CATEGORY_ALIASES: Record<string, AdapterCategory> = {
  style: 'style',
  aesthetic: 'style',
  character: 'character',
  persona: 'character',
  concept: 'concept',
  subject: 'concept',
  pose: 'pose',
  composition: 'pose',
  other: 'other',
};

export const ADAPTER_DEFAULTS = {
  weight: 0.8,
  rank: 16,
  alpha: 16,
  enabled: true,
  category: 'other',
} as const satisfies Partial<AdapterOverlay>;

export interface AdapterRecordResult {
  adapter: AdapterOverlay;
  /** Fields that were absent or malformed and received a default */
  substituted: string[];
}

export function parseAdapterCategory(value: string): AdapterCategory | undefined {
  return CATEGORY_ALIASES[value.trim().toLowerCase()];
}

/**
 * Build an AdapterOverlay from loosely typed metadata (a catalog entry, a JSON
 * sidecar). Missing fields get defaults and are reported.
 */
export function adapterFromRecord(record: Record<string, unknown>, now: Date = new Date()): AdapterRecordResult {
  const substituted: string[] = [];

  const text = (key: string): string => {
    const value = record[key];
    if (typeof value === 'string') return value;
    substituted.push(key);
    return '';
  };

  const number = (key: string, fallback: number): number => {
    const value = record[key];
    if (typeof value === 'number' && Number.isFinite(value)) return value;
    substituted.push(key);
    return fallback;
  };

  const rawCategory = record.category ?? record.type;
  const parsedCategory = typeof rawCategory === 'string' ? parseAdapterCategory(rawCategory) : undefined;
  if (!parsedCategory) substituted.push('category');
  const category: AdapterCategory = parsedCategory ?? ADAPTER_DEFAULTS.category;

  let enabled: boolean = ADAPTER_DEFAULTS.enabled;
  if (typeof record.enabled === 'boolean') {
    enabled = record.enabled;
  } else {
    substituted.push('enabled');
  }

  const targetModules = Array.isArray(record.targetModules)
    ? record.targetModules.filter((module): module is string => typeof module === 'string')
    : [];
  if (!Array.isArray(record.targetModules)) substituted.push('targetModules');

  const appliedAt = typeof record.appliedAt === 'string' ? record.appliedAt : now.toISOString();

  const adapter: AdapterOverlay = {
    id: text('id'),
    name: text('name'),
    filePath: text('filePath'),
    category,
    weight: number('weight', ADAPTER_DEFAULTS.weight),
    enabled,
    rank: number('rank', ADAPTER_DEFAULTS.rank),
    alpha: number('alpha', ADAPTER_DEFAULTS.alpha),
    targetModules,
    baseModel: text('baseModel'),
    description: text('description'),
    appliedAt,
  };

  if (substituted.length > 0) {
    appLogger.debug('overlay', 'Adapter metadata incomplete - defaults substituted', {
      adapter: adapter.name || adapter.id,
      substituted,
    });
  }

  return { adapter, substituted };
}
