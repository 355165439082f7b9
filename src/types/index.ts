// ============================================================================
// Sampling Parameters
// ============================================================================

/**
 * Every sampling parameter the engine knows how to probe.
 * Names follow the camelCase vocabulary used throughout the library; runners
 * translate them to their own wire names.
 */
export const SAMPLING_PARAMETERS = [
  'temperature',
  'topP',
  'topK',
  'maxTokens',
  'frequencyPenalty',
  'presencePenalty',
  'seed',
  'minP',
  'typicalP',
  'repeatPenalty',
  'tfsZ',
  'mirostatMode',
  'mirostatTau',
  'mirostatEta',
] as const;

export type SamplingParameter = (typeof SAMPLING_PARAMETERS)[number];

const SAMPLING_PARAMETER_SET: ReadonlySet<string> = new Set(SAMPLING_PARAMETERS);

export function isSamplingParameter(value: string): value is SamplingParameter {
  return SAMPLING_PARAMETER_SET.has(value);
}

/**
 * Partial set of parameter values sent with a request.
 * Booleans are encoded as 0/1 and enumerations as their numeric members.
 */
export type SamplingOverrides = Partial<Record<SamplingParameter, number>>;

export type ParameterType = 'float' | 'integer' | 'boolean' | 'enum';

/**
 * What can actually be done with one parameter on one model.
 */
export interface ParameterCapability {
  name: SamplingParameter;
  type: ParameterType;
  min: number;
  max: number;
  /** Explicit member list for enumerations. */
  allowedValues?: readonly number[];
  defaultValue: number;
  /** Slider granularity hint for consumers. */
  step?: number;
  isModifiable: boolean;
  isRecommended: boolean;
  isExperimental: boolean;
  /** Model-specific remark, e.g. "Not recommended for qwen models". */
  note?: string;
}

export type ParameterCatalog = Partial<Record<SamplingParameter, ParameterCapability>>;

// ============================================================================
// Dependencies
// ============================================================================

export type ComparisonOperator = 'eq' | 'neq' | 'gt' | 'lt' | 'gte' | 'lte';

export type DependencyAction = 'hide' | 'warn' | 'force';

/**
 * "When <trigger> <condition> <threshold>, do <action> to <affected>."
 */
export interface ParameterDependency {
  trigger: SamplingParameter;
  condition: ComparisonOperator;
  threshold: number;
  affected: SamplingParameter;
  action: DependencyAction;
  warning?: string;
  /** Only meaningful for the `force` action. */
  forcedValue?: number;
}

// ============================================================================
// Model Metadata
// ============================================================================

export type SizeClass = 'unknown' | 'basic' | 'standard' | 'advanced' | 'experimental';

export type CapabilityConfidence = 'high' | 'low';

/**
 * Structural facts read from a model identifier.
 */
export interface ModelMetadata {
  /** Estimated parameter count (0 when the identifier carries no size token). */
  parameterCount: number;
  sizeClass: SizeClass;
  contextLength: number;
  /** Upper-cased quantization tag, or "Unknown". */
  quantization: string;
}

// ============================================================================
// Family Profiles
// ============================================================================

export interface FamilyProfile {
  family: string;
  defaultTemperature: number;
  defaultTopP: number;
  preferred: readonly string[];
  excellent: readonly string[];
  problematic: readonly string[];
  notes: readonly string[];
}

// ============================================================================
// Adapters
// ============================================================================

export type AdapterCategory = 'style' | 'character' | 'concept' | 'pose' | 'other';

/**
 * A LoRA-style adapter applied on top of a base model.
 * Created by the caller; the engine only reads it.
 */
export interface AdapterOverlay {
  id: string;
  name: string;
  filePath: string;
  category: AdapterCategory;
  /** Typically 0 - 2. */
  weight: number;
  enabled: boolean;
  rank: number;
  alpha: number;
  targetModules: readonly string[];
  /** Base model the adapter was trained against. */
  baseModel: string;
  description: string;
  /** ISO timestamp */
  appliedAt: string;
}

export type ModificationKind = 'range-shift' | 'sensitivity';

export type ModificationKey = `${SamplingParameter}:${ModificationKind}`;

export interface AdapterParameterModification {
  parameter: SamplingParameter;
  kind: ModificationKind;
  /** Set for range shifts. */
  newDefault?: number;
  /** Set for sensitivity modifications; composes multiplicatively. */
  sensitivityMultiplier?: number;
  description: string;
  /** Contributing adapter names in application order. */
  adapters: readonly string[];
}

// ============================================================================
// Capability Snapshot
// ============================================================================

/**
 * Everything the engine learned about one model served by one runner.
 * Snapshots are frozen once built; overlays derive new ones.
 */
export interface ModelCapabilities {
  modelId: string;
  family: string;
  sizeClass: SizeClass;
  parameterCount: number;
  contextLength: number;
  quantization: string;
  parameters: ParameterCatalog;
  dependencies: readonly ParameterDependency[];
  recommendedDefaults: SamplingOverrides;
  unsupported: ReadonlySet<SamplingParameter>;
  warnings: readonly string[];
  confidence: CapabilityConfidence;
  /** ISO timestamp */
  detectedAt: string;
  appliedAdapters?: readonly AdapterOverlay[];
  adapterModifications?: Partial<Record<ModificationKey, AdapterParameterModification>>;
}
