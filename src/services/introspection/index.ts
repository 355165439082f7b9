export { extractModelMetadata, modelNameFromPath, sizeClassFor, isLowPrecisionQuantization } from './metadataExtractor';
export { FamilyProfileRegistry, decodeFamilyProfile, defaultFamilyRegistry, UNKNOWN_FAMILY } from './familyProfiles';
export {
  ADVANCED_PARAMETER_TRIALS,
  clampToCapability,
  coreCatalog,
  fallbackCatalog,
  isWithinBounds,
} from './parameterCatalog';
export { probeCapabilities } from './capabilityProbe';
export type { ProbeOutcome } from './capabilityProbe';
export { validateModifiability, DEFAULT_MODIFIABILITY_TARGETS } from './modifiabilityValidator';
export type { ModifiabilityTarget } from './modifiabilityValidator';
export { buildDependencies } from './dependencyGraph';
export type { DependencyGraph } from './dependencyGraph';
export { resolveEffectiveParameters } from './effectiveParameters';
export type { EffectiveParameters, TriggeredWarning } from './effectiveParameters';
export { synthesizeDefaults } from './defaultsSynthesizer';
export type { SynthesizedDefaults } from './defaultsSynthesizer';
export { applyOverlays, adapterFromRecord, parseAdapterCategory, totalAdapterWeight } from './loraOverlay';
export type { AdapterRecordResult } from './loraOverlay';
export { introspectModel, buildFallbackCapabilities } from './pipeline';
export type { IntrospectOptions } from './pipeline';
export { CapabilityCache } from './capabilityCache';
export type { CacheState, CapabilityBuilder, CapabilityCacheOptions } from './capabilityCache';
export { createIntrospectionEngine, createIntrospectionEngineFromConfig } from './engine';
export type { IntrospectionEngine, IntrospectionEngineOptions } from './engine';
