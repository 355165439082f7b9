/**
 * Introspection pipeline: one uncached build of a capability snapshot.
 *
 * metadata -> family -> probe -> modifiability -> dependencies -> defaults
 *
 * A runner that cannot be reached yields a low-confidence fallback snapshot
 * rather than an error. Only cancellation, or a failure to assemble even the
 * fallback, reaches the caller.
 */

import { appLogger } from '../platform';
import { IntrospectionError, ProbeError, throwIfAborted } from '../runner/errors';
import type { RunnerHandle } from '../runner/types';
import type { ModelCapabilities, ModelMetadata } from '../../types';
import { systemClock } from '../../utils/clock';
import type { Clock } from '../../utils/clock';
import { deepFreeze } from '../../utils/freeze';
import type { CapabilityDraft } from './capabilityDraft';
import { fallbackOutcome, probeCapabilities } from './capabilityProbe';
import type { ProbeOutcome } from './capabilityProbe';
import { synthesizeDefaults } from './defaultsSynthesizer';
import { buildDependencies } from './dependencyGraph';
import { defaultFamilyRegistry } from './familyProfiles';
import type { FamilyProfileRegistry } from './familyProfiles';
import { extractModelMetadata, modelNameFromPath } from './metadataExtractor';
import { DEFAULT_MODIFIABILITY_TARGETS, validateModifiability } from './modifiabilityValidator';
import type { ModifiabilityTarget } from './modifiabilityValidator';
import type { TrialContext } from './trial';

export interface IntrospectOptions {
  signal?: AbortSignal;
  registry?: FamilyProfileRegistry;
  clock?: Clock;
  modifiabilityTargets?: readonly ModifiabilityTarget[];
}

interface ModelIdentity {
  modelId: string;
  name: string;
  family: string;
  metadata: ModelMetadata;
}

function identify(modelId: string, registry: FamilyProfileRegistry): ModelIdentity {
  const name = modelNameFromPath(modelId);
  const metadata = extractModelMetadata(name);
  const family = registry.detectFamily(name);
  appLogger.debug('introspection.metadata', `Extracted metadata for ${name}`, { family, ...metadata });
  return { modelId, name, family, metadata };
}

async function probeOrFallback(context: TrialContext, metadata: ModelMetadata): Promise<ProbeOutcome> {
  try {
    return await probeCapabilities(context, metadata);
  } catch (error) {
    if (ProbeError.isProbeError(error) && error.isTransient) {
      return fallbackOutcome(error.message);
    }
    throw error;
  }
}

/**
 * Turn a probe outcome into a frozen snapshot. Pure apart from logging.
 */
function assemble(
  identity: ModelIdentity,
  draft: CapabilityDraft,
  registry: FamilyProfileRegistry,
  detectedAt: string,
  fallbackReason?: string
): ModelCapabilities {
  const { metadata } = identity;
  const graph = buildDependencies(metadata, draft.parameters);
  const defaults = synthesizeDefaults(metadata, graph.parameters, registry.get(identity.family));

  const warnings: string[] = [];
  if (draft.confidence === 'low') {
    warnings.push(
      fallbackReason
        ? `Capability detection failed - using minimal parameter set (${fallbackReason})`
        : 'Capability detection failed - using minimal parameter set'
    );
  }
  warnings.push(...draft.warnings, ...defaults.warnings);

  const capabilities: ModelCapabilities = {
    modelId: identity.modelId,
    family: identity.family,
    sizeClass: metadata.sizeClass,
    parameterCount: metadata.parameterCount,
    contextLength: metadata.contextLength,
    quantization: metadata.quantization,
    parameters: defaults.parameters,
    dependencies: graph.dependencies,
    recommendedDefaults: defaults.recommendedDefaults,
    unsupported: new Set(draft.unsupported),
    warnings,
    confidence: draft.confidence,
    detectedAt,
  };
  return deepFreeze(capabilities);
}

/**
 * Minimal low-confidence snapshot. Needs no runner.
 */
export function buildFallbackCapabilities(
  modelId: string,
  reason: string,
  options: Pick<IntrospectOptions, 'registry' | 'clock'> = {}
): ModelCapabilities {
  const registry = options.registry ?? defaultFamilyRegistry();
  const clock = options.clock ?? systemClock;
  const outcome = fallbackOutcome(reason);
  return assemble(
    identify(modelId, registry),
    { parameters: outcome.parameters, unsupported: outcome.unsupported, warnings: [], confidence: 'low' },
    registry,
    new Date(clock.now()).toISOString(),
    reason
  );
}

async function build(
  modelId: string,
  runner: RunnerHandle,
  registry: FamilyProfileRegistry,
  options: IntrospectOptions
): Promise<ModelCapabilities> {
  const clock = options.clock ?? systemClock;
  const identity = identify(modelId, registry);
  const context: TrialContext = { runner, modelId, signal: options.signal };

  const outcome = await probeOrFallback(context, identity.metadata);
  const draft: CapabilityDraft = {
    parameters: outcome.parameters,
    unsupported: outcome.unsupported,
    warnings: [],
    confidence: outcome.confidence,
  };

  if (draft.confidence === 'high') {
    await validateModifiability(context, draft, options.modifiabilityTargets ?? DEFAULT_MODIFIABILITY_TARGETS);
  }
  throwIfAborted(options.signal);

  return assemble(identity, draft, registry, new Date(clock.now()).toISOString(), outcome.reason);
}

/**
 * Build a fresh snapshot for a model served by a runner. Never cached here;
 * see CapabilityCache.
 *
 * @throws ProbeError CANCELLED when the signal fires
 * @throws IntrospectionError when not even the fallback snapshot can be built
 */
export async function introspectModel(
  modelId: string,
  runner: RunnerHandle,
  options: IntrospectOptions = {}
): Promise<ModelCapabilities> {
  const registry = options.registry ?? defaultFamilyRegistry();
  throwIfAborted(options.signal);

  appLogger.info('introspection', `Introspecting ${modelId}`, { runner: runner.name });

  try {
    const capabilities = await build(modelId, runner, registry, options);
    appLogger.info('introspection', `Introspection complete for ${modelId}`, {
      confidence: capabilities.confidence,
      parameters: Object.keys(capabilities.parameters).length,
      unsupported: capabilities.unsupported.size,
    });
    return capabilities;
  } catch (error) {
    if (ProbeError.hasCode(error, 'CANCELLED')) {
      appLogger.info('introspection', `Introspection cancelled for ${modelId}`);
      throw error;
    }

    const reason = error instanceof Error ? error.message : String(error);
    appLogger.error('introspection', `Introspection failed for ${modelId} - using fallback`, { error });
    try {
      return buildFallbackCapabilities(modelId, reason, { registry, clock: options.clock });
    } catch (fallbackError) {
      throw new IntrospectionError(modelId, `Could not build capabilities for ${modelId}: ${reason}`, {
        cause: fallbackError,
      });
    }
  }
}
