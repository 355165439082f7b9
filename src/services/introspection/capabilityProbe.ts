/**
 * Capability Probe
 *
 * Empirically determines which sampling parameters a runner accepts for a model:
 * one baseline trial with the core parameters, then one isolated trial per
 * advanced parameter. At most one round trip per tested parameter.
 */

import { appLogger } from '../platform';
import { ProbeError } from '../runner/errors';
import type { CapabilityConfidence, ModelMetadata, ParameterCatalog, SamplingParameter } from '../../types';
import {
  ADVANCED_PARAMETER_TRIALS,
  BASELINE_TRIAL_OVERRIDES,
  coreCatalog,
  fallbackCatalog,
} from './parameterCatalog';
import { runTrial } from './trial';
import type { TrialContext } from './trial';

const BASELINE_PROMPT = 'Hi';
const ADVANCED_PROMPT = 'Test';
const PROBE_OUTPUT_TOKENS = 1;

export interface ProbeOutcome {
  parameters: ParameterCatalog;
  unsupported: Set<SamplingParameter>;
  confidence: CapabilityConfidence;
  /** Number of requests issued */
  trials: number;
  /** Why confidence is low, when it is */
  reason?: string;
}

/**
 * The outcome used when nothing could be established.
 */
export function fallbackOutcome(reason: string, trials = 0): ProbeOutcome {
  return {
    parameters: fallbackCatalog(),
    unsupported: new Set(),
    confidence: 'low',
    trials,
    reason,
  };
}

/**
 * Probe the runner.
 *
 * @throws ProbeError CANCELLED when the signal fires
 * @throws ProbeError UNREACHABLE/TIMEOUT when the runner drops out after the
 *   baseline succeeded; the partial catalog is discarded
 */
export async function probeCapabilities(
  context: TrialContext,
  metadata: ModelMetadata
): Promise<ProbeOutcome> {
  appLogger.debug('introspection.probe', 'Issuing baseline trial', {
    modelId: context.modelId,
    runner: context.runner.name,
  });

  const baseline = await runTrial(context, {
    overrides: BASELINE_TRIAL_OVERRIDES,
    prompt: BASELINE_PROMPT,
    maxOutputTokens: PROBE_OUTPUT_TOKENS,
  });

  if (!baseline.ok) {
    appLogger.warn('introspection.probe', 'Baseline trial failed - using minimal parameter set', {
      modelId: context.modelId,
      code: baseline.error.code,
      error: baseline.error.message,
    });
    return fallbackOutcome(`Baseline trial failed (${baseline.error.code}): ${baseline.error.message}`, 1);
  }

  const parameters = coreCatalog(metadata.contextLength);
  const unsupported = new Set<SamplingParameter>();
  let trials = 1;

  for (const trial of ADVANCED_PARAMETER_TRIALS) {
    const result = await runTrial(context, {
      overrides: trial.apply({}),
      prompt: ADVANCED_PROMPT,
      maxOutputTokens: PROBE_OUTPUT_TOKENS,
    });
    trials += 1;

    if (result.ok) {
      appLogger.debug('introspection.probe', `Parameter ${trial.name} supported`);
      parameters[trial.name] = trial.capability();
      continue;
    }

    if (result.error.code === 'PARAMETER_REJECTED') {
      appLogger.debug('introspection.probe', `Parameter ${trial.name} rejected by runner`, {
        error: result.error.message,
      });
      delete parameters[trial.name];
      unsupported.add(trial.name);
      continue;
    }

    // Transient: says nothing about the parameter, so stop rather than guess
    appLogger.warn('introspection.probe', `Runner dropped out while probing ${trial.name}`, {
      code: result.error.code,
      error: result.error.message,
      trials,
    });
    throw new ProbeError(
      result.error.code,
      `Runner failed while probing ${trial.name}: ${result.error.message}`,
      result.error
    );
  }

  appLogger.info('introspection.probe', 'Probe complete', {
    modelId: context.modelId,
    supported: Object.keys(parameters).length,
    unsupported: [...unsupported],
    trials,
  });

  return { parameters, unsupported, confidence: 'high', trials };
}
