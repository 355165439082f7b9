/**
 * Defaults Synthesizer
 *
 * Computes recommended defaults that beat the catalog's generic ones, using the
 * model's size and quantization and, when one exists, its family profile.
 * Every result is clamped into its parameter's range, and no parameter outside
 * the catalog is ever introduced.
 */

import { appLogger } from '../platform';
import type {
  FamilyProfile,
  ModelMetadata,
  ParameterCatalog,
  SamplingOverrides,
  SamplingParameter,
} from '../../types';
import { isSamplingParameter } from '../../types';
import { isLowPrecisionQuantization } from './metadataExtractor';
import { catalogNames, clampToCapability } from './parameterCatalog';

const LARGE_MODEL_THRESHOLD = 30_000_000_000;
const SMALL_MODEL_THRESHOLD = 3_000_000_000;

const LOW_PRECISION_TEMPERATURE_NUDGE = 0.1;
const LOW_PRECISION_TEMPERATURE_CAP = 1.2;

/** Share of the context window suggested for output */
const MAX_TOKENS_CONTEXT_SHARE = 0.25;
const MAX_TOKENS_CEILING = 2048;

export interface SynthesizedDefaults {
  recommendedDefaults: SamplingOverrides;
  /** Catalog with family notes and recommendation flags applied */
  parameters: ParameterCatalog;
  /** Family-specific behaviour notes */
  warnings: string[];
}

function profileParameters(names: readonly string[]): SamplingParameter[] {
  return names.filter(isSamplingParameter);
}

export function synthesizeDefaults(
  metadata: ModelMetadata,
  catalog: ParameterCatalog,
  profile?: FamilyProfile
): SynthesizedDefaults {
  const parameters: ParameterCatalog = { ...catalog };
  const defaults: SamplingOverrides = {};
  const warnings: string[] = [];

  for (const name of catalogNames(parameters)) {
    defaults[name] = parameters[name]?.defaultValue;
  }

  // Only ever touches parameters already present
  const setDefault = (name: SamplingParameter, value: number) => {
    if (parameters[name]) defaults[name] = value;
  };

  if (profile) {
    appLogger.debug('introspection.defaults', `Applying ${profile.family} family profile`);
    setDefault('temperature', profile.defaultTemperature);
    setDefault('topP', profile.defaultTopP);

    for (const name of profileParameters(profile.problematic)) {
      const capability = parameters[name];
      if (!capability) continue;
      parameters[name] = {
        ...capability,
        isRecommended: false,
        note: `Not recommended for ${profile.family} models`,
      };
    }

    for (const name of profileParameters(profile.excellent)) {
      const capability = parameters[name];
      if (!capability) continue;
      parameters[name] = { ...capability, note: `Works excellently with ${profile.family} models` };
    }

    warnings.push(...profile.notes);
  }

  if (metadata.parameterCount > LARGE_MODEL_THRESHOLD) {
    setDefault('temperature', 0.6);
    setDefault('topP', 0.85);
  } else if (metadata.parameterCount > 0 && metadata.parameterCount < SMALL_MODEL_THRESHOLD) {
    setDefault('temperature', 0.8);
    setDefault('topP', 0.95);
  }

  // Lower precision needs slightly more randomness for diversity
  const temperature = defaults.temperature;
  if (temperature !== undefined && isLowPrecisionQuantization(metadata.quantization)) {
    setDefault(
      'temperature',
      Math.min(temperature + LOW_PRECISION_TEMPERATURE_NUDGE, LOW_PRECISION_TEMPERATURE_CAP)
    );
  }

  setDefault(
    'maxTokens',
    Math.min(Math.floor(metadata.contextLength * MAX_TOKENS_CONTEXT_SHARE), MAX_TOKENS_CEILING)
  );

  const recommendedDefaults: SamplingOverrides = {};
  for (const name of catalogNames(parameters)) {
    const capability = parameters[name];
    const value = defaults[name];
    if (capability && value !== undefined) {
      recommendedDefaults[name] = clampToCapability(capability, value);
    }
  }

  appLogger.debug('introspection.defaults', `Generated ${Object.keys(recommendedDefaults).length} model-optimized defaults`, {
    recommendedDefaults,
  });

  return { recommendedDefaults, parameters, warnings };
}
