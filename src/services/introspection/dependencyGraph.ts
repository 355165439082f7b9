/**
 * Dependency Graph Builder
 *
 * Derives parameter interdependencies structurally from the finished catalog
 * and the model's metadata. Rules are data; they are evaluated against live
 * values by resolveEffectiveParameters, never here.
 */

import { appLogger } from '../platform';
import type { ModelMetadata, ParameterCatalog, ParameterDependency } from '../../types';
import { isLowPrecisionQuantization } from './metadataExtractor';

export const SMALL_MODEL_THRESHOLD = 7_000_000_000;

export const HIGH_TEMPERATURE_THRESHOLD = 1.2;

export interface DependencyGraph {
  dependencies: ParameterDependency[];
  /** Catalog with recommendation flags adjusted; the input is not modified */
  parameters: ParameterCatalog;
}

export function buildDependencies(metadata: ModelMetadata, catalog: ParameterCatalog): DependencyGraph {
  const dependencies: ParameterDependency[] = [];
  const parameters: ParameterCatalog = { ...catalog };

  // Mirostat takes over sampling entirely
  if (parameters.mirostatMode && parameters.temperature) {
    dependencies.push({
      trigger: 'mirostatMode',
      condition: 'gt',
      threshold: 0,
      affected: 'temperature',
      action: 'hide',
      warning: 'Temperature is ignored when Mirostat is enabled',
    });
  }

  if (parameters.temperature && isLowPrecisionQuantization(metadata.quantization)) {
    dependencies.push({
      trigger: 'temperature',
      condition: 'gt',
      threshold: HIGH_TEMPERATURE_THRESHOLD,
      affected: 'temperature',
      action: 'warn',
      warning: 'High temperature may cause instability with Q4 quantization',
    });
  }

  if (metadata.parameterCount < SMALL_MODEL_THRESHOLD) {
    for (const capability of Object.values(parameters)) {
      if (!capability?.isExperimental) continue;
      parameters[capability.name] = {
        ...capability,
        isRecommended: false,
        note: 'May not be effective on smaller models',
      };
    }
  }

  appLogger.debug('introspection.dependencies', `Built ${dependencies.length} parameter dependencies`, {
    rules: dependencies.map((d) => `${d.trigger} ${d.condition} ${d.threshold} -> ${d.action} ${d.affected}`),
  });

  return { dependencies, parameters };
}
