/**
 * Evaluates a snapshot's dependency rules against live parameter values to
 * produce the view a UI should render. Hidden parameters stay in the snapshot's
 * catalog; they are only left out of this view.
 */

import type {
  ComparisonOperator,
  ModelCapabilities,
  ParameterCapability,
  ParameterDependency,
  SamplingOverrides,
  SamplingParameter,
} from '../../types';
import { catalogNames } from './parameterCatalog';

export interface TriggeredWarning {
  parameter: SamplingParameter;
  message: string;
  rule: ParameterDependency;
}

export interface EffectiveParameters {
  /** Catalog entries to display, in catalog order */
  visible: ParameterCapability[];
  hidden: SamplingParameter[];
  warnings: TriggeredWarning[];
  /** Current values after forced rules were applied */
  values: SamplingOverrides;
}

export function compare(operator: ComparisonOperator, value: number, threshold: number): boolean {
  switch (operator) {
    case 'eq':
      return value === threshold;
    case 'neq':
      return value !== threshold;
    case 'gt':
      return value > threshold;
    case 'lt':
      return value < threshold;
    case 'gte':
      return value >= threshold;
    case 'lte':
      return value <= threshold;
  }
}

/**
 * Value a rule sees for its trigger: the live value, then the recommended
 * default, then the catalog default.
 */
function currentValue(
  capabilities: ModelCapabilities,
  values: SamplingOverrides,
  name: SamplingParameter
): number | undefined {
  return values[name] ?? capabilities.recommendedDefaults[name] ?? capabilities.parameters[name]?.defaultValue;
}

/**
 * Apply dependency rules in order. Forced values feed later rules.
 */
export function resolveEffectiveParameters(
  capabilities: ModelCapabilities,
  values: SamplingOverrides = {}
): EffectiveParameters {
  const resolved: SamplingOverrides = { ...values };
  const hidden = new Set<SamplingParameter>();
  const warnings: TriggeredWarning[] = [];

  for (const rule of capabilities.dependencies) {
    const value = currentValue(capabilities, resolved, rule.trigger);
    if (value === undefined || !compare(rule.condition, value, rule.threshold)) continue;

    switch (rule.action) {
      case 'hide':
        hidden.add(rule.affected);
        break;
      case 'warn':
        if (rule.warning) {
          warnings.push({ parameter: rule.affected, message: rule.warning, rule });
        }
        break;
      case 'force':
        if (rule.forcedValue !== undefined) {
          resolved[rule.affected] = rule.forcedValue;
        }
        break;
    }
  }

  const visible: ParameterCapability[] = [];
  for (const name of catalogNames(capabilities.parameters)) {
    const capability = capabilities.parameters[name];
    if (capability && !hidden.has(name)) visible.push(capability);
  }

  return { visible, hidden: [...hidden], warnings, values: resolved };
}
