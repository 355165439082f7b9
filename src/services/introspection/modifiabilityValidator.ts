/**
 * Modifiability Validator
 *
 * Detects parameters the runner accepts but ignores ("locked"): two trials that
 * differ only in the target's value must not produce byte-identical text.
 *
 * This is a heuristic. Runners that are non-deterministic even at a fixed seed
 * can make a locked parameter look effective; identical output is the only
 * signal acted on, and it only ever downgrades a parameter.
 */

import { appLogger } from '../platform';
import type { SamplingOverrides, SamplingParameter } from '../../types';
import type { CapabilityDraft } from './capabilityDraft';
import { markUnsupported } from './capabilityDraft';
import { runTrial } from './trial';
import type { TrialContext } from './trial';

export interface ModifiabilityTarget {
  name: SamplingParameter;
  low: number;
  high: number;
}

export const DEFAULT_MODIFIABILITY_TARGETS: readonly ModifiabilityTarget[] = [
  { name: 'temperature', low: 0.1, high: 1.5 },
];

const VALIDATION_PROMPT = "Say 'test' and nothing else.";
const VALIDATION_OUTPUT_TOKENS = 10;

/**
 * Check each target still in the catalog; locked ones move to `unsupported`.
 *
 * Trial failures leave the parameter untouched.
 *
 * @returns Names found to be locked
 * @throws ProbeError CANCELLED when the signal fires
 */
export async function validateModifiability(
  context: TrialContext,
  draft: CapabilityDraft,
  targets: readonly ModifiabilityTarget[] = DEFAULT_MODIFIABILITY_TARGETS
): Promise<SamplingParameter[]> {
  const locked: SamplingParameter[] = [];

  for (const target of targets) {
    if (!draft.parameters[target.name]) continue;

    const trial = (value: number) => {
      const overrides: SamplingOverrides = {};
      overrides[target.name] = value;
      return runTrial(context, {
        overrides,
        prompt: VALIDATION_PROMPT,
        maxOutputTokens: VALIDATION_OUTPUT_TOKENS,
      });
    };

    const low = await trial(target.low);
    if (!low.ok) {
      appLogger.debug('introspection.modifiability', `Skipping ${target.name}: low trial failed`, {
        code: low.error.code,
      });
      continue;
    }
    const high = await trial(target.high);
    if (!high.ok) {
      appLogger.debug('introspection.modifiability', `Skipping ${target.name}: high trial failed`, {
        code: high.error.code,
      });
      continue;
    }

    if (low.text === high.text) {
      appLogger.warn('introspection.modifiability', `${target.name} appears to be locked - responses identical`, {
        low: target.low,
        high: target.high,
      });
      markUnsupported(draft, target.name);
      draft.warnings.push(`${target.name} appears to be locked by the runner; changes had no visible effect`);
      locked.push(target.name);
    }
  }

  return locked;
}
