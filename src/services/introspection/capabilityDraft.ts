/**
 * Mutable working state of one build. Only the pipeline holds a draft;
 * consumers only ever see the frozen ModelCapabilities built from it.
 */

import type { CapabilityConfidence, ParameterCatalog, SamplingParameter } from '../../types';

export interface CapabilityDraft {
  parameters: ParameterCatalog;
  unsupported: Set<SamplingParameter>;
  warnings: string[];
  confidence: CapabilityConfidence;
}

/**
 * Move a parameter out of the catalog and into the unsupported set.
 * The two never hold the same name.
 */
export function markUnsupported(draft: CapabilityDraft, name: SamplingParameter): void {
  delete draft.parameters[name];
  draft.unsupported.add(name);
}
