/**
 * Static analysis of model identifiers.
 *
 * Pure pattern matching: no I/O, no failure mode beyond falling back to
 * conservative defaults when nothing matches.
 */

import type { ModelMetadata, SizeClass } from '../../types';

export const DEFAULT_CONTEXT_LENGTH = 2048;
export const UNKNOWN_QUANTIZATION = 'Unknown';

const BILLION = 1_000_000_000;

/** Checked in order; the first token contained in the identifier wins. */
const CONTEXT_TOKENS: ReadonlyArray<readonly [token: string, length: number]> = [
  ['32k', 32_768],
  ['16k', 16_384],
  ['8k', 8_192],
  ['4k', 4_096],
];

const QUANTIZATION_TAGS = ['q4_k_m', 'q5_k_m', 'q8_0', 'f16', 'f32'] as const;

/** Model file extensions stripped from identifiers; any other dot is part of the name. */
const MODEL_FILE_EXTENSION = /\.(gguf|ggml|bin|safetensors)$/i;

/**
 * Size class thresholds, in billions of parameters.
 */
export function sizeClassFor(billions: number): SizeClass {
  if (billions < 1) return 'basic';
  if (billions < 7) return 'standard';
  if (billions < 30) return 'advanced';
  return 'experimental';
}

/**
 * Model identity from a path or file name: the base name without its model
 * file extension. Version dots such as `llama-3.1` are kept.
 *
 * @example
 * modelNameFromPath('/models/Qwen2.5-7B-Q4_K_M.gguf') // 'Qwen2.5-7B-Q4_K_M'
 */
export function modelNameFromPath(modelPath: string): string {
  const base = modelPath.split(/[\\/]/).pop() ?? modelPath;
  const name = base.replace(MODEL_FILE_EXTENSION, '');
  return name === '' ? base : name;
}

/**
 * Parse a model identifier into structural facts.
 *
 * @example
 * extractModelMetadata('llama-3-8b-q4_k_m-32k')
 * // { parameterCount: 8e9, sizeClass: 'advanced', contextLength: 32768, quantization: 'Q4_K_M' }
 */
export function extractModelMetadata(modelId: string): ModelMetadata {
  const name = modelId.toLowerCase();

  let parameterCount = 0;
  let sizeClass: SizeClass = 'unknown';
  const sizeMatch = /(\d+)b/.exec(name);
  if (sizeMatch) {
    const billions = Number.parseInt(sizeMatch[1], 10);
    parameterCount = billions * BILLION;
    sizeClass = sizeClassFor(billions);
  }

  const contextLength =
    CONTEXT_TOKENS.find(([token]) => name.includes(token))?.[1] ?? DEFAULT_CONTEXT_LENGTH;

  const quantTag = QUANTIZATION_TAGS.find((tag) => name.includes(tag));
  const quantization = quantTag ? quantTag.toUpperCase() : UNKNOWN_QUANTIZATION;

  return { parameterCount, sizeClass, contextLength, quantization };
}

/**
 * Quantizations at the lowest precision the engine recognises.
 */
export function isLowPrecisionQuantization(quantization: string): boolean {
  return quantization.toUpperCase().startsWith('Q4');
}
