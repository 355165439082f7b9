/**
 * Single trial request against a runner.
 */

import { mapProbeError, throwIfAborted } from '../runner/errors';
import type { ChatMessage, RunnerHandle, RunnerResult } from '../runner/types';
import type { SamplingOverrides } from '../../types';

export interface TrialContext {
  runner: RunnerHandle;
  modelId: string;
  signal?: AbortSignal;
}

export interface TrialOptions {
  overrides: SamplingOverrides;
  prompt: string;
  maxOutputTokens: number;
}

/**
 * Submit exactly one request. Never retries.
 *
 * Thrown runner errors are folded into the result; cancellation is the only
 * outcome that escapes as an exception.
 *
 * @throws ProbeError with code CANCELLED
 */
export async function runTrial(context: TrialContext, options: TrialOptions): Promise<RunnerResult> {
  throwIfAborted(context.signal);

  const messages: ChatMessage[] = [{ role: 'user', content: options.prompt }];
  let result: RunnerResult;
  try {
    result = await context.runner.submit(
      {
        modelId: context.modelId,
        messages,
        parameterOverrides: options.overrides,
        maxOutputTokens: options.maxOutputTokens,
      },
      context.signal
    );
  } catch (error) {
    result = { ok: false, error: mapProbeError(error) };
  }

  if (!result.ok && result.error.code === 'CANCELLED') {
    throw result.error;
  }
  // A runner that ignores the signal must not let a cancelled build continue
  throwIfAborted(context.signal);
  return result;
}
