/**
 * Runner contract.
 *
 * A runner is the external process actually serving the model. The engine
 * treats it as an opaque request/response collaborator; retries, if any,
 * belong to the runner implementation.
 */

import type { SamplingOverrides } from '../../types';
import type { ProbeError } from './errors';

export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

/**
 * A single trial generation request.
 */
export interface RunnerRequest {
  modelId: string;
  messages: ChatMessage[];
  parameterOverrides: SamplingOverrides;
  maxOutputTokens: number;
}

export type RunnerResult =
  | { ok: true; text: string }
  | { ok: false; error: ProbeError };

/**
 * Handle to a runner serving one or more models.
 */
export interface RunnerHandle {
  /** Display name used in logs */
  readonly name: string;

  /**
   * Submit one generation request.
   *
   * Implementations report failures through the result; a thrown value is
   * mapped with mapProbeError by the caller.
   *
   * @param signal - Caller cancellation; must abort the in-flight request
   */
  submit(request: RunnerRequest, signal?: AbortSignal): Promise<RunnerResult>;
}
