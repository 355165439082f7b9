/**
 * HTTP runner for llama-server (and other OpenAI-compatible servers).
 *
 * Sends each trial to `/v1/chat/completions` with llama.cpp sampling field
 * names. Every call is bounded by a timeout and honours caller cancellation.
 */

import { DEFAULT_PROBE_TIMEOUT_MS } from '../../config/introspection';
import { appLogger } from '../platform';
import { SAMPLING_PARAMETERS } from '../../types';
import type { SamplingParameter } from '../../types';
import { ProbeError, httpStatusToCode, mapProbeError } from './errors';
import type { RunnerHandle, RunnerRequest, RunnerResult } from './types';

/**
 * llama-server request field for each sampling parameter.
 */
export const LLAMA_SERVER_FIELDS: Readonly<Record<SamplingParameter, string>> = {
  temperature: 'temperature',
  topP: 'top_p',
  topK: 'top_k',
  maxTokens: 'max_tokens',
  frequencyPenalty: 'frequency_penalty',
  presencePenalty: 'presence_penalty',
  seed: 'seed',
  minP: 'min_p',
  typicalP: 'typical_p',
  repeatPenalty: 'repeat_penalty',
  tfsZ: 'tfs_z',
  mirostatMode: 'mirostat',
  mirostatTau: 'mirostat_tau',
  mirostatEta: 'mirostat_eta',
};

export interface LlamaServerRunnerConfig {
  /** e.g. "http://127.0.0.1:9000" */
  baseUrl: string;
  name?: string;
  /** Per-request budget in milliseconds */
  timeoutMs?: number;
  /** Bearer token for servers started with --api-key */
  apiKey?: string;
}

/**
 * Build the JSON body for a trial request.
 */
export function toChatCompletionBody(request: RunnerRequest): Record<string, unknown> {
  const body: Record<string, unknown> = {
    model: request.modelId,
    messages: request.messages,
    max_tokens: request.maxOutputTokens,
    stream: false,
  };

  for (const name of SAMPLING_PARAMETERS) {
    const value = request.parameterOverrides[name];
    if (value !== undefined) {
      body[LLAMA_SERVER_FIELDS[name]] = value;
    }
  }

  return body;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * llama-server reports errors as `{ error: { message } }`; some proxies use a bare string.
 */
function extractErrorMessage(body: unknown, fallback: string): string {
  if (!isRecord(body)) return fallback;
  const { error } = body;
  if (typeof error === 'string') return error;
  if (isRecord(error) && typeof error.message === 'string') return error.message;
  return fallback;
}

function extractContent(body: unknown): string | undefined {
  if (!isRecord(body) || !Array.isArray(body.choices)) return undefined;
  const first: unknown = body.choices[0];
  if (!isRecord(first) || !isRecord(first.message)) return undefined;
  const { content } = first.message;
  return typeof content === 'string' ? content : undefined;
}

export class LlamaServerRunner implements RunnerHandle {
  readonly name: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly apiKey?: string;

  constructor(config: LlamaServerRunnerConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.name = config.name ?? `llama-server@${this.baseUrl}`;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS;
    this.apiKey = config.apiKey;
  }

  private getHeaders(): Record<string, string> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.apiKey) {
      headers['Authorization'] = `Bearer ${this.apiKey}`;
    }
    return headers;
  }

  async submit(request: RunnerRequest, signal?: AbortSignal): Promise<RunnerResult> {
    if (signal?.aborted) {
      return { ok: false, error: new ProbeError('CANCELLED', 'Trial request was aborted', signal.reason) };
    }

    // One controller per call: fires on caller abort or on timeout
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);
    const onAbort = () => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const response = await fetch(`${this.baseUrl}/v1/chat/completions`, {
        method: 'POST',
        headers: this.getHeaders(),
        body: JSON.stringify(toChatCompletionBody(request)),
        signal: controller.signal,
      });

      const body: unknown = await response.json().catch(() => null);

      if (!response.ok) {
        const code = httpStatusToCode(response.status);
        const message = extractErrorMessage(body, response.statusText || `HTTP ${response.status}`);
        appLogger.debug('runner.http', 'Trial request failed', {
          runner: this.name,
          status: response.status,
          code,
          message,
        });
        return { ok: false, error: new ProbeError(code, message, { status: response.status }) };
      }

      const content = extractContent(body);
      if (content === undefined) {
        return {
          ok: false,
          error: new ProbeError('UNREACHABLE', 'Runner returned no message content', body),
        };
      }

      return { ok: true, text: content };
    } catch (error) {
      if (timedOut) {
        return {
          ok: false,
          error: new ProbeError('TIMEOUT', `Trial request exceeded ${this.timeoutMs}ms`, error),
        };
      }
      const mapped = mapProbeError(error);
      appLogger.debug('runner.http', 'Trial request threw', { runner: this.name, code: mapped.code });
      return { ok: false, error: mapped };
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }
  }

  /**
   * Check whether the server reports itself healthy.
   */
  async health(signal?: AbortSignal): Promise<boolean> {
    try {
      const response = await fetch(`${this.baseUrl}/health`, {
        headers: this.getHeaders(),
        signal,
      });
      return response.ok;
    } catch (error) {
      appLogger.debug('runner.http', 'Health check failed', { runner: this.name, error });
      return false;
    }
  }
}
