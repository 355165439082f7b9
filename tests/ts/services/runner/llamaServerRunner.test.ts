/**
 * Tests for the llama-server HTTP runner.
 *
 * fetch is stubbed; no server is started.
 */

import { describe, it, expect, vi } from 'vitest';
import { LlamaServerRunner, toChatCompletionBody } from '../../../../src/services/runner/llamaServerRunner';
import type { RunnerRequest } from '../../../../src/services/runner/types';

const BASE_URL = 'http://127.0.0.1:9000';

const request: RunnerRequest = {
  modelId: 'llama-3-8b',
  messages: [{ role: 'user', content: 'Hi' }],
  parameterOverrides: { temperature: 0.7, topP: 0.9, mirostatMode: 1 },
  maxOutputTokens: 1,
};

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function stubFetch(implementation: (input: string, init?: RequestInit) => Promise<Response>) {
  const fetchMock = vi.fn(implementation);
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

describe('toChatCompletionBody', () => {
  it('translates parameter names to llama-server fields', () => {
    expect(toChatCompletionBody(request)).toEqual({
      model: 'llama-3-8b',
      messages: [{ role: 'user', content: 'Hi' }],
      max_tokens: 1,
      stream: false,
      temperature: 0.7,
      top_p: 0.9,
      mirostat: 1,
    });
  });
});

describe('LlamaServerRunner', () => {
  it('posts to the chat completions endpoint and returns the generated text', async () => {
    const fetchMock = stubFetch(async () => jsonResponse({ choices: [{ message: { content: 'Hello' } }] }));
    const runner = new LlamaServerRunner({ baseUrl: `${BASE_URL}/`, apiKey: 'test-secret' });

    const result = await runner.submit(request);

    expect(result).toEqual({ ok: true, text: 'Hello' });
    expect(runner.name).toBe(`llama-server@${BASE_URL}`);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe(`${BASE_URL}/v1/chat/completions`);
    expect(init?.method).toBe('POST');
    expect(init?.headers).toEqual({
      'Content-Type': 'application/json',
      Authorization: 'Bearer test-secret',
    });
    expect(JSON.parse(String(init?.body))).toMatchObject({ top_p: 0.9, mirostat: 1 });
  });

  it('reports a 400 as a rejected parameter with the server message', async () => {
    stubFetch(async () => jsonResponse({ error: { message: "Unknown argument 'mirostat'" } }, 400));

    const result = await new LlamaServerRunner({ baseUrl: BASE_URL }).submit(request);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('PARAMETER_REJECTED');
      expect(result.error.message).toBe("Unknown argument 'mirostat'");
    }
  });

  it('reports server errors as unreachable', async () => {
    stubFetch(async () => new Response('oops', { status: 503, statusText: 'Service Unavailable' }));

    const result = await new LlamaServerRunner({ baseUrl: BASE_URL }).submit(request);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('UNREACHABLE');
      expect(result.error.message).toBe('Service Unavailable');
    }
  });

  it('reports connection failures as unreachable', async () => {
    stubFetch(async () => {
      throw new TypeError('fetch failed');
    });

    const result = await new LlamaServerRunner({ baseUrl: BASE_URL }).submit(request);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('UNREACHABLE');
      expect(result.error.message).toBe('Runner unreachable: fetch failed');
    }
  });

  it('reports a response without content as unreachable', async () => {
    stubFetch(async () => jsonResponse({ choices: [] }));

    const result = await new LlamaServerRunner({ baseUrl: BASE_URL }).submit(request);

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.message).toBe('Runner returned no message content');
  });

  it('times out slow requests', async () => {
    vi.useFakeTimers();
    try {
      stubFetch(
        (_url, init) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener('abort', () => reject(new DOMException('aborted', 'AbortError')));
          })
      );
      const pending = new LlamaServerRunner({ baseUrl: BASE_URL, timeoutMs: 50 }).submit(request);

      await vi.advanceTimersByTimeAsync(50);
      const result = await pending;

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe('TIMEOUT');
        expect(result.error.message).toBe('Trial request exceeded 50ms');
      }
    } finally {
      vi.useRealTimers();
    }
  });

  it('reports caller aborts as cancelled', async () => {
    const controller = new AbortController();
    stubFetch(
      (_url, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(new DOMException('aborted', 'AbortError')));
        })
    );

    const pending = new LlamaServerRunner({ baseUrl: BASE_URL }).submit(request, controller.signal);
    controller.abort();
    const result = await pending;

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.code).toBe('CANCELLED');
  });

  it('does not send a request when already cancelled', async () => {
    const fetchMock = stubFetch(async () => jsonResponse({}));
    const controller = new AbortController();
    controller.abort();

    const result = await new LlamaServerRunner({ baseUrl: BASE_URL }).submit(request, controller.signal);

    expect(result.ok).toBe(false);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('checks health', async () => {
    stubFetch(async () => jsonResponse({ status: 'ok' }));
    expect(await new LlamaServerRunner({ baseUrl: BASE_URL }).health()).toBe(true);

    stubFetch(async () => {
      throw new TypeError('fetch failed');
    });
    expect(await new LlamaServerRunner({ baseUrl: BASE_URL }).health()).toBe(false);
  });
});
