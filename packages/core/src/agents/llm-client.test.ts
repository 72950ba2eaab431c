import { describe, expect, it, vi } from 'vitest';
import { OpenAICompatibleProvider, type CompletionRequest } from './llm-client';
import { CompletionTransportError } from '../errors';

const request: CompletionRequest = {
  baseURL: 'http://localhost:8000/',
  model: 'qwen3-4b',
  prompt: 'Pick a category',
  timeoutSeconds: 5,
  maxOutputTokens: 200,
};

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });
}

function completion(content: string | null) {
  return {
    id: 'chatcmpl-test',
    object: 'chat.completion',
    created: 0,
    model: 'qwen3-4b',
    choices: [{ index: 0, finish_reason: 'stop', message: { role: 'assistant', content } }],
  };
}

describe('OpenAICompatibleProvider', () => {
  it('posts one chat completion and returns the message content', async () => {
    const fakeFetch = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) =>
      jsonResponse(completion('{"category": "Tax", "confidence": 0.9}'))
    );
    const provider = new OpenAICompatibleProvider({ fetch: fakeFetch });

    await expect(provider.complete(request)).resolves.toBe('{"category": "Tax", "confidence": 0.9}');

    expect(fakeFetch).toHaveBeenCalledTimes(1);
    const [input, init] = fakeFetch.mock.calls[0];
    expect(String(input)).toBe('http://localhost:8000/chat/completions');
    const body = JSON.parse(String(init?.body));
    expect(body).toMatchObject({
      model: 'qwen3-4b',
      messages: [{ role: 'user', content: 'Pick a category' }],
      max_completion_tokens: 200,
      temperature: 0,
    });
  });

  it('turns a non-2xx status into a transport error without retrying', async () => {
    const fakeFetch = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) =>
      jsonResponse({ error: { message: 'model not loaded' } }, 503)
    );
    const provider = new OpenAICompatibleProvider({ fetch: fakeFetch });

    const failure = provider.complete(request);
    await expect(failure).rejects.toBeInstanceOf(CompletionTransportError);
    await expect(failure).rejects.toThrow(/^HTTP 503 from http:\/\/localhost:8000\/chat\/completions/);
    expect(fakeFetch).toHaveBeenCalledTimes(1);
  });

  it('turns a network failure into a transport error', async () => {
    const fakeFetch = vi.fn(async (_input: string | URL | Request, _init?: RequestInit): Promise<Response> => {
      throw new TypeError('fetch failed');
    });
    const provider = new OpenAICompatibleProvider({ fetch: fakeFetch });

    await expect(provider.complete(request)).rejects.toThrow(
      /^Network error calling http:\/\/localhost:8000\/chat\/completions/
    );
  });

  it('rejects an envelope without message content', async () => {
    const fakeFetch = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) =>
      jsonResponse(completion(null))
    );
    const provider = new OpenAICompatibleProvider({ fetch: fakeFetch });

    await expect(provider.complete(request)).rejects.toMatchObject({ code: 'transport' });
  });

  it('requires a base URL', async () => {
    const fakeFetch = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) =>
      jsonResponse(completion('unused'))
    );
    const provider = new OpenAICompatibleProvider({ fetch: fakeFetch });

    await expect(provider.complete({ ...request, baseURL: '  ' })).rejects.toThrow(/Missing LLM base URL/);
    expect(fakeFetch).not.toHaveBeenCalled();
  });
});
