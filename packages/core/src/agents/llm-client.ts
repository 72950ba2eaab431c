import OpenAI from 'openai';
import { CompletionTransportError, errorMessage } from '../errors';
import { LLM_DEFAULT_MODEL } from '../planner/constants';

export type CompletionRequest = {
  /** Server root; `/chat/completions` is appended by the SDK. */
  baseURL: string;
  model?: string;
  prompt: string;
  timeoutSeconds: number;
  maxOutputTokens: number;
};

/**
 * Prompt in, free-form text out. Transport problems (network, non-2xx, timeout,
 * an envelope without message content) reject with CompletionTransportError.
 */
export interface CompletionProvider {
  readonly name: string;
  complete(request: CompletionRequest): Promise<string>;
}

export type OpenAICompatibleProviderConfig = {
  apiKey?: string;
  /** Label used in audit reasons, e.g. `llm:local/qwen3-4b`. */
  name?: string;
  /** Replaces the global fetch, mainly for tests. */
  fetch?: typeof fetch;
};

/**
 * Chat-completions client for any OpenAI-compatible server, local ones included.
 *
 * Retries are disabled: one call per document, bounded by the request timeout.
 */
export class OpenAICompatibleProvider implements CompletionProvider {
  readonly name: string;
  private apiKey: string;
  private fetchImpl: typeof fetch | undefined;
  private clients = new Map<string, OpenAI>();

  constructor(config: OpenAICompatibleProviderConfig = {}) {
    this.name = config.name ?? 'local';
    // Local servers ignore the key but the SDK insists on one
    this.apiKey = config.apiKey?.trim() || 'local';
    this.fetchImpl = config.fetch;
  }

  private clientFor(baseURL: string, timeoutSeconds: number): OpenAI {
    const key = `${baseURL}|${timeoutSeconds}`;
    let client = this.clients.get(key);
    if (!client) {
      client = new OpenAI({
        baseURL,
        apiKey: this.apiKey,
        timeout: Math.round(timeoutSeconds * 1000),
        maxRetries: 0,
        fetch: this.fetchImpl,
      });
      this.clients.set(key, client);
    }
    return client;
  }

  async complete(request: CompletionRequest): Promise<string> {
    const baseURL = request.baseURL.trim().replace(/\/+$/, '');
    if (!baseURL) {
      throw new CompletionTransportError('Missing LLM base URL (e.g. http://localhost:8000)');
    }

    const url = `${baseURL}/chat/completions`;
    const model = request.model?.trim() || LLM_DEFAULT_MODEL;

    const response = await this.clientFor(baseURL, request.timeoutSeconds)
      .chat.completions.create({
        model,
        messages: [{ role: 'user', content: request.prompt }],
        max_completion_tokens: request.maxOutputTokens,
        temperature: 0,
      })
      .catch((error: unknown) => {
        throw toTransportError(error, url);
      });

    const content = Array.isArray(response.choices) ? response.choices[0]?.message?.content : undefined;
    if (typeof content !== 'string') {
      console.warn(`[LLMClient] No message content in response from ${url}`);
      throw new CompletionTransportError(`Unexpected response shape from ${url}: no message content`, { url });
    }

    return content;
  }
}

function toTransportError(error: unknown, url: string): CompletionTransportError {
  if (error instanceof OpenAI.APIError && error.status !== undefined) {
    return new CompletionTransportError(`HTTP ${error.status} from ${url}: ${error.message}`, {
      url,
      status: error.status,
    });
  }
  return new CompletionTransportError(`Network error calling ${url}: ${errorMessage(error)}`, { url, cause: error });
}
