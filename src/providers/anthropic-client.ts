/**
 * Anthropic Messages API client.
 *
 * Single-turn completions over fetch. No SDK: the request and response
 * shapes used here are small, and the response is validated with zod
 * rather than trusted.
 */

import { z } from 'zod';
import { ProviderError, RunCancelledError, isCancellationRelated, toError } from '../errors/index.js';
import type { LlmConfig } from '../config/schema.js';
import type { CompletionRequest, CompletionResponse, LlmClient } from './types.js';

const API_VERSION = '2023-06-01';

const MessagesResponseSchema = z.object({
  content: z.array(z.object({ type: z.string(), text: z.string().optional() })),
  stop_reason: z.string().nullable(),
  usage: z.object({
    input_tokens: z.number(),
    output_tokens: z.number(),
  }),
});

export type AnthropicClientConfig = Pick<LlmConfig, 'model' | 'baseUrl' | 'maxTokens' | 'timeoutMs'> & {
  apiKey: string;
  /** Injected for tests */
  fetch?: typeof fetch;
};

export class AnthropicClient implements LlmClient {
  readonly name = 'anthropic';
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly config: AnthropicClientConfig) {
    this.fetchImpl = config.fetch ?? fetch;
  }

  async complete(request: CompletionRequest, signal?: AbortSignal): Promise<CompletionResponse> {
    const body = {
      model: this.config.model,
      max_tokens: request.maxTokens ?? this.config.maxTokens,
      temperature: request.temperature ?? 0.2,
      ...(request.system && { system: request.system }),
      messages: [{ role: 'user', content: request.prompt }],
    };

    const timeout = AbortSignal.timeout(this.config.timeoutMs);
    const combined = signal ? AbortSignal.any([signal, timeout]) : timeout;

    let response: Response;
    try {
      response = await this.fetchImpl(`${this.config.baseUrl.replace(/\/$/, '')}/v1/messages`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'x-api-key': this.config.apiKey,
          'anthropic-version': API_VERSION,
        },
        body: JSON.stringify(body),
        signal: combined,
      });
    } catch (error) {
      const err = toError(error);
      if (signal?.aborted) {
        throw new RunCancelledError(signal.reason instanceof Error ? signal.reason.message : undefined);
      }
      if (isCancellationRelated(err) || err.name === 'TimeoutError') {
        throw ProviderError.network(this.name, new Error(`timed out after ${this.config.timeoutMs}ms`));
      }
      throw ProviderError.network(this.name, err);
    }

    if (!response.ok) {
      throw this.handleError(response.status, await response.text());
    }

    const parsed = MessagesResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw ProviderError.serverError(this.name, 502, 'malformed response body');
    }

    const data = parsed.data;
    return {
      text: data.content
        .filter((block) => block.type === 'text')
        .map((block) => block.text ?? '')
        .join(''),
      stopReason: mapStopReason(data.stop_reason),
      usage: {
        inputTokens: data.usage.input_tokens,
        outputTokens: data.usage.output_tokens,
      },
    };
  }

  private handleError(status: number, body: string): ProviderError {
    if (status === 401 || status === 403) {
      return ProviderError.authenticationFailed(this.name, status);
    }
    if (status === 429) {
      return ProviderError.rateLimited(this.name);
    }
    return ProviderError.serverError(this.name, status, body);
  }
}

function mapStopReason(reason: string | null): CompletionResponse['stopReason'] {
  switch (reason) {
    case 'end_turn':
    case 'max_tokens':
    case 'stop_sequence':
      return reason;
    default:
      return 'other';
  }
}
