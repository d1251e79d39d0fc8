/**
 * Model client types.
 *
 * The planner and the code generator each need one thing from a language
 * model: a single-turn completion. Everything provider-specific stays behind
 * this interface.
 */

export interface CompletionRequest {
  system?: string;
  prompt: string;
  maxTokens?: number;
  temperature?: number;
}

export interface CompletionUsage {
  inputTokens: number;
  outputTokens: number;
}

export interface CompletionResponse {
  text: string;
  stopReason: 'end_turn' | 'max_tokens' | 'stop_sequence' | 'other';
  usage: CompletionUsage;
}

export interface LlmClient {
  readonly name: string;
  complete(request: CompletionRequest, signal?: AbortSignal): Promise<CompletionResponse>;
}
