/**
 * Model-backed code generator: one completion per agent, answered with a
 * Python script in a fenced block.
 */

import type { CodeGenerator, GeneratedCode, GenerationRequest } from '../orchestration/agent-runner.js';
import type { LlmClient } from '../../providers/types.js';
import { createComponentLogger } from '../utilities/logger.js';
import { CODEGEN_SYSTEM_PROMPT, buildCodegenPrompt } from './prompts.js';

const log = createComponentLogger('CodeGenerator');

const FENCE_PATTERN = /```([a-zA-Z0-9_+-]*)[^\S\n]*\n([\s\S]*?)```/g;
const PYTHON_TAGS = new Set(['python', 'py', 'python3']);

export interface LlmCodeGeneratorOptions {
  maxTokens?: number;
}

export class LlmCodeGenerator implements CodeGenerator {
  private readonly maxTokens: number;

  constructor(
    private readonly client: LlmClient,
    options: LlmCodeGeneratorOptions = {},
  ) {
    this.maxTokens = options.maxTokens ?? 4096;
  }

  async generate(request: GenerationRequest, signal?: AbortSignal): Promise<GeneratedCode> {
    const response = await this.client.complete(
      {
        system: CODEGEN_SYSTEM_PROMPT,
        prompt: buildCodegenPrompt(request.agent, request.summary, request.question),
        maxTokens: this.maxTokens,
      },
      signal,
    );

    if (response.stopReason === 'max_tokens') {
      log.warn('Generation hit the token limit', { agent: request.agent.id });
    }

    const code = extractPythonCode(response.text);
    if (code === null) {
      throw new Error(`no python code block in response for ${request.agent.id}`);
    }
    return { language: 'python', code };
  }
}

/**
 * First python-tagged fenced block, else the first untagged one, else a
 * `{"code": ...}` JSON object. Null when none hold any code.
 */
export function extractPythonCode(text: string): string | null {
  let untagged: string | null = null;
  for (const match of text.matchAll(FENCE_PATTERN)) {
    const tag = (match[1] ?? '').toLowerCase();
    const body = (match[2] ?? '').trim();
    if (!body) continue;
    if (PYTHON_TAGS.has(tag)) return body;
    if (tag === '' && untagged === null) untagged = body;
  }
  if (untagged !== null) return untagged;

  return codeFromJson(text);
}

function codeFromJson(text: string): string | null {
  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start === -1 || end <= start) return null;

  let value: unknown;
  try {
    value = JSON.parse(text.slice(start, end + 1));
  } catch {
    return null;
  }
  if (typeof value === 'object' && value !== null && 'code' in value && typeof value.code === 'string') {
    const code = value.code.trim();
    return code || null;
  }
  return null;
}
