/**
 * Agent Runner
 *
 * One agent, one attempt: ask the code generator for a script, run it in the
 * sandbox, turn its stdout into a payload. Everything the call needs arrives
 * in the context argument; the runner keeps no per-call state on itself, so
 * concurrent runs cannot see each other's datasets or tokens.
 *
 * `run()` never throws. Every failure, whichever stage it comes from, is
 * folded into one `{ category, message }` detail. There is no retry.
 */

import { AgentFailure, toError } from '../../errors/index.js';
import type { CancellationToken } from '../cancellation.js';
import { createLinkedToken, race, toAbortSignal } from '../cancellation.js';
import type { SandboxExecutor } from '../sandbox/process-sandbox.js';
import { createComponentLogger } from '../utilities/logger.js';
import { payloadFromOutput } from './payload.js';
import type { AgentDescriptor, AgentErrorDetail, AgentResult, DatasetRef, DatasetSummary } from './types.js';

const log = createComponentLogger('AgentRunner');

// =============================================================================
// COLLABORATORS
// =============================================================================

export interface GenerationRequest {
  agent: AgentDescriptor;
  question: string;
  summary: DatasetSummary;
}

export interface GeneratedCode {
  language: string;
  code: string;
}

/**
 * External code-generation service.
 */
export interface CodeGenerator {
  generate(request: GenerationRequest, signal?: AbortSignal): Promise<GeneratedCode>;
}

export interface AgentRunContext {
  runId: string;
  agent: AgentDescriptor;
  dataset: DatasetRef;
  question: string;
  summary: DatasetSummary;
  /** Run-level token; cancelling it stops this agent */
  token: CancellationToken;
  /** Budget for generation and execution together */
  timeoutMs: number;
}

type Stage = 'generation' | 'execution';

const STDERR_TAIL_CHARS = 2000;

// =============================================================================
// RUNNER
// =============================================================================

export class AgentRunner {
  constructor(
    private readonly generator: CodeGenerator,
    private readonly sandbox: SandboxExecutor,
  ) {}

  async run(ctx: AgentRunContext): Promise<AgentResult> {
    const startedAt = Date.now();
    const deadline = startedAt + ctx.timeoutMs;
    const agentId = ctx.agent.id;

    const cts = createLinkedToken(ctx.token).cancelAfter(ctx.timeoutMs, `Agent ${agentId} exceeded ${ctx.timeoutMs}ms`);
    const signal = toAbortSignal(cts.token);
    let stage: Stage = 'generation';

    try {
      const generated = await race(
        this.generator.generate({ agent: ctx.agent, question: ctx.question, summary: ctx.summary }, signal),
        cts.token,
      );
      if (!generated.code.trim()) {
        throw AgentFailure.generation(agentId, new Error('generator returned no code'));
      }

      stage = 'execution';
      const result = await race(
        this.sandbox.execute(
          {
            code: generated.code,
            language: generated.language,
            datasetPath: ctx.dataset.path,
            timeoutMs: Math.max(1, deadline - Date.now()),
          },
          signal,
        ),
        cts.token,
      );

      if (result.timedOut) {
        throw AgentFailure.timeout(agentId, ctx.timeoutMs, 'execution');
      }
      if (result.error !== undefined || result.exitCode !== 0) {
        const detail = result.error ?? tail(result.stderr) ?? `exit code ${result.exitCode}`;
        throw AgentFailure.execution(agentId, `Script failed: ${detail}`, { exitCode: result.exitCode });
      }
      if (!result.stdout.trim()) {
        throw AgentFailure.execution(agentId, 'Script produced no output');
      }

      return { ok: true, payload: payloadFromOutput(result.stdout), durationMs: Date.now() - startedAt };
    } catch (err) {
      const error = this.classify(err, stage, ctx, cts.timedOut);
      log.debug('Agent failed', { runId: ctx.runId, agent: agentId, stage, category: error.category });
      return { ok: false, error, durationMs: Date.now() - startedAt };
    } finally {
      cts.dispose();
    }
  }

  private classify(err: unknown, stage: Stage, ctx: AgentRunContext, timedOut: boolean): AgentErrorDetail {
    const agentId = ctx.agent.id;
    let failure: AgentFailure;

    if (err instanceof AgentFailure) {
      failure = err;
    } else if (timedOut) {
      failure = AgentFailure.timeout(agentId, ctx.timeoutMs, stage);
    } else if (ctx.token.isCancellationRequested) {
      failure = AgentFailure.cancelled(agentId, ctx.token.cancellationReason);
    } else if (stage === 'generation') {
      failure = AgentFailure.generation(agentId, toError(err));
    } else {
      failure = AgentFailure.execution(agentId, `Sandbox error: ${toError(err).message}`);
    }

    return { category: failure.failureCategory, message: failure.message };
  }
}

function tail(text: string): string | undefined {
  const trimmed = text.trim();
  if (!trimmed) return undefined;
  return trimmed.length > STDERR_TAIL_CHARS ? `...${trimmed.slice(-STDERR_TAIL_CHARS)}` : trimmed;
}
