/**
 * Deterministic stand-ins for the model and the interpreter.
 *
 * Selected with `llm.provider = "mock"`, so the whole pipeline can be
 * exercised without an API key or Python. The generated "script" only
 * names its agent; the mock sandbox reads that name back and prints a
 * canned payload for it.
 */

import { RunCancelledError } from '../../errors/index.js';
import type { CodeGenerator, GeneratedCode, GenerationRequest } from '../orchestration/agent-runner.js';
import type { ExecRequest, ExecResult, SandboxExecutor } from '../sandbox/process-sandbox.js';

const AGENT_MARKER = '# mock-agent: ';

export interface MockBehaviour {
  /** Agents whose generation throws */
  failGeneration?: readonly string[];
  /** Agents whose script exits non-zero */
  failExecution?: readonly string[];
  /** Simulated latency per agent; used when the agent has no entry in `delays` */
  delayMs?: number;
  delays?: Readonly<Record<string, number>>;
}

export class MockCodeGenerator implements CodeGenerator {
  calls = 0;

  constructor(private readonly behaviour: MockBehaviour = {}) {}

  async generate(request: GenerationRequest, signal?: AbortSignal): Promise<GeneratedCode> {
    this.calls++;
    const agentId = request.agent.id;
    await sleep(delayFor(this.behaviour, agentId), signal);

    if (this.behaviour.failGeneration?.includes(agentId)) {
      throw new Error(`mock generation failure for ${agentId}`);
    }

    return {
      language: 'python',
      code: [
        `${AGENT_MARKER}${agentId}`,
        `# question: ${request.question.replace(/\s+/g, ' ')}`,
        `# dataset: ${request.summary.fileName} (${request.summary.rowCount} rows)`,
      ].join('\n'),
    };
  }
}

export class MockSandbox implements SandboxExecutor {
  calls = 0;

  constructor(private readonly behaviour: MockBehaviour = {}) {}

  async execute(request: ExecRequest, signal?: AbortSignal): Promise<ExecResult> {
    this.calls++;
    const agentId = agentFromCode(request.code);
    const delay = delayFor(this.behaviour, agentId);

    if (delay > request.timeoutMs) {
      await sleep(request.timeoutMs, signal);
      return result({ exitCode: 137, killed: true, timedOut: true });
    }
    await sleep(delay, signal);

    if (this.behaviour.failExecution?.includes(agentId)) {
      return result({ exitCode: 1, stderr: `Traceback (most recent call last):\nRuntimeError: mock failure in ${agentId}` });
    }

    const payload = {
      narrative: `Mock ${agentId} analysis of ${request.datasetPath}.`,
      insights: [`${agentId} found nothing unusual`],
      recommendations: ['Collect more data'],
      artifacts: [],
    };
    return result({ stdout: `running ${agentId}\n${JSON.stringify(payload)}\n` });
  }
}

function agentFromCode(code: string): string {
  const line = code.split('\n').find((l) => l.startsWith(AGENT_MARKER));
  return line ? line.slice(AGENT_MARKER.length).trim() : 'unknown';
}

function delayFor(behaviour: MockBehaviour, agentId: string): number {
  return behaviour.delays?.[agentId] ?? behaviour.delayMs ?? 0;
}

function result(partial: Partial<ExecResult>): ExecResult {
  return { stdout: '', stderr: '', exitCode: 0, killed: false, timedOut: false, truncated: false, ...partial };
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) return Promise.reject(new RunCancelledError());
  if (ms <= 0) return Promise.resolve();
  return new Promise((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(new RunCancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
