/**
 * Process Sandbox
 *
 * Runs one generated analysis script in a child process. The script is
 * written to a fresh temp directory which is also the child's working
 * directory, and receives the dataset path as its first argument and in
 * `DATASET_PATH`.
 *
 * This is process isolation only: no filesystem or network confinement.
 * Deployments that need more should put the service itself in a container.
 */

import { spawn } from 'node:child_process';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { StringDecoder } from 'node:string_decoder';
import type { SandboxConfig } from '../../config/schema.js';
import { createComponentLogger } from '../utilities/logger.js';

const log = createComponentLogger('ProcessSandbox');

// =============================================================================
// TYPES
// =============================================================================

/**
 * Sandbox execution result.
 */
export interface ExecResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  killed: boolean;
  timedOut: boolean;
  /** Output exceeded the byte cap and was cut */
  truncated: boolean;
  error?: string;
}

export interface ExecRequest {
  code: string;
  language: string;
  datasetPath: string;
  timeoutMs: number;
}

/**
 * What the agent runner needs from an execution environment.
 */
export interface SandboxExecutor {
  execute(request: ExecRequest, signal?: AbortSignal): Promise<ExecResult>;
}

const SCRIPT_EXTENSIONS: Record<string, string> = {
  python: '.py',
};

// =============================================================================
// PROCESS SANDBOX
// =============================================================================

export class ProcessSandbox implements SandboxExecutor {
  constructor(private readonly config: SandboxConfig) {}

  async execute(request: ExecRequest, signal?: AbortSignal): Promise<ExecResult> {
    const extension = SCRIPT_EXTENSIONS[request.language];
    if (!extension) {
      return failed(`Unsupported language: ${request.language}`);
    }

    const dir = await mkdtemp(join(this.config.workDir ?? tmpdir(), 'agent-'));
    const script = join(dir, `analysis${extension}`);
    try {
      await writeFile(script, request.code, 'utf-8');
      return await this.spawnScript(script, dir, request, signal);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  }

  private spawnScript(script: string, cwd: string, request: ExecRequest, signal?: AbortSignal): Promise<ExecResult> {
    const timeout = Math.min(request.timeoutMs, this.config.timeoutMs);
    const maxBytes = this.config.maxOutputBytes;

    return new Promise((resolve) => {
      if (signal?.aborted) {
        resolve({ ...failed('Aborted before start'), killed: true });
        return;
      }

      const proc = spawn(this.config.interpreter, [script, request.datasetPath], {
        cwd,
        env: { ...process.env, DATASET_PATH: request.datasetPath, MPLBACKEND: 'Agg' },
        stdio: ['ignore', 'pipe', 'pipe'],
      });

      const stdout = new OutputCapture(maxBytes);
      const stderr = new OutputCapture(maxBytes);
      let killed = false;
      let timedOut = false;

      const kill = () => {
        if (killed) return;
        killed = true;
        proc.kill('SIGKILL');
      };

      const timer = setTimeout(() => {
        timedOut = true;
        kill();
      }, timeout);

      const onAbort = () => kill();
      signal?.addEventListener('abort', onAbort, { once: true });

      proc.stdout.on('data', (data: Buffer) => stdout.write(data));
      proc.stderr.on('data', (data: Buffer) => stderr.write(data));

      const output = () => ({
        stdout: stdout.toString(),
        stderr: stderr.toString(),
        truncated: stdout.truncated || stderr.truncated,
      });

      const finish = (result: ExecResult) => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        resolve(result);
      };

      proc.on('close', (code) => {
        if (timedOut) log.warn('Script timed out', { timeoutMs: timeout });
        finish({ ...output(), exitCode: code ?? 1, killed, timedOut });
      });

      proc.on('error', (err) => {
        finish({ ...output(), exitCode: 1, killed: false, timedOut: false, error: err.message });
      });
    });
  }
}

/**
 * One stream's output, capped at `limit` bytes of UTF-8. A character split
 * across chunks is joined; one cut by the cap is dropped whole.
 */
export class OutputCapture {
  private readonly decoder = new StringDecoder('utf8');
  private text = '';
  private bytes = 0;
  private cut = false;

  constructor(private readonly limit: number) {}

  get truncated(): boolean {
    return this.cut;
  }

  write(chunk: Buffer): void {
    if (this.cut) return;
    const room = this.limit - this.bytes;
    let accepted = chunk;
    if (chunk.length > room) {
      this.cut = true;
      accepted = chunk.subarray(0, room);
    }
    this.bytes += accepted.length;
    this.text += this.decoder.write(accepted);
  }

  toString(): string {
    return this.cut ? this.text : this.text + this.decoder.end();
  }
}

function failed(error: string): ExecResult {
  return { stdout: '', stderr: '', exitCode: 1, killed: false, timedOut: false, truncated: false, error };
}
