/**
 * Local Process Sandbox - run a generated module's tests in a child process
 *
 * Every invocation writes the candidate into a fresh temporary directory,
 * runs `node --test` there with a scrubbed environment, a heap ceiling, an
 * output ceiling and a wall-clock timeout. Once the harness exits its whole
 * process group is killed, then the directory is removed.
 */

import { spawn } from 'child_process';
import type { ChildProcess } from 'child_process';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import type { SandboxResult } from '@forgeloop/shared-types';
import { BUILD_DEFAULTS } from '@forgeloop/shared-types';
import { SandboxResourceError, SandboxTimeoutError, isErrnoException } from '../errors';
import { createLogger } from '../logging/log';
import { parseTapReport } from './harness-report';
import type { SandboxExecutor, SandboxRequest } from './types';

const log = createLogger('sandbox');

const SAFE_STEM = /^[A-Za-z0-9_]{1,64}$/;
const HEAP_EXHAUSTED = /JavaScript heap out of memory|Reached heap limit/;

export interface LocalSandboxOptions {
  /** Node binary that runs the harness (default: the current one) */
  nodeBinary?: string;
  /** Captured stdout+stderr ceiling in bytes */
  maxOutputBytes?: number;
  /** V8 old-space ceiling for every process the harness starts */
  maxMemoryMb?: number;
  /** Parent directory for per-invocation workspaces */
  tempRoot?: string;
}

export function isSafeToolName(toolName: string): boolean {
  return SAFE_STEM.test(toolName);
}

export function sandboxFileNames(toolName: string): { source: string; tests: string } {
  const stem = isSafeToolName(toolName) ? toolName : 'tool';
  return { source: `${stem}.mjs`, tests: `${stem}.test.mjs` };
}

export class LocalProcessSandbox implements SandboxExecutor {
  private readonly nodeBinary: string;
  private readonly maxOutputBytes: number;
  private readonly maxMemoryMb: number;
  private readonly tempRoot: string;

  constructor(options: LocalSandboxOptions = {}) {
    this.nodeBinary = options.nodeBinary ?? process.execPath;
    this.maxOutputBytes = options.maxOutputBytes ?? BUILD_DEFAULTS.SANDBOX_MAX_OUTPUT_BYTES;
    this.maxMemoryMb = options.maxMemoryMb ?? BUILD_DEFAULTS.SANDBOX_MAX_MEMORY_MB;
    this.tempRoot = options.tempRoot ?? os.tmpdir();
  }

  async execute(request: SandboxRequest): Promise<SandboxResult> {
    const workspace = await fs.mkdtemp(path.join(this.tempRoot, 'forgeloop-sandbox-'));
    try {
      const files = sandboxFileNames(request.toolName);
      await fs.writeFile(path.join(workspace, files.source), request.candidate.source, 'utf-8');
      await fs.writeFile(path.join(workspace, files.tests), request.candidate.tests, 'utf-8');
      return await this.runHarness(workspace, files.tests, request.timeoutMs);
    } finally {
      await this.teardown(workspace);
    }
  }

  private runHarness(cwd: string, testFile: string, timeoutMs: number): Promise<SandboxResult> {
    const startTime = Date.now();
    log.debug(`Running harness in ${cwd} (timeout ${timeoutMs}ms)`);

    return new Promise<SandboxResult>((resolve, reject) => {
      const child = spawn(this.nodeBinary, ['--test', '--test-reporter=tap', testFile], {
        cwd,
        env: this.isolatedEnv(cwd),
        stdio: ['ignore', 'pipe', 'pipe'],
        detached: process.platform !== 'win32',
      });

      const chunks: Buffer[] = [];
      let capturedBytes = 0;
      let outcome: 'running' | 'timeout' | 'overflow' = 'running';

      const collect = (chunk: Buffer) => {
        if (outcome !== 'running') return;
        capturedBytes += chunk.length;
        if (capturedBytes > this.maxOutputBytes) {
          outcome = 'overflow';
          this.kill(child);
          return;
        }
        chunks.push(chunk);
      };
      child.stdout?.on('data', collect);
      child.stderr?.on('data', collect);

      const timer = setTimeout(() => {
        if (outcome !== 'running') return;
        outcome = 'timeout';
        this.kill(child);
      }, timeoutMs);

      child.once('error', error => {
        clearTimeout(timer);
        reject(error);
      });

      child.once('close', (code: number | null) => {
        clearTimeout(timer);
        // the harness is gone; anything its tests started goes with it
        this.killGroup(child);
        const capturedOutput = Buffer.concat(chunks).toString('utf-8');
        const elapsedMs = Date.now() - startTime;

        if (outcome === 'timeout') {
          reject(new SandboxTimeoutError(timeoutMs, capturedOutput));
          return;
        }
        if (outcome === 'overflow') {
          reject(new SandboxResourceError(`Captured output exceeded ${this.maxOutputBytes} bytes`, capturedOutput));
          return;
        }
        if (HEAP_EXHAUSTED.test(capturedOutput)) {
          reject(new SandboxResourceError(`Memory ceiling of ${this.maxMemoryMb}MB exceeded`, capturedOutput));
          return;
        }

        resolve({
          status: 'completed',
          exitCode: code ?? -1,
          capturedOutput,
          elapsedMs,
          report: parseTapReport(capturedOutput, { harnessFile: testFile }),
        });
      });
    });
  }

  /**
   * Nothing from the parent environment leaks in apart from PATH; HOME and
   * TMPDIR point into the workspace.
   */
  private isolatedEnv(cwd: string): NodeJS.ProcessEnv {
    return {
      PATH: process.env.PATH ?? '',
      HOME: cwd,
      TMPDIR: cwd,
      NODE_ENV: 'test',
      NO_COLOR: '1',
      NODE_OPTIONS: `--max-old-space-size=${this.maxMemoryMb}`,
    };
  }

  /** Kill the harness and every test process it started. */
  private kill(child: ChildProcess): void {
    if (!this.killGroup(child)) {
      child.kill('SIGKILL');
    }
  }

  /**
   * SIGKILL the harness's process group. False when there is no group to
   * signal; a group with no live members counts as killed.
   */
  private killGroup(child: ChildProcess): boolean {
    if (child.pid === undefined || process.platform === 'win32') {
      return false;
    }
    try {
      process.kill(-child.pid, 'SIGKILL');
      return true;
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ESRCH') {
        return true;
      }
      log.debug('Process group kill failed', error);
      return false;
    }
  }

  private async teardown(workspace: string): Promise<void> {
    try {
      await fs.rm(workspace, { recursive: true, force: true });
    } catch (error) {
      log.warn(`Failed to remove sandbox workspace: ${workspace}`, error);
    }
  }
}
