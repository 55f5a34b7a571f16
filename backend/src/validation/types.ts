/**
 * Sandbox Executor contract
 */

import type { GeneratedCandidate, SandboxResult } from '@forgeloop/shared-types';

export interface SandboxRequest {
  /** File stem for the generated module and its test file */
  toolName: string;
  candidate: GeneratedCandidate;
  /** Wall-clock ceiling for this invocation */
  timeoutMs: number;
}

/**
 * Runs untrusted code in isolation. Each call gets a fresh environment that
 * is gone by the time the promise settles.
 *
 * Resolves with status 'completed' when the harness process exited on its
 * own. Rejects with SandboxTimeoutError or SandboxResourceError when a
 * ceiling was hit, or any other error when the executor itself failed.
 */
export interface SandboxExecutor {
  execute(request: SandboxRequest): Promise<SandboxResult>;
}
