/**
 * Acceptance - decide whether a sandbox result satisfies a specification
 *
 * Decided from the sandbox status, exit code and the harness's structured
 * report only. Source text is never inspected.
 */

import type { AttemptClassification, SandboxResult } from '@forgeloop/shared-types';
import { BUILD_DEFAULTS } from '@forgeloop/shared-types';

export interface AcceptancePolicy {
  /** Passing tests the harness must report */
  minPassingTests: number;
}

export const DEFAULT_ACCEPTANCE_POLICY: AcceptancePolicy = {
  minPassingTests: BUILD_DEFAULTS.MIN_PASSING_TESTS,
};

export type FailureClassification = Exclude<AttemptClassification, 'passed' | 'malformed_candidate'>;

export type AcceptanceVerdict =
  | { satisfied: true }
  | { satisfied: false; classification: FailureClassification; reason: string };

export function evaluateAcceptance(
  result: SandboxResult,
  policy: AcceptancePolicy = DEFAULT_ACCEPTANCE_POLICY,
): AcceptanceVerdict {
  switch (result.status) {
    case 'timeout':
      return { satisfied: false, classification: 'sandbox_timeout', reason: 'sandbox timeout exceeded' };
    case 'resource_exceeded':
      return { satisfied: false, classification: 'resource_exceeded', reason: 'sandbox resource ceiling exceeded' };
    case 'executor_error':
      return { satisfied: false, classification: 'executor_error', reason: 'sandbox executor failed' };
    case 'completed':
      break;
  }

  const report = result.report;
  if (!report) {
    return { satisfied: false, classification: 'harness_failed', reason: 'test harness produced no report' };
  }
  if (report.failed > 0) {
    return {
      satisfied: false,
      classification: 'tests_failed',
      reason: `${report.failed} of ${report.total} tests failed`,
    };
  }
  if (result.exitCode !== 0) {
    return {
      satisfied: false,
      classification: 'harness_failed',
      reason: `test harness exited with code ${result.exitCode}`,
    };
  }
  if (report.passed < Math.max(1, policy.minPassingTests)) {
    return {
      satisfied: false,
      classification: 'criteria_unmet',
      reason: `${report.passed} passing tests, at least ${Math.max(1, policy.minPassingTests)} required`,
    };
  }
  return { satisfied: true };
}
