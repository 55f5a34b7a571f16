/**
 * Build Types
 *
 * Records of the generate/validate/correct loop. Everything here is treated
 * as immutable once created; loops append new records instead of editing.
 */

/**
 * The contract a generated artifact must satisfy.
 */
export interface ToolSpecification {
  /** snake_case tool name, unique within a run */
  name: string;
  displayName?: string;
  description: string;
  /** What the generated test suite must assert */
  acceptanceCriteria: string[];
  topicId: string;
  topicRank: number;
}

/**
 * Source and test payloads returned by the generative code service.
 */
export interface GeneratedCandidate {
  source: string;
  tests: string;
  readme?: string;
}

/**
 * Structured result parsed from the test harness output.
 */
export interface HarnessReport {
  total: number;
  passed: number;
  failed: number;
  /** Names of failing test cases */
  failures: string[];
}

export type SandboxStatus = 'completed' | 'timeout' | 'resource_exceeded' | 'executor_error';

export interface SandboxResult {
  status: SandboxStatus;
  /** Process exit code; -1 when the process was killed or never started */
  exitCode: number;
  capturedOutput: string;
  elapsedMs: number;
  /** Absent when the harness did not run to completion */
  report?: HarnessReport;
}

export type AttemptClassification =
  | 'passed'
  | 'malformed_candidate'
  | 'tests_failed'
  | 'criteria_unmet'
  | 'harness_failed'
  | 'sandbox_timeout'
  | 'resource_exceeded'
  | 'executor_error';

/**
 * Feedback carried from attempt i into attempt i+1.
 */
export interface AttemptFeedback {
  /** Captured output of the previous attempt, verbatim */
  diagnostics: string;
  /** Candidate of the previous attempt, when generation succeeded */
  previous?: GeneratedCandidate;
}

export interface BuildAttempt {
  /** 0-based, contiguous within one specification */
  index: number;
  candidate?: GeneratedCandidate;
  sandbox?: SandboxResult;
  classification: AttemptClassification;
  /** Text handed to the next attempt as feedback */
  diagnostics: string;
  /** Feedback this attempt was generated with (absent for attempt 0) */
  feedback?: AttemptFeedback;
  startedAt: string;
  finishedAt: string;
}

export type AbandonReason = 'attempts_exhausted' | 'deadline';

export interface PassedOutcome {
  status: 'passed';
  spec: ToolSpecification;
  winningAttempt: BuildAttempt;
  attempts: readonly BuildAttempt[];
}

export interface AbandonedOutcome {
  status: 'abandoned';
  spec: ToolSpecification;
  reason: AbandonReason;
  attempts: readonly BuildAttempt[];
}

export interface FatalErrorOutcome {
  status: 'fatal_error';
  spec: ToolSpecification;
  reason: string;
  error: { name: string; message: string };
  attempts: readonly BuildAttempt[];
}

/**
 * Terminal state of one specification's correction loop.
 */
export type ToolOutcome = PassedOutcome | AbandonedOutcome | FatalErrorOutcome;

export type ToolOutcomeStatus = ToolOutcome['status'];
