/**
 * Global Constants
 *
 * Defaults for the scalars the build pipeline consumes. Environment
 * configuration in the backend overrides every one of them.
 */

// ============================================================================
// Build Loop
// ============================================================================

export const BUILD_DEFAULTS = {
  MAX_ATTEMPTS_PER_TOOL: 5,
  MAX_TOOLS_PER_RUN: 5,
  SANDBOX_TIMEOUT_MS: 60_000,
  SANDBOX_MAX_OUTPUT_BYTES: 1_048_576, // 1MB
  SANDBOX_MAX_MEMORY_MB: 256,
  RUN_DEADLINE_MS: 30 * 60_000,
  MIN_PASSING_TESTS: 1,
  FEEDBACK_PROMPT_CHARS: 2000,
} as const;

// ============================================================================
// Topic Selection
// ============================================================================

export const SELECTION_DEFAULTS = {
  SIMILARITY_THRESHOLD: 0.85,
  CLUSTER_THRESHOLD: 0.3,
  TOP_TOPICS_COUNT: 10,
  RECENCY_HALF_LIFE_HOURS: 24,
  KEYWORDS_PER_TOPIC: 5,
} as const;

// ============================================================================
// Ideation & Corpus
// ============================================================================

export const IDEATION_DEFAULTS = {
  IDEAS_PER_TOPIC: 2,
  MAX_TOOL_NAME_LENGTH: 50,
} as const;

export const CORPUS_DEFAULTS = {
  WINDOW_HOURS: 48,
  RETENTION_DAYS: 30,
} as const;
