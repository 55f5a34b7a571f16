/**
 * Configuration Management Module
 *
 * Centralized configuration with environment variable support and
 * validation. Every scalar the build pipeline consumes is read here.
 */

import * as dotenv from 'dotenv';
import fs from 'fs';
import path from 'path';
import {
  BUILD_DEFAULTS,
  CORPUS_DEFAULTS,
  IDEATION_DEFAULTS,
  SELECTION_DEFAULTS,
} from '@forgeloop/shared-types';

// Load environment variables:
// 1) project root .env (if present) for shared local credentials
// 2) backend/.env as fallback template defaults
const rootEnvPath = path.resolve(process.cwd(), '..', '.env');
const localEnvPath = path.resolve(process.cwd(), '.env');
if (fs.existsSync(rootEnvPath)) {
  dotenv.config({ path: rootEnvPath });
}
dotenv.config({ path: localEnvPath });

/**
 * OpenAI-compatible provider entry. Providers are tried in declaration order.
 */
export interface ProviderConfig {
  id: ProviderName;
  name: string;
  baseURL: string;
  apiKeyEnv: string;
  model: string;
  /** Cheaper model used for ideation */
  fastModel: string;
}

export type ProviderName = 'github_models' | 'groq' | 'together';

export const PROVIDERS: Record<ProviderName, ProviderConfig> = {
  github_models: {
    id: 'github_models',
    name: 'GitHub Models',
    baseURL: process.env.GITHUB_MODELS_BASE_URL || 'https://models.inference.ai.azure.com',
    apiKeyEnv: 'GITHUB_TOKEN',
    model: process.env.GITHUB_MODELS_MODEL || 'gpt-4o',
    fastModel: process.env.GITHUB_MODELS_FAST_MODEL || 'gpt-4o-mini',
  },
  groq: {
    id: 'groq',
    name: 'Groq',
    baseURL: process.env.GROQ_BASE_URL || 'https://api.groq.com/openai/v1',
    apiKeyEnv: 'GROQ_API_KEY',
    model: process.env.GROQ_MODEL_LARGE || 'llama-3.3-70b-versatile',
    fastModel: process.env.GROQ_MODEL_FAST || 'llama-3.1-8b-instant',
  },
  together: {
    id: 'together',
    name: 'Together AI',
    baseURL: process.env.TOGETHER_BASE_URL || 'https://api.together.xyz/v1',
    apiKeyEnv: 'TOGETHER_API_KEY',
    model: process.env.TOGETHER_MODEL || 'meta-llama/Llama-3.3-70B-Instruct-Turbo',
    fastModel: process.env.TOGETHER_MODEL || 'meta-llama/Llama-3.3-70B-Instruct-Turbo',
  },
};

export const PROVIDER_ORDER: ProviderName[] = ['github_models', 'groq', 'together'];

/**
 * Application Configuration
 */
export interface Config {
  /** Node environment */
  env: string;

  /** Build loop */
  build: {
    /** K: attempts per tool specification */
    maxAttemptsPerTool: number;
    /** P: loops in flight at once */
    maxConcurrentTools: number;
    /** Tool specifications built per run */
    maxToolsPerRun: number;
    /** Global run deadline in milliseconds */
    runDeadlineMs: number;
    /** Passing tests the harness must report */
    minPassingTests: number;
    /** Characters of feedback quoted in a correction prompt */
    feedbackPromptChars: number;
  };

  /** Sandbox executor */
  sandbox: {
    timeoutMs: number;
    maxOutputBytes: number;
    maxMemoryMb: number;
    /** Node binary used to run generated tests */
    nodeBinary: string;
  };

  /** Topic selection */
  selection: {
    similarityThreshold: number;
    clusterThreshold: number;
    topTopicsCount: number;
    halfLifeHours: number;
  };

  /** Ideation */
  ideation: {
    ideasPerTopic: number;
  };

  /** Corpus storage */
  corpus: {
    databasePath: string;
    windowHours: number;
    retentionDays: number;
  };

  /** LLM access */
  ai: {
    maxTokens: number;
    temperature: number;
    requestTimeoutMs: number;
    maxRetries: number;
  };

  /** Publishing */
  publish: {
    rootDir: string;
    webhookUrl?: string;
  };
}

/**
 * Get environment variable or throw error
 */
function getEnvVar(key: string, defaultValue?: string): string {
  const value = process.env[key];
  if (value === undefined) {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value;
}

/**
 * Get number from environment variable
 */
function getEnvNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined || value.trim() === '') {
    return defaultValue;
  }
  const num = Number(value);
  if (Number.isNaN(num)) {
    console.warn(`[Config] Invalid number for ${key}, using default: ${defaultValue}`);
    return defaultValue;
  }
  return num;
}

/**
 * Load configuration from environment variables
 */
export function loadConfig(): Config {
  const maxToolsPerRun = getEnvNumber('MAX_TOOLS_PER_RUN', BUILD_DEFAULTS.MAX_TOOLS_PER_RUN);

  return {
    env: getEnvVar('NODE_ENV', 'development'),

    build: {
      maxAttemptsPerTool: getEnvNumber('MAX_ATTEMPTS_PER_TOOL', BUILD_DEFAULTS.MAX_ATTEMPTS_PER_TOOL),
      // P defaults to the per-run tool cap
      maxConcurrentTools: getEnvNumber('MAX_CONCURRENT_TOOLS', maxToolsPerRun),
      maxToolsPerRun,
      runDeadlineMs: getEnvNumber('RUN_DEADLINE_MS', BUILD_DEFAULTS.RUN_DEADLINE_MS),
      minPassingTests: getEnvNumber('MIN_PASSING_TESTS', BUILD_DEFAULTS.MIN_PASSING_TESTS),
      feedbackPromptChars: getEnvNumber('FEEDBACK_PROMPT_CHARS', BUILD_DEFAULTS.FEEDBACK_PROMPT_CHARS),
    },

    sandbox: {
      timeoutMs: getEnvNumber('SANDBOX_TIMEOUT_MS', BUILD_DEFAULTS.SANDBOX_TIMEOUT_MS),
      maxOutputBytes: getEnvNumber('SANDBOX_MAX_OUTPUT_BYTES', BUILD_DEFAULTS.SANDBOX_MAX_OUTPUT_BYTES),
      maxMemoryMb: getEnvNumber('SANDBOX_MAX_MEMORY_MB', BUILD_DEFAULTS.SANDBOX_MAX_MEMORY_MB),
      nodeBinary: getEnvVar('SANDBOX_NODE_BINARY', process.execPath),
    },

    selection: {
      similarityThreshold: getEnvNumber('SIMILARITY_THRESHOLD', SELECTION_DEFAULTS.SIMILARITY_THRESHOLD),
      clusterThreshold: getEnvNumber('CLUSTER_THRESHOLD', SELECTION_DEFAULTS.CLUSTER_THRESHOLD),
      topTopicsCount: getEnvNumber('TOP_TOPICS_COUNT', SELECTION_DEFAULTS.TOP_TOPICS_COUNT),
      halfLifeHours: getEnvNumber('RECENCY_HALF_LIFE_HOURS', SELECTION_DEFAULTS.RECENCY_HALF_LIFE_HOURS),
    },

    ideation: {
      ideasPerTopic: getEnvNumber('IDEAS_PER_TOPIC', IDEATION_DEFAULTS.IDEAS_PER_TOPIC),
    },

    corpus: {
      databasePath: getEnvVar('DATABASE_PATH', './data/forgeloop.db'),
      windowHours: getEnvNumber('CORPUS_WINDOW_HOURS', CORPUS_DEFAULTS.WINDOW_HOURS),
      retentionDays: getEnvNumber('RETENTION_DAYS', CORPUS_DEFAULTS.RETENTION_DAYS),
    },

    ai: {
      maxTokens: getEnvNumber('AI_MAX_TOKENS', 4096),
      temperature: getEnvNumber('AI_TEMPERATURE', 5) / 10, // Convert to 0.0-1.0
      requestTimeoutMs: getEnvNumber('LLM_REQUEST_TIMEOUT_MS', 90_000),
      maxRetries: getEnvNumber('LLM_MAX_RETRIES', 2),
    },

    publish: {
      rootDir: getEnvVar('PUBLISH_DIR', './published'),
      webhookUrl: getEnvVar('WEBHOOK_URL', '').trim() || undefined,
    },
  };
}

/**
 * Global configuration instance
 */
export const config: Config = loadConfig();

/**
 * Providers that have an API key configured, in fallback order
 */
export function getConfiguredProviders(): Array<ProviderConfig & { apiKey: string }> {
  return PROVIDER_ORDER.flatMap(id => {
    const provider = PROVIDERS[id];
    const apiKey = process.env[provider.apiKeyEnv];
    return apiKey ? [{ ...provider, apiKey }] : [];
  });
}

/**
 * Validate configuration
 */
export function validateConfig(target: Config = config): { valid: boolean; errors: string[] } {
  const errors: string[] = [];
  const { build, sandbox, selection } = target;

  if (getConfiguredProviders().length === 0) {
    errors.push(
      `No LLM provider configured. Set one of: ${PROVIDER_ORDER.map(id => PROVIDERS[id].apiKeyEnv).join(', ')}`
    );
  }

  if (!Number.isInteger(build.maxAttemptsPerTool) || build.maxAttemptsPerTool < 1) {
    errors.push(`MAX_ATTEMPTS_PER_TOOL must be a positive integer (got ${build.maxAttemptsPerTool})`);
  }
  if (!Number.isInteger(build.maxConcurrentTools) || build.maxConcurrentTools < 1) {
    errors.push(`MAX_CONCURRENT_TOOLS must be a positive integer (got ${build.maxConcurrentTools})`);
  }
  if (build.runDeadlineMs <= 0) {
    errors.push(`RUN_DEADLINE_MS must be positive (got ${build.runDeadlineMs})`);
  }
  if (sandbox.timeoutMs <= 0) {
    errors.push(`SANDBOX_TIMEOUT_MS must be positive (got ${sandbox.timeoutMs})`);
  }
  if (selection.similarityThreshold < 0 || selection.similarityThreshold > 1) {
    errors.push(`SIMILARITY_THRESHOLD must be within [0, 1] (got ${selection.similarityThreshold})`);
  }

  // Check database directory
  const dbDir = path.dirname(target.corpus.databasePath);
  if (!fs.existsSync(dbDir)) {
    try {
      fs.mkdirSync(dbDir, { recursive: true });
    } catch (error) {
      errors.push(`Cannot create database directory: ${dbDir} (${error instanceof Error ? error.message : String(error)})`);
    }
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}

/**
 * Print configuration (for debugging), secrets omitted
 */
export function printConfig(target: Config = config): string {
  const providers = getConfiguredProviders().map(p => `${p.name} (${p.model})`);
  return [
    `env:                ${target.env}`,
    `providers:          ${providers.length > 0 ? providers.join(' -> ') : '(none)'}`,
    `max attempts (K):   ${target.build.maxAttemptsPerTool}`,
    `parallelism (P):    ${target.build.maxConcurrentTools}`,
    `tools per run:      ${target.build.maxToolsPerRun}`,
    `run deadline:       ${target.build.runDeadlineMs}ms`,
    `sandbox timeout:    ${target.sandbox.timeoutMs}ms`,
    `similarity cutoff:  ${target.selection.similarityThreshold}`,
    `topics per run:     ${target.selection.topTopicsCount}`,
    `corpus window:      ${target.corpus.windowHours}h (retention ${target.corpus.retentionDays}d)`,
    `database:           ${target.corpus.databasePath}`,
    `publish dir:        ${target.publish.rootDir}`,
    `webhook:            ${target.publish.webhookUrl ? 'configured' : 'off'}`,
  ].join('\n');
}

export default config;
