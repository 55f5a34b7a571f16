/**
 * Backend Module - Unified Export Point
 */

// Configuration & errors
export { config, loadConfig, validateConfig, printConfig, getConfiguredProviders } from './config';
export type { Config } from './config';
export * from './errors';
export { createLogger } from './logging/log';

// LLM access
export { LLMClient, createLLMClient, providerRoutes } from './llm';

// Corpus
export { CorpusStore } from './storage/corpus-store';
export { ingest, parseCorpusItem } from './pipeline/ingest';
export type { IngestResult } from './pipeline/ingest';

// Topic selection
export { TopicSelector } from './analysis/topic-selector';
export type { TopicSelectorOptions } from './analysis/topic-selector';
export { InMemorySimilarityIndex, cosineSimilarity, jaccardSimilarity } from './analysis/similarity-index';
export type { SimilarityIndex } from './analysis/similarity-index';

// Ideation
export { IdeaGenerator, normalizeToolName } from './ideation/idea-generator';
export { LLMIdeaSource } from './ideation/llm-idea-source';
export type { IdeaSource, RawIdea } from './ideation/types';

// Engine
export { BuildLoop, canTransition, TERMINAL_STATES } from './execution/build-loop';
export type { LoopState, LoopTransition } from './execution/build-loop';
export { BuildScheduler } from './execution/build-scheduler';
export { LLMCodeGenerator } from './generation/code-generator';
export type { CodeGenerator, GenerationRequest } from './generation/types';
export { LocalProcessSandbox } from './validation/sandbox';
export { evaluateAcceptance } from './validation/acceptance';
export { parseTapReport } from './validation/harness-report';
export type { SandboxExecutor, SandboxRequest } from './validation/types';

// Publishing
export { FileSystemPublisher } from './publishing/publisher';
export type { Publisher } from './publishing/publisher';
export { NoopNotifier, WebhookNotifier } from './publishing/notifier';
export type { Notifier } from './publishing/notifier';

// Pipeline
export { runPipeline } from './pipeline/run-pipeline';
export type { PipelineDependencies, PipelineOptions, PipelineResult } from './pipeline/run-pipeline';
