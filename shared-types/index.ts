/**
 * forgeloop - shared type definitions
 */

export * from './types/corpus';
export * from './types/build';
export * from './types/run';
export * from './constants';
