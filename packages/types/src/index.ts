/**
 * @bridge-analyst/types - Shared type definitions
 *
 * Usage:
 *   import type { BoardRecord, KeyMoment } from '@bridge-analyst/types';
 *   import type { AnalysisEngine } from '@bridge-analyst/types';
 */

export * from './board/index.js';
export * from './analysis/index.js';
export * from './services/index.js';
