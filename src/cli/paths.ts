import path from 'node:path';

import { env } from '../core/env.js';

/**
 * Output layout under DOCS_DIR: one directory per strategy, each with a chunk_output.txt.
 */
export const STRATEGY_DIRS = {
  fixedSize: 'fixed_size_chunk',
  semantic: 'semantic_chunking',
  adaptive: 'adaptive_chunking',
  aiDriven: 'ai_driven_chunking',
  contextEnriched: 'context_enrich_chunking',
  recursiveCode: 'recursive_chunking',
} as const;

export type StrategyKey = keyof typeof STRATEGY_DIRS;

/** Shared markdown test document, written by generate-doc. */
export const TEST_DOCUMENT_PATH = path.join(env.DOCS_DIR, STRATEGY_DIRS.fixedSize, 'rag_chunking_test_doc.md');

/** Python sample for the code chunker. */
export const CODE_SAMPLE_PATH = path.join(env.DOCS_DIR, STRATEGY_DIRS.recursiveCode, 'python_code.md');

export function outputPath(strategy: StrategyKey): string {
  return path.join(env.DOCS_DIR, STRATEGY_DIRS[strategy], 'chunk_output.txt');
}
