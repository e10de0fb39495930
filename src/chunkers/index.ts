/**
 * Chunking strategies.
 *
 * Usage:
 *   import { performSemanticChunking, writeChunkOutput } from './chunkers/index.js';
 *
 *   const records = await performSemanticChunking(text, { chunkSize: 800 });
 *   await writeChunkOutput('out/chunk_output.txt', records);
 */

export {
  FixedWindowTextSplitter,
  performFixedSizeChunking,
  reconstructFromWindows,
  type FixedSizeChunkMetadata,
  type TextWindow,
} from './fixed-size.js';
export { performSemanticChunking, type SemanticChunkMetadata } from './semantic.js';
export {
  AdaptiveTextSplitter,
  performAdaptiveChunking,
  type AdaptiveChunkMetadata,
  type AdaptiveSplit,
} from './adaptive.js';
export {
  limitChunkCount,
  parseChunkArray,
  performAiDrivenChunking,
  performFallbackChunking,
  performMockAiDrivenChunking,
  type AiChunkRecord,
  type AiDrivenChunkMetadata,
  type FallbackChunkMetadata,
} from './ai-driven.js';
export {
  createLlmSummarizer,
  mockSummarizer,
  performContextEnrichedChunking,
  type ContextEnrichedChunkMetadata,
  type ContextType,
  type Summarizer,
} from './context-enriched.js';
export {
  detectStructure,
  GENERIC_CODE_SEPARATORS,
  performCodeChunking,
  type CodeChunkMetadata,
  type CodeLanguage,
  type CodeStructure,
  type CodeStructureType,
} from './recursive-code.js';

export { ChunkingError, ConfigError, DocumentLoadError, LlmOutputParseError } from '../core/errors.js';
export { consoleLogger, silentLogger, type Logger } from '../core/logger.js';
export {
  sanitizeMetadata,
  type BaseChunkMetadata,
  type ChunkRecord,
  type ChunkType,
  type MetadataValue,
} from '../core/metadata.js';
export { formatChunkOutput, writeChunkOutput, type ChunkOutputOptions } from '../core/output.js';
export { summarizeChunks, type ChunkSummary } from '../core/report.js';
export { loadDocument } from '../core/loaders.js';
export { generateTestDocument, type GeneratedDocument } from '../core/generator.js';
