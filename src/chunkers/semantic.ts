import type { z } from 'zod';

import { parseOptions, SemanticOptionsSchema } from '../core/config.js';
import type { Logger } from '../core/logger.js';
import { silentLogger } from '../core/logger.js';
import type { BaseChunkMetadata, ChunkRecord } from '../core/metadata.js';
import { buildChunkRecords } from '../core/metadata.js';
import { createRecursiveSplitter } from '../core/splitter.js';
import { findHeadings, locateChunks, roundTo, splitSentences, wordStats } from '../core/text.js';

export type SemanticChunkMetadata = BaseChunkMetadata & {
  word_count: number;
  sentence_count: number;
  /** Unique words over total words, 0 for a chunk without words */
  semantic_density: number;
  /** Nearest markdown heading at or before the chunk start */
  section: string | null;
  start_index: number | null;
};

/**
 * Separator-hierarchy chunking.
 *
 * The recursive splitter tries paragraph breaks first and only falls back to lines,
 * sentences, words and characters for pieces that still exceed chunkSize, so chunks end on
 * the coarsest boundary that fits. Overlap follows the library's piece boundaries.
 */
export async function performSemanticChunking(
  document: string,
  options?: z.input<typeof SemanticOptionsSchema>,
  logger: Logger = silentLogger,
): Promise<Array<ChunkRecord<SemanticChunkMetadata>>> {
  const opts = parseOptions(SemanticOptionsSchema, options, 'semantic');

  const splitter = createRecursiveSplitter(opts.chunkSize, opts.chunkOverlap, opts.separators);
  const chunks = await splitter.splitText(document);
  logger.info(`Document split into ${chunks.length} semantic chunks`);

  const starts = locateChunks(document, chunks);
  const headings = findHeadings(document);

  const sectionAt = (start: number | null): string | null => {
    if (start === null) return null;
    let title: string | null = null;
    for (const h of headings) {
      if (h.offset > start) break;
      title = h.title;
    }
    return title;
  };

  return buildChunkRecords(chunks, 'semantic', (chunk, i) => {
    const stats = wordStats(chunk);
    const start = starts[i] ?? null;
    return {
      word_count: stats.wordCount,
      sentence_count: splitSentences(chunk).length,
      semantic_density: roundTo(stats.density, 3),
      section: sectionAt(start),
      start_index: start,
    };
  });
}
