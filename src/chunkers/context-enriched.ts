import { Document } from '@langchain/core/documents';
import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import { StringOutputParser } from '@langchain/core/output_parsers';
import { PromptTemplate } from '@langchain/core/prompts';
import type { z } from 'zod';

import { ContextEnrichedOptionsSchema, parseOptions } from '../core/config.js';
import { toError } from '../core/errors.js';
import type { Logger } from '../core/logger.js';
import { silentLogger } from '../core/logger.js';
import type { BaseChunkMetadata, ChunkRecord } from '../core/metadata.js';
import { baseMetadata } from '../core/metadata.js';
import { createRecursiveSplitter } from '../core/splitter.js';

export type ContextType = 'summary' | 'raw_text' | 'none';

export type ContextEnrichedChunkMetadata = BaseChunkMetadata & {
  window_start_idx: number;
  window_end_idx: number;
  has_context: boolean;
  context: string;
  context_type: ContextType;
  summary_error?: string;
};

/** Turns neighbouring chunk text into a short context string. */
export type Summarizer = (text: string) => Promise<string>;

const SUMMARY_PROMPT = PromptTemplate.fromTemplate(
  'Provide a brief summary of the following text:\n\n{text}\n\nSummary:',
);

/**
 * Summarizer backed by a chat model.
 */
export function createLlmSummarizer(model: BaseChatModel): Summarizer {
  const chain = SUMMARY_PROMPT.pipe(model).pipe(new StringOutputParser());
  return async (text: string) => (await chain.invoke({ text })).trim();
}

/**
 * Offline summarizer: the first sentence, cut to 100 characters.
 */
export const mockSummarizer: Summarizer = async (text: string) => {
  const firstSentence = text.split('.')[0] ?? '';
  return `Summary: ${firstSentence.slice(0, 100)}...`;
};

/**
 * Splits the document and attaches the context of each chunk's neighbours.
 *
 * For chunk i the window is [i - windowSize, i + windowSize] clipped to the document; the
 * other chunks in the window, joined with a space, form the context. When summarisation
 * fails for a chunk the raw context is kept and the error is recorded in summary_error.
 */
export async function performContextEnrichedChunking(
  document: string,
  summarizer: Summarizer,
  options?: z.input<typeof ContextEnrichedOptionsSchema>,
  logger: Logger = silentLogger,
): Promise<Array<ChunkRecord<ContextEnrichedChunkMetadata>>> {
  const opts = parseOptions(ContextEnrichedOptionsSchema, options, 'context-enriched');

  const splitter = createRecursiveSplitter(opts.chunkSize, opts.chunkOverlap, opts.separators);
  const baseChunks = await splitter.splitText(document);
  logger.info(`Document split into ${baseChunks.length} base chunks`);

  const records: Array<ChunkRecord<ContextEnrichedChunkMetadata>> = [];

  for (const [i, chunk] of baseChunks.entries()) {
    logger.debug?.(`Processing chunk ${i + 1}/${baseChunks.length}`);

    const windowStart = Math.max(0, i - opts.windowSize);
    const windowEnd = Math.min(baseChunks.length, i + opts.windowSize + 1);
    const contextChunks = baseChunks.slice(windowStart, windowEnd).filter((_c, j) => j !== i - windowStart);
    const contextText = contextChunks.join(' ');

    const metadata: ContextEnrichedChunkMetadata = {
      ...baseMetadata(i, baseChunks.length, chunk.length, 'context_enriched'),
      window_start_idx: windowStart,
      window_end_idx: windowEnd - 1,
      has_context: contextChunks.length > 0,
      context: '',
      context_type: 'none',
    };

    let pageContent = chunk;

    if (contextChunks.length > 0 && opts.summarize) {
      try {
        const summary = await summarizer(contextText);
        metadata.context = summary;
        metadata.context_type = 'summary';
        pageContent = `Context: ${summary}\n\nContent: ${chunk}`;
      } catch (err: unknown) {
        const message = toError(err).message;
        logger.warn(`Summarization error for chunk ${i}: ${message}`);
        metadata.context = contextText;
        metadata.context_type = 'raw_text';
        metadata.summary_error = message;
        pageContent = `Context: ${contextText}\n\nContent: ${chunk}`;
      }
    } else if (contextChunks.length > 0) {
      metadata.context = contextText;
      metadata.context_type = 'raw_text';
      pageContent = `Context: ${contextText}\n\nContent: ${chunk}`;
    }

    records.push(new Document({ pageContent, metadata }));
  }

  return records;
}
