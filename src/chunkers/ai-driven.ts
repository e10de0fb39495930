import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import { StringOutputParser } from '@langchain/core/output_parsers';
import { ChatPromptTemplate } from '@langchain/core/prompts';
import { z } from 'zod';

import {
  AiDrivenOptionsSchema,
  MockAiDrivenOptionsSchema,
  parseOptions,
} from '../core/config.js';
import { LlmOutputParseError, toError } from '../core/errors.js';
import type { Logger } from '../core/logger.js';
import { silentLogger } from '../core/logger.js';
import type { BaseChunkMetadata, ChunkRecord } from '../core/metadata.js';
import { buildChunkRecords } from '../core/metadata.js';
import { createRecursiveSplitter, PROSE_SEPARATORS } from '../core/splitter.js';
import { roundTo, wordStats } from '../core/text.js';

export type AiDrivenChunkMetadata = BaseChunkMetadata & {
  /** Relative position of the chunk in the document, i / total */
  document_position: number;
  word_count: number;
  unique_words: number;
  word_density: number;
};

export type FallbackChunkMetadata = BaseChunkMetadata & {
  document_position: number;
};

export type AiChunkRecord = ChunkRecord<AiDrivenChunkMetadata> | ChunkRecord<FallbackChunkMetadata>;

const CHUNKING_PROMPT = ChatPromptTemplate.fromTemplate(`You are a document processing expert. Your task is to break down the following document into
at most {max_chunks} meaningful chunks. Follow these guidelines:

1. Each chunk should contain complete ideas or concepts
2. More complex sections should be in smaller chunks
3. Preserve headers with their associated content
4. Keep related information together
5. Maintain the original order of the document

DOCUMENT:
{document}

Return ONLY a valid JSON array of strings, where each string is a chunk.
Do not include any explanations or additional text outside the JSON array.`);

/** First `[` ... last `]` spanning at least one string literal. */
const JSON_ARRAY_PATTERN = /\[\s*".*"\s*\]/s;

const ChunkArraySchema = z.array(z.string().min(1)).min(1);

function parseJsonOrUndefined(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Scans every `[` ... `]` span and returns the longest one that is a valid chunk array.
 */
function findChunkArray(output: string): string[] | undefined {
  let best: string[] | undefined;
  let bestLength = 0;

  for (let start = output.indexOf('['); start !== -1; start = output.indexOf('[', start + 1)) {
    for (let end = output.lastIndexOf(']'); end > start; end = output.lastIndexOf(']', end - 1)) {
      const length = end - start + 1;
      if (length <= bestLength) break;

      const result = ChunkArraySchema.safeParse(parseJsonOrUndefined(output.slice(start, end + 1)));
      if (result.success) {
        best = result.data;
        bestLength = length;
        break;
      }
    }
  }

  return best;
}

/**
 * Extracts the chunk list from a model response.
 *
 * The array may be wrapped in prose or a code fence; when the output holds several
 * bracketed spans the longest valid array wins. Anything that is not a non-empty
 * array of non-empty strings is rejected.
 *
 * @throws LlmOutputParseError carrying the raw output.
 */
export function parseChunkArray(output: string): string[] {
  const found = findChunkArray(output);
  if (found) return found;

  const match = JSON_ARRAY_PATTERN.exec(output);
  const candidate = match ? match[0] : output.trim();

  let parsed: unknown;
  try {
    parsed = JSON.parse(candidate);
  } catch (err: unknown) {
    throw new LlmOutputParseError(`invalid JSON (${toError(err).message})`, output);
  }

  const result = ChunkArraySchema.safeParse(parsed);
  if (!result.success) {
    const reason = Array.isArray(parsed)
      ? parsed.length === 0
        ? 'the array contains no chunks'
        : 'every chunk must be a non-empty string'
      : 'expected a JSON array of strings';
    throw new LlmOutputParseError(reason, output);
  }
  return result.data;
}

/**
 * Merges consecutive chunks into groups so that at most maxChunks remain.
 */
export function limitChunkCount(chunks: string[], maxChunks: number): string[] {
  if (chunks.length <= maxChunks) return chunks;

  const perGroup = Math.floor(chunks.length / maxChunks) + 1;
  const grouped: string[] = [];
  for (let i = 0; i < chunks.length; i += perGroup) {
    grouped.push(chunks.slice(i, i + perGroup).join('\n\n'));
  }
  return grouped;
}

function analyzedRecords(
  chunks: string[],
  chunkType: 'ai_driven' | 'mock_ai_driven',
): Array<ChunkRecord<AiDrivenChunkMetadata>> {
  return buildChunkRecords(chunks, chunkType, (chunk, i) => {
    const stats = wordStats(chunk);
    return {
      document_position: roundTo(i / chunks.length, 2),
      word_count: stats.wordCount,
      unique_words: stats.uniqueWords,
      word_density: roundTo(stats.density, 2),
    };
  });
}

/**
 * Recursive-splitter chunking used when the model output cannot be used.
 */
export async function performFallbackChunking(
  document: string,
  chunkSize: number,
  chunkOverlap: number,
): Promise<Array<ChunkRecord<FallbackChunkMetadata>>> {
  const chunks = await createRecursiveSplitter(chunkSize, chunkOverlap, PROSE_SEPARATORS).splitText(
    document,
  );
  return buildChunkRecords(chunks, 'fallback', (_chunk, i) => ({
    document_position: roundTo(i / chunks.length, 2),
  }));
}

/**
 * Asks a chat model to chunk the document along semantic boundaries.
 *
 * Parse and model errors are reported through the logger and answered with the
 * recursive-splitter fallback; with `fallback: false` they are rethrown.
 */
export async function performAiDrivenChunking(
  document: string,
  model: BaseChatModel,
  options?: z.input<typeof AiDrivenOptionsSchema>,
  logger: Logger = silentLogger,
): Promise<AiChunkRecord[]> {
  const opts = parseOptions(AiDrivenOptionsSchema, options, 'AI-driven');

  try {
    const chain = CHUNKING_PROMPT.pipe(model).pipe(new StringOutputParser());
    const output = await chain.invoke({ document, max_chunks: String(opts.maxChunks) });
    const chunks = limitChunkCount(parseChunkArray(output), opts.maxChunks);
    logger.info(`Successfully chunked document into ${chunks.length} AI-driven chunks`);
    return analyzedRecords(chunks, 'ai_driven');
  } catch (err: unknown) {
    if (!opts.fallback) throw err;

    logger.warn(`LLM chunking failed: ${toError(err).message}`);
    logger.warn('Falling back to recursive chunking');
    const records = await performFallbackChunking(
      document,
      opts.fallbackChunkSize,
      opts.fallbackChunkOverlap,
    );
    logger.info(`Fallback chunking created ${records.length} chunks`);
    return records;
  }
}

/**
 * Offline stand-in for the model: merges paragraphs while the running chunk stays under
 * targetLength characters, then regroups to respect maxChunks.
 */
export function performMockAiDrivenChunking(
  document: string,
  options?: z.input<typeof MockAiDrivenOptionsSchema>,
  logger: Logger = silentLogger,
): Array<ChunkRecord<AiDrivenChunkMetadata>> {
  const opts = parseOptions(MockAiDrivenOptionsSchema, options, 'mock AI-driven');

  const chunks: string[] = [];
  let current = '';

  for (const para of document.split('\n\n')) {
    if (para.trim() === '') continue;

    if (current.length + para.length < opts.targetLength) {
      current += `${para}\n\n`;
    } else {
      if (current) chunks.push(current.trim());
      current = `${para}\n\n`;
    }
  }
  if (current) chunks.push(current.trim());

  const limited = limitChunkCount(chunks, opts.maxChunks);
  logger.info(`Mock AI chunking created ${limited.length} chunks`);
  return analyzedRecords(limited, 'mock_ai_driven');
}
