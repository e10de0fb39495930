import { TextSplitter } from '@langchain/textsplitters';
import type { z } from 'zod';

import type { AdaptiveOptions, ComplexityMeasure } from '../core/config.js';
import { AdaptiveOptionsSchema, parseOptions } from '../core/config.js';
import type { Logger } from '../core/logger.js';
import { silentLogger } from '../core/logger.js';
import type { BaseChunkMetadata, ChunkRecord } from '../core/metadata.js';
import { buildChunkRecords } from '../core/metadata.js';
import { roundTo, splitSentences, wordStats } from '../core/text.js';

/** Lexical density at or above this value counts as maximally complex. */
const MAX_LEXICAL_DENSITY = 0.8;
/** Average sentence length (characters) at or above this value counts as maximally complex. */
const MAX_SENTENCE_LENGTH = 200;

export interface AdaptiveSplit {
  text: string;
  sentences: string[];
  /** Running complexity after the chunk's last sentence */
  complexity: number;
  /** Size budget after the chunk's last sentence, within [minChunkSize, maxChunkSize] */
  targetSize: number;
}

export type AdaptiveChunkMetadata = BaseChunkMetadata & {
  text_complexity: number;
  target_size: number;
  sentence_count: number;
  avg_chunk_size: number;
  size_vs_avg: number;
};

/**
 * Text splitter whose chunk size follows text complexity.
 *
 * Complex text (dense vocabulary, long sentences) gets smaller chunks and more overlap;
 * simple text gets larger chunks and less overlap. Sentences are never cut: a sentence
 * longer than the current target becomes a chunk of its own.
 */
export class AdaptiveTextSplitter extends TextSplitter {
  readonly minChunkSize: number;
  readonly maxChunkSize: number;
  readonly minChunkOverlap: number;
  readonly maxChunkOverlap: number;
  readonly complexityMeasure: ComplexityMeasure;

  constructor(options?: z.input<typeof AdaptiveOptionsSchema>) {
    const opts: AdaptiveOptions = parseOptions(AdaptiveOptionsSchema, options, 'adaptive');
    // Overlap is sized per chunk in splitAdaptive.
    super({
      chunkSize: opts.maxChunkSize,
      chunkOverlap: Math.min(opts.maxChunkOverlap, opts.maxChunkSize - 1),
    });
    this.minChunkSize = opts.minChunkSize;
    this.maxChunkSize = opts.maxChunkSize;
    this.minChunkOverlap = opts.minChunkOverlap;
    this.maxChunkOverlap = opts.maxChunkOverlap;
    this.complexityMeasure = opts.complexityMeasure;
  }

  /**
   * Complexity score in [0, 1]; higher means more complex. Blank text scores 0.
   */
  analyzeComplexity(text: string): number {
    if (text.trim() === '') return 0;

    const measure = this.complexityMeasure;

    let lexical = 0;
    if (measure === 'lexical_density' || measure === 'combined') {
      lexical = Math.min(1, wordStats(text).density / MAX_LEXICAL_DENSITY);
    }

    let sentenceLength = 0;
    if (measure === 'sentence_length' || measure === 'combined') {
      const sentences = splitSentences(text);
      if (sentences.length > 0) {
        const avg = sentences.reduce((sum, s) => sum + s.length, 0) / sentences.length;
        sentenceLength = Math.min(1, avg / MAX_SENTENCE_LENGTH);
      }
    }

    if (measure === 'combined') return (lexical + sentenceLength) / 2;
    return measure === 'lexical_density' ? lexical : sentenceLength;
  }

  targetSizeFor(complexity: number): number {
    return this.maxChunkSize - complexity * (this.maxChunkSize - this.minChunkSize);
  }

  targetOverlapFor(complexity: number): number {
    return this.minChunkOverlap + complexity * (this.maxChunkOverlap - this.minChunkOverlap);
  }

  /**
   * Greedy sentence accumulation against a complexity-driven size budget.
   *
   * Chunk length counts the single spaces the sentences are joined with.
   */
  splitAdaptive(text: string): AdaptiveSplit[] {
    const splits: AdaptiveSplit[] = [];
    let current: string[] = [];
    let complexity = 0;
    let target = this.maxChunkSize;

    const joinedLength = (sentences: string[]): number =>
      sentences.reduce((sum, s) => sum + s.length, 0) + Math.max(0, sentences.length - 1);

    const emit = (sentences: string[], score: number, budget: number): void => {
      splits.push({ text: sentences.join(' '), sentences, complexity: score, targetSize: budget });
    };

    for (const sentence of splitSentences(text)) {
      const score = this.analyzeComplexity(sentence);
      const closedComplexity = complexity;
      const closedTarget = target;
      complexity = current.length > 0 ? (complexity + score) / 2 : score;
      target = this.targetSizeFor(complexity);
      const targetOverlap = this.targetOverlapFor(complexity);

      if (current.length > 0 && joinedLength([...current, sentence]) > target) {
        emit(current, closedComplexity, closedTarget);

        // Carry trailing sentences that fit the overlap budget.
        const overlap: string[] = [];
        let overlapSize = 0;
        for (let i = current.length - 1; i >= 0; i--) {
          const prev = current[i];
          if (prev === undefined || overlapSize + prev.length > targetOverlap) break;
          overlap.unshift(prev);
          overlapSize += prev.length;
        }

        // Overlap never pushes the new chunk past its budget.
        while (overlap.length > 0 && joinedLength([...overlap, sentence]) > target) {
          overlap.shift();
        }

        current = [...overlap, sentence];
      } else {
        current.push(sentence);
      }
    }

    if (current.length > 0) emit(current, complexity, target);

    return splits;
  }

  async splitText(text: string): Promise<string[]> {
    return this.splitAdaptive(text).map((s) => s.text);
  }
}

/**
 * Adaptive chunking with complexity metadata.
 *
 * text_complexity is re-scored on the whole chunk; avg_chunk_size and size_vs_avg compare
 * each chunk with the run's mean size.
 */
export async function performAdaptiveChunking(
  document: string,
  options?: z.input<typeof AdaptiveOptionsSchema>,
  logger: Logger = silentLogger,
): Promise<Array<ChunkRecord<AdaptiveChunkMetadata>>> {
  const splitter = new AdaptiveTextSplitter(options);
  const splits = splitter.splitAdaptive(document);
  logger.info(`Document split into ${splits.length} adaptive chunks`);

  const texts = splits.map((s) => s.text);
  const avg = texts.length > 0 ? texts.reduce((sum, t) => sum + t.length, 0) / texts.length : 0;

  return buildChunkRecords(texts, 'adaptive', (chunk, i) => ({
    text_complexity: roundTo(splitter.analyzeComplexity(chunk), 3),
    target_size: Math.round(splits[i]?.targetSize ?? splitter.maxChunkSize),
    sentence_count: splits[i]?.sentences.length ?? 0,
    avg_chunk_size: roundTo(avg, 1),
    size_vs_avg: avg === 0 ? 0 : roundTo(chunk.length / avg, 2),
  }));
}
