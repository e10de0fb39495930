import { TextSplitter } from '@langchain/textsplitters';
import type { z } from 'zod';

import { FixedSizeOptionsSchema, parseOptions } from '../core/config.js';
import type { Logger } from '../core/logger.js';
import { silentLogger } from '../core/logger.js';
import type { BaseChunkMetadata, ChunkRecord } from '../core/metadata.js';
import { buildChunkRecords } from '../core/metadata.js';
import { createParagraphSplitter } from '../core/splitter.js';
import { locateChunks } from '../core/text.js';

export type FixedSizeChunkMetadata = BaseChunkMetadata & {
  /** Offset of the chunk in the source; null when the splitter rewrote the text */
  start_index: number | null;
};

export interface TextWindow {
  text: string;
  start: number;
}

/** True when `index` falls between the two halves of a surrogate pair. */
function splitsSurrogatePair(text: string, index: number): boolean {
  const high = text.charCodeAt(index - 1);
  const low = text.charCodeAt(index);
  return high >= 0xd800 && high <= 0xdbff && low >= 0xdc00 && low <= 0xdfff;
}

/**
 * Character-window splitter with an exact overlap.
 *
 * Every window is chunkSize UTF-16 units long except the last, and neighbours share
 * chunkOverlap units. A boundary that would cut a surrogate pair moves by one unit so no
 * chunk holds half a character. Nothing is trimmed.
 */
export class FixedWindowTextSplitter extends TextSplitter {
  constructor(fields: { chunkSize: number; chunkOverlap: number }) {
    super(fields);
  }

  splitWindows(text: string): TextWindow[] {
    const windows: TextWindow[] = [];
    let start = 0;

    while (start < text.length) {
      let end = Math.min(start + this.chunkSize, text.length);
      if (splitsSurrogatePair(text, end)) end += end - 1 > start ? -1 : 1;

      windows.push({ text: text.slice(start, end), start });
      if (end >= text.length) break;

      let next = Math.max(end - this.chunkOverlap, start + 1);
      if (splitsSurrogatePair(text, next)) next += next - 1 > start ? -1 : 1;
      start = next;
    }

    return windows;
  }

  async splitText(text: string): Promise<string[]> {
    return this.splitWindows(text).map((w) => w.text);
  }
}

/**
 * Rebuilds the source from windows by dropping the part of each window already covered.
 */
export function reconstructFromWindows(windows: TextWindow[]): string {
  let text = '';
  for (const window of windows) {
    text += window.text.slice(text.length - window.start);
  }
  return text;
}

/**
 * Splits a document into fixed-size chunks.
 *
 * Modes:
 * - window (default): exact character windows, see FixedWindowTextSplitter.
 * - paragraph: LangChain's CharacterTextSplitter on blank lines. Overlap is made of whole
 *   paragraphs and is skipped entirely when a paragraph is larger than chunkOverlap.
 */
export async function performFixedSizeChunking(
  document: string,
  options?: z.input<typeof FixedSizeOptionsSchema>,
  logger: Logger = silentLogger,
): Promise<Array<ChunkRecord<FixedSizeChunkMetadata>>> {
  const opts = parseOptions(FixedSizeOptionsSchema, options, 'fixed-size');

  let chunks: string[];
  let starts: Array<number | null>;

  if (opts.mode === 'window') {
    const windows = new FixedWindowTextSplitter(opts).splitWindows(document);
    chunks = windows.map((w) => w.text);
    starts = windows.map((w) => w.start);
  } else {
    chunks = await createParagraphSplitter(opts.chunkSize, opts.chunkOverlap).splitText(document);
    starts = locateChunks(document, chunks);
  }

  logger.info(`Document split into ${chunks.length} chunks`);

  return buildChunkRecords(chunks, 'fixed-size', (_chunk, i) => ({
    start_index: starts[i] ?? null,
  }));
}
