/**
 * Lexical helpers shared by the chunkers: word and sentence extraction,
 * rounding for metadata and chunk offset lookup.
 */

const WORD_PATTERN = /\b\w+\b/g;
const HEADING_PATTERN = /^#{1,6}[ \t]+(.+?)[ \t]*#*[ \t]*$/gm;

/**
 * Lowercased word tokens (runs of letters, digits and underscores).
 */
export function extractWords(text: string): string[] {
  return text.toLowerCase().match(WORD_PATTERN) ?? [];
}

export interface WordStats {
  wordCount: number;
  uniqueWords: number;
  /** unique / total, 0 when there are no words */
  density: number;
}

export function wordStats(text: string): WordStats {
  const words = extractWords(text);
  const uniqueWords = new Set(words).size;
  return {
    wordCount: words.length,
    uniqueWords,
    density: words.length === 0 ? 0 : uniqueWords / words.length,
  };
}

/**
 * Splits text into sentences after `.`, `!` or `?` followed by whitespace.
 * Sentences are trimmed; blank ones are dropped.
 */
export function splitSentences(text: string): string[] {
  return text
    .split(/(?<=[.!?])\s+/)
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

export function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

/**
 * Finds the start offset of each chunk in the source document.
 *
 * Chunks are searched in order, each one after the previous chunk's start, so repeated
 * text resolves to the right occurrence. A chunk the splitter rewrote (for example by
 * dropping empty pieces) is not a substring any more and maps to null.
 */
export function locateChunks(document: string, chunks: string[]): Array<number | null> {
  let cursor = 0;
  return chunks.map((chunk) => {
    const index = document.indexOf(chunk, cursor);
    if (index === -1) return null;
    cursor = index + 1;
    return index;
  });
}

export interface Heading {
  offset: number;
  title: string;
}

/**
 * Markdown ATX headings with their offsets, in document order.
 */
export function findHeadings(document: string): Heading[] {
  const headings: Heading[] = [];
  for (const match of document.matchAll(HEADING_PATTERN)) {
    const title = match[1];
    if (match.index !== undefined && title !== undefined) {
      headings.push({ offset: match.index, title });
    }
  }
  return headings;
}
