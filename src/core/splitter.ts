import {
  CharacterTextSplitter,
  RecursiveCharacterTextSplitter,
  type SupportedTextSplitterLanguage,
} from '@langchain/textsplitters';

/**
 * Factories for the library splitters the strategies are built on.
 *
 * Overlap notes:
 * - LangChain merges whole pieces (paragraphs, lines, words) up to chunkSize and carries
 *   trailing pieces forward as overlap, so the overlap is at most chunkOverlap characters
 *   and is skipped when a single piece is larger than that.
 * - Chunks are trimmed, so they are substrings of the source but not a lossless partition.
 */

/** Separator hierarchy for prose: paragraphs, lines, sentences, words, characters. */
export const PROSE_SEPARATORS = ['\n\n', '\n', '. ', ' ', ''];

/**
 * Splits on blank lines only; pieces longer than chunkSize stay whole.
 */
export function createParagraphSplitter(chunkSize: number, chunkOverlap: number): CharacterTextSplitter {
  return new CharacterTextSplitter({
    separator: '\n\n',
    chunkSize,
    chunkOverlap,
  });
}

/**
 * Recursive splitter walking the separator list from coarse to fine.
 */
export function createRecursiveSplitter(
  chunkSize: number,
  chunkOverlap: number,
  separators: string[] = PROSE_SEPARATORS,
): RecursiveCharacterTextSplitter {
  return new RecursiveCharacterTextSplitter({
    chunkSize,
    chunkOverlap,
    separators,
  });
}

/**
 * Language-aware splitter using LangChain's built-in separators for that language.
 */
export function createLanguageSplitter(
  language: SupportedTextSplitterLanguage,
  chunkSize: number,
  chunkOverlap: number,
): RecursiveCharacterTextSplitter {
  return RecursiveCharacterTextSplitter.fromLanguage(language, {
    chunkSize,
    chunkOverlap,
  });
}
