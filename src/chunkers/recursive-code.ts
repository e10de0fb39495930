import type { SupportedTextSplitterLanguage } from '@langchain/textsplitters';
import type { z } from 'zod';

import { CodeOptionsSchema, parseOptions } from '../core/config.js';
import type { Logger } from '../core/logger.js';
import { silentLogger } from '../core/logger.js';
import type { BaseChunkMetadata, ChunkRecord, ChunkType } from '../core/metadata.js';
import { buildChunkRecords } from '../core/metadata.js';
import { createLanguageSplitter, createRecursiveSplitter } from '../core/splitter.js';

export type CodeLanguage = 'python' | 'javascript' | 'java' | 'go' | 'rust';

export type CodeStructureType = Extract<ChunkType, 'function' | 'class' | 'import' | 'code_segment'>;

export type CodeChunkMetadata = BaseChunkMetadata & {
  chunk_type: CodeStructureType;
  language: string;
  structure_name: string;
  lines: number;
};

interface StructurePatterns {
  function: RegExp;
  class: RegExp;
  import: RegExp;
}

const SPLITTER_LANGUAGES: Record<CodeLanguage, SupportedTextSplitterLanguage> = {
  python: 'python',
  javascript: 'js',
  java: 'java',
  go: 'go',
  rust: 'rust',
};

const PYTHON_PATTERNS: StructurePatterns = {
  function: /def\s+([a-zA-Z_][a-zA-Z0-9_]*)\s*\(/,
  class: /class\s+([a-zA-Z_][a-zA-Z0-9_]*)/,
  import: /import\s+([a-zA-Z_][a-zA-Z0-9_.]*)/,
};

const STRUCTURE_PATTERNS: Record<CodeLanguage, StructurePatterns> = {
  python: PYTHON_PATTERNS,
  javascript: {
    function: /function\s*\*?\s+([A-Za-z_$][\w$]*)\s*\(/,
    class: /class\s+([A-Za-z_$][\w$]*)/,
    import: /import\s+(?:.+?\s+from\s+)?['"]([^'"]+)['"]/,
  },
  java: {
    function: /(?:public|protected|private|static)\s+[\w<>[\],\s]*?\s([a-zA-Z_]\w*)\s*\([^)]*\)\s*(?:throws\s+[\w.,\s]+)?\{/,
    class: /(?:class|interface|enum)\s+([A-Za-z_]\w*)/,
    import: /import\s+(?:static\s+)?([\w.]+)/,
  },
  go: {
    function: /func\s+(?:\([^)]*\)\s*)?([A-Za-z_]\w*)\s*\(/,
    class: /type\s+([A-Za-z_]\w*)\s+(?:struct|interface)/,
    import: /import\s+(?:\(\s*)?"([^"]+)"/,
  },
  rust: {
    function: /fn\s+([A-Za-z_]\w*)/,
    class: /(?:struct|enum|trait)\s+([A-Za-z_]\w*)/,
    import: /use\s+([\w:]+)/,
  },
};

/** Separators for languages the splitter has no preset for. */
export const GENERIC_CODE_SEPARATORS = ['\nclass ', '\ndef ', '\n\n', '\n', ' ', ''];

function isCodeLanguage(language: string): language is CodeLanguage {
  return Object.prototype.hasOwnProperty.call(SPLITTER_LANGUAGES, language);
}

export interface CodeStructure {
  type: CodeStructureType;
  name: string | null;
}

/**
 * Classifies a code chunk by the first structure it declares: function, then class,
 * then import. Unknown languages use the Python patterns.
 */
export function detectStructure(chunk: string, language: string): CodeStructure {
  const key = language.toLowerCase();
  const patterns = isCodeLanguage(key) ? STRUCTURE_PATTERNS[key] : PYTHON_PATTERNS;

  for (const type of ['function', 'class', 'import'] as const) {
    const name = patterns[type].exec(chunk)?.[1];
    if (name !== undefined) return { type, name };
  }
  return { type: 'code_segment', name: null };
}

/**
 * Recursive, language-aware chunking for source code.
 *
 * Known languages use LangChain's per-language separators (class and function
 * boundaries first); other languages fall back to GENERIC_CODE_SEPARATORS.
 */
export async function performCodeChunking(
  code: string,
  options?: z.input<typeof CodeOptionsSchema>,
  logger: Logger = silentLogger,
): Promise<Array<ChunkRecord<CodeChunkMetadata>>> {
  const opts = parseOptions(CodeOptionsSchema, options, 'code');
  const key = opts.language.toLowerCase();

  const splitter = isCodeLanguage(key)
    ? createLanguageSplitter(SPLITTER_LANGUAGES[key], opts.chunkSize, opts.chunkOverlap)
    : createRecursiveSplitter(opts.chunkSize, opts.chunkOverlap, GENERIC_CODE_SEPARATORS);

  const chunks = await splitter.splitText(code);
  logger.info(`Code document split into ${chunks.length} chunks`);

  const structures = chunks.map((chunk) => detectStructure(chunk, key));

  return buildChunkRecords(
    chunks,
    (_chunk, i) => structures[i]?.type ?? 'code_segment',
    (chunk, i) => ({
      chunk_type: structures[i]?.type ?? 'code_segment',
      language: opts.language,
      structure_name: structures[i]?.name ?? `segment_${i}`,
      lines: chunk.split('\n').length,
    }),
  );
}
