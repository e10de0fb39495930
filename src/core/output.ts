import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';

import type { ChunkRecord } from './metadata.js';
import { sanitizeMetadata } from './metadata.js';

export interface ChunkOutputOptions {
  /** Append a `Metadata:` JSON block after each chunk (default true). */
  includeMetadata?: boolean;
}

/**
 * Renders chunk records into the plain-text result format:
 *
 *   --- Chunk <i> ---
 *
 *   <content>
 *
 *   Metadata:
 *   { ...4-space indented JSON... }
 */
export function formatChunkOutput(records: ChunkRecord[], options: ChunkOutputOptions = {}): string {
  const includeMetadata = options.includeMetadata ?? true;

  return records
    .map((record, i) => {
      let block = `--- Chunk ${i} ---\n\n${record.pageContent}\n\n`;
      if (includeMetadata) {
        const metadata = sanitizeMetadata(record.metadata);
        block += `Metadata:\n${JSON.stringify(metadata, null, 4)}\n\n`;
      }
      return block;
    })
    .join('');
}

/**
 * Writes formatted chunk records to disk, creating the parent directory first.
 */
export async function writeChunkOutput(
  filePath: string,
  records: ChunkRecord[],
  options: ChunkOutputOptions = {},
): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true });
  await writeFile(filePath, formatChunkOutput(records, options), 'utf-8');
}
