import { Document } from '@langchain/core/documents';

/**
 * Chunk metadata is flat: values must be primitive types (or null).
 * Output files and downstream vector stores expect one level of keys.
 */
export type MetadataValue = string | number | boolean | null;

/** Every chunk_type a strategy can emit. */
export type ChunkType =
  | 'fixed-size'
  | 'semantic'
  | 'adaptive'
  | 'ai_driven'
  | 'mock_ai_driven'
  | 'fallback'
  | 'context_enriched'
  | 'function'
  | 'class'
  | 'import'
  | 'code_segment';

/**
 * Fields present on every chunk record.
 * chunk_id is a 0-based index matching output order; total_chunks is the record count of the run.
 */
export type BaseChunkMetadata = {
  chunk_id: number;
  total_chunks: number;
  chunk_size: number;
  chunk_type: ChunkType;
};

/** A chunk's text plus its metadata mapping. */
export type ChunkRecord<M extends BaseChunkMetadata = BaseChunkMetadata> = Document<M>;

/**
 * Type guard for values that are directly acceptable as metadata.
 */
function isPrimitive(value: unknown): value is MetadataValue {
  return (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean'
  );
}

/**
 * Converts an unknown value to a stable, meaningful string.
 * Errors keep their stack; objects and arrays become JSON.
 */
function safeToString(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);

  if (value instanceof Error) {
    return value.stack ?? value.message;
  }

  try {
    const json = JSON.stringify(value);
    return json === undefined ? String(value) : json;
  } catch {
    return Object.prototype.toString.call(value);
  }
}

/**
 * Flattens a metadata object.
 *
 * Behavior:
 * - Drops keys with `undefined` values.
 * - Keeps primitive values as-is (string/number/boolean/null).
 * - Stringifies non-primitive values (objects/arrays/errors) using safeToString().
 */
export function sanitizeMetadata(input: Record<string, unknown>): Record<string, MetadataValue> {
  const out: Record<string, MetadataValue> = {};

  for (const [key, value] of Object.entries(input)) {
    if (value === undefined) continue;

    if (isPrimitive(value)) {
      out[key] = value;
      continue;
    }

    out[key] = safeToString(value);
  }

  return out;
}

/**
 * Base metadata for the chunk at `index` of a run that produced `total` chunks.
 */
export function baseMetadata(
  index: number,
  total: number,
  size: number,
  chunkType: ChunkType,
): BaseChunkMetadata {
  return {
    chunk_id: index,
    total_chunks: total,
    chunk_size: size,
    chunk_type: chunkType,
  };
}

/**
 * Wraps split texts into chunk records.
 *
 * @param chunks Split texts, in output order.
 * @param chunkType A fixed type, or a function deciding it per chunk.
 * @param enrich Strategy-specific fields for each chunk.
 */
export function buildChunkRecords<E extends Record<string, MetadataValue>>(
  chunks: string[],
  chunkType: ChunkType | ((chunk: string, index: number) => ChunkType),
  enrich: (chunk: string, index: number) => E,
): Array<ChunkRecord<BaseChunkMetadata & E>> {
  return chunks.map((chunk, i) => {
    const type = typeof chunkType === 'function' ? chunkType(chunk, i) : chunkType;
    const metadata: BaseChunkMetadata & E = {
      ...baseMetadata(i, chunks.length, chunk.length, type),
      ...enrich(chunk, i),
    };
    return new Document({ pageContent: chunk, metadata });
  });
}
