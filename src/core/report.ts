import type { ChunkRecord } from './metadata.js';
import { roundTo } from './text.js';

export interface ChunkSummary {
  totalChunks: number;
  /** Mean chunk length in characters, one decimal */
  averageSize: number;
  minSize: number;
  maxSize: number;
  /** Number of chunks per chunk_type, in first-seen order */
  typeCounts: Record<string, number>;
}

/**
 * Aggregate statistics printed at the end of each CLI run.
 * Sizes are measured on pageContent; an empty run reports zeros.
 */
export function summarizeChunks(records: ChunkRecord[]): ChunkSummary {
  if (records.length === 0) {
    return { totalChunks: 0, averageSize: 0, minSize: 0, maxSize: 0, typeCounts: {} };
  }

  const sizes = records.map((r) => r.pageContent.length);
  const typeCounts: Record<string, number> = {};
  for (const r of records) {
    const type = r.metadata.chunk_type;
    typeCounts[type] = (typeCounts[type] ?? 0) + 1;
  }

  return {
    totalChunks: records.length,
    averageSize: roundTo(sizes.reduce((a, b) => a + b, 0) / sizes.length, 1),
    minSize: Math.min(...sizes),
    maxSize: Math.max(...sizes),
    typeCounts,
  };
}

/**
 * Console lines for a summary, shared by the CLI scripts.
 */
export function formatSummary(summary: ChunkSummary): string[] {
  const lines = [
    `Total chunks: ${summary.totalChunks}`,
    `Average chunk size: ${summary.averageSize.toFixed(1)} characters`,
    `Min chunk size: ${summary.minSize} characters`,
    `Max chunk size: ${summary.maxSize} characters`,
  ];
  for (const [type, count] of Object.entries(summary.typeCounts)) {
    lines.push(`${type}: ${count} chunks`);
  }
  return lines;
}
