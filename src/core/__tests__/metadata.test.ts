import { describe, expect, it } from 'vitest';

import { buildChunkRecords, sanitizeMetadata } from '../metadata.js';

describe('sanitizeMetadata', () => {
  it('should keep primitives, drop undefined and stringify the rest', () => {
    expect(
      sanitizeMetadata({
        a: 1,
        b: undefined,
        c: { x: 1 },
        d: [1, 2],
        e: null,
        f: 's',
        g: true,
      }),
    ).toEqual({ a: 1, c: '{"x":1}', d: '[1,2]', e: null, f: 's', g: true });
  });

  it('should keep the error message for errors', () => {
    const out = sanitizeMetadata({ err: new Error('exploded') });
    expect(typeof out.err).toBe('string');
    expect(String(out.err)).toContain('exploded');
  });
});

describe('buildChunkRecords', () => {
  it('should assign sequential ids and the run total', () => {
    const records = buildChunkRecords(['aa', 'bbb'], 'semantic', (_c, i) => ({ even: i % 2 === 0 }));

    expect(records.map((r) => r.pageContent)).toEqual(['aa', 'bbb']);
    expect(records.map((r) => r.metadata)).toEqual([
      { chunk_id: 0, total_chunks: 2, chunk_size: 2, chunk_type: 'semantic', even: true },
      { chunk_id: 1, total_chunks: 2, chunk_size: 3, chunk_type: 'semantic', even: false },
    ]);
  });

  it('should decide the chunk type per chunk when given a function', () => {
    const records = buildChunkRecords(
      ['def f():', 'x = 1'],
      (chunk) => (chunk.startsWith('def') ? 'function' : 'code_segment'),
      () => ({}),
    );
    expect(records.map((r) => r.metadata.chunk_type)).toEqual(['function', 'code_segment']);
  });
});
