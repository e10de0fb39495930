import { describe, expect, it } from 'vitest';

import { ConfigError } from '../../core/errors.js';
import { detectStructure, performCodeChunking } from '../recursive-code.js';

describe('detectStructure', () => {
  it.each([
    ['def load(path):\n    pass', 'python', { type: 'function', name: 'load' }],
    ["import { a } from './mod.js';", 'javascript', { type: 'import', name: './mod.js' }],
    ['func (s *Server) Start() error {', 'go', { type: 'function', name: 'Start' }],
    ['pub struct Config {', 'rust', { type: 'class', name: 'Config' }],
    ['class Foo:', 'haskell', { type: 'class', name: 'Foo' }],
    ['const x = 1;', 'javascript', { type: 'code_segment', name: null }],
  ])('should classify %j as %s code', (chunk, language, expected) => {
    expect(detectStructure(chunk, language)).toEqual(expected);
  });

  it('should prefer functions over classes in the same chunk', () => {
    expect(detectStructure('class A:\n    def run(self):\n        pass', 'python')).toEqual({
      type: 'function',
      name: 'run',
    });
  });
});

describe('performCodeChunking', () => {
  const PYTHON = 'import os\n\n\ndef greet(name):\n    return name\n\n\nclass Greeter:\n    pass\n';

  it('should split python at definition boundaries', async () => {
    const records = await performCodeChunking(PYTHON, {
      language: 'python',
      chunkSize: 40,
      chunkOverlap: 0,
    });

    expect(records.map((r) => r.pageContent)).toEqual([
      'import os',
      'def greet(name):\n    return name',
      'class Greeter:\n    pass',
    ]);
    expect(
      records.map((r) => [r.metadata.chunk_type, r.metadata.structure_name, r.metadata.lines]),
    ).toEqual([
      ['import', 'os', 1],
      ['function', 'greet', 2],
      ['class', 'Greeter', 2],
    ]);
    expect(records.every((r) => r.metadata.language === 'python')).toBe(true);
  });

  it('should name plain segments by position for unknown languages', async () => {
    const records = await performCodeChunking('x = 1\ny = 2', {
      language: 'elixir',
      chunkSize: 40,
      chunkOverlap: 0,
    });

    expect(records).toHaveLength(1);
    expect(records[0]?.metadata).toEqual({
      chunk_id: 0,
      total_chunks: 1,
      chunk_size: 11,
      chunk_type: 'code_segment',
      language: 'elixir',
      structure_name: 'segment_0',
      lines: 2,
    });
  });

  it('should reject an overlap as large as the chunk size', async () => {
    await expect(
      performCodeChunking(PYTHON, { chunkSize: 10, chunkOverlap: 10 }),
    ).rejects.toBeInstanceOf(ConfigError);
  });
});
