import { describe, expect, it } from 'vitest';

import { ConfigError } from '../../core/errors.js';
import { performSemanticChunking } from '../semantic.js';

const DOC = '# Guide\n\nIntro text here.\n\n## Setup\n\nInstall the tool. Run it now.';

describe('performSemanticChunking', () => {
  it('should split on the coarsest separator that fits', async () => {
    const records = await performSemanticChunking(DOC, { chunkSize: 40, chunkOverlap: 0 });

    expect(records.map((r) => r.pageContent)).toEqual([
      '# Guide\n\nIntro text here.\n\n## Setup',
      'Install the tool. Run it now.',
    ]);
  });

  it('should attach section, density and offsets', async () => {
    const records = await performSemanticChunking(DOC, { chunkSize: 40, chunkOverlap: 0 });

    expect(records.map((r) => r.metadata)).toEqual([
      {
        chunk_id: 0,
        total_chunks: 2,
        chunk_size: 35,
        chunk_type: 'semantic',
        word_count: 5,
        sentence_count: 2,
        semantic_density: 1,
        section: 'Guide',
        start_index: 0,
      },
      {
        chunk_id: 1,
        total_chunks: 2,
        chunk_size: 29,
        chunk_type: 'semantic',
        word_count: 6,
        sentence_count: 2,
        semantic_density: 1,
        section: 'Setup',
        start_index: 37,
      },
    ]);
  });

  it('should leave section empty for documents without headings', async () => {
    const records = await performSemanticChunking('the cat and the dog.');
    expect(records).toHaveLength(1);
    expect(records[0]?.metadata.section).toBeNull();
    expect(records[0]?.metadata.semantic_density).toBe(0.8);
  });

  it('should fail fast on invalid options', async () => {
    await expect(
      performSemanticChunking(DOC, { chunkSize: 50, chunkOverlap: 60 }),
    ).rejects.toBeInstanceOf(ConfigError);
  });
});
