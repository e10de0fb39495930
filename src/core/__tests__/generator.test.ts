import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterAll, describe, expect, it } from 'vitest';

import { ConfigError } from '../errors.js';
import { generateTestDocument, loadVocabulary, writeTestDocument } from '../generator.js';

const TEST_DIR = mkdtempSync(join(tmpdir(), 'chunk-generator-test-'));

afterAll(() => {
  rmSync(TEST_DIR, { recursive: true, force: true });
});

const low = () => 0;
const high = () => 0.99;

describe('loadVocabulary', () => {
  it('should load the word lists and target facts', () => {
    const vocabulary = loadVocabulary();
    expect(vocabulary.words[0]).toBe('data');
    expect(vocabulary.targetFacts).toHaveLength(5);
  });
});

describe('generateTestDocument', () => {
  it('should build a deterministic document from the random source', () => {
    const sentence = 'Data manages distributed data distributed data. ';
    const paragraph = sentence.repeat(3);

    const { markdown, injectedFacts } = generateTestDocument({ sections: 1 }, low);

    expect(markdown).toBe(
      '# RAG Chunking Test Document\n\n' +
        'This document contains synthetic data and specific target facts to test retrieval and chunking strategies.\n\n' +
        '## Section 1: Distributed Data\n\n' +
        `${paragraph}\n\n` +
        `${paragraph}\n\n` +
        '---\n\n',
    );
    expect(injectedFacts).toEqual([]);
  });

  it('should inject every target fact once in order', () => {
    const { markdown, injectedFacts } = generateTestDocument({}, high);

    expect(injectedFacts).toEqual(loadVocabulary().targetFacts);
    expect(markdown).toContain("[TARGET FACT: The staging database password is 'test-secret'.]");
    expect(markdown.split('[TARGET FACT:')).toHaveLength(6);
  });

  it('should add bulleted key component lists', () => {
    const { markdown } = generateTestDocument({ sections: 2 }, high);

    expect(markdown).toContain('## Section 1: Hybrid Container\n\n');
    expect(markdown).toContain('### Key Components of Section 2\n\n* ');
    expect(markdown.match(/^---$/gm)).toHaveLength(2);
  });

  it('should reject invalid options', () => {
    expect(() => generateTestDocument({ sections: 0 }, low)).toThrow(ConfigError);
  });
});

describe('writeTestDocument', () => {
  it('should write the generated markdown', async () => {
    const target = join(TEST_DIR, 'docs', 'test_doc.md');
    const { markdown } = await writeTestDocument(target, { sections: 1 }, low);

    expect(readFileSync(target, 'utf-8')).toBe(markdown);
  });
});
