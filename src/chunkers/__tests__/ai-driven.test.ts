import { FakeListChatModel } from '@langchain/core/utils/testing';
import { describe, expect, it, vi } from 'vitest';

import { ConfigError, LlmOutputParseError } from '../../core/errors.js';
import {
  limitChunkCount,
  parseChunkArray,
  performAiDrivenChunking,
  performMockAiDrivenChunking,
} from '../ai-driven.js';

describe('parseChunkArray', () => {
  it('should read an array inside a code fence', () => {
    expect(parseChunkArray('```json\n["a", "b"]\n```')).toEqual(['a', 'b']);
  });

  it('should read an array surrounded by prose', () => {
    expect(parseChunkArray('Here you go: ["only chunk"] Hope that helps.')).toEqual(['only chunk']);
  });

  it('should pick the chunk array over a quoted bracketed string', () => {
    const output = 'The format is ["chunk"], so here they are: ["First part.", "Second part."]';
    expect(parseChunkArray(output)).toEqual(['First part.', 'Second part.']);
  });

  it('should keep brackets inside chunk text', () => {
    expect(parseChunkArray('["See [1] for details.", "Then go on."]')).toEqual([
      'See [1] for details.',
      'Then go on.',
    ]);
  });

  it('should keep the raw output on invalid JSON', () => {
    try {
      parseChunkArray('not json at all');
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(LlmOutputParseError);
      if (err instanceof LlmOutputParseError) {
        expect(err.rawOutput).toBe('not json at all');
        expect(err.message).toMatch(/^Could not parse chunks from model output: invalid JSON \(/);
      }
    }
  });

  it('should reject an empty array', () => {
    expect(() => parseChunkArray('[]')).toThrow(
      'Could not parse chunks from model output: the array contains no chunks',
    );
  });

  it('should reject non-string items', () => {
    expect(() => parseChunkArray('[1, 2]')).toThrow(
      'Could not parse chunks from model output: every chunk must be a non-empty string',
    );
  });

  it('should reject non-array JSON', () => {
    expect(() => parseChunkArray('{"a": 1}')).toThrow(
      'Could not parse chunks from model output: expected a JSON array of strings',
    );
  });
});

describe('limitChunkCount', () => {
  it('should leave short lists untouched', () => {
    expect(limitChunkCount(['a', 'b'], 2)).toEqual(['a', 'b']);
  });

  it('should merge consecutive chunks into groups', () => {
    expect(limitChunkCount(['a', 'b', 'c', 'd', 'e'], 2)).toEqual(['a\n\nb\n\nc', 'd\n\ne']);
  });
});

describe('performAiDrivenChunking', () => {
  it('should analyse the chunks returned by the model', async () => {
    const model = new FakeListChatModel({
      responses: ['["First idea here.", "Second idea, second idea."]'],
    });

    const records = await performAiDrivenChunking('irrelevant', model);

    expect(records.map((r) => r.pageContent)).toEqual([
      'First idea here.',
      'Second idea, second idea.',
    ]);
    expect(records.map((r) => r.metadata)).toEqual([
      {
        chunk_id: 0,
        total_chunks: 2,
        chunk_size: 16,
        chunk_type: 'ai_driven',
        document_position: 0,
        word_count: 3,
        unique_words: 3,
        word_density: 1,
      },
      {
        chunk_id: 1,
        total_chunks: 2,
        chunk_size: 25,
        chunk_type: 'ai_driven',
        document_position: 0.5,
        word_count: 4,
        unique_words: 2,
        word_density: 0.5,
      },
    ]);
  });

  it('should fall back to recursive chunking on malformed output', async () => {
    const model = new FakeListChatModel({ responses: ['not json at all'] });
    const warn = vi.fn();
    const logger = { info: vi.fn(), warn };
    const document = 'First paragraph.\n\nSecond paragraph.';

    const records = await performAiDrivenChunking(document, model, {}, logger);

    expect(records).toHaveLength(1);
    expect(records[0]?.pageContent).toBe(document);
    expect(records[0]?.metadata).toEqual({
      chunk_id: 0,
      total_chunks: 1,
      chunk_size: 35,
      chunk_type: 'fallback',
      document_position: 0,
    });

    const firstWarning = String(warn.mock.calls[0]?.[0]);
    expect(firstWarning).toMatch(
      /^LLM chunking failed: Could not parse chunks from model output: invalid JSON/,
    );
    expect(warn).toHaveBeenCalledWith('Falling back to recursive chunking');
  });

  it('should rethrow when fallback is disabled', async () => {
    const model = new FakeListChatModel({ responses: ['[]'] });

    await expect(
      performAiDrivenChunking('Some text.', model, { fallback: false }),
    ).rejects.toBeInstanceOf(LlmOutputParseError);
  });

  it('should reject fallback bounds before calling the model', async () => {
    const model = new FakeListChatModel({ responses: ['nope'] });
    const invoke = vi.spyOn(model, 'invoke');

    await expect(
      performAiDrivenChunking('Some text.', model, {
        fallbackChunkSize: 10,
        fallbackChunkOverlap: 50,
      }),
    ).rejects.toBeInstanceOf(ConfigError);
    expect(invoke).not.toHaveBeenCalled();
  });

  it('should regroup model output to respect maxChunks', async () => {
    const model = new FakeListChatModel({ responses: ['["a", "b", "c"]'] });

    const records = await performAiDrivenChunking('a b c', model, { maxChunks: 2 });

    expect(records.map((r) => r.pageContent)).toEqual(['a\n\nb', 'c']);
  });
});

describe('performMockAiDrivenChunking', () => {
  it('should merge paragraphs under the target length', () => {
    const records = performMockAiDrivenChunking(
      'Para one is here.\n\nPara two is here.\n\n\n\nPara three.',
      { targetLength: 30, maxChunks: 2 },
    );

    expect(records.map((r) => r.pageContent)).toEqual([
      'Para one is here.\n\nPara two is here.',
      'Para three.',
    ]);
    expect(records.map((r) => r.metadata.chunk_type)).toEqual(['mock_ai_driven', 'mock_ai_driven']);
  });

  it('should return no chunks for a blank document', () => {
    expect(performMockAiDrivenChunking('\n\n  \n\n')).toEqual([]);
  });
});
