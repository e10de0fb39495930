import { ChatOpenAI } from '@langchain/openai';
import { describe, expect, it } from 'vitest';

import { parseEnv } from '../env.js';
import { ConfigError } from '../errors.js';
import { createChatModel } from '../llm.js';

describe('parseEnv', () => {
  it('should default to the offline mock', () => {
    const parsed = parseEnv({});
    expect(parsed.CHUNKING_LLM).toBe('mock');
    expect(parsed.OPENAI_MODEL).toBe('gpt-4o-mini');
    expect(parsed.DOCS_DIR).toBe('docs/chunking');
    expect(parsed.OPENAI_API_KEY).toBeUndefined();
  });

  it('should treat blank values as unset', () => {
    expect(parseEnv({ OPENAI_API_KEY: '  ', DOCS_DIR: '' }).DOCS_DIR).toBe('docs/chunking');
  });

  it('should require an API key for the openai backend', () => {
    expect(() => parseEnv({ CHUNKING_LLM: 'openai' })).toThrow(ConfigError);
    try {
      parseEnv({ CHUNKING_LLM: 'openai' });
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      if (err instanceof ConfigError) {
        expect(err.issues).toEqual(['OPENAI_API_KEY: required when CHUNKING_LLM=openai']);
      }
    }
  });

  it('should reject unknown backends', () => {
    expect(() => parseEnv({ CHUNKING_LLM: 'other' })).toThrow(ConfigError);
  });
});

describe('createChatModel', () => {
  it('should return null for the mock backend', () => {
    expect(createChatModel(parseEnv({}))).toBeNull();
  });

  it('should build an OpenAI chat model when configured', () => {
    const model = createChatModel(parseEnv({ CHUNKING_LLM: 'openai', OPENAI_API_KEY: 'test-key' }));
    expect(model).toBeInstanceOf(ChatOpenAI);
  });
});
