import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import { ChatOpenAI } from '@langchain/openai';

import type { Env } from './env.js';

export interface ChatModelOptions {
  temperature?: number;
  maxTokens?: number;
}

/**
 * Creates the chat model used by the AI-driven and context-enriched chunkers.
 *
 * Returns null when CHUNKING_LLM is "mock"; callers then take their offline path.
 */
export function createChatModel(config: Env, options: ChatModelOptions = {}): BaseChatModel | null {
  if (config.CHUNKING_LLM === 'mock') return null;

  return new ChatOpenAI({
    apiKey: config.OPENAI_API_KEY,
    model: config.OPENAI_MODEL,
    temperature: options.temperature ?? 0.1,
    maxTokens: options.maxTokens,
  });
}
