import 'dotenv/config';
import { z } from 'zod';

import { ConfigError } from './errors.js';

/**
 * Runtime environment schema validation.
 *
 * Goals:
 * - Fail fast with a clear error when configuration is invalid.
 * - Keep environment parsing centralized (single source of truth).
 *
 * Notes:
 * - CHUNKING_LLM selects the model behind the AI-driven and context-enriched chunkers.
 *   "mock" (default) keeps every script offline.
 * - OPENAI_API_KEY is only required when CHUNKING_LLM is "openai".
 */
const EnvSchema = z
  .object({
    CHUNKING_LLM: z.enum(['mock', 'openai']).default('mock'),
    OPENAI_API_KEY: z.string().min(1).optional(),
    OPENAI_MODEL: z.string().min(1).default('gpt-4o-mini'),
    DOCS_DIR: z.string().min(1).default('docs/chunking'),
  })
  .superRefine((value, ctx) => {
    if (value.CHUNKING_LLM === 'openai' && !value.OPENAI_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['OPENAI_API_KEY'],
        message: 'required when CHUNKING_LLM=openai',
      });
    }
  });

export type Env = z.infer<typeof EnvSchema>;

/**
 * Parses an environment record, treating empty strings as unset.
 * @throws ConfigError listing every invalid variable.
 */
export function parseEnv(source: Record<string, string | undefined>): Env {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(source)) {
    if (value !== undefined && value.trim() !== '') cleaned[key] = value;
  }

  const result = EnvSchema.safeParse(cleaned);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigError('Invalid environment configuration', issues);
  }
  return result.data;
}

/**
 * Parsed and validated environment configuration.
 * Access this object instead of process.env directly throughout the codebase.
 */
export const env = parseEnv(process.env);
