import { z } from 'zod';

import { ConfigError } from './errors.js';

/**
 * Option schemas for every chunking strategy.
 *
 * Defaults match the constants the CLI scripts run with. Each schema is parsed through
 * parseOptions() before a chunker touches the document, so invalid bounds fail fast.
 */

const size = z.number().int().positive();
const overlap = z.number().int().nonnegative();

export const FixedSizeOptionsSchema = z
  .object({
    chunkSize: size.default(1000),
    chunkOverlap: overlap.default(200),
    mode: z.enum(['window', 'paragraph']).default('window'),
  })
  .refine((o) => o.chunkOverlap < o.chunkSize, {
    message: 'chunkOverlap must be smaller than chunkSize',
    path: ['chunkOverlap'],
  });

export const SemanticOptionsSchema = z
  .object({
    chunkSize: size.default(800),
    chunkOverlap: overlap.default(100),
    separators: z.array(z.string()).min(1).default(['\n\n', '\n', '. ', ' ', '']),
  })
  .refine((o) => o.chunkOverlap < o.chunkSize, {
    message: 'chunkOverlap must be smaller than chunkSize',
    path: ['chunkOverlap'],
  });

export const ComplexityMeasureSchema = z.enum(['lexical_density', 'sentence_length', 'combined']);
export type ComplexityMeasure = z.infer<typeof ComplexityMeasureSchema>;

export const AdaptiveOptionsSchema = z
  .object({
    minChunkSize: size.default(300),
    maxChunkSize: size.default(1000),
    minChunkOverlap: overlap.default(30),
    maxChunkOverlap: overlap.default(150),
    complexityMeasure: ComplexityMeasureSchema.default('combined'),
  })
  .superRefine((o, ctx) => {
    if (o.minChunkSize > o.maxChunkSize) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['minChunkSize'],
        message: `minChunkSize (${o.minChunkSize}) must not exceed maxChunkSize (${o.maxChunkSize})`,
      });
    }
    if (o.minChunkOverlap > o.maxChunkOverlap) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['minChunkOverlap'],
        message: `minChunkOverlap (${o.minChunkOverlap}) must not exceed maxChunkOverlap (${o.maxChunkOverlap})`,
      });
    }
  });

export const AiDrivenOptionsSchema = z
  .object({
    maxChunks: size.default(20),
    fallbackChunkSize: size.default(1000),
    fallbackChunkOverlap: overlap.default(100),
    /** Use the recursive splitter when the model output cannot be used. */
    fallback: z.boolean().default(true),
  })
  .refine((o) => o.fallbackChunkOverlap < o.fallbackChunkSize, {
    message: 'fallbackChunkOverlap must be smaller than fallbackChunkSize',
    path: ['fallbackChunkOverlap'],
  });

export const MockAiDrivenOptionsSchema = z.object({
  maxChunks: size.default(20),
  /** Paragraphs are merged while the running chunk stays below this length. */
  targetLength: size.default(500),
});

export const ContextEnrichedOptionsSchema = z
  .object({
    chunkSize: size.default(500),
    chunkOverlap: overlap.default(50),
    windowSize: overlap.default(1),
    summarize: z.boolean().default(true),
    separators: z.array(z.string()).min(1).default(['\n\n', '\n', '.', ' ', '']),
  })
  .refine((o) => o.chunkOverlap < o.chunkSize, {
    message: 'chunkOverlap must be smaller than chunkSize',
    path: ['chunkOverlap'],
  });

export const CodeOptionsSchema = z
  .object({
    language: z.string().min(1).default('python'),
    chunkSize: size.default(100),
    chunkOverlap: overlap.default(15),
  })
  .refine((o) => o.chunkOverlap < o.chunkSize, {
    message: 'chunkOverlap must be smaller than chunkSize',
    path: ['chunkOverlap'],
  });

export type FixedSizeOptions = z.infer<typeof FixedSizeOptionsSchema>;
export type SemanticOptions = z.infer<typeof SemanticOptionsSchema>;
export type AdaptiveOptions = z.infer<typeof AdaptiveOptionsSchema>;
export type AiDrivenOptions = z.infer<typeof AiDrivenOptionsSchema>;
export type MockAiDrivenOptions = z.infer<typeof MockAiDrivenOptionsSchema>;
export type ContextEnrichedOptions = z.infer<typeof ContextEnrichedOptionsSchema>;
export type CodeOptions = z.infer<typeof CodeOptionsSchema>;

/**
 * Validates chunker options against a schema, applying defaults.
 *
 * @param label Strategy name used in the error message.
 * @throws ConfigError with one entry per invalid field.
 */
export function parseOptions<S extends z.ZodTypeAny>(
  schema: S,
  input: z.input<S> | undefined,
  label: string,
): z.output<S> {
  const result = schema.safeParse(input ?? {});
  if (!result.success) {
    const issues = result.error.issues.map(
      (i) => `${i.path.length > 0 ? i.path.join('.') : '(root)'}: ${i.message}`,
    );
    throw new ConfigError(`Invalid ${label} options`, issues);
  }
  return result.data;
}
