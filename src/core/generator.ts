import { readFileSync } from 'node:fs';
import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { z } from 'zod';

import { parseOptions } from './config.js';

/**
 * Synthetic markdown test document.
 *
 * The document mixes generated technical-sounding prose, lists and section separators with a
 * handful of "target facts" (needles) so chunk boundaries and retrieval can be checked by eye.
 */

const VocabularySchema = z.object({
  words: z.array(z.string()).min(1),
  verbs: z.array(z.string()).min(1),
  adjectives: z.array(z.string()).min(1),
  targetFacts: z.array(z.string()),
});

export type Vocabulary = z.infer<typeof VocabularySchema>;

const VOCABULARY_URL = new URL('../../data/vocabulary.json', import.meta.url);

export function loadVocabulary(): Vocabulary {
  return VocabularySchema.parse(JSON.parse(readFileSync(VOCABULARY_URL, 'utf-8')));
}

export const GeneratorOptionsSchema = z.object({
  sections: z.number().int().positive().default(5),
  maxParagraphsPerSection: z.number().int().min(2).default(4),
  maxSentencesPerParagraph: z.number().int().min(3).default(8),
});

export type GeneratorOptions = z.input<typeof GeneratorOptionsSchema>;

/** Returns a float in [0, 1), like Math.random. */
export type RandomSource = () => number;

export interface GeneratedDocument {
  markdown: string;
  injectedFacts: string[];
}

function randInt(random: RandomSource, min: number, max: number): number {
  return min + Math.floor(random() * (max - min + 1));
}

function pick<T>(random: RandomSource, items: readonly T[]): T {
  const item = items[Math.floor(random() * items.length)];
  if (item === undefined) throw new RangeError('cannot pick from an empty list');
  return item;
}

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}

/**
 * Generates the sample document.
 *
 * @param random Injected for deterministic output in tests.
 */
export function generateTestDocument(
  options: GeneratorOptions = {},
  random: RandomSource = Math.random,
  vocabulary: Vocabulary = loadVocabulary(),
): GeneratedDocument {
  const opts = parseOptions(GeneratorOptionsSchema, options, 'generator');
  const { words, verbs, adjectives, targetFacts } = vocabulary;

  const sentence = (): string => {
    const length = randInt(random, 5, 12);
    const parts: string[] = [];
    for (let i = 0; i < length; i++) {
      parts.push(i % 2 === 0 ? pick(random, words) : pick(random, adjectives));
    }
    parts.splice(1, 0, pick(random, verbs));
    return `${capitalize(parts.join(' '))}. `;
  };

  const paragraph = (): string => {
    const count = randInt(random, 3, opts.maxSentencesPerParagraph);
    let text = '';
    for (let i = 0; i < count; i++) text += sentence();
    return text;
  };

  const list = (numbered: boolean): string => {
    const count = randInt(random, 3, 6);
    let text = '';
    for (let i = 1; i <= count; i++) {
      const prefix = numbered ? `${i}. ` : '* ';
      text += `${prefix}${sentence().trim()}\n`;
    }
    return `${text}\n`;
  };

  let markdown = '# RAG Chunking Test Document\n\n';
  markdown +=
    'This document contains synthetic data and specific target facts to test retrieval and chunking strategies.\n\n';

  const injectedFacts: string[] = [];

  for (let section = 1; section <= opts.sections; section++) {
    const adjective = capitalize(pick(random, adjectives));
    const noun = capitalize(pick(random, words));
    markdown += `## Section ${section}: ${adjective} ${noun}\n\n`;

    const paragraphs = randInt(random, 2, opts.maxParagraphsPerSection);
    for (let p = 0; p < paragraphs; p++) {
      const fact = targetFacts[injectedFacts.length];
      if (fact !== undefined && random() > 0.6) {
        const text = paragraph();
        const insertAt = Math.floor(text.length / 2);
        markdown += `${text.slice(0, insertAt)} [TARGET FACT: ${fact}] ${text.slice(insertAt)}\n\n`;
        injectedFacts.push(fact);
      } else {
        markdown += `${paragraph()}\n\n`;
      }
    }

    if (random() > 0.5) {
      markdown += `### Key Components of Section ${section}\n\n`;
      markdown += list(pick(random, [true, false]));
    }

    markdown += '---\n\n';
  }

  return { markdown, injectedFacts };
}

/**
 * Generates the sample document and writes it to disk.
 */
export async function writeTestDocument(
  filePath: string,
  options: GeneratorOptions = {},
  random: RandomSource = Math.random,
): Promise<GeneratedDocument> {
  const generated = generateTestDocument(options, random);
  await mkdir(path.dirname(filePath), { recursive: true });
  await writeFile(filePath, generated.markdown, 'utf-8');
  return generated;
}
