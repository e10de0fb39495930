import { access } from 'node:fs/promises';
import path from 'node:path';

import { TextLoader } from '@langchain/classic/document_loaders/fs/text';

import { DocumentLoadError, toError } from './errors.js';

/**
 * Loads a text or markdown document for chunking.
 *
 * Responsibilities:
 * - Read the file through LangChain's TextLoader (one Document per file).
 * - Reject missing files and blank documents; both abort the run.
 *
 * @param filePath Path to the input document.
 * @returns The document text.
 */
export async function loadDocument(filePath: string): Promise<string> {
  const resolved = path.resolve(filePath);

  try {
    await access(resolved);
  } catch {
    throw new DocumentLoadError(filePath, 'file does not exist');
  }

  let text: string;
  try {
    const docs = await new TextLoader(resolved).load();
    text = docs.map((d) => d.pageContent).join('');
  } catch (err: unknown) {
    throw new DocumentLoadError(filePath, toError(err).message);
  }

  if (text.trim() === '') {
    throw new DocumentLoadError(filePath, 'document is empty');
  }

  return text;
}
