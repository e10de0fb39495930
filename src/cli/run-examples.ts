import { performFixedSizeChunking } from '../chunkers/fixed-size.js';
import { writeTestDocument } from '../core/generator.js';
import { consoleLogger } from '../core/logger.js';
import { writeChunkOutput } from '../core/output.js';
import { outputPath, STRATEGY_DIRS, TEST_DOCUMENT_PATH } from './paths.js';
import { runCli } from './run.js';

/**
 * Quick start: generate the test document, then run fixed-size chunking on it.
 */
async function main(): Promise<void> {
  const { markdown, injectedFacts } = await writeTestDocument(TEST_DOCUMENT_PATH);
  console.log(`Generated '${TEST_DOCUMENT_PATH}' with ${injectedFacts.length} target facts.`);

  const records = await performFixedSizeChunking(markdown, {}, consoleLogger);
  await writeChunkOutput(outputPath('fixedSize'), records, { includeMetadata: false });

  console.log(`Generated document: ${TEST_DOCUMENT_PATH}`);
  console.log(`Chunk outputs: ${Object.values(STRATEGY_DIRS).map((d) => `${d}/chunk_output.txt`).join(', ')}`);
}

runCli(main);
