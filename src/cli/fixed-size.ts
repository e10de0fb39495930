import { performFixedSizeChunking } from '../chunkers/fixed-size.js';
import { loadDocument } from '../core/loaders.js';
import { consoleLogger } from '../core/logger.js';
import { writeChunkOutput } from '../core/output.js';
import { formatSummary, summarizeChunks } from '../core/report.js';
import { outputPath, TEST_DOCUMENT_PATH } from './paths.js';
import { runCli } from './run.js';

const CHUNK_SIZE = 1000;
const CHUNK_OVERLAP = 200;

/**
 * Fixed-size chunking of the test document.
 *
 * Pipeline:
 * 1) Load the generated test document.
 * 2) Cut it into exact character windows with a fixed overlap.
 * 3) Write the chunks (text only) to the strategy's output file.
 */
async function main(): Promise<void> {
  const document = await loadDocument(TEST_DOCUMENT_PATH);

  const records = await performFixedSizeChunking(
    document,
    { chunkSize: CHUNK_SIZE, chunkOverlap: CHUNK_OVERLAP, mode: 'window' },
    consoleLogger,
  );

  const target = outputPath('fixedSize');
  await writeChunkOutput(target, records, { includeMetadata: false });

  console.log('');
  for (const line of formatSummary(summarizeChunks(records))) console.log(line);
  console.log(`All chunks have been successfully saved to '${target}'`);
}

runCli(main);
