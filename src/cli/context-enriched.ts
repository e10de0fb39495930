import {
  createLlmSummarizer,
  mockSummarizer,
  performContextEnrichedChunking,
} from '../chunkers/context-enriched.js';
import { env } from '../core/env.js';
import { createChatModel } from '../core/llm.js';
import { loadDocument } from '../core/loaders.js';
import { consoleLogger } from '../core/logger.js';
import { writeChunkOutput } from '../core/output.js';
import { formatSummary, summarizeChunks } from '../core/report.js';
import { outputPath, TEST_DOCUMENT_PATH } from './paths.js';
import { runCli } from './run.js';

const CHUNK_SIZE = 500;
const CHUNK_OVERLAP = 50;
const WINDOW_SIZE = 1;

async function main(): Promise<void> {
  const document = await loadDocument(TEST_DOCUMENT_PATH);
  const model = createChatModel(env, { maxTokens: 250 });
  if (!model) console.log('Using mock implementation for testing...');

  const records = await performContextEnrichedChunking(
    document,
    model ? createLlmSummarizer(model) : mockSummarizer,
    { chunkSize: CHUNK_SIZE, chunkOverlap: CHUNK_OVERLAP, windowSize: WINDOW_SIZE },
    consoleLogger,
  );

  console.log('\n----- CHUNKING RESULTS -----');
  for (const line of formatSummary(summarizeChunks(records))) console.log(line);

  const target = outputPath('contextEnriched');
  await writeChunkOutput(target, records);
  console.log(`\nAll chunks have been successfully saved to '${target}'`);
}

runCli(main);
