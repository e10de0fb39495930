import type { AiChunkRecord } from '../chunkers/ai-driven.js';
import { performAiDrivenChunking, performMockAiDrivenChunking } from '../chunkers/ai-driven.js';
import { env } from '../core/env.js';
import { createChatModel } from '../core/llm.js';
import { loadDocument } from '../core/loaders.js';
import { consoleLogger } from '../core/logger.js';
import { writeChunkOutput } from '../core/output.js';
import { formatSummary, summarizeChunks } from '../core/report.js';
import { outputPath, TEST_DOCUMENT_PATH } from './paths.js';
import { runCli } from './run.js';

const MAX_CHUNKS = 10;
const FALLBACK_CHUNK_SIZE = 1000;

/**
 * AI-driven chunking. Uses the configured chat model, or the paragraph-merging mock when
 * CHUNKING_LLM=mock.
 */
async function main(): Promise<void> {
  const document = await loadDocument(TEST_DOCUMENT_PATH);
  const model = createChatModel(env, { maxTokens: 4000 });

  let records: AiChunkRecord[];
  if (model) {
    records = await performAiDrivenChunking(
      document,
      model,
      { maxChunks: MAX_CHUNKS, fallbackChunkSize: FALLBACK_CHUNK_SIZE },
      consoleLogger,
    );
  } else {
    console.log('Using mock implementation for testing...');
    records = performMockAiDrivenChunking(document, { maxChunks: MAX_CHUNKS }, consoleLogger);
  }

  console.log('\n----- CHUNKING RESULTS -----');
  for (const line of formatSummary(summarizeChunks(records))) console.log(line);

  const middle = records[Math.floor(records.length / 2)];
  if (middle) {
    const text = middle.pageContent;
    console.log('\n----- EXAMPLE CHUNK -----');
    console.log(`Chunk ${middle.metadata.chunk_id}:`);
    console.log('-'.repeat(40));
    console.log(text.length > 200 ? `${text.slice(0, 200)}...` : text);
    console.log('-'.repeat(40));
    console.log(`Metadata: ${JSON.stringify(middle.metadata)}`);
  }

  const target = outputPath('aiDriven');
  await writeChunkOutput(target, records);
  console.log(`\nAll chunks have been successfully saved to '${target}'`);
}

runCli(main);
