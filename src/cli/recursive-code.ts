import { performCodeChunking } from '../chunkers/recursive-code.js';
import { loadDocument } from '../core/loaders.js';
import { consoleLogger } from '../core/logger.js';
import { writeChunkOutput } from '../core/output.js';
import { summarizeChunks } from '../core/report.js';
import { CODE_SAMPLE_PATH, outputPath } from './paths.js';
import { runCli } from './run.js';

const LANGUAGE = 'python';
const CHUNK_SIZE = 100;
const CHUNK_OVERLAP = 15;

/**
 * Language-aware recursive chunking of the Python sample, with structure metadata.
 */
async function main(): Promise<void> {
  const code = await loadDocument(CODE_SAMPLE_PATH);

  const records = await performCodeChunking(
    code,
    { language: LANGUAGE, chunkSize: CHUNK_SIZE, chunkOverlap: CHUNK_OVERLAP },
    consoleLogger,
  );

  const summary = summarizeChunks(records);
  console.log('\n----- CHUNKING RESULTS -----');
  console.log(`Total code chunks: ${summary.totalChunks}`);

  console.log('\n----- CODE STRUCTURE BREAKDOWN -----');
  for (const [type, count] of Object.entries(summary.typeCounts)) {
    console.log(`${type}: ${count} chunks`);
  }

  const example = records.find((r) => r.metadata.chunk_type === 'function');
  if (example) {
    console.log('\n----- EXAMPLE FUNCTION CHUNK -----');
    console.log(`Function: ${example.metadata.structure_name}`);
    console.log('-'.repeat(40));
    console.log(example.pageContent);
    console.log('-'.repeat(40));
  }

  const target = outputPath('recursiveCode');
  await writeChunkOutput(target, records);
  console.log(`\nAll chunks have been successfully saved to '${target}'`);
}

runCli(main);
