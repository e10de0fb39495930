import { performSemanticChunking } from '../chunkers/semantic.js';
import { loadDocument } from '../core/loaders.js';
import { consoleLogger } from '../core/logger.js';
import { writeChunkOutput } from '../core/output.js';
import { formatSummary, summarizeChunks } from '../core/report.js';
import { outputPath, TEST_DOCUMENT_PATH } from './paths.js';
import { runCli } from './run.js';

const CHUNK_SIZE = 800;
const CHUNK_OVERLAP = 100;

async function main(): Promise<void> {
  const document = await loadDocument(TEST_DOCUMENT_PATH);

  const records = await performSemanticChunking(
    document,
    { chunkSize: CHUNK_SIZE, chunkOverlap: CHUNK_OVERLAP },
    consoleLogger,
  );

  console.log('\n----- CHUNKING RESULTS -----');
  for (const line of formatSummary(summarizeChunks(records))) console.log(line);

  console.log('\n----- SECTIONS -----');
  for (const r of records) {
    console.log(
      `Chunk ${r.metadata.chunk_id}: ${r.metadata.section ?? '(no heading)'} ` +
        `(density ${r.metadata.semantic_density.toFixed(3)})`,
    );
  }

  const target = outputPath('semantic');
  await writeChunkOutput(target, records);
  console.log(`\nAll chunks have been successfully saved to '${target}'`);
}

runCli(main);
