import { performAdaptiveChunking } from '../chunkers/adaptive.js';
import { loadDocument } from '../core/loaders.js';
import { consoleLogger } from '../core/logger.js';
import { writeChunkOutput } from '../core/output.js';
import { formatSummary, summarizeChunks } from '../core/report.js';
import { outputPath, TEST_DOCUMENT_PATH } from './paths.js';
import { runCli } from './run.js';

const MIN_CHUNK_SIZE = 300;
const MAX_CHUNK_SIZE = 1000;
const MIN_CHUNK_OVERLAP = 30;
const MAX_CHUNK_OVERLAP = 150;

/**
 * Adaptive chunking: chunk size shrinks as text complexity grows.
 * Prints complexity and size statistics plus the most and least complex chunks.
 */
async function main(): Promise<void> {
  const document = await loadDocument(TEST_DOCUMENT_PATH);

  const records = await performAdaptiveChunking(
    document,
    {
      minChunkSize: MIN_CHUNK_SIZE,
      maxChunkSize: MAX_CHUNK_SIZE,
      minChunkOverlap: MIN_CHUNK_OVERLAP,
      maxChunkOverlap: MAX_CHUNK_OVERLAP,
      complexityMeasure: 'combined',
    },
    consoleLogger,
  );

  console.log('\n----- CHUNKING RESULTS -----');
  for (const line of formatSummary(summarizeChunks(records))) console.log(line);

  if (records.length > 0) {
    const complexities = records.map((r) => r.metadata.text_complexity);
    const avg = complexities.reduce((a, b) => a + b, 0) / complexities.length;
    console.log('\n----- COMPLEXITY ANALYSIS -----');
    console.log(`Average complexity: ${avg.toFixed(3)}`);
    console.log(`Min complexity: ${Math.min(...complexities).toFixed(3)}`);
    console.log(`Max complexity: ${Math.max(...complexities).toFixed(3)}`);

    const byComplexity = [...records].sort((a, b) => a.metadata.text_complexity - b.metadata.text_complexity);
    const extremes = [
      ['HIGHEST', byComplexity[byComplexity.length - 1]],
      ['LOWEST', byComplexity[0]],
    ] as const;
    for (const [label, r] of extremes) {
      if (!r) continue;
      console.log(`\n----- ${label} COMPLEXITY CHUNK -----`);
      console.log(`Complexity: ${r.metadata.text_complexity}`);
      console.log(`Size: ${r.metadata.chunk_size} characters`);
      console.log('-'.repeat(40));
      console.log(`${r.pageContent.slice(0, 200)}...`);
    }
  }

  const target = outputPath('adaptive');
  await writeChunkOutput(target, records);
  console.log(`\nAll chunks have been successfully saved to '${target}'`);
}

runCli(main);
