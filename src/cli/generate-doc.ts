import { writeTestDocument } from '../core/generator.js';
import { TEST_DOCUMENT_PATH } from './paths.js';
import { runCli } from './run.js';

/**
 * Writes the synthetic markdown test document every chunker reads.
 */
async function main(): Promise<void> {
  const { injectedFacts } = await writeTestDocument(TEST_DOCUMENT_PATH);

  console.log(`Generated '${TEST_DOCUMENT_PATH}' successfully.`);
  console.log(`Injected ${injectedFacts.length} target facts for retrieval testing.`);
}

runCli(main);
