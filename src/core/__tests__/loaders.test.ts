import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterAll, describe, expect, it } from 'vitest';

import { DocumentLoadError } from '../errors.js';
import { loadDocument } from '../loaders.js';

const TEST_DIR = mkdtempSync(join(tmpdir(), 'chunk-loader-test-'));

afterAll(() => {
  rmSync(TEST_DIR, { recursive: true, force: true });
});

describe('loadDocument', () => {
  it('should return the file text', async () => {
    const file = join(TEST_DIR, 'doc.md');
    writeFileSync(file, '# Hi\n\nBody text.\n');

    await expect(loadDocument(file)).resolves.toBe('# Hi\n\nBody text.\n');
  });

  it('should reject a missing file', async () => {
    await expect(loadDocument(join(TEST_DIR, 'missing.md'))).rejects.toBeInstanceOf(DocumentLoadError);
  });

  it('should reject a blank document', async () => {
    const file = join(TEST_DIR, 'blank.md');
    writeFileSync(file, '   \n');

    await expect(loadDocument(file)).rejects.toThrow('document is empty');
  });
});
