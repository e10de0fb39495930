import { describe, expect, it } from 'vitest';

import {
  ChunkingError,
  ConfigError,
  DocumentLoadError,
  formatError,
  getExitCode,
  LlmOutputParseError,
  toError,
} from '../errors.js';

describe('error types', () => {
  it('should keep instanceof working across the hierarchy', () => {
    const err = new LlmOutputParseError('invalid JSON', 'not json');
    expect(err).toBeInstanceOf(LlmOutputParseError);
    expect(err).toBeInstanceOf(ChunkingError);
    expect(err).toBeInstanceOf(Error);
    expect(err.rawOutput).toBe('not json');
    expect(err.name).toBe('LlmOutputParseError');
  });

  it('should list issues in the config error hint', () => {
    expect(formatError(new ConfigError('Bad options', ['a: b', 'c: d']))).toBe(
      'ConfigError: Bad options\nIssues:\n  a: b\n  c: d',
    );
  });

  it('should map errors to exit codes', () => {
    expect(getExitCode(new ConfigError('x'))).toBe(2);
    expect(getExitCode(new DocumentLoadError('doc.md', 'missing'))).toBe(3);
    expect(getExitCode(new LlmOutputParseError('x', ''))).toBe(4);
    expect(getExitCode(new Error('plain'))).toBe(1);
  });

  it('should format non-chunking errors by message', () => {
    expect(formatError(new Error('plain'))).toBe('plain');
    expect(formatError('text')).toBe('text');
  });

  it('should wrap thrown values into errors', () => {
    expect(toError('boom').message).toBe('boom');
  });
});
