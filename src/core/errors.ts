/**
 * Error types shared by the chunkers and the CLI scripts.
 *
 * Every error carries:
 * - a `hint` telling the user how to recover
 * - an exit `code` used by the CLI error handler
 */

/**
 * Base class for all chunking errors.
 */
export class ChunkingError extends Error {
  /** Recovery suggestion shown to the user */
  public readonly hint?: string;

  /** Exit code (1-255, 0 is reserved for success) */
  public readonly code: number;

  constructor(message: string, hint?: string, code: number = 1) {
    super(message);
    // Keeps `instanceof` working for subclasses after transpilation.
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = 'ChunkingError';
    this.hint = hint;
    this.code = code;
  }
}

/**
 * Thrown when chunker bounds or environment settings are invalid.
 * Raised before any document is processed.
 *
 * Exit code 2: Configuration error
 */
export class ConfigError extends ChunkingError {
  /** Individual validation issues */
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    const hint =
      issues.length > 0
        ? `Issues:\n  ${issues.join('\n  ')}`
        : 'Check the chunker options and environment variables';
    super(message, hint, 2);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * Thrown when the input document is missing, unreadable or blank.
 *
 * Exit code 3: File not found (following common Unix conventions)
 */
export class DocumentLoadError extends ChunkingError {
  public readonly path: string;

  constructor(path: string, reason: string) {
    super(
      `Could not load document ${path}: ${reason}`,
      'Run: npm run generate  to create the sample document',
      3,
    );
    this.name = 'DocumentLoadError';
    this.path = path;
  }
}

/**
 * Thrown when a model response does not contain a usable JSON array of chunks.
 *
 * Exit code 4: Model output error
 */
export class LlmOutputParseError extends ChunkingError {
  /** The unmodified model output, kept for diagnostics */
  public readonly rawOutput: string;

  constructor(reason: string, rawOutput: string) {
    super(
      `Could not parse chunks from model output: ${reason}`,
      'The model must answer with a JSON array of strings only',
      4,
    );
    this.name = 'LlmOutputParseError';
    this.rawOutput = rawOutput;
  }
}

/**
 * Formats an error for terminal output: message, then hint.
 */
export function formatError(err: unknown): string {
  if (err instanceof ChunkingError) {
    return err.hint ? `${err.name}: ${err.message}\n${err.hint}` : `${err.name}: ${err.message}`;
  }
  if (err instanceof Error) return err.message;
  return String(err);
}

/**
 * Exit code for an error; 1 for anything that is not a ChunkingError.
 */
export function getExitCode(err: unknown): number {
  return err instanceof ChunkingError ? err.code : 1;
}

/**
 * Normalises a thrown value into an Error so callers can read `.message`.
 */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
