import { formatError, getExitCode } from '../core/errors.js';

/**
 * Top-level error handler shared by the CLI scripts.
 * Prints the message, recovery hint and stack trace, then exits with the error's code.
 */
export function runCli(main: () => Promise<void>): void {
  main().catch((err: unknown) => {
    console.error(formatError(err));
    if (err instanceof Error && err.stack) console.error(err.stack);
    process.exit(getExitCode(err));
  });
}
