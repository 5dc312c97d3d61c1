/**
 * Fatal startup failure: missing or invalid job set, unwritable home directory.
 * The CLI exits non-zero before the tick loop starts.
 */
export class StartupError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StartupError';
  }
}
