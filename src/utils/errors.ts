/**
 * Error kinds surfaced by the summarization path
 */

export class SummarizationError extends Error {
  readonly url: string;

  constructor(url: string, cause: unknown) {
    super(
      `Summarization failed for ${url}: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause }
    );
    this.name = 'SummarizationError';
    this.url = url;
  }
}

export class CacheIoError extends Error {
  readonly path: string;

  constructor(operation: 'read' | 'write', path: string, cause: unknown) {
    super(
      `Summary cache ${operation} failed at ${path}: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause }
    );
    this.name = 'CacheIoError';
    this.path = path;
  }
}
