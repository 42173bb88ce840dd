export function formatError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class ArchiveError extends Error {
  constructor(message: string, public code: string, public details?: unknown) {
    super(message);
    this.name = 'ArchiveError';
  }
}

/**
 * Raised when a download is aborted before the engine finished.
 */
export class CancelledError extends ArchiveError {
  constructor(message: string = 'Download cancelled') {
    super(message, 'CANCELLED');
    this.name = 'CancelledError';
  }
}

export function isCancellation(error: unknown): boolean {
  if (error instanceof CancelledError) {
    return true;
  }
  return error instanceof Error && error.name === 'AbortError';
}
