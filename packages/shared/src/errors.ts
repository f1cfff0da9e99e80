// ─── Error Classes ───

/** Upstream HTTP failure from the YouTube Data API. */
export class YouTubeApiError extends Error {
  constructor(
    message: string,
    public statusCode: number,
  ) {
    super(message);
    this.name = 'YouTubeApiError';
  }
}

export class NotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NotFoundError';
  }
}

/** Captions exist in principle but the owner turned them off. */
export class TranscriptDisabledError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TranscriptDisabledError';
  }
}

/** Fewer entities or snapshots than an operation needs. */
export class InsufficientDataError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InsufficientDataError';
  }
}

/** An asymmetric comparison was given a set it cannot evaluate. */
export class ComparisonError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ComparisonError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
