export type CivicEyeErrorCode =
  | 'VALIDATION_ERROR'
  | 'EXTERNAL_SERVICE_ERROR'
  | 'THUMBNAIL_UNAVAILABLE'
  | 'MODEL_UNAVAILABLE';

export abstract class CivicEyeError extends Error {
  abstract readonly code: CivicEyeErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Malformed user input. Raised before any external call is made. */
export class ValidationError extends CivicEyeError {
  readonly code = 'VALIDATION_ERROR';

  constructor(
    message: string,
    readonly field?: string
  ) {
    super(message);
  }
}

/** The geodata query failed: network error, timeout, bad status or unreadable payload. */
export class ExternalServiceError extends CivicEyeError {
  readonly code = 'EXTERNAL_SERVICE_ERROR';

  constructor(
    message: string,
    readonly service: string,
    readonly status?: number,
    cause?: unknown
  ) {
    super(message, { cause });
  }
}

export interface ThumbnailAttempt {
  provider: string;
  reason: string;
}

/** Neither map provider could serve an image for a record. Never fatal to a search. */
export class ThumbnailUnavailable extends CivicEyeError {
  readonly code = 'THUMBNAIL_UNAVAILABLE';

  constructor(
    readonly recordId: string,
    readonly attempts: ThumbnailAttempt[]
  ) {
    super(
      `No map thumbnail for ${recordId}: ${attempts.map((attempt) => `${attempt.provider} (${attempt.reason})`).join('; ')}`
    );
  }
}

export class ModelUnavailable extends CivicEyeError {
  readonly code = 'MODEL_UNAVAILABLE';

  constructor(
    readonly modelId: string,
    cause?: unknown
  ) {
    super(`Image embedding model ${modelId} could not be loaded: ${describeError(cause)}`, { cause });
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
