import { ZodError } from 'zod';

export type StationErrorCode =
  | 'decode_error'
  | 'write_unavailable'
  | 'unavailable'
  | 'not_found'
  | 'configuration_error';

export abstract class StationError extends Error {
  abstract readonly code: StationErrorCode;
}

/**
 * A stream payload that could not be turned into an observation. `field` is
 * null when the payload as a whole is unusable (not JSON, not an object).
 */
export class DecodeError extends StationError {
  readonly code = 'decode_error' as const;

  constructor(
    readonly field: string | null,
    readonly reason: string,
    readonly rawPreview: string
  ) {
    super(field ? `invalid field '${field}': ${reason}` : reason);
    this.name = 'DecodeError';
  }
}

export class WriteTransientError extends StationError {
  readonly code = 'write_unavailable' as const;

  constructor(
    message: string,
    readonly requiredAcks: number,
    readonly availableReplicas: number | null,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'WriteTransientError';
  }
}

export class ReadUnavailableError extends StationError {
  readonly code = 'unavailable' as const;

  constructor(
    message: string,
    readonly requiredAcks: number,
    readonly availableReplicas: number | null,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ReadUnavailableError';
  }
}

export class StationNotFoundError extends StationError {
  readonly code = 'not_found' as const;

  constructor(readonly stationId: string, what: 'name' | 'observations') {
    super(`station ${stationId} has no ${what}`);
    this.name = 'StationNotFoundError';
  }
}

export class ConfigurationError extends StationError {
  readonly code = 'configuration_error' as const;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigurationError';
  }
}

export interface ErrorResponse {
  statusCode: number;
  code: StationErrorCode | 'validation_error' | 'internal_error';
  message: string;
  details?: unknown;
}

export const mapErrorToResponse = (error: unknown): ErrorResponse => {
  if (error instanceof StationNotFoundError) {
    return { statusCode: 404, code: error.code, message: error.message };
  }

  if (error instanceof ReadUnavailableError || error instanceof WriteTransientError) {
    return {
      statusCode: 503,
      code: error.code,
      message: error.message,
      details: { requiredAcks: error.requiredAcks, availableReplicas: error.availableReplicas }
    };
  }

  if (error instanceof DecodeError) {
    return { statusCode: 422, code: error.code, message: error.message, details: { field: error.field } };
  }

  if (error instanceof ZodError) {
    return {
      statusCode: 400,
      code: 'validation_error',
      message: 'Request validation failed',
      details: error.flatten()
    };
  }

  return { statusCode: 500, code: 'internal_error', message: 'Unexpected error' };
};
