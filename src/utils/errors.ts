export class AppError extends Error {
  readonly code: string;
  readonly statusCode: number;

  constructor(message: string, code: string, statusCode: number) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR', 400);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 'NOT_FOUND', 404);
  }
}

/**
 * Raised when a device id is re-registered with metadata that does not
 * match the stored row.
 */
export class ConflictError extends AppError {
  readonly device_id: string;
  readonly conflicting_fields: string[];

  constructor(device_id: string, conflicting_fields: string[]) {
    super(
      `Device ${device_id} is already registered with different ${conflicting_fields.join(', ')}`,
      'DEVICE_CONFLICT',
      409
    );
    this.device_id = device_id;
    this.conflicting_fields = conflicting_fields;
  }
}

/**
 * Raised by the store when (device_id, timestamp) already exists.
 * Expected under races; callers log it and move on.
 */
export class DuplicateError extends AppError {
  readonly device_id: string;
  readonly timestamp: Date;

  constructor(device_id: string, timestamp: Date) {
    super(
      `Measurement for ${device_id} at ${timestamp.toISOString()} already exists`,
      'DUPLICATE_MEASUREMENT',
      409
    );
    this.device_id = device_id;
    this.timestamp = timestamp;
  }
}

export type FetchFailureReason = 'timeout' | 'transport' | 'http_status' | 'not_ready' | 'aborted';

export class FetchFailure extends AppError {
  readonly reason: FetchFailureReason;
  readonly endpoint: string;

  constructor(endpoint: string, reason: FetchFailureReason, message: string) {
    super(message, 'FETCH_FAILURE', 502);
    this.reason = reason;
    this.endpoint = endpoint;
  }
}

export const getErrorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : 'Unknown error';
