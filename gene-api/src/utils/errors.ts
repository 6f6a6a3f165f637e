/**
 * Error taxonomy shared by the store, query service and both adapters.
 */

export const ErrorCodes = {
  INVALID_ARGUMENT: 'INVALID_ARGUMENT',
  NOT_FOUND: 'NOT_FOUND',
  STORAGE_WRITE_ERROR: 'STORAGE_WRITE_ERROR',
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export class GeneApiError extends Error {
  readonly code: ErrorCode;
  readonly statusCode: number;

  constructor(message: string, code: ErrorCode, statusCode: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'GeneApiError';
    this.code = code;
    this.statusCode = statusCode;
  }
}

/** Bad pagination bounds or an unparsable integer parameter. */
export class InvalidArgumentError extends GeneApiError {
  constructor(message: string) {
    super(message, ErrorCodes.INVALID_ARGUMENT, 400);
    this.name = 'InvalidArgumentError';
  }
}

export class NotFoundError extends GeneApiError {
  constructor(message = 'Gene not found') {
    super(message, ErrorCodes.NOT_FOUND, 404);
    this.name = 'NotFoundError';
  }
}

/** Raised only while seeding; aborts initialisation. */
export class StorageWriteError extends GeneApiError {
  constructor(message: string, cause?: unknown) {
    super(message, ErrorCodes.STORAGE_WRITE_ERROR, 500, { cause });
    this.name = 'StorageWriteError';
  }
}

export class ConfigurationError extends GeneApiError {
  constructor(message: string) {
    super(message, ErrorCodes.CONFIGURATION_ERROR, 500);
    this.name = 'ConfigurationError';
  }
}
