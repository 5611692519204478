/**
 * Extended Error class that preserves error context and details
 *
 * Usage:
 * ```ts
 * throw new ExtendedError({
 *   message: 'Failed to upload image',
 *   cause: originalError,
 *   details: {
 *     fileName: 'page-001.png',
 *     statusCode: 429,
 *   }
 * });
 * ```
 */

export interface ExtendedErrorOptions {
  message: string;
  cause?: Error | unknown;
  details?: Record<string, unknown>;
}

export class ExtendedError extends Error {
  public readonly cause?: Error | unknown;
  public readonly details?: Record<string, unknown>;

  constructor(options: ExtendedErrorOptions) {
    super(options.message);
    this.name = 'ExtendedError';
    this.cause = options.cause;
    this.details = options.details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

export const EXIT_CODES = {
  SUCCESS: 0,
  UNEXPECTED: 1,
  USAGE: 2,
  NOT_FOUND: 3,
  EMPTY_INPUT: 4,
  CONFIG: 5,
  TRANSPORT: 6,
  UPLOAD: 7,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Errors that end a run with a one-line message and a known exit code
 */
export abstract class AppError extends ExtendedError {
  abstract readonly exitCode: ExitCode;

  static isAppError(error: unknown): error is AppError {
    return error instanceof AppError;
  }
}

/** The input directory does not exist or is not a directory */
export class NotFoundError extends AppError {
  readonly exitCode = EXIT_CODES.NOT_FOUND;

  constructor(options: ExtendedErrorOptions) {
    super(options);
    this.name = 'NotFoundError';
  }
}

/** The input directory holds no recognized images */
export class EmptyInputError extends AppError {
  readonly exitCode = EXIT_CODES.EMPTY_INPUT;

  constructor(options: ExtendedErrorOptions) {
    super(options);
    this.name = 'EmptyInputError';
  }
}

/** The credential file could not be read or written */
export class ConfigError extends AppError {
  readonly exitCode = EXIT_CODES.CONFIG;

  constructor(options: ExtendedErrorOptions) {
    super(options);
    this.name = 'ConfigError';
  }
}

/** The service could not be reached */
export class TransportError extends AppError {
  readonly exitCode = EXIT_CODES.TRANSPORT;

  constructor(options: ExtendedErrorOptions) {
    super(options);
    this.name = 'TransportError';
  }
}

export interface UploadErrorOptions extends ExtendedErrorOptions {
  status: number;
  serviceMessage: string;
}

/** The service answered with a non-2xx status */
export class UploadError extends AppError {
  readonly exitCode = EXIT_CODES.UPLOAD;
  readonly status: number;
  readonly serviceMessage: string;

  constructor(options: UploadErrorOptions) {
    super({
      ...options,
      details: { ...options.details, status: options.status, serviceMessage: options.serviceMessage },
    });
    this.name = 'UploadError';
    this.status = options.status;
    this.serviceMessage = options.serviceMessage;
  }
}

/** Invalid command-line arguments or configuration values */
export class UsageError extends AppError {
  readonly exitCode = EXIT_CODES.USAGE;

  constructor(message: string) {
    super({ message });
    this.name = 'UsageError';
  }
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
