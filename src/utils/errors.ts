/**
 * Standard error classes for Harscribe
 */

export enum ErrorCode {
  GENERAL_ERROR = "GENERAL_ERROR",
  FILE_IO_ERROR = "FILE_IO_ERROR",
  CONFIG_ERROR = "CONFIG_ERROR",
  CAPTURE_FORMAT_ERROR = "CAPTURE_FORMAT_ERROR",
}

export type ErrorDetails = Record<string, unknown>;

export class HarscribeError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: ErrorDetails,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "HarscribeError";
  }

  /**
   * Convert error to a plain object for callers that report failures as data
   */
  toResponse(phase: string) {
    return {
      status: "error",
      phase,
      error: {
        code: this.code,
        message: this.message,
        ...(this.details ? { details: this.details } : {}),
        ...(this.cause ? { cause: String(this.cause) } : {}),
      },
    };
  }
}

export class ConfigError extends HarscribeError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.CONFIG_ERROR, message, details, options);
    this.name = "ConfigError";
  }
}

export class FileIOError extends HarscribeError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.FILE_IO_ERROR, message, details, options);
    this.name = "FileIOError";
  }
}

export class CaptureFormatError extends HarscribeError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.CAPTURE_FORMAT_ERROR, message, details, options);
    this.name = "CaptureFormatError";
  }
}
