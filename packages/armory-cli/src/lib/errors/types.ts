/**
 * Error codes for all CLI error types.
 * Each code maps to a specific error scenario with predefined messaging.
 */
export type ErrorCode =
  // Authentication errors
  | "AUTH_TRANSPORT_FAILURE"
  | "AUTH_REJECTED_CREDENTIALS"
  | "AUTH_MALFORMED_RESPONSE"
  // Credential file errors
  | "CONFIG_NOT_FOUND"
  | "CONFIG_INVALID"
  // Filesystem errors
  | "IO_ERROR"
  // Transfer errors
  | "DOWNLOAD_TRANSPORT_FAILURE"
  | "DOWNLOAD_HTTP_ERROR"
  | "DOWNLOAD_ACCESS_DENIED"
  | "DOWNLOAD_INTERRUPTED"
  | "DOWNLOAD_RANGE_NOT_SATISFIABLE"
  // Validation errors
  | "VALIDATION_INVALID_URL"
  | "VALIDATION_MISSING_INPUT"
  // Generic
  | "UNKNOWN_ERROR";

/**
 * Extended Error class for CLI-specific errors with helpful context.
 */
export class CLIError extends Error {
  readonly code: ErrorCode;
  readonly suggestion?: string;
  readonly example?: string;
  readonly details?: string;

  constructor(
    code: ErrorCode,
    message: string,
    options?: {
      suggestion?: string;
      example?: string;
      details?: string;
      cause?: unknown;
    }
  ) {
    super(message, { cause: options?.cause });
    this.name = "CLIError";
    this.code = code;
    this.suggestion = options?.suggestion;
    this.example = options?.example;
    this.details = options?.details;
  }
}

/**
 * Type guard to check if an error is a CLIError.
 */
export function isCLIError(error: unknown): error is CLIError {
  return error instanceof CLIError;
}

/**
 * True when the error is a CLIError carrying the given code.
 */
export function hasErrorCode(error: unknown, code: ErrorCode): error is CLIError {
  return isCLIError(error) && error.code === code;
}

export function describeCause(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
