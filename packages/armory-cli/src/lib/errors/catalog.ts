import { CLIError, describeCause } from "./types.js";

/**
 * Error catalog - factory functions for creating CLIErrors with helpful context.
 * Each function produces a consistent, user-friendly error message.
 */

// ============================================================================
// Authentication Errors
// ============================================================================

export function authTransportFailure(loginUrl: string, cause: unknown): CLIError {
  return new CLIError("AUTH_TRANSPORT_FAILURE", `Can't reach the login endpoint at ${loginUrl}`, {
    suggestion: "Check your network connection and the repository address",
    details: describeCause(cause),
    cause,
  });
}

export function rejectedCredentials(status: number, body: string, baseUrl: string): CLIError {
  return new CLIError("AUTH_REJECTED_CREDENTIALS", `Login failed with status ${status}: ${body}`, {
    suggestion: "Check your username and password, then store them again",
    example: `armory-dl config set ${baseUrl}`,
    details: body,
  });
}

export function malformedLoginResponse(reason: string, body?: string): CLIError {
  return new CLIError("AUTH_MALFORMED_RESPONSE", reason, {
    suggestion: "The repository answered in an unexpected format. Verify the repository URL",
    details: body,
  });
}

// ============================================================================
// Credential File Errors
// ============================================================================

export function credentialsNotFound(baseUrl: string, configPath: string): CLIError {
  return new CLIError("CONFIG_NOT_FOUND", `No credentials stored for ${baseUrl}`, {
    suggestion: "Store credentials for this repository first",
    example: `armory-dl config set ${baseUrl}`,
    details: configPath,
  });
}

export function invalidCredentialFile(path: string, issues: string[]): CLIError {
  const details = issues.length > 1
    ? issues.map((i) => `• ${i}`).join("\n")
    : issues[0];
  return new CLIError("CONFIG_INVALID", `Credential file ${path} has errors`, {
    suggestion: "Fix the file by hand or delete it and store credentials again",
    details,
  });
}

// ============================================================================
// Filesystem Errors
// ============================================================================

export function ioError(action: string, path: string, cause: unknown): CLIError {
  return new CLIError("IO_ERROR", `Can't ${action} "${path}"`, {
    suggestion: "Check the path exists and that you have permission to write to it",
    details: describeCause(cause),
    cause,
  });
}

// ============================================================================
// Transfer Errors
// ============================================================================

export function downloadTransportFailure(url: string, cause: unknown): CLIError {
  return new CLIError("DOWNLOAD_TRANSPORT_FAILURE", `Can't reach ${url}`, {
    suggestion: "Check your network connection and try again",
    details: describeCause(cause),
    cause,
  });
}

export function downloadHttpError(url: string, status: number, statusText: string): CLIError {
  if (status === 401 || status === 403) {
    return new CLIError("DOWNLOAD_ACCESS_DENIED", `Access to ${url} was denied (${status} ${statusText})`, {
      suggestion: "Your account may lack access to this artifact, or the stored credentials are stale",
    });
  }
  return new CLIError("DOWNLOAD_HTTP_ERROR", `Download failed (${status} ${statusText})`, {
    details: url,
  });
}

export function downloadInterrupted(temporaryPath: string, bytesOnDisk: number, cause: unknown): CLIError {
  return new CLIError("DOWNLOAD_INTERRUPTED", "The transfer was interrupted", {
    suggestion: `${bytesOnDisk} bytes are kept in "${temporaryPath}". Run the same command again to resume`,
    details: describeCause(cause),
    cause,
  });
}

export function rangeNotSatisfiable(temporaryPath: string, offset: number, total?: number): CLIError {
  const size = total === undefined ? "an unknown size" : `${total} bytes`;
  return new CLIError(
    "DOWNLOAD_RANGE_NOT_SATISFIABLE",
    `The server can't resume from byte ${offset} of a file with ${size}`,
    {
      suggestion: `The remote file may have changed. Delete "${temporaryPath}" and download again`,
    }
  );
}

// ============================================================================
// Validation Errors
// ============================================================================

export function invalidUrl(url: string, reason?: string): CLIError {
  return new CLIError("VALIDATION_INVALID_URL", `"${url}" is not a valid URL`, {
    suggestion: "Pass the full address, including http:// or https://",
    details: reason,
  });
}

export function missingInput(what: string): CLIError {
  return new CLIError("VALIDATION_MISSING_INPUT", `Missing ${what}`, {
    suggestion: "Run the command again from an interactive terminal and answer every prompt",
  });
}

// ============================================================================
// Generic Error
// ============================================================================

export function unknownError(error: unknown): CLIError {
  return new CLIError("UNKNOWN_ERROR", describeCause(error), { cause: error });
}
