/**
 * Global CLI context for shared options and state.
 * Provides consistent behavior across all commands.
 */

import { createLogger, isLogLevel, type LogLevel, type Logger } from "./logger.js";

export interface CLIContext {
  /** Output JSON instead of human-readable text */
  json: boolean;
  /** Suppress spinners and progress indicators */
  quiet: boolean;
  /** Fail instead of prompting for input (CI mode) */
  noInput: boolean;
  /** Minimum level written by the diagnostic logger */
  logLevel: LogLevel;
}

const DEFAULT_CONTEXT: CLIContext = {
  json: false,
  quiet: false,
  noInput: false,
  logLevel: "warn",
};

let currentContext: CLIContext = { ...DEFAULT_CONTEXT };

function isTruthy(value: string | undefined): boolean {
  return value === "1" || value === "true";
}

/**
 * Initialize CLI context from command line arguments and environment.
 */
export function initContext(
  argv: string[] = process.argv,
  env: NodeJS.ProcessEnv = process.env
): CLIContext {
  currentContext = { ...DEFAULT_CONTEXT };

  if (argv.includes("--json")) {
    currentContext.json = true;
    currentContext.quiet = true; // JSON mode implies quiet
  }

  if (argv.includes("--quiet") || argv.includes("-q")) {
    currentContext.quiet = true;
  }

  if (argv.includes("--no-input")) {
    currentContext.noInput = true;
  }

  if (argv.includes("--verbose") || argv.includes("-v")) {
    currentContext.logLevel = "debug";
  }

  // Environment variable overrides
  if (isTruthy(env.ARMORY_JSON)) {
    currentContext.json = true;
    currentContext.quiet = true;
  }

  if (isTruthy(env.ARMORY_QUIET)) {
    currentContext.quiet = true;
  }

  if (env.CI || isTruthy(env.ARMORY_NO_INPUT)) {
    currentContext.noInput = true;
  }

  if (isLogLevel(env.ARMORY_LOG_LEVEL)) {
    currentContext.logLevel = env.ARMORY_LOG_LEVEL;
  }

  return currentContext;
}

/**
 * Get the current CLI context.
 */
export function getContext(): CLIContext {
  return currentContext;
}

export function isJsonMode(): boolean {
  return currentContext.json;
}

export function isQuietMode(): boolean {
  return currentContext.quiet;
}

/**
 * Check if we're in non-interactive mode.
 */
export function isNonInteractive(): boolean {
  return currentContext.noInput || !process.stdin.isTTY;
}

/**
 * Logger configured from the current context.
 */
export function createContextLogger(): Logger {
  return createLogger({ level: currentContext.logLevel, json: currentContext.json });
}

/**
 * Reset context to defaults (for testing).
 */
export function resetContext(): void {
  currentContext = { ...DEFAULT_CONTEXT };
}
