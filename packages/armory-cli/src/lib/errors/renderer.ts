import chalk from "chalk";
import { CLIError, isCLIError } from "./types.js";
import { unknownError } from "./catalog.js";
import { getOutputMode, type OutputMode } from "../output/mode.js";

/**
 * Symbols for error display.
 */
const SYM = {
  error: "✗",
  arrow: "→",
};

/**
 * Get terminal width, with fallback for non-TTY.
 */
function getTerminalWidth(): number {
  return process.stderr.columns || 80;
}

/**
 * Wrap text to fit within a given width, preserving indentation.
 */
export function wrapText(text: string, maxWidth: number, indent: string = ""): string[] {
  const words = text.split(" ");
  const lines: string[] = [];
  let currentLine = "";

  for (const word of words) {
    const testLine = currentLine ? `${currentLine} ${word}` : word;
    if (testLine.length <= maxWidth) {
      currentLine = testLine;
    } else {
      if (currentLine) lines.push(currentLine);
      currentLine = word;
    }
  }
  if (currentLine) lines.push(currentLine);

  return lines.map((line, i) => (i === 0 ? line : indent + line));
}

/**
 * Build the lines of a human-readable error block.
 */
export function formatStaticError(error: CLIError, width = getTerminalWidth()): string[] {
  const termWidth = Math.min(width, 80);
  const output: string[] = [""];

  const errorLines = wrapText(error.message, termWidth - 4, "  ");
  output.push(`${chalk.red(SYM.error)} ${chalk.red.bold(errorLines[0])}`);
  for (let i = 1; i < errorLines.length; i++) {
    output.push(`  ${chalk.red(errorLines[i])}`);
  }

  // Raw server bodies keep their own line breaks
  if (error.details) {
    output.push("");
    for (const line of error.details.split("\n")) {
      output.push(`  ${chalk.dim(line)}`);
    }
  }

  if (error.suggestion) {
    output.push("");
    const suggestionLines = wrapText(error.suggestion, termWidth - 4, "  ");
    output.push(`  ${chalk.yellow(SYM.arrow)} ${suggestionLines[0]}`);
    for (let i = 1; i < suggestionLines.length; i++) {
      output.push(`    ${suggestionLines[i]}`);
    }
  }

  if (error.example) {
    output.push("");
    output.push(`  ${chalk.dim("Try:")} ${chalk.cyan(error.example)}`);
  }

  output.push("");
  return output;
}

/**
 * Build the JSON representation of an error.
 */
export function formatJsonError(error: CLIError): string {
  const output = {
    error: true,
    code: error.code,
    message: error.message,
    suggestion: error.suggestion,
    example: error.example,
    details: error.details,
  };

  // Remove undefined values
  const cleaned = Object.fromEntries(
    Object.entries(output).filter(([, v]) => v !== undefined)
  );

  return JSON.stringify(cleaned, null, 2);
}

/**
 * Render an error to stderr based on the current output mode.
 */
export function renderError(error: CLIError, mode?: OutputMode): void {
  const outputMode = mode ?? getOutputMode();

  if (outputMode === "json") {
    console.error(formatJsonError(error));
    return;
  }

  for (const line of formatStaticError(error)) {
    console.error(line);
  }
}

/**
 * Convert an unknown error to a CLIError and render it.
 */
export function renderUnknownError(error: unknown, mode?: OutputMode): void {
  renderError(isCLIError(error) ? error : unknownError(error), mode);
}
