/**
 * Output mode detection for determining how to render CLI output.
 */

export type OutputMode = "tty" | "static" | "json";

/**
 * Detect the appropriate output mode based on environment and flags.
 *
 * - `tty`: Interactive terminal; spinners and colors
 * - `static`: Plain text output (for CI, pipes, non-interactive)
 * - `json`: Structured JSON output for scripting
 */
export function getOutputMode(argv: string[] = process.argv): OutputMode {
  if (argv.includes("--json")) {
    return "json";
  }

  if (process.env.ARMORY_JSON === "1" || process.env.ARMORY_JSON === "true") {
    return "json";
  }

  // CI environment
  if (process.env.CI) {
    return "static";
  }

  // Not a TTY (piped output)
  if (!process.stderr.isTTY) {
    return "static";
  }

  // Dumb terminal
  if (process.env.TERM === "dumb") {
    return "static";
  }

  return "tty";
}

