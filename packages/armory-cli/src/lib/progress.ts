/**
 * Progress reporting for transfers.
 * The downloader only sees the ProgressReporter port; rendering lives here.
 */

import ora, { type Ora } from "ora";
import { isJsonMode, isQuietMode } from "./cli-context.js";
import type { ProgressReporter } from "./ports/progress.js";

const UNITS = ["B", "KB", "MB", "GB", "TB"];

/**
 * Human-readable byte count, e.g. `1.5 MB`.
 */
export function formatBytes(bytes: number): string {
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < UNITS.length - 1) {
    value /= 1024;
    unit++;
  }
  return unit === 0 ? `${value} ${UNITS[unit]}` : `${value.toFixed(1)} ${UNITS[unit]}`;
}

/**
 * Spinner text for a transfer; counter-only when the total is unknown.
 */
export function describeProgress(filename: string, transferred: number, total: number): string {
  if (total <= 0) {
    return `Downloading ${filename} ${formatBytes(transferred)}`;
  }
  const percent = Math.min(100, Math.floor((transferred / total) * 100));
  return `Downloading ${filename} ${formatBytes(transferred)} / ${formatBytes(total)} (${percent}%)`;
}

/**
 * No-op reporter for quiet/JSON mode.
 */
export class SilentProgress implements ProgressReporter {
  start(_filename: string, _knownTotal: number, _resumedFrom: number): void {}

  advance(_byteCount: number): void {}

  finish(_filename: string): void {}

  fail(_message: string): void {}
}

/**
 * Wrapper around ora that shows bytes transferred.
 */
export class SpinnerProgress implements ProgressReporter {
  private readonly ora: Ora;
  private filename = "";
  private total = 0;
  private transferred = 0;

  constructor(spinner: Ora = ora({ stream: process.stderr })) {
    this.ora = spinner;
  }

  start(filename: string, knownTotal: number, resumedFrom: number): void {
    this.filename = filename;
    this.total = knownTotal;
    this.transferred = resumedFrom;
    this.ora.start(describeProgress(filename, this.transferred, this.total));
  }

  advance(byteCount: number): void {
    this.transferred += byteCount;
    this.ora.text = describeProgress(this.filename, this.transferred, this.total);
  }

  finish(filename: string): void {
    this.ora.succeed(`Downloaded ${filename} (${formatBytes(this.transferred)})`);
  }

  fail(message: string): void {
    if (this.ora.isSpinning) {
      this.ora.fail(message);
    }
  }
}

/**
 * Create a reporter that respects quiet/JSON mode.
 */
export function createProgress(): ProgressReporter {
  if (isQuietMode() || isJsonMode()) {
    return new SilentProgress();
  }
  return new SpinnerProgress();
}

/**
 * Log to stderr only if not in JSON mode.
 * Use this for notices that shouldn't pollute JSON output.
 */
export function logProgress(message: string): void {
  if (!isJsonMode()) {
    console.error(message);
  }
}
