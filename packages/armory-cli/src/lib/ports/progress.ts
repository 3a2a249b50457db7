/**
 * Receives byte-count events from a transfer.
 * Keeps the downloader free of terminal concerns.
 */
export interface ProgressReporter {
  /** `knownTotal` is 0 when the size is unknown */
  start(filename: string, knownTotal: number, resumedFrom: number): void;
  advance(byteCount: number): void;
  finish(filename: string): void;
  fail(message: string): void;
}
