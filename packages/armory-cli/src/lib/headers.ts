import { posix, win32 } from "path";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ContentRange {
  unit: string;
  /** Absent for the unsatisfied form `bytes *\/total` */
  start?: number;
  end?: number;
  /** Absent when the server sends `*` as the complete length */
  total?: number;
}

export const FALLBACK_FILENAME = "download";

// ---------------------------------------------------------------------------
// Content-Disposition
// ---------------------------------------------------------------------------

const EXTENDED_FILENAME = /(?:^|;)\s*filename\*\s*=\s*([^']*)'[^']*'([^;]*)/i;
const PLAIN_FILENAME = /(?:^|;)\s*filename\s*=\s*("(?:[^"\\]|\\.)*"|[^;]*)/i;

function stripQuotes(value: string): string {
  const trimmed = value.trim();
  if (trimmed.length >= 2 && trimmed.startsWith('"') && trimmed.endsWith('"')) {
    return trimmed.slice(1, -1).trim();
  }
  return trimmed.replace(/^"+|"+$/g, "").trim();
}

function decodeExtendedValue(charset: string, encoded: string): string {
  const value = stripQuotes(encoded);
  const cs = charset.trim().toLowerCase();
  if (cs === "iso-8859-1" || cs === "latin1") {
    return value.replace(/%([0-9a-f]{2})/gi, (_, hex: string) =>
      String.fromCharCode(parseInt(hex, 16))
    );
  }
  return tryDecodeURIComponent(value);
}

function tryDecodeURIComponent(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

/**
 * Reduce a server-supplied name to its last path component.
 * Returns undefined for names that can't be used as a file in the target directory.
 */
export function sanitizeFilename(name: string): string | undefined {
  const base = win32.basename(posix.basename(name)).trim();
  if (base === "" || base === "." || base === "..") {
    return undefined;
  }
  return base;
}

/**
 * Extract the filename from a Content-Disposition header.
 * `filename*` (RFC 5987) wins over `filename`. Returns undefined when neither yields a usable name.
 */
export function parseContentDisposition(header: string | null | undefined): string | undefined {
  if (!header) return undefined;

  const extended = EXTENDED_FILENAME.exec(header);
  if (extended) {
    const name = sanitizeFilename(decodeExtendedValue(extended[1], extended[2]));
    if (name) return name;
  }

  const plain = PLAIN_FILENAME.exec(header);
  if (plain) {
    return sanitizeFilename(stripQuotes(plain[1]));
  }

  return undefined;
}

// ---------------------------------------------------------------------------
// Content-Range
// ---------------------------------------------------------------------------

const SATISFIED_RANGE = /^\s*(\w+)\s+(\d+)-(\d+)\/(\d+|\*)\s*$/;
const UNSATISFIED_RANGE = /^\s*(\w+)\s+\*\/(\d+)\s*$/;

/**
 * Parse `bytes start-end/total`, `bytes start-end/*` or `bytes *\/total`.
 */
export function parseContentRange(header: string | null | undefined): ContentRange | undefined {
  if (!header) return undefined;

  const satisfied = SATISFIED_RANGE.exec(header);
  if (satisfied) {
    const start = Number(satisfied[2]);
    const end = Number(satisfied[3]);
    if (end < start) return undefined;
    return {
      unit: satisfied[1].toLowerCase(),
      start,
      end,
      total: satisfied[4] === "*" ? undefined : Number(satisfied[4]),
    };
  }

  const unsatisfied = UNSATISFIED_RANGE.exec(header);
  if (unsatisfied) {
    return { unit: unsatisfied[1].toLowerCase(), total: Number(unsatisfied[2]) };
  }

  return undefined;
}

/**
 * Parse a Content-Length header; undefined when absent or not a non-negative integer.
 */
export function parseContentLength(header: string | null | undefined): number | undefined {
  if (!header || !/^\s*\d+\s*$/.test(header)) return undefined;
  return Number(header);
}

// ---------------------------------------------------------------------------
// URL fallback
// ---------------------------------------------------------------------------

/**
 * Last non-empty path segment of a URL, ignoring query and fragment.
 */
export function filenameFromUrl(raw: string): string {
  let pathname: string;
  try {
    pathname = new URL(raw).pathname;
  } catch {
    return FALLBACK_FILENAME;
  }

  const segment = pathname.split("/").filter((s) => s !== "").pop();
  if (!segment) return FALLBACK_FILENAME;

  return sanitizeFilename(tryDecodeURIComponent(segment)) ?? FALLBACK_FILENAME;
}
