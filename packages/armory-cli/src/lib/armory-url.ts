import { invalidUrl } from "./errors/catalog.js";
import { describeCause } from "./errors/types.js";

const ARMORY_MARKER = "armory";

/**
 * Parse a URL, throwing VALIDATION_INVALID_URL for anything that isn't http(s).
 */
export function parseDownloadUrl(raw: string): URL {
  let url: URL;
  try {
    url = new URL(raw);
  } catch (err) {
    throw invalidUrl(raw, describeCause(err));
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw invalidUrl(raw, `unsupported protocol ${url.protocol}`);
  }
  return url;
}

/**
 * Derive the repository base URL (`scheme://host[:port]`) that credentials are keyed by.
 * Returns undefined for URLs that don't point at an armory.
 */
export function parseRepoUrl(raw: string): string | undefined {
  const url = parseDownloadUrl(raw);
  if (!raw.includes(ARMORY_MARKER)) {
    return undefined;
  }
  return url.origin;
}
