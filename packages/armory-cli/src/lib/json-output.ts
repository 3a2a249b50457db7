/**
 * JSON output utilities for machine-readable CLI output.
 */

import pkg from "../../package.json" with { type: "json" };

export interface JsonSuccess<T> {
  success: true;
  data: T;
  meta: {
    version: string;
    duration?: number;
  };
}

export interface DownloadJsonData {
  filename: string;
  path: string;
  bytesWritten: number;
  resumedFrom: number;
  totalSize: number;
}

export interface RepositoryJsonData {
  url: string;
  username: string;
}

export function toJsonSuccess<T>(data: T, duration?: number): JsonSuccess<T> {
  return {
    success: true,
    data,
    meta: { version: pkg.version, duration },
  };
}

/**
 * Print a success envelope to stdout.
 */
export function outputJson<T>(data: T, duration?: number): void {
  console.log(JSON.stringify(toJsonSuccess(data, duration), null, 2));
}
