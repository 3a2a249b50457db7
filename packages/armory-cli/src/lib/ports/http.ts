/**
 * Minimal HTTP surface the auth client and downloader depend on.
 * Allows testing transfers against in-process fake servers.
 */
export interface HttpRequestInit {
  method?: string;
  headers?: Record<string, string>;
  body?: string;
}

export interface HttpHeaders {
  get(name: string): string | null;
}

export interface HttpResponse {
  ok: boolean;
  status: number;
  statusText: string;
  headers: HttpHeaders;
  /** Response body as ordered byte chunks; null when the response has none */
  body: AsyncIterable<Uint8Array> | null;
  text(): Promise<string>;
  /** Release the connection without reading the rest of the body */
  discard(): Promise<void>;
}

export type FetchFn = (url: string, init?: HttpRequestInit) => Promise<HttpResponse>;
