import fetch from "node-fetch";
import type { FetchFn } from "../ports/http.js";

function isAsyncIterable(value: unknown): value is AsyncIterable<unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    Symbol.asyncIterator in value &&
    typeof value[Symbol.asyncIterator] === "function"
  );
}

function isDestroyable(value: unknown): value is { destroy(): unknown } {
  return (
    typeof value === "object" &&
    value !== null &&
    "destroy" in value &&
    typeof value.destroy === "function"
  );
}

async function* toByteChunks(source: AsyncIterable<unknown>): AsyncGenerator<Uint8Array> {
  for await (const chunk of source) {
    if (chunk instanceof Uint8Array) {
      yield chunk;
    } else if (typeof chunk === "string") {
      yield Buffer.from(chunk);
    } else {
      throw new TypeError(`Unexpected body chunk of type ${typeof chunk}`);
    }
  }
}

/**
 * Real HTTP transport backed by node-fetch.
 * Response bodies are node streams, surfaced as ordered byte chunks.
 */
export const nodeFetch: FetchFn = async (url, init) => {
  const response = await fetch(url, init);
  const body: unknown = response.body;

  return {
    ok: response.ok,
    status: response.status,
    statusText: response.statusText,
    headers: response.headers,
    body: isAsyncIterable(body) ? toByteChunks(body) : null,
    text: () => response.text(),
    async discard() {
      if (isDestroyable(body)) {
        body.destroy();
      }
    },
  };
};
