/**
 * Default transport backed by the global `fetch`.
 * @module fetch/transport
 */

import type { Transport, TransportResponse } from './types.js';

function parseContentLength(header: string | null): number | null {
  if (header === null) return null;
  const length = Number(header);
  return Number.isSafeInteger(length) && length >= 0 ? length : null;
}

async function* emptyBody(): AsyncIterable<Uint8Array> {
  // no content
}

interface ByteReader {
  read(): Promise<{ done: boolean; value?: unknown }>;
  releaseLock(): void;
  cancel(): Promise<void>;
}

async function* readBody(reader: ByteReader): AsyncIterable<Uint8Array> {
  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) return;
      if (!(value instanceof Uint8Array)) {
        throw new TypeError('Response body yielded a non-binary chunk');
      }
      yield value;
    }
  } finally {
    reader.releaseLock();
  }
}

/**
 * HTTP(S) transport. Redirects are followed; there is no timeout.
 */
export const httpTransport: Transport = {
  async open(url: string): Promise<TransportResponse> {
    const response = await fetch(url, { redirect: 'follow' });
    const reader = response.body?.getReader();
    return {
      status: response.status,
      statusText: response.statusText,
      contentLength: parseContentLength(response.headers.get('content-length')),
      body: reader ? readBody(reader) : emptyBody(),
      cancel: async () => {
        await reader?.cancel();
      },
    };
  },
};
