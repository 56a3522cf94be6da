import type { FetchLike, FetchResponseLike } from '../fetcher/document-fetcher.js';

function respond(status: number, statusText: string, body: string | Uint8Array): FetchResponseLike {
  const bytes = typeof body === 'string' ? Buffer.from(body, 'utf8') : body;
  return {
    ok: status >= 200 && status < 300,
    status,
    statusText,
    text: async () => Buffer.from(bytes).toString('utf8'),
    arrayBuffer: async () => {
      const buffer = new ArrayBuffer(bytes.byteLength);
      new Uint8Array(buffer).set(bytes);
      return buffer;
    },
  };
}

/**
 * Serves the given bodies by url; anything else is a 404
 */
export function stubFetch(routes: Record<string, string | Uint8Array>, requested: string[] = []): FetchLike {
  return async (url) => {
    requested.push(url);
    const body = routes[url];
    if (body === undefined) {
      return respond(404, 'Not Found', '');
    }
    return respond(200, 'OK', body);
  };
}
