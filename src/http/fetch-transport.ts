import type { HttpRequest, HttpResponse, HttpTransport } from '../types.js';

/**
 * Create an HTTP transport backed by the Fetch API.
 *
 * @param fetchImpl - Fetch implementation (default: the global fetch)
 */
export function createFetchTransport(fetchImpl: typeof fetch = globalThis.fetch): HttpTransport {
  return {
    async send(request: HttpRequest): Promise<HttpResponse> {
      const response = await fetchImpl(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
      });

      return {
        status: response.status,
        body: new Uint8Array(await response.arrayBuffer()),
      };
    },
  };
}
