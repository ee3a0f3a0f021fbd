import type { HttpTransport } from "./transport";

export interface FetchTransportOptions {
  fetch?: typeof fetch;
}

export function createFetchTransport(options: FetchTransportOptions = {}): HttpTransport {
  const fetchImpl = options.fetch ?? fetch;

  return {
    async send(request) {
      const response = await fetchImpl(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        signal: request.signal,
      });

      return {
        status: response.status,
        statusText: response.statusText,
        headers: response.headers,
        body: response.body,
      };
    },
  };
}
