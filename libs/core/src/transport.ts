import type { ReadableStream } from "node:stream/web";

/**
 * A single outgoing request. Headers stay mutable until a transport dispatches it;
 * middlewares decorate them on the way through the chain.
 */
export interface TransportRequest {
  readonly method: string;
  readonly url: URL;
  readonly headers: Headers;
  readonly body?: string | Uint8Array;
  readonly signal?: AbortSignal;
}

/**
 * Whoever consumes `body` releases it exactly once, either by reading it to the end or
 * by cancelling the stream.
 */
export interface TransportResponse {
  status: number;
  statusText: string;
  headers: Headers;
  body: ReadableStream<Uint8Array> | null;
}

export interface HttpTransport {
  send(request: TransportRequest): Promise<TransportResponse>;
}

export type SendFunction = HttpTransport["send"];

export function transportFromFunction(send: SendFunction): HttpTransport {
  return { send };
}
