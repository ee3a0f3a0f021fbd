import type { Buffer } from "node:buffer";
import { abortable, discardBody, readBody } from "./body";
import { describeError, TransportError } from "./errors";
import type { Logger } from "./logger";
import { composeTransport, type Middleware } from "./middleware";
import { createRequest } from "./request";
import type { HttpTransport, TransportResponse } from "./transport";

export interface HttpClientOptions {
  logger?: Logger;
}

export interface GetOptions {
  signal?: AbortSignal;
}

export class HttpClient {
  private readonly transport: HttpTransport;
  private readonly logger: Logger;

  constructor(
    base: HttpTransport,
    middlewares: readonly Middleware[] = [],
    options: HttpClientOptions = {},
  ) {
    this.transport = composeTransport(base, middlewares);
    this.logger = options.logger ?? console;
  }

  /**
   * Sends a GET request through the middleware chain and returns the whole body.
   *
   * @throws ConstructionError when `url` cannot be turned into a request
   * @throws TransportError when the chain rejects or `signal` aborts before a response
   * @throws ReadError when the body stream fails or `signal` aborts while reading
   */
  async get(url: string, options: GetOptions = {}): Promise<Buffer> {
    const { signal } = options;
    const request = createRequest("GET", url, { signal });

    if (signal?.aborted) {
      throw new TransportError(signal.reason);
    }

    let pending: Promise<TransportResponse> | undefined;
    let response: TransportResponse;
    try {
      pending = this.transport.send(request);
      response = await abortable(pending, signal);
    } catch (error) {
      if (pending && signal?.aborted) {
        this.releaseLateResponse(pending);
      }
      throw new TransportError(error);
    }

    return readBody(response.body, { signal, logger: this.logger });
  }

  private releaseLateResponse(pending: Promise<TransportResponse>): void {
    void pending.then(
      (late) => discardBody(late.body, this.logger),
      (error: unknown) => {
        this.logger.debug(`Transport settled after abort: ${describeError(error)}`);
      },
    );
  }
}

export function createHttpClient(base: HttpTransport, ...middlewares: Middleware[]): HttpClient {
  return new HttpClient(base, middlewares);
}
