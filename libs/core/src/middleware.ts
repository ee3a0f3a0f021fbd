import { Buffer } from "node:buffer";
import { ClientConfigError, describeError } from "./errors";
import type { Logger } from "./logger";
import { ApiKeySchema, type BasicAuthCredentials, BasicAuthCredentialsSchema } from "./schemas";
import type { HttpTransport, TransportRequest } from "./transport";

/**
 * Wraps a transport with another transport. Implementations decorate the request and
 * hand it to `inner` otherwise unchanged, returning the inner result as is.
 */
export interface Middleware {
  readonly name: string;
  wrap(inner: HttpTransport): HttpTransport;
}

/**
 * Folds `middlewares` over `base` from left to right: `[m1, m2]` yields
 * `m2.wrap(m1.wrap(base))`, so the last listed middleware sees the request first.
 */
export function composeTransport(
  base: HttpTransport,
  middlewares: readonly Middleware[],
): HttpTransport {
  return middlewares.reduce<HttpTransport>((inner, middleware) => middleware.wrap(inner), base);
}

function validationMessage(issues: ReadonlyArray<{ message: string }>): string {
  return issues.map((issue) => issue.message).join("; ");
}

export function basicAuthToken(username: string, password: string): string {
  return Buffer.from(`${username}:${password}`, "utf8").toString("base64");
}

export class BasicAuthMiddleware implements Middleware {
  readonly name = "basic-auth";
  readonly credentials: Readonly<BasicAuthCredentials>;

  constructor(username: string, password: string) {
    const parsed = BasicAuthCredentialsSchema.safeParse({ username, password });
    if (!parsed.success) {
      throw new ClientConfigError(validationMessage(parsed.error.issues));
    }
    this.credentials = parsed.data;
  }

  wrap(inner: HttpTransport): HttpTransport {
    const header = `Basic ${basicAuthToken(this.credentials.username, this.credentials.password)}`;
    return {
      async send(request) {
        request.headers.set("Authorization", header);
        return inner.send(request);
      },
    };
  }
}

export class ApiKeyAuthMiddleware implements Middleware {
  readonly name = "api-key-auth";
  readonly apiKey: string;

  constructor(apiKey: string) {
    const parsed = ApiKeySchema.safeParse(apiKey);
    if (!parsed.success) {
      throw new ClientConfigError(validationMessage(parsed.error.issues));
    }
    this.apiKey = parsed.data;
  }

  wrap(inner: HttpTransport): HttpTransport {
    const header = `Bearer ${this.apiKey}`;
    return {
      async send(request) {
        request.headers.set("Authorization", header);
        return inner.send(request);
      },
    };
  }
}

function displayUrl(request: TransportRequest): string {
  if (!request.url.username && !request.url.password) {
    return request.url.href;
  }

  const copy = new URL(request.url.href);
  copy.username = "";
  copy.password = "";
  return copy.href;
}

export interface LoggingMiddlewareOptions {
  now?: () => number;
}

export class LoggingMiddleware implements Middleware {
  readonly name = "logging";
  readonly logger: Logger;
  private readonly now: () => number;

  constructor(logger: Logger, options: LoggingMiddlewareOptions = {}) {
    this.logger = logger;
    this.now = options.now ?? Date.now;
  }

  wrap(inner: HttpTransport): HttpTransport {
    const { logger, now } = this;
    return {
      async send(request) {
        const target = `${request.method} ${displayUrl(request)}`;
        const startedAt = now();
        logger.debug(`-> ${target}`);

        try {
          const response = await inner.send(request);
          logger.info(
            `<- ${target} ${response.status} ${response.statusText} (${now() - startedAt}ms)`,
          );
          return response;
        } catch (error) {
          logger.error(`<- ${target} failed: ${describeError(error)} (${now() - startedAt}ms)`);
          throw error;
        }
      },
    };
  }
}
