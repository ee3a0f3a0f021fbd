import { ConstructionError } from "./errors";
import { basicAuthToken } from "./middleware";
import { HttpMethodSchema, RequestUrlSchema } from "./schemas";
import type { TransportRequest } from "./transport";

export interface CreateRequestInit {
  headers?: Record<string, string>;
  body?: string | Uint8Array;
  signal?: AbortSignal;
}

/**
 * Moves `user:password@` out of the URL into a basic credential, unless the caller
 * already set `Authorization`. Middlewares run later and still override it.
 */
function applyUserinfo(target: URL, headers: Headers): void {
  let username: string;
  let password: string;
  try {
    username = decodeURIComponent(target.username);
    password = decodeURIComponent(target.password);
  } catch (error) {
    throw new ConstructionError("Invalid percent-encoding in URL credentials", error);
  }

  target.username = "";
  target.password = "";

  if (!headers.has("Authorization")) {
    headers.set("Authorization", `Basic ${basicAuthToken(username, password)}`);
  }
}

export function createRequest(
  method: string,
  url: string,
  init: CreateRequestInit = {},
): TransportRequest {
  const parsedMethod = HttpMethodSchema.safeParse(method);
  const parsedUrl = RequestUrlSchema.safeParse(url);

  const issues = [
    ...(parsedMethod.success ? [] : parsedMethod.error.issues),
    ...(parsedUrl.success ? [] : parsedUrl.error.issues),
  ];

  if (!parsedMethod.success || !parsedUrl.success) {
    throw new ConstructionError(issues.map((issue) => issue.message).join("; "));
  }

  let target: URL;
  try {
    target = new URL(parsedUrl.data);
  } catch (error) {
    throw new ConstructionError("Invalid URL", error);
  }

  const headers = new Headers(init.headers);
  if (target.username || target.password) {
    applyUserinfo(target, headers);
  }

  return {
    method: parsedMethod.data,
    url: target,
    headers,
    body: init.body,
    signal: init.signal,
  };
}
