export type LayerhttpErrorCode =
  | "REQUEST_CONSTRUCTION_ERROR"
  | "TRANSPORT_ERROR"
  | "RESPONSE_READ_ERROR"
  | "CLIENT_CONFIG_ERROR";

export class LayerhttpError extends Error {
  readonly code: LayerhttpErrorCode;

  constructor(code: LayerhttpErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "LayerhttpError";
    this.code = code;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class ConstructionError extends LayerhttpError {
  constructor(detail: string, cause?: unknown) {
    super("REQUEST_CONSTRUCTION_ERROR", `failed to create request: ${detail}`, { cause });
    this.name = "ConstructionError";
  }
}

export class TransportError extends LayerhttpError {
  constructor(cause: unknown) {
    super("TRANSPORT_ERROR", `request failed: ${describeError(cause)}`, { cause });
    this.name = "TransportError";
  }
}

export class ReadError extends LayerhttpError {
  constructor(cause: unknown) {
    super("RESPONSE_READ_ERROR", `failed to read response body: ${describeError(cause)}`, {
      cause,
    });
    this.name = "ReadError";
  }
}

export class ClientConfigError extends LayerhttpError {
  constructor(message: string, cause?: unknown) {
    super("CLIENT_CONFIG_ERROR", message, { cause });
    this.name = "ClientConfigError";
  }
}
