import { Buffer } from "node:buffer";
import type { ReadableStream } from "node:stream/web";
import { describeError, ReadError } from "./errors";
import type { Logger } from "./logger";

/**
 * Settles with `promise`, or rejects with the signal's reason as soon as it aborts.
 * The original promise keeps running; its outcome is observed either way.
 */
export function abortable<T>(promise: Promise<T>, signal: AbortSignal | undefined): Promise<T> {
  if (!signal) {
    return promise;
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener("abort", onAbort, { once: true });
    }

    void promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      },
    );
  });
}

export async function discardBody(
  body: ReadableStream<Uint8Array> | null,
  logger: Logger,
  reason?: unknown,
): Promise<void> {
  if (!body || body.locked) {
    return;
  }

  try {
    await body.cancel(reason);
  } catch (error) {
    logger.warn(`Failed to release response body: ${describeError(error)}`);
  }
}

export interface ReadBodyOptions {
  signal?: AbortSignal;
  logger: Logger;
}

/**
 * Reads the whole stream into memory. The stream is released on every path; a failure
 * part way through yields a `ReadError` and never a partial body.
 */
export async function readBody(
  body: ReadableStream<Uint8Array> | null,
  options: ReadBodyOptions,
): Promise<Buffer> {
  if (!body) {
    return Buffer.alloc(0);
  }

  const reader = body.getReader();
  const chunks: Uint8Array[] = [];

  try {
    for (;;) {
      const { done, value } = await abortable(reader.read(), options.signal);
      if (done) {
        break;
      }
      chunks.push(value);
    }
  } catch (error) {
    // An errored stream is already closed; only an abort leaves it open.
    if (options.signal?.aborted) {
      try {
        await reader.cancel(options.signal.reason);
      } catch (cancelError) {
        options.logger.warn(`Failed to release response body: ${describeError(cancelError)}`);
      }
    }
    throw new ReadError(error);
  } finally {
    reader.releaseLock();
  }

  return Buffer.concat(chunks);
}
