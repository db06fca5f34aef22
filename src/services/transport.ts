/**
 * The one place an HTTP request leaves the process.
 *
 * Uses the global fetch by default; callers (and tests) can pass any
 * function with the same shape. The body is read in full before the
 * response is handed to a validator.
 */

import { TransportError } from "../errors";

export type HttpTransport = (url: string, init: RequestInit) => Promise<Response>;

/** A completed response with its body already buffered. */
export interface ApiResponse {
  status: number;
  body: Buffer;
}

export const fetchTransport: HttpTransport = (url, init) => fetch(url, init);

/**
 * Perform one request, aborting after `timeoutSeconds`.
 *
 * @throws TransportError when no response arrives (network failure or timeout)
 */
export async function sendRequest(
  transport: HttpTransport,
  url: string,
  init: RequestInit,
  timeoutSeconds: number
): Promise<ApiResponse> {
  let response: Response;
  let body: Buffer;

  try {
    response = await transport(url, {
      ...init,
      signal: AbortSignal.timeout(Math.round(timeoutSeconds * 1000)),
    });
    body = Buffer.from(await response.arrayBuffer());
  } catch (error: unknown) {
    const message =
      error instanceof Error ? error.message : "Unknown network error";
    throw new TransportError(
      `${init.method ?? "GET"} ${url} failed: ${message}`,
      { cause: error }
    );
  }

  return { status: response.status, body };
}
