import { vi } from "vitest";
import type { HttpTransport } from "../services/transport";

/** In-process transport that answers every request with the same status and body. */
export function fakeTransport(status: number, body: string | Uint8Array | null) {
  return vi.fn<HttpTransport>(async () => new Response(body, { status }));
}

/** Seed source that always returns the same value. */
export const fixedSeed = (value: number) => () => value;
