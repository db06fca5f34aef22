/**
 * Options shared by every endpoint client, and the seed source.
 */

import { randomInt } from "crypto";
import { env, isValidTimeout, TIMEOUT_RANGE } from "../config/env";
import { ValidationError } from "../errors";
import { fetchTransport, type HttpTransport } from "./transport";

/** Must return an integer in [10, 99]; anything else fails the request with a ValidationError. */
export type SeedGenerator = () => number;

export const randomSeed: SeedGenerator = () => randomInt(10, 100);

export interface ClientOptions {
  /** Request timeout in seconds. Defaults to POLLINATIONS_TIMEOUT_SECONDS (10). */
  timeout?: number;
  /** Endpoint override, e.g. for a self-hosted mirror. */
  baseUrl?: string;
  /** Replaces the global fetch. */
  transport?: HttpTransport;
  /** Replaces the random seed source. */
  seed?: SeedGenerator;
}

export interface ResolvedClientOptions {
  timeout: number;
  baseUrl: string;
  transport: HttpTransport;
  seed: SeedGenerator;
}

export function resolveClientOptions(
  options: ClientOptions,
  defaultBaseUrl: string
): ResolvedClientOptions {
  const timeout = options.timeout ?? env.POLLINATIONS_TIMEOUT_SECONDS;
  if (!isValidTimeout(timeout)) {
    throw new ValidationError(`Timeout must be ${TIMEOUT_RANGE}`);
  }

  return {
    timeout,
    baseUrl: options.baseUrl ?? defaultBaseUrl,
    transport: options.transport ?? fetchTransport,
    seed: options.seed ?? randomSeed,
  };
}

/** Seed as the API expects it: a decimal string. */
export function nextSeed(seed: SeedGenerator): string {
  const value = seed();
  if (!Number.isInteger(value) || value < 10 || value > 99) {
    throw new ValidationError(`Seed must be an integer between 10 and 99 (got ${value})`);
  }
  return String(value);
}

export function assertPrompt(prompt: unknown): asserts prompt is string {
  if (typeof prompt !== "string" || prompt.trim() === "") {
    throw new ValidationError("Prompt must be a non-empty string");
  }
}

export function assertPositiveInteger(value: unknown, label: string): asserts value is number {
  if (typeof value !== "number" || !Number.isInteger(value) || value <= 0) {
    throw new ValidationError(`${label} must be a positive integer`);
  }
}
