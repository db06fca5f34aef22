/**
 * Centralized environment configuration.
 * Reads endpoint and timeout defaults for the API clients and exports typed config.
 * Invalid values throw at import time so a misconfigured caller fails fast.
 */

import dotenv from "dotenv";
import * as path from "path";

// Auto-load .env from the package root directory
dotenv.config({ path: path.resolve(__dirname, "../../.env") });

interface EnvConfig {
  /** Default request timeout for every client, in seconds (default: 10) */
  POLLINATIONS_TIMEOUT_SECONDS: number;
  /** Chat completion endpoint (default: https://text.pollinations.ai/) */
  POLLINATIONS_CHAT_URL: string;
  /** Image generation endpoint base; the prompt is appended (default: https://pollinations.ai/p/) */
  POLLINATIONS_IMAGE_URL: string;
  /** Minimum log level: debug, info, warn, error (default: info) */
  LOG_LEVEL: string;
  /** Node environment (default: development) */
  NODE_ENV: string;
}

const DEFAULT_CHAT_URL = "https://text.pollinations.ai/";
const DEFAULT_IMAGE_URL = "https://pollinations.ai/p/";

type EnvSource = Record<string, string | undefined>;

/** Longest delay a Node timer accepts, in milliseconds (2^31 - 1). */
const MAX_TIMER_MS = 2_147_483_647;

/** Timeouts are applied as a timer in whole milliseconds: 1 ms up to MAX_TIMER_MS. */
function isValidTimeout(seconds: number): boolean {
  if (!Number.isFinite(seconds)) return false;
  const ms = Math.round(seconds * 1000);
  return ms >= 1 && ms <= MAX_TIMER_MS;
}

const TIMEOUT_RANGE = `between 0.001 and ${MAX_TIMER_MS / 1000} seconds`;

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === "http:" || url.protocol === "https:";
  } catch {
    return false;
  }
}

/**
 * Build the configuration from a variable source, collecting every
 * invalid entry before throwing.
 */
function parseEnvConfig(source: EnvSource): EnvConfig {
  const problems: string[] = [];

  const rawTimeout = source.POLLINATIONS_TIMEOUT_SECONDS || "10";
  const timeout = Number(rawTimeout);
  if (!isValidTimeout(timeout)) {
    problems.push(`POLLINATIONS_TIMEOUT_SECONDS must be ${TIMEOUT_RANGE} (got "${rawTimeout}")`);
  }

  const chatUrl = source.POLLINATIONS_CHAT_URL || DEFAULT_CHAT_URL;
  if (!isHttpUrl(chatUrl)) {
    problems.push(`POLLINATIONS_CHAT_URL must be an http(s) URL (got "${chatUrl}")`);
  }

  const imageUrl = source.POLLINATIONS_IMAGE_URL || DEFAULT_IMAGE_URL;
  if (!isHttpUrl(imageUrl)) {
    problems.push(`POLLINATIONS_IMAGE_URL must be an http(s) URL (got "${imageUrl}")`);
  }

  if (problems.length > 0) {
    const message = [
      "",
      "=== Invalid Environment Variables ===",
      "",
      ...problems.map((p) => `  - ${p}`),
      "",
      "Fix these in your .env file or environment, or unset them to use the defaults.",
      "",
    ].join("\n");

    throw new Error(message);
  }

  return {
    POLLINATIONS_TIMEOUT_SECONDS: timeout,
    POLLINATIONS_CHAT_URL: chatUrl,
    POLLINATIONS_IMAGE_URL: imageUrl,
    LOG_LEVEL: (source.LOG_LEVEL || "info").toLowerCase(),
    NODE_ENV: source.NODE_ENV || "development",
  };
}

// Validate and export config as a singleton
const env = parseEnvConfig(process.env);

export { env, parseEnvConfig, isValidTimeout, TIMEOUT_RANGE };
export type { EnvConfig };
