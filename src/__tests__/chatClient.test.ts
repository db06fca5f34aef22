/**
 * ChatClient tests.
 *
 * Every request goes through an in-process fake transport, so nothing
 * leaves the test process.
 */

import { describe, it, expect, vi } from "vitest";
import { APIError, TransportError, ValidationError } from "../errors";
import { ChatClient, DEFAULT_SYSTEM_PROMPT } from "../services/chatClient";
import { randomSeed } from "../services/clientOptions";
import type { HttpTransport } from "../services/transport";
import { fakeTransport, fixedSeed } from "./helpers";

function lastCall(transport: ReturnType<typeof fakeTransport>) {
  const call = transport.mock.calls.at(-1);
  if (!call) throw new Error("transport was not called");
  const [url, init] = call;
  return { url, init };
}

describe("ChatClient.chat", () => {
  it("returns the response body unchanged", async () => {
    const transport = fakeTransport(200, '{"reply":"hello"}');
    const client = new ChatClient({ transport, seed: fixedSeed(42) });

    await expect(client.chat("Hi")).resolves.toBe('{"reply":"hello"}');
  });

  it("issues exactly one POST to the chat endpoint", async () => {
    const transport = fakeTransport(200, "ok");
    const client = new ChatClient({ transport, seed: fixedSeed(42) });

    await client.chat("Hi");

    expect(transport).toHaveBeenCalledTimes(1);
    const { url, init } = lastCall(transport);
    expect(url).toBe("https://text.pollinations.ai/");
    expect(init.method).toBe("POST");
    expect(init.signal).toBeInstanceOf(AbortSignal);
  });

  it("sends the system and user messages in order with jsonMode and the seed", async () => {
    const transport = fakeTransport(200, "ok");
    const client = new ChatClient({ transport, seed: fixedSeed(42) });

    await client.chat("What is a haiku?", "Answer in one line.");

    const { init } = lastCall(transport);
    expect(JSON.parse(String(init.body))).toEqual({
      messages: [
        { role: "system", content: "Answer in one line." },
        { role: "user", content: "What is a haiku?" },
      ],
      jsonMode: true,
      seed: "42",
    });
  });

  it("uses the default system prompt", async () => {
    const transport = fakeTransport(200, "ok");
    const client = new ChatClient({ transport, seed: fixedSeed(10) });

    await client.chat("Hi");

    const body = JSON.parse(String(lastCall(transport).init.body));
    expect(body.messages[0]).toEqual({ role: "system", content: DEFAULT_SYSTEM_PROMPT });
    expect(DEFAULT_SYSTEM_PROMPT).toBe("You are a helpful assistant.");
  });

  it("sends a two-digit seed string from the default generator", async () => {
    const transport = fakeTransport(200, "ok");
    const client = new ChatClient({ transport });

    await client.chat("Hi");

    const body = JSON.parse(String(lastCall(transport).init.body));
    expect(body.seed).toMatch(/^[1-9][0-9]$/);
    const seed = Number(body.seed);
    expect(seed).toBeGreaterThanOrEqual(10);
    expect(seed).toBeLessThanOrEqual(99);
  });

  it("sends the JSON headers", async () => {
    const transport = fakeTransport(200, "ok");
    const client = new ChatClient({ transport, seed: fixedSeed(42) });

    await client.chat("Hi");

    expect(lastCall(transport).init.headers).toMatchObject({
      accept: "*/*",
      "content-type": "application/json",
      origin: "https://karma.pollinations.ai",
      priority: "u=1, i",
      referer: "https://karma.pollinations.ai/",
    });
  });

  it("accepts an empty 200 body", async () => {
    const client = new ChatClient({ transport: fakeTransport(200, ""), seed: fixedSeed(42) });
    await expect(client.chat("Hi")).resolves.toBe("");
  });

  it("decodes the body as UTF-8", async () => {
    const bytes = new TextEncoder().encode("héllo ✓");
    const client = new ChatClient({ transport: fakeTransport(200, bytes), seed: fixedSeed(42) });
    await expect(client.chat("Hi")).resolves.toBe("héllo ✓");
  });

  it.each(["", "   ", "\n\t"])("rejects the blank prompt %j without a request", async (prompt) => {
    const transport = fakeTransport(200, "ok");
    const client = new ChatClient({ transport });

    await expect(client.chat(prompt)).rejects.toBeInstanceOf(ValidationError);
    expect(transport).not.toHaveBeenCalled();
  });

  it("rejects a non-string prompt without a request", async () => {
    const transport = fakeTransport(200, "ok");
    const client = new ChatClient({ transport });

    await expect(client.chat(42 as unknown as string)).rejects.toThrow(
      new ValidationError("Prompt must be a non-empty string")
    );
    expect(transport).not.toHaveBeenCalled();
  });

  it("rejects a non-string system prompt without a request", async () => {
    const transport = fakeTransport(200, "ok");
    const client = new ChatClient({ transport });

    await expect(client.chat("Hi", null as unknown as string)).rejects.toThrow(
      new ValidationError("System prompt must be a string")
    );
    expect(transport).not.toHaveBeenCalled();
  });

  it.each([5, 100, 42.5])("rejects the injected seed %d without a request", async (value) => {
    const transport = fakeTransport(200, "ok");
    const client = new ChatClient({ transport, seed: fixedSeed(value) });

    await expect(client.chat("Hi")).rejects.toThrow(
      new ValidationError(`Seed must be an integer between 10 and 99 (got ${value})`)
    );
    expect(transport).not.toHaveBeenCalled();
  });

  it("throws APIError carrying the status and body for a non-200 response", async () => {
    const client = new ChatClient({ transport: fakeTransport(502, "Bad Gateway"), seed: fixedSeed(42) });

    const err = await client.chat("Hi").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(APIError);
    if (err instanceof APIError) {
      expect(err.statusCode).toBe(502);
      expect(err.message).toBe("API Error 502: Bad Gateway");
    }
  });

  it("wraps a failed fetch in TransportError", async () => {
    const cause = new TypeError("fetch failed");
    const transport = vi.fn<HttpTransport>(async () => {
      throw cause;
    });
    const client = new ChatClient({ transport, seed: fixedSeed(42) });

    const err = await client.chat("Hi").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(TransportError);
    if (err instanceof TransportError) {
      expect(err.message).toBe("POST https://text.pollinations.ai/ failed: fetch failed");
      expect(err.cause).toBe(cause);
    }
    expect(transport).toHaveBeenCalledTimes(1);
  });

  it("posts to a custom base URL", async () => {
    const transport = fakeTransport(200, "ok");
    const client = new ChatClient({ transport, baseUrl: "http://localhost:8080/chat" });

    await client.chat("Hi");

    expect(lastCall(transport).url).toBe("http://localhost:8080/chat");
  });
});

describe("ChatClient options", () => {
  it("defaults the timeout to 10 seconds", () => {
    expect(new ChatClient().timeout).toBe(10);
  });

  it.each([0, -1, Number.NaN, 0.0004, 30 * 24 * 3600, 5_000_000])(
    "rejects the timeout %d",
    (timeout) => {
      expect(() => new ChatClient({ timeout })).toThrow(
        new ValidationError("Timeout must be between 0.001 and 2147483.647 seconds")
      );
    }
  );

  it.each([0.001, 2_147_483])("accepts the timeout %d", (timeout) => {
    expect(new ChatClient({ timeout }).timeout).toBe(timeout);
  });

  it("passes an in-range timeout to the transport as a live signal", async () => {
    const transport = fakeTransport(200, "ok");
    const client = new ChatClient({ transport, timeout: 2_147_483, seed: fixedSeed(42) });

    await client.chat("Hi");

    expect(lastCall(transport).init.signal?.aborted).toBe(false);
  });
});

describe("randomSeed", () => {
  it("stays within [10, 99]", () => {
    for (let i = 0; i < 500; i++) {
      const seed = randomSeed();
      expect(Number.isInteger(seed)).toBe(true);
      expect(seed).toBeGreaterThanOrEqual(10);
      expect(seed).toBeLessThanOrEqual(99);
    }
  });
});
