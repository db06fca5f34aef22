/**
 * Client for the Pollinations text endpoint.
 *
 * Sends a system + user message pair with jsonMode on and returns the
 * response body as text. The body is not parsed: jsonMode asks the model
 * for JSON, but checking the shape is left to the caller.
 */

import { env } from "../config/env";
import { logger } from "../config/logger";
import { ValidationError } from "../errors";
import {
  assertPrompt,
  nextSeed,
  resolveClientOptions,
  type ClientOptions,
  type ResolvedClientOptions,
} from "./clientOptions";
import { HeaderProfile } from "./headerProfile";
import { validatorFor } from "./responseValidators";
import { sendRequest } from "./transport";

export const DEFAULT_SYSTEM_PROMPT = "You are a helpful assistant.";

export interface ChatMessage {
  role: "system" | "user";
  content: string;
}

/** JSON body accepted by the text endpoint */
export interface ChatRequestBody {
  messages: ChatMessage[];
  jsonMode: true;
  seed: string;
}

export class ChatClient {
  readonly baseUrl: string;
  readonly timeout: number;
  private readonly options: ResolvedClientOptions;
  private readonly validator = validatorFor("chat");

  constructor(options: ClientOptions = {}) {
    this.options = resolveClientOptions(options, env.POLLINATIONS_CHAT_URL);
    this.baseUrl = this.options.baseUrl;
    this.timeout = this.options.timeout;
  }

  /**
   * Send one chat request.
   *
   * @returns The raw response body, decoded as UTF-8
   * @throws ValidationError for an empty prompt or a non-string system prompt
   * @throws APIError when the endpoint answers with anything but 200
   * @throws TransportError when no response arrives in time
   */
  async chat(prompt: string, systemPrompt: string = DEFAULT_SYSTEM_PROMPT): Promise<string> {
    assertPrompt(prompt);
    if (typeof systemPrompt !== "string") {
      throw new ValidationError("System prompt must be a string");
    }

    const headers = new HeaderProfile({
      accept: "*/*",
      contentType: "application/json",
      origin: "https://karma.pollinations.ai",
      priority: "u=1, i",
    }).render();

    const body: ChatRequestBody = {
      messages: [
        { role: "system", content: systemPrompt },
        { role: "user", content: prompt },
      ],
      jsonMode: true,
      seed: nextSeed(this.options.seed),
    };

    logger.debug("chatClient", "Sending chat request", {
      promptLength: prompt.length,
      seed: body.seed,
    });

    const response = await sendRequest(
      this.options.transport,
      this.baseUrl,
      { method: "POST", headers, body: JSON.stringify(body) },
      this.timeout
    );

    try {
      this.validator.validate(response);
    } catch (err) {
      logger.warn("chatClient", "Chat request rejected", { status: response.status });
      throw err;
    }

    const text = response.body.toString("utf-8");
    logger.info("chatClient", "Chat response received", { bytes: response.body.length });
    return text;
  }
}
