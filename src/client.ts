import { env } from "./config/env";
import { resolveClientOptions, type ClientOptions } from "./services/clientOptions";
import { ChatClient, DEFAULT_SYSTEM_PROMPT } from "./services/chatClient";
import { ImageClient, type GenerateImageOptions } from "./services/imageClient";

export type PollinationsClientOptions = Omit<ClientOptions, "baseUrl"> & {
  chatUrl?: string;
  imageUrl?: string;
};

/**
 * One entry point for both endpoints. The two clients share a timeout,
 * transport and seed source; each keeps its own endpoint.
 */
export class PollinationsClient {
  readonly chatClient: ChatClient;
  readonly imageClient: ImageClient;
  readonly timeout: number;

  constructor(options: PollinationsClientOptions = {}) {
    const { chatUrl, imageUrl, ...shared } = options;
    // Resolve once so both clients see the same timeout and seed source
    const resolved = resolveClientOptions(shared, env.POLLINATIONS_CHAT_URL);
    this.timeout = resolved.timeout;

    this.chatClient = new ChatClient({ ...resolved, baseUrl: chatUrl ?? env.POLLINATIONS_CHAT_URL });
    this.imageClient = new ImageClient({ ...resolved, baseUrl: imageUrl ?? env.POLLINATIONS_IMAGE_URL });
  }

  chat(prompt: string, systemPrompt: string = DEFAULT_SYSTEM_PROMPT): Promise<string> {
    return this.chatClient.chat(prompt, systemPrompt);
  }

  generateImage(prompt: string, options: GenerateImageOptions = {}): Promise<string> {
    return this.imageClient.generateImage(prompt, options);
  }
}
