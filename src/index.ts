/**
 * Client for the Pollinations text and image generation API.
 *
 * Usage:
 *   import { PollinationsClient, ImageModel } from "pollinations-client";
 *
 *   const client = new PollinationsClient({ timeout: 30 });
 *   const reply = await client.chat("Hi");
 *   await client.generateImage("a lighthouse at dusk", { model: ImageModel.FLUX });
 */

export { PollinationsClient } from "./client";
export type { PollinationsClientOptions } from "./client";
export { ChatClient, DEFAULT_SYSTEM_PROMPT } from "./services/chatClient";
export type { ChatMessage, ChatRequestBody } from "./services/chatClient";
export { ImageClient } from "./services/imageClient";
export type { GenerateImageOptions } from "./services/imageClient";
export { HeaderProfile } from "./services/headerProfile";
export type { HeaderFields } from "./services/headerProfile";
export {
  ImageModel,
  IMAGE_MODELS,
  getModelDisplayName,
  isImageModel,
} from "./services/imageModels";
export { chatValidator, imageValidator, validatorFor } from "./services/responseValidators";
export type { EndpointKind, ResponseValidator } from "./services/responseValidators";
export { fetchTransport } from "./services/transport";
export type { ApiResponse, HttpTransport } from "./services/transport";
export { randomSeed } from "./services/clientOptions";
export type { ClientOptions, SeedGenerator } from "./services/clientOptions";
export { APIError, PollinationsError, TransportError, ValidationError } from "./errors";
