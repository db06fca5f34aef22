/**
 * Client for the Pollinations image endpoint.
 *
 * The prompt travels in the URL path and generation settings in the query
 * string. The returned bytes are written straight to disk; the write
 * replaces any existing file and is not atomic.
 */

import * as fs from "fs";
import { env } from "../config/env";
import { logger } from "../config/logger";
import { ValidationError } from "../errors";
import {
  assertPositiveInteger,
  assertPrompt,
  nextSeed,
  resolveClientOptions,
  type ClientOptions,
  type ResolvedClientOptions,
} from "./clientOptions";
import { HeaderProfile } from "./headerProfile";
import { ImageModel, isImageModel } from "./imageModels";
import { validatorFor } from "./responseValidators";
import { sendRequest } from "./transport";

export interface GenerateImageOptions {
  /** Backend to render with (default: flux-3d) */
  model?: ImageModel;
  /** Where to write the image (default: "image.png") */
  imagePath?: string;
  /** Width in pixels (default: 1024) */
  width?: number;
  /** Height in pixels (default: 1024) */
  height?: number;
  /** Let the service rewrite the prompt for better results (default: true) */
  enhance?: boolean;
}

export class ImageClient {
  readonly baseUrl: string;
  readonly timeout: number;
  private readonly options: ResolvedClientOptions;
  private readonly validator = validatorFor("image");

  constructor(options: ClientOptions = {}) {
    this.options = resolveClientOptions(options, env.POLLINATIONS_IMAGE_URL);
    // the prompt is appended as the last path segment
    const base = this.options.baseUrl;
    this.baseUrl = base.endsWith("/") ? base : `${base}/`;
    this.timeout = this.options.timeout;
  }

  /** Full request URL: base + encoded prompt, then the query parameters in wire order. */
  buildUrl(
    prompt: string,
    params: { width: number; height: number; model: ImageModel; seed: string; enhance: boolean }
  ): string {
    const query = new URLSearchParams({
      width: String(params.width),
      height: String(params.height),
      model: params.model,
      seed: params.seed,
      nologo: "true",
      enhance: String(params.enhance),
    });
    return `${this.baseUrl}${encodeURIComponent(prompt)}?${query.toString()}`;
  }

  /**
   * Generate an image and save it to `imagePath`.
   *
   * @returns Confirmation naming the saved path
   * @throws ValidationError for invalid arguments, before any request
   * @throws APIError for a non-200 status or an empty body
   * @throws TransportError when no response arrives in time
   */
  async generateImage(prompt: string, options: GenerateImageOptions = {}): Promise<string> {
    const {
      model = ImageModel.FLUX_3D,
      imagePath = "image.png",
      width = 1024,
      height = 1024,
      enhance = true,
    } = options;

    assertPrompt(prompt);
    if (!isImageModel(model)) {
      throw new ValidationError("Model must be one of the ImageModel values");
    }
    assertPositiveInteger(width, "Width");
    assertPositiveInteger(height, "Height");
    if (typeof enhance !== "boolean") {
      throw new ValidationError("Enhance must be a boolean");
    }
    if (typeof imagePath !== "string" || imagePath === "") {
      throw new ValidationError("Image path must be a non-empty string");
    }

    const headers = new HeaderProfile({
      accept: "image/avif,image/webp,image/apng,image/svg+xml,image/*,*/*;q=0.8",
      priority: "i",
    }).render();

    const seed = nextSeed(this.options.seed);
    const url = this.buildUrl(prompt, { width, height, model, seed, enhance });

    logger.debug("imageClient", "Requesting image", {
      promptLength: prompt.length,
      model,
      width,
      height,
      seed,
    });

    const response = await sendRequest(
      this.options.transport,
      url,
      { method: "GET", headers },
      this.timeout
    );

    try {
      this.validator.validate(response);
    } catch (err) {
      logger.warn("imageClient", "Image request rejected", { status: response.status });
      throw err;
    }

    await fs.promises.writeFile(imagePath, response.body);
    logger.info("imageClient", `Saved image to ${imagePath}`, {
      bytes: response.body.length,
      model,
    });

    return `Image successfully saved to ${imagePath}`;
  }
}
