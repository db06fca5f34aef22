/**
 * Per-endpoint acceptance rules for completed responses.
 */

import { APIError } from "../errors";
import type { ApiResponse } from "./transport";

const HTTP_OK = 200;

export type EndpointKind = "chat" | "image";

export interface ResponseValidator {
  readonly kind: EndpointKind;
  /** @throws APIError when the response is not acceptable */
  validate(response: ApiResponse): void;
}

function requireOk(response: ApiResponse): void {
  if (response.status !== HTTP_OK) {
    throw new APIError(response.status, response.body.toString("utf-8"));
  }
}

/** Any 200 passes, including an empty body. */
export const chatValidator: ResponseValidator = {
  kind: "chat",
  validate: requireOk,
};

/** A 200 must also carry image bytes. */
export const imageValidator: ResponseValidator = {
  kind: "image",
  validate(response) {
    requireOk(response);
    if (response.body.length === 0) {
      throw new APIError(response.status, "Empty response received");
    }
  },
};

export function validatorFor(kind: EndpointKind): ResponseValidator {
  switch (kind) {
    case "chat":
      return chatValidator;
    case "image":
      return imageValidator;
  }
}
