/**
 * Error types raised by the API clients.
 *
 *   PollinationsError
 *   ├── APIError         the endpoint answered, but not with an acceptable response
 *   ├── ValidationError  arguments rejected before any request is sent
 *   └── TransportError   no response at all (DNS, refused connection, timeout)
 */

export class PollinationsError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "PollinationsError";
  }
}

export class APIError extends PollinationsError {
  readonly statusCode: number;
  /** Response detail without the status prefix */
  readonly detail: string;

  constructor(statusCode: number, detail: string) {
    super(`API Error ${statusCode}: ${detail}`);
    this.name = "APIError";
    this.statusCode = statusCode;
    this.detail = detail;
  }
}

export class ValidationError extends PollinationsError {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

export class TransportError extends PollinationsError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "TransportError";
  }
}
