/**
 * Custom exceptions raised by the Genie Spaces TypeScript client.
 */

/**
 * Base exception for all errors raised by the SDK.
 */
export class GenieSpacesError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GenieSpacesError';
    Object.setPrototypeOf(this, GenieSpacesError.prototype);
  }
}

/**
 * Raised when the client cannot be configured (missing host or token).
 */
export class ConfigurationError extends GenieSpacesError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

/**
 * Raised when a precondition fails locally, before any request is sent.
 */
export class ValidationError extends GenieSpacesError {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

/**
 * Raised when a model is constructed with an invalid field value.
 */
export class SchemaValidationError extends ValidationError {
  path: string;

  constructor(path: string, message: string) {
    super(path ? `${path}: ${message}` : message);
    this.name = 'SchemaValidationError';
    this.path = path;
    Object.setPrototypeOf(this, SchemaValidationError.prototype);
  }
}

/**
 * Raised when a document does not have the shape of a space export.
 */
export class MalformedExportError extends ValidationError {
  path: string;

  constructor(path: string, message: string) {
    super(path ? `${path}: ${message}` : message);
    this.name = 'MalformedExportError';
    this.path = path;
    Object.setPrototypeOf(this, MalformedExportError.prototype);
  }
}

/**
 * Raised when the server returns an error response.
 */
export class SpaceClientError extends GenieSpacesError {
  statusCode: number;
  errorCode?: string;
  payload?: unknown;

  constructor(options: {
    statusCode: number;
    message?: string;
    errorCode?: string;
    payload?: unknown;
  }) {
    const details = options.message || options.errorCode || 'API request failed';
    super(`${options.statusCode}: ${details}`);
    this.name = 'SpaceClientError';
    this.statusCode = options.statusCode;
    this.message = details;
    this.errorCode = options.errorCode;
    this.payload = options.payload;
    Object.setPrototypeOf(this, SpaceClientError.prototype);
  }
}

/**
 * Raised when the server rejects the credentials (401 or 403).
 */
export class AuthenticationError extends SpaceClientError {
  constructor(options: ConstructorParameters<typeof SpaceClientError>[0]) {
    super(options);
    this.name = 'AuthenticationError';
    Object.setPrototypeOf(this, AuthenticationError.prototype);
  }
}

/**
 * Raised when the requested space does not exist (404).
 */
export class NotFoundError extends SpaceClientError {
  constructor(options: ConstructorParameters<typeof SpaceClientError>[0]) {
    super(options);
    this.name = 'NotFoundError';
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}

/**
 * Raised when a successful response does not have the expected shape.
 */
export class UnexpectedResponseError extends GenieSpacesError {
  payload: unknown;

  constructor(message: string, payload: unknown) {
    super(message);
    this.name = 'UnexpectedResponseError';
    this.payload = payload;
    Object.setPrototypeOf(this, UnexpectedResponseError.prototype);
  }
}

/**
 * Raised when the underlying HTTP transport failed before receiving a response.
 */
export class TransportError extends GenieSpacesError {
  constructor(message: string) {
    super(message);
    this.name = 'TransportError';
    Object.setPrototypeOf(this, TransportError.prototype);
  }
}
