/**
 * Custom exceptions raised by the SOLAPI TypeScript client.
 */

/**
 * Base exception for all errors raised by the SDK.
 */
export class SolapiError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SolapiError';
    Object.setPrototypeOf(this, SolapiError.prototype);
  }
}

/**
 * Raised when the server answers with a non-200 status and a readable error body.
 */
export class RemoteApiError extends SolapiError {
  code: string;
  status: number;

  constructor(options: { code: string; message: string; status: number }) {
    super(`${options.code}[${options.status}]: ${options.message}`);
    this.name = 'RemoteApiError';
    this.code = options.code;
    this.status = options.status;
    this.message = options.message;
    Object.setPrototypeOf(this, RemoteApiError.prototype);
  }
}

/**
 * Raised when the underlying HTTP transport failed before a response was read.
 */
export class TransportError extends SolapiError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransportError';
    Object.setPrototypeOf(this, TransportError.prototype);
  }
}

/**
 * Raised when a request payload cannot be encoded as JSON.
 */
export class SerializationError extends SolapiError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SerializationError';
    Object.setPrototypeOf(this, SerializationError.prototype);
  }
}

/**
 * Raised when a response body is not valid JSON or does not match the
 * expected shape. `status` is the HTTP status of the response being decoded.
 */
export class DecodeError extends SolapiError {
  status?: number;
  body?: string;

  constructor(options: { message: string; status?: number; body?: string; cause?: unknown }) {
    super(options.message, { cause: options.cause });
    this.name = 'DecodeError';
    this.status = options.status;
    this.body = options.body;
    Object.setPrototypeOf(this, DecodeError.prototype);
  }
}

/**
 * Raised when a local file handed to the storage API cannot be read.
 */
export class FileReadError extends SolapiError {
  path: string;

  constructor(path: string, options?: { cause?: unknown }) {
    super(`Failed to read file: ${path}`, options);
    this.name = 'FileReadError';
    this.path = path;
    Object.setPrototypeOf(this, FileReadError.prototype);
  }
}

export function isRemoteApiError(error: unknown): error is RemoteApiError {
  return error instanceof RemoteApiError;
}

export function isTransportError(error: unknown): error is TransportError {
  return error instanceof TransportError;
}
