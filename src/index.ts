/**
 * TypeScript SDK for the SOLAPI messaging API.
 */

export { SolapiClient } from './client';
export type { SolapiClientOptions } from './client';

export { SignedRequestClient, ErrorBodySchema } from './request';
export type { ErrorBody, SignedRequestClientOptions } from './request';

export { configure, defaultConfig, loadConfigFromEnv, resolveConfig, ENV_KEYS } from './config';
export type { ClientConfig, ConfigOptions, Protocol } from './config';

export {
  buildAuthorization,
  createSalt,
  formatDate,
  getAuthorization,
  parseAuthorization,
  sign,
} from './auth';
export type { AuthorizationParts, Credentials } from './auth';

export type { HttpMethod, QueryParams, RequesterProtocol, ResultSchema } from './client-types';

export { FileUpload } from './uploads';
export type { FileInput } from './uploads';

export { createLogger, logger, resolveLogLevel } from './logger';
export type { Logger } from './logger';

export {
  DecodeError,
  FileReadError,
  RemoteApiError,
  SerializationError,
  SolapiError,
  TransportError,
  isRemoteApiError,
  isTransportError,
} from './errors';

export * from './types';
export * from './resources';
