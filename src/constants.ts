/**
 * Default values shared by the client and its configuration.
 */

export const SDK_VERSION = 'TS-SDK v1.0.0';

export const DEFAULT_PROTOCOL = 'https';
export const DEFAULT_DOMAIN = 'api.solapi.com';
export const DEFAULT_PATH_PREFIX = '';

export const SALT_BYTES = 20;

export const AUTH_SCHEME = 'HMAC-SHA256';
