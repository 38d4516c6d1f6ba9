/**
 * Client configuration: defaults, environment variables and explicit overrides.
 */

import { z } from 'zod';

import {
  DEFAULT_DOMAIN,
  DEFAULT_PATH_PREFIX,
  DEFAULT_PROTOCOL,
  SDK_VERSION,
} from './constants';

export type Protocol = 'http' | 'https';

export interface ClientConfig {
  readonly apiKey: string;
  readonly apiSecret: string;
  readonly protocol: Protocol;
  readonly domain: string;
  readonly pathPrefix: string;
  readonly appId: string;
  readonly sdkVersion: string;
  readonly osPlatform: string;
}

/**
 * Options a caller may override. Any subset is accepted.
 */
export const ConfigOptionsSchema = z
  .object({
    apiKey: z.string().optional().catch(undefined),
    apiSecret: z.string().optional().catch(undefined),
    protocol: z.enum(['http', 'https']).optional().catch(undefined),
    domain: z.string().optional().catch(undefined),
    pathPrefix: z.string().optional().catch(undefined),
    appId: z.string().optional().catch(undefined),
  })
  .catch({});

export interface ConfigOptions {
  apiKey?: string;
  apiSecret?: string;
  protocol?: Protocol;
  domain?: string;
  pathPrefix?: string;
  appId?: string;
}

export const ENV_KEYS = {
  apiKey: 'SOLAPI_API_KEY',
  apiSecret: 'SOLAPI_API_SECRET',
  protocol: 'SOLAPI_PROTOCOL',
  domain: 'SOLAPI_DOMAIN',
  pathPrefix: 'SOLAPI_PREFIX',
  appId: 'SOLAPI_APP_ID',
} as const;

export function osPlatform(): string {
  return `${process.platform} | ${process.version}`;
}

export function defaultConfig(): ClientConfig {
  return Object.freeze({
    apiKey: '',
    apiSecret: '',
    protocol: DEFAULT_PROTOCOL,
    domain: DEFAULT_DOMAIN,
    pathPrefix: DEFAULT_PATH_PREFIX,
    appId: '',
    sdkVersion: SDK_VERSION,
    osPlatform: osPlatform(),
  });
}

/**
 * Read the SOLAPI_* environment variables. Unset or empty variables are left out.
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ConfigOptions {
  const options: Record<string, string> = {};
  for (const [field, name] of Object.entries(ENV_KEYS)) {
    const value = env[name];
    if (value) {
      options[field] = value;
    }
  }
  return ConfigOptionsSchema.parse(options);
}

/**
 * Merge `options` over `base` and return a new frozen configuration.
 *
 * Unknown keys and values of the wrong type are dropped. Missing or
 * non-object input returns `base` unchanged. Never throws.
 */
export function configure(options?: unknown, base: ClientConfig = defaultConfig()): ClientConfig {
  const parsed = ConfigOptionsSchema.parse(options ?? {});
  const merged: ClientConfig = { ...base };
  for (const [key, value] of Object.entries(parsed)) {
    if (value !== undefined) {
      Object.assign(merged, { [key]: value });
    }
  }
  return Object.freeze(merged);
}

/**
 * Priority: explicit parameters > environment variables > defaults.
 */
export function resolveConfig(
  options?: unknown,
  env: NodeJS.ProcessEnv = process.env
): ClientConfig {
  return configure(options, configure(loadConfigFromEnv(env)));
}
