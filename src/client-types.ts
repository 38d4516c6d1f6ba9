/**
 * Common typing helpers used by resource modules to avoid circular imports.
 */

import type { ZodType, ZodTypeDef } from 'zod';

import type { ClientConfig } from './config';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export type BodyMethod = Exclude<HttpMethod, 'GET'>;

export type QueryValue = string | number | boolean | null | undefined;

export type QueryParams = Record<string, QueryValue>;

/**
 * Decoder for a response body. Any zod schema fits.
 */
export type ResultSchema<T> = ZodType<T, ZodTypeDef, unknown>;

export interface RequesterProtocol {
  readonly config: ClientConfig;

  get<T>(resourcePath: string, query: QueryParams | undefined, schema: ResultSchema<T>): Promise<T>;

  send<T>(
    method: BodyMethod,
    resourcePath: string,
    payload: unknown,
    schema: ResultSchema<T>
  ): Promise<T>;

  post<T>(resourcePath: string, payload: unknown, schema: ResultSchema<T>): Promise<T>;

  put<T>(resourcePath: string, payload: unknown, schema: ResultSchema<T>): Promise<T>;

  delete<T>(resourcePath: string, payload: unknown, schema: ResultSchema<T>): Promise<T>;
}
