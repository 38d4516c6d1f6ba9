/**
 * Signed HTTP requests against the SOLAPI REST API.
 */

import { z } from 'zod';

import { getAuthorization } from './auth';
import type {
  BodyMethod,
  HttpMethod,
  QueryParams,
  RequesterProtocol,
  ResultSchema,
} from './client-types';
import { ClientConfig, configure } from './config';
import { DecodeError, RemoteApiError, SerializationError, TransportError } from './errors';
import { createLogger, Logger } from './logger';
import { buildParams } from './utils';

export const ErrorBodySchema = z.object({
  errorCode: z.string(),
  errorMessage: z.string(),
});

export type ErrorBody = z.infer<typeof ErrorBodySchema>;

export interface SignedRequestClientOptions {
  fetch?: typeof fetch;
  logger?: Logger;
  clock?: () => Date;
}

export class SignedRequestClient implements RequesterProtocol {
  readonly config: ClientConfig;
  private readonly transport: typeof fetch;
  private readonly log: Logger;
  private readonly clock: () => Date;
  private readonly options: SignedRequestClientOptions;

  constructor(config: ClientConfig, options: SignedRequestClientOptions = {}) {
    this.config = Object.freeze({ ...config });
    this.options = options;
    this.transport = options.fetch ?? globalThis.fetch.bind(globalThis);
    this.log = options.logger ?? createLogger({ component: 'request' });
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Return a new client with `options` merged over this client's configuration.
   */
  configure(options?: unknown): SignedRequestClient {
    return new SignedRequestClient(configure(options, this.config), this.options);
  }

  buildUrl(resourcePath: string, query?: QueryParams): string {
    const { protocol, domain, pathPrefix } = this.config;
    const url = `${protocol}://${domain}/${pathPrefix}${resourcePath}`;
    const params = buildParams(query ?? {});
    const keys = Object.keys(params);
    if (keys.length === 0) {
      return url;
    }
    const searchParams = new URLSearchParams();
    for (const key of keys) {
      searchParams.append(key, params[key]);
    }
    return `${url}?${searchParams.toString()}`;
  }

  async get<T>(
    resourcePath: string,
    query: QueryParams | undefined,
    schema: ResultSchema<T>
  ): Promise<T> {
    return this.execute('GET', this.buildUrl(resourcePath, query), undefined, schema);
  }

  async send<T>(
    method: BodyMethod,
    resourcePath: string,
    payload: unknown,
    schema: ResultSchema<T>
  ): Promise<T> {
    const body = payload === undefined ? undefined : encodeJson(payload);
    return this.execute(method, this.buildUrl(resourcePath), body, schema);
  }

  async post<T>(resourcePath: string, payload: unknown, schema: ResultSchema<T>): Promise<T> {
    return this.send('POST', resourcePath, payload, schema);
  }

  async put<T>(resourcePath: string, payload: unknown, schema: ResultSchema<T>): Promise<T> {
    return this.send('PUT', resourcePath, payload, schema);
  }

  async delete<T>(resourcePath: string, payload: unknown, schema: ResultSchema<T>): Promise<T> {
    return this.send('DELETE', resourcePath, payload, schema);
  }

  private async execute<T>(
    method: HttpMethod,
    url: string,
    body: string | undefined,
    schema: ResultSchema<T>
  ): Promise<T> {
    const headers: Record<string, string> = {
      Authorization: getAuthorization(this.config, this.clock()),
      'Content-Type': 'application/json',
      Accept: 'application/json',
      'User-Agent': `${this.config.sdkVersion} (${this.config.osPlatform})`,
    };

    this.log.debug({ method, url }, 'sending request');

    let status: number;
    let text: string;
    try {
      const response = await this.transport(url, { method, headers, body });
      status = response.status;
      text = await response.text();
    } catch (error) {
      this.log.debug({ method, url, err: error }, 'transport failure');
      throw new TransportError(
        `${method} ${url} failed: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    }

    this.log.debug({ method, url, status }, 'received response');

    if (status !== 200) {
      const errorBody = decodeBody(text, status, ErrorBodySchema);
      throw new RemoteApiError({
        code: errorBody.errorCode,
        message: errorBody.errorMessage,
        status,
      });
    }

    return decodeBody(text, status, schema);
  }
}

function encodeJson(payload: unknown): string {
  let encoded: string | undefined;
  try {
    encoded = JSON.stringify(payload);
  } catch (error) {
    throw new SerializationError(
      `Failed to encode request payload: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error }
    );
  }
  // JSON.stringify returns undefined for functions and symbols
  if (encoded === undefined) {
    throw new SerializationError(`Payload of type ${typeof payload} cannot be encoded as JSON`);
  }
  return encoded;
}

function decodeBody<T>(text: string, status: number, schema: ResultSchema<T>): T {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new DecodeError({
      message: `Response body of HTTP ${status} is not valid JSON`,
      status,
      body: text,
      cause: error,
    });
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    throw new DecodeError({
      message: `Response body of HTTP ${status} does not match the expected shape: ${result.error.message}`,
      status,
      body: text,
      cause: result.error,
    });
  }
  return result.data;
}
