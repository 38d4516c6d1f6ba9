import { configure, ClientConfig } from '../src/config';

export type FetchArgs = [input: string | URL | Request, init?: RequestInit];

/**
 * In-process stand-in for the HTTP transport. Every call gets a fresh Response.
 */
export function stubFetch(status: number, body: string) {
  return jest.fn(async (..._args: FetchArgs) => new Response(body, { status }));
}

export function failingFetch(error: Error) {
  return jest.fn(async (..._args: FetchArgs): Promise<Response> => {
    throw error;
  });
}

export function testConfig(overrides: Record<string, unknown> = {}): ClientConfig {
  return configure({
    apiKey: 'test-key',
    apiSecret: 'test-secret',
    protocol: 'https',
    domain: 'api.example.test',
    pathPrefix: 'v1/',
    appId: 'test-app',
    ...overrides,
  });
}

export function requestOf(mock: jest.Mock<Promise<Response>, FetchArgs>, index = 0) {
  const [input, init] = mock.mock.calls[index];
  return {
    url: String(input),
    method: init?.method,
    headers: new Headers(init?.headers),
    body: init?.body,
  };
}
