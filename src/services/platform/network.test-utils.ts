/**
 * Test utilities for HttpClient mocking.
 *
 * The mock keeps a request history and answers from per-URL response data,
 * constructing a fresh Response on every call so bodies can be read again.
 */

import type { HttpClient, HttpRequestOptions } from "./network";

/** Record of an HTTP request made through the mock. */
export interface HttpRequestRecord {
  readonly url: string;
  readonly options?: HttpRequestOptions;
}

/**
 * Response configuration - stores DATA, not Response objects.
 */
export interface ConfiguredResponse {
  readonly body?: string | Buffer | Uint8Array;
  readonly status?: number; // Default: 200
  readonly headers?: Record<string, string>;
  readonly error?: Error; // Throw this instead of returning response
}

/** Mock state. */
export interface HttpClientMockState {
  readonly requests: readonly HttpRequestRecord[];
  /** URLs requested so far, in order */
  urls(): string[];
}

/** Mock type with state access and setup methods. */
export type MockHttpClient = HttpClient & {
  readonly $: HttpClientMockState;
  setResponse(url: string, config: ConfiguredResponse): void;
  simulateNetworkDown(): void;
};

/** Factory options. */
export interface MockHttpClientOptions {
  /** Pre-configured responses by exact URL. */
  responses?: Record<string, ConfiguredResponse>;
  /** Default for unconfigured URLs. Default: { status: 404 } */
  defaultResponse?: ConfiguredResponse;
}

/**
 * JSON response helper.
 *
 * @example
 * createMockHttpClient({ responses: { [url]: jsonResponse({ version: "0.13.0" }) } })
 */
export function jsonResponse(body: unknown, status = 200): ConfiguredResponse {
  return {
    body: JSON.stringify(body),
    status,
    headers: { "content-type": "application/json" },
  };
}

/**
 * Create a behavioral mock HttpClient for testing.
 *
 * @example Configure responses per URL
 * const httpClient = createMockHttpClient({
 *   responses: {
 *     "https://builds.zigtools.org/zls-x86_64-linux-0.13.0.tar.gz": { body: archive },
 *   },
 * });
 *
 * @example Simulate network down
 * const mock = createMockHttpClient();
 * mock.simulateNetworkDown();
 * await mock.fetch("https://example.com"); // throws Error
 *
 * @example Check request history
 * expect(mock.$.urls()).toEqual(["https://example.com/api"]);
 */
export function createMockHttpClient(options?: MockHttpClientOptions): MockHttpClient {
  const requests: HttpRequestRecord[] = [];
  const responses = new Map<string, ConfiguredResponse>(
    options?.responses ? Object.entries(options.responses) : []
  );
  let networkError: Error | null = null;

  const defaultResponse: ConfiguredResponse = options?.defaultResponse ?? { status: 404 };

  return {
    $: {
      get requests(): readonly HttpRequestRecord[] {
        return requests;
      },
      urls: () => requests.map((r) => r.url),
    },

    async fetch(url: string, fetchOptions?: HttpRequestOptions): Promise<Response> {
      requests.push(fetchOptions === undefined ? { url } : { url, options: fetchOptions });

      if (networkError) {
        throw networkError;
      }
      if (fetchOptions?.signal?.aborted) {
        throw new DOMException("The operation was aborted.", "AbortError");
      }

      const config = responses.get(url) ?? defaultResponse;
      if (config.error) {
        throw config.error;
      }

      const responseInit: ResponseInit = { status: config.status ?? 200 };
      if (config.headers !== undefined) {
        responseInit.headers = config.headers;
      }
      const body =
        config.body === undefined
          ? null
          : typeof config.body === "string"
            ? config.body
            : new Uint8Array(config.body);
      return new Response(body, responseInit);
    },

    setResponse(url: string, config: ConfiguredResponse): void {
      responses.set(url, config);
    },

    simulateNetworkDown(): void {
      networkError = new Error("Network is down");
    },
  };
}
