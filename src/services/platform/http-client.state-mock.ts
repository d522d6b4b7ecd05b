/**
 * State mock for HttpClient.
 *
 * Serves canned responses by exact URL and keeps the request log in `$.requests`.
 * Importing this module registers toHaveRequested, toHaveRequestCount and
 * toHaveNoRequests.
 *
 * @example
 * const httpClient = createMockHttpClient({
 *   responses: { [RELEASES_URL]: { body: JSON.stringify(releases) } },
 *   defaultResponse: { status: 404 },
 * });
 * await client.latestRelease("artempyanykh/marksman", options);
 * expect(httpClient).toHaveRequested(RELEASES_URL);
 */

import { expect } from "vitest";
import type { HttpClient, HttpRequestOptions } from "./network";
import {
  createSnapshot,
  type MatcherImplementationsFor,
  type MatcherResult,
  type MockState,
  type MockWithState,
} from "../../test/state-mock";

export interface HttpRequestRecord {
  readonly url: string;
  readonly options?: HttpRequestOptions;
}

/** Response data; a fresh Response is built for every request. */
export interface ConfiguredResponse {
  readonly body?: string | Uint8Array;
  /** Default: 200 */
  readonly status?: number;
  readonly headers?: Record<string, string>;
}

export interface HttpClientMockState extends MockState {
  readonly requests: readonly HttpRequestRecord[];
  readonly networkDown: boolean;
}

export type MockHttpClient = HttpClient &
  MockWithState<HttpClientMockState> & {
    /** Every following request rejects as a connection failure would. */
    simulateNetworkDown(): void;
  };

export interface MockHttpClientOptions {
  readonly responses?: Readonly<Record<string, ConfiguredResponse>>;
  /** Served for URLs without a configured response. Default: 200 with an empty body */
  readonly defaultResponse?: ConfiguredResponse;
}

function toResponse(config: ConfiguredResponse): Response {
  // Copy binary bodies so each Response owns its bytes
  const body =
    config.body === undefined || typeof config.body === "string"
      ? (config.body ?? null)
      : new Uint8Array(config.body);
  return new Response(body, {
    status: config.status ?? 200,
    ...(config.headers !== undefined && { headers: config.headers }),
  });
}

export function createMockHttpClient(options: MockHttpClientOptions = {}): MockHttpClient {
  const requests: HttpRequestRecord[] = [];
  const responses = options.responses ?? {};
  const fallback = options.defaultResponse ?? {};
  let networkDown = false;

  const state: HttpClientMockState = {
    get requests() {
      return requests;
    },
    get networkDown() {
      return networkDown;
    },
    snapshot: () => createSnapshot(state.toString()),
    toString: () => {
      const urls = requests.map((request) => request.url).join(", ") || "(none)";
      return `${requests.length} request(s): ${urls}${networkDown ? " [network down]" : ""}`;
    },
  };

  return {
    $: state,

    async fetch(url, requestOptions) {
      requests.push(requestOptions !== undefined ? { url, options: requestOptions } : { url });
      if (networkDown) {
        throw new TypeError("fetch failed");
      }
      if (requestOptions?.signal?.aborted) {
        throw new DOMException("The operation was aborted.", "AbortError");
      }
      return toResponse(responses[url] ?? fallback);
    },

    simulateNetworkDown() {
      networkDown = true;
    },
  };
}

interface HttpClientMatchers {
  /** A request went to this URL, or to one matching the pattern. */
  toHaveRequested(url: string | RegExp): void;
  toHaveRequestCount(count: number): void;
  toHaveNoRequests(): void;
}

declare module "vitest" {
  interface Assertion<T> extends HttpClientMatchers {}
}

function requestedUrls(received: MockHttpClient): string {
  return received.$.requests.map((request) => request.url).join(", ") || "(none)";
}

export const httpClientMatchers: MatcherImplementationsFor<MockHttpClient, HttpClientMatchers> = {
  toHaveRequested(received, url) {
    const pass = received.$.requests.some((request) =>
      typeof url === "string" ? request.url === url : url.test(request.url)
    );
    return {
      pass,
      message: () =>
        `Expected ${pass ? "no " : ""}request to ${String(url)}. Requests: ${requestedUrls(received)}`,
    } satisfies MatcherResult;
  },

  toHaveRequestCount(received, count) {
    const actual = received.$.requests.length;
    return {
      pass: actual === count,
      message: () => `Expected ${count} request(s), got ${actual}: ${requestedUrls(received)}`,
    } satisfies MatcherResult;
  },

  toHaveNoRequests(received) {
    return {
      pass: received.$.requests.length === 0,
      message: () => `Expected no requests, got: ${requestedUrls(received)}`,
    } satisfies MatcherResult;
  },
};

expect.extend(httpClientMatchers);
