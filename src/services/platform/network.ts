/**
 * HTTP client interface and implementation.
 *
 * The client is injected into the release and download services so that they
 * can be tested against the behavioral mock in http-client.state-mock.ts.
 */

import type { Logger } from "../logging";

// ============================================================================
// HTTP Client Interface
// ============================================================================

/**
 * Options for HTTP requests.
 */
export interface HttpRequestOptions {
  /**
   * Time in milliseconds until the response headers must arrive. Default: 5000.
   * Reading the body afterwards is not limited.
   */
  readonly timeout?: number;
  /** External abort signal to cancel the request */
  readonly signal?: AbortSignal;
  /** Additional request headers */
  readonly headers?: Readonly<Record<string, string>>;
}

/**
 * HTTP client for GET requests with timeout support. Redirects are followed.
 */
export interface HttpClient {
  /**
   * HTTP GET request with timeout support.
   *
   * @param url - URL to fetch
   * @param options - Request options
   * @returns Response object (non-2xx statuses resolve normally)
   * @throws DOMException with name "AbortError" on timeout or abort
   * @throws TypeError on network error (connection refused, DNS failure)
   *
   * @example
   * const response = await httpClient.fetch('https://api.github.com/repos/artempyanykh/marksman/releases', {
   *   headers: { Accept: 'application/vnd.github+json' },
   * });
   * if (response.ok) {
   *   const releases: unknown = await response.json();
   * }
   */
  fetch(url: string, options?: HttpRequestOptions): Promise<Response>;
}

// ============================================================================
// Configuration
// ============================================================================

/**
 * Configuration for DefaultHttpClient.
 */
export interface HttpClientConfig {
  /** Default timeout for HTTP requests in ms. Default: 5000 */
  readonly defaultTimeout?: number;
}

// ============================================================================
// Default Implementation
// ============================================================================

/**
 * Default HttpClient backed by the global fetch.
 */
export class DefaultHttpClient implements HttpClient {
  private readonly config: Required<HttpClientConfig>;
  private readonly logger: Logger;

  constructor(logger: Logger, config: HttpClientConfig = {}) {
    this.logger = logger;
    this.config = {
      defaultTimeout: config.defaultTimeout ?? 5000,
    };
  }

  async fetch(url: string, options?: HttpRequestOptions): Promise<Response> {
    const timeout = options?.timeout ?? this.config.defaultTimeout;
    const externalSignal = options?.signal;

    this.logger.debug("Fetch", { url, method: "GET" });

    const controller = new AbortController();
    const timeoutId = setTimeout(() => {
      if (!controller.signal.aborted) {
        controller.abort();
      }
    }, timeout);

    // If an external signal is provided, listen for its abort
    const onExternalAbort = (): void => {
      if (!controller.signal.aborted) {
        controller.abort();
      }
    };

    if (externalSignal) {
      if (externalSignal.aborted) {
        controller.abort();
      } else {
        externalSignal.addEventListener("abort", onExternalAbort);
      }
    }

    try {
      const response = await fetch(url, {
        signal: controller.signal,
        redirect: "follow",
        ...(options?.headers && { headers: { ...options.headers } }),
      });
      this.logger.debug("Fetch complete", { url, status: response.status });
      return response;
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      this.logger.warn("Fetch failed", { url, error: errorMessage });
      throw error;
    } finally {
      clearTimeout(timeoutId);
      if (externalSignal) {
        externalSignal.removeEventListener("abort", onExternalAbort);
      }
    }
  }
}
