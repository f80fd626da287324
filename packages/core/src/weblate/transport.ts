// ============================================
// Weblate HTTP Transport
// ============================================

import { fetchWithPool, type HttpResponse } from "@fedora-l10n/shared";
import { FetchError } from "../errors/fetch.js";
import { parseRetryHeaders } from "../errors/headers.js";
import { maybeWrapNetworkError } from "../errors/network.js";
import { AbortError, throwIfAborted } from "../errors/retry.js";
import { ErrorCode } from "../errors/types.js";
import type { Logger } from "../logger/logger.js";
import { silentLogger } from "../logger/logger.js";
import { RequestThrottle } from "../rate-limit/throttle.js";

export interface TransportRequest {
  headers: Record<string, string>;
  signal: AbortSignal;
}

/**
 * The slice of `fetch` the transport needs. The pooled undici fetch and
 * the global fetch both satisfy it.
 */
export type FetchLike = (url: string, init: TransportRequest) => Promise<HttpResponse>;

export interface WeblateTransportOptions {
  /** Defaults to the pooled undici fetch */
  fetch?: FetchLike;
  /** Looked up per request; null sends no Authorization header */
  apiKey?: () => Promise<string | null>;
  /** Per-request timeout covering headers and body (default: 30s) */
  timeoutMs?: number;
  /** Shared dispatch spacing; one with a 600 ms interval is created when omitted */
  throttle?: RequestThrottle;
  userAgent?: string;
  logger?: Logger;
}

interface RawResponse {
  response: HttpResponse;
  body: string;
}

const DEFAULT_TIMEOUT_MS = 30_000;

/**
 * Issues throttled GET requests and turns every failure into a FetchError:
 * a non-2xx status, a timeout, a network failure or a body that is not JSON.
 * Aborts by the caller surface as AbortError.
 *
 * @example
 * ```typescript
 * const transport = new WeblateTransport({ apiKey: async () => "test-secret" });
 * const payload = await transport.getJson("https://translate.fedoraproject.org/api/projects/");
 * ```
 */
export class WeblateTransport {
  private readonly fetchFn: FetchLike;
  private readonly apiKey: () => Promise<string | null>;
  private readonly timeoutMs: number;
  private readonly throttle: RequestThrottle;
  private readonly userAgent?: string;
  private readonly logger: Logger;

  constructor(options: WeblateTransportOptions = {}) {
    this.fetchFn = options.fetch ?? ((url, init) => fetchWithPool(url, init));
    this.apiKey = options.apiKey ?? (async () => null);
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.throttle = options.throttle ?? new RequestThrottle();
    this.userAgent = options.userAgent;
    this.logger = options.logger ?? silentLogger;
  }

  async getJson(url: string, signal?: AbortSignal): Promise<unknown> {
    throwIfAborted(signal);
    const headers = await this.buildHeaders();
    await this.throttle.acquire(signal);

    this.logger.debug("GET", { url });
    const { response, body } = await this.dispatch(url, headers, signal);

    if (!response.ok) {
      const { retryAfterMs } = parseRetryHeaders(response.headers);
      throw FetchError.fromStatus(url, response.status, response.statusText, retryAfterMs);
    }

    try {
      return JSON.parse(body);
    } catch (error) {
      throw FetchError.malformed(
        url,
        error instanceof Error ? error.message : String(error),
        response.status,
        error
      );
    }
  }

  private async buildHeaders(): Promise<Record<string, string>> {
    const headers: Record<string, string> = { Accept: "application/json" };
    if (this.userAgent) {
      headers["User-Agent"] = this.userAgent;
    }
    const key = await this.apiKey();
    if (key) {
      headers.Authorization = `Token ${key}`;
    }
    return headers;
  }

  /**
   * Fetch and read the body under one timeout, forwarding the caller's abort.
   */
  private async dispatch(
    url: string,
    headers: Record<string, string>,
    signal?: AbortSignal
  ): Promise<RawResponse> {
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);
    const forwardAbort = (): void => controller.abort();
    signal?.addEventListener("abort", forwardAbort, { once: true });

    try {
      const response = await this.fetchFn(url, { headers, signal: controller.signal });
      const body = await response.text();
      return { response, body };
    } catch (error) {
      if (timedOut) {
        throw new FetchError(
          `Request timed out after ${this.timeoutMs} ms`,
          ErrorCode.API_TIMEOUT,
          { url, cause: error }
        );
      }
      if (signal?.aborted) {
        throw new AbortError();
      }
      const wrapped = maybeWrapNetworkError(error, url);
      const message = wrapped instanceof Error ? wrapped.message : String(wrapped);
      throw new FetchError(message, ErrorCode.API_NETWORK_ERROR, { url, cause: wrapped });
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", forwardAbort);
    }
  }
}
