/**
 * Base Integration Client
 *
 * Reusable base class for external API integrations with:
 * - Shared rate governance (every attempt passes through a RateGovernor)
 * - Retry logic with backoff for 5xx, 429 and connection failures
 * - Per-attempt timeouts and caller cancellation
 * - Request logging
 */

import { logger } from "@/utils/logger";
import { NetworkError, UpstreamError } from "@/utils/errors";
import { systemClock, type Clock, type RateGovernor } from "./rate-governor";

export type QueryValue = string | number | boolean;

/**
 * Canonical query-parameter set for one upstream request. Insertion order is
 * the order parameters appear in the URL.
 */
export type UpstreamQuery = Record<string, QueryValue>;

/**
 * Configuration for integration client
 */
export interface IntegrationClientConfig {
  baseUrl: string;
  maxRetries: number;
  /** Backoff before retry n (0-based); the last entry repeats */
  retryDelaysMs: number[];
  timeoutMs: number;
  headers?: Record<string, string>;
}

export interface IntegrationClientDeps {
  governor: RateGovernor;
  fetch?: typeof fetch;
  clock?: Clock;
}

export interface RequestOptions {
  signal?: AbortSignal;
}

function isRetryableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Base class for external API integrations
 *
 * Subclasses expose typed endpoint methods built on `get`.
 */
export abstract class BaseIntegrationClient {
  protected config: IntegrationClientConfig;
  protected governor: RateGovernor;
  protected abstract serviceName: string;
  private readonly fetchImpl: typeof fetch;
  private readonly clock: Clock;

  constructor(config: IntegrationClientConfig, deps: IntegrationClientDeps) {
    this.config = config;
    this.governor = deps.governor;
    this.fetchImpl = deps.fetch ?? fetch;
    this.clock = deps.clock ?? systemClock;
  }

  protected logInit() {
    logger.info(
      `${this.serviceName} integration client initialized (${this.governor.maxRequests} requests per ${this.governor.windowMs}ms)`
    );
  }

  protected buildUrl(endpoint: string, queryParams?: UpstreamQuery): string {
    let url = `${this.config.baseUrl}${endpoint}`;
    if (queryParams) {
      const params = new URLSearchParams();
      for (const [key, value] of Object.entries(queryParams)) {
        params.append(key, String(value));
      }
      const qs = params.toString();
      if (qs) {
        url += `?${qs}`;
      }
    }
    return url;
  }

  private retryDelay(retryCount: number): number {
    const delays = this.config.retryDelaysMs;
    return delays[Math.min(retryCount, delays.length - 1)] ?? 0;
  }

  /**
   * Make a rate-governed GET request and decode the JSON body.
   *
   * Throws UpstreamError for non-2xx answers that are not retryable or have
   * exhausted their retries, and NetworkError for connection failures and
   * cancellation.
   */
  protected async get<T>(
    endpoint: string,
    queryParams?: UpstreamQuery,
    options: RequestOptions = {},
    retryCount = 0
  ): Promise<T> {
    const { signal } = options;
    if (signal?.aborted) {
      throw new NetworkError(`${this.serviceName} request cancelled`, endpoint, true);
    }

    await this.governor.admit();
    // The signal may have fired while this call was queued behind the ceiling.
    if (signal?.aborted) {
      throw new NetworkError(`${this.serviceName} request cancelled`, endpoint, true);
    }

    const url = this.buildUrl(endpoint, queryParams);
    logger.debug(`${this.serviceName} API request: ${url} (attempt ${retryCount + 1})`);

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.config.timeoutMs);
    const onCallerAbort = () => controller.abort();
    signal?.addEventListener("abort", onCallerAbort, { once: true });

    let backoffMs = 0;
    try {
      const response = await this.fetchImpl(url, {
        signal: controller.signal,
        headers: {
          Accept: "application/json",
          ...this.config.headers,
        },
      });

      if (response.ok) {
        const body = await response.text();
        try {
          return JSON.parse(body) as T;
        } catch {
          throw new UpstreamError(
            `${this.serviceName} API returned a body that is not JSON`,
            endpoint,
            response.status
          );
        }
      }

      const errorBody = await response.text();
      logger.debug(`${this.serviceName} API ${response.status} body for ${endpoint}: ${errorBody}`);
      const failure = new UpstreamError(
        `${this.serviceName} API error: HTTP ${response.status}`,
        endpoint,
        response.status
      );
      if (!isRetryableStatus(response.status) || retryCount >= this.config.maxRetries) {
        throw failure;
      }

      // A 429 means upstream's own limit is tighter than ours: sit out a full window.
      backoffMs =
        response.status === 429
          ? Math.max(this.governor.windowMs, this.retryDelay(retryCount))
          : this.retryDelay(retryCount);
      logger.warn(
        `${this.serviceName} API returned ${response.status} for ${endpoint}. Retrying in ${backoffMs}ms (attempt ${retryCount + 2})`
      );
    } catch (error) {
      if (error instanceof UpstreamError) {
        throw error;
      }
      if (signal?.aborted) {
        throw new NetworkError(`${this.serviceName} request cancelled`, endpoint, true);
      }

      const reason = controller.signal.aborted
        ? `timed out after ${this.config.timeoutMs}ms`
        : describeError(error);
      if (retryCount >= this.config.maxRetries) {
        throw new NetworkError(`Network error connecting to ${this.serviceName}: ${reason}`, endpoint);
      }

      backoffMs = this.retryDelay(retryCount);
      logger.warn(
        `${this.serviceName} API request to ${endpoint} failed (${reason}). Retrying in ${backoffMs}ms (attempt ${retryCount + 2})`
      );
    } finally {
      clearTimeout(timeout);
      signal?.removeEventListener("abort", onCallerAbort);
    }

    await this.clock.sleep(backoffMs, signal);
    return this.get<T>(endpoint, queryParams, options, retryCount + 1);
  }
}
