import { getErrorMessage } from '@ledgerline/core';
import { getLogger, type Logger } from '@ledgerline/logger';
import { err, ok, type Result } from 'neverthrow';
import { Agent, fetch as undiciFetch } from 'undici';
import type { ZodType } from 'zod';

import * as HttpUtils from './core/http-utils.js';
import type { HttpEffects } from './core/types.js';
import type { HttpClientConfig, HttpRequestOptions } from './types.js';
import { HttpError, ResponseDecodeError, ResponseValidationError, TimeoutError } from './types.js';

/**
 * Thin transport over undici. Every request is exactly one attempt:
 * retry and backoff policy belong to the caller.
 */
export class HttpClient {
  private readonly config: HttpClientConfig;
  private readonly logger: Logger;
  private readonly effects: HttpEffects;
  private readonly agent: Agent;

  // Close state (for idempotent cleanup)
  private closePromise?: Promise<void>;
  private isClosed = false;

  constructor(config: HttpClientConfig, effects?: Partial<HttpEffects>) {
    this.config = {
      timeout: 10000,
      ...config,
      defaultHeaders: {
        Accept: 'application/json',
        'User-Agent': 'ledgerline/0.1.0',
        ...config.defaultHeaders,
      },
    };

    this.logger = getLogger(`HttpClient:${config.providerName}`);

    // Initialize undici agent for connection pooling and proper cleanup
    this.agent = new Agent({
      keepAliveTimeout: 10000, // 10 seconds
      keepAliveMaxTimeout: 60000, // 60 seconds
      pipelining: 1,
    });

    // Initialize effects with production defaults
    this.effects = {
      fetch: ((url: string | URL, init?: RequestInit) =>
        undiciFetch(url, { ...init, dispatcher: this.agent })) as typeof fetch,
      log: (level, message, metadata) => {
        if (metadata) {
          this.logger[level](metadata, message);
        } else {
          this.logger[level](message);
        }
      },
      now: () => Date.now(),
      ...effects,
    };

    this.logger.debug(`HTTP client initialized - BaseUrl: ${config.baseUrl}, Timeout: ${this.config.timeout}ms`);
  }

  /**
   * Convenience method for GET requests with schema validation
   */
  async get<T>(
    endpoint: string,
    options: Omit<HttpRequestOptions, 'method'> & { schema: ZodType<T> }
  ): Promise<Result<T, Error>>;
  /**
   * Convenience method for GET requests without validation
   */
  async get<T = unknown>(endpoint: string, options?: Omit<HttpRequestOptions, 'method'>): Promise<Result<T, Error>>;
  async get<T = unknown>(
    endpoint: string,
    options: Omit<HttpRequestOptions, 'method'> = {}
  ): Promise<Result<T, Error>> {
    return this.request<T>(endpoint, { ...options, method: 'GET' });
  }

  /**
   * Convenience method for POST requests without validation
   */
  async post<T = unknown>(
    endpoint: string,
    body?: string | object,
    options: Omit<HttpRequestOptions, 'method' | 'body'> = {}
  ): Promise<Result<T, Error>> {
    return this.request<T>(endpoint, { ...options, body, method: 'POST' });
  }

  /**
   * Make a single HTTP request. Transport failures, non-2xx statuses, timeouts and
   * undecodable bodies all come back as err results.
   */
  async request<T = unknown>(endpoint: string, options: HttpRequestOptions = {}): Promise<Result<T, Error>> {
    const url = HttpUtils.buildUrl(this.config.baseUrl, endpoint, options.query);
    const method = options.method || 'GET';
    const timeout = options.timeout ?? this.config.timeout ?? 10000;
    const controller = new AbortController();
    const startTime = this.effects.now();
    const timeoutId = setTimeout(() => controller.abort(), timeout);

    try {
      this.effects.log('debug', `Making HTTP request - URL: ${HttpUtils.sanitizeUrl(url)}, Method: ${method}`);

      const headers: Record<string, string> = {
        ...this.config.defaultHeaders,
        ...options.headers,
      };

      let body: string | undefined;
      if (options.body !== undefined) {
        if (typeof options.body === 'object') {
          body = JSON.stringify(options.body);
          headers['Content-Type'] = 'application/json';
        } else {
          body = options.body;
        }
      }

      const response = await this.effects.fetch(url, {
        // 'fetch' requires null for an empty body, not undefined
        body: body ?? null,
        headers,
        method,
        signal: controller.signal,
      });

      if (!response.ok) {
        const errorText = await response.text().catch(() => 'Unknown error');
        this.effects.log('warn', `HTTP request failed - Status: ${response.status}`, {
          method,
          providerName: this.config.providerName,
          url: HttpUtils.sanitizeUrl(url),
        });
        return err(new HttpError(`HTTP ${response.status}: ${errorText}`, response.status, errorText));
      }

      const text = await response.text();
      this.effects.log('debug', `HTTP request completed - Status: ${response.status}`, {
        durationMs: this.effects.now() - startTime,
      });

      // Handle 204 No Content and empty responses
      if (text.trim() === '') {
        return ok(undefined as T);
      }

      let data: unknown;
      try {
        data = options.parseBody ? options.parseBody(text) : JSON.parse(text);
      } catch (error) {
        return err(
          new ResponseDecodeError(
            `Response decoding failed: ${getErrorMessage(error)}`,
            this.config.providerName,
            text.slice(0, 500)
          )
        );
      }

      return this.validate<T>(data, endpoint, response.status, options.schema);
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        return err(new TimeoutError(`Request timeout after ${timeout}ms`, timeout));
      }

      const message = getErrorMessage(error);
      this.effects.log('warn', `Request failed - URL: ${HttpUtils.sanitizeUrl(url)}, Error: ${message}`, {
        method,
        providerName: this.config.providerName,
      });
      return err(error instanceof Error ? error : new Error(message));
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * Cleanup resources.
   * Closes the undici agent to terminate all keep-alive connections.
   *
   * Idempotent: safe to call multiple times. Subsequent calls return the same promise.
   */
  async close(): Promise<void> {
    if (this.closePromise) {
      return this.closePromise;
    }

    if (this.isClosed) {
      return;
    }

    this.closePromise = (async () => {
      this.logger.debug('Closing HTTP agent connections');
      try {
        await this.agent.close();
        this.isClosed = true;
        this.logger.debug('HTTP agent closed successfully');
      } catch (error) {
        const errorMessage = getErrorMessage(error);
        this.logger.error(`Failed to close HTTP agent: ${errorMessage}`);
        throw new Error(`HTTP agent cleanup failed: ${errorMessage}`);
      }
    })();

    return this.closePromise;
  }

  private validate<T>(
    data: unknown,
    endpoint: string,
    status: number,
    schema: ZodType<unknown> | undefined
  ): Result<T, Error> {
    if (!schema) {
      return ok(data as T);
    }

    const parseResult = (schema as ZodType<T>).safeParse(data);
    if (parseResult.success) {
      return ok(parseResult.data);
    }

    const allIssues = parseResult.error.issues.map((issue) => ({
      message: issue.message,
      path: issue.path.join('.'),
    }));

    // Format first 5 for error message
    const firstFiveErrors = allIssues
      .slice(0, 5)
      .map((issue) => `${issue.path}: ${issue.message}`)
      .join('; ');
    const truncatedPayload = JSON.stringify(data).slice(0, 500);

    this.effects.log(
      'error',
      `Response validation failed (showing first 5 of ${allIssues.length} errors): ${firstFiveErrors}`,
      {
        providerName: this.config.providerName,
        status,
        truncatedPayload,
      }
    );

    return err(
      new ResponseValidationError(
        `Response validation failed: ${firstFiveErrors}`,
        this.config.providerName,
        endpoint,
        allIssues,
        truncatedPayload
      )
    );
  }
}
