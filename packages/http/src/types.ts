import type { ZodType } from 'zod';

import type { QueryParams } from './core/http-utils.js';

export interface HttpClientConfig {
  baseUrl: string;
  defaultHeaders?: Record<string, string> | undefined;
  providerName: string;
  timeout?: number | undefined;
}

export interface HttpRequestOptions {
  body?: string | object | undefined;
  headers?: Record<string, string> | undefined;
  method?: 'GET' | 'POST' | undefined;
  query?: QueryParams | undefined;
  schema?: ZodType<unknown> | undefined;
  timeout?: number | undefined;
  /**
   * Decode the raw response text instead of `JSON.parse`.
   * Lets callers keep numeric literals exact, for instance.
   */
  parseBody?: ((text: string) => unknown) | undefined;
}

// HTTP-related error classes
export class HttpError extends Error {
  constructor(
    message: string,
    public statusCode: number,
    public responseBody: string
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

export class TimeoutError extends Error {
  constructor(
    message: string,
    public timeoutMs: number
  ) {
    super(message);
    this.name = 'TimeoutError';
  }
}

export class ResponseValidationError extends Error {
  constructor(
    message: string,
    public providerName: string,
    public endpoint: string,
    public validationIssues: { message: string; path: string }[],
    public truncatedPayload: string
  ) {
    super(message);
    this.name = 'ResponseValidationError';
  }
}

export class ResponseDecodeError extends Error {
  constructor(
    message: string,
    public providerName: string,
    public truncatedPayload: string
  ) {
    super(message);
    this.name = 'ResponseDecodeError';
  }
}
