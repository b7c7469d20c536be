/**
 * Resilient HTTP client
 *
 * Every call is retried per the configured RetryPolicy and followed by a fixed
 * rate-limit delay, whether it succeeded or not. Non-2xx responses become
 * HttpError carrying the parsed error envelope.
 */

import {
  ConnectorError,
  HttpError,
  Logger,
  parseApiErrorEnvelope,
  silentLogger,
  sleep,
} from '@catalogsync/core';
import type { IAuthProvider } from './auth.js';
import { resolveRetryPolicy, withRetries, type RetryPolicy } from './retry.js';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export type FetchFn = (input: string, init: RequestInit) => Promise<Response>;

export interface HttpClientConfig {
  /** Service name used in errors and logs */
  source: string;
  /** Per-attempt timeout in milliseconds (default: 60000) */
  timeoutMs?: number;
  /** Pause after every call in milliseconds (default: 1000) */
  rateLimitDelayMs?: number;
  retry?: Partial<RetryPolicy>;
  auth?: IAuthProvider;
  fetch?: FetchFn;
  logger?: Logger;
}

export interface RequestOptions {
  /** JSON body */
  json?: unknown;
  /** Raw body (form data, multipart); ignored when json is set */
  body?: FormData | URLSearchParams | string;
  query?: Record<string, string | undefined>;
  headers?: Record<string, string>;
  /**
   * Statuses the caller expects, such as 404 on an existence check.
   * They are neither logged nor retried, but still raise HttpError.
   */
  silentStatusCodes?: readonly number[];
  /** Per-request auth; null sends no credentials */
  auth?: IAuthProvider | null;
}

export interface HttpResponse {
  status: number;
  /** Parsed JSON body, the raw text when it is not JSON, undefined when empty */
  data: unknown;
  headers: Headers;
}

function isAbortError(err: unknown): boolean {
  return err instanceof Error && (err.name === 'AbortError' || err.name === 'TimeoutError');
}

function parseBody(text: string): unknown {
  if (text.trim() === '') return undefined;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

function withQuery(url: string, query: RequestOptions['query']): string {
  if (!query) return url;
  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(query)) {
    if (value !== undefined) params.set(key, value);
  }
  const qs = params.toString();
  if (!qs) return url;
  return `${url}${url.includes('?') ? '&' : '?'}${qs}`;
}

export class HttpClient {
  private readonly retry: RetryPolicy;
  private readonly timeoutMs: number;
  private readonly rateLimitDelayMs: number;
  private readonly fetchFn: FetchFn;
  private readonly logger: Logger;

  constructor(private readonly config: HttpClientConfig) {
    this.retry = resolveRetryPolicy(config.retry);
    this.timeoutMs = config.timeoutMs ?? 60_000;
    this.rateLimitDelayMs = config.rateLimitDelayMs ?? 1_000;
    this.fetchFn = config.fetch ?? ((input, init) => fetch(input, init));
    this.logger = (config.logger ?? silentLogger).child({ source: config.source });
  }

  get source(): string {
    return this.config.source;
  }

  async request(method: HttpMethod, url: string, options: RequestOptions = {}): Promise<HttpResponse> {
    const target = withQuery(url, options.query);
    const silent = new Set(options.silentStatusCodes ?? []);
    const policy: RetryPolicy = {
      ...this.retry,
      isRetryable: (err) =>
        !(err instanceof HttpError && silent.has(err.status)) && this.retry.isRetryable(err),
    };

    try {
      return await withRetries(
        () => this.attempt(method, target, options, silent),
        policy,
        (err, next) => {
          this.logger.warn('Retrying request', {
            method,
            url: target,
            attempt: next.attempt,
            attempts: next.attempts,
            delayMs: next.delayMs,
            error: err,
          });
        }
      );
    } finally {
      await sleep(this.rateLimitDelayMs);
    }
  }

  async get(url: string, options?: RequestOptions): Promise<HttpResponse> {
    return this.request('GET', url, options);
  }

  async post(url: string, options?: RequestOptions): Promise<HttpResponse> {
    return this.request('POST', url, options);
  }

  async put(url: string, options?: RequestOptions): Promise<HttpResponse> {
    return this.request('PUT', url, options);
  }

  async patch(url: string, options?: RequestOptions): Promise<HttpResponse> {
    return this.request('PATCH', url, options);
  }

  async delete(url: string, options?: RequestOptions): Promise<HttpResponse> {
    return this.request('DELETE', url, options);
  }

  private async attempt(
    method: HttpMethod,
    url: string,
    options: RequestOptions,
    silent: ReadonlySet<number>
  ): Promise<HttpResponse> {
    const auth = options.auth === undefined ? this.config.auth : options.auth;
    const headers: Record<string, string> = {
      Accept: 'application/json',
      ...(auth ? await auth.headers() : {}),
      ...(options.headers ?? {}),
    };

    let body: FormData | URLSearchParams | string | undefined = options.body;
    if (options.json !== undefined) {
      headers['Content-Type'] = 'application/json';
      body = JSON.stringify(options.json);
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    let response: Response;
    let text: string;
    try {
      response = await this.fetchFn(url, { method, headers, body, signal: controller.signal });
      text = await response.text();
    } catch (err) {
      if (isAbortError(err)) {
        throw new ConnectorError({
          code: 'TIMEOUT',
          message: `${method} ${url} timed out after ${this.timeoutMs}ms`,
          source: this.config.source,
          suggestion: 'Increase http.timeoutMs or check network connectivity.',
        });
      }

      throw new ConnectorError({
        code: 'CONNECTION_FAILED',
        message: `Failed to reach ${this.config.source}: ${err instanceof Error ? err.message : String(err)}`,
        source: this.config.source,
        cause: err instanceof Error ? err : undefined,
        context: { method, url },
      });
    } finally {
      clearTimeout(timeout);
    }

    if (response.ok) {
      return { status: response.status, data: parseBody(text), headers: response.headers };
    }

    const error = new HttpError({
      status: response.status,
      statusText: response.statusText,
      method,
      url,
      envelope: parseApiErrorEnvelope(text),
      source: this.config.source,
    });

    if (!silent.has(response.status)) {
      this.logger.error('HTTP request failed', {
        method,
        url,
        status: response.status,
        message: error.message,
      });
    }

    throw error;
  }
}
