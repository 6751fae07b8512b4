import { Pool, errors, request, type Dispatcher } from 'undici';
import { SERIES_PATH } from '../config/index.js';
import {
  AuthenticationError,
  CancelledError,
  MetricsExportError,
  NetworkError,
  RateLimitError,
  RequestRejectedError,
  ServerError,
  TimeoutError,
} from '../errors/index.js';
import type { SeriesPayload } from '../metrics/index.js';
import { NoopLogger, type Logger } from '../observability/index.js';

/**
 * Options for a single submission
 */
export interface SubmitOptions {
  /**
   * Signal for request cancellation
   */
  signal?: AbortSignal;
}

/**
 * Successful intake response
 */
export interface SubmitResponse {
  status: number;
  body: unknown;
}

/**
 * Interface for the metrics intake transport.
 *
 * Implementations are shared by every batch of every export call, so they
 * must accept concurrent submissions.
 */
export interface MetricsTransport {
  /**
   * Posts one batch. Resolves on a 2xx response and rejects with a
   * `MetricsExportError` describing any other outcome.
   */
  submit(payload: SeriesPayload, options?: SubmitOptions): Promise<SubmitResponse>;

  /**
   * Releases pooled connections
   */
  close(): Promise<void>;
}

export interface UndiciTransportOptions {
  baseUrl: string;
  apiKey: string;
  appKey?: string;
  timeoutMs: number;
  connections: number;
  /**
   * Dispatcher to send through instead of a dedicated pool
   * (e.g. a proxy agent, or a MockAgent in tests)
   */
  dispatcher?: Dispatcher;
  logger?: Logger;
}

/**
 * Implementation of MetricsTransport over an undici connection pool
 */
export class UndiciMetricsTransport implements MetricsTransport {
  private readonly dispatcher: Dispatcher;
  private readonly ownsDispatcher: boolean;
  private readonly logger: Logger;
  private readonly url: string;
  private closed = false;

  constructor(private readonly options: UndiciTransportOptions) {
    this.url = `${options.baseUrl}${SERIES_PATH}`;
    this.ownsDispatcher = options.dispatcher === undefined;
    this.dispatcher = options.dispatcher ?? new Pool(new URL(options.baseUrl).origin, {
      connections: options.connections,
    });
    this.logger = options.logger ?? new NoopLogger();
  }

  async submit(payload: SeriesPayload, options?: SubmitOptions): Promise<SubmitResponse> {
    const startedAt = Date.now();
    let status: number;
    let headers: Record<string, string | string[] | undefined>;
    let text: string;

    try {
      const response = await request(this.url, {
        dispatcher: this.dispatcher,
        method: 'POST',
        headers: this.buildHeaders(),
        body: JSON.stringify(payload),
        headersTimeout: this.options.timeoutMs,
        bodyTimeout: this.options.timeoutMs,
        signal: options?.signal,
      });
      status = response.statusCode;
      headers = response.headers;
      // Consume the response body to free the connection
      text = await response.body.text();
    } catch (error) {
      throw this.toTransportError(error, options?.signal);
    }

    this.logger.debug('Metrics intake response', {
      status,
      durationMs: Date.now() - startedAt,
      series: payload.series.length,
    });

    if (status >= 200 && status < 300) {
      return { status, body: parseBody(text) };
    }

    throw errorForStatus(status, headers, text);
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    if (this.ownsDispatcher) {
      await this.dispatcher.close();
    }
  }

  private buildHeaders(): Record<string, string> {
    const headers: Record<string, string> = {
      'content-type': 'application/json',
      accept: 'application/json',
      'dd-api-key': this.options.apiKey,
    };
    if (this.options.appKey) {
      headers['dd-application-key'] = this.options.appKey;
    }
    return headers;
  }

  private toTransportError(error: unknown, signal?: AbortSignal): MetricsExportError {
    if (error instanceof MetricsExportError) {
      return error;
    }

    if (signal?.aborted || error instanceof errors.RequestAbortedError) {
      return new CancelledError('Metrics submission was aborted');
    }

    if (
      error instanceof errors.HeadersTimeoutError ||
      error instanceof errors.BodyTimeoutError ||
      error instanceof errors.ConnectTimeoutError
    ) {
      return new TimeoutError(this.options.timeoutMs, error);
    }

    if (error instanceof Error) {
      return new NetworkError(`Network request failed: ${error.message}`, error);
    }

    return new NetworkError(`Network request failed: ${String(error)}`);
  }
}

/**
 * Maps a non-2xx intake response to the error taxonomy
 */
export function errorForStatus(
  status: number,
  headers: Record<string, string | string[] | undefined>,
  text: string
): MetricsExportError {
  const message = extractErrorMessage(parseBody(text)) ?? `HTTP ${status} error`;
  const details = { body: text.slice(0, 512) };

  if (status === 401 || status === 403) {
    return new AuthenticationError(message, status, details);
  }
  if (status === 429) {
    return new RateLimitError(message, parseRetryAfter(firstHeader(headers['retry-after'])), details);
  }
  if (status >= 500) {
    return new ServerError(message, status, details);
  }
  if (status >= 400) {
    return new RequestRejectedError(message, status, details);
  }
  return new RequestRejectedError(`Unexpected response: ${message}`, status, details);
}

/**
 * Parses a Retry-After header given as delta-seconds or an HTTP date
 * @returns Milliseconds to wait, or undefined when absent or unparseable
 */
export function parseRetryAfter(value: string | undefined, now: number = Date.now()): number | undefined {
  if (!value) {
    return undefined;
  }

  const trimmed = value.trim();
  if (/^\d+(\.\d+)?$/.test(trimmed)) {
    return Math.round(Number(trimmed) * 1000);
  }

  const date = Date.parse(trimmed);
  if (isNaN(date)) {
    return undefined;
  }
  return Math.max(0, date - now);
}

function firstHeader(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

function parseBody(text: string): unknown {
  if (!text) {
    return undefined;
  }
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

/**
 * Datadog reports failures as `{ "errors": ["..."] }`
 */
function extractErrorMessage(body: unknown): string | undefined {
  if (typeof body === 'string' && body.trim()) {
    return body.trim();
  }
  if (body && typeof body === 'object' && 'errors' in body) {
    const list = body.errors;
    if (Array.isArray(list) && list.length > 0) {
      return list.map(String).join('; ');
    }
  }
  return undefined;
}

/**
 * Creates a transport instance
 */
export function createMetricsTransport(options: UndiciTransportOptions): MetricsTransport {
  return new UndiciMetricsTransport(options);
}
