/**
 * HTTP Query Transport
 *
 * The single path by which groundcheck talks to the Core. Every outcome of a
 * call (decoded body, HTTP error, timeout, refused connection, undecodable
 * payload, caller abort) comes back as a `TransportResult` value; nothing
 * thrown inside a request escapes this module.
 */

import type { z } from 'zod';
import { TransportError } from '../utils/errors.js';
import { getLogger, type Logger } from '../utils/logger.js';
import { withRetry } from '../utils/retry.js';
import type { CallOptions, CoreOperation, TransportFailure } from './types.js';

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export type TransportResult<T> =
  | { ok: true; value: T }
  | { ok: false; failure: TransportFailure };

export interface TransportOptions {
  /** Base URL of the Core, e.g. http://localhost:8080 */
  baseUrl: string;
  /** Per-call timeout in milliseconds */
  timeoutMs: number;
  /** Extra attempts after a transient failure */
  maxRetries: number;
  /** Delay before the first retry; doubles on each further retry */
  retryDelayMs: number;
  /** Sent as `Authorization: Bearer <apiKey>` */
  apiKey?: string;
  fetch?: FetchLike;
  logger?: Logger;
}

export const DEFAULT_BASE_URL = 'http://localhost:8080';

export const DEFAULT_TRANSPORT_OPTIONS: TransportOptions = {
  baseUrl: DEFAULT_BASE_URL,
  timeoutMs: 30000,
  maxRetries: 2,
  retryDelayMs: 100,
};

interface Endpoint<S extends z.ZodTypeAny> {
  method: 'GET' | 'POST';
  path: string;
  body?: unknown;
  schema: S;
  operation: CoreOperation;
}

const LOOPBACK_HOSTS = new Set(['localhost', '127.0.0.1', '[::1]', '::1']);

export function isInsecureRemoteUrl(baseUrl: string): boolean {
  const url = new URL(baseUrl);
  return url.protocol === 'http:' && !LOOPBACK_HOSTS.has(url.hostname);
}

export class HttpTransport {
  readonly baseUrl: string;
  private readonly options: TransportOptions;
  private readonly fetchImpl: FetchLike;
  private readonly logger: Logger;
  /** Aborted and replaced by every `stop()` */
  private lifecycle = new AbortController();
  private ready = false;

  constructor(options: Partial<TransportOptions> = {}) {
    this.options = { ...DEFAULT_TRANSPORT_OPTIONS, ...options };
    this.baseUrl = this.options.baseUrl.replace(/\/+$/, '');
    this.fetchImpl = this.options.fetch ?? ((input, init) => fetch(input, init));
    this.logger = this.options.logger ?? getLogger('transport');

    if (isInsecureRemoteUrl(this.baseUrl)) {
      this.logger.warn('Using unencrypted HTTP connection to a non-local Core; consider HTTPS', {
        baseUrl: this.baseUrl,
      });
    }
  }

  get isReady(): boolean {
    return this.ready;
  }

  /**
   * Check `/health`. Only a 2xx answer marks the transport ready.
   */
  async start(options: CallOptions = {}): Promise<boolean> {
    const stopped = this.lifecycle.signal;
    const outcome = await this.execute('GET', '/health', undefined, 'health', options);

    // A stop() during the health check wins over its answer and leaves `ready` alone.
    if (stopped.aborted) {
      this.logger.debug('Health check abandoned by stop', { baseUrl: this.baseUrl });
      return false;
    }

    this.ready = outcome.ok;
    if (outcome.ok) {
      this.logger.debug('Core is reachable', { baseUrl: this.baseUrl });
    } else {
      this.logger.warn('Core health check failed', { baseUrl: this.baseUrl, failure: outcome.failure.kind });
    }
    return this.ready;
  }

  /**
   * Leave the ready state and abandon every call in progress, including one
   * waiting to retry. Safe to call any number of times.
   */
  stop(): void {
    this.ready = false;
    this.lifecycle.abort();
    this.lifecycle = new AbortController();
  }

  async send<S extends z.ZodTypeAny>(
    endpoint: Endpoint<S>,
    options: CallOptions = {}
  ): Promise<TransportResult<z.output<S>>> {
    if (!this.ready) {
      return {
        ok: false,
        failure: { kind: 'NotStarted', message: 'Client not started' },
      };
    }

    const outcome = await this.execute(endpoint.method, endpoint.path, endpoint.body, endpoint.operation, options);
    if (!outcome.ok) {
      return outcome;
    }

    let json: unknown;
    try {
      json = JSON.parse(outcome.value);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      return malformed(`Invalid JSON response: ${reason}`, outcome.value);
    }

    const parsed = endpoint.schema.safeParse(json);
    if (!parsed.success) {
      const issues = parsed.error.errors
        .map((issue) => `${issue.path.join('.') || 'root'}: ${issue.message}`)
        .join('; ');
      return malformed(`Unexpected ${endpoint.operation} response shape (${issues})`, outcome.value);
    }

    return { ok: true, value: parsed.data };
  }

  /**
   * Run one call with bounded retries and return the body text
   */
  private async execute(
    method: 'GET' | 'POST',
    path: string,
    body: unknown,
    operation: CoreOperation,
    options: CallOptions
  ): Promise<TransportResult<string>> {
    const timeoutMs = options.timeoutMs ?? this.options.timeoutMs;
    const url = `${this.baseUrl}${path}`;
    const stopped = this.lifecycle.signal;
    const callerSignal = options.signal;

    // One signal for the whole call: set by the caller or by stop()
    const call = new AbortController();
    const cancel = () => call.abort();
    stopped.addEventListener('abort', cancel, { once: true });
    callerSignal?.addEventListener('abort', cancel, { once: true });
    if (stopped.aborted || callerSignal?.aborted) {
      call.abort();
    }

    try {
      const text = await withRetry(
        () => this.attempt(method, url, body, operation, timeoutMs, call.signal),
        {
          maxAttempts: this.options.maxRetries + 1,
          initialDelayMs: this.options.retryDelayMs,
          jitter: this.options.retryDelayMs > 0,
          signal: call.signal,
          retryOn: (error) =>
            error instanceof TransportError && error.retryable && !call.signal.aborted,
          onRetry: (attempt, error, delayMs) => {
            this.logger.warn(`Retrying ${operation}`, { attempt, delayMs, reason: error.message });
          },
        }
      );
      return { ok: true, value: text };
    } catch (error) {
      if (callerSignal?.aborted) {
        return cancelled('Request cancelled by caller');
      }
      if (stopped.aborted) {
        return cancelled('Transport stopped');
      }
      if (error instanceof TransportError) {
        this.logger.debug(`${operation} failed`, { kind: error.failure.kind, message: error.message });
        return { ok: false, failure: error.failure };
      }
      const message = error instanceof Error ? error.message : String(error);
      return { ok: false, failure: { kind: 'ConnectionFailed', message } };
    } finally {
      stopped.removeEventListener('abort', cancel);
      callerSignal?.removeEventListener('abort', cancel);
    }
  }

  private async attempt(
    method: 'GET' | 'POST',
    url: string,
    body: unknown,
    operation: CoreOperation,
    timeoutMs: number,
    cancelSignal: AbortSignal
  ): Promise<string> {
    if (cancelSignal.aborted) {
      throw new TransportError({ kind: 'Cancelled', message: 'Request cancelled' }, { operation });
    }

    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);
    const onCancel = () => controller.abort();
    cancelSignal.addEventListener('abort', onCancel, { once: true });

    this.logger.debug(`${method} ${url}`, { operation });

    try {
      const response = await this.fetchImpl(url, {
        method,
        headers: this.headers(body !== undefined),
        body: body !== undefined ? JSON.stringify(body) : undefined,
        signal: controller.signal,
      });
      const text = await response.text();

      if (!response.ok) {
        throw new TransportError({
          kind: 'HttpError',
          status: response.status,
          message: `HTTP ${response.status}: ${response.statusText || 'request failed'}`,
        }, { operation });
      }
      return text;
    } catch (error) {
      if (error instanceof TransportError) {
        throw error;
      }
      const cause = error instanceof Error ? error : undefined;
      if (timedOut) {
        throw new TransportError({
          kind: 'Timeout',
          timeoutMs,
          message: `Request timed out after ${timeoutMs}ms`,
        }, { operation, cause });
      }
      if (controller.signal.aborted) {
        throw new TransportError({ kind: 'Cancelled', message: 'Request cancelled' }, { operation, cause });
      }
      throw new TransportError({
        kind: 'ConnectionFailed',
        message: describeNetworkError(error),
      }, { operation, cause });
    } finally {
      clearTimeout(timer);
      cancelSignal.removeEventListener('abort', onCancel);
    }
  }

  private headers(hasBody: boolean): Record<string, string> {
    return {
      Accept: 'application/json',
      ...(hasBody ? { 'Content-Type': 'application/json' } : {}),
      ...(this.options.apiKey ? { Authorization: `Bearer ${this.options.apiKey}` } : {}),
    };
  }
}

function cancelled(message: string): TransportResult<never> {
  return { ok: false, failure: { kind: 'Cancelled', message } };
}

function malformed(message: string, body: string): TransportResult<never> {
  return { ok: false, failure: { kind: 'MalformedResponse', message, body } };
}

/**
 * fetch wraps socket errors in a generic TypeError; surface the cause code
 */
function describeNetworkError(error: unknown): string {
  if (!(error instanceof Error)) {
    return String(error);
  }
  const cause: unknown = error.cause;
  if (cause instanceof Error) {
    const code = 'code' in cause && typeof cause.code === 'string' ? `${cause.code}: ` : '';
    return `${code}${cause.message}`;
  }
  return error.message;
}
