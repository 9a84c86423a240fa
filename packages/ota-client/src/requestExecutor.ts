import { setTimeout as delay } from 'node:timers/promises';
import { fetch, Headers } from 'undici';
import type { Response } from 'undici';
import type { Logger } from 'pino';
import {
  ConnectionExhaustedError,
  InvalidResponseError,
  OtaUpdateError,
  RequestFailedError
} from './errors';
import { silentLogger } from './logger';
import type { RequestExecutorOptions, SleepFunction } from './types';

export const DEFAULT_ATTEMPTS = 3;
export const DEFAULT_RETRY_DELAY_MS = 5_000;

export interface HttpRequest {
  method: 'GET' | 'POST';
  url: string | URL;
  headers?: Record<string, string>;
  /** Serialized as JSON when present. */
  json?: unknown;
}

function isTransientStatus(statusCode: number): boolean {
  return statusCode >= 500 || statusCode === 429;
}

function isTransientFailure(err: unknown): boolean {
  if (err instanceof RequestFailedError) {
    return isTransientStatus(err.statusCode);
  }
  // Anything else raised by fetch or while reading the body is a transport failure.
  return !(err instanceof OtaUpdateError);
}

/**
 * Bounded-retry HTTP primitive shared by the backend and repository clients.
 * Every attempt re-sends the same request; the response body is read inside the
 * attempt so a connection dropped mid-transfer is retried as well.
 */
export class RequestExecutor {
  readonly attempts: number;
  readonly delayMs: number;
  private readonly timeoutMs?: number;
  private readonly userAgent?: string;
  private readonly sleep: SleepFunction;
  private readonly logger: Logger;

  constructor(options: RequestExecutorOptions = {}) {
    const attempts = options.attempts ?? DEFAULT_ATTEMPTS;
    if (!Number.isInteger(attempts) || attempts < 1) {
      throw new Error('RequestExecutor requires at least one attempt');
    }
    const delayMs = options.delayMs ?? DEFAULT_RETRY_DELAY_MS;
    if (!Number.isFinite(delayMs) || delayMs < 0) {
      throw new Error('RequestExecutor retry delay must be a non-negative number');
    }
    this.attempts = attempts;
    this.delayMs = delayMs;
    this.timeoutMs = options.timeoutMs;
    this.userAgent = options.userAgent;
    this.sleep = options.sleep ?? ((ms) => delay(ms));
    this.logger = options.logger ?? silentLogger;
  }

  async getJson(url: string | URL, headers?: Record<string, string>): Promise<unknown> {
    const text = await this.execute({ method: 'GET', url, headers }, (response) => response.text());
    try {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new InvalidResponseError(String(url), `Response is not valid JSON: ${reason}`);
    }
  }

  async getBytes(url: string | URL, headers?: Record<string, string>): Promise<Buffer> {
    return this.execute({ method: 'GET', url, headers }, async (response) =>
      Buffer.from(await response.arrayBuffer())
    );
  }

  async postJson(url: string | URL, json: unknown, headers?: Record<string, string>): Promise<void> {
    await this.execute({ method: 'POST', url, headers, json }, (response) => response.text());
  }

  async execute<T>(request: HttpRequest, read: (response: Response) => Promise<T>): Promise<T> {
    const url = String(request.url);
    for (let attempt = 1; ; attempt += 1) {
      let failure: unknown;
      try {
        return await this.dispatch(request, read);
      } catch (err) {
        if (!isTransientFailure(err)) {
          throw err;
        }
        failure = err;
      }

      const message = failure instanceof Error ? failure.message : String(failure);
      if (attempt >= this.attempts) {
        this.logger.error({ url, attempts: attempt }, `Failed after ${attempt} attempts. Last error: ${message}`);
        throw new ConnectionExhaustedError(url, this.attempts, { cause: failure });
      }
      this.logger.warn(
        { url, attempt, attempts: this.attempts },
        `${message} - Retrying in ${this.delayMs}ms (${attempt}/${this.attempts})`
      );
      await this.sleep(this.delayMs);
    }
  }

  private async dispatch<T>(request: HttpRequest, read: (response: Response) => Promise<T>): Promise<T> {
    const headers = new Headers({ Accept: 'application/json' });
    if (this.userAgent) {
      headers.set('User-Agent', this.userAgent);
    }
    for (const [key, value] of Object.entries(request.headers ?? {})) {
      headers.set(key, value);
    }

    let body: string | undefined;
    if (request.json !== undefined) {
      body = JSON.stringify(request.json);
      headers.set('Content-Type', 'application/json');
    }

    const controller = new AbortController();
    let timeout: NodeJS.Timeout | undefined;
    if (this.timeoutMs && this.timeoutMs > 0) {
      timeout = setTimeout(() => {
        controller.abort(new Error('Request timed out'));
      }, this.timeoutMs);
    }

    try {
      const response = await fetch(request.url, {
        method: request.method,
        headers,
        body,
        signal: controller.signal
      });
      if (!response.ok) {
        const details = await response.text().catch(() => null);
        throw new RequestFailedError(String(request.url), response.status, details);
      }
      return await read(response);
    } finally {
      if (timeout) {
        clearTimeout(timeout);
      }
    }
  }
}
