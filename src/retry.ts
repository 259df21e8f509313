import { setTimeout as delay } from 'node:timers/promises';
import { defaultRetryPolicy } from './default.config';
import { CancelledError, TimeoutError, TransportError, errorMessage } from './errors';
import { silentLogger, type Logger } from './logger';
import type { RetryPolicy } from './types';

export type FetchLike = (input: Request, init?: RequestInit) => Promise<Response>;

/** What one successful attempt yields; the body is read inside the attempt's timeout. */
export interface TransportResponse {
  status: number;
  statusText: string;
  headers: Headers;
  body: Buffer;
  attempts: number;
}

export interface SendOptions {
  signal?: AbortSignal;
  /** Per-attempt timeout */
  timeoutMs: number;
}

const IDEMPOTENT_METHODS = new Set(['GET', 'HEAD', 'OPTIONS', 'PUT', 'DELETE']);

const TRANSIENT_ERROR_CODES = new Set([
  'ECONNRESET',
  'ETIMEDOUT',
  'EPIPE',
  'EAI_AGAIN',
  'ECONNABORTED',
  'UND_ERR_SOCKET',
  'UND_ERR_CONNECT_TIMEOUT',
]);

function codeOf(value: unknown): string | undefined {
  if (typeof value === 'object' && value !== null && 'code' in value && typeof value.code === 'string') {
    return value.code;
  }
  return undefined;
}

/** The system error code behind a failed fetch, looking through `cause`. */
export function errorCode(error: unknown): string | undefined {
  const own = codeOf(error);
  if (own) return own;
  if (error instanceof Error) return codeOf(error.cause);
  return undefined;
}

/** Exponential delay before jitter: `min(max, initial * factor^attempt)`. */
export function computeBackoff(policy: RetryPolicy, attempt: number): number {
  const raw = policy.initialBackoffMs * Math.pow(policy.backoffFactor, attempt);
  return Math.min(policy.maxBackoffMs, raw);
}

/** Scale `base` by a factor drawn uniformly from [1 - jitter, 1 + jitter]. */
export function applyJitter(base: number, jitter: number, random: () => number = Math.random): number {
  if (jitter <= 0) return base;
  const j = Math.min(jitter, 1);
  return base * (1 + j * (random() * 2 - 1));
}

export interface RetryDecisionInput {
  policy: RetryPolicy;
  attempt: number;
  method: string;
  status?: number;
  error?: unknown;
  signal?: AbortSignal;
}

export function shouldRetry(input: RetryDecisionInput): boolean {
  const { policy, attempt, method, status, error, signal } = input;
  if (attempt >= policy.maxRetries) return false;
  if (signal?.aborted) return false;
  if (policy.retryNonIdempotent === false && !IDEMPOTENT_METHODS.has(method.toUpperCase())) {
    return false;
  }

  if (error !== undefined) {
    if (error instanceof CancelledError) return false;
    if (error instanceof TimeoutError) return policy.retryableErrors.includes('timeout');
    const code = errorCode(error);
    if (code && policy.retryableErrorCodes?.includes(code)) return true;
    if (code && TRANSIENT_ERROR_CODES.has(code)) return policy.retryableErrors.includes('network');
    return false;
  }

  return status !== undefined && policy.retryableStatusCodes.includes(status);
}

export interface RetryingTransportOptions {
  policy?: RetryPolicy;
  fetch?: FetchLike;
  logger?: Logger;
  random?: () => number;
  /** Backoff wait; replaced in tests to avoid real time passing */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

async function defaultSleep(ms: number, signal?: AbortSignal): Promise<void> {
  await delay(ms, undefined, { signal });
}

export class RetryingTransport {
  readonly policy: RetryPolicy;
  private fetchFn: FetchLike;
  private logger: Logger;
  private random: () => number;
  private sleep: (ms: number, signal?: AbortSignal) => Promise<void>;

  constructor(options: RetryingTransportOptions = {}) {
    this.policy = options.policy ?? defaultRetryPolicy;
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
    this.logger = options.logger ?? silentLogger;
    this.random = options.random ?? Math.random;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Send the request built by `makeRequest`, once per attempt so every retry
   * gets a fresh body. A retryable status on the final attempt is returned as
   * is; a final error becomes a TransportError.
   */
  async send(makeRequest: () => Request | Promise<Request>, options: SendOptions): Promise<TransportResponse> {
    const { signal } = options;
    let attempt = 0;

    for (;;) {
      if (signal?.aborted) throw new CancelledError();

      const request = await makeRequest();
      let outcome: TransportResponse | undefined;
      let failure: unknown;
      try {
        outcome = await this.attempt(request, options, attempt + 1);
      } catch (error) {
        if (error instanceof CancelledError) throw error;
        failure = error;
      }

      const retry = shouldRetry({
        policy: this.policy,
        attempt,
        method: request.method,
        status: outcome?.status,
        error: failure,
        signal,
      });

      if (!retry) {
        if (outcome) {
          if (attempt > 0) this.logger.debug(`${request.method} ${request.url} settled after ${attempt} retries`);
          return outcome;
        }
        if (signal?.aborted) throw new CancelledError();
        throw new TransportError(
          `${request.method} ${request.url} failed after ${attempt + 1} attempt(s): ${errorMessage(failure)}`,
          attempt + 1,
          { cause: failure }
        );
      }

      const wait = applyJitter(computeBackoff(this.policy, attempt), this.policy.jitter, this.random);
      const reason = failure !== undefined ? errorMessage(failure) : `status ${String(outcome?.status)}`;
      this.logger.debug(
        `Retrying ${request.method} ${request.url} after ${reason} (retry ${attempt + 1}/${this.policy.maxRetries}, backoff ${Math.round(wait)}ms)`
      );
      attempt++;

      try {
        await this.sleep(wait, signal);
      } catch (error) {
        if (signal?.aborted) throw new CancelledError();
        throw error;
      }
    }
  }

  private async attempt(request: Request, options: SendOptions, attempts: number): Promise<TransportResponse> {
    const controller = new AbortController();
    const { signal } = options;
    const onAbort = () => controller.abort(signal?.reason);
    signal?.addEventListener('abort', onAbort, { once: true });
    const timer = setTimeout(() => {
      controller.abort(new TimeoutError(options.timeoutMs));
    }, options.timeoutMs);

    try {
      const response = await this.fetchFn(request, { signal: controller.signal });
      const body = Buffer.from(await response.arrayBuffer());
      return {
        status: response.status,
        statusText: response.statusText,
        headers: response.headers,
        body,
        attempts,
      };
    } catch (error) {
      if (signal?.aborted) throw new CancelledError();
      const reason: unknown = controller.signal.reason;
      if (reason instanceof TimeoutError) throw reason;
      throw error;
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }
  }
}
