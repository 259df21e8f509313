import { createAuthProvider, type AuthProvider } from './auth';
import { CancelledError, RequestConstructionError, errorMessage } from './errors';
import { silentLogger, type Logger } from './logger';
import type { PluginHost } from './plugin-host';
import { RetryingTransport, type FetchLike } from './retry';
import { MemorySessionStore, formatCookieHeader, parseSetCookie, type SessionStore } from './session-store';
import type { ApiRequest, ApiResponse, AuthDescriptor, RetryPolicy } from './types';
import { VariableStore, layerVariables, substituteRequest, type VariableMap } from './variables';

export interface ExecuteOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
}

export interface HttpExecutorConfig {
  timeoutMs?: number;
  retryPolicy?: RetryPolicy;
  fetch?: FetchLike;
  variables?: VariableStore;
  sessions?: SessionStore;
  pluginHost?: PluginHost;
  logger?: Logger;
  /** Run-wide cancellation; merged with any per-call signal */
  signal?: AbortSignal;
  random?: () => number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  now?: () => number;
}

const DEFAULT_CONTENT_TYPE = 'application/octet-stream';

function anySignal(...signals: (AbortSignal | undefined)[]): AbortSignal | undefined {
  const present = signals.filter((s): s is AbortSignal => s !== undefined);
  if (present.length <= 1) return present[0];
  return AbortSignal.any(present);
}

function headerMultimap(headers: Headers): Record<string, string[]> {
  const map: Record<string, string[]> = {};
  headers.forEach((value, name) => {
    const key = name.toLowerCase();
    if (key === 'set-cookie') return;
    map[key] = [value];
  });
  const cookies = headers.getSetCookie();
  if (cookies.length) map['set-cookie'] = cookies;
  return map;
}

/**
 * Executes one request at a time: substitution, auth, session cookies and
 * the retrying transport. Safe to share between concurrent workers.
 */
export class HttpExecutor {
  readonly variables: VariableStore;
  readonly sessions: SessionStore;
  private transport: RetryingTransport;
  private timeoutMs: number;
  private pluginHost?: PluginHost;
  private logger: Logger;
  private signal?: AbortSignal;
  private fetchFn?: FetchLike;
  private now: () => number;
  private providers = new Map<string, AuthProvider>();
  private counter = 0;

  constructor(config: HttpExecutorConfig = {}) {
    this.timeoutMs = config.timeoutMs ?? 30_000;
    this.variables = config.variables ?? new VariableStore();
    this.sessions = config.sessions ?? new MemorySessionStore();
    this.pluginHost = config.pluginHost;
    this.logger = config.logger ?? silentLogger;
    this.signal = config.signal;
    this.fetchFn = config.fetch;
    this.now = config.now ?? Date.now;
    this.transport = new RetryingTransport({
      policy: config.retryPolicy,
      fetch: config.fetch,
      logger: this.logger,
      random: config.random,
      sleep: config.sleep,
    });
  }

  public getTimeout(): number {
    return this.timeoutMs;
  }

  /** Providers are kept per descriptor so OAuth2 token state survives between requests. */
  public authProvider(descriptor: AuthDescriptor): AuthProvider {
    const key = JSON.stringify(descriptor);
    let provider = this.providers.get(key);
    if (!provider) {
      provider = createAuthProvider(descriptor, { fetch: this.fetchFn, logger: this.logger, now: this.now });
      this.providers.set(key, provider);
    }
    return provider;
  }

  private nextRequestId(): string {
    this.counter += 1;
    return `req-${this.now()}-${this.counter}`;
  }

  private async buildRequest(request: ApiRequest, signal?: AbortSignal): Promise<Request> {
    let url: URL;
    try {
      url = new URL(request.url);
    } catch (error) {
      throw new RequestConstructionError(`Invalid URL "${request.url}"`, { cause: error });
    }

    let headers: Headers;
    try {
      headers = new Headers();
      for (const h of request.headers) headers.append(h.name, h.value);
    } catch (error) {
      throw new RequestConstructionError(`Invalid header: ${errorMessage(error)}`, { cause: error });
    }

    const cookies = this.sessions.getCookies(url.host);
    if (cookies.length && !headers.has('cookie')) {
      headers.set('Cookie', formatCookieHeader(cookies));
    }

    if (request.auth) {
      await this.authProvider(request.auth).applyAuth(headers, signal);
    }

    const method = request.method.toUpperCase();
    let outbound: Request;
    try {
      outbound = new Request(url, {
        method,
        headers,
        body: request.body === undefined || request.body === '' || method === 'GET' || method === 'HEAD' ? undefined : request.body,
      });
    } catch (error) {
      throw new RequestConstructionError(`Cannot build ${method} ${url.toString()}: ${errorMessage(error)}`, { cause: error });
    }

    return this.pluginHost ? this.pluginHost.transformRequest(outbound) : outbound;
  }

  /**
   * Send one request. Call-supplied variables win over the run store; the
   * returned response carries the substituted request it was produced from.
   */
  public async execute(request: ApiRequest, vars: VariableMap = {}, options: ExecuteOptions = {}): Promise<ApiResponse> {
    const signal = anySignal(this.signal, options.signal);
    if (signal?.aborted) throw new CancelledError();

    const resolved = substituteRequest(request, layerVariables(this.variables.getAll(), vars));

    const start = this.now();
    const timestamp = new Date(start);
    const result = await this.transport.send(() => this.buildRequest(resolved, signal), {
      signal,
      timeoutMs: options.timeoutMs ?? this.timeoutMs,
    });
    const durationMs = this.now() - start;

    const host = new URL(resolved.url).host;
    for (const raw of result.headers.getSetCookie()) {
      const cookie = parseSetCookie(raw);
      if (cookie) this.sessions.setCookie(host, cookie);
    }

    const headers = headerMultimap(result.headers);
    const contentType = result.headers.get('content-type') ?? DEFAULT_CONTENT_TYPE;

    return {
      statusCode: result.status,
      statusText: result.statusText,
      headers,
      body: result.body,
      contentType,
      contentLength: result.body.length,
      durationMs,
      timestamp,
      request: resolved,
      requestId: this.nextRequestId(),
      attempts: result.attempts,
    };
  }

  /** Execute in order, logging and skipping requests that fail. */
  public async executeBatch(requests: readonly ApiRequest[], vars: VariableMap = {}, options: ExecuteOptions = {}): Promise<ApiResponse[]> {
    const responses: ApiResponse[] = [];
    for (const request of requests) {
      try {
        responses.push(await this.execute(request, vars, options));
      } catch (error) {
        if (error instanceof CancelledError) throw error;
        this.logger.error(`${request.method} ${request.url} failed: ${errorMessage(error)}`);
      }
    }
    return responses;
  }
}
