import { AuthenticationError, CancelledError, errorMessage } from './errors';
import { silentLogger, type Logger } from './logger';
import type { FetchLike } from './retry';
import type { AuthDescriptor, OAuth2AuthDescriptor } from './types';

export type AuthKind = AuthDescriptor['type'];

export interface AuthProvider {
  kind(): AuthKind;
  /** Set the credentials on outbound headers, refreshing first when needed. */
  applyAuth(headers: Headers, signal?: AbortSignal): Promise<void>;
  refreshAuth(signal?: AbortSignal): Promise<void>;
}

export class BasicAuthProvider implements AuthProvider {
  constructor(
    private username: string,
    private password: string
  ) {}

  kind(): AuthKind {
    return 'basic';
  }

  async applyAuth(headers: Headers): Promise<void> {
    const encoded = Buffer.from(`${this.username}:${this.password}`).toString('base64');
    headers.set('Authorization', `Basic ${encoded}`);
  }

  async refreshAuth(): Promise<void> {}
}

export class BearerAuthProvider implements AuthProvider {
  constructor(private token: string) {}

  kind(): AuthKind {
    return 'bearer';
  }

  async applyAuth(headers: Headers): Promise<void> {
    headers.set('Authorization', `Bearer ${this.token}`);
  }

  async refreshAuth(): Promise<void> {}
}

export interface OAuth2ProviderOptions {
  fetch?: FetchLike;
  logger?: Logger;
  now?: () => number;
  /** Refresh this long before the token expires */
  expiryMarginMs?: number;
  /** Deadline for one token request */
  tokenTimeoutMs?: number;
}

/** Wait for shared work, giving up with CancelledError when this caller's signal aborts. */
function untilAborted<T>(work: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return work;
  if (signal.aborted) return Promise.reject(new CancelledError());
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new CancelledError());
    signal.addEventListener('abort', onAbort, { once: true });
    void work.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

interface TokenResponse {
  accessToken: string;
  expiresIn?: number;
  refreshToken?: string;
}

function parseTokenResponse(text: string): TokenResponse {
  const data: unknown = JSON.parse(text);
  if (typeof data !== 'object' || data === null || !('access_token' in data) || typeof data.access_token !== 'string') {
    throw new Error('response has no access_token');
  }
  const token: TokenResponse = { accessToken: data.access_token };
  if ('expires_in' in data && typeof data.expires_in === 'number') token.expiresIn = data.expires_in;
  if ('refresh_token' in data && typeof data.refresh_token === 'string' && data.refresh_token) {
    token.refreshToken = data.refresh_token;
  }
  return token;
}

/**
 * OAuth2 provider owning its token state. Concurrent callers share one
 * in-flight refresh instead of each requesting a token.
 */
export class OAuth2AuthProvider implements AuthProvider {
  private token = '';
  private expiresAt?: number;
  private refreshToken?: string;
  private inflight?: Promise<void>;
  private fetchFn: FetchLike;
  private logger: Logger;
  private now: () => number;
  private marginMs: number;
  private timeoutMs: number;

  constructor(
    private config: OAuth2AuthDescriptor,
    options: OAuth2ProviderOptions = {}
  ) {
    this.refreshToken = config.refreshToken;
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? Date.now;
    this.marginMs = options.expiryMarginMs ?? 60_000;
    this.timeoutMs = options.tokenTimeoutMs ?? 30_000;
  }

  kind(): AuthKind {
    return 'oauth2';
  }

  get accessToken(): string {
    return this.token;
  }

  private needsRefresh(): boolean {
    if (!this.token) return true;
    return this.expiresAt !== undefined && this.now() >= this.expiresAt - this.marginMs;
  }

  async applyAuth(headers: Headers, signal?: AbortSignal): Promise<void> {
    if (this.needsRefresh()) {
      await this.refreshAuth(signal);
    }
    headers.set('Authorization', `Bearer ${this.token}`);
  }

  /** Callers share one token request; a cancelled caller stops waiting without aborting it for the others. */
  refreshAuth(signal?: AbortSignal): Promise<void> {
    if (!this.inflight) {
      this.inflight = this.requestToken().finally(() => {
        this.inflight = undefined;
      });
    }
    return untilAborted(this.inflight, signal);
  }

  private grantParams(): URLSearchParams {
    const form = new URLSearchParams();
    if (this.refreshToken) {
      form.set('grant_type', 'refresh_token');
      form.set('refresh_token', this.refreshToken);
    } else if (this.config.grantType === 'password') {
      form.set('grant_type', 'password');
      form.set('username', this.config.username ?? '');
      form.set('password', this.config.password ?? '');
    } else if (this.config.grantType === 'client_credentials') {
      form.set('grant_type', 'client_credentials');
    } else {
      throw new AuthenticationError(`Unsupported grant type: ${String(this.config.grantType)}`);
    }

    form.set('client_id', this.config.clientId);
    if (this.config.clientSecret) form.set('client_secret', this.config.clientSecret);
    if (this.config.scopes?.length) form.set('scope', this.config.scopes.join(' '));
    return form;
  }

  private async requestToken(): Promise<void> {
    const request = new Request(this.config.tokenUrl, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/x-www-form-urlencoded',
        Accept: 'application/json',
      },
      body: this.grantParams().toString(),
    });

    let response: Response;
    try {
      response = await this.fetchFn(request, { signal: AbortSignal.timeout(this.timeoutMs) });
    } catch (error) {
      throw new AuthenticationError(`Token request failed: ${errorMessage(error)}`, { cause: error });
    }

    const text = await response.text();
    if (response.status !== 200) {
      throw new AuthenticationError(`Token request failed with status ${response.status}: ${text}`);
    }

    let parsed: TokenResponse;
    try {
      parsed = parseTokenResponse(text);
    } catch (error) {
      throw new AuthenticationError(`Failed to parse token response: ${errorMessage(error)}`, { cause: error });
    }

    this.token = parsed.accessToken;
    if (parsed.refreshToken) this.refreshToken = parsed.refreshToken;
    this.expiresAt = parsed.expiresIn && parsed.expiresIn > 0 ? this.now() + parsed.expiresIn * 1000 : undefined;
    this.logger.debug(`OAuth token refreshed, expires in ${parsed.expiresIn ?? 'unknown'} seconds`);
  }
}

export function createAuthProvider(descriptor: AuthDescriptor, options: OAuth2ProviderOptions = {}): AuthProvider {
  switch (descriptor.type) {
    case 'basic':
      return new BasicAuthProvider(descriptor.username, descriptor.password);
    case 'bearer':
      return new BearerAuthProvider(descriptor.token);
    case 'oauth2':
      return new OAuth2AuthProvider(descriptor, options);
  }
}
