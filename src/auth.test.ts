import { describe, it, expect } from 'vitest';
import {
  BasicAuthProvider,
  BearerAuthProvider,
  OAuth2AuthProvider,
  createAuthProvider,
} from './auth';
import { AuthenticationError, CancelledError } from './errors';
import { fakeFetch, json } from './test-helpers';
import type { OAuth2AuthDescriptor } from './types';

const oauth: OAuth2AuthDescriptor = {
  type: 'oauth2',
  tokenUrl: 'http://auth.test/token',
  clientId: 'test-client',
  clientSecret: 'test-secret',
  scopes: ['read', 'write'],
  grantType: 'client_credentials',
};

describe('BasicAuthProvider', () => {
  it('sets a base64 Authorization header', async () => {
    const headers = new Headers();
    await new BasicAuthProvider('user', 'test-password').applyAuth(headers);
    expect(headers.get('authorization')).toBe(`Basic ${Buffer.from('user:test-password').toString('base64')}`);
  });
});

describe('BearerAuthProvider', () => {
  it('sets the token', async () => {
    const headers = new Headers();
    await new BearerAuthProvider('test-token').applyAuth(headers);
    expect(headers.get('authorization')).toBe('Bearer test-token');
  });
});

describe('OAuth2AuthProvider', () => {
  it('requests a client_credentials token on first use', async () => {
    const forms: URLSearchParams[] = [];
    const fetch = fakeFetch(async (req) => {
      forms.push(new URLSearchParams(await req.text()));
      return json(200, { access_token: 'tok-1', expires_in: 3600 });
    });
    const provider = new OAuth2AuthProvider(oauth, { fetch, now: () => 0 });
    const headers = new Headers();

    await provider.applyAuth(headers);

    expect(headers.get('authorization')).toBe('Bearer tok-1');
    expect(provider.accessToken).toBe('tok-1');
    expect(Object.fromEntries(forms[0])).toEqual({
      grant_type: 'client_credentials',
      client_id: 'test-client',
      client_secret: 'test-secret',
      scope: 'read write',
    });
    expect(fetch.mock.calls[0][0].method).toBe('POST');
    expect(fetch.mock.calls[0][0].url).toBe('http://auth.test/token');
  });

  it('sends the password grant', async () => {
    const forms: URLSearchParams[] = [];
    const fetch = fakeFetch(async (req) => {
      forms.push(new URLSearchParams(await req.text()));
      return json(200, { access_token: 'tok-1' });
    });
    const provider = new OAuth2AuthProvider(
      { ...oauth, grantType: 'password', username: 'alice', password: 'test-password', scopes: undefined },
      { fetch }
    );

    await provider.refreshAuth();

    expect(forms[0].get('grant_type')).toBe('password');
    expect(forms[0].get('username')).toBe('alice');
    expect(forms[0].get('password')).toBe('test-password');
    expect(forms[0].has('scope')).toBe(false);
  });

  it('shares one refresh between concurrent callers', async () => {
    const fetch = fakeFetch(() => json(200, { access_token: 'tok-1', expires_in: 3600 }));
    const provider = new OAuth2AuthProvider(oauth, { fetch, now: () => 0 });
    const a = new Headers();
    const b = new Headers();

    await Promise.all([provider.applyAuth(a), provider.applyAuth(b)]);

    expect(fetch).toHaveBeenCalledTimes(1);
    expect(a.get('authorization')).toBe('Bearer tok-1');
    expect(b.get('authorization')).toBe('Bearer tok-1');
  });

  it('keeps serving the other callers when one cancels during a shared refresh', async () => {
    let release = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const fetch = fakeFetch(async () => {
      await gate;
      return json(200, { access_token: 'tok-1', expires_in: 3600 });
    });
    const provider = new OAuth2AuthProvider(oauth, { fetch, now: () => 0 });
    const controller = new AbortController();
    const headers = new Headers();

    const cancelled = provider.applyAuth(new Headers(), controller.signal);
    const waiting = provider.applyAuth(headers);
    controller.abort();
    release();

    await expect(cancelled).rejects.toBeInstanceOf(CancelledError);
    await waiting;
    expect(fetch).toHaveBeenCalledTimes(1);
    expect(headers.get('authorization')).toBe('Bearer tok-1');
  });

  it('rejects a caller whose signal is already aborted with CancelledError', async () => {
    const fetch = fakeFetch(() => json(200, { access_token: 'tok-1' }));
    const provider = new OAuth2AuthProvider(oauth, { fetch });

    await expect(provider.refreshAuth(AbortSignal.abort())).rejects.toBeInstanceOf(CancelledError);
  });

  it('refreshes inside the expiry margin using the refresh token', async () => {
    let clock = 0;
    const forms: URLSearchParams[] = [];
    const tokens = [
      { access_token: 'tok-1', expires_in: 120, refresh_token: 'refresh-1' },
      { access_token: 'tok-2', expires_in: 120 },
    ];
    const fetch = fakeFetch(async (req) => {
      forms.push(new URLSearchParams(await req.text()));
      return json(200, tokens.shift());
    });
    const provider = new OAuth2AuthProvider(oauth, { fetch, now: () => clock });

    await provider.applyAuth(new Headers());
    clock = 30_000;
    await provider.applyAuth(new Headers());
    expect(fetch).toHaveBeenCalledTimes(1);

    clock = 60_000;
    const headers = new Headers();
    await provider.applyAuth(headers);

    expect(fetch).toHaveBeenCalledTimes(2);
    expect(headers.get('authorization')).toBe('Bearer tok-2');
    expect(forms[1].get('grant_type')).toBe('refresh_token');
    expect(forms[1].get('refresh_token')).toBe('refresh-1');
  });

  it('fails with AuthenticationError on a non-200 status', async () => {
    const fetch = fakeFetch(() => new Response('denied', { status: 401 }));
    const provider = new OAuth2AuthProvider(oauth, { fetch });

    await expect(provider.refreshAuth()).rejects.toThrow(new AuthenticationError('Token request failed with status 401: denied'));
  });

  it('fails with AuthenticationError when the response has no token', async () => {
    const fetch = fakeFetch(() => json(200, { token_type: 'bearer' }));
    const provider = new OAuth2AuthProvider(oauth, { fetch });

    await expect(provider.refreshAuth()).rejects.toBeInstanceOf(AuthenticationError);
    await expect(provider.refreshAuth()).rejects.toThrow('Failed to parse token response: response has no access_token');
  });

  it('fails with AuthenticationError when the token endpoint is unreachable', async () => {
    const fetch = fakeFetch(() => {
      throw new TypeError('fetch failed');
    });
    const provider = new OAuth2AuthProvider(oauth, { fetch });

    await expect(provider.refreshAuth()).rejects.toThrow('Token request failed: fetch failed');
  });
});

describe('createAuthProvider', () => {
  it('picks the provider by kind', () => {
    expect(createAuthProvider({ type: 'basic', username: 'u', password: 'p' }).kind()).toBe('basic');
    expect(createAuthProvider({ type: 'bearer', token: 't' }).kind()).toBe('bearer');
    expect(createAuthProvider(oauth).kind()).toBe('oauth2');
  });
});
