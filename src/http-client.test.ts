import { describe, it, expect, vi } from 'vitest';
import { CancelledError, RequestConstructionError } from './errors';
import { HttpExecutor } from './http-client';
import type { Logger } from './logger';
import { PluginHost } from './plugin-host';
import { fakeFetch, json, noSleep, request } from './test-helpers';
import { VariableStore } from './variables';

describe('HttpExecutor', () => {
  it('substitutes variables, with call variables winning over the store', async () => {
    const fetch = fakeFetch(() => json(200, { ok: true }));
    const executor = new HttpExecutor({ fetch, variables: new VariableStore({ base: 'http://api.test', id: '1' }) });

    const res = await executor.execute(
      request({
        method: 'post',
        url: '{{base}}/users/{{id}}',
        headers: [{ name: 'X-Id', value: '${id}' }],
        body: '{"id":"{{id}}"}',
      }),
      { id: '2' }
    );

    const sent = fetch.mock.calls[0][0];
    expect(sent.method).toBe('POST');
    expect(sent.url).toBe('http://api.test/users/2');
    expect(sent.headers.get('x-id')).toBe('2');
    expect(await sent.text()).toBe('{"id":"2"}');
    expect(res.request.url).toBe('http://api.test/users/2');
    expect(res.statusCode).toBe(200);
    expect(res.contentType).toBe('application/json');
    expect(res.headers['content-type']).toEqual(['application/json']);
    expect(res.body.toString()).toBe('{"ok":true}');
    expect(res.attempts).toBe(1);
  });

  it('measures duration and numbers requests', async () => {
    let clock = 1000;
    const fetch = fakeFetch(() => {
      clock += 25;
      return json(200, {});
    });
    const executor = new HttpExecutor({ fetch, now: () => clock });

    const res = await executor.execute(request());

    expect(res.durationMs).toBe(25);
    expect(res.timestamp).toEqual(new Date(1000));
    expect(res.requestId).toBe('req-1025-1');
  });

  it('defaults the content type of an untyped body', async () => {
    const fetch = fakeFetch(() => new Response(new Uint8Array([1, 2, 3])));
    const executor = new HttpExecutor({ fetch });

    const res = await executor.execute(request());

    expect(res.contentType).toBe('application/octet-stream');
    expect(res.contentLength).toBe(3);
  });

  it('keeps session cookies per host', async () => {
    const fetch = fakeFetch((req) =>
      req.url.endsWith('/login')
        ? new Response('ok', { headers: { 'set-cookie': 'session=abc; Path=/; HttpOnly' } })
        : json(200, {})
    );
    const executor = new HttpExecutor({ fetch });

    const login = await executor.execute(request({ url: 'http://api.test/login' }));
    await executor.execute(request({ url: 'http://api.test/me' }));
    await executor.execute(request({ url: 'http://other.test/me' }));

    expect(login.headers['set-cookie']).toEqual(['session=abc; Path=/; HttpOnly']);
    expect(fetch.mock.calls[1][0].headers.get('cookie')).toBe('session=abc');
    expect(fetch.mock.calls[2][0].headers.get('cookie')).toBeNull();
    expect(executor.sessions.getCookies('api.test')).toEqual([{ name: 'session', value: 'abc', path: '/', httpOnly: true }]);
  });

  it('leaves an explicit Cookie header alone', async () => {
    const fetch = fakeFetch(() => json(200, {}));
    const executor = new HttpExecutor({ fetch });
    executor.sessions.setCookie('api.test', { name: 'session', value: 'abc' });

    await executor.execute(request({ headers: [{ name: 'Cookie', value: 'manual=1' }] }));

    expect(fetch.mock.calls[0][0].headers.get('cookie')).toBe('manual=1');
  });

  it('applies auth and reuses the OAuth2 token', async () => {
    const fetch = fakeFetch((req) =>
      req.url === 'http://auth.test/token' ? json(200, { access_token: 'tok-1', expires_in: 3600 }) : json(200, {})
    );
    const executor = new HttpExecutor({ fetch, now: () => 0 });
    const auth = {
      type: 'oauth2' as const,
      tokenUrl: 'http://auth.test/token',
      clientId: 'test-client',
      grantType: 'client_credentials' as const,
    };

    await executor.execute(request({ auth }));
    await executor.execute(request({ auth }));
    await executor.execute(request({ auth: { type: 'bearer', token: 'test-token' } }));

    const urls = fetch.mock.calls.map(([req]) => req.url);
    expect(urls).toEqual([
      'http://auth.test/token',
      'http://api.test/users',
      'http://api.test/users',
      'http://api.test/users',
    ]);
    expect(fetch.mock.calls[1][0].headers.get('authorization')).toBe('Bearer tok-1');
    expect(fetch.mock.calls[3][0].headers.get('authorization')).toBe('Bearer test-token');
  });

  it('passes the outbound request through onFetch plugins', async () => {
    const fetch = fakeFetch(() => json(200, {}));
    const pluginHost = new PluginHost([
      {
        name: 'trace',
        setup(ctx) {
          ctx.onFetch((req) => {
            const headers = new Headers(req.headers);
            headers.set('x-trace', 't-1');
            return new Request(req, { headers });
          });
        },
      },
    ]);
    await pluginHost.setup();
    const executor = new HttpExecutor({ fetch, pluginHost });

    await executor.execute(request());

    expect(fetch.mock.calls[0][0].headers.get('x-trace')).toBe('t-1');
  });

  it('retries through the transport', async () => {
    const statuses = [500, 200];
    const fetch = fakeFetch(() => json(statuses.shift() ?? 200, {}));
    const executor = new HttpExecutor({ fetch, sleep: noSleep });

    const res = await executor.execute(request());

    expect(res.statusCode).toBe(200);
    expect(res.attempts).toBe(2);
  });

  it('rejects a malformed URL without sending', async () => {
    const fetch = fakeFetch(() => json(200, {}));
    const executor = new HttpExecutor({ fetch });

    await expect(executor.execute(request({ url: 'not a url' }))).rejects.toBeInstanceOf(RequestConstructionError);
    expect(fetch).not.toHaveBeenCalled();
  });

  it('refuses to start once the run is cancelled', async () => {
    const controller = new AbortController();
    controller.abort();
    const fetch = fakeFetch(() => json(200, {}));
    const executor = new HttpExecutor({ fetch, signal: controller.signal });

    await expect(executor.execute(request())).rejects.toBeInstanceOf(CancelledError);
  });

  describe('executeBatch', () => {
    it('skips failed requests and logs them', async () => {
      const fetch = fakeFetch(() => json(200, {}));
      const logger: Logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
      const executor = new HttpExecutor({ fetch, logger });

      const responses = await executor.executeBatch([
        request({ url: 'http://api.test/a' }),
        request({ url: 'not a url' }),
        request({ url: 'http://api.test/b' }),
      ]);

      expect(responses.map((r) => r.request.url)).toEqual(['http://api.test/a', 'http://api.test/b']);
      expect(logger.error).toHaveBeenCalledWith('GET not a url failed: Invalid URL "not a url"');
    });

    it('stops on cancellation', async () => {
      const controller = new AbortController();
      controller.abort();
      const executor = new HttpExecutor({ fetch: fakeFetch(() => json(200, {})) });

      await expect(executor.executeBatch([request()], {}, { signal: controller.signal })).rejects.toBeInstanceOf(
        CancelledError
      );
    });
  });
});
