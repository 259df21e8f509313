import { describe, it, expect, vi } from 'vitest';
import { PluginHost } from './plugin-host';
import { coreFilterPlugin, filterCollections, matchesFilter, sequenceMatchesFilter } from './plugins/core-filter';
import { request } from './test-helpers';
import type { RequestCollection } from './types';

const collections: RequestCollection[] = [
  {
    name: 'users',
    path: 'users.json',
    requests: [
      request({ name: 'list users', path: '/users', tags: ['Users', 'smoke'] }),
      request({ name: 'create user', method: 'POST', path: '/users', tags: ['users'] }),
    ],
  },
  {
    name: 'orders',
    path: 'orders.json',
    requests: [request({ name: 'list orders', url: 'http://api.test/orders', tags: ['orders'] })],
  },
];

describe('PluginHost', () => {
  it('runs setup once', async () => {
    const setup = vi.fn();
    const host = new PluginHost([{ name: 'once', setup }]);
    await Promise.all([host.setup(), host.setup()]);
    expect(setup).toHaveBeenCalledTimes(1);
    expect(setup).toHaveBeenCalledWith(host.context);
  });

  it('dispatches events to listeners in registration order', async () => {
    const calls: string[] = [];
    const host = new PluginHost([
      { name: 'a', setup: (ctx) => ctx.onRunStart((total) => void calls.push(`a:${total}`)) },
      {
        name: 'b',
        setup: (ctx) =>
          ctx.onRunStart(async (total) => {
            calls.push(`b:${total}`);
          }),
      },
    ]);
    await host.setup();
    await host.dispatch('onRunStart', 4);
    expect(calls).toEqual(['a:4', 'b:4']);
  });

  it('chains request transforms', async () => {
    const host = new PluginHost([
      {
        name: 'rewrite',
        setup(ctx) {
          ctx.onFetch((req) => new Request(req.url.replace('api.test', 'staging.test'), { method: req.method, headers: req.headers }));
          ctx.onFetch((req) => new Request(`${req.url}?trace=1`, { method: req.method, headers: req.headers }));
        },
      },
    ]);
    await host.setup();
    const out = await host.transformRequest(new Request('http://api.test/users'));
    expect(out.url).toBe('http://staging.test/users?trace=1');
  });

  it('returns null when no loader claims a file', async () => {
    const host = new PluginHost();
    await host.setup();
    expect(await host.loadCollection('notes.txt')).toBeNull();
  });

  it('prepares collections through onPrepare plugins', async () => {
    const host = new PluginHost([coreFilterPlugin({ tags: ['orders'] })]);
    await host.setup();
    const prepared = await host.prepareCollections(collections);
    expect(prepared.map((c) => c.name)).toEqual(['orders']);
  });
});

describe('filters', () => {
  it('matches tags and methods case-insensitively', () => {
    expect(matchesFilter(collections[0].requests[0], { tags: ['users'] })).toBe(true);
    expect(matchesFilter(collections[0].requests[1], { methods: ['post'] })).toBe(true);
    expect(matchesFilter(collections[0].requests[0], { methods: ['post'] })).toBe(false);
  });

  it('matches paths and names by substring', () => {
    expect(matchesFilter(collections[1].requests[0], { paths: ['/orders'] })).toBe(true);
    expect(matchesFilter(collections[0].requests[0], { names: ['create'] })).toBe(false);
  });

  it('drops collections left empty', () => {
    expect(filterCollections(collections, { names: ['create'] })).toEqual([
      { name: 'users', path: 'users.json', requests: [collections[0].requests[1]] },
    ]);
  });

  it('matches sequences on tags, names and metadata', () => {
    const sequence = { name: 'checkout flow', steps: [], tags: ['orders'], metadata: { team: 'payments' } };
    expect(sequenceMatchesFilter(sequence, { tags: ['ORDERS'], names: ['checkout'] })).toBe(true);
    expect(sequenceMatchesFilter(sequence, { metadata: { team: 'payments' } })).toBe(true);
    expect(sequenceMatchesFilter(sequence, { metadata: { team: 'search' } })).toBe(false);
  });
});
