import { mkdir, mkdtemp, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterAll, beforeAll, describe, it, expect } from 'vitest';
import {
  loadCollectionFile,
  loadCollections,
  loadSequenceFile,
  parseDuration,
  parseRequest,
  resolveCollectionPaths,
} from './loader';
import { PluginHost } from './plugin-host';
import { coreLoaderPlugin } from './plugins/core-loader';

const USERS_YAML = `
name: Users
requests:
  - name: list users
    url: "{{base}}/users"
    tags: [users]
    headers:
      Accept: application/json
  - name: create user
    method: post
    url: "{{base}}/users"
    body:
      name: Alice
    auth:
      type: bearer
      token: test-token
    extract:
      - name: id
        path: id
    assertions:
      - type: Equals
        source: STATUS
        value: 201
`;

const SIGNUP_YAML = `
name: signup
tags: [users]
variables:
  attempt: 1
steps:
  - name: create
    request:
      method: POST
      url: "{{base}}/users"
    expectedStatus: 201
    waitBefore: 1s
    waitAfter: 250ms
    extract:
      - name: id
        source: body
        path: id
        required: true
  - name: fetch
    skipCondition: '\${id} == ""'
    request:
      url: "{{base}}/users/\${id}"
`;

describe('parseDuration', () => {
  it('reads numbers and unit strings', () => {
    expect(parseDuration(500)).toBe(500);
    expect(parseDuration('250')).toBe(250);
    expect(parseDuration('500ms')).toBe(500);
    expect(parseDuration('2s')).toBe(2000);
    expect(parseDuration('1.5s')).toBe(1500);
    expect(parseDuration('1m')).toBe(60000);
    expect(parseDuration(undefined)).toBeUndefined();
  });

  it('rejects anything else', () => {
    expect(() => parseDuration('soon')).toThrow('duration: invalid duration "soon"');
    expect(() => parseDuration(-1, 'wait')).toThrow('wait: invalid duration -1');
  });
});

describe('parseRequest', () => {
  it('fills defaults', () => {
    expect(parseRequest({ url: 'http://api.test/health' }, 'req')).toEqual({
      method: 'GET',
      url: 'http://api.test/health',
      headers: [],
    });
  });

  it('accepts headers as a list', () => {
    const parsed = parseRequest({ url: 'http://api.test', headers: [{ name: 'X-A', value: '1' }, { name: 'X-B' }] }, 'req');
    expect(parsed.headers).toEqual([
      { name: 'X-A', value: '1' },
      { name: 'X-B', value: '' },
    ]);
  });

  it('reads OAuth2 settings with a default grant', () => {
    const parsed = parseRequest(
      {
        url: 'http://api.test',
        auth: { type: 'oauth2', tokenUrl: 'http://auth.test/token', clientId: 'test-client', scopes: 'read' },
      },
      'req'
    );
    expect(parsed.auth).toEqual({
      type: 'oauth2',
      grantType: 'client_credentials',
      tokenUrl: 'http://auth.test/token',
      clientId: 'test-client',
      scopes: ['read'],
    });
  });

  it('explains what is wrong and where', () => {
    expect(() => parseRequest({ method: 'GET' }, 'req')).toThrow('req: "url" is required');
    expect(() => parseRequest({ url: 'x', auth: { type: 'digest' } }, 'req')).toThrow('req.auth: unknown auth type "digest"');
    expect(() => parseRequest({ url: 'x', assertions: [{ type: 'near' }] }, 'req')).toThrow(
      'req.assertions[0]: unsupported assertion type "near"'
    );
  });
});

describe('collection and sequence files', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'snaprunner-loader-'));
    await mkdir(path.join(dir, 'users'));
    await writeFile(path.join(dir, 'users', 'users.yaml'), USERS_YAML);
    await writeFile(path.join(dir, 'orders.json'), JSON.stringify([{ name: 'list orders', url: '{{base}}/orders' }]));
    await writeFile(path.join(dir, 'notes.txt'), 'not a collection');
    await writeFile(path.join(dir, 'signup.yaml'), SIGNUP_YAML);
    await writeFile(
      path.join(dir, 'many.json'),
      JSON.stringify({ sequences: [{ name: 'a', steps: [] }, { name: 'b', steps: [] }] })
    );
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('loads a YAML collection named by its relative path', async () => {
    const collection = await loadCollectionFile(path.join(dir, 'users', 'users.yaml'), dir);

    expect(collection.name).toBe('Users');
    expect(collection.path).toBe('users/users.yaml');
    expect(collection.requests[0]).toEqual({
      name: 'list users',
      method: 'GET',
      url: '{{base}}/users',
      headers: [{ name: 'Accept', value: 'application/json' }],
      tags: ['users'],
    });
    expect(collection.requests[1]).toEqual({
      name: 'create user',
      method: 'POST',
      url: '{{base}}/users',
      headers: [],
      body: '{"name":"Alice"}',
      auth: { type: 'bearer', token: 'test-token' },
      extract: [{ name: 'id', source: 'body', path: 'id' }],
      assertions: [{ type: 'equals', source: 'status', value: '201' }],
    });
  });

  it('loads a JSON list collection named after the file', async () => {
    const collection = await loadCollectionFile(path.join(dir, 'orders.json'), dir);
    expect(collection).toEqual({
      name: 'orders',
      path: 'orders.json',
      requests: [{ name: 'list orders', method: 'GET', url: '{{base}}/orders', headers: [] }],
    });
  });

  it('loads sequences with durations', async () => {
    const [signup] = await loadSequenceFile(path.join(dir, 'signup.yaml'));

    expect(signup.name).toBe('signup');
    expect(signup.variables).toEqual({ attempt: '1' });
    expect(signup.tags).toEqual(['users']);
    expect(signup.steps[0]).toMatchObject({
      name: 'create',
      expectedStatus: 201,
      waitBeforeMs: 1000,
      waitAfterMs: 250,
      extract: [{ name: 'id', source: 'body', path: 'id', required: true }],
    });
    expect(signup.steps[0].request.method).toBe('POST');
    expect(signup.steps[1].skipCondition).toBe('${id} == ""');
    expect(signup.steps[1].request.url).toBe('{{base}}/users/${id}');
  });

  it('loads several sequences from one file', async () => {
    const sequences = await loadSequenceFile(path.join(dir, 'many.json'));
    expect(sequences.map((s) => s.name)).toEqual(['a', 'b']);
  });

  it('finds collection files in a directory', async () => {
    expect(await resolveCollectionPaths(dir)).toEqual([
      path.join(dir, 'many.json'),
      path.join(dir, 'orders.json'),
      path.join(dir, 'signup.yaml'),
    ]);
  });

  it('loads through the loader plugin and skips unknown files', async () => {
    const host = new PluginHost([coreLoaderPlugin(dir)]);
    const collections = await loadCollections(
      [path.join(dir, 'orders.json'), path.join(dir, 'notes.txt'), path.join(dir, 'users', 'users.yaml')],
      host
    );
    expect(collections.map((c) => c.path)).toEqual(['orders.json', 'users/users.yaml']);
  });
});
