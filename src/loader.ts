import { readdir, readFile } from 'fs/promises';
import path from 'path';
import { load as parseYaml } from 'js-yaml';
import type { PluginHost } from './plugin-host';
import type {
  ApiRequest,
  Assertion,
  AssertionKind,
  AssertionSource,
  AuthDescriptor,
  HttpHeader,
  OperationDescriptor,
  RequestCollection,
  SequenceStep,
  TestSequence,
  VariableExtraction,
} from './types';

type Data = Record<string, unknown>;

const ASSERTION_KINDS: readonly AssertionKind[] = [
  'equals',
  'contains',
  'matches',
  'exists',
  'notExists',
  'in',
  'lessThan',
  'lt',
  'greaterThan',
  'gt',
  'null',
];
const ASSERTION_SOURCES: readonly AssertionSource[] = ['body', 'header', 'status', 'contentType'];

function isRecord(value: unknown): value is Data {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function fail(where: string, message: string): never {
  throw new Error(`${where}: ${message}`);
}

function str(data: Data, key: string, where: string): string | undefined {
  const value = data[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return fail(where, `"${key}" must be a string`);
}

function requiredStr(data: Data, key: string, where: string): string {
  return str(data, key, where) ?? fail(where, `"${key}" is required`);
}

function bool(data: Data, key: string): boolean | undefined {
  const value = data[key];
  return typeof value === 'boolean' ? value : undefined;
}

function strList(data: Data, key: string, where: string): string[] | undefined {
  const value = data[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value === 'string') return [value];
  if (!Array.isArray(value)) return fail(where, `"${key}" must be a list`);
  return value.map(String);
}

function strMap(data: Data, key: string, where: string): Record<string, string> | undefined {
  const value = data[key];
  if (value === undefined || value === null) return undefined;
  if (!isRecord(value)) return fail(where, `"${key}" must be a mapping`);
  return Object.fromEntries(Object.entries(value).map(([k, v]) => [k, String(v)]));
}

function records(value: unknown, where: string): Data[] {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) return fail(where, 'expected a list');
  return value.map((item, i) => (isRecord(item) ? item : fail(`${where}[${i}]`, 'expected a mapping')));
}

/** Milliseconds from a number or a string such as "500ms", "2s" or "1m". */
export function parseDuration(value: unknown, where = 'duration'): number | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value === 'number' && Number.isFinite(value) && value >= 0) return value;
  if (typeof value === 'string') {
    const match = /^(\d+(?:\.\d+)?)\s*(ms|s|m)?$/.exec(value.trim());
    if (match) {
      const n = Number(match[1]);
      const unit = match[2] ?? 'ms';
      return unit === 'm' ? n * 60_000 : unit === 's' ? n * 1000 : n;
    }
  }
  return fail(where, `invalid duration ${JSON.stringify(value)}`);
}

function parseHeaders(value: unknown, where: string): HttpHeader[] {
  if (value === undefined || value === null) return [];
  if (isRecord(value)) {
    return Object.entries(value).map(([name, v]) => ({ name, value: String(v) }));
  }
  return records(value, where).map((h, i) => ({
    name: requiredStr(h, 'name', `${where}[${i}]`),
    value: str(h, 'value', `${where}[${i}]`) ?? '',
  }));
}

function parseAuth(value: unknown, where: string): AuthDescriptor | undefined {
  if (value === undefined || value === null) return undefined;
  if (!isRecord(value)) return fail(where, 'auth must be a mapping');
  const type = requiredStr(value, 'type', where);
  switch (type) {
    case 'basic':
      return {
        type,
        username: requiredStr(value, 'username', where),
        password: str(value, 'password', where) ?? '',
      };
    case 'bearer':
      return { type, token: requiredStr(value, 'token', where) };
    case 'oauth2': {
      const grantType = str(value, 'grantType', where) ?? 'client_credentials';
      if (grantType !== 'password' && grantType !== 'client_credentials') {
        return fail(where, `unsupported grant type "${grantType}"`);
      }
      return {
        type,
        grantType,
        tokenUrl: requiredStr(value, 'tokenUrl', where),
        clientId: requiredStr(value, 'clientId', where),
        clientSecret: str(value, 'clientSecret', where),
        username: str(value, 'username', where),
        password: str(value, 'password', where),
        scopes: strList(value, 'scopes', where),
        refreshToken: str(value, 'refreshToken', where),
      };
    }
    default:
      return fail(where, `unknown auth type "${type}"`);
  }
}

function parseOperation(value: unknown, where: string): OperationDescriptor | undefined {
  if (value === undefined || value === null) return undefined;
  if (!isRecord(value)) return fail(where, 'operation must be a mapping');
  const responses: NonNullable<OperationDescriptor['responses']> = {};
  const raw = value.responses;
  if (raw !== undefined) {
    if (!isRecord(raw)) return fail(where, '"responses" must be a mapping');
    for (const [status, entry] of Object.entries(raw)) {
      if (!isRecord(entry)) return fail(where, `response "${status}" must be a mapping`);
      const schema = entry.schema;
      if (schema !== undefined && !isRecord(schema)) return fail(where, `schema for "${status}" must be a mapping`);
      responses[status] = { schema };
    }
  }
  return {
    method: requiredStr(value, 'method', where),
    path: requiredStr(value, 'path', where),
    operationId: str(value, 'operationId', where),
    responses,
  };
}

export function parseExtractions(value: unknown, where: string): VariableExtraction[] {
  return records(value, where).map((e, i) => {
    const at = `${where}[${i}]`;
    const source = str(e, 'source', at) ?? 'body';
    if (source !== 'body' && source !== 'header' && source !== 'status') {
      return fail(at, `unsupported extraction source "${source}"`);
    }
    return {
      name: requiredStr(e, 'name', at),
      source,
      path: str(e, 'path', at),
      regexp: str(e, 'regexp', at),
      default: str(e, 'default', at),
      required: bool(e, 'required'),
    };
  });
}

export function parseAssertions(value: unknown, where: string): Assertion[] {
  return records(value, where).map((a, i) => {
    const at = `${where}[${i}]`;
    const type = requiredStr(a, 'type', at);
    const kind = ASSERTION_KINDS.find((k) => k.toLowerCase() === type.toLowerCase());
    if (!kind) return fail(at, `unsupported assertion type "${type}"`);
    const sourceName = str(a, 'source', at) ?? 'body';
    const source = ASSERTION_SOURCES.find((s) => s.toLowerCase() === sourceName.toLowerCase());
    if (!source) return fail(at, `unsupported assertion source "${sourceName}"`);
    return {
      type: kind,
      source,
      path: str(a, 'path', at),
      value: str(a, 'value', at),
      values: strList(a, 'values', at),
      not: bool(a, 'not'),
      ignoreCase: bool(a, 'ignoreCase'),
    };
  });
}

export function parseRequest(data: Data, where: string): ApiRequest {
  const rawBody = data.body;
  const body =
    rawBody === undefined || rawBody === null
      ? undefined
      : typeof rawBody === 'string'
        ? rawBody
        : JSON.stringify(rawBody);
  return {
    name: str(data, 'name', where),
    method: (str(data, 'method', where) ?? 'GET').toUpperCase(),
    url: requiredStr(data, 'url', where),
    headers: parseHeaders(data.headers, `${where}.headers`),
    body,
    auth: parseAuth(data.auth, `${where}.auth`),
    tags: strList(data, 'tags', where),
    path: str(data, 'path', where),
    operation: parseOperation(data.operation, `${where}.operation`),
    extract: data.extract === undefined ? undefined : parseExtractions(data.extract, `${where}.extract`),
    assertions: data.assertions === undefined ? undefined : parseAssertions(data.assertions, `${where}.assertions`),
  };
}

function parseStep(data: Data, where: string): SequenceStep {
  const request = data.request;
  if (!isRecord(request)) return fail(where, '"request" must be a mapping');
  const expected = data.expectedStatus;
  if (expected !== undefined && typeof expected !== 'number') return fail(where, '"expectedStatus" must be a number');
  return {
    name: requiredStr(data, 'name', where),
    description: str(data, 'description', where),
    request: parseRequest(request, `${where}.request`),
    expectedStatus: expected,
    extract: data.extract === undefined ? undefined : parseExtractions(data.extract, `${where}.extract`),
    waitBeforeMs: parseDuration(data.waitBefore, `${where}.waitBefore`),
    waitAfterMs: parseDuration(data.waitAfter, `${where}.waitAfter`),
    skip: bool(data, 'skip'),
    skipCondition: str(data, 'skipCondition', where),
    stopOnFail: bool(data, 'stopOnFail'),
    schemaValidate: bool(data, 'schemaValidate'),
    assertions: data.assertions === undefined ? undefined : parseAssertions(data.assertions, `${where}.assertions`),
  };
}

export function parseSequence(data: Data, where: string, filePath?: string): TestSequence {
  return {
    name: requiredStr(data, 'name', where),
    description: str(data, 'description', where),
    steps: records(data.steps, `${where}.steps`).map((s, i) => parseStep(s, `${where}.steps[${i}]`)),
    variables: strMap(data, 'variables', where),
    tags: strList(data, 'tags', where),
    metadata: strMap(data, 'metadata', where),
    filePath,
  };
}

async function readDocument(filePath: string): Promise<unknown> {
  const raw = await readFile(filePath, 'utf8');
  if (filePath.endsWith('.json')) return JSON.parse(raw);
  if (filePath.endsWith('.yaml') || filePath.endsWith('.yml')) return parseYaml(raw);
  throw new Error(`Unsupported file type: ${filePath}`);
}

function collectionIdentity(filePath: string, baseDir: string): string {
  return path.relative(baseDir, filePath).split(path.sep).join('/');
}

/**
 * A collection file is either a list of requests or `{ name, requests }`.
 * Its identity is the path relative to `baseDir`.
 */
export async function loadCollectionFile(filePath: string, baseDir: string = process.cwd()): Promise<RequestCollection> {
  const data = await readDocument(filePath);
  const identity = collectionIdentity(path.resolve(filePath), path.resolve(baseDir));
  let name = path.parse(filePath).name;
  let list: unknown = data;
  if (isRecord(data)) {
    if (typeof data.name === 'string') name = data.name;
    list = data.requests;
  }
  const requests = records(list, `${identity} requests`).map((r, i) => parseRequest(r, `${identity} requests[${i}]`));
  return { name, path: identity, requests };
}

/** A sequence file holds one sequence, a list of them, or `{ sequences: [...] }`. */
export async function loadSequenceFile(filePath: string): Promise<TestSequence[]> {
  const data = await readDocument(filePath);
  if (isRecord(data) && !Array.isArray(data.sequences)) {
    return [parseSequence(data, filePath, filePath)];
  }
  const list = isRecord(data) ? data.sequences : data;
  return records(list, filePath).map((s, i) => parseSequence(s, `${filePath}[${i}]`, filePath));
}

export async function resolveCollectionPaths(dir: string, pattern = /\.(json|ya?ml)$/): Promise<string[]> {
  const files = await readdir(dir);
  return files
    .filter((f) => pattern.test(f))
    .sort()
    .map((f) => path.join(dir, f));
}

export async function loadCollections(paths: string[], pluginHost: PluginHost): Promise<RequestCollection[]> {
  await pluginHost.setup();
  const collections: RequestCollection[] = [];
  for (const p of paths) {
    const collection = await pluginHost.loadCollection(p);
    if (collection) collections.push(collection);
  }
  return collections;
}
