import { VariableExtractionError, errorMessage } from './errors';
import type { Persistence } from './persistence';
import type { ApiResponse, VariableExtraction } from './types';
import type { VariableMap } from './variables';

type PathStep = { key: string } | { index: number };

/** Split `data.items[0].id` into property and index steps. A leading `$.` is allowed. */
export function parseJsonPath(path: string): PathStep[] {
  const steps: PathStep[] = [];
  const trimmed = path.replace(/^\$\.?/, '').replace(/^\.+|\.+$/g, '');
  if (!trimmed) return steps;

  for (const segment of trimmed.split('.')) {
    const match = /^([^[\]]*)((?:\[\d+\])*)$/.exec(segment);
    if (!match) throw new Error(`invalid path segment: ${segment}`);
    const [, key, indexes] = match;
    if (key) steps.push({ key });
    for (const idx of indexes.matchAll(/\[(\d+)\]/g)) {
      steps.push({ index: Number(idx[1]) });
    }
  }
  return steps;
}

/** Walk a parsed JSON value. Throws when a step cannot be followed. */
export function resolveJsonPath(data: unknown, path: string): unknown {
  let current = data;
  for (const step of parseJsonPath(path)) {
    if ('key' in step) {
      if (typeof current !== 'object' || current === null || Array.isArray(current)) {
        throw new Error(`expected object at "${step.key}"`);
      }
      if (!Object.prototype.hasOwnProperty.call(current, step.key)) {
        throw new Error(`property not found: ${step.key}`);
      }
      current = Object.getOwnPropertyDescriptor(current, step.key)?.value;
    } else {
      if (!Array.isArray(current)) throw new Error(`expected array at [${step.index}]`);
      if (step.index >= current.length) throw new Error(`array index out of bounds: ${step.index}`);
      current = current[step.index];
    }
  }
  return current;
}

/** Strings stay as is, `null` becomes "null", objects and arrays become JSON text. */
export function stringifyJsonValue(value: unknown): string {
  if (typeof value === 'string') return value;
  if (value === null || value === undefined) return 'null';
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return JSON.stringify(value);
}

/** First capture group when the pattern has one, else the whole match. */
export function matchPattern(input: string, pattern: string): string {
  let re: RegExp;
  try {
    re = new RegExp(pattern);
  } catch (error) {
    throw new Error(`invalid regular expression: ${errorMessage(error)}`);
  }
  const match = re.exec(input);
  if (!match) throw new Error(`no match found for pattern: ${pattern}`);
  return match.length > 1 && match[1] !== undefined ? match[1] : match[0];
}

export function headerValue(response: ApiResponse, name: string): string | undefined {
  const key = name.toLowerCase();
  for (const [header, values] of Object.entries(response.headers)) {
    if (header.toLowerCase() === key) return values[0];
  }
  return undefined;
}

function extractFromBody(response: ApiResponse, extraction: VariableExtraction): string {
  const body = response.body.toString('utf8');
  if (extraction.path) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(body);
    } catch (error) {
      throw new Error(`failed to parse JSON: ${errorMessage(error)}`);
    }
    return stringifyJsonValue(resolveJsonPath(parsed, extraction.path));
  }
  if (extraction.regexp) return matchPattern(body, extraction.regexp);
  return body;
}

function extractFromHeader(response: ApiResponse, extraction: VariableExtraction): string {
  if (!extraction.path) throw new Error('header name (path) is required for header extraction');
  const value = headerValue(response, extraction.path);
  if (value === undefined) throw new Error(`header not found: ${extraction.path}`);
  return extraction.regexp ? matchPattern(value, extraction.regexp) : value;
}

export function extractValue(response: ApiResponse, extraction: VariableExtraction): string {
  switch (extraction.source) {
    case 'body':
      return extractFromBody(response, extraction);
    case 'header':
      return extractFromHeader(response, extraction);
    case 'status':
      return String(response.statusCode);
    default:
      throw new Error(`unsupported extraction source: ${String(extraction.source)}`);
  }
}

/**
 * Apply every rule. A required rule that fails throws; an optional one
 * falls back to its default or is left out.
 */
export function extractVariables(response: ApiResponse, extractions: readonly VariableExtraction[]): VariableMap {
  const result: VariableMap = {};
  for (const extraction of extractions) {
    try {
      result[extraction.name] = extractValue(response, extraction);
    } catch (error) {
      if (extraction.required) {
        throw new VariableExtractionError(extraction.name, errorMessage(error), { cause: error });
      }
      if (extraction.default !== undefined && extraction.default !== '') {
        result[extraction.name] = extraction.default;
      }
    }
  }
  return result;
}

export async function saveVariables(persistence: Persistence, path: string, variables: VariableMap): Promise<void> {
  await persistence.write(path, `${JSON.stringify(variables, null, 2)}\n`);
}

export async function loadVariables(persistence: Persistence, path: string): Promise<VariableMap> {
  const data: unknown = JSON.parse((await persistence.read(path)).toString('utf8'));
  if (typeof data !== 'object' || data === null || Array.isArray(data)) {
    throw new Error(`Variables file ${path} must contain an object`);
  }
  return Object.fromEntries(Object.entries(data).map(([k, v]) => [k, stringifyJsonValue(v)]));
}
