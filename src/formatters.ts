import { diffLines } from 'diff';
import type { BodyDiff, JsonDiff } from './types';

export interface Formatter {
  /** Opaque bodies are stored base64-encoded instead of as text. */
  readonly binary: boolean;
  format(body: Buffer): Buffer;
  compare(expected: Buffer, actual: Buffer): BodyDiff;
}

/** Line diff with "- ", "+ " and "  " prefixes. */
export function textDiff(expected: string, actual: string): string {
  const lines: string[] = [];
  for (const part of diffLines(expected, actual)) {
    const prefix = part.added ? '+ ' : part.removed ? '- ' : '  ';
    const value = part.value.endsWith('\n') ? part.value.slice(0, -1) : part.value;
    for (const line of value.split('\n')) {
      lines.push(prefix + line);
    }
  }
  return lines.join('\n');
}

function normalizeLineEndings(text: string): string {
  return text.replace(/\r\n/g, '\n');
}

function textBodyDiff(contentType: string, expected: Buffer, actual: Buffer): BodyDiff {
  const expectedContent = expected.toString('utf8');
  const actualContent = actual.toString('utf8');
  const diff: BodyDiff = {
    contentType,
    expectedSize: expected.length,
    actualSize: actual.length,
    expectedContent,
    actualContent,
    equal: expected.equals(actual),
  };
  if (!diff.equal) diff.diffContent = textDiff(expectedContent, actualContent);
  return diff;
}

export function jsonTypeName(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function childPath(base: string, key: string): string {
  return base ? `${base}.${key}` : key;
}

function walk(path: string, expected: unknown, actual: unknown, diff: JsonDiff): void {
  const expectedType = jsonTypeName(expected);
  const actualType = jsonTypeName(actual);
  if (expectedType !== actualType) {
    diff.differentTypes[path] = { expectedType, actualType };
    return;
  }

  if (isObject(expected) && isObject(actual)) {
    for (const [key, value] of Object.entries(expected)) {
      const fieldPath = childPath(path, key);
      if (Object.prototype.hasOwnProperty.call(actual, key)) {
        walk(fieldPath, value, actual[key], diff);
      } else {
        diff.missingFields.push(fieldPath);
      }
    }
    for (const key of Object.keys(actual)) {
      if (!Object.prototype.hasOwnProperty.call(expected, key)) {
        diff.extraFields.push(childPath(path, key));
      }
    }
    return;
  }

  if (Array.isArray(expected) && Array.isArray(actual)) {
    if (expected.length !== actual.length) {
      diff.differentValues[path] = {
        expected: `array[${expected.length}]`,
        actual: `array[${actual.length}]`,
      };
    }
    const shorter = Math.min(expected.length, actual.length);
    for (let i = 0; i < shorter; i++) {
      walk(`${path}[${i}]`, expected[i], actual[i], diff);
    }
    return;
  }

  if (expected !== actual) {
    diff.differentValues[path] = { expected, actual };
  }
}

/** Structural diff of two parsed JSON values; paths look like `a.b` and `a[0]`. */
export function compareJson(expected: unknown, actual: unknown): JsonDiff {
  const diff: JsonDiff = {
    missingFields: [],
    extraFields: [],
    differentTypes: {},
    differentValues: {},
    equal: false,
  };
  walk('', expected, actual, diff);
  diff.equal =
    diff.missingFields.length === 0 &&
    diff.extraFields.length === 0 &&
    Object.keys(diff.differentTypes).length === 0 &&
    Object.keys(diff.differentValues).length === 0;
  return diff;
}

function tryParse(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    const value: unknown = JSON.parse(text);
    return { ok: true, value };
  } catch {
    return { ok: false };
  }
}

export class JsonFormatter implements Formatter {
  readonly binary = false;

  format(body: Buffer): Buffer {
    if (body.length === 0) return Buffer.from('{}');
    const text = body.toString('utf8');
    const parsed = tryParse(text);
    if (!parsed.ok) return Buffer.from(normalizeLineEndings(text));
    return Buffer.from(JSON.stringify(parsed.value, null, 2));
  }

  compare(expected: Buffer, actual: Buffer): BodyDiff {
    const diff = textBodyDiff('application/json', expected, actual);
    if (diff.equal) return diff;

    const left = tryParse(diff.expectedContent);
    const right = tryParse(diff.actualContent);
    if (left.ok && right.ok) {
      diff.jsonDiff = compareJson(left.value, right.value);
      diff.equal = diff.jsonDiff.equal;
    }
    return diff;
  }
}

/** Markup is compared as text after line-ending and outer whitespace cleanup. */
export class MarkupFormatter implements Formatter {
  readonly binary = false;

  constructor(private contentType: string) {}

  format(body: Buffer): Buffer {
    return Buffer.from(normalizeLineEndings(body.toString('utf8')).trim());
  }

  compare(expected: Buffer, actual: Buffer): BodyDiff {
    return textBodyDiff(this.contentType, expected, actual);
  }
}

export class TextFormatter implements Formatter {
  readonly binary = false;

  format(body: Buffer): Buffer {
    return Buffer.from(normalizeLineEndings(body.toString('utf8')));
  }

  compare(expected: Buffer, actual: Buffer): BodyDiff {
    return textBodyDiff('text/plain', expected, actual);
  }
}

const SMALL_BINARY_BYTES = 1024;

export class BinaryFormatter implements Formatter {
  readonly binary = true;

  format(body: Buffer): Buffer {
    return body;
  }

  compare(expected: Buffer, actual: Buffer): BodyDiff {
    const diff: BodyDiff = {
      contentType: 'application/octet-stream',
      expectedSize: expected.length,
      actualSize: actual.length,
      expectedContent: `[Binary data, ${expected.length} bytes]`,
      actualContent: `[Binary data, ${actual.length} bytes]`,
      equal: expected.equals(actual),
    };
    if (diff.equal) return diff;

    if (expected.length <= SMALL_BINARY_BYTES && actual.length <= SMALL_BINARY_BYTES) {
      diff.diffContent = textDiff(expected.toString('hex').toUpperCase(), actual.toString('hex').toUpperCase());
    } else {
      diff.diffContent = `Binary content differs (sizes: expected=${expected.length} actual=${actual.length})`;
    }
    return diff;
  }
}

/** Strip parameters and case: `Application/JSON; charset=utf-8` becomes `application/json`. */
export function mediaType(contentType: string): string {
  return contentType.split(';')[0].trim().toLowerCase();
}

/**
 * Picks a formatter by exact media type, then by `type/*`, then falls back
 * to the binary formatter.
 */
export class FormatterRegistry {
  private formatters = new Map<string, Formatter>();
  private fallback: Formatter = new BinaryFormatter();

  constructor(defaults = true) {
    if (!defaults) return;
    const json = new JsonFormatter();
    const text = new TextFormatter();
    this.register('application/json', json);
    this.register('application/xml', new MarkupFormatter('application/xml'));
    this.register('text/xml', new MarkupFormatter('application/xml'));
    this.register('text/html', new MarkupFormatter('text/html'));
    this.register('text/plain', text);
    this.register('text/*', text);
  }

  register(contentType: string, formatter: Formatter): void {
    this.formatters.set(mediaType(contentType), formatter);
  }

  get(contentType: string): Formatter {
    const exact = mediaType(contentType);
    const direct = this.formatters.get(exact);
    if (direct) return direct;
    const [type] = exact.split('/');
    return this.formatters.get(`${type}/*`) ?? this.fallback;
  }
}
