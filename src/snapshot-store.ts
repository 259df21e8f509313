import path from 'path';
import { SnapshotCorruptError, SnapshotMissingError } from './errors';
import { FormatterRegistry } from './formatters';
import { silentLogger, type Logger } from './logger';
import { isMissingFileError, normalizeKey, type Persistence } from './persistence';
import type {
  ApiRequest,
  ApiResponse,
  HeaderDiff,
  SnapshotDiff,
  SnapshotFile,
  SnapshotMetadata,
  SnapshotResult,
  SnapshotStats,
  UpdateMode,
} from './types';

export const SNAPSHOT_SUFFIX = '.snap.json';
const MAX_NAME_LENGTH = 100;

export interface SnapshotStoreOptions {
  persistence: Persistence;
  snapshotDir?: string;
  ignoredHeaders?: string[];
  formatters?: FormatterRegistry;
  logger?: Logger;
  now?: () => Date;
}

export interface SnapshotTestOptions {
  updateMode: UpdateMode;
  failOnMissing?: boolean;
  /** Request the path is derived from; defaults to the response's own request */
  template?: ApiRequest;
}

/** Non-alphanumerics become `_`, lower-cased, capped at 100 characters. */
export function sanitizeName(value: string): string {
  return value.replace(/[^a-zA-Z0-9]/g, '_').toLowerCase().slice(0, MAX_NAME_LENGTH);
}

/** The path part of a request URL: scheme, host and query removed. */
export function requestPathOf(request: ApiRequest): string {
  if (request.path) return request.path;
  let url = request.url;
  const scheme = /^https?:\/\//i.exec(url);
  if (scheme) {
    url = url.slice(scheme[0].length);
    const slash = url.indexOf('/');
    url = slash >= 0 ? url.slice(slash) : '';
  }
  const query = url.search(/[?#]/);
  return query >= 0 ? url.slice(0, query) : url;
}

function collectionStem(collectionPath: string): string {
  const key = normalizeKey(collectionPath);
  const ext = path.posix.extname(key);
  return ext ? key.slice(0, -ext.length) : key;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isHeaderMap(value: unknown): value is Record<string, string[]> {
  return isRecord(value) && Object.values(value).every((v) => Array.isArray(v) && v.every((s) => typeof s === 'string'));
}

function parseSnapshotFile(snapshotPath: string, raw: string): SnapshotFile {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new SnapshotCorruptError(snapshotPath, 'invalid JSON', { cause: error });
  }
  if (!isRecord(data) || typeof data.content !== 'string' || !isRecord(data.metadata)) {
    throw new SnapshotCorruptError(snapshotPath, 'expected { metadata, content }');
  }
  const { requestPath, requestMethod, contentType, statusCode, headers, createdAt, encoding } = data.metadata;
  if (
    typeof requestPath !== 'string' ||
    typeof requestMethod !== 'string' ||
    typeof contentType !== 'string' ||
    typeof statusCode !== 'number' ||
    typeof createdAt !== 'string' ||
    !isHeaderMap(headers) ||
    (encoding !== undefined && encoding !== 'base64')
  ) {
    throw new SnapshotCorruptError(snapshotPath, 'metadata is incomplete');
  }
  const metadata: SnapshotMetadata = { requestPath, requestMethod, contentType, statusCode, headers, createdAt };
  if (encoding === 'base64') metadata.encoding = 'base64';
  return { metadata, content: data.content };
}

function normalizeHeaders(headers: Record<string, string[]>, ignored: Set<string>): Map<string, string[]> {
  const map = new Map<string, string[]>();
  for (const [name, values] of Object.entries(headers)) {
    const key = name.toLowerCase();
    if (ignored.has(key)) continue;
    map.set(key, [...(map.get(key) ?? []), ...values]);
  }
  for (const [key, values] of map) map.set(key, [...values].sort());
  return map;
}

export function diffHeaders(
  expected: Record<string, string[]>,
  actual: Record<string, string[]>,
  ignoredHeaders: readonly string[] = []
): HeaderDiff {
  const ignored = new Set(ignoredHeaders.map((h) => h.toLowerCase()));
  const left = normalizeHeaders(expected, ignored);
  const right = normalizeHeaders(actual, ignored);
  const diff: HeaderDiff = { missingHeaders: {}, extraHeaders: {}, differentValues: {}, equal: true };

  for (const [name, values] of left) {
    const other = right.get(name);
    if (!other) {
      diff.missingHeaders[name] = values;
    } else if (values.length !== other.length || values.some((v, i) => v !== other[i])) {
      diff.differentValues[name] = { expected: values, actual: other };
    }
  }
  for (const [name, values] of right) {
    if (!left.has(name)) diff.extraHeaders[name] = values;
  }

  diff.equal =
    Object.keys(diff.missingHeaders).length === 0 &&
    Object.keys(diff.extraHeaders).length === 0 &&
    Object.keys(diff.differentValues).length === 0;
  return diff;
}

/**
 * Stores responses as `{ metadata, content }` JSON files and diffs new
 * responses against them.
 */
export class SnapshotStore {
  readonly snapshotDir: string;
  private persistence: Persistence;
  private ignoredHeaders: string[];
  private formatters: FormatterRegistry;
  private logger: Logger;
  private now: () => Date;
  private used = new Set<string>();
  private stats: SnapshotStats;

  constructor(options: SnapshotStoreOptions) {
    this.persistence = options.persistence;
    this.snapshotDir = options.snapshotDir ?? '__snapshots__';
    this.ignoredHeaders = options.ignoredHeaders ?? [];
    this.formatters = options.formatters ?? new FormatterRegistry();
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());
    this.stats = this.freshStats();
  }

  private freshStats(): SnapshotStats {
    return { total: 0, passed: 0, failed: 0, created: 0, updated: 0, errors: 0, startTime: this.now() };
  }

  /** `<snapshotDir>/<collection without extension>/<sanitized request path>_<method>.snap.json` */
  snapshotPath(collectionPath: string, request: ApiRequest): string {
    const stem = collectionStem(collectionPath);
    const id = requestPathOf(request) || path.posix.basename(stem);
    const file = `${sanitizeName(id)}_${request.method.toLowerCase()}${SNAPSHOT_SUFFIX}`;
    return normalizeKey(path.posix.join(this.snapshotDir, stem, file));
  }

  async save(response: ApiResponse, collectionPath: string, template: ApiRequest = response.request): Promise<string> {
    const snapshotPath = this.snapshotPath(collectionPath, template);
    await this.saveTo(snapshotPath, response, template);
    return snapshotPath;
  }

  async saveTo(snapshotPath: string, response: ApiResponse, template: ApiRequest = response.request): Promise<void> {
    const formatter = this.formatters.get(response.contentType);
    const normalized = formatter.format(response.body);
    const metadata: SnapshotMetadata = {
      requestPath: requestPathOf(template),
      requestMethod: template.method.toUpperCase(),
      contentType: response.contentType,
      statusCode: response.statusCode,
      headers: response.headers,
      createdAt: this.now().toISOString(),
    };
    if (formatter.binary) metadata.encoding = 'base64';
    const file: SnapshotFile = {
      metadata,
      content: normalized.toString(formatter.binary ? 'base64' : 'utf8'),
    };
    await this.persistence.write(snapshotPath, `${JSON.stringify(file, null, 2)}\n`);
  }

  async readFile(snapshotPath: string): Promise<SnapshotFile> {
    let raw: Buffer;
    try {
      raw = await this.persistence.read(snapshotPath);
    } catch (error) {
      if (isMissingFileError(error)) throw new SnapshotMissingError(snapshotPath);
      throw error;
    }
    return parseSnapshotFile(snapshotPath, raw.toString('utf8'));
  }

  /** Rebuild a response-shaped value from a stored snapshot. */
  async load(snapshotPath: string): Promise<ApiResponse> {
    const { metadata, content } = await this.readFile(snapshotPath);
    const body = Buffer.from(content, metadata.encoding === 'base64' ? 'base64' : 'utf8');
    return {
      statusCode: metadata.statusCode,
      statusText: '',
      headers: metadata.headers,
      body,
      contentType: metadata.contentType,
      contentLength: body.length,
      durationMs: 0,
      timestamp: new Date(metadata.createdAt),
      request: { method: metadata.requestMethod, url: metadata.requestPath, path: metadata.requestPath, headers: [] },
    };
  }

  async compare(response: ApiResponse, snapshotPath: string): Promise<SnapshotDiff> {
    const { metadata, content } = await this.readFile(snapshotPath);
    const expectedBody = Buffer.from(content, metadata.encoding === 'base64' ? 'base64' : 'utf8');
    const formatter = this.formatters.get(response.contentType);
    const body = formatter.compare(expectedBody, formatter.format(response.body));
    const status = {
      expected: metadata.statusCode,
      actual: response.statusCode,
      equal: metadata.statusCode === response.statusCode,
    };
    const headers = diffHeaders(metadata.headers, response.headers, this.ignoredHeaders);

    return {
      requestPath: metadata.requestPath,
      requestMethod: metadata.requestMethod,
      status,
      headers,
      body,
      equal: status.equal && headers.equal && body.equal,
    };
  }

  /**
   * Compare a response with its snapshot under an update mode, writing the
   * snapshot when the mode asks for it. `matches` decides pass or fail.
   */
  async runSnapshotTest(response: ApiResponse, collectionPath: string, options: SnapshotTestOptions): Promise<SnapshotResult> {
    const { updateMode } = options;
    const template = options.template ?? response.request;
    const snapshotPath = this.snapshotPath(collectionPath, template);
    this.markUsed(snapshotPath);

    const result: SnapshotResult = {
      snapshotPath,
      exists: false,
      matches: false,
      created: false,
      updated: false,
      updateMode,
    };

    try {
      if (updateMode === 'all') {
        result.exists = await this.persistence.exists(snapshotPath);
        await this.saveTo(snapshotPath, response, template);
        result.matches = true;
        if (result.exists) {
          result.updated = true;
          this.stats.updated++;
        } else {
          result.created = true;
          this.stats.created++;
        }
        this.logger.debug(`Snapshot written: ${snapshotPath}`);
        return this.count(result);
      }

      let diff: SnapshotDiff;
      try {
        diff = await this.compare(response, snapshotPath);
      } catch (error) {
        if (!(error instanceof SnapshotMissingError)) throw error;

        if (updateMode === 'missing') {
          await this.saveTo(snapshotPath, response, template);
          result.created = true;
          result.matches = true;
          this.stats.created++;
          this.logger.info(`Snapshot created: ${snapshotPath}`);
        } else if (options.failOnMissing) {
          result.note = 'snapshot missing';
        } else {
          result.matches = true;
          result.note = 'snapshot missing, not failing due to configuration';
        }
        return this.count(result);
      }

      result.exists = true;
      result.diff = diff;
      if (diff.equal) {
        result.matches = true;
      } else if (updateMode === 'failed') {
        await this.saveTo(snapshotPath, response, template);
        result.matches = true;
        result.updated = true;
        this.stats.updated++;
        this.logger.info(`Snapshot updated: ${snapshotPath}`);
      }
      return this.count(result);
    } catch (error) {
      this.stats.errors++;
      throw error;
    }
  }

  private count(result: SnapshotResult): SnapshotResult {
    this.stats.total++;
    if (result.matches) {
      this.stats.passed++;
    } else {
      this.stats.failed++;
    }
    return result;
  }

  markUsed(snapshotPath: string): void {
    this.used.add(normalizeKey(snapshotPath));
  }

  usedSnapshots(): string[] {
    return [...this.used].sort();
  }

  async list(dir: string = this.snapshotDir): Promise<string[]> {
    const keys = await this.persistence.list(dir);
    return keys.filter((k) => k.endsWith(SNAPSHOT_SUFFIX));
  }

  /** Delete snapshots under `dir` that are not in `used`; returns the removed paths. */
  async cleanup(dir: string = this.snapshotDir, used: Iterable<string> = this.used): Promise<string[]> {
    const keep = new Set([...used].map(normalizeKey));
    const removed: string[] = [];
    for (const snapshotPath of await this.list(dir)) {
      if (keep.has(snapshotPath)) continue;
      await this.persistence.remove(snapshotPath);
      removed.push(snapshotPath);
      this.logger.info(`Removed unused snapshot ${snapshotPath}`);
    }
    return removed;
  }

  getStats(): SnapshotStats {
    return { ...this.stats, endTime: this.now() };
  }

  resetStats(): void {
    this.stats = this.freshStats();
  }
}
