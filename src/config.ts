import { readFile } from 'fs/promises';
import path from 'path';
import { load as parseYaml } from 'js-yaml';
import defaultConfig from './default.config';
import type { RunOptions, UpdateMode } from './types';

const UPDATE_MODES: readonly UpdateMode[] = ['none', 'all', 'failed', 'missing'];

export function isUpdateMode(value: unknown): value is UpdateMode {
  return typeof value === 'string' && (UPDATE_MODES as readonly string[]).includes(value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function clean<T extends object>(layer: Partial<T>): Partial<T> {
  const cleaned: Partial<T> = {};
  for (const key in layer) {
    if (layer[key] !== undefined) cleaned[key] = layer[key];
  }
  return cleaned;
}

/**
 * Merge option layers over the defaults. Later layers win and `undefined`
 * values never overwrite. Environment maps are merged rather than replaced.
 */
export function resolveRunOptions(...layers: Partial<RunOptions>[]): RunOptions {
  let cfg: RunOptions = {
    ...defaultConfig,
    ignoredHeaders: [...defaultConfig.ignoredHeaders],
    filter: {},
    environment: {},
    validation: {},
  };

  for (const layer of layers) {
    const cleaned = clean(layer);
    cfg = {
      ...cfg,
      ...cleaned,
      environment: { ...cfg.environment, ...cleaned.environment },
    };
  }

  if (!isUpdateMode(cfg.updateMode)) {
    throw new Error(`Invalid update mode "${String(cfg.updateMode)}"; expected one of ${UPDATE_MODES.join(', ')}`);
  }
  if (!Number.isFinite(cfg.concurrency) || cfg.concurrency < 1) {
    cfg.concurrency = defaultConfig.concurrency;
  }
  if (!Number.isFinite(cfg.timeoutMs) || cfg.timeoutMs <= 0) {
    cfg.timeoutMs = defaultConfig.timeoutMs;
  }

  return cfg;
}

/** Lift `PREFIX_NAME=value` environment entries into `{ NAME: value }`. */
export function loadEnvironmentVariables(
  prefix = '',
  env: Record<string, string | undefined> = process.env
): Record<string, string> {
  const vars: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value === undefined) continue;
    if (!prefix) {
      vars[key] = value;
    } else if (key.length > prefix.length && key.startsWith(prefix)) {
      vars[key.slice(prefix.length)] = value;
    }
  }
  return vars;
}

/** Read a JSON or YAML options file into a partial options layer. */
export async function loadConfigFile(filePath: string): Promise<Partial<RunOptions>> {
  const raw = await readFile(path.resolve(filePath), 'utf8');
  const data: unknown = /\.ya?ml$/.test(filePath) ? parseYaml(raw) : JSON.parse(raw);
  if (data === undefined || data === null) return {};
  if (!isRecord(data)) {
    throw new Error(`Config file ${filePath} must contain an object`);
  }

  const layer: Partial<RunOptions> = {};
  const { updateMode } = data;
  if (updateMode !== undefined) {
    if (!isUpdateMode(updateMode)) {
      throw new Error(`Invalid update mode "${String(updateMode)}" in ${filePath}`);
    }
    layer.updateMode = updateMode;
  }
  for (const key of ['failOnMissing', 'parallel', 'stopOnFailure', 'validateSchema', 'enableAssertions', 'extractVariables', 'saveVariables', 'failFast'] as const) {
    const value = data[key];
    if (typeof value === 'boolean') layer[key] = value;
  }
  const { timeoutMs, concurrency, snapshotDir, variablesPath, ignoredHeaders, environment, filter, validation } = data;
  if (typeof timeoutMs === 'number') layer.timeoutMs = timeoutMs;
  if (typeof concurrency === 'number') layer.concurrency = concurrency;
  if (typeof snapshotDir === 'string') layer.snapshotDir = snapshotDir;
  if (typeof variablesPath === 'string') layer.variablesPath = variablesPath;
  if (Array.isArray(ignoredHeaders)) layer.ignoredHeaders = ignoredHeaders.map(String);
  if (isRecord(environment)) {
    layer.environment = Object.fromEntries(
      Object.entries(environment).map(([k, v]) => [k, String(v)])
    );
  }
  const list = (v: unknown) => (Array.isArray(v) ? v.map(String) : undefined);
  const flag = (v: unknown) => (typeof v === 'boolean' ? v : undefined);
  if (isRecord(filter)) {
    layer.filter = clean({
      tags: list(filter.tags),
      methods: list(filter.methods),
      paths: list(filter.paths),
      names: list(filter.names),
    });
  }
  if (isRecord(validation)) {
    layer.validation = clean({
      ignoreAdditionalProperties: flag(validation.ignoreAdditionalProperties),
      ignoreFormats: flag(validation.ignoreFormats),
      ignorePatterns: flag(validation.ignorePatterns),
      requiredPropertiesOnly: flag(validation.requiredPropertiesOnly),
      ignoreNullable: flag(validation.ignoreNullable),
      ignoredProperties: list(validation.ignoredProperties),
    });
  }
  return layer;
}
