import { loadEnvironmentVariables } from './config';
import type { ApiRequest } from './types';

export type VariableMap = Record<string, string>;

/**
 * Placeholder forms understood in request text: `{{name}}` (collections)
 * and `${name}` (sequences). Both are matched in a single pass so a value
 * that itself looks like a placeholder is never expanded again.
 */
export type PlaceholderSyntax = 'mustache' | 'dollar';

const PATTERNS: Record<PlaceholderSyntax, string> = {
  mustache: '\\{\\{([^{}]+)\\}\\}',
  dollar: '\\$\\{([^{}]+)\\}',
};

export const ALL_SYNTAXES: readonly PlaceholderSyntax[] = ['mustache', 'dollar'];

function placeholderRegex(syntaxes: readonly PlaceholderSyntax[]): RegExp {
  return new RegExp(syntaxes.map((s) => PATTERNS[s]).join('|'), 'g');
}

/** Replace known placeholders; unknown ones are left verbatim. */
export function substitute(
  input: string,
  variables: VariableMap,
  syntaxes: readonly PlaceholderSyntax[] = ALL_SYNTAXES
): string {
  if (!input || syntaxes.length === 0) return input;
  return input.replace(placeholderRegex(syntaxes), (match, ...groups: unknown[]) => {
    const name = groups.find((g): g is string => typeof g === 'string');
    if (name === undefined) return match;
    return Object.prototype.hasOwnProperty.call(variables, name) ? variables[name] : match;
  });
}

/** Produce a substituted copy of a request; the original is left untouched. */
export function substituteRequest(
  request: ApiRequest,
  variables: VariableMap,
  syntaxes: readonly PlaceholderSyntax[] = ALL_SYNTAXES
): ApiRequest {
  return {
    ...request,
    url: substitute(request.url, variables, syntaxes),
    path: request.path === undefined ? undefined : substitute(request.path, variables, syntaxes),
    headers: request.headers.map((h) => ({
      name: substitute(h.name, variables, syntaxes),
      value: substitute(h.value, variables, syntaxes),
    })),
    body: request.body === undefined ? undefined : substitute(request.body, variables, syntaxes),
  };
}

/** Placeholder names referenced by a string, in order of appearance. */
export function variableNames(
  input: string,
  syntaxes: readonly PlaceholderSyntax[] = ALL_SYNTAXES
): string[] {
  const names: string[] = [];
  for (const match of input.matchAll(placeholderRegex(syntaxes))) {
    const name = match.slice(1).find((g): g is string => typeof g === 'string');
    if (name !== undefined) names.push(name);
  }
  return names;
}

/** Merge maps from lowest to highest precedence. */
export function layerVariables(...layers: (VariableMap | undefined)[]): VariableMap {
  const merged: VariableMap = {};
  for (const layer of layers) {
    if (layer) Object.assign(merged, layer);
  }
  return merged;
}

/** Run-scoped variables shared by every request of a run. */
export class VariableStore {
  private variables = new Map<string, string>();

  constructor(initial?: VariableMap) {
    if (initial) this.loadFromMap(initial);
  }

  get(name: string): string | undefined {
    return this.variables.get(name);
  }

  set(name: string, value: string): void {
    this.variables.set(name, value);
  }

  delete(name: string): void {
    this.variables.delete(name);
  }

  clear(): void {
    this.variables.clear();
  }

  getAll(): VariableMap {
    return Object.fromEntries(this.variables);
  }

  loadFromMap(vars: VariableMap): void {
    for (const [k, v] of Object.entries(vars)) {
      this.variables.set(k, v);
    }
  }

  /** Load `PREFIXname=value` environment entries as `name`, or everything without a prefix. */
  loadFromEnvironment(prefix = '', env: Record<string, string | undefined> = process.env): void {
    this.loadFromMap(loadEnvironmentVariables(prefix, env));
  }

  hasVariables(input: string): boolean {
    return variableNames(input).length > 0;
  }
}
