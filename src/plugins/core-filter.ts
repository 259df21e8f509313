import type { Plugin } from '../plugin-api';
import type { ApiRequest, RequestCollection, TestFilter, TestSequence } from '../types';

function lower(values?: readonly string[]): string[] {
  return (values ?? []).map((v) => v.toLowerCase());
}

function matchesTags(tags: readonly string[] | undefined, wanted: string[]): boolean {
  if (wanted.length === 0) return true;
  const own = lower(tags);
  return own.some((tag) => wanted.includes(tag));
}

function matchesSubstring(value: string, needles: readonly string[] | undefined): boolean {
  if (!needles || needles.length === 0) return true;
  return needles.some((n) => value.includes(n));
}

export function matchesFilter(request: ApiRequest, filter: TestFilter): boolean {
  if (!matchesTags(request.tags, lower(filter.tags))) return false;
  const methods = lower(filter.methods);
  if (methods.length && !methods.includes(request.method.toLowerCase())) return false;
  if (!matchesSubstring(request.path ?? request.url, filter.paths)) return false;
  if (!matchesSubstring(request.name ?? '', filter.names)) return false;
  return true;
}

/** Keep matching requests; collections left with none are dropped. */
export function filterCollections(collections: RequestCollection[], filter: TestFilter): RequestCollection[] {
  return collections
    .map((c) => ({ ...c, requests: c.requests.filter((r) => matchesFilter(r, filter)) }))
    .filter((c) => c.requests.length > 0);
}

export function sequenceMatchesFilter(sequence: TestSequence, filter: TestFilter): boolean {
  if (!matchesTags(sequence.tags, lower(filter.tags))) return false;
  if (!matchesSubstring(sequence.name, filter.names)) return false;
  for (const [key, value] of Object.entries(filter.metadata ?? {})) {
    if (sequence.metadata?.[key] !== value) return false;
  }
  return true;
}

export const coreFilterPlugin = (filter: TestFilter): Plugin => ({
  name: 'core-filter',
  setup(ctx) {
    ctx.onPrepare((collections) => filterCollections(collections, filter));
  },
});
