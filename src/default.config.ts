import type { RetryPolicy, RunOptions } from './types';

export const defaultRetryPolicy: RetryPolicy = {
  maxRetries: 3,
  initialBackoffMs: 500,
  maxBackoffMs: 30000,
  backoffFactor: 2,
  jitter: 0.2,
  retryableStatusCodes: [408, 429, 500, 502, 503, 504],
  retryableErrors: ['timeout', 'network'],
  retryableErrorCodes: [],
  retryNonIdempotent: true,
};

export default {
  updateMode: 'none',
  failOnMissing: false,
  ignoredHeaders: ['date'],
  timeoutMs: 30000,
  parallel: false,
  concurrency: 5,
  stopOnFailure: false,
  filter: {},
  environment: {},
  snapshotDir: '__snapshots__',
  validateSchema: false,
  validation: {},
  enableAssertions: false,
  extractVariables: false,
  saveVariables: false,
  failFast: false,
} satisfies RunOptions;
