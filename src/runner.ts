import { evaluateAssertions, firstFailure } from './assertions';
import { resolveRunOptions } from './config';
import { CancelledError, errorMessage } from './errors';
import { extractVariables } from './extractor';
import type { HttpExecutor } from './http-client';
import { silentLogger, type Logger } from './logger';
import { PluginHost } from './plugin-host';
import { filterCollections } from './plugins/core-filter';
import { escalate, summarize } from './report';
import type { SnapshotStore } from './snapshot-store';
import type { ApiRequest, RequestCollection, RunOptions, SchemaValidator, TestReport, TestResult } from './types';

export interface TestRunnerDeps {
  executor: HttpExecutor;
  snapshots: SnapshotStore;
  validator?: SchemaValidator;
  pluginHost?: PluginHost;
  logger?: Logger;
  now?: () => number;
}

interface WorkItem {
  collection: RequestCollection;
  request: ApiRequest;
  index: number;
}

export function testName(request: ApiRequest): string {
  return request.name || `${request.method.toUpperCase()} ${request.url}`;
}

export class TestRunner {
  private executor: HttpExecutor;
  private snapshots: SnapshotStore;
  private validator?: SchemaValidator;
  private pluginHost: PluginHost;
  private logger: Logger;
  private now: () => number;

  constructor(deps: TestRunnerDeps) {
    this.executor = deps.executor;
    this.snapshots = deps.snapshots;
    this.validator = deps.validator;
    this.pluginHost = deps.pluginHost ?? new PluginHost();
    this.logger = deps.logger ?? silentLogger;
    this.now = deps.now ?? Date.now;
  }

  /**
   * Run every matching request of every collection. In parallel mode the
   * order of `results` is not guaranteed.
   */
  async runTests(collections: RequestCollection[], overrides: Partial<RunOptions> = {}, signal?: AbortSignal): Promise<TestReport> {
    const options = resolveRunOptions(overrides);
    await this.pluginHost.setup();

    const prepared = await this.pluginHost.prepareCollections(filterCollections(collections, options.filter));
    const items: WorkItem[] = [];
    for (const collection of prepared) {
      for (const request of collection.requests) {
        items.push({ collection, request, index: items.length });
      }
    }

    this.executor.variables.loadFromMap(options.environment);

    const startTime = new Date(this.now());
    await this.pluginHost.dispatch('onRunStart', items.length);

    const results = options.parallel
      ? await this.runParallel(items, options, signal)
      : await this.runSequential(items, options, signal);

    const endTime = new Date(this.now());
    const report: TestReport = {
      name: 'HTTP Tests',
      summary: summarize(results, [], startTime, endTime),
      results,
      sequences: [],
      environment: { ...options.environment },
      createdAt: endTime,
    };
    await this.pluginHost.dispatch('onRunEnd', report);
    return report;
  }

  private async runSequential(items: WorkItem[], options: RunOptions, signal?: AbortSignal): Promise<TestResult[]> {
    const results: TestResult[] = [];
    for (const item of items) {
      if (signal?.aborted) break;
      const result = await this.runOne(item, options, signal);
      results.push(result);
      if (options.stopOnFailure && (result.status === 'failed' || result.status === 'error')) {
        this.logger.warn(`Stopping after ${result.status} test: ${result.name}`);
        break;
      }
    }
    return results;
  }

  /**
   * A fixed pool of workers drains a pre-filled queue. Each worker finishes
   * its current test; after a failure under stopOnFailure no new test starts.
   */
  private async runParallel(items: WorkItem[], options: RunOptions, signal?: AbortSignal): Promise<TestResult[]> {
    const queue = [...items];
    const results: TestResult[] = [];
    let stopped = false;

    const worker = async (): Promise<void> => {
      for (;;) {
        if (stopped || signal?.aborted) return;
        const item = queue.shift();
        if (!item) return;
        const result = await this.runOne(item, options, signal);
        results.push(result);
        if (options.stopOnFailure && (result.status === 'failed' || result.status === 'error')) {
          stopped = true;
          this.logger.warn(`Stopping after ${result.status} test: ${result.name}`);
          return;
        }
      }
    };

    const size = Math.min(options.concurrency, items.length);
    await Promise.all(Array.from({ length: size }, () => worker()));
    return results;
  }

  private async runOne(item: WorkItem, options: RunOptions, signal?: AbortSignal): Promise<TestResult> {
    await this.pluginHost.dispatch('onTestStart', item.request, { filePath: item.collection.path, index: item.index });
    const result = await this.runOneTest(item.request, item.collection.path, options, signal, item.index);
    await this.pluginHost.dispatch('onTestEnd', result);
    return result;
  }

  /** Execute one request and judge it against its snapshot and declared checks. */
  async runOneTest(
    request: ApiRequest,
    filePath: string,
    options: RunOptions,
    signal?: AbortSignal,
    index = 0
  ): Promise<TestResult> {
    const start = this.now();
    const result: TestResult = {
      name: testName(request),
      filePath,
      index,
      request,
      durationMs: 0,
      status: 'passed',
      tags: [...(request.tags ?? [])],
    };
    const finish = () => {
      result.durationMs = this.now() - start;
      return result;
    };

    try {
      result.response = await this.executor.execute(request, {}, { signal, timeoutMs: options.timeoutMs });
    } catch (error) {
      result.status = 'error';
      result.error = error instanceof CancelledError ? error.message : `Request failed: ${errorMessage(error)}`;
      return finish();
    }
    const response = result.response;

    try {
      result.snapshot = await this.snapshots.runSnapshotTest(response, filePath, {
        updateMode: options.updateMode,
        failOnMissing: options.failOnMissing,
        template: request,
      });
      if (result.snapshot.note) result.error = result.snapshot.note;
      if (!result.snapshot.matches) {
        escalate(result, 'failed', result.snapshot.note ?? 'snapshot comparison failed');
      }
    } catch (error) {
      escalate(result, 'error', `Snapshot error: ${errorMessage(error)}`);
      return finish();
    }

    if (options.validateSchema && this.validator && request.operation) {
      try {
        result.schema = await this.validator.validate(response, request.operation, options.validation);
        if (!result.schema.valid) {
          const first = result.schema.errors[0];
          escalate(result, 'failed', `Schema validation failed: ${first ? `${first.path} ${first.message}`.trim() : 'invalid'}`);
        }
      } catch (error) {
        escalate(result, 'error', `Schema validation error: ${errorMessage(error)}`);
      }
    }

    if (options.enableAssertions && request.assertions?.length) {
      try {
        result.assertionResults = evaluateAssertions(response, request.assertions);
        const failed = firstFailure(result.assertionResults);
        if (failed) escalate(result, 'failed', `Assertion failed: ${failed.type} - ${failed.message ?? ''}`);
      } catch (error) {
        escalate(result, 'error', `Error evaluating assertions: ${errorMessage(error)}`);
      }
    }

    if (options.extractVariables && request.extract?.length) {
      try {
        result.extractedVariables = extractVariables(response, request.extract);
        this.executor.variables.loadFromMap(result.extractedVariables);
      } catch (error) {
        escalate(result, 'error', errorMessage(error));
      }
    }

    return finish();
  }
}
