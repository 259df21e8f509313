import { setTimeout as delay } from 'node:timers/promises';
import { evaluateAssertions, firstFailure } from './assertions';
import { resolveRunOptions } from './config';
import { CancelledError, errorMessage } from './errors';
import { extractVariables, loadVariables, saveVariables } from './extractor';
import type { HttpExecutor } from './http-client';
import { silentLogger, type Logger } from './logger';
import type { Persistence } from './persistence';
import { PluginHost } from './plugin-host';
import { sequenceMatchesFilter } from './plugins/core-filter';
import { summarize } from './report';
import type {
  RunOptions,
  SchemaValidator,
  SequenceResult,
  SequenceStep,
  StepResult,
  TestReport,
  TestResult,
  TestSequence,
} from './types';
import { layerVariables, substitute, substituteRequest, type VariableMap } from './variables';

export interface SequenceRunnerDeps {
  executor: HttpExecutor;
  validator?: SchemaValidator;
  /** Where variable files are read and written */
  persistence?: Persistence;
  pluginHost?: PluginHost;
  logger?: Logger;
  now?: () => number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

function unquote(value: string): string {
  return value.trim().replace(/^["']+|["']+$/g, '');
}

/**
 * `left == right` or `left != right` after substitution; quotes around
 * either side are ignored. Anything else is false.
 */
export function evaluateCondition(expression: string): boolean {
  const match = /^(.*?)(==|!=)(.*)$/.exec(expression.trim());
  if (!match) return false;
  const [, left, op, right] = match;
  const equal = unquote(left) === unquote(right);
  return op === '==' ? equal : !equal;
}

async function defaultSleep(ms: number, signal?: AbortSignal): Promise<void> {
  await delay(ms, undefined, { signal });
}

export class SequenceRunner {
  private executor: HttpExecutor;
  private validator?: SchemaValidator;
  private persistence?: Persistence;
  private pluginHost: PluginHost;
  private logger: Logger;
  private now: () => number;
  private sleep: (ms: number, signal?: AbortSignal) => Promise<void>;

  constructor(deps: SequenceRunnerDeps) {
    this.executor = deps.executor;
    this.validator = deps.validator;
    this.persistence = deps.persistence;
    this.pluginHost = deps.pluginHost ?? new PluginHost();
    this.logger = deps.logger ?? silentLogger;
    this.now = deps.now ?? Date.now;
    this.sleep = deps.sleep ?? defaultSleep;
  }

  private async wait(ms: number | undefined, signal?: AbortSignal): Promise<void> {
    if (!ms || ms <= 0) return;
    if (signal?.aborted) throw new CancelledError();
    try {
      await this.sleep(ms, signal);
    } catch (error) {
      if (signal?.aborted) throw new CancelledError();
      throw error;
    }
  }

  /**
   * Run the steps in order. Variables extracted by a step are visible to
   * every later step. Cancellation ends the sequence with an error.
   */
  async runSequence(
    sequence: TestSequence,
    overrides: Partial<RunOptions> = {},
    signal?: AbortSignal,
    initialVariables: VariableMap = {}
  ): Promise<SequenceResult> {
    const options = resolveRunOptions(overrides);
    const started = this.now();
    const scope: VariableMap = layerVariables(options.environment, initialVariables, sequence.variables);
    const steps: StepResult[] = [];
    let error: string | undefined;

    try {
      for (const step of sequence.steps) {
        if (signal?.aborted) throw new CancelledError();
        const outcome = await this.runStep(step, scope, options, signal);
        steps.push(outcome);

        const failed = outcome.status === 'failed' || outcome.status === 'error';
        if (failed && error === undefined) error = `${step.name}: ${outcome.error ?? outcome.status}`;
        if (failed && (options.failFast || step.stopOnFail)) {
          this.logger.warn(`Sequence "${sequence.name}" stopped at step "${step.name}"`);
          break;
        }
        if (outcome.status !== 'skipped') await this.wait(step.waitAfterMs, signal);
      }
    } catch (caught) {
      if (!(caught instanceof CancelledError)) throw caught;
      error = caught.message;
    }

    const ended = this.now();
    const result: SequenceResult = {
      name: sequence.name,
      success: error === undefined && steps.every((s) => s.status === 'passed' || s.status === 'skipped'),
      steps,
      durationMs: ended - started,
      variables: { ...scope },
      startTime: new Date(started),
      endTime: new Date(ended),
      error,
    };
    await this.pluginHost.dispatch('onSequenceEnd', result);
    return result;
  }

  private async runStep(step: SequenceStep, scope: VariableMap, options: RunOptions, signal?: AbortSignal): Promise<StepResult> {
    const start = this.now();
    const result: StepResult = {
      name: step.name,
      status: 'passed',
      variables: {},
      durationMs: 0,
      conditionallySkipped: false,
      expectedStatus: step.expectedStatus,
    };
    const finish = () => {
      result.durationMs = this.now() - start;
      return result;
    };

    if (step.skip) {
      result.status = 'skipped';
      return finish();
    }
    if (step.skipCondition && evaluateCondition(substitute(step.skipCondition, scope))) {
      result.status = 'skipped';
      result.conditionallySkipped = true;
      result.error = `Skipped due to condition: ${step.skipCondition}`;
      return finish();
    }

    await this.wait(step.waitBeforeMs, signal);

    try {
      result.response = await this.executor.execute(step.request, scope, { signal, timeoutMs: options.timeoutMs });
    } catch (caught) {
      if (caught instanceof CancelledError) throw caught;
      result.request = substituteRequest(step.request, layerVariables(this.executor.variables.getAll(), scope));
      result.status = 'error';
      result.error = `Error executing request: ${errorMessage(caught)}`;
      return finish();
    }
    const response = result.response;
    result.request = response.request;
    result.actualStatus = response.statusCode;

    if (step.expectedStatus !== undefined && response.statusCode !== step.expectedStatus) {
      result.status = 'failed';
      result.error = `Expected status code ${step.expectedStatus} but got ${response.statusCode}`;
      return finish();
    }

    const stops = options.failFast || step.stopOnFail === true;
    // The first failure sets the status; later checks still run unless the step stops the sequence.
    const fail = (status: 'failed' | 'error', message: string) => {
      if (result.status !== 'passed') return;
      result.status = status;
      result.error = message;
    };

    const operation = step.request.operation;
    if ((options.validateSchema || step.schemaValidate) && this.validator && operation) {
      try {
        result.schema = await this.validator.validate(response, operation, options.validation);
        if (!result.schema.valid) {
          result.validationError = `Schema validation failed with ${result.schema.errors.length} errors`;
          fail('failed', result.validationError);
        }
      } catch (caught) {
        result.validationError = `Schema validation error: ${errorMessage(caught)}`;
        fail('error', result.validationError);
      }
      if (result.validationError && stops) return finish();
    }

    const assertions = step.assertions ?? step.request.assertions ?? [];
    if (assertions.length) {
      try {
        result.assertionResults = evaluateAssertions(response, assertions);
        const failed = firstFailure(result.assertionResults);
        if (failed) fail('failed', `Assertion failed: ${failed.type} - ${failed.message ?? ''}`);
      } catch (caught) {
        fail('error', `Error evaluating assertions: ${errorMessage(caught)}`);
      }
      if (result.status !== 'passed' && stops) return finish();
    }

    const extract = step.extract ?? step.request.extract ?? [];
    if (extract.length) {
      try {
        result.variables = extractVariables(response, extract);
        Object.assign(scope, result.variables);
      } catch (caught) {
        fail('error', `Error extracting variables: ${errorMessage(caught)}`);
      }
    }

    return finish();
  }

  /**
   * Run sequences one after another and report their steps as tests named
   * "<sequence> - <step>".
   */
  async runSequences(sequences: TestSequence[], overrides: Partial<RunOptions> = {}, signal?: AbortSignal): Promise<TestReport> {
    const options = resolveRunOptions(overrides);
    await this.pluginHost.setup();

    const selected = sequences.filter((s) => sequenceMatchesFilter(s, options.filter));
    const totalSteps = selected.reduce((n, s) => n + s.steps.length, 0);
    const startTime = new Date(this.now());
    await this.pluginHost.dispatch('onRunStart', totalSteps);

    const sequenceResults: SequenceResult[] = [];
    const results: TestResult[] = [];

    for (const sequence of selected) {
      if (signal?.aborted) break;
      const loaded = await this.readVariablesFile(options);
      const outcome = await this.runSequence(sequence, options, signal, loaded);
      sequenceResults.push(outcome);
      await this.writeVariablesFile(options, outcome.variables);

      outcome.steps.forEach((step, i) => {
        const request = step.request ?? sequence.steps[i].request;
        results.push({
          name: `${sequence.name} - ${step.name}`,
          filePath: sequence.filePath ?? '',
          index: results.length,
          request,
          response: step.response,
          schema: step.schema,
          durationMs: step.durationMs,
          status: step.status,
          error: step.error,
          tags: [...(sequence.tags ?? [])],
          metadata: sequence.metadata,
          extractedVariables: step.variables,
          assertionResults: step.assertionResults,
        });
      });

      if (options.stopOnFailure && !outcome.success) {
        this.logger.warn(`Stopping after failed sequence "${sequence.name}"`);
        break;
      }
    }

    const endTime = new Date(this.now());
    const report: TestReport = {
      name: 'Test Sequences',
      summary: summarize(results, sequenceResults, startTime, endTime),
      results,
      sequences: sequenceResults,
      environment: { ...options.environment },
      createdAt: endTime,
    };
    await this.pluginHost.dispatch('onRunEnd', report);
    return report;
  }

  private async readVariablesFile(options: RunOptions): Promise<VariableMap> {
    if (!options.variablesPath || !this.persistence) return {};
    if (!(await this.persistence.exists(options.variablesPath))) return {};
    return loadVariables(this.persistence, options.variablesPath);
  }

  private async writeVariablesFile(options: RunOptions, variables: VariableMap): Promise<void> {
    if (!options.saveVariables || !options.variablesPath || !this.persistence) return;
    try {
      await saveVariables(this.persistence, options.variablesPath, variables);
    } catch (caught) {
      this.logger.error(`Error saving variables to ${options.variablesPath}: ${errorMessage(caught)}`);
    }
  }
}
