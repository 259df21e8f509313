import type { ApiRequest, RequestCollection, SequenceResult, TestReport, TestResult } from './types';

export interface TestStartInfo {
  filePath: string;
  index: number;
}

export interface RunnerContext {
  // Discovery Phase
  onLoad(options: { filter: RegExp }, callback: (args: { path: string }) => Promise<RequestCollection | null>): void;

  // Preparation Phase: filter or reshape collections before running
  onPrepare(callback: (collections: RequestCollection[]) => Promise<RequestCollection[]> | RequestCollection[]): void;

  // Network Phase: transform the outbound Request after auth and cookies are applied
  onFetch(callback: (req: Request) => Promise<Request> | Request): void;

  // Execution Lifecycle
  onRunStart(callback: (total: number) => Promise<void> | void): void;
  onRunEnd(callback: (report: TestReport) => Promise<void> | void): void;

  // Test Granularity
  onTestStart(callback: (request: ApiRequest, info: TestStartInfo) => Promise<void> | void): void;
  onTestEnd(callback: (result: TestResult) => Promise<void> | void): void;
  onSequenceEnd(callback: (result: SequenceResult) => Promise<void> | void): void;
}

export interface Plugin {
  name: string;
  setup: (ctx: RunnerContext) => void | Promise<void>;
}
