import type { Plugin, RunnerContext, TestStartInfo } from './plugin-api';
import type { ApiRequest, RequestCollection, SequenceResult, TestReport, TestResult } from './types';

export interface RunEvents {
  onRunStart: [total: number];
  onRunEnd: [report: TestReport];
  onTestStart: [request: ApiRequest, info: TestStartInfo];
  onTestEnd: [result: TestResult];
  onSequenceEnd: [result: SequenceResult];
}

type Listener<A extends unknown[]> = (...args: A) => Promise<void> | void;
type Listeners = { [K in keyof RunEvents]: Listener<RunEvents[K]>[] };

interface Loader {
  filter: RegExp;
  callback: (args: { path: string }) => Promise<RequestCollection | null>;
}

export class PluginHost {
  private plugins: Plugin[] = [];
  private loaders: Loader[] = [];
  private onPrepareCbs: ((collections: RequestCollection[]) => Promise<RequestCollection[]> | RequestCollection[])[] = [];
  private onFetchCbs: ((req: Request) => Promise<Request> | Request)[] = [];
  private listeners: Listeners = {
    onRunStart: [],
    onRunEnd: [],
    onTestStart: [],
    onTestEnd: [],
    onSequenceEnd: [],
  };
  private ready?: Promise<void>;

  public context: RunnerContext = {
    onLoad: (options, callback) => {
      this.loaders.push({ filter: options.filter, callback });
    },
    onPrepare: (callback) => {
      this.onPrepareCbs.push(callback);
    },
    onFetch: (callback) => {
      this.onFetchCbs.push(callback);
    },
    onRunStart: (callback) => {
      this.listeners.onRunStart.push(callback);
    },
    onRunEnd: (callback) => {
      this.listeners.onRunEnd.push(callback);
    },
    onTestStart: (callback) => {
      this.listeners.onTestStart.push(callback);
    },
    onTestEnd: (callback) => {
      this.listeners.onTestEnd.push(callback);
    },
    onSequenceEnd: (callback) => {
      this.listeners.onSequenceEnd.push(callback);
    },
  };

  constructor(plugins: Plugin[] = []) {
    this.plugins = plugins;
  }

  /** Run every plugin's setup once; later calls reuse the first. */
  public setup(): Promise<void> {
    if (!this.ready) {
      this.ready = (async () => {
        for (const plugin of this.plugins) {
          await plugin.setup(this.context);
        }
      })();
    }
    return this.ready;
  }

  /** Load one file through the first loader whose filter matches it. */
  public async loadCollection(path: string): Promise<RequestCollection | null> {
    const loader = this.loaders.find((l) => l.filter.test(path));
    if (!loader) return null;
    return loader.callback({ path });
  }

  public async prepareCollections(collections: RequestCollection[]): Promise<RequestCollection[]> {
    let result = collections;
    for (const cb of this.onPrepareCbs) {
      result = await cb(result);
    }
    return result;
  }

  public async transformRequest(req: Request): Promise<Request> {
    let result = req;
    for (const cb of this.onFetchCbs) {
      result = await cb(result);
    }
    return result;
  }

  public async dispatch<K extends keyof RunEvents>(event: K, ...args: RunEvents[K]): Promise<void> {
    const callbacks: Listener<RunEvents[K]>[] = this.listeners[event];
    for (const cb of callbacks) {
      await cb(...args);
    }
  }
}
