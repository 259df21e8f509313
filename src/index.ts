export * from './types';
export * from './errors';
export { createConsoleLogger, silentLogger } from './logger';
export type { Logger, ConsoleLoggerOptions } from './logger';
export { default as defaultConfig, defaultRetryPolicy } from './default.config';
export { resolveRunOptions, loadEnvironmentVariables, loadConfigFile, isUpdateMode } from './config';
export * from './variables';
export * from './session-store';
export * from './retry';
export * from './auth';
export * from './http-client';
export * from './formatters';
export * from './persistence';
export * from './snapshot-store';
export * from './extractor';
export * from './assertions';
export * from './schema-validator';
export * from './report';
export * from './runner';
export * from './sequence-runner';
export * from './loader';
export { PluginHost } from './plugin-host';
export type { RunEvents } from './plugin-host';
export type { Plugin, RunnerContext, TestStartInfo } from './plugin-api';
export { coreFilterPlugin, filterCollections, matchesFilter, sequenceMatchesFilter } from './plugins/core-filter';
export { coreLoaderPlugin } from './plugins/core-loader';
