export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface ConsoleLoggerOptions {
  verbose?: boolean;
  /** Prefix for every line, e.g. a component name */
  scope?: string;
}

function red(text: string): string {
  return `\u001b[31m${text}\u001b[39m`;
}

function yellow(text: string): string {
  return `\u001b[33m${text}\u001b[39m`;
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const verbose = !!options.verbose;
  const prefix = options.scope ? `[${options.scope}] ` : '';

  return {
    debug(message) {
      if (verbose) console.debug(`${prefix}${message}`);
    },
    info(message) {
      console.log(`${prefix}${message}`);
    },
    warn(message) {
      console.warn(yellow(`⚠️  ${prefix}${message}`));
    },
    error(message) {
      console.error(red(`❌ ${prefix}${message}`));
    },
  };
}

const noop = () => {};

export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};
