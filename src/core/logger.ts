import chalk, { Chalk, type ChalkInstance } from "chalk";

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  verbose?: boolean;
  quiet?: boolean;
  color?: boolean;
  prefix?: string;
}

const DEFAULT_PREFIX = "[gitfleet]";

export function createLogger(options: LoggerOptions = {}): Logger {
  const ui = createLoggerUi(options.color !== false);
  const prefix = options.prefix ?? DEFAULT_PREFIX;
  const verbose = options.verbose === true;
  const quiet = options.quiet === true;

  return {
    debug(message) {
      if (verbose) {
        console.error(ui.gray(`${prefix} ${message}`));
      }
    },
    info(message) {
      if (!quiet) {
        console.log(`${ui.blue(prefix)} ${message}`);
      }
    },
    warn(message) {
      console.warn(ui.yellow(`${prefix} ${message}`));
    },
    error(message) {
      console.error(ui.red(`${prefix} ${message}`));
    },
  };
}

export function createSilentLogger(): Logger {
  const noop = (): void => {};
  return { debug: noop, info: noop, warn: noop, error: noop };
}

function createLoggerUi(colorEnabled: boolean): ChalkInstance {
  const noColorEnv = Object.prototype.hasOwnProperty.call(process.env, "NO_COLOR");
  return new Chalk({ level: colorEnabled && !noColorEnv ? chalk.level : 0 });
}
