import * as p from '@clack/prompts';
import chalk from 'chalk';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  step(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  /** Emit `debug` lines. */
  verbose?: boolean;
  /**
   * Where log lines go. Commands that print manifests on stdout log to
   * stderr so their output can be piped.
   */
  stream?: 'stdout' | 'stderr';
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const verbose = options.verbose ?? false;

  if (options.stream === 'stderr') {
    const write = (symbol: string, message: string) => {
      process.stderr.write(`${symbol} ${message}\n`);
    };
    return {
      debug: (m) => {
        if (verbose) write(chalk.gray('│'), chalk.dim(m));
      },
      info: (m) => write(chalk.blue('●'), m),
      step: (m) => write(chalk.green('◇'), m),
      success: (m) => write(chalk.green('◆'), m),
      warn: (m) => write(chalk.yellow('▲'), chalk.yellow(m)),
      error: (m) => write(chalk.red('■'), chalk.red(m)),
    };
  }

  return {
    debug: (m) => {
      if (verbose) p.log.message(chalk.dim(m));
    },
    info: (m) => p.log.info(m),
    step: (m) => p.log.step(m),
    success: (m) => p.log.success(m),
    warn: (m) => p.log.warn(m),
    error: (m) => p.log.error(m),
  };
}
