import chalk from 'chalk';

export type LogLevel = 'info' | 'warn' | 'error' | 'debug';

let verboseEnabled = false;

export const setVerbose = (enabled: boolean) => {
  verboseEnabled = enabled;
};

const PREFIXES: Record<LogLevel, string> = {
  info: chalk.blue('info'),
  warn: chalk.yellow('warn'),
  error: chalk.red('error'),
  debug: chalk.gray('debug'),
};

export const log = (level: LogLevel, message: string) => {
  if (level === 'debug' && !verboseEnabled) return;

  const line = `${PREFIXES[level]} ${message}`;
  if (level === 'error') {
    console.error(line);
  } else {
    console.log(line);
  }
};

export const warn = (message: string) => log('warn', message);
export const error = (message: string) => log('error', message);
export const debug = (message: string) => log('debug', message);
