import * as fs from 'fs';
import chalk from 'chalk';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const rank: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

const levelColor: Record<Exclude<LogLevel, 'silent'>, (s: string) => string> = {
  debug: chalk.gray,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red,
};

let threshold: LogLevel = 'warn';
let logFile: string | null = null;

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

export function configureLogging(opts: { level?: LogLevel; file?: string | null }): void {
  if (opts.level) threshold = opts.level;
  if (opts.file !== undefined) logFile = opts.file;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

function stamp(): string {
  const d = new Date();
  const p = (n: number) => String(n).padStart(2, '0');
  return `${d.getFullYear()}-${p(d.getMonth() + 1)}-${p(d.getDate())} ${p(d.getHours())}:${p(d.getMinutes())}:${p(d.getSeconds())}`;
}

function write(level: Exclude<LogLevel, 'silent'>, message: string): void {
  if (rank[level] < rank[threshold]) return;
  const line = `${stamp()} [${level.toUpperCase()}] ${message}`;
  console.error(levelColor[level](line));
  if (logFile) {
    try {
      fs.appendFileSync(logFile, line + '\n');
    } catch (e) {
      logFile = null;
      console.error(chalk.red(`Log file disabled: ${e instanceof Error ? e.message : String(e)}`));
    }
  }
}

export const log = {
  debug: (message: string) => write('debug', message),
  info: (message: string) => write('info', message),
  warn: (message: string) => write('warn', message),
  error: (message: string) => write('error', message),
};
