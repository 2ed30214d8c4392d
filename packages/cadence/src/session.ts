import { Command } from 'commander';
import chalk from 'chalk';
import { TrackerManager } from './manager.js';
import { loadConfig, defaultConfigDir, type CadenceConfig } from './config.js';
import { writeBackupFile } from './backup.js';
import { configureLogging, log } from './log.js';
import { CadenceError, NotFoundError, ParseError, describeError, type Result } from './errors.js';

export type GlobalOpts = {
  config?: string;
  json?: boolean;
};

export function globalOpts(program: Command): GlobalOpts {
  return program.opts<GlobalOpts>();
}

export function unwrap<T>(result: Result<T>): T {
  if (!result.ok) throw result.error;
  return result.value;
}

export function report(e: unknown): void {
  if (!(e instanceof CadenceError)) log.debug(e instanceof Error && e.stack ? e.stack : String(e));
  console.error(chalk.red(describeError(e)));
  process.exitCode = 1;
}

export function loadSettings(program: Command): CadenceConfig {
  const config = unwrap(loadConfig(globalOpts(program).config ?? defaultConfigDir()));
  configureLogging({ level: config.log.level, file: config.log.file });
  return config;
}

/**
 * Open the configured store, run `fn` and close the store again, whatever
 * happens in between. Errors are printed and turn into exit status 1.
 */
export async function withManager(
  program: Command,
  fn: (manager: TrackerManager, config: CadenceConfig) => void | Promise<void>,
): Promise<void> {
  let opened: { config: CadenceConfig; manager: TrackerManager } | null = null;
  try {
    const config = loadSettings(program);
    const manager = unwrap(TrackerManager.openFile(config.storeFile, {
      spreadMultiplier: config.spread,
      maxHistory: config.maxHistory,
      sortDirection: config.nextFirst ? 'next-first' : 'next-last',
    }));
    opened = { config, manager };
  } catch (e) {
    report(e);
  }
  if (!opened) return;

  const { config, manager } = opened;
  try {
    if (config.backup.onOpen && manager.count > 0) {
      const written = writeBackupFile(config.backup.file, manager.exportBackup());
      if (!written.ok) log.warn(written.error.message);
      else log.debug(`Backup written to ${written.value}`);
    }
    await fn(manager, config);
  } catch (e) {
    report(e);
  } finally {
    const closed = manager.close();
    if (!closed.ok) report(closed.error);
  }
}

/** 1-based page option to a 0-based page index. */
export function pageIndex(value: string | undefined): number {
  if (value === undefined) return 0;
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) throw new ParseError(`Invalid page '${value}'`);
  return n - 1;
}

/** A target is a tag on the given page (`a`–`z`) or a numeric tracker id. */
export function resolveTarget(manager: TrackerManager, target: string, page: number): number {
  if (/^\d+$/.test(target)) {
    const id = Number(target);
    unwrap(manager.getTracker(id));
    return id;
  }
  if (/^[a-z]$/i.test(target)) {
    manager.listPage(page);
    const id = manager.resolveTag(page, target.toLowerCase());
    if (id === undefined) throw new NotFoundError(target, `No tracker tagged '${target}' on page ${page + 1}`);
    return id;
  }
  throw new ParseError(`'${target}' is neither a tag (a-z) nor a tracker id`);
}
