import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { z } from 'zod';
import { ConfigError, describeError, ok, err, type Result } from './errors.js';
import { LOG_LEVELS, isLogLevel, type LogLevel } from './log.js';
import { DEFAULT_SPREAD_MULTIPLIER } from './stats.js';
import { DEFAULT_MAX_HISTORY } from './tracker.js';

const CONFIG_FILE = 'config.yaml';

export interface CadenceConfig {
  dir: string;
  storeFile: string;
  spread: number;
  maxHistory: number;
  nextFirst: boolean;
  backup: { file: string; onOpen: boolean };
  log: { level: LogLevel; file: string | null };
}

const configSchema = z.object({
  store: z.string().min(1).default('trackers.json'),
  spread: z.number().finite().nonnegative().default(DEFAULT_SPREAD_MULTIPLIER),
  history: z.object({
    max: z.number().int().min(1).max(1000).default(DEFAULT_MAX_HISTORY),
  }).default({}),
  list: z.object({
    nextFirst: z.boolean().default(true),
  }).default({}),
  backup: z.object({
    file: z.string().min(1).default('backup.json'),
    onOpen: z.boolean().default(true),
  }).default({}),
  log: z.object({
    level: z.enum(LOG_LEVELS).default('warn'),
    file: z.string().min(1).nullable().default(null),
  }).default({}),
});

export type ConfigFile = z.input<typeof configSchema>;

export function defaultConfigDir(): string {
  return process.env.CADENCE_HOME || path.join(os.homedir(), '.cadence');
}

export function getConfigPath(dir: string): string {
  return path.join(dir, CONFIG_FILE);
}

function resolveIn(dir: string, p: string): string {
  if (p === '~' || p.startsWith('~/')) return path.join(os.homedir(), p.slice(1));
  return path.resolve(dir, p);
}

/** Parse config YAML text. Missing keys take defaults, unknown keys are dropped. */
export function parseConfig(text: string, dir: string, env: NodeJS.ProcessEnv = process.env): Result<CadenceConfig, ConfigError> {
  let data: unknown;
  try {
    data = yaml.load(text) ?? {};
  } catch (e) {
    return err(new ConfigError(`Invalid YAML in ${getConfigPath(dir)}: ${describeError(e)}`));
  }
  const parsed = configSchema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return err(new ConfigError(`Invalid ${getConfigPath(dir)}: ${issue.path.join('.') || '(root)'}: ${issue.message}`));
  }
  const c = parsed.data;
  const envLevel = env.CADENCE_LOG?.toLowerCase();
  return ok({
    dir,
    storeFile: resolveIn(dir, c.store),
    spread: c.spread,
    maxHistory: c.history.max,
    nextFirst: c.list.nextFirst,
    backup: { file: resolveIn(dir, c.backup.file), onOpen: c.backup.onOpen },
    log: {
      level: envLevel && isLogLevel(envLevel) ? envLevel : c.log.level,
      file: c.log.file ? resolveIn(dir, c.log.file) : null,
    },
  });
}

/** A missing config file means all defaults. */
export function loadConfig(dir: string = defaultConfigDir()): Result<CadenceConfig, ConfigError> {
  const file = getConfigPath(dir);
  let text = '';
  try {
    text = fs.readFileSync(file, 'utf-8');
  } catch (e) {
    if (!(e instanceof Error && 'code' in e && e.code === 'ENOENT')) {
      return err(new ConfigError(`Cannot read ${file}: ${describeError(e)}`));
    }
  }
  return parseConfig(text, dir);
}

export function initConfig(dir: string = defaultConfigDir()): Result<{ file: string; created: boolean }, ConfigError> {
  const file = getConfigPath(dir);
  try {
    fs.mkdirSync(dir, { recursive: true });
    if (fs.existsSync(file)) return ok({ file, created: false });
    const defaults: ConfigFile = {
      store: 'trackers.json',
      spread: DEFAULT_SPREAD_MULTIPLIER,
      history: { max: DEFAULT_MAX_HISTORY },
      list: { nextFirst: true },
      backup: { file: 'backup.json', onOpen: true },
      log: { level: 'warn', file: null },
    };
    fs.writeFileSync(file, yaml.dump(defaults));
    return ok({ file, created: true });
  } catch (e) {
    return err(new ConfigError(`Cannot initialize ${dir}: ${describeError(e)}`));
  }
}
