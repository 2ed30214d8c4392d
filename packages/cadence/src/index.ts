export * from './errors.js';
export * from './types.js';
export {
  parseDatetime, parseDuration, parseCompletion, formatDuration, formatTimestamp, parseTimestamp, formatCompletion,
  SECOND_MS, MINUTE_MS, HOUR_MS, DAY_MS,
} from './time-parser.js';
export { computeStats, DEFAULT_SPREAD_MULTIPLIER } from './stats.js';
export { Tracker, DEFAULT_MAX_HISTORY, type TrackerOptions } from './tracker.js';
export { TrackerManager, TAGS, PAGE_SIZE, type ManagerOptions } from './manager.js';
export { JsonFileStore, STORE_VERSION, emptyRoot, parseStoreDocument, type StoreRoot, type TrackerStore } from './store.js';
export { toBackup, fromBackup, readBackupFile, writeBackupFile, type BackupDocument, type BackupEntry } from './backup.js';
export { loadConfig, parseConfig, initConfig, defaultConfigDir, getConfigPath, type CadenceConfig } from './config.js';
export { configureLogging, log, type LogLevel } from './log.js';
export { createProgram } from './program.js';
