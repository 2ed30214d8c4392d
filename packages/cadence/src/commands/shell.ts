import { Command } from 'commander';
import { withManager } from '../session.js';
import { runShell } from '../shell.js';

export function shellCmd(program: Command): void {
  program.command('shell').description('Interactive mode: list, record and edit by tag')
    .action(async () => {
      await withManager(program, (manager, config) =>
        runShell(manager, { now: () => new Date(), backupFile: config.backup.file }));
    });
}
