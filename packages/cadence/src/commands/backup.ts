import { Command } from 'commander';
import chalk from 'chalk';
import { globalOpts, report, unwrap, withManager } from '../session.js';
import { fromBackup, readBackupFile, writeBackupFile } from '../backup.js';
import { confirm } from '../prompt.js';

export function backupCmd(program: Command): void {
  program.command('backup [file]').description('Write all trackers to a backup file (default from config.yaml)')
    .action(async (file: string | undefined) => {
      await withManager(program, (manager, config) => {
        const doc = manager.exportBackup();
        if (globalOpts(program).json) {
          console.log(JSON.stringify(doc, null, 3));
          return;
        }
        const written = unwrap(writeBackupFile(file ?? config.backup.file, doc));
        console.log(chalk.green(`✓ Backed up ${Object.keys(doc).length} trackers to ${written}`));
      });
    });
}

export function restoreCmd(program: Command): void {
  program.command('restore <file>').description('Replace all trackers with the contents of a backup file')
    .option('-y, --yes', 'Do not ask for confirmation')
    .action(async (file: string, opts: { yes?: boolean }) => {
      // Read before opening: opening the store may overwrite the configured backup file.
      const data = readBackupFile(file);
      if (!data.ok) return report(data.error);
      const records = fromBackup(data.value);
      if (!records.ok) return report(records.error);

      await withManager(program, async (manager) => {
        const question = `Replace ${manager.count} trackers with ${records.value.length} from ${file}?`;
        if (!opts.yes && !(await confirm(question))) {
          console.log(chalk.gray('Cancelled.'));
          return;
        }
        const restored = unwrap(manager.restoreBackup(data.value));
        console.log(chalk.green(`✓ Restored ${restored} trackers`));
      });
    });
}
