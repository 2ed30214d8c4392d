import { Command } from 'commander';
import chalk from 'chalk';
import { pageIndex, resolveTarget, unwrap, withManager } from '../session.js';
import { confirm } from '../prompt.js';

export function deleteCmd(program: Command): void {
  program.command('delete <target>').alias('rm').description('Delete a tracker and its history')
    .option('--page <n>', 'Page the tag belongs to')
    .option('-y, --yes', 'Do not ask for confirmation')
    .action(async (target: string, opts: { page?: string; yes?: boolean }) => {
      await withManager(program, async (manager) => {
        const id = resolveTarget(manager, target, pageIndex(opts.page));
        const tracker = unwrap(manager.getTracker(id));
        if (!opts.yes && !(await confirm(`Delete '${tracker.name}' and its ${tracker.history.length} completions?`))) {
          console.log(chalk.gray('Cancelled.'));
          return;
        }
        unwrap(manager.deleteTracker(id));
        console.log(chalk.green(`✓ Deleted ${tracker.name} (id ${id})`));
      });
    });
}
