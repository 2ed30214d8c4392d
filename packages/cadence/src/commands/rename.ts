import { Command } from 'commander';
import chalk from 'chalk';
import { pageIndex, resolveTarget, unwrap, withManager } from '../session.js';

export function renameCmd(program: Command): void {
  program.command('rename <target> <name...>').description('Rename a tracker')
    .option('--page <n>', 'Page the tag belongs to')
    .action(async (target: string, words: string[], opts: { page?: string }) => {
      await withManager(program, (manager) => {
        const id = resolveTarget(manager, target, pageIndex(opts.page));
        const tracker = unwrap(manager.renameTracker(id, words.join(' ')));
        console.log(chalk.green(`✓ Renamed tracker ${id} to ${tracker.name}`));
      });
    });
}
