import { Command } from 'commander';
import chalk from 'chalk';
import { globalOpts, unwrap, withManager } from '../session.js';
import { trackerJson } from '../format.js';

export function addCmd(program: Command): void {
  program.command('add <name...>').description('Add a tracker')
    .action(async (words: string[]) => {
      await withManager(program, (manager) => {
        const id = unwrap(manager.createTracker(words.join(' ')));
        const tracker = unwrap(manager.getTracker(id));
        if (globalOpts(program).json) {
          console.log(JSON.stringify(trackerJson(tracker), null, 2));
          return;
        }
        console.log(chalk.green(`✓ Added: ${tracker.name} (id ${id})`));
      });
    });
}
