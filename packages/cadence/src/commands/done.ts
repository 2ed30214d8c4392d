import { Command } from 'commander';
import chalk from 'chalk';
import { globalOpts, pageIndex, resolveTarget, unwrap, withManager } from '../session.js';
import { parseCompletion, formatCompletion } from '../time-parser.js';
import { formatTrackerInfo, trackerJson } from '../format.js';

export function doneCmd(program: Command): void {
  program.command('done <target> [when...]')
    .description('Record a completion, e.g. `done a yesterday 18:00, -1d` (default: now)')
    .option('--page <n>', 'Page the tag belongs to')
    // Negative deviations such as -1d would otherwise be read as options.
    .allowUnknownOption()
    .action(async (target: string, when: string[], opts: { page?: string }) => {
      await withManager(program, (manager) => {
        const id = resolveTarget(manager, target, pageIndex(opts.page));
        const completion = unwrap(parseCompletion(when.join(' ') || 'now'));
        const before = unwrap(manager.getStats(id)).lastCompletion;
        const tracker = unwrap(manager.recordCompletion(id, completion));
        if (globalOpts(program).json) {
          console.log(JSON.stringify(trackerJson(tracker), null, 2));
          return;
        }
        console.log(chalk.green(`✓ Recorded ${formatCompletion(completion)} for ${tracker.name}`));
        if (before && completion.occurredAt < before.occurredAt) {
          console.log(chalk.yellow('  Earlier than the last completion; sorted into the history.'));
        }
        console.log(formatTrackerInfo(tracker));
      });
    });
}
