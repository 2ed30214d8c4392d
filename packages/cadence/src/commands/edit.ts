import { Command } from 'commander';
import chalk from 'chalk';
import { ParseError } from '../errors.js';
import { globalOpts, pageIndex, resolveTarget, unwrap, withManager } from '../session.js';
import { formatTrackerInfo, trackerJson } from '../format.js';
import type { HistoryAction } from '../types.js';

interface EditOpts {
  page?: string;
  delete?: boolean;
  replace?: string;
}

export function editCmd(program: Command): void {
  program.command('edit <target> <entry>')
    .description('Delete or replace history entry <entry> (numbered from 1 as in `show`)')
    .option('--page <n>', 'Page the tag belongs to')
    .option('--delete', 'Delete the entry')
    .option('--replace <completion>', 'Replace the entry, e.g. "2024-05-01 9:00, +2h"')
    .action(async (target: string, entry: string, opts: EditOpts) => {
      await withManager(program, (manager) => {
        if (Boolean(opts.delete) === (opts.replace !== undefined)) {
          throw new ParseError('Give exactly one of --delete or --replace <completion>');
        }
        const n = Number(entry);
        if (!Number.isInteger(n)) throw new ParseError(`Invalid history entry '${entry}'`);
        const action: HistoryAction = opts.replace !== undefined
          ? { kind: 'replace', completion: opts.replace }
          : { kind: 'delete' };
        const id = resolveTarget(manager, target, pageIndex(opts.page));
        const tracker = unwrap(manager.editHistory(id, n - 1, action));
        if (globalOpts(program).json) {
          console.log(JSON.stringify(trackerJson(tracker), null, 2));
          return;
        }
        console.log(chalk.green(`✓ ${action.kind === 'delete' ? 'Deleted' : 'Replaced'} entry ${n}`));
        console.log(formatTrackerInfo(tracker));
      });
    });
}
