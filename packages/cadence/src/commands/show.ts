import { Command } from 'commander';
import { globalOpts, pageIndex, resolveTarget, unwrap, withManager } from '../session.js';
import { formatTrackerInfo, trackerJson } from '../format.js';

export function showCmd(program: Command): void {
  program.command('show <target>').description('Show a tracker with its history and prediction (target: tag or id)')
    .option('--page <n>', 'Page the tag belongs to')
    .action(async (target: string, opts: { page?: string }) => {
      await withManager(program, (manager) => {
        const id = resolveTarget(manager, target, pageIndex(opts.page));
        const tracker = unwrap(manager.getTracker(id));
        if (globalOpts(program).json) {
          console.log(JSON.stringify(trackerJson(tracker), null, 2));
          return;
        }
        console.log(formatTrackerInfo(tracker));
      });
    });
}
