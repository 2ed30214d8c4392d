import { Command } from 'commander';
import { globalOpts, pageIndex, withManager } from '../session.js';
import { formatPage, trackerJson } from '../format.js';

interface ListOpts {
  page?: string;
  reverse?: boolean;
}

export function listCmd(program: Command): void {
  program.command('list').alias('ls').description('List trackers, soonest due first')
    .option('--page <n>', 'Page number (26 trackers per page)')
    .option('--reverse', 'Put trackers without a prediction first')
    .action(async (opts: ListOpts) => {
      await withManager(program, (manager) => {
        if (opts.reverse) manager.toggleSortDirection();
        const page = pageIndex(opts.page);
        const entries = manager.listPage(page);
        if (globalOpts(program).json) {
          console.log(JSON.stringify(entries.map(e => ({ tag: e.tag, ...trackerJson(e.tracker) })), null, 2));
          return;
        }
        console.log(formatPage(entries, page, manager.pageCount(), manager.sortDirection));
      });
    });
}
