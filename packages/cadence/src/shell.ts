import * as readline from 'readline/promises';
import chalk from 'chalk';
import type { TrackerManager } from './manager.js';
import { parseCompletion } from './time-parser.js';
import { writeBackupFile } from './backup.js';
import { formatPage, formatTrackerInfo } from './format.js';
import { isYes } from './prompt.js';
import type { HistoryAction } from './types.js';

export type ShellMode = 'list' | 'info' | 'quit';

export interface ShellReply {
  mode: ShellMode;
  output: string;
  /** Set when the command needs a yes/no answer before it runs. */
  confirm?: { question: string; run: () => string };
}

export interface ShellContext {
  now: () => Date;
  backupFile: string | null;
}

export const SHELL_HELP = [
  'l            list the active page',
  '> < 0        next, previous, first page',
  'r            reverse the sort order',
  'n NAME       new tracker',
  'c TAG [WHEN] record a completion, e.g. "c a yesterday 9am, -2h"',
  'i TAG        tracker details',
  'e TAG N d    delete history entry N',
  'e TAG N WHEN replace history entry N',
  'm TAG NAME   rename',
  'd TAG        delete tracker',
  'b            write a backup',
  '?            this help',
  'q            quit',
].join('\n');

function listing(manager: TrackerManager, ctx: ShellContext, message?: string): ShellReply {
  const entries = manager.listPage(manager.activePage);
  const page = formatPage(entries, manager.activePage, manager.pageCount(), manager.sortDirection, ctx.now());
  return { mode: 'list', output: message ? `${message}\n${page}` : page };
}

function failure(mode: ShellMode, message: string): ShellReply {
  return { mode, output: chalk.red(message) };
}

/** Run one shell command line against the manager. */
export function interpret(manager: TrackerManager, line: string, ctx: ShellContext): ShellReply {
  const trimmed = line.trim();
  const [cmd = '', ...rest] = trimmed.split(/\s+/);
  const args = rest.join(' ');

  const target = (tag: string | undefined): number | string => {
    if (!tag) return 'Which tracker? Give its tag.';
    const id = manager.resolveTag(manager.activePage, tag.toLowerCase());
    return id ?? `No tracker tagged '${tag}' on this page.`;
  };

  switch (cmd) {
    case '':
    case 'l':
      return listing(manager, ctx);
    case '>':
      return manager.nextPage() ? listing(manager, ctx) : listing(manager, ctx, chalk.gray('Already on the last page.'));
    case '<':
      return manager.previousPage() ? listing(manager, ctx) : listing(manager, ctx, chalk.gray('Already on the first page.'));
    case '0':
      manager.firstPage();
      return listing(manager, ctx);
    case 'r':
      manager.toggleSortDirection();
      return listing(manager, ctx);
    case '?':
      return { mode: 'info', output: SHELL_HELP };
    case 'q':
      return { mode: 'quit', output: '' };
    case 'n': {
      const created = manager.createTracker(args);
      if (!created.ok) return failure('list', created.error.message);
      return listing(manager, ctx, chalk.green(`✓ Added tracker ${created.value}`));
    }
    case 'i': {
      const id = target(rest[0]);
      if (typeof id === 'string') return failure('list', id);
      const tracker = manager.getTracker(id);
      if (!tracker.ok) return failure('list', tracker.error.message);
      return { mode: 'info', output: formatTrackerInfo(tracker.value) };
    }
    case 'c': {
      const id = target(rest[0]);
      if (typeof id === 'string') return failure('list', id);
      const when = rest.slice(1).join(' ') || 'now';
      const completion = parseCompletion(when, ctx.now());
      if (!completion.ok) return failure('list', completion.error.message);
      const recorded = manager.recordCompletion(id, completion.value);
      if (!recorded.ok) return failure('list', recorded.error.message);
      return { mode: 'info', output: `${chalk.green('✓ Recorded completion')}\n${formatTrackerInfo(recorded.value)}` };
    }
    case 'e': {
      const id = target(rest[0]);
      if (typeof id === 'string') return failure('list', id);
      const n = Number(rest[1]);
      if (!Number.isInteger(n)) return failure('list', 'Which history entry? Give its number.');
      const what = rest.slice(2).join(' ');
      if (!what) return failure('list', 'Give d to delete the entry or a replacement completion.');
      const action: HistoryAction = what === 'd' ? { kind: 'delete' } : { kind: 'replace', completion: what };
      const edited = manager.editHistory(id, n - 1, action);
      if (!edited.ok) return failure('list', edited.error.message);
      return { mode: 'info', output: `${chalk.green('✓ History updated')}\n${formatTrackerInfo(edited.value)}` };
    }
    case 'm': {
      const id = target(rest[0]);
      if (typeof id === 'string') return failure('list', id);
      const renamed = manager.renameTracker(id, rest.slice(1).join(' '));
      if (!renamed.ok) return failure('list', renamed.error.message);
      return listing(manager, ctx, chalk.green(`✓ Renamed to ${renamed.value.name}`));
    }
    case 'd': {
      const id = target(rest[0]);
      if (typeof id === 'string') return failure('list', id);
      const tracker = manager.getTracker(id);
      if (!tracker.ok) return failure('list', tracker.error.message);
      return {
        mode: 'list',
        output: '',
        confirm: {
          question: `Delete '${tracker.value.name}'?`,
          run: () => {
            const deleted = manager.deleteTracker(id);
            if (!deleted.ok) return chalk.red(deleted.error.message);
            return listing(manager, ctx, chalk.green(`✓ Deleted ${tracker.value.name}`)).output;
          },
        },
      };
    }
    case 'b': {
      if (!ctx.backupFile) return failure('list', 'No backup file configured.');
      const written = writeBackupFile(ctx.backupFile, manager.exportBackup());
      if (!written.ok) return failure('list', written.error.message);
      return { mode: 'list', output: chalk.green(`✓ Backup written to ${written.value}`) };
    }
    default:
      return failure('list', `Unknown command '${cmd}'. Type ? for help.`);
  }
}

/** Read commands from the terminal until `q` or end of input. */
export async function runShell(manager: TrackerManager, ctx: ShellContext): Promise<void> {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  let ended = false;
  rl.on('close', () => { ended = true; });
  try {
    console.log(interpret(manager, 'l', ctx).output);
    while (!ended) {
      const line = await rl.question(chalk.cyan('cadence> '));
      const reply = interpret(manager, line, ctx);
      if (reply.mode === 'quit') break;
      if (reply.confirm) {
        const answer = await rl.question(`${reply.confirm.question} (y/N) `);
        console.log(isYes(answer) ? reply.confirm.run() : chalk.gray('Cancelled.'));
        continue;
      }
      if (reply.output) console.log(reply.output);
    }
  } catch (e) {
    // Ctrl-D while a question is pending rejects the question; that ends the session.
    if (!ended) throw e;
  } finally {
    rl.close();
  }
}
