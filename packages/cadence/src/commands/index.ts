import { Command } from 'commander';
import { initCmd } from './init.js';
import { addCmd } from './add.js';
import { listCmd } from './list.js';
import { showCmd } from './show.js';
import { doneCmd } from './done.js';
import { editCmd } from './edit.js';
import { renameCmd } from './rename.js';
import { deleteCmd } from './delete.js';
import { backupCmd, restoreCmd } from './backup.js';
import { shellCmd } from './shell.js';

export function registerCommands(program: Command): void {
  initCmd(program);
  addCmd(program);
  listCmd(program);
  showCmd(program);
  doneCmd(program);
  editCmd(program);
  renameCmd(program);
  deleteCmd(program);
  backupCmd(program);
  restoreCmd(program);
  shellCmd(program);
}
