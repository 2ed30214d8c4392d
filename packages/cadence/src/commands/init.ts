import { Command } from 'commander';
import chalk from 'chalk';
import { initConfig, defaultConfigDir } from '../config.js';
import { globalOpts, report, withManager } from '../session.js';

export function initCmd(program: Command): void {
  program.command('init').description('Create the config directory, config.yaml and an empty store')
    .action(async () => {
      const init = initConfig(globalOpts(program).config ?? defaultConfigDir());
      if (!init.ok) {
        report(init.error);
        return;
      }
      const { file, created } = init.value;
      await withManager(program, (manager, config) => {
        console.log(created ? chalk.green(`✓ Wrote ${file}`) : chalk.gray(`${file} already exists.`));
        console.log(chalk.green(`✓ Store ready at ${config.storeFile} (${manager.count} trackers)`));
      });
    });
}
