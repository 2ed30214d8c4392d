import { Command } from 'commander';
import { registerCommands } from './commands/index.js';

export function createProgram(configure: (program: Command) => void = () => {}): Command {
  const program = new Command();
  program
    .name('cadence')
    .description('Track recurring tasks and predict when each is due next.')
    .version('0.1.0')
    .option('--config <dir>', 'config directory (default: $CADENCE_HOME or ~/.cadence)')
    .option('--json', 'output as JSON');
  // Settings such as exitOverride are copied into sub-commands when they are created.
  configure(program);
  registerCommands(program);
  return program;
}
