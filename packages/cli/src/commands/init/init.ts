import { Command } from 'commander';
import { InitCommand } from './init-command';
import type { InitCommandOptions } from './init-command';

/**
 * Registers the init command
 */
export function registerInitCommands(program: Command): void {
  const initCommand = new InitCommand();

  program
    .command('init')
    .description('Write a default vulnrank.yaml and create the record store')
    .option('-f, --force', 'Overwrite an existing vulnrank.yaml')
    .option('--json', 'Output in JSON format for automation')
    .option('-v, --verbose', 'Show debug logging and error details')
    .option('-q, --quiet', 'Minimal output for scripting')
    .action(async (options: InitCommandOptions) => {
      await initCommand.execute(options);
    });
}
