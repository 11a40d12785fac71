import { Command } from 'commander';
import { AssessCommand } from './assess-command';
import type { AssessCommandOptions } from './assess-command';

export function registerAssessCommands(program: Command): void {
  const assessCommand = new AssessCommand();

  program
    .command('assess')
    .description('Score all stored vulnerabilities with asset context and threat intelligence')
    .option('--no-persist', 'Do not save the assessments')
    .option('-l, --limit <n>', 'Number of top risks to show', '20')
    .option('--json', 'Output as JSON')
    .option('-v, --verbose', 'Verbose output')
    .option('-q, --quiet', 'Quiet output')
    .action(async (options: AssessCommandOptions) => {
      await assessCommand.execute(options);
    });
}
