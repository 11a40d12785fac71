import { Command } from 'commander';
import { ScoreCommand } from './score-command';
import type { ScoreCommandOptions } from './score-command';

export function registerScoreCommands(program: Command): void {
  const scoreCommand = new ScoreCommand();

  // vulnrank score --cvss 7.5 --criticality HIGH --exposure INTERNET_FACING --exploit
  program
    .command('score')
    .description('Score a single vulnerability from the command line')
    .requiredOption('--cvss <score>', 'CVSS base score (0-10)')
    .option('--criticality <tier>', 'Asset criticality: LOW, MEDIUM, HIGH or CRITICAL')
    .option('--exposure <tier>', 'Asset exposure: INTERNAL, EXTERNAL, INTERNET_FACING or PUBLICLY_ACCESSIBLE')
    .option('--exploit', 'A public exploit exists')
    .option('--in-wild', 'Exploitation has been observed in the wild')
    .option('--published <date>', 'Publication date (ISO 8601)')
    .option('--json', 'Output as JSON')
    .option('-v, --verbose', 'Verbose output')
    .option('-q, --quiet', 'Quiet output')
    .action(async (options: ScoreCommandOptions) => {
      await scoreCommand.execute(options);
    });
}
