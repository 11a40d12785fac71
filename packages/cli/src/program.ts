import { Command } from 'commander';
import { registerAssessCommands } from './commands/assess/assess';
import { registerAssetCommands } from './commands/asset/asset';
import { registerIngestCommands } from './commands/ingest/ingest';
import { registerInitCommands } from './commands/init/init';
import { registerIntelCommands } from './commands/intel/intel';
import { registerReportCommands } from './commands/report/report';
import { registerScoreCommands } from './commands/score/score';

export const CLI_VERSION = '1.0.0';

/**
 * Builds the vulnrank program with every command registered.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('vulnrank')
    .description('Risk-based vulnerability prioritization with asset context and threat intelligence')
    .version(CLI_VERSION);

  registerInitCommands(program);
  registerIngestCommands(program);
  registerAssetCommands(program);
  registerIntelCommands(program);
  registerScoreCommands(program);
  registerAssessCommands(program);
  registerReportCommands(program);

  return program;
}
