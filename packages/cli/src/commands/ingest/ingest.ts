import { Command } from 'commander';
import { IngestCommand } from './ingest-command';
import type { IngestCommandOptions } from './ingest-command';

export function registerIngestCommands(program: Command): void {
  const ingestCommand = new IngestCommand();

  // vulnrank ingest -s scan.json
  program
    .command('ingest')
    .description('Ingest vulnerabilities from a JSON/CSV file or an API endpoint')
    .requiredOption('-s, --source <source>', 'File path or http(s) URL')
    .option('-t, --type <type>', 'Source format: auto, json, csv or api', 'auto')
    .option('--json', 'Output as JSON')
    .option('-v, --verbose', 'Verbose output')
    .option('-q, --quiet', 'Quiet output')
    .action(async (options: IngestCommandOptions) => {
      await ingestCommand.execute(options);
    });
}
