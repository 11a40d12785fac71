import { Command } from 'commander';
import { IntelCommand } from './intel-command';
import type { IntelImportOptions, IntelShowOptions } from './intel-command';

export function registerIntelCommands(program: Command): void {
  const intelCommand = new IntelCommand();

  const intel = program
    .command('intel')
    .description('Import and inspect threat intelligence (CISA KEV, EPSS)');

  // vulnrank intel import --kev known_exploited_vulnerabilities.json --epss epss_scores.csv
  intel
    .command('import')
    .description('Import already downloaded KEV catalog and EPSS score files')
    .option('--kev <file>', 'CISA KEV catalog JSON')
    .option('--epss <file>', 'EPSS scores CSV')
    .option('--json', 'Output as JSON')
    .option('-v, --verbose', 'Verbose output')
    .option('-q, --quiet', 'Quiet output')
    .action(async (options: IntelImportOptions) => {
      await intelCommand.executeImport(options);
    });

  intel
    .command('show <cveId>')
    .description('Show the intelligence used when scoring a CVE')
    .option('--json', 'Output as JSON')
    .option('-v, --verbose', 'Verbose output')
    .option('-q, --quiet', 'Quiet output')
    .action(async (cveId: string, options: IntelShowOptions) => {
      await intelCommand.executeShow(cveId, options);
    });
}
