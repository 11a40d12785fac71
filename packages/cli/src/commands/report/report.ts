import { Command } from 'commander';
import { ReportCommand } from './report-command';
import type { ReportCommandOptions } from './report-command';

export function registerReportCommands(program: Command): void {
  const reportCommand = new ReportCommand();

  // vulnrank report -t technical -f json
  program
    .command('report')
    .description('Generate a vulnerability risk report')
    .option('-t, --type <type>', 'Report type: executive or technical', 'executive')
    .option('-f, --format <format>', 'Output format: markdown or json', 'markdown')
    .option('--fresh', 'Re-assess before reporting instead of using saved assessments')
    .option('--json', 'Output as JSON')
    .option('-v, --verbose', 'Verbose output')
    .option('-q, --quiet', 'Quiet output')
    .action(async (options: ReportCommandOptions) => {
      await reportCommand.execute(options);
    });
}
