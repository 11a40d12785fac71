import { Command } from 'commander';
import { SimpleCommand } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';

export interface IngestCommandOptions extends BaseCommandOptions {
  source: string;
  type: string;
}

/**
 * IngestCommand - reads a scanner export or API response into the vulnerability store.
 */
export class IngestCommand extends SimpleCommand<IngestCommandOptions> {

  register(_program: Command): void {
    // Registration handled by registerIngestCommands() in ingest.ts
  }

  async execute(options: IngestCommandOptions): Promise<void> {
    await this.run(options, 'Failed to ingest', async () => {
      const ingester = await this.dependencyService.getIngester();
      const { vulnerabilities } = await this.dependencyService.getStores();

      const raws = await ingester.ingestSource(options.source, options.type);
      const result = await ingester.ingestInto(vulnerabilities, raws);

      const details = result.skipped > 0 ? [`   Skipped ${result.skipped} records without an id`] : [];
      this.handleSuccess(
        { source: options.source, ...result },
        options,
        `Ingested ${result.count} vulnerabilities from ${options.source}`,
        details
      );
    });
  }
}
