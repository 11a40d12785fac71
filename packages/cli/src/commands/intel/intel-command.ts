import { Command } from 'commander';
import { Intel } from '@vulnrank/core';
import { BaseCommand } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';

export interface IntelImportOptions extends BaseCommandOptions {
  kev?: string;
  epss?: string;
}

export interface IntelShowOptions extends BaseCommandOptions {}

export class IntelCommand extends BaseCommand {

  register(_program: Command): void {
    // Registration handled by registerIntelCommands() in intel.ts
  }

  async executeImport(options: IntelImportOptions): Promise<void> {
    if (!options.kev && !options.epss) {
      this.handleError('Nothing to import. Provide --kev and/or --epss.', options);
      return;
    }

    await this.run(options, 'Failed to import threat intelligence', async () => {
      const kev = options.kev ? await Intel.loadKevCatalogFile(options.kev) : [];
      const epss = options.epss ? await Intel.loadEpssFile(options.epss) : { entries: [], skipped: 0 };

      const importer = await this.dependencyService.getThreatIntelImporter();
      const summary = await importer.import({ kev, epss: epss.entries });

      const details = [
        `   KEV entries: ${summary.kevEntries}`,
        `   EPSS entries: ${summary.epssEntries}`,
        ...(epss.skipped > 0 ? [`   Skipped ${epss.skipped} unusable EPSS rows`] : []),
      ];
      this.handleSuccess(
        { ...summary, epssSkipped: epss.skipped },
        options,
        `Imported intelligence for ${summary.total} CVEs`,
        details
      );
    });
  }

  async executeShow(cveId: string, options: IntelShowOptions): Promise<void> {
    await this.run(options, 'Failed to show intelligence', async () => {
      const { intel } = await this.dependencyService.getStores();
      const provider = await this.dependencyService.getIntelligenceProvider();

      const record = await intel.get(cveId);
      const signals = await provider.getIntelligence(cveId);

      const details = [
        `   Known exploited: ${signals.inWild ? 'yes' : 'no'}`,
        `   EPSS: ${signals.epss.toFixed(5)}${record?.epss === undefined ? ' (default)' : ''}`,
      ];
      if (record?.kevDateAdded) details.push(`   KEV since: ${record.kevDateAdded}`);
      if (record?.ransomwareUse) details.push('   Used in ransomware campaigns');

      this.handleSuccess({ cveId, record, signals }, options, `Intelligence for ${cveId}`, details);
    });
  }
}
