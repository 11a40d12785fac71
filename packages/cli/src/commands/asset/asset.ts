import { Command } from 'commander';
import { AssetCommand } from './asset-command';
import type { AssetAddOptions, AssetContextOptions, AssetListOptions } from './asset-command';

export function registerAssetCommands(program: Command): void {
  const assetCommand = new AssetCommand();

  const asset = program
    .command('asset')
    .description('Manage the asset inventory used for context');

  // vulnrank asset add web-01 --type "payment gateway" --ip 203.0.113.10
  asset
    .command('add <assetId>')
    .description('Register or update an asset')
    .requiredOption('-t, --type <type>', 'Asset type, e.g. "payment gateway" or "database"')
    .option('--ip <ips...>', 'IP addresses (repeat or comma-separate)')
    .option('--function <functions...>', 'Business functions the asset supports')
    .option('--exposure <tier>', 'Declared exposure: INTERNAL, EXTERNAL, INTERNET_FACING or PUBLICLY_ACCESSIBLE')
    .option('--json', 'Output as JSON')
    .option('-v, --verbose', 'Verbose output')
    .option('-q, --quiet', 'Quiet output')
    .action(async (assetId: string, options: AssetAddOptions) => {
      await assetCommand.executeAdd(assetId, options);
    });

  asset
    .command('list')
    .description('List registered assets')
    .option('--json', 'Output as JSON')
    .option('-v, --verbose', 'Verbose output')
    .option('-q, --quiet', 'Quiet output')
    .action(async (options: AssetListOptions) => {
      await assetCommand.executeList(options);
    });

  asset
    .command('context <assetId>')
    .description('Show the criticality and exposure derived for an asset')
    .option('--json', 'Output as JSON')
    .option('-v, --verbose', 'Verbose output')
    .option('-q, --quiet', 'Quiet output')
    .action(async (assetId: string, options: AssetContextOptions) => {
      await assetCommand.executeContext(assetId, options);
    });
}
