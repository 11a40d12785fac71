import { Command } from 'commander';
import { Errors, Scoring } from '@vulnrank/core';
import type { Context } from '@vulnrank/core';
import { BaseCommand } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';

export interface AssetAddOptions extends BaseCommandOptions {
  type: string;
  ip?: string[];
  function?: string[];
  exposure?: string;
}

export interface AssetListOptions extends BaseCommandOptions {}

export interface AssetContextOptions extends BaseCommandOptions {}

/**
 * Splits repeated and comma-separated option values ("--ip a,b --ip c").
 */
export function splitList(values: string[] | undefined): string[] {
  return (values ?? [])
    .flatMap((value) => value.split(','))
    .map((value) => value.trim())
    .filter((value) => value !== '');
}

export function parseExposureTier(value: string): Scoring.ExposureTier {
  const normalized = value.trim().toUpperCase().replace(/-/g, '_');
  const tier = Scoring.EXPOSURE_TIERS.find((t) => t === normalized);
  if (!tier) {
    throw new Errors.InvalidInputError('exposure', value, `must be one of ${Scoring.EXPOSURE_TIERS.join(', ')}`);
  }
  return tier;
}

export class AssetCommand extends BaseCommand {

  register(_program: Command): void {
    // Registration handled by registerAssetCommands() in asset.ts
  }

  async executeAdd(assetId: string, options: AssetAddOptions): Promise<void> {
    await this.run(options, 'Failed to add asset', async () => {
      const asset: Context.AssetDescription = {
        id: assetId,
        type: options.type,
        ipAddresses: splitList(options.ip),
        businessFunctions: splitList(options.function),
      };
      if (options.exposure) {
        asset.declaredExposure = parseExposureTier(options.exposure);
      }

      const { assets } = await this.dependencyService.getStores();
      const existed = await assets.exists(assetId);
      await assets.put(assetId, asset);

      this.handleSuccess(
        asset,
        options,
        `Asset ${existed ? 'updated' : 'registered'}: ${assetId}`,
        [`   Type: ${asset.type}`, `   Addresses: ${asset.ipAddresses.join(', ') || '-'}`]
      );
    });
  }

  async executeList(options: AssetListOptions): Promise<void> {
    await this.run(options, 'Failed to list assets', async () => {
      const { assets } = await this.dependencyService.getStores();
      const all = (await assets.values()).sort((a, b) => a.id.localeCompare(b.id));

      this.handleSuccess(
        all,
        options,
        `${all.length} assets registered`,
        all.map((asset) => `   ${asset.id}  ${asset.type}  ${asset.ipAddresses.join(', ') || '-'}`)
      );
    });
  }

  async executeContext(assetId: string, options: AssetContextOptions): Promise<void> {
    await this.run(options, 'Failed to analyze asset', async () => {
      const contextProvider = await this.dependencyService.getContextProvider();
      const context = await contextProvider.getContext(assetId);
      if (!context) {
        throw new Errors.RecordNotFoundError('Asset', assetId);
      }

      this.handleSuccess(
        context,
        options,
        `Context for ${assetId}`,
        [
          `   Criticality: ${context.criticality}`,
          `   Exposure: ${context.exposure}`,
          `   Business functions: ${context.businessFunctions.join(', ') || '-'}`,
        ]
      );
    });
  }
}
