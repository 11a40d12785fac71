import { promises as fs } from 'fs';
import { Command } from 'commander';
import { Config } from '@vulnrank/core';
import { SimpleCommand } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';

export interface InitCommandOptions extends BaseCommandOptions {
  force?: boolean;
}

/**
 * InitCommand - writes the default vulnrank.yaml and creates the store directory.
 */
export class InitCommand extends SimpleCommand<InitCommandOptions> {

  register(_program: Command): void {
    // Registration handled by registerInitCommands() in init.ts
  }

  async execute(options: InitCommandOptions): Promise<void> {
    await this.run(options, 'Failed to initialize', async () => {
      const configStore = this.dependencyService.getConfigStore();

      if (!options.force && (await configStore.loadConfig()) !== null) {
        this.handleError(`${configStore.describe()} already exists. Use --force to overwrite it.`, options);
        return;
      }

      await configStore.saveConfig(Config.DEFAULT_CONFIG);
      const storagePath = await this.dependencyService.getConfigManager().getStoragePath();
      await fs.mkdir(storagePath, { recursive: true });

      this.handleSuccess(
        { configPath: configStore.describe(), storagePath },
        options,
        `Initialized vulnrank in ${this.dependencyService.getProjectRoot()}`,
        [`   Config: ${configStore.describe()}`, `   Storage: ${storagePath}`]
      );
    });
  }
}
