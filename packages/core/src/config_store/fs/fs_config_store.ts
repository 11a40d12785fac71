/**
 * FsConfigStore - Filesystem implementation of ConfigStore
 *
 * Reads and writes vulnrank.yaml at the project root.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';
import type { ConfigStore } from '../config_store';
import type { VulnrankConfig } from '../../config_manager';
import { validateConfig } from '../../config_manager/config_validation';
import { ConfigValidationError, errorMessage } from '../../errors';

export const CONFIG_FILE_NAME = 'vulnrank.yaml';

function isNotFound(error: unknown): boolean {
  return (error as NodeJS.ErrnoException).code === 'ENOENT';
}

/**
 * Returns null for a missing file; anything else that goes wrong while
 * reading or parsing is an error.
 *
 * @example
 * ```typescript
 * const store = new FsConfigStore('/path/to/project');
 * const config = await store.loadConfig();
 * ```
 */
export class FsConfigStore implements ConfigStore {
  readonly configPath: string;

  constructor(projectRootPath: string, fileName: string = CONFIG_FILE_NAME) {
    this.configPath = path.join(projectRootPath, fileName);
  }

  async loadConfig(): Promise<VulnrankConfig | null> {
    let content: string;
    try {
      content = await fs.readFile(this.configPath, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) return null;
      throw error;
    }

    let document: unknown;
    try {
      document = yaml.load(content);
    } catch (error) {
      throw new ConfigValidationError(this.configPath, [{ field: 'root', message: errorMessage(error) }]);
    }

    return validateConfig(document, this.configPath);
  }

  async saveConfig(config: VulnrankConfig): Promise<void> {
    await fs.writeFile(this.configPath, yaml.dump(config), 'utf-8');
  }

  async exists(): Promise<boolean> {
    try {
      await fs.access(this.configPath);
      return true;
    } catch {
      return false;
    }
  }

  describe(): string {
    return this.configPath;
  }
}
