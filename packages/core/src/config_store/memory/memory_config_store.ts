/**
 * MemoryConfigStore - In-memory implementation of ConfigStore
 */

import type { ConfigStore } from '../config_store';
import type { VulnrankConfig } from '../../config_manager';
import { validateConfig } from '../../config_manager/config_validation';

/**
 * In-memory ConfigStore for tests.
 *
 * Content set through setConfig() or saveConfig() is validated on load,
 * exactly like a file read from disk.
 *
 * @example
 * ```typescript
 * const configStore = new MemoryConfigStore();
 * configStore.setConfig({ storage: { path: '.vulnrank' } });
 * const manager = new ConfigManager(configStore);
 * ```
 */
export class MemoryConfigStore implements ConfigStore {
  private config: unknown = null;

  async loadConfig(): Promise<VulnrankConfig | null> {
    if (this.config === null) return null;
    return validateConfig(structuredClone(this.config), this.describe());
  }

  async saveConfig(config: VulnrankConfig): Promise<void> {
    this.config = structuredClone(config);
  }

  describe(): string {
    return 'memory';
  }

  // ==================== Test Helper Methods ====================

  /**
   * Sets raw configuration content, valid or not
   */
  setConfig(config: unknown): void {
    this.config = config;
  }

  getConfig(): unknown {
    return this.config;
  }

  clear(): void {
    this.config = null;
  }
}
