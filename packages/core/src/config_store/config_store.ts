/**
 * ConfigStore Interface
 *
 * Abstraction for vulnrank.yaml persistence, so ConfigManager works the same
 * against the filesystem and against memory in tests.
 */

import type { VulnrankConfig } from '../config_manager';

/**
 * Implementations:
 * - FsConfigStore: YAML file on disk (vulnrank.yaml)
 * - MemoryConfigStore: In-memory for tests
 */
export interface ConfigStore {
  /**
   * Load the configuration
   *
   * @returns The validated configuration, or null if none exists
   * @throws ConfigValidationError for unparseable or invalid content
   */
  loadConfig(): Promise<VulnrankConfig | null>;

  saveConfig(config: VulnrankConfig): Promise<void>;

  /**
   * Where the configuration lives, for error messages
   */
  describe(): string;
}
