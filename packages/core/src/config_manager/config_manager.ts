/**
 * ConfigManager - Project configuration
 *
 * Typed access to vulnrank.yaml with defaults for every setting.
 * Uses the ConfigStore abstraction so tests can run without a file.
 */

import * as path from "path";
import { ConfigValidationError, InvalidInputError } from "../errors";
import type { LogLevel } from "../logger";
import { DEFAULT_HALF_LIFE_DAYS, buildMultiplierTable } from "../risk_scoring";
import { DEFAULT_EPSS } from "../threat_intel";
import type { ConfigStore } from "../config_store";
import type { IConfigManager, ResolvedScoringOptions, VulnrankConfig } from "./config_manager.types";

export const DEFAULT_STORAGE_PATH = ".vulnrank";
export const DEFAULT_REPORTS_DIR = "reports";

/**
 * The configuration `vulnrank init` writes.
 */
export const DEFAULT_CONFIG: VulnrankConfig = {
  storage: { path: DEFAULT_STORAGE_PATH },
  logging: { level: "info" },
  scoring: { ageDecay: { halfLifeDays: DEFAULT_HALF_LIFE_DAYS } },
  intelligence: { defaultEpss: DEFAULT_EPSS },
  reports: { outputDir: DEFAULT_REPORTS_DIR },
};

/**
 * @example
 * ```typescript
 * // Production usage
 * const manager = new ConfigManager(new FsConfigStore(process.cwd()), process.cwd());
 * const scorer = new RiskScorer(await manager.getScoringOptions());
 *
 * // Test usage
 * const store = new MemoryConfigStore();
 * store.setConfig({ intelligence: { defaultEpss: 0.05 } });
 * const manager = new ConfigManager(store);
 * ```
 */
export class ConfigManager implements IConfigManager {
  private readonly configStore: ConfigStore;
  private readonly projectRoot: string;

  /**
   * @param projectRoot - Directory relative paths resolve against (default: cwd)
   */
  constructor(configStore: ConfigStore, projectRoot: string = process.cwd()) {
    this.configStore = configStore;
    this.projectRoot = projectRoot;
  }

  /**
   * Loads the configuration. A missing file is an empty configuration.
   */
  async loadConfig(): Promise<VulnrankConfig> {
    return (await this.configStore.loadConfig()) ?? {};
  }

  async getStoragePath(): Promise<string> {
    const config = await this.loadConfig();
    return path.resolve(this.projectRoot, config.storage?.path ?? DEFAULT_STORAGE_PATH);
  }

  async getReportsDir(): Promise<string> {
    const config = await this.loadConfig();
    return path.resolve(this.projectRoot, config.reports?.outputDir ?? DEFAULT_REPORTS_DIR);
  }

  /**
   * Configured log level, or undefined to let the logger resolve it from the environment.
   */
  async getLogLevel(): Promise<LogLevel | undefined> {
    const config = await this.loadConfig();
    return config.logging?.level;
  }

  async getDefaultEpss(): Promise<number> {
    const config = await this.loadConfig();
    return config.intelligence?.defaultEpss ?? DEFAULT_EPSS;
  }

  /**
   * Builds the multiplier table and age-decay half-life.
   *
   * @throws ConfigValidationError when the multiplier overrides are inconsistent
   */
  async getScoringOptions(): Promise<ResolvedScoringOptions> {
    const config = await this.loadConfig();
    const halfLifeDays = config.scoring?.ageDecay?.halfLifeDays ?? DEFAULT_HALF_LIFE_DAYS;

    try {
      const table = buildMultiplierTable(config.scoring?.multipliers);
      return { table, halfLifeDays };
    } catch (error) {
      if (error instanceof InvalidInputError) {
        throw new ConfigValidationError(this.configStore.describe(), [
          { field: `scoring.${error.field}`, message: error.reason, value: error.value },
        ]);
      }
      throw error;
    }
  }
}
