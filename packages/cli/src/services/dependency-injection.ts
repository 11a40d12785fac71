import * as path from 'path';
import {
  Assessment,
  Config,
  ConfigStore,
  Context,
  Ingestion,
  Intel,
  Logger,
  Reports,
  Scoring,
  Store,
} from '@vulnrank/core';

/**
 * Replacements for the filesystem-backed defaults, used by tests.
 */
export type DependencyOverrides = {
  projectRoot?: string;
  configStore?: ConfigStore.ConfigStore;
  stores?: Store.Stores;
  clock?: () => Date;
};

/**
 * Dependency Injection Service for the vulnrank CLI
 *
 * Builds core modules from vulnrank.yaml on first use and caches them for the
 * rest of the process.
 */
export class DependencyInjectionService {
  private static instance: DependencyInjectionService | null = null;

  private configStore: ConfigStore.ConfigStore | null = null;
  private configManager: Config.ConfigManager | null = null;
  private stores: Store.Stores | null = null;
  private scorer: Scoring.RiskScorer | null = null;
  private contextProvider: Context.ContextProvider | null = null;
  private intelligenceProvider: Intel.IntelligenceProvider | null = null;
  private assessmentModule: Assessment.RiskAssessmentModule | null = null;
  private logLevel: Logger.LogLevel | undefined;

  constructor(private readonly overrides: DependencyOverrides = {}) { }

  /**
   * Singleton pattern to ensure single instance across CLI
   */
  static getInstance(): DependencyInjectionService {
    if (!DependencyInjectionService.instance) {
      DependencyInjectionService.instance = new DependencyInjectionService();
    }
    return DependencyInjectionService.instance;
  }

  /**
   * Replaces the singleton; null resets it.
   */
  static setInstance(instance: DependencyInjectionService | null): void {
    DependencyInjectionService.instance = instance;
  }

  /**
   * Log level requested on the command line. Takes precedence over vulnrank.yaml.
   */
  setLogLevel(level: Logger.LogLevel | undefined): void {
    this.logLevel = level;
  }

  getProjectRoot(): string {
    return path.resolve(this.overrides.projectRoot ?? process.env['VULNRANK_PROJECT_DIR'] ?? process.cwd());
  }

  getClock(): () => Date {
    return this.overrides.clock ?? (() => new Date());
  }

  getConfigStore(): ConfigStore.ConfigStore {
    if (!this.configStore) {
      this.configStore = this.overrides.configStore ?? new ConfigStore.FsConfigStore(this.getProjectRoot());
    }
    return this.configStore;
  }

  getConfigManager(): Config.ConfigManager {
    if (!this.configManager) {
      this.configManager = new Config.ConfigManager(this.getConfigStore(), this.getProjectRoot());
    }
    return this.configManager;
  }

  async getLogger(prefix: string): Promise<Logger.Logger> {
    const level = this.logLevel ?? (await this.getConfigManager().getLogLevel());
    return Logger.createLogger(prefix, level);
  }

  async getStores(): Promise<Store.Stores> {
    if (!this.stores) {
      this.stores = this.overrides.stores ?? Store.createFsStores(await this.getConfigManager().getStoragePath());
    }
    return this.stores;
  }

  async getScorer(): Promise<Scoring.RiskScorer> {
    if (!this.scorer) {
      const options = await this.getConfigManager().getScoringOptions();
      this.scorer = new Scoring.RiskScorer({ ...options, clock: this.getClock() });
    }
    return this.scorer;
  }

  async getContextProvider(): Promise<Context.ContextProvider> {
    if (!this.contextProvider) {
      const { assets } = await this.getStores();
      this.contextProvider = new Context.AssetContextProvider({
        assets,
        logger: await this.getLogger('[context] '),
      });
    }
    return this.contextProvider;
  }

  async getIntelligenceProvider(): Promise<Intel.IntelligenceProvider> {
    if (!this.intelligenceProvider) {
      const { intel } = await this.getStores();
      this.intelligenceProvider = new Intel.StoreIntelligenceProvider({
        intel,
        defaultEpss: await this.getConfigManager().getDefaultEpss(),
        logger: await this.getLogger('[intel] '),
      });
    }
    return this.intelligenceProvider;
  }

  async getIngester(): Promise<Ingestion.VulnerabilityIngester> {
    return new Ingestion.VulnerabilityIngester({ logger: await this.getLogger('[ingest] ') });
  }

  async getThreatIntelImporter(): Promise<Intel.ThreatIntelImporter> {
    const { intel } = await this.getStores();
    return new Intel.ThreatIntelImporter({
      intel,
      logger: await this.getLogger('[intel] '),
      clock: this.getClock(),
    });
  }

  async getRiskAssessmentModule(): Promise<Assessment.RiskAssessmentModule> {
    if (!this.assessmentModule) {
      this.assessmentModule = new Assessment.RiskAssessmentModule({
        stores: await this.getStores(),
        contextProvider: await this.getContextProvider(),
        intelligenceProvider: await this.getIntelligenceProvider(),
        scorer: await this.getScorer(),
        logger: await this.getLogger('[assess] '),
        clock: this.getClock(),
      });
    }
    return this.assessmentModule;
  }

  async getReportGenerator(): Promise<Reports.ReportGenerator> {
    return new Reports.ReportGenerator({
      outputDir: await this.getConfigManager().getReportsDir(),
      logger: await this.getLogger('[report] '),
      clock: this.getClock(),
    });
  }
}
