import type { LogLevel } from "../logger";
import type { MultiplierOverrides, RiskScorerOptions } from "../risk_scoring";

/**
 * Contents of vulnrank.yaml. Every section is optional; ConfigManager
 * fills in defaults.
 */
export type VulnrankConfig = {
  storage?: {
    /** Directory holding the record stores, relative to the project root */
    path?: string;
  };
  logging?: {
    level?: LogLevel;
  };
  scoring?: {
    ageDecay?: {
      halfLifeDays?: number;
    };
    multipliers?: MultiplierOverrides;
  };
  intelligence?: {
    /** EPSS assumed for CVEs without imported data */
    defaultEpss?: number;
  };
  reports?: {
    outputDir?: string;
  };
};

/**
 * Scoring settings resolved from configuration, ready for `new RiskScorer()`.
 */
export type ResolvedScoringOptions = Required<Pick<RiskScorerOptions, "table" | "halfLifeDays">>;

export interface IConfigManager {
  loadConfig(): Promise<VulnrankConfig>;
  getStoragePath(): Promise<string>;
  getLogLevel(): Promise<LogLevel | undefined>;
  getScoringOptions(): Promise<ResolvedScoringOptions>;
  getDefaultEpss(): Promise<number>;
  getReportsDir(): Promise<string>;
}
