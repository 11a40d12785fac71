/**
 * Business criticality of the asset a vulnerability lives on.
 */
export type CriticalityTier = "LOW" | "MEDIUM" | "HIGH" | "CRITICAL";

/**
 * Network exposure of an asset, ordered from least to most exposed.
 */
export type ExposureTier = "INTERNAL" | "EXTERNAL" | "INTERNET_FACING" | "PUBLICLY_ACCESSIBLE";

/**
 * Discrete remediation priority derived from the enhanced score.
 */
export type RiskCategory = "LOW" | "MEDIUM" | "HIGH" | "CRITICAL";

export const CRITICALITY_TIERS: readonly CriticalityTier[] = ["LOW", "MEDIUM", "HIGH", "CRITICAL"];
export const EXPOSURE_TIERS: readonly ExposureTier[] = [
  "INTERNAL",
  "EXTERNAL",
  "INTERNET_FACING",
  "PUBLICLY_ACCESSIBLE",
];
export const RISK_CATEGORIES: readonly RiskCategory[] = ["LOW", "MEDIUM", "HIGH", "CRITICAL"];

/**
 * Vulnerability as read by the scoring core.
 */
export interface VulnerabilityRecord {
  /** Unique identifier, usually a CVE id */
  readonly id: string;
  /** CVSS base severity, expected in [0,10] (clamped when outside) */
  readonly baseScore: number;
  readonly hasKnownExploit?: boolean;
  readonly observedInWild?: boolean;
  /** ISO-8601 string or Date */
  readonly publishedAt?: string | Date;
}

export interface AssetContext {
  readonly criticality: CriticalityTier;
  readonly exposure: ExposureTier;
}

/**
 * Threat intelligence signals consumed by scoring.
 * Flags left undefined count as neutral.
 */
export interface ThreatIntel {
  readonly hasExploit?: boolean;
  readonly inWild?: boolean;
  /** Exploitation probability in [0,1] */
  readonly epss?: number;
}

/**
 * Multipliers applied during scoring, keyed by factor.
 * `age` is only present on results produced by `score()`.
 */
export interface FactorBreakdown {
  readonly age?: number;
  readonly criticality: number;
  readonly exposure: number;
  readonly hasExploit: number;
  readonly inWild: number;
}

export interface ScoreResult {
  readonly baseScore: number;
  readonly enhancedScore: number;
  readonly category: RiskCategory;
  readonly factors: FactorBreakdown;
}

export interface MultiplierTable {
  readonly criticality: Readonly<Record<CriticalityTier, number>>;
  readonly exposure: Readonly<Record<ExposureTier, number>>;
  readonly hasExploit: number;
  readonly inWild: number;
}

/**
 * Partial overrides of the default multiplier table, as found in configuration.
 */
export interface MultiplierOverrides {
  criticality?: Partial<Record<CriticalityTier, number>>;
  exposure?: Partial<Record<ExposureTier, number>>;
  hasExploit?: number;
  inWild?: number;
}

export interface AgeDecayOptions {
  /** Days after which the age boost is halved (default: 90) */
  halfLifeDays?: number;
  /** Reference time for age computation (default: now) */
  now?: Date;
}

export interface ScoringOptions extends AgeDecayOptions {
  table?: MultiplierTable;
}
