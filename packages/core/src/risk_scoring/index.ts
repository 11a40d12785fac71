// Types
export type {
  CriticalityTier,
  ExposureTier,
  RiskCategory,
  VulnerabilityRecord,
  AssetContext,
  ThreatIntel,
  FactorBreakdown,
  ScoreResult,
  MultiplierTable,
  MultiplierOverrides,
  AgeDecayOptions,
  ScoringOptions,
} from "./risk_scoring.types";
export { CRITICALITY_TIERS, EXPOSURE_TIERS, RISK_CATEGORIES } from "./risk_scoring.types";

// Implementation
export { DEFAULT_MULTIPLIER_TABLE, buildMultiplierTable } from "./multiplier_table";
export type { RiskScorerOptions } from "./risk_scorer";
export {
  MIN_SCORE,
  MAX_SCORE,
  MAX_AGE_BOOST,
  DEFAULT_HALF_LIFE_DAYS,
  RISK_THRESHOLDS,
  RiskScorer,
  clampScore,
  computeAgeFactor,
  computeBaseScore,
  computeEnhancedScore,
  categorize,
  categoryRank,
  mergeIntel,
  score,
} from "./risk_scorer";
