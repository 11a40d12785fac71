import { differenceInMinutes, isValid, parseISO } from "date-fns";
import { InvalidInputError } from "../errors";
import { DEFAULT_MULTIPLIER_TABLE } from "./multiplier_table";
import { RISK_CATEGORIES } from "./risk_scoring.types";
import type {
  AgeDecayOptions,
  AssetContext,
  FactorBreakdown,
  MultiplierTable,
  RiskCategory,
  ScoreResult,
  ScoringOptions,
  ThreatIntel,
  VulnerabilityRecord,
} from "./risk_scoring.types";

export const MIN_SCORE = 0;
export const MAX_SCORE = 10;

/** Ceiling of the age factor is 1 + MAX_AGE_BOOST */
export const MAX_AGE_BOOST = 0.2;
export const DEFAULT_HALF_LIFE_DAYS = 90;

const MINUTES_PER_DAY = 24 * 60;

/**
 * Category thresholds, evaluated high to low. First match wins.
 */
export const RISK_THRESHOLDS: ReadonlyArray<{ min: number; category: RiskCategory }> = [
  { min: 9.0, category: "CRITICAL" },
  { min: 7.0, category: "HIGH" },
  { min: 4.0, category: "MEDIUM" },
];

export function clampScore(value: number): number {
  return Math.min(MAX_SCORE, Math.max(MIN_SCORE, value));
}

function requireFinite(field: string, value: unknown): number {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new InvalidInputError(field, value);
  }
  return value;
}

function parsePublished(publishedAt: string | Date): Date {
  const date = typeof publishedAt === "string" ? parseISO(publishedAt) : publishedAt;
  if (!(date instanceof Date) || !isValid(date)) {
    throw new InvalidInputError("publishedAt", publishedAt, "is not a valid date");
  }
  return date;
}

/**
 * Recency multiplier in [1.0, 1.2].
 *
 * `1 + 0.2 * 0.5^(ageDays / halfLifeDays)`: 1.2 for a vulnerability published
 * now (or dated in the future), 1.1 after one half-life, tending to 1.0.
 * Records without a publication date get exactly 1.0.
 */
export function computeAgeFactor(
  publishedAt: string | Date | undefined,
  options: AgeDecayOptions = {}
): number {
  if (publishedAt === undefined || publishedAt === null) return 1.0;

  const halfLifeDays = options.halfLifeDays ?? DEFAULT_HALF_LIFE_DAYS;
  if (!Number.isFinite(halfLifeDays) || halfLifeDays <= 0) {
    throw new InvalidInputError("halfLifeDays", halfLifeDays, "must be a positive number");
  }

  const published = parsePublished(publishedAt);
  const now = options.now ?? new Date();
  const ageDays = Math.max(0, differenceInMinutes(now, published) / MINUTES_PER_DAY);

  return 1 + MAX_AGE_BOOST * Math.pow(0.5, ageDays / halfLifeDays);
}

/**
 * Clamped CVSS severity multiplied by the age factor, clamped to [0,10].
 * @throws InvalidInputError when baseScore is not finite or publishedAt is unparseable
 */
export function computeBaseScore(record: VulnerabilityRecord, options: AgeDecayOptions = {}): number {
  const severity = clampScore(requireFinite("baseScore", record.baseScore));
  return clampScore(severity * computeAgeFactor(record.publishedAt, options));
}

function lookup<K extends string>(table: Readonly<Record<K, number>>, factor: string, tier: K): number {
  const multiplier = table[tier];
  if (multiplier === undefined) {
    throw new InvalidInputError(factor, tier, "is not a known tier");
  }
  return multiplier;
}

/**
 * Applies context and intelligence multipliers to a base score.
 *
 * Order is fixed: criticality, exposure, hasExploit, inWild. Missing context or
 * intel contributes 1.0. The result is clamped to [0,10] and frozen.
 */
export function computeEnhancedScore(
  baseScore: number,
  context?: AssetContext | null,
  intel?: ThreatIntel | null,
  table: MultiplierTable = DEFAULT_MULTIPLIER_TABLE
): ScoreResult {
  const base = clampScore(requireFinite("baseScore", baseScore));

  const factors: FactorBreakdown = {
    criticality: context ? lookup(table.criticality, "criticality", context.criticality) : 1.0,
    exposure: context ? lookup(table.exposure, "exposure", context.exposure) : 1.0,
    hasExploit: intel?.hasExploit === true ? table.hasExploit : 1.0,
    inWild: intel?.inWild === true ? table.inWild : 1.0,
  };

  let running = base;
  running *= factors.criticality;
  running *= factors.exposure;
  running *= factors.hasExploit;
  running *= factors.inWild;

  const enhancedScore = clampScore(running);

  return Object.freeze({
    baseScore: base,
    enhancedScore,
    category: categorize(enhancedScore),
    factors: Object.freeze(factors),
  });
}

export function categorize(score: number): RiskCategory {
  if (typeof score !== "number" || Number.isNaN(score)) {
    throw new InvalidInputError("score", score, "must be a number");
  }
  for (const threshold of RISK_THRESHOLDS) {
    if (score >= threshold.min) return threshold.category;
  }
  return "LOW";
}

/**
 * Position of a category in LOW < MEDIUM < HIGH < CRITICAL.
 */
export function categoryRank(category: RiskCategory): number {
  return RISK_CATEGORIES.indexOf(category);
}

/**
 * Merges the record's own exploit flags into the supplied intel.
 */
export function mergeIntel(record: VulnerabilityRecord, intel?: ThreatIntel | null): ThreatIntel | null {
  const hasExploit = record.hasKnownExploit === true || intel?.hasExploit === true;
  const inWild = record.observedInWild === true || intel?.inWild === true;

  if (!intel && !hasExploit && !inWild) return null;
  return { ...intel, hasExploit, inWild };
}

/**
 * Scores a vulnerability end to end: age-adjusted base, then context and intel.
 * The record's hasKnownExploit and observedInWild flags count as intel.
 */
export function score(
  record: VulnerabilityRecord,
  context?: AssetContext | null,
  intel?: ThreatIntel | null,
  options: ScoringOptions = {}
): ScoreResult {
  const decay: AgeDecayOptions = { ...options, now: options.now ?? new Date() };
  const age = computeAgeFactor(record.publishedAt, decay);
  const baseScore = computeBaseScore(record, decay);
  const result = computeEnhancedScore(baseScore, context, mergeIntel(record, intel), options.table);

  return Object.freeze({
    ...result,
    factors: Object.freeze({ age, ...result.factors }),
  });
}

export interface RiskScorerOptions {
  table?: MultiplierTable;
  halfLifeDays?: number;
  /** Clock used for age decay (default: system time) */
  clock?: () => Date;
}

/**
 * Scores many records with one multiplier table and decay configuration.
 * Holds no mutable state.
 */
export class RiskScorer {
  readonly table: MultiplierTable;
  readonly halfLifeDays: number;
  private readonly clock: () => Date;

  constructor(options: RiskScorerOptions = {}) {
    this.table = options.table ?? DEFAULT_MULTIPLIER_TABLE;
    this.halfLifeDays = options.halfLifeDays ?? DEFAULT_HALF_LIFE_DAYS;
    this.clock = options.clock ?? (() => new Date());
  }

  score(record: VulnerabilityRecord, context?: AssetContext | null, intel?: ThreatIntel | null): ScoreResult {
    return score(record, context, intel, {
      table: this.table,
      halfLifeDays: this.halfLifeDays,
      now: this.clock(),
    });
  }

  computeEnhancedScore(baseScore: number, context?: AssetContext | null, intel?: ThreatIntel | null): ScoreResult {
    return computeEnhancedScore(baseScore, context, intel, this.table);
  }
}
