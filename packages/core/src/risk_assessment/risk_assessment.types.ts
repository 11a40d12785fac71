import type { AnalyzedAssetContext, ContextProvider } from "../context_analyzer";
import type { Logger } from "../logger";
import type { RiskCategory, RiskScorer, ScoreResult } from "../risk_scoring";
import type { Stores } from "../store";
import type { IntelligenceProvider } from "../threat_intel";

/**
 * Scored view of one vulnerability, as persisted in the assessments store.
 */
export interface RiskAssessment {
  vulnerabilityId: string;
  title: string;
  severity: string;
  assetId?: string;
  /** Context of the affected asset, null when unknown */
  context: AnalyzedAssetContext | null;
  score: ScoreResult;
  epss: number;
  knownExploited: boolean;
  /** ISO timestamp */
  assessedAt: string;
}

export interface AssessmentSummary {
  total: number;
  byCategory: Record<RiskCategory, number>;
  /** Mean enhanced score, rounded to two decimals (0 when empty) */
  averageEnhancedScore: number;
  /** Assessments on INTERNET_FACING or PUBLICLY_ACCESSIBLE assets */
  internetExposed: number;
  knownExploited: number;
}

export interface AssessAllOptions {
  /** Write assessments to the assessments store (default: true) */
  persist?: boolean;
}

export type RiskAssessmentModuleDependencies = {
  stores: Pick<Stores, "vulnerabilities" | "assessments">;
  contextProvider: ContextProvider;
  intelligenceProvider: IntelligenceProvider;
  scorer: RiskScorer;
  logger?: Logger;
  clock?: () => Date;
};
