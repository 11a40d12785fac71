import type { Logger } from "../logger";
import type { AssessmentSummary } from "../risk_assessment";
import type { ExposureTier, FactorBreakdown, RiskCategory } from "../risk_scoring";

export type ReportType = "executive" | "technical";
export type ReportFormat = "markdown" | "json";

export const REPORT_TYPES: readonly ReportType[] = ["executive", "technical"];
export const REPORT_FORMATS: readonly ReportFormat[] = ["markdown", "json"];

export interface ReportRow {
  vulnerabilityId: string;
  title: string;
  assetId?: string;
  exposure?: ExposureTier;
  baseScore: number;
  enhancedScore: number;
  category: RiskCategory;
  epss: number;
  knownExploited: boolean;
}

export interface TechnicalReportRow extends ReportRow {
  factors: FactorBreakdown;
}

export interface ExecutiveReport {
  type: "executive";
  generatedAt: string;
  summary: AssessmentSummary;
  /** Share of each category in percent, one decimal */
  percentages: Record<RiskCategory, number>;
  topRisks: ReportRow[];
  recommendations: string[];
}

export interface TechnicalReport {
  type: "technical";
  generatedAt: string;
  summary: AssessmentSummary;
  assessments: TechnicalReportRow[];
}

export type Report = ExecutiveReport | TechnicalReport;

export type ReportGeneratorDependencies = {
  /** Directory reports are written to */
  outputDir: string;
  logger?: Logger;
  clock?: () => Date;
};
