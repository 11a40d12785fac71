import { promises as fs } from "fs";
import * as path from "path";
import { format } from "date-fns";
import { UnsupportedFormatError } from "../errors";
import { createLogger } from "../logger";
import type { Logger } from "../logger";
import { summarizeAssessments } from "../risk_assessment";
import type { AssessmentSummary, RiskAssessment } from "../risk_assessment";
import type { RiskCategory } from "../risk_scoring";
import { renderExecutiveMarkdown, renderTechnicalMarkdown } from "./markdown";
import { REPORT_FORMATS, REPORT_TYPES } from "./report_generator.types";
import type {
  ExecutiveReport,
  Report,
  ReportFormat,
  ReportGeneratorDependencies,
  ReportRow,
  ReportType,
  TechnicalReport,
  TechnicalReportRow,
} from "./report_generator.types";

export const TOP_RISKS_LIMIT = 10;

const FILE_EXTENSIONS: Readonly<Record<ReportFormat, string>> = {
  markdown: "md",
  json: "json",
};

export function parseReportType(value: string): ReportType {
  const match = REPORT_TYPES.find((type) => type === value);
  if (!match) throw new UnsupportedFormatError(value, REPORT_TYPES);
  return match;
}

export function parseReportFormat(value: string): ReportFormat {
  const match = REPORT_FORMATS.find((f) => f === value);
  if (!match) throw new UnsupportedFormatError(value, REPORT_FORMATS);
  return match;
}

function toRow(assessment: RiskAssessment): ReportRow {
  const row: ReportRow = {
    vulnerabilityId: assessment.vulnerabilityId,
    title: assessment.title,
    baseScore: assessment.score.baseScore,
    enhancedScore: assessment.score.enhancedScore,
    category: assessment.score.category,
    epss: assessment.epss,
    knownExploited: assessment.knownExploited,
  };
  if (assessment.assetId) row.assetId = assessment.assetId;
  if (assessment.context) row.exposure = assessment.context.exposure;
  return row;
}

function percent(count: number, total: number): number {
  return total === 0 ? 0 : Math.round((count / total) * 1000) / 10;
}

function plural(count: number, singular: string, pluralForm: string): string {
  return `${count} ${count === 1 ? singular : pluralForm}`;
}

/**
 * Prioritized remediation advice derived from an assessment run.
 */
export function buildRecommendations(assessments: readonly RiskAssessment[], summary: AssessmentSummary): string[] {
  const recommendations: string[] = [];
  const critical = summary.byCategory.CRITICAL;
  const criticalExposed = assessments.filter(
    (a) =>
      a.score.category === "CRITICAL" &&
      (a.context?.exposure === "INTERNET_FACING" || a.context?.exposure === "PUBLICLY_ACCESSIBLE")
  ).length;

  if (criticalExposed > 0) {
    recommendations.push(
      `Immediate action required for ${plural(criticalExposed, "critical vulnerability", "critical vulnerabilities")} on internet-facing assets`
    );
  }
  if (critical > 0) {
    recommendations.push(`Focus remediation on ${plural(critical, "critical vulnerability", "critical vulnerabilities")}`);
  }
  if (summary.knownExploited > 0) {
    recommendations.push(
      `Patch ${plural(summary.knownExploited, "vulnerability", "vulnerabilities")} listed as known exploited`
    );
  }
  if (summary.byCategory.HIGH > 0) {
    recommendations.push(
      `Schedule remediation of ${plural(summary.byCategory.HIGH, "high-risk vulnerability", "high-risk vulnerabilities")}`
    );
  }
  if (recommendations.length === 0) {
    recommendations.push("No critical or high-risk vulnerabilities found; continue routine patching");
  }
  return recommendations;
}

/**
 * Builds executive and technical reports from assessments and writes them to disk.
 */
export class ReportGenerator {
  private readonly logger: Logger;
  private readonly clock: () => Date;

  constructor(private readonly deps: ReportGeneratorDependencies) {
    this.logger = deps.logger ?? createLogger("[report] ");
    this.clock = deps.clock ?? (() => new Date());
  }

  /**
   * @param assessments - Assessments sorted highest risk first
   */
  build(type: ReportType, assessments: readonly RiskAssessment[]): Report {
    return type === "executive" ? this.buildExecutive(assessments) : this.buildTechnical(assessments);
  }

  render(report: Report, reportFormat: ReportFormat): string {
    if (reportFormat === "json") {
      return `${JSON.stringify(report, null, 2)}\n`;
    }
    return report.type === "executive" ? renderExecutiveMarkdown(report) : renderTechnicalMarkdown(report);
  }

  /**
   * Writes `<type>_report_<yyyyMMdd_HHmmss>.<ext>` into the output directory.
   * @returns The written file path
   */
  async write(report: Report, reportFormat: ReportFormat): Promise<string> {
    const timestamp = format(this.clock(), "yyyyMMdd_HHmmss");
    const filePath = path.join(
      this.deps.outputDir,
      `${report.type}_report_${timestamp}.${FILE_EXTENSIONS[reportFormat]}`
    );

    await fs.mkdir(this.deps.outputDir, { recursive: true });
    await fs.writeFile(filePath, this.render(report, reportFormat), "utf-8");

    this.logger.info(`Wrote ${report.type} report to ${filePath}`);
    return filePath;
  }

  private buildExecutive(assessments: readonly RiskAssessment[]): ExecutiveReport {
    const summary = summarizeAssessments(assessments);
    const percentages: Record<RiskCategory, number> = {
      LOW: percent(summary.byCategory.LOW, summary.total),
      MEDIUM: percent(summary.byCategory.MEDIUM, summary.total),
      HIGH: percent(summary.byCategory.HIGH, summary.total),
      CRITICAL: percent(summary.byCategory.CRITICAL, summary.total),
    };

    return {
      type: "executive",
      generatedAt: this.clock().toISOString(),
      summary,
      percentages,
      topRisks: assessments.slice(0, TOP_RISKS_LIMIT).map(toRow),
      recommendations: buildRecommendations(assessments, summary),
    };
  }

  private buildTechnical(assessments: readonly RiskAssessment[]): TechnicalReport {
    return {
      type: "technical",
      generatedAt: this.clock().toISOString(),
      summary: summarizeAssessments(assessments),
      assessments: assessments.map(
        (assessment): TechnicalReportRow => ({ ...toRow(assessment), factors: { ...assessment.score.factors } })
      ),
    };
  }
}
