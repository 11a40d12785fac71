import type { RiskCategory } from "../risk_scoring";
import type { ExecutiveReport, ReportRow, TechnicalReport } from "./report_generator.types";

const CATEGORY_LABELS: ReadonlyArray<[RiskCategory, string]> = [
  ["CRITICAL", "Critical"],
  ["HIGH", "High"],
  ["MEDIUM", "Medium"],
  ["LOW", "Low"],
];

function cell(value: string): string {
  return value.replace(/\|/g, "\\|").replace(/\r?\n/g, " ");
}

function table(headers: string[], rows: string[][]): string[] {
  return [
    `| ${headers.join(" | ")} |`,
    `| ${headers.map(() => "---").join(" | ")} |`,
    ...rows.map((row) => `| ${row.map(cell).join(" | ")} |`),
  ];
}

function scoreCells(row: ReportRow): string[] {
  return [row.enhancedScore.toFixed(2), row.category, row.baseScore.toFixed(1), row.epss.toFixed(3)];
}

export function renderExecutiveMarkdown(report: ExecutiveReport): string {
  const { summary } = report;
  const lines = [
    "# Executive Vulnerability Risk Summary",
    "",
    `Generated: ${report.generatedAt}`,
    "",
    "## Key Risk Metrics",
    "",
    `- Total vulnerabilities: ${summary.total}`,
    ...CATEGORY_LABELS.map(
      ([category, label]) =>
        `- ${label}: ${summary.byCategory[category]} (${report.percentages[category].toFixed(1)}%)`
    ),
    `- Average risk score: ${summary.averageEnhancedScore.toFixed(2)}`,
    `- Internet-exposed: ${summary.internetExposed}`,
    `- Known exploited: ${summary.knownExploited}`,
    "",
    "## Top Risks",
    "",
  ];

  if (report.topRisks.length === 0) {
    lines.push("No vulnerabilities assessed.");
  } else {
    lines.push(
      ...table(
        ["Vulnerability", "Title", "Asset", "Risk", "Category", "CVSS", "EPSS"],
        report.topRisks.map((row) => [row.vulnerabilityId, row.title, row.assetId ?? "-", ...scoreCells(row)])
      )
    );
  }

  lines.push("", "## Recommendations", "", ...report.recommendations.map((r) => `- ${r}`), "");
  return lines.join("\n");
}

export function renderTechnicalMarkdown(report: TechnicalReport): string {
  const lines = [
    "# Technical Vulnerability Analysis",
    "",
    `Generated: ${report.generatedAt}`,
    "",
    "## Detailed Risk Breakdown",
    "",
  ];

  if (report.assessments.length === 0) {
    lines.push("No vulnerabilities assessed.");
  } else {
    lines.push(
      ...table(
        [
          "Vulnerability",
          "Asset",
          "Exposure tier",
          "Risk",
          "Category",
          "CVSS",
          "EPSS",
          "Age",
          "Criticality",
          "Exposure",
          "Exploit",
          "In wild",
        ],
        report.assessments.map((row) => [
          row.vulnerabilityId,
          row.assetId ?? "-",
          row.exposure ?? "-",
          ...scoreCells(row),
          (row.factors.age ?? 1).toFixed(2),
          row.factors.criticality.toFixed(2),
          row.factors.exposure.toFixed(2),
          row.factors.hasExploit.toFixed(2),
          row.factors.inWild.toFixed(2),
        ])
      )
    );
  }

  lines.push("");
  return lines.join("\n");
}
