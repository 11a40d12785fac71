export type {
  ReportType,
  ReportFormat,
  ReportRow,
  TechnicalReportRow,
  ExecutiveReport,
  TechnicalReport,
  Report,
  ReportGeneratorDependencies,
} from "./report_generator.types";
export { REPORT_FORMATS, REPORT_TYPES } from "./report_generator.types";
export {
  ReportGenerator,
  TOP_RISKS_LIMIT,
  buildRecommendations,
  parseReportFormat,
  parseReportType,
} from "./report_generator";
export { renderExecutiveMarkdown, renderTechnicalMarkdown } from "./markdown";
