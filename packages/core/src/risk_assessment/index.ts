export type {
  RiskAssessment,
  AssessmentSummary,
  AssessAllOptions,
  RiskAssessmentModuleDependencies,
} from "./risk_assessment.types";
export { RiskAssessmentModule, compareAssessments, summarizeAssessments } from "./risk_assessment_module";
