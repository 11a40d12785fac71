import { InvalidInputError } from "../errors";
import { createLogger } from "../logger";
import type { Logger } from "../logger";
import type { NormalizedVulnerability } from "../ingestion";
import type { RiskCategory } from "../risk_scoring";
import type {
  AssessAllOptions,
  AssessmentSummary,
  RiskAssessment,
  RiskAssessmentModuleDependencies,
} from "./risk_assessment.types";

const INTERNET_EXPOSED = new Set(["INTERNET_FACING", "PUBLICLY_ACCESSIBLE"]);

/**
 * Orders assessments by enhanced score, then EPSS, both descending, then by id.
 */
export function compareAssessments(a: RiskAssessment, b: RiskAssessment): number {
  return (
    b.score.enhancedScore - a.score.enhancedScore ||
    b.epss - a.epss ||
    a.vulnerabilityId.localeCompare(b.vulnerabilityId)
  );
}

export function summarizeAssessments(assessments: readonly RiskAssessment[]): AssessmentSummary {
  const counts: Record<RiskCategory, number> = { LOW: 0, MEDIUM: 0, HIGH: 0, CRITICAL: 0 };
  let sum = 0;
  let internetExposed = 0;
  let knownExploited = 0;

  for (const assessment of assessments) {
    counts[assessment.score.category]++;
    sum += assessment.score.enhancedScore;
    if (assessment.context && INTERNET_EXPOSED.has(assessment.context.exposure)) internetExposed++;
    if (assessment.knownExploited) knownExploited++;
  }

  const average = assessments.length === 0 ? 0 : sum / assessments.length;

  return {
    total: assessments.length,
    byCategory: counts,
    averageEnhancedScore: Math.round(average * 100) / 100,
    internetExposed,
    knownExploited,
  };
}

/**
 * Combines stored vulnerabilities with asset context and threat intelligence,
 * and scores them.
 *
 * The module owns no scoring logic: it resolves the inputs and hands them to
 * the RiskScorer.
 */
export class RiskAssessmentModule {
  private readonly logger: Logger;
  private readonly clock: () => Date;

  constructor(private readonly deps: RiskAssessmentModuleDependencies) {
    this.logger = deps.logger ?? createLogger("[assess] ");
    this.clock = deps.clock ?? (() => new Date());
  }

  /**
   * Scores one vulnerability.
   *
   * @throws InvalidInputError when the record's score or date cannot be used
   */
  async assess(vulnerability: NormalizedVulnerability): Promise<RiskAssessment> {
    const [context, intel] = await Promise.all([
      vulnerability.assetId ? this.deps.contextProvider.getContext(vulnerability.assetId) : Promise.resolve(null),
      this.deps.intelligenceProvider.getIntelligence(vulnerability.id),
    ]);

    if (vulnerability.assetId && !context) {
      this.logger.warn(`Asset ${vulnerability.assetId} for ${vulnerability.id} is not registered; scoring without context`);
    }

    const score = this.deps.scorer.score(vulnerability, context, intel);

    const assessment: RiskAssessment = {
      vulnerabilityId: vulnerability.id,
      title: vulnerability.title,
      severity: vulnerability.severity,
      context,
      score,
      epss: intel.epss,
      knownExploited: intel.hasExploit && intel.inWild,
      assessedAt: this.clock().toISOString(),
    };
    if (vulnerability.assetId) assessment.assetId = vulnerability.assetId;
    return assessment;
  }

  /**
   * Scores every stored vulnerability, highest risk first.
   *
   * Records with unusable input are skipped with a warning; other failures
   * propagate.
   */
  async assessAll(options: AssessAllOptions = {}): Promise<RiskAssessment[]> {
    const persist = options.persist ?? true;
    const vulnerabilities = await this.deps.stores.vulnerabilities.values();

    const results = await Promise.all(vulnerabilities.map((vulnerability) => this.tryAssess(vulnerability)));
    const assessments = results.filter((result): result is RiskAssessment => result !== null);
    assessments.sort(compareAssessments);

    if (persist) {
      for (const assessment of assessments) {
        await this.deps.stores.assessments.put(assessment.vulnerabilityId, assessment);
      }
    }

    this.logger.info(
      `Assessed ${assessments.length} of ${vulnerabilities.length} vulnerabilities${persist ? "" : " (not persisted)"}`
    );
    return assessments;
  }

  /**
   * Previously persisted assessments, highest risk first.
   */
  async loadAssessments(): Promise<RiskAssessment[]> {
    const assessments = await this.deps.stores.assessments.values();
    return assessments.sort(compareAssessments);
  }

  summarize(assessments: readonly RiskAssessment[]): AssessmentSummary {
    return summarizeAssessments(assessments);
  }

  private async tryAssess(vulnerability: NormalizedVulnerability): Promise<RiskAssessment | null> {
    try {
      return await this.assess(vulnerability);
    } catch (error) {
      if (error instanceof InvalidInputError) {
        this.logger.warn(`Skipping ${vulnerability.id}: ${error.message}`);
        return null;
      }
      throw error;
    }
  }
}
