import { Command } from 'commander';
import { Errors } from '@vulnrank/core';
import type { Assessment } from '@vulnrank/core';
import { SimpleCommand } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';

export interface AssessCommandOptions extends BaseCommandOptions {
  /** false with --no-persist */
  persist?: boolean;
  limit?: string;
}

export const DEFAULT_ASSESS_LIMIT = 20;

export function parseLimit(value: string | undefined): number {
  if (value === undefined) return DEFAULT_ASSESS_LIMIT;
  const limit = Number(value);
  if (!Number.isInteger(limit) || limit < 1) {
    throw new Errors.InvalidInputError('limit', value, 'must be a positive integer');
  }
  return limit;
}

function formatRow(rank: number, assessment: Assessment.RiskAssessment): string {
  const { score } = assessment;
  return `   ${rank}. ${assessment.vulnerabilityId}  ${score.enhancedScore.toFixed(2)} ${score.category}  ${assessment.assetId ?? '-'}`;
}

/**
 * AssessCommand - scores every stored vulnerability and prints the highest risks.
 */
export class AssessCommand extends SimpleCommand<AssessCommandOptions> {

  register(_program: Command): void {
    // Registration handled by registerAssessCommands() in assess.ts
  }

  async execute(options: AssessCommandOptions): Promise<void> {
    await this.run(options, 'Failed to assess', async () => {
      const limit = parseLimit(options.limit);
      const persist = options.persist ?? true;

      const assessmentModule = await this.dependencyService.getRiskAssessmentModule();
      const assessments = await assessmentModule.assessAll({ persist });
      const summary = assessmentModule.summarize(assessments);
      const top = assessments.slice(0, limit);

      const { byCategory } = summary;
      this.handleSuccess(
        { summary, assessments: top },
        options,
        `Assessed ${summary.total} vulnerabilities${persist ? '' : ' (not saved)'}`,
        [
          `   Critical: ${byCategory.CRITICAL}  High: ${byCategory.HIGH}  Medium: ${byCategory.MEDIUM}  Low: ${byCategory.LOW}`,
          `   Average risk score: ${summary.averageEnhancedScore.toFixed(2)}`,
          ...top.map((assessment, index) => formatRow(index + 1, assessment)),
        ]
      );
    });
  }
}
