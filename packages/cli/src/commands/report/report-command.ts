import { Command } from 'commander';
import { Reports } from '@vulnrank/core';
import { SimpleCommand } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';

export interface ReportCommandOptions extends BaseCommandOptions {
  type: string;
  format: string;
  /** Re-assess instead of using saved assessments */
  fresh?: boolean;
}

/**
 * ReportCommand - writes an executive or technical report to the reports directory.
 */
export class ReportCommand extends SimpleCommand<ReportCommandOptions> {

  register(_program: Command): void {
    // Registration handled by registerReportCommands() in report.ts
  }

  async execute(options: ReportCommandOptions): Promise<void> {
    await this.run(options, 'Failed to generate report', async () => {
      const type = Reports.parseReportType(options.type);
      const format = Reports.parseReportFormat(options.format);

      const assessmentModule = await this.dependencyService.getRiskAssessmentModule();
      let assessments = options.fresh ? [] : await assessmentModule.loadAssessments();
      if (assessments.length === 0) {
        assessments = await assessmentModule.assessAll({ persist: true });
      }

      const generator = await this.dependencyService.getReportGenerator();
      const report = generator.build(type, assessments);
      const filePath = await generator.write(report, format);

      this.handleSuccess(
        { path: filePath, type, format, assessments: assessments.length },
        options,
        `Report written: ${filePath}`
      );
    });
  }
}
