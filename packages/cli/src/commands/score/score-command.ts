import { Command } from 'commander';
import { Errors, Scoring } from '@vulnrank/core';
import { SimpleCommand } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';
import { parseExposureTier } from '../asset/asset-command';

export interface ScoreCommandOptions extends BaseCommandOptions {
  cvss: string;
  criticality?: string;
  exposure?: string;
  exploit?: boolean;
  inWild?: boolean;
  published?: string;
}

export function parseCriticalityTier(value: string): Scoring.CriticalityTier {
  const normalized = value.trim().toUpperCase();
  const tier = Scoring.CRITICALITY_TIERS.find((t) => t === normalized);
  if (!tier) {
    throw new Errors.InvalidInputError('criticality', value, `must be one of ${Scoring.CRITICALITY_TIERS.join(', ')}`);
  }
  return tier;
}

/**
 * Blank input is rejected here; other non-numeric values reach the scorer as NaN.
 */
export function parseCvss(value: string): number {
  if (value.trim() === '') {
    throw new Errors.InvalidInputError('cvss', value, 'must be a number');
  }
  return Number(value);
}

/**
 * Builds asset context from the flags. With only one of the two given, the
 * other takes its neutral tier.
 */
function contextFromOptions(options: ScoreCommandOptions): Scoring.AssetContext | null {
  if (!options.criticality && !options.exposure) return null;
  return {
    criticality: options.criticality ? parseCriticalityTier(options.criticality) : 'MEDIUM',
    exposure: options.exposure ? parseExposureTier(options.exposure) : 'INTERNAL',
  };
}

function formatFactor(value: number): string {
  return `x${value.toFixed(2)}`;
}

/**
 * ScoreCommand - scores one vulnerability from flags, without touching the store.
 */
export class ScoreCommand extends SimpleCommand<ScoreCommandOptions> {

  register(_program: Command): void {
    // Registration handled by registerScoreCommands() in score.ts
  }

  async execute(options: ScoreCommandOptions): Promise<void> {
    await this.run(options, 'Failed to score', async () => {
      const scorer = await this.dependencyService.getScorer();
      const record: Scoring.VulnerabilityRecord = {
        id: 'ad-hoc',
        baseScore: parseCvss(options.cvss),
        hasKnownExploit: options.exploit === true,
        observedInWild: options.inWild === true,
        ...(options.published !== undefined && { publishedAt: options.published }),
      };

      const result = scorer.score(record, contextFromOptions(options));
      const { factors } = result;

      this.handleSuccess(
        result,
        options,
        `Risk score: ${result.enhancedScore.toFixed(2)} (${result.category})`,
        [
          `   Base score: ${result.baseScore.toFixed(2)} (age ${formatFactor(factors.age ?? 1)})`,
          `   Criticality ${formatFactor(factors.criticality)}, exposure ${formatFactor(factors.exposure)}`,
          `   Exploit ${formatFactor(factors.hasExploit)}, in the wild ${formatFactor(factors.inWild)}`,
        ]
      );
    });
  }
}
