import { createLogger } from "../logger";
import type { Logger } from "../logger";
import type {
  IntelligenceProvider,
  IntelligenceSignals,
  KnownExploitedStatus,
  StoreIntelligenceProviderDependencies,
} from "./threat_intel.types";

/**
 * EPSS reported for CVEs with no imported score. Not zero: an unscored CVE is
 * not known to be safe.
 */
export const DEFAULT_EPSS = 0.1;

export function clampProbability(value: number): number {
  return Math.min(1, Math.max(0, value));
}

/**
 * IntelligenceProvider reading imported KEV/EPSS data from a store.
 *
 * A KEV listing means the CVE is exploited in the wild, so it sets both
 * hasExploit and inWild.
 */
export class StoreIntelligenceProvider implements IntelligenceProvider {
  private readonly defaultEpss: number;
  private readonly logger: Logger;

  constructor(private readonly deps: StoreIntelligenceProviderDependencies) {
    this.defaultEpss = clampProbability(deps.defaultEpss ?? DEFAULT_EPSS);
    this.logger = deps.logger ?? createLogger("[intel] ");
  }

  async getKnownExploited(vulnId: string): Promise<KnownExploitedStatus> {
    const record = await this.deps.intel.get(vulnId);
    if (!record) {
      this.logger.debug(`No intelligence for ${vulnId}, using defaults`);
      return { knownExploited: false, epss: this.defaultEpss };
    }

    const epss = record.epss !== undefined && Number.isFinite(record.epss)
      ? clampProbability(record.epss)
      : this.defaultEpss;

    return { knownExploited: record.knownExploited, epss };
  }

  async getIntelligence(vulnId: string): Promise<IntelligenceSignals> {
    const { knownExploited, epss } = await this.getKnownExploited(vulnId);
    return { hasExploit: knownExploited, inWild: knownExploited, epss };
  }
}
