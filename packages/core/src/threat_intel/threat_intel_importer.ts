import { readFile } from "fs/promises";
import { IngestionError, errorMessage } from "../errors";
import { createLogger } from "../logger";
import type { Logger } from "../logger";
import { parseEpssCsv } from "./epss_csv";
import { parseKevCatalog } from "./kev_catalog";
import type {
  EpssParseResult,
  ImportSources,
  ImportSummary,
  KevEntry,
  ThreatIntelImporterDependencies,
  ThreatIntelRecord,
} from "./threat_intel.types";

async function readSource(filePath: string): Promise<string> {
  try {
    return await readFile(filePath, "utf-8");
  } catch (error) {
    throw new IngestionError(filePath, errorMessage(error));
  }
}

export async function loadKevCatalogFile(filePath: string): Promise<KevEntry[]> {
  return parseKevCatalog(await readSource(filePath), filePath);
}

export async function loadEpssFile(filePath: string): Promise<EpssParseResult> {
  return parseEpssCsv(await readSource(filePath), filePath);
}

/**
 * Merges KEV and EPSS entries into the intel store.
 *
 * KEV entries set the exploited flag and keep any EPSS score already stored;
 * EPSS entries update the score and keep the KEV flag.
 */
export class ThreatIntelImporter {
  private readonly logger: Logger;
  private readonly clock: () => Date;

  constructor(private readonly deps: ThreatIntelImporterDependencies) {
    this.logger = deps.logger ?? createLogger("[intel] ");
    this.clock = deps.clock ?? (() => new Date());
  }

  async import(sources: ImportSources): Promise<ImportSummary> {
    const updatedAt = this.clock().toISOString();
    const touched = new Set<string>();
    const kev = sources.kev ?? [];
    const epss = sources.epss ?? [];

    for (const entry of kev) {
      const current = await this.load(entry.cveId, updatedAt);
      await this.deps.intel.put(entry.cveId, {
        ...current,
        knownExploited: true,
        kevDateAdded: entry.dateAdded,
        ransomwareUse: entry.ransomwareUse,
        updatedAt,
      });
      touched.add(entry.cveId);
    }

    for (const entry of epss) {
      const current = await this.load(entry.cveId, updatedAt);
      const next: ThreatIntelRecord = { ...current, epss: entry.epss, updatedAt };
      if (entry.percentile !== undefined) next.percentile = entry.percentile;
      await this.deps.intel.put(entry.cveId, next);
      touched.add(entry.cveId);
    }

    this.logger.info(
      `Imported ${kev.length} KEV and ${epss.length} EPSS entries (${touched.size} CVEs)`
    );

    return { kevEntries: kev.length, epssEntries: epss.length, total: touched.size };
  }

  private async load(cveId: string, updatedAt: string): Promise<ThreatIntelRecord> {
    const existing = await this.deps.intel.get(cveId);
    return existing ?? { cveId, knownExploited: false, updatedAt };
  }
}
