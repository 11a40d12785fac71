import type { ThreatIntel } from "../risk_scoring";
import type { Logger } from "../logger";
import type { Store } from "../store";

/**
 * Intelligence stored per CVE, merged from KEV and EPSS imports.
 */
export interface ThreatIntelRecord {
  cveId: string;
  /** Listed in the CISA Known Exploited Vulnerabilities catalog */
  knownExploited: boolean;
  /** EPSS probability of exploitation in the next 30 days, [0,1] */
  epss?: number;
  /** EPSS percentile among all scored CVEs, [0,1] */
  percentile?: number;
  /** YYYY-MM-DD date the CVE entered the KEV catalog */
  kevDateAdded?: string;
  ransomwareUse?: boolean;
  /** ISO timestamp of the last import that touched the record */
  updatedAt: string;
}

/**
 * Signals handed to the scoring core. Every field is resolved.
 */
export interface IntelligenceSignals extends ThreatIntel {
  readonly hasExploit: boolean;
  readonly inWild: boolean;
  readonly epss: number;
}

export interface KnownExploitedStatus {
  knownExploited: boolean;
  epss: number;
}

export interface IntelligenceProvider {
  getIntelligence(vulnId: string): Promise<IntelligenceSignals>;
  getKnownExploited(vulnId: string): Promise<KnownExploitedStatus>;
}

export type StoreIntelligenceProviderDependencies = {
  intel: Store<ThreatIntelRecord>;
  /** EPSS reported for unknown CVEs (default: 0.1) */
  defaultEpss?: number;
  logger?: Logger;
};

/**
 * One entry of the CISA KEV catalog, as published.
 */
export interface KevCatalogEntry {
  cveID: string;
  dateAdded: string;
  vendorProject?: string;
  product?: string;
  vulnerabilityName?: string;
  shortDescription?: string;
  requiredAction?: string;
  dueDate?: string;
  knownRansomwareCampaignUse?: string;
  notes?: string;
}

export interface KevCatalog {
  title?: string;
  catalogVersion?: string;
  dateReleased?: string;
  count?: number;
  vulnerabilities: KevCatalogEntry[];
}

export interface KevEntry {
  cveId: string;
  dateAdded: string;
  ransomwareUse: boolean;
}

export interface EpssEntry {
  cveId: string;
  epss: number;
  percentile?: number;
}

export interface EpssParseResult {
  entries: EpssEntry[];
  skipped: number;
}

export interface ImportSources {
  kev?: KevEntry[];
  epss?: EpssEntry[];
}

export interface ImportSummary {
  kevEntries: number;
  epssEntries: number;
  /** Distinct CVEs written */
  total: number;
}

export type ThreatIntelImporterDependencies = {
  intel: Store<ThreatIntelRecord>;
  logger?: Logger;
  clock?: () => Date;
};
