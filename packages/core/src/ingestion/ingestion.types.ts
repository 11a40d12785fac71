import type { Logger } from "../logger";
import type { VulnerabilityRecord } from "../risk_scoring";

/**
 * A vulnerability as it appears in a source file or API response, before
 * field names are normalized.
 */
export type RawVulnerability = Record<string, unknown>;

export interface NormalizedVulnerability extends VulnerabilityRecord {
  readonly id: string;
  readonly title: string;
  /** Lowercased vendor severity label (default: "medium") */
  readonly severity: string;
  /** CVSS base score as reported; the scorer clamps it to [0, 10] */
  readonly baseScore: number;
  /** ISO 8601 publication date */
  readonly publishedAt?: string;
  readonly hasKnownExploit?: boolean;
  readonly observedInWild?: boolean;
  /** Asset the vulnerability was found on */
  readonly assetId?: string;
}

export type FileFormat = "json" | "csv";
export type IngestFormat = FileFormat | "api" | "auto";

export const INGEST_FORMATS: readonly IngestFormat[] = ["auto", "json", "csv", "api"];

export interface IngestResult {
  /** Records written */
  count: number;
  /** Records dropped during normalization */
  skipped: number;
}

export type VulnerabilityIngesterDependencies = {
  logger?: Logger;
  /** Timeout for API requests in milliseconds (default: 30000) */
  timeoutMs?: number;
};
