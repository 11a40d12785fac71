import type { AssetDescription } from '../context_analyzer';
import type { ThreatIntelRecord } from '../threat_intel';
import type { NormalizedVulnerability } from '../ingestion';
import type { RiskAssessment } from '../risk_assessment';

/**
 * Key-value persistence for one kind of record.
 */
export interface Store<T> {
  /**
   * Gets a record by ID
   * @returns The record or null if it doesn't exist
   */
  get(id: string): Promise<T | null>;

  /**
   * Persists a record, replacing any previous value under the same ID
   */
  put(id: string, value: T): Promise<void>;

  delete(id: string): Promise<void>;

  /**
   * Lists all record IDs
   */
  list(): Promise<string[]>;

  /**
   * Loads every record
   */
  values(): Promise<T[]>;

  exists(id: string): Promise<boolean>;
}

/**
 * The stores a vulnrank workspace is made of.
 */
export interface Stores {
  vulnerabilities: Store<NormalizedVulnerability>;
  assets: Store<AssetDescription>;
  intel: Store<ThreatIntelRecord>;
  assessments: Store<RiskAssessment>;
}

export type StoreName = keyof Stores;

export const STORE_NAMES: readonly StoreName[] = ['vulnerabilities', 'assets', 'intel', 'assessments'];

/**
 * Serializer for FsStore - allows custom serialization
 */
export interface Serializer {
  stringify: (value: unknown) => string;
  parse: <T>(text: string) => T;
}

export interface FsStoreOptions {
  /** Directory holding one file per record */
  basePath: string;

  /** File extension (default: ".json") */
  extension?: string;

  /** Custom serializer (default: JSON with indent 2) */
  serializer?: Serializer;

  /** Create directory if it doesn't exist (default: true) */
  createIfMissing?: boolean;
}
