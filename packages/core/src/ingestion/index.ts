// Types
export type {
  RawVulnerability,
  NormalizedVulnerability,
  FileFormat,
  IngestFormat,
  IngestResult,
  VulnerabilityIngesterDependencies,
} from "./ingestion.types";
export { INGEST_FORMATS } from "./ingestion.types";

// Implementation
export { normalizeVulnerability, parseFlag, parseScore } from "./normalize";
export { DEFAULT_API_TIMEOUT_MS, VulnerabilityIngester, isIngestFormat } from "./vulnerability_ingester";
