// Types
export type {
  ThreatIntelRecord,
  IntelligenceSignals,
  KnownExploitedStatus,
  IntelligenceProvider,
  StoreIntelligenceProviderDependencies,
  KevCatalog,
  KevCatalogEntry,
  KevEntry,
  EpssEntry,
  EpssParseResult,
  ImportSources,
  ImportSummary,
  ThreatIntelImporterDependencies,
} from "./threat_intel.types";

// Implementation
export { DEFAULT_EPSS, StoreIntelligenceProvider, clampProbability } from "./intelligence_provider";
export { parseKevCatalog } from "./kev_catalog";
export { parseEpssCsv } from "./epss_csv";
export { ThreatIntelImporter, loadEpssFile, loadKevCatalogFile } from "./threat_intel_importer";
