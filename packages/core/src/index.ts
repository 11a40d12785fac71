// Scoring core
export * as Scoring from "./risk_scoring";
export * as Context from "./context_analyzer";
export * as Intel from "./threat_intel";

// Pipeline
export * as Ingestion from "./ingestion";
export * as Assessment from "./risk_assessment";
export * as Reports from "./report_generator";

// Infrastructure
export * as Config from "./config_manager";
export * as ConfigStore from "./config_store";
export * as Errors from "./errors";
export * as Logger from "./logger";
export * as Schemas from "./schemas";
export * as Store from "./store";
