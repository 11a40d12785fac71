export type { VulnrankConfig, ResolvedScoringOptions, IConfigManager } from "./config_manager.types";
export { ConfigManager, DEFAULT_CONFIG, DEFAULT_REPORTS_DIR, DEFAULT_STORAGE_PATH } from "./config_manager";
export { validateConfig } from "./config_validation";
