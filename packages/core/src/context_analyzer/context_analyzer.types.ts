import type { AssetContext, CriticalityTier, ExposureTier } from "../risk_scoring";
import type { Logger } from "../logger";
import type { Store } from "../store";

/**
 * Asset as registered by the operator or an inventory import.
 */
export interface AssetDescription {
  id: string;
  /** Free-form asset type, e.g. "payment-gateway", "postgres database" */
  type: string;
  ipAddresses: string[];
  businessFunctions: string[];
  /**
   * Exposure the operator knows about but that addresses cannot show
   * (e.g. behind a CDN). Combined with the inferred tier, highest wins.
   */
  declaredExposure?: ExposureTier;
}

/**
 * Context derived for one asset.
 */
export interface AnalyzedAssetContext extends AssetContext {
  assetId: string;
  businessFunctions: string[];
}

/**
 * Keyword rule for criticality classification.
 */
export interface CriticalityRule {
  keywords: string[];
  tier: CriticalityTier;
}

/**
 * Anything able to resolve an asset id into scoring context.
 */
export interface ContextProvider {
  getContext(assetId: string): Promise<AnalyzedAssetContext | null>;
}

export type AssetContextProviderDependencies = {
  assets: Store<AssetDescription>;
  logger?: Logger;
};
