import { BlockList, isIPv4 } from "net";
import { createLogger } from "../logger";
import type { Logger } from "../logger";
import type { CriticalityTier, ExposureTier } from "../risk_scoring";
import { EXPOSURE_TIERS } from "../risk_scoring";
import type {
  AnalyzedAssetContext,
  AssetContextProviderDependencies,
  AssetDescription,
  ContextProvider,
  CriticalityRule,
} from "./context_analyzer.types";

/**
 * Criticality rules, first match wins.
 */
export const CRITICALITY_RULES: readonly CriticalityRule[] = [
  { keywords: ["payment", "financial"], tier: "CRITICAL" },
  { keywords: ["database", "auth"], tier: "HIGH" },
  { keywords: ["web"], tier: "MEDIUM" },
];

export const PRIVATE_IPV4_RANGES: ReadonlyArray<{ network: string; prefix: number }> = [
  { network: "10.0.0.0", prefix: 8 },
  { network: "172.16.0.0", prefix: 12 },
  { network: "192.168.0.0", prefix: 16 },
];

const privateRanges = new BlockList();
for (const range of PRIVATE_IPV4_RANGES) {
  privateRanges.addSubnet(range.network, range.prefix, "ipv4");
}

/**
 * Case-insensitive substring match of the asset type against the rules.
 */
export function classifyCriticality(assetType: string): CriticalityTier {
  const normalized = assetType.toLowerCase();
  const rule = CRITICALITY_RULES.find((r) => r.keywords.some((k) => normalized.includes(k)));
  return rule?.tier ?? "LOW";
}

export function isPrivateAddress(address: string): boolean {
  return privateRanges.check(address, "ipv4");
}

export function exposureRank(tier: ExposureTier): number {
  return EXPOSURE_TIERS.indexOf(tier);
}

/**
 * INTERNET_FACING as soon as one IPv4 address is outside the private ranges.
 * Anything that is not an IPv4 address is skipped.
 */
export function classifyExposure(ipAddresses: string[], logger?: Logger): ExposureTier {
  for (const raw of ipAddresses) {
    const address = raw.trim();
    if (!isIPv4(address)) {
      logger?.debug(`Skipping non-IPv4 address "${raw}"`);
      continue;
    }
    if (!isPrivateAddress(address)) {
      return "INTERNET_FACING";
    }
  }
  return "INTERNAL";
}

/**
 * Derives scoring context for an asset.
 */
export function analyzeAsset(asset: AssetDescription, logger?: Logger): AnalyzedAssetContext {
  const inferred = classifyExposure(asset.ipAddresses, logger);
  const declared = asset.declaredExposure;
  const exposure =
    declared && exposureRank(declared) > exposureRank(inferred) ? declared : inferred;

  return {
    assetId: asset.id,
    criticality: classifyCriticality(asset.type),
    exposure,
    businessFunctions: [...asset.businessFunctions],
  };
}

/**
 * ContextProvider backed by an asset store.
 * Unknown assets resolve to null, which scoring treats as neutral.
 */
export class AssetContextProvider implements ContextProvider {
  private readonly logger: Logger;

  constructor(private readonly deps: AssetContextProviderDependencies) {
    this.logger = deps.logger ?? createLogger("[context] ");
  }

  async getContext(assetId: string): Promise<AnalyzedAssetContext | null> {
    const asset = await this.deps.assets.get(assetId);
    if (!asset) {
      this.logger.debug(`No asset registered for ${assetId}`);
      return null;
    }
    return analyzeAsset(asset, this.logger);
  }
}
