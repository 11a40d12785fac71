export type {
  AssetDescription,
  AnalyzedAssetContext,
  CriticalityRule,
  ContextProvider,
  AssetContextProviderDependencies,
} from "./context_analyzer.types";

export {
  CRITICALITY_RULES,
  PRIVATE_IPV4_RANGES,
  AssetContextProvider,
  analyzeAsset,
  classifyCriticality,
  classifyExposure,
  exposureRank,
  isPrivateAddress,
} from "./context_analyzer";
