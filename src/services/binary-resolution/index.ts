/**
 * Binary resolution module.
 */

export {
  LanguageServerResolver,
  type LanguageServerResolverDeps,
} from "./language-server-resolver";
export { OverrideResolver, type OverrideResolverDeps } from "./override-resolver";
export { ToolchainDetector, type ToolchainDetectorDeps } from "./toolchain-detector";
export {
  InMemoryCacheStore,
  normalizeCacheKey,
  type CacheKey,
  type CacheStore,
} from "./cache-store";
export type { BinarySource, OverrideResolution, ResolvedBinary } from "./types";
