// Main exports
export { Bundle, type AssetRoot } from "./bundle.js";
export { CreativeTransform, generateTransformId, parseCreativeRequest, stripTags } from "./transform.js";
export { BundleError, ConverterError, TransformError } from "./errors.js";

// Types
export type {
  AssetSummary,
  BundleOptions,
  ConverterType,
  Creative,
  CreativePart,
  CreativeRequest,
  CreativeSize,
  CustomCreativeAsset,
  LogLevel,
  ResourceSummary,
  SnippetSummary,
} from "./types.js";
export type { ArchiveUpload, TransformInit } from "./transform.js";

// Building blocks (for advanced usage)
export { ArchiveReader, type ArchiveEntry } from "./archive.js";
export { Asset, Resource, Snippet } from "./resource.js";
export { CONVERTERS, DefaultConverter, EdgeConverter, HypeConverter, type ConverterClass } from "./converters.js";
export {
  allGroupsMatch,
  escapeModuloOperator,
  macroPlaceholder,
  macroReplacer,
  quotePath,
  tokensPattern,
  unquotePath,
} from "./token-utils.js";
export { resolveBundleOptions } from "./config.js";
export { setLogCallback, runWithLogCallback } from "./logger.js";
