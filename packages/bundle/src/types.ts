export type LogLevel = "debug" | "info" | "warn" | "error";

export type ConverterType = "default" | "edge" | "hype";

export interface BundleOptions {
  /** Assets larger than this many bytes are sent as a single null byte. */
  assetSizeLimit?: number;
  /** Archives with more entries than this are rejected. */
  maxArchiveEntries?: number;
}

export interface ResourceSummary {
  id: string;
  name: string;
  root: string;
  basename: string;
  size: number;
  mimetype: string | null;
  assets: string[];
  converted: boolean;
}

export interface SnippetSummary extends ResourceSummary {
  converterType: ConverterType | null;
}

export interface AssetSummary extends ResourceSummary {
  inlineable: boolean;
  inlined: boolean;
  overLimit: boolean;
  unsupported: boolean;
}

export interface CustomCreativeAsset {
  macroName: string;
  asset: {
    /** Base64-encoded asset bytes. */
    assetByteArray: string;
    fileName: string;
  };
}

export interface CreativePart {
  htmlSnippet: string;
  customCreativeAssets: CustomCreativeAsset[];
}

export interface CreativeSize {
  width: number;
  height: number;
}

export interface Creative extends CreativePart {
  name: string;
  advertiserId: string;
  size: CreativeSize;
  destinationUrl: string;
}

export interface CreativeRequest {
  snippetName: string;
  advertiserId: string | number;
  destinationUrl: string;
  size: string;
  creativeName?: string;
}
