import type { BundleOptions } from "./types.js";

export const DEFAULT_ASSET_SIZE_LIMIT = 1_000_000;
export const DEFAULT_MAX_ARCHIVE_ENTRIES = 2_000;

export interface ResolvedBundleOptions {
  assetSizeLimit: number;
  maxArchiveEntries: number;
}

function parsePositiveIntEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) {
    return fallback;
  }

  const parsed = Number.parseInt(raw, 10);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    return fallback;
  }

  return parsed;
}

export function resolveBundleOptions(options: BundleOptions = {}): ResolvedBundleOptions {
  return {
    assetSizeLimit: options.assetSizeLimit ?? parsePositiveIntEnv("ASSET_SIZE_LIMIT", DEFAULT_ASSET_SIZE_LIMIT),
    maxArchiveEntries:
      options.maxArchiveEntries ?? parsePositiveIntEnv("ARCHIVE_MAX_ENTRIES", DEFAULT_MAX_ARCHIVE_ENTRIES),
  };
}
