import type { StorageAdapter, StorageConfig } from "./adapter.js";
import { LocalStorage } from "./local.js";

let storageInstance: StorageAdapter | null = null;

export function getStorage(): StorageAdapter {
  if (!storageInstance) {
    storageInstance = createStorage(getStorageConfig());
  }
  return storageInstance;
}

function getStorageConfig(): StorageConfig {
  const rawType = (process.env.STORAGE_TYPE || "").trim().toLowerCase();
  if (rawType && rawType !== "local") {
    console.warn(`[storage] Unsupported STORAGE_TYPE="${process.env.STORAGE_TYPE}". Falling back to local.`);
  }

  return {
    type: "local",
    localPath: process.env.LOCAL_STORAGE_PATH || "./data",
  };
}

export function createStorage(config: StorageConfig): StorageAdapter {
  return new LocalStorage(config.localPath || "./data");
}

export type { StorageAdapter, StorageConfig } from "./adapter.js";
export { LocalStorage } from "./local.js";
