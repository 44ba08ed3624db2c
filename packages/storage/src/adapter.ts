export interface StorageAdapter {
  writeFile(path: string, content: Buffer | string): Promise<void>;
  readFile(path: string): Promise<Buffer>;
  exists(path: string): Promise<boolean>;
  getSize(path: string): Promise<number>;
}

export type StorageType = "local";

export interface StorageConfig {
  type: StorageType;
  localPath?: string;
}
