import fsp from "node:fs/promises";
import path from "node:path";
import type { StorageAdapter } from "./adapter.js";

export class LocalStorage implements StorageAdapter {
  constructor(private basePath: string) {}

  async writeFile(filePath: string, content: Buffer | string): Promise<void> {
    const fullPath = this.resolve(filePath);
    await fsp.mkdir(path.dirname(fullPath), { recursive: true });
    await fsp.writeFile(fullPath, content);
  }

  async readFile(filePath: string): Promise<Buffer> {
    return fsp.readFile(this.resolve(filePath));
  }

  async exists(filePath: string): Promise<boolean> {
    try {
      await fsp.access(this.resolve(filePath));
      return true;
    } catch {
      return false;
    }
  }

  async getSize(filePath: string): Promise<number> {
    const stat = await fsp.stat(this.resolve(filePath));
    return stat.size;
  }

  private resolve(filePath: string): string {
    const fullPath = path.resolve(this.basePath, filePath);
    const base = path.resolve(this.basePath);
    if (fullPath !== base && !fullPath.startsWith(`${base}${path.sep}`)) {
      throw new Error(`Path ${filePath} escapes storage root`);
    }
    return fullPath;
  }
}
