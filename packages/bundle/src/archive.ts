import AdmZip from "adm-zip";
import { BundleError, errorMessage } from "./errors.js";

export interface ArchiveEntry {
  name: string;
  /** Uncompressed size as declared by the central directory. */
  size: number;
  isDirectory: boolean;
}

export interface ArchiveOpenOptions {
  maxEntries: number;
}

export class ArchiveReader {
  static open(transformId: string, bytes: Buffer, options: ArchiveOpenOptions): ArchiveReader {
    let zip: AdmZip;
    try {
      zip = new AdmZip(bytes);
    } catch (error) {
      throw new BundleError(`Error opening zip from bundle key ${transformId}: ${errorMessage(error)}`, {
        transformId,
        cause: error,
      });
    }

    const reader = new ArchiveReader(transformId, zip);
    if (reader.entries().length > options.maxEntries) {
      throw new BundleError(
        `Zip for bundle key ${transformId} has more than ${options.maxEntries} entries`,
        { transformId }
      );
    }
    return reader;
  }

  private constructor(
    readonly transformId: string,
    private readonly zip: AdmZip
  ) {}

  entries(): ArchiveEntry[] {
    return this.zip.getEntries().map((entry) => ({
      name: entry.entryName,
      size: entry.header.size,
      isDirectory: entry.isDirectory,
    }));
  }

  read(name: string): Buffer {
    const entry = this.zip.getEntry(name);
    if (!entry) {
      throw new BundleError(`Zip entry ${name} not found in bundle key ${this.transformId}`, {
        transformId: this.transformId,
      });
    }

    try {
      return entry.getData();
    } catch (error) {
      throw new BundleError(
        `Error reading zip entry ${name} for bundle key ${this.transformId}: ${errorMessage(error)}`,
        { transformId: this.transformId, cause: error }
      );
    }
  }
}
