import path from "node:path";
import mime from "mime-types";
import { ArchiveReader, type ArchiveEntry } from "./archive.js";
import { resolveBundleOptions, type ResolvedBundleOptions } from "./config.js";
import { CONVERTERS } from "./converters.js";
import { BundleError, errorMessage } from "./errors.js";
import { log } from "./logger.js";
import { Asset, Resource, SNIPPET_MIMETYPES, Snippet } from "./resource.js";
import type { BundleOptions, CreativePart } from "./types.js";

const JUNK_DIRECTORY = "__MACOSX/";
const JUNK_FILES = new Set(["Thumbs.db", ".DS_Store"]);

export type AssetRoot = string | Resource | Iterable<string>;

function shouldSkip(entry: ArchiveEntry): boolean {
  if (entry.isDirectory || entry.name.endsWith("/")) return true;
  if (entry.name.includes(JUNK_DIRECTORY)) return true;
  const basename = path.posix.basename(entry.name);
  return basename.startsWith(".") || JUNK_FILES.has(basename);
}

/** Upper-cased extension without the dot, or "" when there is none. */
function macroPrefix(name: string): string {
  return path.posix.extname(name).slice(1).toUpperCase();
}

export class Bundle {
  readonly snippets = new Map<string, Snippet>();
  readonly assets = new Map<string, Asset>();
  readonly options: ResolvedBundleOptions;
  private macroCounters = new Map<string, number>();

  static fromArchive(transformId: string, bytes: Buffer, options?: BundleOptions): Bundle {
    const bundle = new Bundle(transformId, options);
    const archive = bundle.openArchive(bytes);

    for (const entry of archive.entries()) {
      if (shouldSkip(entry)) {
        log.debug(`Skipping zip entry ${entry.name}`, transformId);
        continue;
      }
      bundle.addMember(entry, archive);
    }

    if (!bundle.snippets.size) {
      throw new BundleError("No snippets found.", { transformId });
    }
    return bundle;
  }

  constructor(
    readonly transformId: string,
    options?: BundleOptions
  ) {
    this.options = resolveBundleOptions(options);
  }

  openArchive(bytes: Buffer): ArchiveReader {
    return ArchiveReader.open(this.transformId, bytes, { maxEntries: this.options.maxArchiveEntries });
  }

  /** Classifies one archive entry and loads it when its content is needed up front. */
  addMember(entry: ArchiveEntry, archive: ArchiveReader): void {
    const prefix = macroPrefix(entry.name);
    if (!prefix) {
      log.debug(`Skipping zip entry ${entry.name} without extension`, this.transformId);
      return;
    }

    const count = (this.macroCounters.get(prefix) ?? 0) + 1;
    this.macroCounters.set(prefix, count);
    const id = `${prefix}${count}`;
    const mimetype = mime.lookup(entry.name) || null;

    if (mimetype !== null && SNIPPET_MIMETYPES.includes(mimetype)) {
      const snippet = new Snippet(id, entry.name, entry.size, mimetype);
      snippet.load(archive);
      this.snippets.set(snippet.name, snippet);
      return;
    }

    const asset = new Asset(id, entry.name, entry.size, mimetype, this.options.assetSizeLimit);
    if (asset.inlineable) {
      asset.load(archive);
    }
    this.assets.set(asset.name, asset);
  }

  /**
   * Maps assets to their names relative to the first root that contains
   * them. A Resource root means the resource's own directory.
   */
  assetsRelativeTo(root: AssetRoot): Map<string, Asset> {
    let roots: string[];
    if (typeof root === "string") {
      roots = [root];
    } else if (root instanceof Resource) {
      roots = [root.root];
    } else {
      roots = [...root];
    }

    const result = new Map<string, Asset>();
    for (const asset of this.assets.values()) {
      for (const candidate of roots) {
        const name = asset.nameRelativeTo(candidate);
        if (name === null) continue;
        result.set(name, asset);
        break;
      }
    }
    return result;
  }

  /** Runs the first matching converter over every snippet. */
  transform(): void {
    if (!this.assets.size) {
      throw new BundleError("No assets in bundle.", { transformId: this.transformId });
    }

    for (const snippet of this.snippets.values()) {
      const Converter = CONVERTERS.find((candidate) => candidate.match(snippet));
      if (!Converter) continue;

      try {
        new Converter(this).convert(snippet);
      } catch (error) {
        log.error(`Conversion error in ${snippet.name}: ${errorMessage(error)}`, this.transformId);
        throw new BundleError(`Error converting ${this.transformId}: ${errorMessage(error)}`, {
          transformId: this.transformId,
          cause: error,
        });
      }

      snippet.converterType = Converter.type;
      log.info(`Converted ${snippet.name} as ${Converter.type} creative`, this.transformId);
    }
  }

  /** Builds the HTML fragment and asset list for one snippet, reading asset bytes from `bytes`. */
  getCreativePart(snippetName: string, bytes: Buffer): CreativePart {
    const snippet = this.snippets.get(snippetName);
    if (!snippet) {
      throw new BundleError("Invalid snippet name or bundle not populated", { transformId: this.transformId });
    }

    const archive = this.openArchive(bytes);
    const customCreativeAssets = [...new Set(snippet.assets)].map((name) => {
      const asset = this.assets.get(name);
      if (!asset) {
        throw new BundleError(`Asset ${name} referenced by ${snippetName} is not in the bundle`, {
          transformId: this.transformId,
        });
      }
      // Omitted assets are still sent: the snippet references their macros.
      return asset.toCreativeAsset(this.transformId, archive);
    });

    return {
      htmlSnippet: snippet.toSnippet(),
      customCreativeAssets,
    };
  }

  /** Plain-text table of the assets a snippet references. */
  assetsTable(snippetName: string): string {
    const snippet = this.snippets.get(snippetName);
    if (!snippet) {
      throw new BundleError(`Unknown snippet ${snippetName}`, { transformId: this.transformId });
    }

    const columns = ["name", "id", "size", "mimetype", "inlined", "over_limit", "unsupported"] as const;
    const rows = [...new Set(snippet.assets)].flatMap((name) => {
      const asset = this.assets.get(name);
      if (!asset) return [];
      const values: Record<(typeof columns)[number], string | number | boolean | null> = {
        name: asset.name,
        id: asset.id,
        size: asset.size,
        mimetype: asset.mimetype,
        inlined: asset.inlined,
        over_limit: asset.overLimit,
        unsupported: asset.unsupported,
      };
      return [values];
    });

    const cell = (value: string | number | boolean | null) => (value === null || value === false ? "" : String(value));
    const widths = columns.map((column) =>
      Math.max(column.length, ...rows.map((row) => cell(row[column]).length))
    );

    const lines = [`snippet: ${snippetName}`, ""];
    lines.push(columns.map((column, i) => column.padEnd(widths[i] ?? 0)).join(" "));
    lines.push(widths.map((width) => "-".repeat(width)).join(" "));
    for (const row of rows) {
      lines.push(
        columns
          .map((column, i) => {
            const value = row[column];
            const text = cell(value);
            return typeof value === "string" ? text.padEnd(widths[i] ?? 0) : text.padStart(widths[i] ?? 0);
          })
          .join(" ")
      );
    }
    return lines.map((line) => line.trimEnd()).join("\n");
  }
}
