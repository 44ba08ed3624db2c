import path from "node:path";
import { load } from "cheerio";
import type { ArchiveReader } from "./archive.js";
import { escapeModuloOperator } from "./token-utils.js";
import type {
  AssetSummary,
  ConverterType,
  CustomCreativeAsset,
  ResourceSummary,
  SnippetSummary,
} from "./types.js";

export const SNIPPET_MIMETYPES: readonly string[] = ["text/html"];
export const SCRIPT_MIMETYPES: readonly string[] = [
  "application/javascript",
  "application/x-javascript",
  "text/javascript",
];
export const INLINEABLE_MIMETYPES: readonly string[] = ["text/css", "text/html", "text/plain", ...SCRIPT_MIMETYPES];
export const UNSUPPORTED_MIMETYPES: readonly string[] = ["image/svg+xml"];

export const REVIEW_COMMENT =
  "<!-- Please make sure you review the creative and that it contains the clicktracking macro -->";

const BODY_TAG = /<body[\s>]/i;

type ContentState = { kind: "unloaded" } | { kind: "loaded"; bytes: Buffer };

export abstract class Resource {
  /** Names of the assets this resource references, in discovery order. */
  readonly assets: string[] = [];
  private state: ContentState = { kind: "unloaded" };
  private parsed: string | null = null;
  private isConverted = false;

  constructor(
    readonly id: string,
    readonly name: string,
    readonly size: number,
    readonly mimetype: string | null
  ) {}

  get root(): string {
    const dir = path.posix.dirname(this.name);
    return dir === "." ? "" : dir;
  }

  get basename(): string {
    return path.posix.basename(this.name);
  }

  get extension(): string {
    return path.posix.extname(this.name);
  }

  get loaded(): boolean {
    return this.state.kind === "loaded";
  }

  /** Reads this resource's bytes from an open archive. */
  load(archive: ArchiveReader): Buffer {
    const bytes = archive.read(this.name);
    this.state = { kind: "loaded", bytes };
    return bytes;
  }

  get bytes(): Buffer {
    if (this.state.kind === "unloaded") {
      throw new Error(`Content of ${this.name} has not been loaded`);
    }
    return this.state.bytes;
  }

  /** Loaded bytes as a binary string, so rewriting never alters bytes it does not replace. */
  get content(): string {
    return this.bytes.toString("latin1");
  }

  set content(value: string) {
    this.state = { kind: "loaded", bytes: Buffer.from(value, "latin1") };
  }

  get parsedContent(): string | null {
    return this.parsed;
  }

  get parsedBytes(): Buffer | null {
    return this.parsed === null ? null : Buffer.from(this.parsed, "latin1");
  }

  setParsedContent(value: string): void {
    const escape = this.mimetype !== null && [...SCRIPT_MIMETYPES, ...SNIPPET_MIMETYPES].includes(this.mimetype);
    this.parsed = escape ? escapeModuloOperator(value) : value;
    this.isConverted = true;
  }

  get converted(): boolean {
    return this.isConverted;
  }

  /** Returns the name relative to `root`, or null when it lives elsewhere. */
  nameRelativeTo(root: string): string | null {
    if (!root) {
      return this.name;
    }
    const prefix = root.endsWith("/") ? root : `${root}/`;
    return this.name.startsWith(prefix) ? this.name.slice(prefix.length) : null;
  }

  summary(): ResourceSummary {
    return {
      id: this.id,
      name: this.name,
      root: this.root,
      basename: this.basename,
      size: this.size,
      mimetype: this.mimetype,
      assets: [...this.assets],
      converted: this.converted,
    };
  }
}

export class Snippet extends Resource {
  converterType: ConverterType | null = null;

  override summary(): SnippetSummary {
    return { ...super.summary(), converterType: this.converterType };
  }

  /**
   * Returns the rewritten page as an HTML fragment: head elements other than
   * meta and title, followed by the body's inner HTML.
   */
  toSnippet(): string {
    const content = this.parsedBytes?.toString("utf8");
    if (!content) {
      return "";
    }
    if (!BODY_TAG.test(content)) {
      return content;
    }

    const $ = load(content);
    const parts = [REVIEW_COMMENT];
    $("head")
      .children()
      .each((_, el) => {
        if ($(el).is("meta, title")) {
          return;
        }
        parts.push($.html(el));
      });
    parts.push($("body").html() ?? "");
    return parts.join("");
  }
}

export class Asset extends Resource {
  constructor(
    id: string,
    name: string,
    size: number,
    mimetype: string | null,
    private readonly sizeLimit: number
  ) {
    super(id, name, size, mimetype);
  }

  get overLimit(): boolean {
    return this.size > this.sizeLimit;
  }

  get unsupported(): boolean {
    return this.mimetype === null || UNSUPPORTED_MIMETYPES.includes(this.mimetype);
  }

  get inlineable(): boolean {
    return this.mimetype !== null && INLINEABLE_MIMETYPES.includes(this.mimetype);
  }

  get inlined(): boolean {
    return this.inlineable && this.assets.length > 0;
  }

  override summary(): AssetSummary {
    return {
      ...super.summary(),
      inlineable: this.inlineable,
      inlined: this.inlined,
      overLimit: this.overLimit,
      unsupported: this.unsupported,
    };
  }

  /** Builds the API descriptor; omitted assets keep their macro with a null byte payload. */
  toCreativeAsset(transformId: string, archive: ArchiveReader): CustomCreativeAsset {
    let payload: Buffer;
    if (this.overLimit || this.unsupported) {
      payload = Buffer.from([0]);
    } else if (this.inlineable) {
      payload = this.parsedBytes ?? this.bytes;
    } else {
      payload = this.load(archive);
    }

    return {
      macroName: this.id,
      asset: {
        assetByteArray: payload.toString("base64"),
        fileName: `${this.id}-${transformId}${this.extension}`,
      },
    };
  }
}
