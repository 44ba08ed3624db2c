import crypto from "node:crypto";
import { load } from "cheerio";
import { z } from "zod";
import type { StorageAdapter } from "@h5c/storage";
import { Bundle } from "./bundle.js";
import { BundleError, TransformError } from "./errors.js";
import { runWithLogCallback, type LogCallback } from "./logger.js";
import type {
  AssetSummary,
  BundleOptions,
  Creative,
  CreativePart,
  CreativeRequest,
  SnippetSummary,
} from "./types.js";

const advertiserIdSchema = z.union([z.string(), z.number()]).transform((value, ctx) => {
  const text = String(value).trim();
  if (!/^[+-]?\d+$/.test(text)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid advertiser id '${value}'` });
    return z.NEVER;
  }
  return text;
});

const sizeSchema = z.string().transform((value, ctx) => {
  const match = /^(\d+)x(\d+)$/.exec(value.trim());
  const width = Number(match?.[1]);
  const height = Number(match?.[2]);
  if (!match || width <= 0 || height <= 0) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid size '${value}'` });
    return z.NEVER;
  }
  return { width, height };
});

const destinationUrlSchema = z.string().superRefine((value, ctx) => {
  let url: URL;
  try {
    url = new URL(value);
  } catch {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid URL '${value}'` });
    return;
  }
  if (!url.protocol || !url.host) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Incorrect URL '${value}'` });
  }
});

const creativeRequestSchema = z.object({
  advertiserId: advertiserIdSchema,
  size: sizeSchema,
  destinationUrl: destinationUrlSchema,
  snippetName: z.string().min(1, "Missing snippet name"),
  creativeName: z.string().optional(),
});

export type ParsedCreativeRequest = z.infer<typeof creativeRequestSchema>;

export function parseCreativeRequest(request: CreativeRequest): ParsedCreativeRequest {
  const parsed = creativeRequestSchema.safeParse(request);
  if (!parsed.success) {
    throw new TransformError(parsed.error.issues[0]?.message ?? "Invalid creative request", {
      cause: parsed.error,
    });
  }
  return parsed.data;
}

export function stripTags(html: string): string {
  return load(html).text().trim();
}

/** URL-safe id derived from the uploader and upload time. */
export function generateTransformId(networkCode: string, userId: string, created: Date): string {
  if (!networkCode) {
    throw new TransformError("Cannot generate id, empty network code");
  }
  const seconds = Math.floor(created.getTime() / 1000);
  return crypto.createHash("md5").update(`${networkCode}${userId}${seconds}`).digest("base64url");
}

export interface TransformInit {
  id: string;
  archivePath: string;
  filename?: string;
  bundleOptions?: BundleOptions;
  onLog?: LogCallback;
}

export interface ArchiveUpload {
  networkCode: string;
  userId: string;
  filename: string;
  bytes: Buffer;
  created?: Date;
}

/**
 * One uploaded archive. The converted Bundle is built on first use and kept
 * for the lifetime of this object.
 */
export class CreativeTransform {
  readonly id: string;
  readonly archivePath: string;
  readonly filename?: string;
  private readonly bundleOptions?: BundleOptions;
  private readonly onLog?: LogCallback;
  private bundlePromise: Promise<Bundle> | null = null;

  static async create(
    storage: StorageAdapter,
    upload: ArchiveUpload,
    options: Pick<TransformInit, "bundleOptions" | "onLog"> = {}
  ): Promise<CreativeTransform> {
    const id = generateTransformId(upload.networkCode, upload.userId, upload.created ?? new Date());
    const archivePath = `bundles/${id}.zip`;
    await storage.writeFile(archivePath, upload.bytes);
    return new CreativeTransform(storage, { id, archivePath, filename: upload.filename, ...options });
  }

  constructor(
    private readonly storage: StorageAdapter,
    init: TransformInit
  ) {
    this.id = init.id;
    this.archivePath = init.archivePath;
    this.filename = init.filename;
    this.bundleOptions = init.bundleOptions;
    this.onLog = init.onLog;
  }

  getBundle(): Promise<Bundle> {
    if (!this.bundlePromise) {
      const pending = this.withLog(() => this.buildBundle());
      this.bundlePromise = pending;
      // Only successful builds are kept.
      pending.catch(() => {
        if (this.bundlePromise === pending) {
          this.bundlePromise = null;
        }
      });
    }
    return this.bundlePromise;
  }

  async snippets(): Promise<SnippetSummary[]> {
    const bundle = await this.getBundle();
    return [...bundle.snippets.values()].map((snippet) => snippet.summary());
  }

  async assets(): Promise<AssetSummary[]> {
    const bundle = await this.getBundle();
    return [...bundle.assets.values()].map((asset) => asset.summary());
  }

  /** Returns the creative in the shape expected by the ad server's creative API. */
  async getCreative(request: CreativeRequest): Promise<Creative> {
    const { advertiserId, size, destinationUrl, snippetName, creativeName } = parseCreativeRequest(request);
    const bundle = await this.getBundle();
    const bytes = await this.readArchive();

    let part: CreativePart;
    try {
      part = await this.withLog(async () => bundle.getCreativePart(snippetName, bytes));
    } catch (error) {
      if (error instanceof BundleError) {
        throw new TransformError(error.message, { cause: error });
      }
      throw error;
    }

    const name = creativeName ? stripTags(creativeName) : ["HTML5", this.filename, this.id].filter(Boolean).join(" ");
    return { ...part, name, advertiserId, size, destinationUrl };
  }

  private async buildBundle(): Promise<Bundle> {
    const bytes = await this.readArchive();
    try {
      const bundle = Bundle.fromArchive(this.id, bytes, this.bundleOptions);
      bundle.transform();
      return bundle;
    } catch (error) {
      if (error instanceof BundleError) {
        throw new TransformError(`Cannot transform the archive: ${error.message}`, { cause: error });
      }
      throw error;
    }
  }

  private async readArchive(): Promise<Buffer> {
    if (!(await this.storage.exists(this.archivePath))) {
      throw new TransformError(`Cannot open archive ${this.archivePath}`);
    }
    return this.storage.readFile(this.archivePath);
  }

  private withLog<T>(fn: () => Promise<T>): Promise<T> {
    return this.onLog ? runWithLogCallback(this.onLog, fn) : fn();
  }
}
