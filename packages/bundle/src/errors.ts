export class BundleError extends Error {
  readonly transformId?: string;

  constructor(message: string, options?: { transformId?: string; cause?: unknown }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = "BundleError";
    this.transformId = options?.transformId;
  }
}

export class ConverterError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConverterError";
  }
}

export class TransformError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TransformError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
