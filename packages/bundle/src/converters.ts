import type { Bundle } from "./bundle.js";
import { DefaultConverter } from "./default-converter.js";
import { EdgeConverter } from "./edge-converter.js";
import { HypeConverter } from "./hype-converter.js";
import type { Snippet } from "./resource.js";
import type { ConverterType } from "./types.js";

export interface Converter {
  convert(snippet: Snippet): void;
}

export interface ConverterClass {
  readonly type: ConverterType;
  match(snippet: Snippet): boolean;
  new (bundle: Bundle): Converter;
}

// Tool-specific converters first; the default one matches everything.
export const CONVERTERS: readonly ConverterClass[] = [EdgeConverter, HypeConverter, DefaultConverter];

export { DefaultConverter, EdgeConverter, HypeConverter };
