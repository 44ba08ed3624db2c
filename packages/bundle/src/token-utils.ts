export interface ReferenceOwner {
  readonly assets: string[];
}

export interface MacroTarget {
  readonly id: string;
  readonly name: string;
}

export type MacroTemplate = (id: string) => string;

const MODULO_OPERATOR = /(?<!%)%(?=[acghinstu])/g;

export function macroPlaceholder(id: string): string {
  return `%%FILE:${id}%%`;
}

/** Percent-encodes a path, keeping letters, digits, `_.-` and `/` verbatim. */
export function quotePath(token: string): string {
  return encodeURIComponent(token)
    .replace(/%2F/g, "/")
    .replace(/[!~*'()]/g, (char) => `%${char.charCodeAt(0).toString(16).toUpperCase()}`);
}

export function unquotePath(token: string): string {
  try {
    return decodeURIComponent(token);
  } catch {
    // Malformed escapes are matched literally.
    return token;
  }
}

/**
 * Resource content is kept as a binary string: one UTF-16 code unit per byte.
 * Names are UTF-8 strings, so they are matched through their byte form.
 */
export function toByteString(text: string): string {
  return Buffer.from(text, "utf8").toString("latin1");
}

export function fromByteString(bytes: string): string {
  return Buffer.from(bytes, "latin1").toString("utf8");
}

export function quotedUnquotedTokens(tokens: Iterable<string>): Set<string> {
  const result = new Set<string>();
  for (const token of tokens) {
    result.add(token);
    result.add(quotePath(token));
  }
  return result;
}

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Builds one global alternation regex over every token, verbatim and
 * percent-encoded, in the byte form used for resource content. Longer tokens come first so that `logo.png` never shadows
 * `logo.png.map`. Returns null when there is nothing to match.
 */
export function tokensPattern(
  tokens: Iterable<string>,
  format: (escaped: string) => string = (escaped) => escaped
): RegExp | null {
  const alternatives = [...quotedUnquotedTokens(tokens)]
    .filter(Boolean)
    .map(toByteString)
    .sort((a, b) => b.length - a.length)
    .map((token) => format(escapeRegExp(token)));

  if (!alternatives.length) {
    return null;
  }

  return new RegExp(`(${alternatives.join("|")})`, "g");
}

/** True when every capture group of `pattern` fires at least once in `text`. */
export function allGroupsMatch(pattern: RegExp, text: string): boolean {
  const flags = pattern.flags.includes("g") ? pattern.flags : `${pattern.flags}g`;
  let seen: boolean[] | null = null;

  for (const match of text.matchAll(new RegExp(pattern.source, flags))) {
    const groups = match.slice(1);
    const current: boolean[] = seen ?? groups.map(() => false);
    groups.forEach((group, index) => {
      if (group) {
        current[index] = true;
      }
    });
    seen = current;
  }

  return seen !== null && seen.every(Boolean);
}

/**
 * Returns a replace callback mapping a matched token to its asset's macro
 * placeholder. Each hit is recorded on `owner`; misses are left untouched.
 */
export function macroReplacer(
  owner: ReferenceOwner,
  assets: ReadonlyMap<string, MacroTarget>,
  template: MacroTemplate = macroPlaceholder
): (match: string) => string {
  return (match: string) => {
    const text = fromByteString(match);
    const name = text.includes("%") ? unquotePath(text) : text;
    const asset = assets.get(name);
    if (!asset) {
      return match;
    }
    owner.assets.push(asset.name);
    return template(asset.id);
  };
}

/** Keeps literal modulo arithmetic from being read as an ad-server macro. */
export function escapeModuloOperator(text: string): string {
  return text.replace(MODULO_OPERATOR, "% ");
}
