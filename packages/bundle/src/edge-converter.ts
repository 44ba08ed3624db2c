import path from "node:path";
import { DefaultConverter } from "./default-converter.js";
import { ConverterError } from "./errors.js";
import type { Asset, Snippet } from "./resource.js";
import { allGroupsMatch, fromByteString, macroPlaceholder, tokensPattern, unquotePath } from "./token-utils.js";
import type { ConverterType } from "./types.js";

interface EdgeRuntime {
  src: string;
  name: string;
  version: string;
}

interface CompositionLoader {
  start: number;
  end: number;
  pre: string;
  post: string;
}

const SIGNATURE_PATTERN =
  /(?:(edge\.[0-9]\.[0-9]\.[0-9]\.min\.js)|(<!--Adobe Edge Runtime-->)|(AdobeEdge\.loadComposition)|(<!--Adobe Edge Runtime End-->))/;
const RUNTIME_PATTERN = /<script\s[^>]*src="(?<src>[^"]*(?<name>edge\.(?<version>[0-9.]+)\.min\.js))"[^>]*>/;
const LOADER_PATTERN = /(?<pre>AdobeEdge\.loadComposition\(')(?<name>[^']+)(?<post>', '[A-Za-z0-9_-]+', \{)/;
const FOLDER_PATHS_PATTERN = /\b(im|aud|vid|js)='([^']*?)\/?'/g;
const WINDOW_OPEN_PATTERN = /window\.open\(['"][^'"]*['"]((?:,[^)]+)?)\)/g;

const CLICK_TAGS = ['var clickTag="%%CLICK_URL_UNESC%%" + "%%DEST_URL_ESC%%";', 'var clickTarget="_blank";'];
export const MACRO_REGISTRY = "__assets__";

export function runtimeUrl(version: string): string {
  return `https://animate.adobe.com/runtime/${version}/edge.${version}.min.js`;
}

function registryMacro(id: string): string {
  return `${MACRO_REGISTRY}.macro_${id}`;
}

/** Converter for Adobe Edge Animate compositions. */
export class EdgeConverter extends DefaultConverter {
  static override readonly type: ConverterType = "edge";

  static override match(snippet: Snippet): boolean {
    return allGroupsMatch(SIGNATURE_PATTERN, snippet.content);
  }

  override convert(snippet: Snippet): void {
    const runtime = this.detectRuntime(snippet.content);
    const content = snippet.content.split(runtime.src).join(runtimeUrl(runtime.version));
    const { loader, jsAsset } = this.findEdgeJs(content, snippet.root);

    snippet.assets.push(jsAsset.name);
    this.fixEdgeJs(jsAsset, snippet.root, runtime.name);
    jsAsset.setParsedContent(this.fixClickUrl(jsAsset.parsedContent ?? jsAsset.content));

    const parts = [
      content.slice(0, loader.start),
      "\n// start injected variables",
      ...CLICK_TAGS,
      `var ${MACRO_REGISTRY} = {};`,
      ...this.registerJsAssets(jsAsset, snippet),
      "// end injected variables\n",
      "// Firefox and IE rendering latency remover\n",
      "AdobeEdge.yepnope.errorTimeout = 5e2;\n\n",
      `${loader.pre}${macroPlaceholder(jsAsset.id)}&_=${loader.post}`,
      content.slice(loader.end),
    ];
    snippet.setParsedContent(parts.join("\n"));
  }

  private detectRuntime(content: string): EdgeRuntime {
    const groups = content.match(RUNTIME_PATTERN)?.groups;
    const src = groups?.src;
    const name = groups?.name;
    const version = groups?.version;
    if (!src || !name || !version) {
      throw new ConverterError(`Edge detected in ${this.bundle.transformId} but no runtime found`);
    }
    return { src, name, version };
  }

  private findEdgeJs(content: string, root: string): { loader: CompositionLoader; jsAsset: Asset } {
    const match = content.match(LOADER_PATTERN);
    const pre = match?.groups?.pre;
    const name = match?.groups?.name;
    const post = match?.groups?.post;
    if (!match || match.index === undefined || !pre || !name || !post) {
      throw new ConverterError(`Edge detected in ${this.bundle.transformId} but no js found`);
    }

    const jsAsset = this.bundle.assetsRelativeTo(root).get(unquotePath(fromByteString(`${name}_edge.js`)));
    if (!jsAsset) {
      throw new ConverterError(`Edge detected in ${this.bundle.transformId} but no js asset found`);
    }

    return {
      loader: { start: match.index, end: match.index + match[0].length, pre, post },
      jsAsset,
    };
  }

  /**
   * Blanks the folder variables of the generated script and replaces asset
   * names in it with registry lookups. The folders become extra lookup roots.
   */
  private fixEdgeJs(jsAsset: Asset, snippetRoot: string, runtimeName: string): void {
    const original = jsAsset.content;
    const roots = [...original.matchAll(FOLDER_PATHS_PATTERN)]
      .map((match) => match[2])
      .filter((folder): folder is string => Boolean(folder))
      .map((folder) => path.posix.join(snippetRoot, fromByteString(folder)));
    roots.push(snippetRoot);
    jsAsset.content = original.replace(FOLDER_PATHS_PATTERN, "$1=''");

    const assets = this.bundle.assetsRelativeTo(roots);
    const candidates = [...assets.entries()]
      .filter(([name, asset]) => !name.endsWith(runtimeName) && asset !== jsAsset)
      .map(([name]) => name);
    const pattern = tokensPattern(candidates, (escaped) => `.{2}${escaped}.{2}`);
    const content = jsAsset.content;
    if (!pattern) {
      jsAsset.setParsedContent(content);
      return;
    }

    jsAsset.setParsedContent(
      content.replace(pattern, (match: string) => {
        const text = fromByteString(match.slice(2, -2));
        const asset = assets.get(text.includes("%") ? unquotePath(text) : text);
        if (!asset) {
          return match;
        }
        jsAsset.assets.push(asset.name);

        const macro = registryMacro(asset.id);
        if (match.startsWith('\\"') || match.startsWith("\\'")) {
          // '<img src=\"a.png\">' becomes '<img src=' + __assets__.macro_PNG1 + '>'
          return `' + ${macro} + '`;
        }
        if (match[1] === '"' || match[1] === "'") {
          // var g23='a.png', becomes var g23=__assets__.macro_PNG1,
          return `${match.slice(0, 1)}${macro}${match.slice(-1)}`;
        }
        return `${match.slice(0, 2)}${macro}${match.slice(-2)}`;
      })
    );
  }

  private fixClickUrl(content: string): string {
    return content.replace(WINDOW_OPEN_PATTERN, "window.open(clickTag$1)");
  }

  /** Moves the generated script's references onto the snippet and returns their registry entries. */
  private registerJsAssets(jsAsset: Asset, snippet: Snippet): string[] {
    const entries: string[] = [];
    for (const name of new Set(jsAsset.assets)) {
      const asset = this.bundle.assets.get(name);
      if (!asset) continue;
      snippet.assets.push(name);
      entries.push(`${registryMacro(asset.id)} = "${macroPlaceholder(asset.id)}";`);
    }
    jsAsset.assets.splice(0);
    this.inlineReferencedAssets(snippet);
    return entries;
  }
}
