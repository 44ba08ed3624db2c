import type { Bundle } from "./bundle.js";
import type { Resource, Snippet } from "./resource.js";
import { macroReplacer, tokensPattern, type MacroTemplate } from "./token-utils.js";
import type { ConverterType } from "./types.js";

export interface ConvertOptions {
  /** Resource collecting the references found; set for nested rewrites. */
  appendAssetsTo?: Resource;
  template?: MacroTemplate;
}

/** Catch-all converter: replaces every reachable asset path with its macro. */
export class DefaultConverter {
  static readonly type: ConverterType = "default";

  static match(_snippet: Snippet): boolean {
    return true;
  }

  constructor(protected readonly bundle: Bundle) {}

  convert(snippet: Snippet): void {
    this.convertDefault(snippet);
  }

  protected convertDefault(resource: Resource, options: ConvertOptions = {}): void {
    this.rewriteReferences(resource, options.template);
    if (options.appendAssetsTo) {
      options.appendAssetsTo.assets.push(...resource.assets);
      return;
    }
    this.inlineReferencedAssets(resource);
  }

  protected rewriteReferences(resource: Resource, template?: MacroTemplate): void {
    const assets = this.bundle.assetsRelativeTo(resource);
    const pattern = tokensPattern(assets.keys());
    const content = resource.content;
    resource.setParsedContent(pattern ? content.replace(pattern, macroReplacer(resource, assets, template)) : content);
  }

  /**
   * Rewrites every inlineable asset `owner` references, once each. The
   * reference list is the worklist: nested discoveries are appended to it.
   */
  protected inlineReferencedAssets(owner: Resource): void {
    const visited = new Set<string>();
    for (let index = 0; index < owner.assets.length; index++) {
      const name = owner.assets[index];
      if (name === undefined || visited.has(name)) continue;
      visited.add(name);

      const asset = this.bundle.assets.get(name);
      if (!asset || !asset.inlineable || asset.converted) continue;
      this.convertDefault(asset, { appendAssetsTo: owner });
    }
  }
}
