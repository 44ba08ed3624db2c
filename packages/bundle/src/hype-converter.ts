import path from "node:path";
import { DefaultConverter } from "./default-converter.js";
import { ConverterError } from "./errors.js";
import type { Snippet } from "./resource.js";
import { fromByteString, unquotePath } from "./token-utils.js";
import type { ConverterType } from "./types.js";

export const GENERATED_SCRIPT_SUFFIX = "_hype_generated_script.js";

const SIGNATURE_PATTERN = /<script\s[^>]*src=["'][^"']+_hype_generated_script\.js\?[0-9]+["']/;
const SCRIPT_TAG_PATTERN =
  /<script\s[^>]*src=["']([^"']+_hype_generated_script\.js)(?:\?[0-9]+)?["'][^>]*\/?>(?:\s*<\/script>)?/;
const FOLDER_VAR_PATTERN = /var f\s*=\s*"[^"]+",/g;

/** Strips the page origin from inline background images once the creative has loaded. */
export function domainFixScript(container: string): string {
  return [
    `var hypeElementContainer = '${container}';`,
    "function hypeUpdate(){",
    "  var hypeDivElements = document.getElementById(hypeElementContainer)",
    "      .getElementsByTagName('DIV');",
    "  var ph = window.location.protocol + '//' + window.location.host + '/';",
    "  for (hi=0; hi<hypeDivElements.length; hi++) {",
    "    if (hypeDivElements[hi].style.backgroundImage.indexOf('url') > -1) {",
    "      hypeDivElements[hi].style.backgroundImage = hypeDivElements[hi].style.backgroundImage" +
      ".replace('url(\"/', 'url(\"').replace(ph, '')",
    "    }",
    "  }",
    "}",
    "onload=hypeUpdate;",
    "",
  ].join("\n");
}

/** Converter for Tumult Hype exports: inlines the generated script into the page. */
export class HypeConverter extends DefaultConverter {
  static override readonly type: ConverterType = "hype";

  static override match(snippet: Snippet): boolean {
    return SIGNATURE_PATTERN.test(snippet.content);
  }

  override convert(snippet: Snippet): void {
    const content = snippet.content;
    const tag = content.match(SCRIPT_TAG_PATTERN);
    const src = tag?.[1];
    if (!tag || tag.index === undefined || !src) {
      throw new ConverterError("Hype script tag not found.");
    }

    // Exports flattened to the archive root still reference the resources folder.
    const scriptName = unquotePath(fromByteString(src));
    const scriptAsset =
      this.bundle.assetsRelativeTo(snippet).get(scriptName) ?? this.bundle.assets.get(path.posix.basename(scriptName));
    if (!scriptAsset) {
      throw new ConverterError(`Hype script ${scriptName} not found.`);
    }

    // Resources then resolve against the page instead of the export folder.
    const script = scriptAsset.content.replace(FOLDER_VAR_PATTERN, 'var f="",');
    const container = `${path.posix.basename(src).slice(0, -GENERATED_SCRIPT_SUFFIX.length)}_hype_container`;
    const inline = `<script>\n${script}\n${domainFixScript(container)}\n</script>\n`;

    let html = content.slice(0, tag.index) + content.slice(tag.index + tag[0].length);
    const bodyEnd = html.lastIndexOf("</body>");
    html = bodyEnd === -1 ? `${html}${inline}` : `${html.slice(0, bodyEnd)}${inline}${html.slice(bodyEnd)}`;

    snippet.content = html;
    this.bundle.assets.delete(scriptAsset.name);
    this.convertDefault(snippet);
  }
}
