import assert from "node:assert/strict";
import { afterEach, describe, it } from "node:test";
import AdmZip from "adm-zip";
import { Bundle } from "./bundle.js";
import { domainFixScript } from "./hype-converter.js";
import { setLogCallback } from "./logger.js";

function makeZip(entries: Array<[string, string | Buffer]>): Buffer {
  const zip = new AdmZip();
  for (const [name, content] of entries) {
    zip.addFile(name, typeof content === "string" ? Buffer.from(content, "utf8") : content);
  }
  return zip.toBuffer();
}

const HYPE_SCRIPT = '(function(){var f="banner.hyperesources",g=f+"/logo.png";HYPE.documents["banner"]=g;})();';
const HYPE_TAG =
  '<script type="text/javascript" charset="utf-8" src="banner.hyperesources/banner_hype_generated_script.js?12345"></script>';

function hypeArchive(html: string): Buffer {
  return makeZip([
    ["banner.hyperesources/banner_hype_generated_script.js", HYPE_SCRIPT],
    ["banner.hyperesources/logo.png", Buffer.from([0x89, 0x50, 0x4e, 0x47])],
    ["index.html", html],
  ]);
}

afterEach(() => {
  setLogCallback(null);
});

describe("HypeConverter", () => {
  it("inlines the generated script before the closing body tag", () => {
    const html = `<html><head><title>banner</title></head><body><div id="banner_hype_container">${HYPE_TAG}</div><img src="banner.hyperesources/logo.png"></body></html>`;
    const bundle = Bundle.fromArchive("t1", hypeArchive(html));
    bundle.transform();

    const snippet = bundle.snippets.get("index.html");
    assert.ok(snippet);
    assert.equal(snippet.converterType, "hype");
    assert.equal(
      snippet.parsedContent,
      [
        '<html><head><title>banner</title></head><body><div id="banner_hype_container"></div>',
        '<img src="%%FILE:PNG1%%"><script>\n',
        '(function(){var f="",g=f+"/logo.png";HYPE.documents["banner"]=g;})();\n',
        domainFixScript("banner_hype_container"),
        "\n</script>\n</body></html>",
      ].join("")
    );
    assert.deepEqual(snippet.assets, ["banner.hyperesources/logo.png"]);
  });

  it("drops the generated script from the assets", () => {
    const html = `<html><body>${HYPE_TAG}<img src="banner.hyperesources/logo.png"></body></html>`;
    const bytes = hypeArchive(html);
    const bundle = Bundle.fromArchive("t1", bytes);
    bundle.transform();

    assert.equal(bundle.assets.has("banner.hyperesources/banner_hype_generated_script.js"), false);
    assert.deepEqual(
      bundle.getCreativePart("index.html", bytes).customCreativeAssets.map((asset) => asset.macroName),
      ["PNG1"]
    );
  });

  it("appends the script to pages without a body", () => {
    const bundle = Bundle.fromArchive("t1", hypeArchive(HYPE_TAG));
    bundle.transform();

    const html = bundle.snippets.get("index.html")?.parsedContent;
    assert.ok(html);
    assert.ok(html.startsWith("<script>\n(function(){var f=\"\","));
    assert.ok(html.endsWith("onload=hypeUpdate;\n\n</script>\n"));
  });

  it("finds a generated script flattened to the archive root", () => {
    const bundle = Bundle.fromArchive(
      "t1",
      makeZip([
        ["banner_hype_generated_script.js", HYPE_SCRIPT],
        ["index.html", `<html><body>${HYPE_TAG}<img src="logo.png"></body></html>`],
        ["logo.png", Buffer.from([0x89, 0x50, 0x4e, 0x47])],
      ])
    );
    bundle.transform();

    const snippet = bundle.snippets.get("index.html");
    assert.equal(snippet?.converterType, "hype");
    assert.equal(bundle.assets.has("banner_hype_generated_script.js"), false);
    assert.ok(snippet?.parsedContent?.startsWith('<html><body><img src="%%FILE:PNG1%%"><script>\n(function(){var f="",'));
  });

  it("fails when the generated script is not in the archive", () => {
    setLogCallback(() => undefined);
    const html =
      '<html><body><script src="missing_hype_generated_script.js?1"></script><img src="banner.hyperesources/logo.png"></body></html>';
    const bundle = Bundle.fromArchive("t1", hypeArchive(html));

    assert.throws(
      () => bundle.transform(),
      (error: unknown) =>
        error instanceof Error &&
        error.message === "Error converting t1: Hype script missing_hype_generated_script.js not found."
    );
  });
});
