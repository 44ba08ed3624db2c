import assert from "node:assert/strict";
import { afterEach, describe, it } from "node:test";
import AdmZip from "adm-zip";
import { Bundle } from "./bundle.js";
import { runtimeUrl } from "./edge-converter.js";
import { setLogCallback } from "./logger.js";

const PNG_BYTES = Buffer.from([0x89, 0x50, 0x4e, 0x47]);
const JPG_BYTES = Buffer.from([0xff, 0xd8, 0xff, 0xe0]);

function makeZip(entries: Array<[string, string | Buffer]>): Buffer {
  const zip = new AdmZip();
  for (const [name, content] of entries) {
    zip.addFile(name, typeof content === "string" ? Buffer.from(content, "utf8") : content);
  }
  return zip.toBuffer();
}

const EDGE_HTML = [
  "<!DOCTYPE html>",
  "<html>",
  "<head>",
  "<!--Adobe Edge Runtime-->",
  '<script type="text/javascript" charset="utf-8" src="edge_includes/edge.6.0.0.min.js"></script>',
  "<script>",
  "AdobeEdge.loadComposition('banner', 'EDGE-1', {",
  'scaleToFit: "none"',
  "}, {dom: [ ]}, {dom: [ ]});",
  "</script>",
  "<!--Adobe Edge Runtime End-->",
  "</head>",
  '<body style="margin:0;padding:0;">',
  '<div id="Stage" class="EDGE-1"></div>',
  "</body>",
  "</html>",
].join("\n");

const EDGE_JS = [
  "(function($,Edge,compId){var Composition=Edge.Composition,Symbol=Edge.Symbol;",
  "var im='images/',aud='media/',vid='media/',js='js/',fonts={};",
  `var symbols={"stage":{content:{dom:[{id:'logo',type:'image',fill:["rgba(0,0,0,0)",im+"logo.png",'0px','0px']},{id:'copy',type:'text',text:'<a href=\\"bg.jpg\\">bg</a>'}]}}};`,
  'Edge.registerEventBinding(compId,function($){Symbol.bindElementAction(compId,"stage","click",function(sym,e){window.open("https://example.com/landing","_blank");});});',
  '})(AdobeEdge.$,AdobeEdge,"EDGE-1");',
].join("\n");

function edgeArchive(html = EDGE_HTML): Buffer {
  return makeZip([
    ["banner_edge.js", EDGE_JS],
    ["edge_includes/edge.6.0.0.min.js", "/* runtime */"],
    ["images/bg.jpg", JPG_BYTES],
    ["images/logo.png", PNG_BYTES],
    ["index.html", html],
  ]);
}

afterEach(() => {
  setLogCallback(null);
});

describe("EdgeConverter", () => {
  it("builds the runtime url from the version", () => {
    assert.equal(runtimeUrl("6.0.0"), "https://animate.adobe.com/runtime/6.0.0/edge.6.0.0.min.js");
  });

  it("rewrites the generated script through the asset registry", () => {
    const bundle = Bundle.fromArchive("t1", edgeArchive());
    bundle.transform();

    const js = bundle.assets.get("banner_edge.js")?.parsedContent;
    assert.ok(js);
    assert.ok(js.includes("var im='',aud='',vid='',js='',fonts={};"));
    assert.ok(js.includes(`fill:["rgba(0,0,0,0)",im+__assets__.macro_PNG1,'0px','0px']`));
    assert.ok(js.includes("text:'<a href=' + __assets__.macro_JPG1 + '>bg</a>'"));
    assert.ok(js.includes('window.open(clickTag,"_blank")'));
    assert.deepEqual(bundle.assets.get("banner_edge.js")?.assets, []);
  });

  it("injects click tags and the registry before the composition loader", () => {
    const bundle = Bundle.fromArchive("t1", edgeArchive());
    bundle.transform();

    const snippet = bundle.snippets.get("index.html");
    assert.ok(snippet);
    assert.equal(snippet.converterType, "edge");
    assert.deepEqual(snippet.assets, ["banner_edge.js", "images/logo.png", "images/bg.jpg"]);

    const html = snippet.parsedContent;
    assert.ok(html);
    assert.ok(
      html.includes(
        '<script type="text/javascript" charset="utf-8" src="https://animate.adobe.com/runtime/6.0.0/edge.6.0.0.min.js"></script>'
      )
    );
    assert.ok(
      html.includes(
        [
          "<script>",
          "",
          "",
          "// start injected variables",
          'var clickTag="%%CLICK_URL_UNESC%%" + "%%DEST_URL_ESC%%";',
          'var clickTarget="_blank";',
          "var __assets__ = {};",
          '__assets__.macro_PNG1 = "%%FILE:PNG1%%";',
          '__assets__.macro_JPG1 = "%%FILE:JPG1%%";',
          "// end injected variables",
          "",
          "// Firefox and IE rendering latency remover",
          "",
          "AdobeEdge.yepnope.errorTimeout = 5e2;",
          "",
          "",
          "AdobeEdge.loadComposition('%%FILE:JS1%%&_=', 'EDGE-1', {",
          "",
          'scaleToFit: "none"',
        ].join("\n")
      )
    );
  });

  it("sends the generated script and every registered asset", () => {
    const bytes = edgeArchive();
    const bundle = Bundle.fromArchive("t1", bytes);
    bundle.transform();

    const part = bundle.getCreativePart("index.html", bytes);
    assert.deepEqual(
      part.customCreativeAssets.map((asset) => asset.macroName),
      ["JS1", "PNG1", "JPG1"]
    );
    const [script] = part.customCreativeAssets;
    assert.ok(script);
    assert.equal(script.asset.fileName, "JS1-t1.js");
    assert.equal(
      Buffer.from(script.asset.assetByteArray, "base64").toString("utf8"),
      bundle.assets.get("banner_edge.js")?.parsedContent
    );
  });

  it("leaves pages with a partial signature to the default converter", () => {
    const html = '<html><body><img src="images/logo.png"><script>AdobeEdge.loadComposition</script></body></html>';
    const bundle = Bundle.fromArchive("t1", edgeArchive(html));
    bundle.transform();

    const snippet = bundle.snippets.get("index.html");
    assert.equal(snippet?.converterType, "default");
    assert.equal(
      snippet?.parsedContent,
      '<html><body><img src="%%FILE:PNG1%%"><script>AdobeEdge.loadComposition</script></body></html>'
    );
  });

  it("decodes percent-encoded names in the generated script", () => {
    const bundle = Bundle.fromArchive(
      "t1",
      makeZip([
        ["banner_edge.js", "var im='images/';\nvar symbols={fill:[im+\"my%20logo.png\",'0px']};"],
        ["edge_includes/edge.6.0.0.min.js", "/* runtime */"],
        ["images/my logo.png", PNG_BYTES],
        ["index.html", EDGE_HTML],
      ])
    );
    bundle.transform();

    assert.equal(
      bundle.assets.get("banner_edge.js")?.parsedContent,
      "var im='';\nvar symbols={fill:[im+__assets__.macro_PNG1,'0px']};"
    );
    assert.deepEqual(bundle.snippets.get("index.html")?.assets, ["banner_edge.js", "images/my logo.png"]);
  });

  it("fails when the composition loader call is malformed", () => {
    setLogCallback(() => undefined);
    const html = EDGE_HTML.replace("'EDGE-1', {", "EDGE1, {");
    const bundle = Bundle.fromArchive("t1", edgeArchive(html));
    assert.throws(() => bundle.transform(), /^BundleError: Error converting t1: Edge detected in t1 but no js found$/);
  });

  it("fails when the composition script is missing", () => {
    const messages: string[] = [];
    setLogCallback((_level, message) => {
      messages.push(message);
    });
    const html = EDGE_HTML.replace("loadComposition('banner'", "loadComposition('other'");
    const bundle = Bundle.fromArchive("t1", edgeArchive(html));
    assert.throws(() => bundle.transform(), /Edge detected in t1 but no js asset found/);
    assert.deepEqual(messages, ["Conversion error in index.html: Edge detected in t1 but no js asset found"]);
  });
});
