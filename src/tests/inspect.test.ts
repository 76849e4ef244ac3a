import { describe, it, expect } from "vitest";
import {
  bridgeOrder,
  inferNamespace,
  inspectScript,
  maskSource,
  moduleKey,
  namespaceAliases,
  namespaceDependencies,
  namespaceReferences,
  parseBridge,
  parseShell,
  resolveReference,
  topLevelLines,
} from "../pipeline/inspect.js";

describe("maskSource", () => {
  it("blanks comments and string bodies", () => {
    expect(maskSource('var a = "x"; // c')).toBe('var a = " ";     ');
  });

  it("keeps string bodies when asked", () => {
    expect(maskSource('var a = "x"; // c', { keepStrings: true })).toBe('var a = "x";     ');
  });

  it("keeps newlines inside block comments", () => {
    expect(maskSource("a /* x\ny */ b")).toBe("a     \n     b");
  });

  it("blanks regex bodies without reading their quotes as strings", () => {
    expect(maskSource('var r = /"/; var s = "q";')).toBe('var r = / /; var s = " ";');
    expect(maskSource("var re = /[{(]\\//g;")).toBe("var re = /      /g;");
  });

  it("keeps regex bodies alongside strings when asked", () => {
    expect(maskSource('var r = /"/; var s = "q";', { keepStrings: true })).toBe('var r = /"/; var s = "q";');
  });

  it("treats a slash after an identifier as division", () => {
    expect(maskSource('var x = a / b; var s = "q";')).toBe('var x = a / b; var s = " ";');
  });
});

describe("topLevelLines", () => {
  it("returns only statements outside every bracket", () => {
    const masked = maskSource("var a = 1;\nfunction f() {\n  return 2;\n}\nf();");
    expect(topLevelLines(masked).map((l) => l.line)).toEqual([1, 2, 5]);
  });
});

describe("moduleKey", () => {
  it("strips the directory and every extension", () => {
    expect(moduleKey("js/utils.js")).toBe("utils");
    expect(moduleKey("./js/app.min.js")).toBe("app");
  });
});

describe("resolveReference", () => {
  it.each([
    ["index.html", "./style.css", "style.css"],
    ["pages/about.html", "../css/site.css", "css/site.css"],
    ["src/entry.js", "/public/app.js", "public/app.js"],
    ["site/index.html", "js/a.js?v=2", "site/js/a.js"],
  ])("resolves %s → %s", (from, ref, expected) => {
    expect(resolveReference(from, ref)).toBe(expected);
  });

  it("returns null for remote URLs and fragments", () => {
    expect(resolveReference("index.html", "https://cdn.example.com/x.js")).toBeNull();
    expect(resolveReference("index.html", "//cdn.example.com/x.js")).toBeNull();
    expect(resolveReference("index.html", "#top")).toBeNull();
  });
});

describe("parseShell", () => {
  const html = [
    "<html>",
    "<body>",
    '  <!-- <script src="old.js"></script> -->',
    '  <script src="js/a.js?v=2" defer></script>',
    "  <script>console.log(1)</script>",
    '  <script type="module" src="/js/b.js"></script>',
    '  <script src="https://cdn.example.com/lib.js"></script>',
    "</body>",
    "</html>",
  ].join("\n");
  const shell = parseShell({ path: "site/index.html", role: "shell-markup", content: html });

  it("ignores commented-out tags and records attributes and lines", () => {
    expect(shell.scripts).toEqual([
      { src: "js/a.js?v=2", resolved: "site/js/a.js", type: null, defer: true, async: false, line: 4 },
      { src: null, resolved: null, type: null, defer: false, async: false, line: 5 },
      { src: "/js/b.js", resolved: "js/b.js", type: "module", defer: false, async: false, line: 6 },
      { src: "https://cdn.example.com/lib.js", resolved: null, type: null, defer: false, async: false, line: 7 },
    ]);
  });

  it("lists local scripts in load order", () => {
    expect(shell.loadOrder).toEqual(["site/js/a.js", "js/b.js"]);
  });

  it("leaves inline scripts in the body residue", () => {
    expect(shell.bodyResidue).toBe("<script>console.log(1)</script>");
  });

  it("collects stylesheet links only", () => {
    const parsed = parseShell({
      path: "index.html",
      role: "shell-markup",
      content: '<link rel="icon" href="icon.png">\n<link rel="stylesheet" href="style.css" />',
    });
    expect(parsed.stylesheets).toEqual([{ href: "style.css", resolved: "style.css", line: 2 }]);
    expect(parsed.bodyResidue).toBeNull();
  });
});

describe("parseBridge", () => {
  it("reads side-effect and named imports, skipping comments", () => {
    const bridge = parseBridge({
      path: "index.js",
      role: "bridge-script",
      content: [
        '// import "./hidden.js";',
        'import "./style.css";',
        'import { x } from "./js/a.js";',
        'import lodash from "lodash";',
        "const y = 1;",
      ].join("\n"),
    });

    expect(bridge.imports).toEqual([
      { specifier: "./style.css", resolved: "style.css", line: 2 },
      { specifier: "./js/a.js", resolved: "js/a.js", line: 3 },
      { specifier: "lodash", resolved: null, line: 4 },
    ]);
    expect(bridgeOrder(bridge)).toEqual(["style.css", "js/a.js", "lodash"]);
  });
});

describe("namespace analysis", () => {
  const script = (path: string, content: string) => inspectScript({ path, role: "script", content });

  it("picks the name most scripts assign on a global", () => {
    const scripts = [
      script("js/a.js", "window.Other = 1;\nwindow.App = window.App || {};"),
      script("js/b.js", "globalThis.App = globalThis.App || {};"),
    ];
    expect(inferNamespace(scripts)).toBe("App");
  });

  it("breaks ties by first appearance", () => {
    expect(inferNamespace([script("js/a.js", "self.First = 1;\nself.Second = 2;")])).toBe("First");
  });

  it("returns null when nothing is attached", () => {
    expect(inferNamespace([script("js/a.js", "var x = window.App;")])).toBeNull();
  });

  it("finds local names bound to the namespace object", () => {
    const code = maskSource(
      "var ns = (global.Demo = global.Demo || {});\nvar app = window.Demo;\nvar utils = Demo.utils;\nvar other = DemoX;"
    );
    expect(namespaceAliases(code, "Demo")).toEqual(["ns", "app"]);
  });

  it("collects reads made through an alias", () => {
    const code = maskSource("var ns = (global.Demo = global.Demo || {});\nns.main = { run: function () { ns.utils.x(); Demo.view.y(); } };");
    expect(namespaceDependencies(code, "Demo")).toEqual(["view", "main", "utils"]);
  });

  it("lists namespace sub-keys without matching longer names", () => {
    expect(namespaceReferences("Demo.utils.x(); MyDemo.view; Demo.state = 1; Demo.utils;", "Demo")).toEqual([
      "utils",
      "state",
    ]);
  });
});
