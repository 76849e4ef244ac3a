import { describe, it, expect } from "vitest";
import { generate, parseGenerateInput } from "../pipeline/generator.js";
import { validate } from "../pipeline/validator.js";
import { InputError } from "../utils/errors.js";
import type { Layout } from "../types/index.js";

function contentOf(files: { path: string; content: string }[], path: string): string {
  const file = files.find((f) => f.path === path);
  if (!file) throw new Error(`missing ${path}`);
  return file.content;
}

describe("generate", () => {
  describe("artifacts", () => {
    it("emits shell, stylesheet, scripts in module order, then bridge", () => {
      const files = generate("Demo", ["utils", "main"]);
      expect(files.map((f) => [f.path, f.role])).toEqual([
        ["index.html", "shell-markup"],
        ["style.css", "stylesheet"],
        ["js/utils.js", "script"],
        ["js/main.js", "script"],
        ["index.js", "bridge-script"],
      ]);
    });

    it("loads utils before main with deferred classic tags and nothing else in the body", () => {
      const shell = contentOf(generate("Demo", ["utils", "main"]), "index.html");
      expect(shell).toContain(
        '<body>\n  <script defer src="js/utils.js"></script>\n  <script defer src="js/main.js"></script>\n</body>'
      );
      expect(shell).toContain('<link rel="stylesheet" href="style.css">');
      expect(shell).not.toContain('type="module"');
    });

    it("imports the stylesheet, then utils, then main from the bridge", () => {
      const bridge = contentOf(generate("Demo", ["utils", "main"]), "index.js");
      expect(bridge).toBe(
        [
          "// Bundler entry point. Mirrors the load order in index.html;",
          "// keep both lists in sync when adding a module.",
          'import "./style.css";',
          'import "./js/utils.js";',
          'import "./js/main.js";',
          "",
        ].join("\n")
      );
    });

    it("wraps each script in a guarded scope attached under the namespace", () => {
      const files = generate("Demo", ["utils", "main"]);
      const utils = contentOf(files, "js/utils.js");
      expect(utils).toContain("(function (global) {");
      expect(utils).toContain("  var ns = (global.Demo = global.Demo || {});");
      expect(utils).toContain("  if (ns.utils) {\n    return;\n  }");
      expect(utils).toContain("  ns.utils = api;");
      expect(contentOf(files, "js/main.js")).toContain("  ns.main = api;");
    });

    it("derives a PascalCase namespace from the app name", () => {
      const files = generate("todo list", ["store"]);
      expect(contentOf(files, "js/store.js")).toContain("global.TodoList = global.TodoList || {}");
      expect(contentOf(files, "index.html")).toContain("<title>todo list</title>");
    });

    it("honours an explicit namespace", () => {
      const files = generate("42", ["store"], { namespace: "App" });
      expect(contentOf(files, "js/store.js")).toContain("global.App = global.App || {}");
    });

    it("escapes the app name in the title", () => {
      const shell = contentOf(generate("Tom & <Jerry>", ["main"]), "index.html");
      expect(shell).toContain("<title>Tom &amp; &lt;Jerry&gt;</title>");
    });
  });

  describe("determinism", () => {
    it("returns byte-identical output for identical arguments", () => {
      const a = generate("Demo", ["utils", "state", "view", "main"]);
      const b = generate("Demo", ["utils", "state", "view", "main"]);
      expect(a).toEqual(b);
    });
  });

  describe("round trip", () => {
    const moduleLists = [["main"], ["utils", "main"], ["utils", "state", "view", "main"], ["a", "b", "c", "d", "e"]];

    for (const modules of moduleLists) {
      it(`validates cleanly for [${modules.join(", ")}]`, () => {
        const report = validate(generate("Demo", modules), { dependencyOrder: modules });
        expect(report.valid).toBe(true);
        expect(report.warnings).toHaveLength(0);
      });
    }

    it("validates cleanly with a nested layout", () => {
      const layout: Layout = {
        shellFile: "public/index.html",
        stylesheetFile: "public/style.css",
        scriptDir: "public/js",
        bridgeFile: "src/entry.js",
      };
      const files = generate("Demo", ["utils", "main"], { layout });
      expect(contentOf(files, "public/index.html")).toContain('<script defer src="js/utils.js"></script>');
      expect(contentOf(files, "src/entry.js")).toContain('import "../public/js/main.js";');

      const report = validate(files, { dependencyOrder: ["utils", "main"] });
      expect(report.violations).toEqual([]);
    });
  });

  describe("input errors", () => {
    it("fails with InputError on an empty module list", () => {
      expect(() => generate("Demo", [])).toThrow(InputError);
      expect(() => generate("Demo", [])).toThrow("Invalid input: At least one module is required");
    });

    it("rejects duplicate module names, ignoring case", () => {
      try {
        generate("Demo", ["utils", "Utils"]);
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(InputError);
        if (error instanceof InputError) {
          expect(error.issues).toEqual([{ path: "modules", message: 'Duplicate module name "Utils"' }]);
        }
      }
    });

    it("rejects module names that are not identifiers", () => {
      expect(() => generate("Demo", ["my-module"])).toThrow(
        'Module name "my-module" is not a valid JavaScript identifier'
      );
    });

    it("rejects module names every object already has", () => {
      for (const name of ["constructor", "toString", "hasOwnProperty", "__proto__"]) {
        expect(() => generate("Demo", ["utils", name])).toThrow(
          `Module name "${name}" is already a property of every object`
        );
      }
    });

    it("rejects read-only globals as the namespace", () => {
      expect(() => generate("NaN", ["main"])).toThrow(
        'App name "NaN" does not yield a namespace identifier; pass one explicitly'
      );
      expect(() => generate("Infinity", ["main"])).toThrow(InputError);
      expect(() => generate("Demo", ["main"], { namespace: "undefined" })).toThrow(
        'Namespace "undefined" is a read-only global'
      );
    });

    it("rejects an app name with no namespace identifier", () => {
      expect(() => generate("42", ["main"])).toThrow(InputError);
      expect(() => generate("   ", ["main"])).toThrow("App name must not be empty");
    });

    it("rejects modules whose file would overwrite a fixed file", () => {
      const layout: Layout = { shellFile: "index.html", stylesheetFile: "style.css", scriptDir: ".", bridgeFile: "index.js" };
      expect(() => parseGenerateInput("Demo", ["index"], { layout })).toThrow("Generated file names collide");
    });
  });
});
