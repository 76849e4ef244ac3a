import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { generate } from "../pipeline/generator.js";
import { validate } from "../pipeline/validator.js";
import { readProject, roleFor, writeProject } from "../tools/projectFiles.js";
import { ProjectIoError } from "../utils/errors.js";
import { DEFAULT_LAYOUT } from "../types/index.js";

describe("projectFiles", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "dualmode-project-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  describe("writeProject", () => {
    it("writes every artifact and reports what it wrote", () => {
      const files = generate("Demo", ["utils", "main"]);
      const result = writeProject(dir, files);

      expect(result.files).toEqual(["index.html", "style.css", "js/utils.js", "js/main.js", "index.js"]);
      expect(readFileSync(join(dir, "js", "main.js"), "utf-8")).toBe(files[3].content);
      const expectedSize = files.reduce((sum, f) => sum + Buffer.byteLength(f.content, "utf-8"), 0);
      expect(result.totalSize).toBe(expectedSize);
    });

    it("refuses to overwrite existing files without force", () => {
      const files = generate("Demo", ["main"]);
      writeProject(dir, files);

      expect(() => writeProject(dir, files)).toThrow(ProjectIoError);
      expect(() => writeProject(dir, files)).toThrow(
        "Refusing to overwrite existing file(s): index.html, style.css, js/main.js, index.js (use --force)"
      );
    });

    it("overwrites with force", () => {
      writeProject(dir, generate("Demo", ["main"]));
      const second = generate("Other", ["main"]);

      writeProject(dir, second, { force: true });

      expect(readFileSync(join(dir, "index.html"), "utf-8")).toContain("<title>Other</title>");
    });

    it("rejects paths outside the project directory before writing anything", () => {
      const files = [
        { path: "index.html", role: "shell-markup" as const, content: "<html></html>" },
        { path: "../evil.js", role: "script" as const, content: "" },
      ];

      expect(() => writeProject(dir, files)).toThrow("Artifact path escapes the project directory: ../evil.js");
      expect(existsSync(join(dir, "index.html"))).toBe(false);
    });
  });

  describe("readProject", () => {
    it("reads scaffold files sorted by path and skips everything else", () => {
      writeProject(dir, generate("Demo", ["utils", "main"]));
      writeFileSync(join(dir, "README.md"), "# Demo\n");
      writeFileSync(join(dir, ".eslintrc.js"), "module.exports = {};\n");
      mkdirSync(join(dir, "node_modules", "lib"), { recursive: true });
      writeFileSync(join(dir, "node_modules", "lib", "index.js"), "");

      const files = readProject(dir, DEFAULT_LAYOUT);

      expect(files.map((f) => [f.path, f.role])).toEqual([
        ["index.html", "shell-markup"],
        ["index.js", "bridge-script"],
        ["js/main.js", "script"],
        ["js/utils.js", "script"],
        ["style.css", "stylesheet"],
      ]);
    });

    it("leaves bundler configs and unlinked assets out of a generated project", () => {
      writeProject(dir, generate("Demo", ["utils", "main"]));
      writeFileSync(join(dir, "vite.config.js"), 'import { defineConfig } from "vite";\nexport default defineConfig({});\n');
      mkdirSync(join(dir, "docs"));
      writeFileSync(join(dir, "docs", "print.css"), "body { color: black; }\n");

      const files = readProject(dir, DEFAULT_LAYOUT);

      expect(files.map((f) => f.path)).toEqual(["index.html", "index.js", "js/main.js", "js/utils.js", "style.css"]);
      expect(validate(files, { dependencyOrder: ["utils", "main"] }).valid).toBe(true);
    });

    it("reads scripts the shell loads from outside the script directory", () => {
      writeProject(dir, generate("Demo", ["main"]));
      const shell = readFileSync(join(dir, "index.html"), "utf-8").replace(
        '  <script defer src="js/main.js"></script>',
        '  <script defer src="vendor/lib.js"></script>\n  <script defer src="js/main.js"></script>'
      );
      writeFileSync(join(dir, "index.html"), shell);
      mkdirSync(join(dir, "vendor"));
      writeFileSync(join(dir, "vendor", "lib.js"), "(function () {})();\n");

      const files = readProject(dir, DEFAULT_LAYOUT);

      expect(files.find((f) => f.path === "vendor/lib.js")?.role).toBe("script");
    });

    it("fails with ProjectIoError for a missing directory", () => {
      expect(() => readProject(join(dir, "missing"), DEFAULT_LAYOUT)).toThrow(ProjectIoError);
    });
  });

  describe("roleFor", () => {
    it("assigns roles from the layout and the extension", () => {
      expect(roleFor("./index.html", DEFAULT_LAYOUT)).toBe("shell-markup");
      expect(roleFor("other.html", DEFAULT_LAYOUT)).toBeNull();
      expect(roleFor("index.js", DEFAULT_LAYOUT)).toBe("bridge-script");
      expect(roleFor("js/lib.js", DEFAULT_LAYOUT)).toBe("script");
      expect(roleFor("style.css", DEFAULT_LAYOUT)).toBe("stylesheet");
      expect(roleFor("vite.config.js", DEFAULT_LAYOUT)).toBeNull();
      expect(roleFor("css/theme.css", DEFAULT_LAYOUT)).toBeNull();
    });

    it("counts files outside the layout only when the shell links them", () => {
      const links = { scripts: new Set(["vendor/lib.js"]), stylesheets: new Set(["css/theme.css"]) };
      expect(roleFor("vendor/lib.js", DEFAULT_LAYOUT, links)).toBe("script");
      expect(roleFor("css/theme.css", DEFAULT_LAYOUT, links)).toBe("stylesheet");
      expect(roleFor("vendor/other.js", DEFAULT_LAYOUT, links)).toBeNull();
    });
  });
});
