/**
 * Template loader — stylesheet boilerplate and the source text of generated artifacts.
 *
 * Usage in the generator:
 *   import { getBaseStylesheet, renderShell, renderScript, renderBridge } from '../templates/index.js';
 */

import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import { dirname, join } from "path";
import { escapeHtml } from "../utils/naming.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/** Lazy-loaded CSS string */
let _baseCSS: string | null = null;

/** Return the base stylesheet (reset + design tokens). */
export function getBaseStylesheet(): string {
  if (!_baseCSS) {
    _baseCSS = readFileSync(join(__dirname, "style.css"), "utf-8");
  }
  return _baseCSS;
}

export interface ShellTemplate {
  title: string;
  /** Stylesheet href relative to the shell file. */
  stylesheetHref: string;
  /** Script srcs relative to the shell file, in load order. */
  scriptSrcs: readonly string[];
}

/**
 * The shell markup: an empty body whose only children are deferred classic scripts.
 */
export function renderShell({ title, stylesheetHref, scriptSrcs }: ShellTemplate): string {
  return [
    "<!DOCTYPE html>",
    '<html lang="en">',
    "<head>",
    '  <meta charset="UTF-8">',
    '  <meta name="viewport" content="width=device-width, initial-scale=1.0">',
    `  <title>${escapeHtml(title)}</title>`,
    `  <link rel="stylesheet" href="${escapeHtml(stylesheetHref)}">`,
    "</head>",
    "<body>",
    ...scriptSrcs.map((src) => `  <script defer src="${escapeHtml(src)}"></script>`),
    "</body>",
    "</html>",
    "",
  ].join("\n");
}

export interface ScriptTemplate {
  namespace: string;
  module: string;
  shellFile: string;
  bridgeFile: string;
}

/**
 * A classic script wrapped in an immediately-invoked function. It attaches its
 * public object to `<namespace>.<module>` and returns early if that slot is
 * already taken, so loading the file twice is harmless.
 */
export function renderScript({ namespace, module, shellFile, bridgeFile }: ScriptTemplate): string {
  return [
    "/**",
    ` * ${namespace}.${module}`,
    " *",
    ` * Classic script: loaded by ${shellFile} with <script defer> and imported by`,
    ` * ${bridgeFile} for bundlers. Do not add import or export statements.`,
    ` * Read other modules through ${namespace}.<name>; add members to \`api\`.`,
    " */",
    "(function (global) {",
    '  "use strict";',
    "",
    `  var ns = (global.${namespace} = global.${namespace} || {});`,
    `  if (ns.${module}) {`,
    "    return;",
    "  }",
    "",
    "  var api = {};",
    "",
    `  ns.${module} = api;`,
    '})(typeof window !== "undefined" ? window : globalThis);',
    "",
  ].join("\n");
}

export interface BridgeTemplate {
  shellFile: string;
  /** Import specifiers relative to the bridge file: stylesheet first, then scripts. */
  specifiers: readonly string[];
}

/** The bundler entry: side-effect imports only, mirroring the shell's load order. */
export function renderBridge({ shellFile, specifiers }: BridgeTemplate): string {
  return [
    `// Bundler entry point. Mirrors the load order in ${shellFile};`,
    "// keep both lists in sync when adding a module.",
    ...specifiers.map((s) => `import "${s}";`),
    "",
  ].join("\n");
}
