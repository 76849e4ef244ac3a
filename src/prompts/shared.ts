/**
 * Prompt fragments shared by the system prompt and the README renderer.
 */

import type { Layout } from "../types/index.js";

export function runBothWays(layout: Layout): string {
  return `
## Runs Two Ways (Non-Negotiable)
- Opening ${layout.shellFile} straight from disk (file://) must work: no build step, no npm install, no server
- A bundler-based preview must also work, using ${layout.bridgeFile} as its entry point
- Third-party libraries come from a CDN via classic <script src="https://..."> tags, never from node_modules
`.trim();
}

export function fileLayout(layout: Layout): string {
  return `
## Required File Layout
  ${layout.shellFile.padEnd(16)} ← page shell; <body> holds only <script defer src> tags
  ${layout.stylesheetFile.padEnd(16)} ← the one stylesheet
  ${`${layout.scriptDir}/<module>.js`.padEnd(16)} ← one classic script per module, in dependency order
  ${layout.bridgeFile.padEnd(16)} ← bundler entry: imports the stylesheet, then every script, in the same order
`.trim();
}

export function namespaceConvention(namespace: string): string {
  return `
## Shared Namespace
- Every script attaches its public API to window.${namespace}.<module> and declares nothing at the top level
- Modules read each other through ${namespace}.<module>; a module must load after every module it reads
- Plain JavaScript only: put type hints in JSDoc comments, never in the code
`.trim();
}

export function wrapperTemplate(namespace: string): string {
  return `
## Script Wrapper
\`\`\`js
(function (global) {
  "use strict";

  var ns = (global.${namespace} = global.${namespace} || {});
  if (ns.example) {
    return;
  }

  var api = {};

  ns.example = api;
})(typeof window !== "undefined" ? window : globalThis);
\`\`\`
`.trim();
}
