/**
 * Static inspection of scaffold artifacts — no execution, text only.
 *
 * Scripts are analysed on a masked copy of their source: comments (and,
 * optionally, string bodies) are replaced with spaces so regexes cannot match
 * inside them. Newlines survive masking, so line numbers stay valid.
 */

import { posix } from "path";
import { normalizePath } from "../utils/naming.js";
import type { FileArtifact } from "../types/index.js";

// ─────────────────────────────────────────
// Script masking
// ─────────────────────────────────────────

export interface MaskOptions {
  /** Keep string and template literal contents (default: blank them). */
  keepStrings?: boolean;
}

/** Characters after which a `/` starts a regex literal rather than a division. */
const REGEX_PRECEDERS = new Set(["", "(", ",", "=", ":", "[", "!", "&", "|", "?", "{", "}", ";", "+", "-", "*", "%", "<", ">", "~", "^"]);

function blank(ch: string): string {
  return ch === "\n" ? "\n" : " ";
}

export function maskSource(source: string, options: MaskOptions = {}): string {
  const keepStrings = options.keepStrings ?? false;
  let out = "";
  let i = 0;
  let lastSignificant = "";

  while (i < source.length) {
    const ch = source[i];
    const next = source[i + 1] ?? "";

    // Line comment
    if (ch === "/" && next === "/") {
      while (i < source.length && source[i] !== "\n") {
        out += " ";
        i++;
      }
      continue;
    }

    // Block comment
    if (ch === "/" && next === "*") {
      out += "  ";
      i += 2;
      while (i < source.length && !(source[i] === "*" && source[i + 1] === "/")) {
        out += blank(source[i]);
        i++;
      }
      if (i < source.length) {
        out += "  ";
        i += 2;
      }
      continue;
    }

    // String and template literals
    if (ch === '"' || ch === "'" || ch === "`") {
      const quote = ch;
      out += quote;
      i++;
      while (i < source.length && source[i] !== quote) {
        if (quote !== "`" && source[i] === "\n") break;
        if (source[i] === "\\" && i + 1 < source.length) {
          out += keepStrings ? source.slice(i, i + 2) : blank(source[i]) + blank(source[i + 1]);
          i += 2;
          continue;
        }
        out += keepStrings ? source[i] : blank(source[i]);
        i++;
      }
      if (source[i] === quote) {
        out += quote;
        i++;
      }
      lastSignificant = quote;
      continue;
    }

    // Regex literal: body treated like a string body, delimiting slashes kept
    if (ch === "/" && REGEX_PRECEDERS.has(lastSignificant)) {
      let inClass = false;
      out += ch;
      i++;
      while (i < source.length && source[i] !== "\n") {
        const c = source[i];
        i++;
        if (c === "/" && !inClass) {
          out += c;
          break;
        }
        if (c === "\\" && i < source.length) {
          out += keepStrings ? c + source[i] : "  ";
          i++;
          continue;
        }
        if (c === "[") inClass = true;
        else if (c === "]") inClass = false;
        out += keepStrings ? c : " ";
      }
      lastSignificant = "/regex";
      continue;
    }

    out += ch;
    if (!/\s/.test(ch)) {
      // Keywords such as `return` may precede a regex; identifiers and `)` may not.
      lastSignificant = /[\w$)\]]/.test(ch) ? "word" : ch;
      if (lastSignificant === "word" && /\b(?:return|typeof|case|in|of)$/.test(out.slice(-8))) {
        lastSignificant = "";
      }
    }
    i++;
  }

  return out;
}

export interface SourceLine {
  /** 1-based line number. */
  line: number;
  text: string;
}

/**
 * Lines of masked source whose first non-blank character sits outside every
 * brace, paren and bracket — i.e. statements at the top level of the file.
 */
export function topLevelLines(masked: string): SourceLine[] {
  const result: SourceLine[] = [];
  let depth = 0;
  const lines = masked.split("\n");

  lines.forEach((text, index) => {
    let seenContent = false;
    for (const ch of text) {
      if (!seenContent && !/\s/.test(ch)) {
        seenContent = true;
        if (depth === 0) result.push({ line: index + 1, text });
      }
      if (ch === "{" || ch === "(" || ch === "[") depth++;
      else if ((ch === "}" || ch === ")" || ch === "]") && depth > 0) depth--;
    }
  });

  return result;
}

/** Find every line of masked source that matches `pattern`. */
export function matchingLines(masked: string, pattern: RegExp): SourceLine[] {
  return masked
    .split("\n")
    .map((text, index) => ({ line: index + 1, text }))
    .filter(({ text }) => pattern.test(text));
}

// ─────────────────────────────────────────
// Scripts
// ─────────────────────────────────────────

export interface ScriptInfo {
  artifact: FileArtifact;
  /** Module key: the file name without extension (`js/utils.js` → `utils`). */
  key: string;
  /** Comments and strings blanked. */
  code: string;
  /** Comments blanked, strings kept. */
  codeWithStrings: string;
}

export function moduleKey(path: string): string {
  const base = posix.basename(normalizePath(path));
  const dot = base.indexOf(".");
  return dot > 0 ? base.slice(0, dot) : base;
}

export function inspectScript(artifact: FileArtifact): ScriptInfo {
  return {
    artifact,
    key: moduleKey(artifact.path),
    code: maskSource(artifact.content),
    codeWithStrings: maskSource(artifact.content, { keepStrings: true }),
  };
}

/** Global object names a classic script may attach to. */
export const GLOBAL_ALIASES = ["window", "globalThis", "self", "global", "root"] as const;

const GLOBAL_ASSIGNMENT = new RegExp(
  `\\b(?:${GLOBAL_ALIASES.join("|")})\\.([A-Za-z_$][\\w$]*)\\s*=(?!=)`,
  "g"
);

/** Names assigned on a global object, in source order (`window.App = …` → `App`). */
export function globalAssignments(code: string): string[] {
  return [...code.matchAll(GLOBAL_ASSIGNMENT)].map((m) => m[1]);
}

/**
 * Pick the namespace most scripts assign to. Ties go to the name seen first.
 */
export function inferNamespace(scripts: readonly ScriptInfo[]): string | null {
  const counts = new Map<string, number>();
  for (const script of scripts) {
    for (const name of new Set(globalAssignments(script.code))) {
      counts.set(name, (counts.get(name) ?? 0) + 1);
    }
  }

  let best: string | null = null;
  let bestCount = 0;
  for (const [name, count] of counts) {
    if (count > bestCount) {
      best = name;
      bestCount = count;
    }
  }
  return best;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Sub-keys of the namespace a script reads or writes (`Demo.utils.x` → `utils`).
 */
export function namespaceReferences(code: string, namespace: string): string[] {
  const pattern = new RegExp(`(?<![\\w$])${escapeRegExp(namespace)}\\.([A-Za-z_$][\\w$]*)`, "g");
  return [...new Set([...code.matchAll(pattern)].map((m) => m[1]))];
}

const ALIAS_DECLARATION = /\b(?:var|let|const)\s+([A-Za-z_$][\w$]*)\s*=\s*\(?\s*(?:(?:window|globalThis|self|global|root)\.)?/g;

/**
 * Local names bound to the namespace object, such as `ns` in
 * `var ns = (global.Demo = global.Demo || {})` or `var app = window.Demo`.
 */
export function namespaceAliases(code: string, namespace: string): string[] {
  const bound = new RegExp(`${escapeRegExp(namespace)}(?![\\w$.])`, "y");
  const aliases = new Set<string>();
  for (const m of code.matchAll(ALIAS_DECLARATION)) {
    bound.lastIndex = (m.index ?? 0) + m[0].length;
    if (bound.test(code) && m[1] !== namespace) aliases.add(m[1]);
  }
  return [...aliases];
}

/**
 * Sub-keys a script reads through the namespace or any local alias of it.
 */
export function namespaceDependencies(code: string, namespace: string): string[] {
  const names = [namespace, ...namespaceAliases(code, namespace)];
  return [...new Set(names.flatMap((name) => namespaceReferences(code, name)))];
}

// ─────────────────────────────────────────
// References
// ─────────────────────────────────────────

const REMOTE_REFERENCE = /^(?:[a-z][a-z0-9+.-]*:|\/\/)/i;

export function isRemoteReference(ref: string): boolean {
  return REMOTE_REFERENCE.test(ref);
}

/**
 * Resolve a local reference against the file that contains it.
 * Returns null for remote URLs, fragments and empty references.
 */
export function resolveReference(fromPath: string, ref: string): string | null {
  const cleaned = ref.trim().replace(/[?#].*$/, "");
  if (cleaned === "" || isRemoteReference(ref.trim())) return null;
  if (cleaned.startsWith("/")) return posix.normalize(cleaned.slice(1));
  return posix.normalize(posix.join(posix.dirname(normalizePath(fromPath)), cleaned));
}

// ─────────────────────────────────────────
// Shell markup
// ─────────────────────────────────────────

export interface ScriptTag {
  src: string | null;
  /** Resolved project path for a local `src`; null for inline or remote scripts. */
  resolved: string | null;
  type: string | null;
  defer: boolean;
  async: boolean;
  line: number;
}

export interface StylesheetLink {
  href: string;
  resolved: string | null;
  line: number;
}

export interface ParsedShell {
  artifact: FileArtifact;
  scripts: ScriptTag[];
  stylesheets: StylesheetLink[];
  /** Body content left after removing `<script src>` tags; null without a body. */
  bodyResidue: string | null;
  /** Resolved local script paths in load order. */
  loadOrder: string[];
}

const HTML_COMMENT = /<!--[\s\S]*?-->/g;
const SCRIPT_ELEMENT = /<script\b([^>]*)>[\s\S]*?<\/script\s*>/gi;
const LINK_ELEMENT = /<link\b([^>]*?)\/?>/gi;
const BODY_ELEMENT = /<body\b[^>]*>([\s\S]*?)<\/body\s*>/i;
const ATTRIBUTE = /([^\s=/>]+)(?:\s*=\s*(?:"([^"]*)"|'([^']*)'|([^\s>]+)))?/g;

export function parseAttributes(raw: string): Map<string, string> {
  const attrs = new Map<string, string>();
  for (const m of raw.matchAll(ATTRIBUTE)) {
    attrs.set(m[1].toLowerCase(), m[2] ?? m[3] ?? m[4] ?? "");
  }
  return attrs;
}

function lineAt(text: string, index: number): number {
  let line = 1;
  for (let i = 0; i < index; i++) {
    if (text.charCodeAt(i) === 10) line++;
  }
  return line;
}

export function parseShell(artifact: FileArtifact): ParsedShell {
  const html = artifact.content.replace(HTML_COMMENT, (c) => c.replace(/[^\n]/g, " "));

  const scripts: ScriptTag[] = [...html.matchAll(SCRIPT_ELEMENT)].map((m) => {
    const attrs = parseAttributes(m[1]);
    const src = attrs.get("src") ?? null;
    return {
      src,
      resolved: src === null ? null : resolveReference(artifact.path, src),
      type: attrs.get("type") ?? null,
      defer: attrs.has("defer"),
      async: attrs.has("async"),
      line: lineAt(html, m.index ?? 0),
    };
  });

  const stylesheets: StylesheetLink[] = [];
  for (const m of html.matchAll(LINK_ELEMENT)) {
    const attrs = parseAttributes(m[1]);
    const rel = (attrs.get("rel") ?? "").toLowerCase().split(/\s+/);
    const href = attrs.get("href");
    if (!rel.includes("stylesheet") || href === undefined) continue;
    stylesheets.push({
      href,
      resolved: resolveReference(artifact.path, href),
      line: lineAt(html, m.index ?? 0),
    });
  }

  const body = BODY_ELEMENT.exec(html);
  const bodyResidue =
    body === null
      ? null
      : body[1]
          .replace(SCRIPT_ELEMENT, (element: string, attrs: string) =>
            parseAttributes(attrs).has("src") ? "" : element
          )
          .trim();

  const loadOrder = scripts.flatMap((s) => (s.resolved === null ? [] : [s.resolved]));

  return { artifact, scripts, stylesheets, bodyResidue, loadOrder };
}

// ─────────────────────────────────────────
// Bridge
// ─────────────────────────────────────────

export interface BridgeImport {
  specifier: string;
  /** Resolved project path for a relative specifier; null for bare package names. */
  resolved: string | null;
  line: number;
}

export interface ParsedBridge {
  artifact: FileArtifact;
  imports: BridgeImport[];
}

const IMPORT_STATEMENT = /^\s*import\s+(?:[\w$*{][^"'`]*?\s*from\s*)?["']([^"']+)["']/;

export function isRelativeSpecifier(specifier: string): boolean {
  return specifier.startsWith("./") || specifier.startsWith("../") || specifier.startsWith("/");
}

export function parseBridge(artifact: FileArtifact): ParsedBridge {
  const masked = maskSource(artifact.content, { keepStrings: true });
  const imports: BridgeImport[] = [];

  masked.split("\n").forEach((text, index) => {
    const m = IMPORT_STATEMENT.exec(text);
    if (!m) return;
    const specifier = m[1];
    imports.push({
      specifier,
      resolved: isRelativeSpecifier(specifier) ? resolveReference(artifact.path, specifier) : null,
      line: index + 1,
    });
  });

  return { artifact, imports };
}

/** What the bridge imports, as resolved paths (bare specifiers kept verbatim). */
export function bridgeOrder(bridge: ParsedBridge): string[] {
  return bridge.imports.map((i) => i.resolved ?? i.specifier);
}
