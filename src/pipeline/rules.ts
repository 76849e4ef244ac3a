/**
 * Rule Set — the fixed catalog of structural checks a dual-mode scaffold must pass.
 *
 * A dual-mode scaffold is loaded two ways:
 *  1. Directly from disk (file://): the shell markup pulls in classic scripts,
 *     which cannot use module syntax and share state only through one global
 *     namespace object.
 *  2. Through a bundler: the bridge script is the entry point and re-imports the
 *     stylesheet and the same scripts, in the same order.
 *
 * Every check is static and textual. Rules never throw on odd input; they report.
 */

import { bridgeOrder, globalAssignments, matchingLines, namespaceDependencies, topLevelLines } from "./inspect.js";
import type { ArtifactRule, Finding, Rule, RuleContext, SetRule } from "./types.js";
import type { FileArtifact } from "../types/index.js";

function at(line: number, message: string): string {
  return `line ${line}: ${message}`;
}

function list(items: readonly string[]): string {
  return items.length === 0 ? "(none)" : items.join(", ");
}

// ─────────────────────────────────────────
// Artifact presence
// ─────────────────────────────────────────

export const requiredArtifacts: SetRule = {
  id: "required-artifacts",
  description:
    "The file set has exactly one shell markup file, one stylesheet and one bridge script, and at least one script.",
  severity: "blocking",
  scope: "set",
  check(ctx) {
    const findings: Finding[] = [];
    const count = (role: FileArtifact["role"]) => ctx.files.filter((f) => f.role === role).length;

    for (const role of ["shell-markup", "stylesheet", "bridge-script"] as const) {
      const n = count(role);
      if (n !== 1) findings.push({ message: `Expected exactly one ${role} artifact, found ${n}` });
    }
    if (count("script") === 0) {
      findings.push({ message: "Expected at least one script artifact, found 0" });
    }
    return findings;
  },
};

// ─────────────────────────────────────────
// Script artifacts
// ─────────────────────────────────────────

const TOP_LEVEL_IMPORT = /^\s*import(?:\s+[\w$*{]|\s*["'])/;
const TOP_LEVEL_EXPORT = /^\s*export(?:\s+(?:default|const|let|var|function|class|async)\b|\s*[{*])/;

export const noModuleSyntax: ArtifactRule = {
  id: "no-module-syntax",
  description: "Scripts contain no top-level import or export statements; file:// pages cannot load modules.",
  severity: "blocking",
  scope: "artifact",
  appliesTo: ["script"],
  check(artifact, ctx) {
    const script = ctx.scripts.find((s) => s.artifact === artifact);
    if (!script) return [];
    const messages: string[] = [];
    for (const { line, text } of topLevelLines(script.code)) {
      if (TOP_LEVEL_IMPORT.test(text)) messages.push(at(line, "top-level import statement"));
      else if (TOP_LEVEL_EXPORT.test(text)) messages.push(at(line, "top-level export statement"));
    }
    return messages;
  },
};

export const noPackagePaths: ArtifactRule = {
  id: "no-package-paths",
  description: "Scripts do not reach into node_modules or call require(); nothing is installed next to a file:// page.",
  severity: "blocking",
  scope: "artifact",
  appliesTo: ["script"],
  check(artifact, ctx) {
    const script = ctx.scripts.find((s) => s.artifact === artifact);
    if (!script) return [];
    return [
      ...matchingLines(script.codeWithStrings, /node_modules\//).map(({ line }) =>
        at(line, "references a node_modules path")
      ),
      ...matchingLines(script.code, /(?<![\w$.])require\s*\(/).map(({ line }) => at(line, "calls require()")),
    ];
  },
};

const TYPE_NAMES = "string|number|boolean|any|unknown|void|never|object|bigint|symbol";

interface TypedPattern {
  label: string;
  test(line: string): boolean;
}

function pattern(label: string, re: RegExp): TypedPattern {
  return { label, test: (line) => re.test(line) };
}

/**
 * Comma-separated parts of every parenthesised group on a line. Commas nested
 * in braces or brackets do not split.
 */
function parenthesisedParts(line: string): string[] {
  const parts: string[] = [];
  const stack: { open: string; start: number }[] = [];
  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (ch === "(" || ch === "{" || ch === "[") {
      stack.push({ open: ch, start: i + 1 });
    } else if (ch === "," && stack.length > 0 && stack[stack.length - 1].open === "(") {
      const top = stack[stack.length - 1];
      parts.push(line.slice(top.start, i));
      top.start = i + 1;
    } else if (ch === ")" || ch === "}" || ch === "]") {
      const frame = stack.pop();
      if (frame?.open === "(" && ch === ")") parts.push(line.slice(frame.start, i));
    }
  }
  return parts;
}

const DECLARATION_ANNOTATION = /\b(?:let|const|var)\s+[A-Za-z_$][\w$]*\s*:\s*[A-Za-z_$({[]/;
const RETURN_ANNOTATION = /\bfunction\b[^(]*\([^()]*\)\s*:\s*[A-Za-z_$({[]/;
// In plain JavaScript a name followed by `:` never opens a parenthesised part.
const ANNOTATED_PARAMETER = /^\s*(?:\.\.\.)?[A-Za-z_$][\w$]*\s*\??\s*:/;

const typeAnnotation: TypedPattern = {
  label: "type annotation",
  test: (line) =>
    DECLARATION_ANNOTATION.test(line) ||
    RETURN_ANNOTATION.test(line) ||
    parenthesisedParts(line).some((part) => ANNOTATED_PARAMETER.test(part)),
};

const NON_NULL = /([\w$]+|[)\]])!(?=[.([])/g;
const PREFIX_KEYWORDS = new Set(["return", "typeof", "void", "delete", "throw", "case", "yield", "await", "in", "of", "else", "do"]);

const nonNullAssertion: TypedPattern = {
  label: "non-null assertion",
  test: (line) => [...line.matchAll(NON_NULL)].some((m) => !PREFIX_KEYWORDS.has(m[1])),
};

const TYPED_SYNTAX: TypedPattern[] = [
  pattern(
    "interface declaration",
    /^\s*(?:export\s+)?(?:declare\s+)?interface\s+[A-Za-z_$][\w$]*\s*(?:<[^>]*>\s*)?(?:extends\b[^{]*)?\{/
  ),
  pattern("type alias", /^\s*(?:export\s+)?(?:declare\s+)?type\s+[A-Za-z_$][\w$]*\s*(?:<[^>]*>\s*)?=/),
  pattern("enum declaration", /^\s*(?:export\s+)?(?:declare\s+)?(?:const\s+)?enum\s+[A-Za-z_$][\w$]*\s*\{/),
  typeAnnotation,
  pattern(
    "type assertion",
    new RegExp(`[\\w$)\\]]\\s+as\\s+(?:const|${TYPE_NAMES}|[A-Z][\\w$]*)\\s*(?:[;,)\\]}]|$)`)
  ),
  nonNullAssertion,
  pattern("access modifier", /^\s*(?:public|private|protected|readonly)\s+[A-Za-z_$][\w$]*\s*[:;=(?]/),
  pattern("generic type parameters", /\bfunction\s*[\w$]*\s*<[A-Za-z_$][\w$,\s]*>\s*\(/),
];

export const noTypedSyntax: ArtifactRule = {
  id: "no-typed-syntax",
  description:
    "Scripts are plain JavaScript: no interfaces, type aliases, enums, annotations, casts or non-null assertions. JSDoc type hints are fine.",
  severity: "blocking",
  scope: "artifact",
  appliesTo: ["script"],
  check(artifact, ctx) {
    const script = ctx.scripts.find((s) => s.artifact === artifact);
    if (!script) return [];
    const messages: string[] = [];
    script.code.split("\n").forEach((text, index) => {
      const hit = TYPED_SYNTAX.find((typed) => typed.test(text));
      if (hit) messages.push(at(index + 1, hit.label));
    });
    return messages;
  },
};

const TOP_LEVEL_DECLARATION = /^\s*(var|let|const|function\*?|async\s+function|class)\s+([A-Za-z_$][\w$]*)/;

export const namespaceAttachment: ArtifactRule = {
  id: "namespace-attachment",
  description:
    "Scripts declare nothing at the top level and publish shared behaviour only on the single shared namespace object.",
  severity: "advisory",
  scope: "artifact",
  appliesTo: ["script"],
  check(artifact, ctx) {
    const script = ctx.scripts.find((s) => s.artifact === artifact);
    if (!script) return [];
    const messages: string[] = [];

    for (const { line, text } of topLevelLines(script.code)) {
      const m = TOP_LEVEL_DECLARATION.exec(text);
      if (m) messages.push(at(line, `top-level declaration "${m[1].replace(/\s+/g, " ")} ${m[2]}"`));
    }

    const assigned = [...new Set(globalAssignments(script.code))];
    const foreign = ctx.namespace === null ? assigned.slice(1) : assigned.filter((n) => n !== ctx.namespace);
    for (const name of foreign) {
      messages.push(
        ctx.namespace === null
          ? `assigns a second global "${name}"`
          : `assigns global "${name}" instead of attaching to ${ctx.namespace}`
      );
    }
    return messages;
  },
};

const IIFE_START = /^\s*[;!+~]?\s*\(?\s*(?:async\s+)?(?:function\b|\([^)]*\)\s*=>|[A-Za-z_$][\w$]*\s*=>)/;
const DIRECTIVE = /^\s*(["'])\s*\1\s*;?\s*$/;

export const wrappedScope: ArtifactRule = {
  id: "wrapped-scope",
  description: "Each script is a single immediately-invoked function, so nothing leaks into the shared global scope.",
  severity: "advisory",
  scope: "artifact",
  appliesTo: ["script"],
  check(artifact, ctx) {
    const script = ctx.scripts.find((s) => s.artifact === artifact);
    if (!script) return [];
    const statements = topLevelLines(script.code).filter(({ text }) => !DIRECTIVE.test(text));
    if (statements.length === 0) return [];
    if (statements.length === 1 && IIFE_START.test(statements[0].text)) return [];
    const first = statements.find(({ text }) => !IIFE_START.test(text)) ?? statements[1];
    return [at(first.line, "code outside a single immediately-invoked function scope")];
  },
};

// ─────────────────────────────────────────
// Shell markup
// ─────────────────────────────────────────

function excerpt(text: string, max = 40): string {
  const flat = text.replace(/\s+/g, " ");
  return flat.length > max ? `${flat.slice(0, max)}...` : flat;
}

export const emptyBody: ArtifactRule = {
  id: "empty-body",
  description: "The shell markup body holds nothing but script tags; scripts build the page.",
  severity: "advisory",
  scope: "artifact",
  appliesTo: ["shell-markup"],
  check(artifact, ctx) {
    if (ctx.shell?.artifact !== artifact) return [];
    const residue = ctx.shell.bodyResidue;
    if (residue === null) return ["no <body> element"];
    return residue === "" ? [] : [`body contains content besides script tags: "${excerpt(residue)}"`];
  },
};

export const classicScriptTags: ArtifactRule = {
  id: "classic-script-tags",
  description: 'The shell markup uses classic script tags; type="module" is blocked for file:// pages.',
  severity: "blocking",
  scope: "artifact",
  appliesTo: ["shell-markup"],
  check(artifact, ctx) {
    if (ctx.shell?.artifact !== artifact) return [];
    return ctx.shell.scripts
      .filter((s) => s.type?.trim().toLowerCase() === "module")
      .map((s) => at(s.line, `<script type="module"${s.src === null ? "" : ` src="${s.src}"`}> cannot load from file://`));
  },
};

export const deferredScriptTags: ArtifactRule = {
  id: "deferred-script-tags",
  description: "Local scripts load with defer (not async), so they run in document order after parsing.",
  severity: "advisory",
  scope: "artifact",
  appliesTo: ["shell-markup"],
  check(artifact, ctx) {
    if (ctx.shell?.artifact !== artifact) return [];
    const messages: string[] = [];
    for (const s of ctx.shell.scripts) {
      if (s.resolved === null) continue;
      if (s.async) messages.push(at(s.line, `<script src="${s.src}"> is async, so execution order is not guaranteed`));
      else if (!s.defer) messages.push(at(s.line, `<script src="${s.src}"> is not deferred`));
    }
    return messages;
  },
};

// ─────────────────────────────────────────
// Cross-file consistency
// ─────────────────────────────────────────

export const localReferences: SetRule = {
  id: "local-references",
  description: "Every local script, stylesheet and bridge import points at a file in the set.",
  severity: "blocking",
  scope: "set",
  check(ctx) {
    if (!ctx.shell && !ctx.bridge) return "no shell markup or bridge script to check";
    const findings: Finding[] = [];

    if (ctx.shell) {
      const path = ctx.shell.artifact.path;
      for (const s of ctx.shell.scripts) {
        if (s.resolved !== null && !ctx.byPath.has(s.resolved)) {
          findings.push({ artifact: path, message: at(s.line, `script "${s.src}" does not match any artifact`) });
        }
      }
      for (const l of ctx.shell.stylesheets) {
        if (l.resolved !== null && !ctx.byPath.has(l.resolved)) {
          findings.push({ artifact: path, message: at(l.line, `stylesheet "${l.href}" does not match any artifact`) });
        }
      }
    }

    if (ctx.bridge) {
      for (const i of ctx.bridge.imports) {
        if (i.resolved !== null && !ctx.byPath.has(i.resolved)) {
          findings.push({
            artifact: ctx.bridge.artifact.path,
            message: at(i.line, `import "${i.specifier}" does not match any artifact`),
          });
        }
      }
    }
    return findings;
  },
};

export const scriptsRegistered: SetRule = {
  id: "scripts-registered",
  description: "Every script is loaded by the shell markup and imported by the bridge script.",
  severity: "blocking",
  scope: "set",
  check(ctx) {
    if (!ctx.shell && !ctx.bridge) return "no shell markup or bridge script to check";
    const loaded = new Set(ctx.shell?.loadOrder ?? []);
    const imported = new Set(ctx.bridge ? bridgeOrder(ctx.bridge) : []);
    const findings: Finding[] = [];

    for (const { artifact } of ctx.scripts) {
      const missing: string[] = [];
      if (ctx.shell && !loaded.has(artifact.path)) missing.push(`not loaded by ${ctx.shell.artifact.path}`);
      if (ctx.bridge && !imported.has(artifact.path)) missing.push(`not imported by ${ctx.bridge.artifact.path}`);
      if (missing.length > 0) findings.push({ artifact: artifact.path, message: missing.join("; ") });
    }
    return findings;
  },
};

export const bridgeMirrorsShell: SetRule = {
  id: "bridge-mirrors-shell",
  description:
    "The bridge script imports exactly the stylesheet followed by the shell's scripts, in the shell's load order.",
  severity: "blocking",
  scope: "set",
  check(ctx) {
    if (!ctx.shell || !ctx.bridge) return "needs both a shell markup and a bridge script";
    const expected = [...ctx.stylesheets.map((s) => s.path), ...ctx.shell.loadOrder];
    const actual = bridgeOrder(ctx.bridge);

    const length = Math.max(expected.length, actual.length);
    for (let i = 0; i < length; i++) {
      if (expected[i] === actual[i]) continue;
      const want = expected[i] === undefined ? "nothing" : `"${expected[i]}"`;
      const got = actual[i] === undefined ? "nothing" : `"${actual[i]}"`;
      return [
        {
          artifact: ctx.bridge.artifact.path,
          message:
            `import #${i + 1} should be ${want} but is ${got} ` +
            `(expected: ${list(expected)}; found: ${list(actual)})`,
        },
      ];
    }
    return [];
  },
};

function checkDeclaredOrder(
  declared: readonly string[],
  keys: readonly string[],
  source: string
): Finding | null {
  const present = new Set(keys);
  const declaredSet = new Set(declared);
  const want = declared.filter((k) => present.has(k));
  const got = keys.filter((k) => declaredSet.has(k));
  if (want.every((k, i) => got[i] === k)) return null;
  return {
    artifact: source,
    message: `modules load as ${list(got)}; declared order is ${list(want)}`,
  };
}

export const dependencyOrder: SetRule = {
  id: "dependency-order",
  description:
    "Scripts load in dependency order: the declared module order, and every script after the modules it reads from the namespace.",
  severity: "blocking",
  scope: "set",
  check(ctx) {
    if (!ctx.shell && !ctx.bridge) return "no shell markup or bridge script to check";
    const findings: Finding[] = [];
    const byPath = new Map(ctx.scripts.map((s) => [s.artifact.path, s]));

    const sequences: { source: string; order: string[] }[] = [];
    if (ctx.shell) sequences.push({ source: ctx.shell.artifact.path, order: ctx.shell.loadOrder });
    if (ctx.bridge) sequences.push({ source: ctx.bridge.artifact.path, order: bridgeOrder(ctx.bridge) });

    if (ctx.dependencyOrder) {
      for (const { source, order } of sequences) {
        const keys = order.flatMap((p) => {
          const script = byPath.get(p);
          return script ? [script.key] : [];
        });
        const finding = checkDeclaredOrder(ctx.dependencyOrder, keys, source);
        if (finding) findings.push(finding);
      }
    }

    if (ctx.namespace !== null) {
      const namespace = ctx.namespace;
      const reads = new Map(ctx.scripts.map((s) => [s.artifact.path, namespaceDependencies(s.code, namespace)]));

      for (const { source, order } of sequences) {
        const loaded = order.flatMap((p) => {
          const script = byPath.get(p);
          return script ? [script] : [];
        });
        const position = new Map(loaded.map((s, i) => [s.key, i]));

        loaded.forEach((script, index) => {
          for (const dep of reads.get(script.artifact.path) ?? []) {
            if (dep === script.key) continue;
            const depIndex = position.get(dep);
            if (depIndex !== undefined && depIndex > index) {
              findings.push({
                artifact: script.artifact.path,
                message: `reads ${namespace}.${dep} but ${source} loads ${loaded[depIndex].artifact.path} after it`,
              });
            }
          }
        });
      }
    }

    return findings;
  },
};

/** The catalog, in evaluation order. */
export const RULES: readonly Rule[] = Object.freeze(
  [
    requiredArtifacts,
    noModuleSyntax,
    noPackagePaths,
    noTypedSyntax,
    namespaceAttachment,
    wrappedScope,
    emptyBody,
    classicScriptTags,
    deferredScriptTags,
    localReferences,
    scriptsRegistered,
    bridgeMirrorsShell,
    dependencyOrder,
  ].map((rule) => Object.freeze(rule))
);

export function getRule(id: string): Rule | undefined {
  return RULES.find((rule) => rule.id === id);
}
