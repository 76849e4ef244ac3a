/**
 * Identifier and text helpers shared by the generator, validator and prompts.
 */

const IDENTIFIER = /^[A-Za-z_$][\w$]*$/;

const RESERVED_WORDS = new Set([
  "await", "break", "case", "catch", "class", "const", "continue", "debugger",
  "default", "delete", "do", "else", "enum", "export", "extends", "false",
  "finally", "for", "function", "if", "implements", "import", "in",
  "instanceof", "interface", "let", "new", "null", "package", "private",
  "protected", "public", "return", "static", "super", "switch", "this",
  "throw", "true", "try", "typeof", "var", "void", "while", "with", "yield",
]);

/** Globals a script cannot reassign; `global.NaN = {}` throws in strict mode. */
const READ_ONLY_GLOBALS = new Set(["NaN", "Infinity", "undefined", "eval", "arguments"]);

/** True for a plain JavaScript identifier that is not a reserved word. */
export function isIdentifier(name: string): boolean {
  return IDENTIFIER.test(name) && !RESERVED_WORDS.has(name);
}

/** True when `name` can be assigned on the global object as the shared namespace. */
export function isNamespaceName(name: string): boolean {
  return isIdentifier(name) && !READ_ONLY_GLOBALS.has(name);
}

/**
 * True for names every object already answers (`constructor`, `toString`, `__proto__`).
 * A module under such a key would find the slot taken before it attaches.
 */
export function isInheritedKey(name: string): boolean {
  return name in Object.prototype;
}

/**
 * Derive the shared namespace identifier from a display name.
 *
 * @example
 *   toNamespace("Demo")          // "Demo"
 *   toNamespace("todo list")     // "TodoList"
 *   toNamespace("my-app 2")      // "MyApp2"
 *   toNamespace("42")            // "" (no leading letter)
 *   toNamespace("NaN")           // "" (read-only global)
 */
export function toNamespace(appName: string): string {
  const words = appName.match(/[A-Za-z0-9]+/g) ?? [];
  const joined = words.map((w) => w.charAt(0).toUpperCase() + w.slice(1)).join("");
  const trimmed = joined.replace(/^[0-9]+/, "");
  return isNamespaceName(trimmed) ? trimmed : "";
}

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

/** Normalise a project-relative path: forward slashes, no leading `./`. */
export function normalizePath(path: string): string {
  return path.replace(/\\/g, "/").replace(/^(\.\/)+/, "");
}
