import { RULES } from "../pipeline/rules.js";
import { DEFAULT_LAYOUT, type Layout } from "../types/index.js";
import { fileLayout, namespaceConvention, runBothWays, wrapperTemplate } from "./shared.js";

export { fileLayout, namespaceConvention, runBothWays, wrapperTemplate } from "./shared.js";

export type PromptVariant = "system" | "readme";

export const PROMPT_VARIANTS: readonly PromptVariant[] = ["system", "readme"];

export function isPromptVariant(value: string): value is PromptVariant {
  return PROMPT_VARIANTS.some((v) => v === value);
}

/** Placeholder namespace used when guidance is rendered for no particular app. */
const GENERIC_NAMESPACE = "App";

/**
 * The rule catalog as a checklist, blocking rules first.
 */
export function rulesChecklist(): string {
  const blocking = RULES.filter((r) => r.severity === "blocking");
  const advisory = RULES.filter((r) => r.severity === "advisory");
  return [
    "## Checklist",
    "Must hold (the page breaks otherwise):",
    ...blocking.map((r) => `- ${r.description}`),
    "",
    "Should hold:",
    ...advisory.map((r) => `- ${r.description}`),
  ].join("\n");
}

/**
 * System prompt for a model that writes small static web apps which must run
 * both from file:// and under a bundler.
 */
export function renderSystemPrompt(layout: Layout = DEFAULT_LAYOUT, namespace = GENERIC_NAMESPACE): string {
  return [
    "You write small static web apps that run unchanged when opened from disk and under a bundler-based preview.",
    "",
    runBothWays(layout),
    "",
    fileLayout(layout),
    "",
    namespaceConvention(namespace),
    "",
    wrapperTemplate(namespace),
    "",
    rulesChecklist(),
    "",
  ].join("\n");
}

export interface ReadmeContext {
  appName: string;
  modules: readonly string[];
  layout?: Layout;
  namespace?: string;
}

/**
 * README for a generated app: how to run it both ways and how to add a module.
 */
export function renderReadme({ appName, modules, layout = DEFAULT_LAYOUT, namespace }: ReadmeContext): string {
  const ns = namespace ?? GENERIC_NAMESPACE;
  return [
    `# ${appName}`,
    "",
    "## How to Run",
    `- Directly: open \`${layout.shellFile}\` in any modern browser. No installation required.`,
    `- With a bundler: point its entry at \`${layout.bridgeFile}\`.`,
    "",
    "## Modules",
    "Loaded in this order:",
    ...modules.map((m, i) => `${i + 1}. \`${layout.scriptDir}/${m}.js\` → \`${ns}.${m}\``),
    "",
    "## Adding a Module",
    `1. Create \`${layout.scriptDir}/<name>.js\` with the wrapper used by the other scripts.`,
    `2. Add \`<script defer src="${layout.scriptDir}/<name>.js"></script>\` to \`${layout.shellFile}\` after the modules it reads.`,
    `3. Add \`import "./${layout.scriptDir}/<name>.js";\` to \`${layout.bridgeFile}\` at the same position.`,
    "",
  ].join("\n");
}
