/**
 * Generator — emits a dual-mode scaffold for an app name and an ordered module list.
 *
 * Output order is fixed (shell, stylesheet, scripts in module order, bridge) and
 * contains nothing time- or randomness-dependent, so equal inputs give
 * byte-identical artifacts.
 */

import { posix } from "path";
import { z } from "zod";
import { InputError } from "../utils/errors.js";
import { isIdentifier, isInheritedKey, isNamespaceName, normalizePath, toNamespace } from "../utils/naming.js";
import { getBaseStylesheet, renderBridge, renderScript, renderShell } from "../templates/index.js";
import { DEFAULT_LAYOUT, type FileArtifact, type Layout } from "../types/index.js";
import type { GenerateOptions } from "./types.js";

const identifier = (what: string) =>
  z.string().refine(isIdentifier, (value) => ({
    message: `${what} "${value}" is not a valid JavaScript identifier`,
  }));

const moduleName = identifier("Module name").refine(
  (name) => !isInheritedKey(name),
  (name) => ({ message: `Module name "${name}" is already a property of every object` })
);

const namespaceName = identifier("Namespace").refine(
  (name) => !isIdentifier(name) || isNamespaceName(name),
  (name) => ({ message: `Namespace "${name}" is a read-only global` })
);

const GenerateInputSchema = z
  .object({
    appName: z.string().trim().min(1, "App name must not be empty"),
    modules: z
      .array(moduleName)
      .min(1, "At least one module is required")
      .superRefine((modules, ctx) => {
        const seen = new Set<string>();
        for (const name of modules) {
          // Module names become file names, which are case-insensitive on some systems.
          const folded = name.toLowerCase();
          if (seen.has(folded)) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Duplicate module name "${name}"` });
          }
          seen.add(folded);
        }
      }),
    namespace: namespaceName.optional(),
  })
  .superRefine((input, ctx) => {
    if (input.namespace === undefined && toNamespace(input.appName) === "") {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["appName"],
        message: `App name "${input.appName}" does not yield a namespace identifier; pass one explicitly`,
      });
    }
  });

export type GenerateInput = z.infer<typeof GenerateInputSchema>;

/** Relative reference from one project file to another, as written in markup. */
function hrefFrom(fromFile: string, toFile: string): string {
  return posix.relative(posix.dirname(fromFile), toFile);
}

/** Relative import specifier from one project file to another (always `./` or `../`). */
function specifierFrom(fromFile: string, toFile: string): string {
  const rel = hrefFrom(fromFile, toFile);
  return rel.startsWith("../") ? rel : `./${rel}`;
}

export function scriptPath(layout: Layout, module: string): string {
  return normalizePath(posix.join(layout.scriptDir, `${module}.js`));
}

/**
 * Check arguments without producing anything. Throws InputError.
 */
export function parseGenerateInput(
  appName: string,
  modules: readonly string[],
  options: GenerateOptions = {}
): GenerateInput & { layout: Layout } {
  const parsed = GenerateInputSchema.safeParse({ appName, modules: [...modules], namespace: options.namespace });
  if (!parsed.success) throw InputError.fromZodError(parsed.error);

  const layout = options.layout ?? DEFAULT_LAYOUT;
  const fixed = [layout.shellFile, layout.stylesheetFile, layout.bridgeFile].map(normalizePath);
  const taken = new Set(fixed);
  const clashes = parsed.data.modules.filter((m) => taken.has(scriptPath(layout, m)));
  if (clashes.length > 0 || taken.size !== fixed.length) {
    throw new InputError(
      "Generated file names collide",
      clashes.map((m) => ({ path: "modules", message: `module "${m}" would overwrite ${scriptPath(layout, m)}` }))
    );
  }

  return { ...parsed.data, layout };
}

/**
 * Generate the scaffold. Fails with InputError before producing any artifact.
 *
 * @example
 *   generate("Demo", ["utils", "main"])
 *   // → index.html, style.css, js/utils.js, js/main.js, index.js
 */
export function generate(
  appName: string,
  modules: readonly string[],
  options: GenerateOptions = {}
): FileArtifact[] {
  const input = parseGenerateInput(appName, modules, options);
  const { layout } = input;
  const namespace = input.namespace ?? toNamespace(input.appName);

  const shellFile = normalizePath(layout.shellFile);
  const stylesheetFile = normalizePath(layout.stylesheetFile);
  const bridgeFile = normalizePath(layout.bridgeFile);
  const scripts = input.modules.map((module) => ({ module, path: scriptPath(layout, module) }));

  const shell: FileArtifact = {
    path: shellFile,
    role: "shell-markup",
    content: renderShell({
      title: input.appName,
      stylesheetHref: hrefFrom(shellFile, stylesheetFile),
      scriptSrcs: scripts.map((s) => hrefFrom(shellFile, s.path)),
    }),
  };

  const stylesheet: FileArtifact = {
    path: stylesheetFile,
    role: "stylesheet",
    content: getBaseStylesheet(),
  };

  const scriptArtifacts: FileArtifact[] = scripts.map(({ module, path }) => ({
    path,
    role: "script",
    content: renderScript({ namespace, module, shellFile, bridgeFile }),
  }));

  const bridge: FileArtifact = {
    path: bridgeFile,
    role: "bridge-script",
    content: renderBridge({
      shellFile,
      specifiers: [stylesheetFile, ...scripts.map((s) => s.path)].map((p) => specifierFrom(bridgeFile, p)),
    }),
  };

  return [shell, stylesheet, ...scriptArtifacts, bridge];
}
