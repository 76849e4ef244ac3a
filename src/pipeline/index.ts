/**
 * Pipeline orchestrator — runs Generator → Validator in sequence and returns
 * the artifacts together with their report.
 *
 * Usage:
 *   import { runScaffold } from './pipeline/index.js';
 *   const result = runScaffold({ appName: "Demo", modules: ["utils", "main"] });
 */

import { logger } from "../utils/logger.js";
import { toNamespace } from "../utils/naming.js";
import { generate } from "./generator.js";
import { formatReport, validate } from "./validator.js";
import type { PipelineOptions, PipelineResult, StepTiming } from "./types.js";

/** Utility: run a function and return [result, durationMs]. */
function timed<T>(fn: () => T): [T, number] {
  const start = Date.now();
  const result = fn();
  return [result, Date.now() - start];
}

/**
 * Generate a scaffold and re-validate it against the declared module order.
 * InputError from the generator propagates before anything is validated.
 */
export function runScaffold(options: PipelineOptions): PipelineResult {
  const { appName, modules, layout, onStepComplete } = options;
  const timings: StepTiming[] = [];

  logger.debug(`Pipeline: starting for app="${appName}" modules=[${modules.join(", ")}]`);

  // ─── Step 1: Generate ──────────────────────────────────────
  const [files, generateMs] = timed(() =>
    generate(appName, modules, { layout, namespace: options.namespace })
  );
  timings.push({ step: "generate", durationMs: generateMs });
  onStepComplete?.("generate", { durationMs: generateMs, fileCount: files.length });
  logger.debug(`Pipeline: generated ${files.length} file(s) in ${generateMs}ms`);

  // ─── Step 2: Validate ──────────────────────────────────────
  const namespace = options.namespace ?? toNamespace(appName);
  const [report, validateMs] = timed(() =>
    validate(files, { namespace, dependencyOrder: modules })
  );
  timings.push({ step: "validate", durationMs: validateMs });
  onStepComplete?.("validate", {
    durationMs: validateMs,
    issuesCount: report.violations.length + report.warnings.length,
  });

  if (report.valid) {
    logger.debug(`Pipeline: validation passed in ${validateMs}ms (${report.warnings.length} warning(s))`);
  } else {
    logger.warn(`Pipeline: generated scaffold has ${report.violations.length} blocking violation(s)`);
    for (const line of formatReport(report)) {
      logger.debug(`  - ${line}`);
    }
  }

  return { files, report, namespace, timings };
}

// Re-export for library consumers
export { generate, parseGenerateInput, scriptPath } from "./generator.js";
export { validate, formatReport, buildContext } from "./validator.js";
export { RULES, getRule } from "./rules.js";
export type * from "./types.js";
