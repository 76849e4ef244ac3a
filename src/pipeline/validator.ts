/**
 * Validator — evaluates the Rule Set against a candidate file set.
 *
 * Pure and synchronous: the same (rules, files) pair always yields an equal
 * report, and nothing outside the returned value is touched. Every rule runs
 * even after others fail, so one report lists every violation.
 */

import { InputError } from "../utils/errors.js";
import { normalizePath } from "../utils/naming.js";
import { inferNamespace, inspectScript, parseBridge, parseShell } from "./inspect.js";
import { RULES } from "./rules.js";
import type {
  AdvisoryWarning,
  ReportEntry,
  RuleContext,
  StructuralViolation,
  ValidateOptions,
  ValidationReport,
} from "./types.js";
import type { FileArtifact } from "../types/index.js";

/**
 * Build the shared, read-only context the rules evaluate against.
 * Throws InputError on duplicate paths: two artifacts cannot share a file.
 */
export function buildContext(files: readonly FileArtifact[], options: ValidateOptions = {}): RuleContext {
  const normalized = files.map((f) => ({ ...f, path: normalizePath(f.path) }));

  const byPath = new Map<string, FileArtifact>();
  const duplicates: string[] = [];
  for (const f of normalized) {
    if (byPath.has(f.path)) duplicates.push(f.path);
    else byPath.set(f.path, f);
  }
  if (duplicates.length > 0) {
    throw new InputError(
      `Duplicate artifact paths: ${[...new Set(duplicates)].join(", ")}`,
      duplicates.map((path) => ({ path: "files", message: `duplicate path ${path}` }))
    );
  }

  const shellArtifact = normalized.find((f) => f.role === "shell-markup");
  const bridgeArtifact = normalized.find((f) => f.role === "bridge-script");
  const scripts = normalized.filter((f) => f.role === "script").map(inspectScript);

  return {
    files: normalized,
    byPath,
    shell: shellArtifact ? parseShell(shellArtifact) : null,
    bridge: bridgeArtifact ? parseBridge(bridgeArtifact) : null,
    scripts,
    stylesheets: normalized.filter((f) => f.role === "stylesheet"),
    namespace: options.namespace ?? inferNamespace(scripts),
    dependencyOrder: options.dependencyOrder ?? null,
  };
}

function isViolation(entry: ReportEntry): entry is StructuralViolation {
  return !entry.passed && entry.severity === "blocking";
}

function isWarning(entry: ReportEntry): entry is AdvisoryWarning {
  return !entry.passed && entry.severity === "advisory";
}

/**
 * Validate a file set.
 *
 * Artifact-scoped rules add one entry per applicable artifact (pass or fail).
 * Set-scoped rules add one passing entry, or one failing entry per finding.
 */
export function validate(files: readonly FileArtifact[], options: ValidateOptions = {}): ValidationReport {
  const rules = options.rules ?? RULES;
  const ctx = buildContext(files, options);
  const entries: ReportEntry[] = [];

  for (const rule of rules) {
    if (rule.scope === "artifact") {
      for (const artifact of ctx.files) {
        if (!rule.appliesTo.includes(artifact.role)) continue;
        const messages = rule.check(artifact, ctx);
        entries.push({
          ruleId: rule.id,
          severity: rule.severity,
          artifact: artifact.path,
          passed: messages.length === 0,
          message: messages.length === 0 ? "ok" : messages.join("; "),
        });
      }
      continue;
    }

    const result = rule.check(ctx);
    if (typeof result === "string") {
      entries.push({
        ruleId: rule.id,
        severity: rule.severity,
        artifact: null,
        passed: true,
        message: `not applicable: ${result}`,
      });
    } else if (result.length === 0) {
      entries.push({ ruleId: rule.id, severity: rule.severity, artifact: null, passed: true, message: "ok" });
    } else {
      for (const finding of result) {
        entries.push({
          ruleId: rule.id,
          severity: rule.severity,
          artifact: finding.artifact ?? null,
          passed: false,
          message: finding.message,
        });
      }
    }
  }

  for (const entry of entries) Object.freeze(entry);
  const violations = entries.filter(isViolation);
  return Object.freeze({
    entries: Object.freeze(entries),
    violations: Object.freeze(violations),
    warnings: Object.freeze(entries.filter(isWarning)),
    valid: violations.length === 0,
  });
}

/** One line per failed entry, violations first. */
export function formatReport(report: ValidationReport): string[] {
  return [...report.violations, ...report.warnings].map((entry) => {
    const tag = entry.severity === "blocking" ? "error" : "warn";
    const where = entry.artifact ? `${entry.artifact}: ` : "";
    return `${tag} [${entry.ruleId}] ${where}${entry.message}`;
  });
}
