/**
 * Pipeline type definitions for the Rule Set → Generator → Validator flow.
 */

import type { ArtifactRole, FileArtifact, Layout } from "../types/index.js";
import type { ParsedBridge, ParsedShell, ScriptInfo } from "./inspect.js";

// ─────────────────────────────────────────
// Rules
// ─────────────────────────────────────────

/** Blocking failures invalidate the candidate; advisory ones only warn. */
export type Severity = "blocking" | "advisory";

/** A single problem reported by a rule. */
export interface Finding {
  /** Artifact path the problem belongs to; omitted for set-wide problems. */
  artifact?: string;
  message: string;
}

/**
 * Everything a rule may look at. Built once per validation run and shared
 * read-only between rules.
 */
export interface RuleContext {
  files: readonly FileArtifact[];
  byPath: ReadonlyMap<string, FileArtifact>;
  /** The first shell-markup artifact, parsed. */
  shell: ParsedShell | null;
  /** The first bridge-script artifact, parsed. */
  bridge: ParsedBridge | null;
  /** Script artifacts in file-set order, with their masked source. */
  scripts: readonly ScriptInfo[];
  stylesheets: readonly FileArtifact[];
  /** Shared namespace identifier, given or inferred; null when unknown. */
  namespace: string | null;
  /** Declared module order (logical dependency order), when known. */
  dependencyOrder: readonly string[] | null;
}

interface RuleBase {
  id: string;
  description: string;
  severity: Severity;
}

/** Checked once per applicable artifact; each call yields one report entry. */
export interface ArtifactRule extends RuleBase {
  scope: "artifact";
  appliesTo: readonly ArtifactRole[];
  /** Returns failure messages for this artifact; empty means it passed. */
  check(artifact: FileArtifact, ctx: RuleContext): string[];
}

/** Checked once against the whole file set. */
export interface SetRule extends RuleBase {
  scope: "set";
  /**
   * Returns findings; empty means the rule passed. Returning a string instead
   * marks the rule as not applicable to this file set, with that reason.
   */
  check(ctx: RuleContext): Finding[] | string;
}

export type Rule = ArtifactRule | SetRule;

// ─────────────────────────────────────────
// Report
// ─────────────────────────────────────────

export interface ReportEntry {
  ruleId: string;
  severity: Severity;
  /** Artifact path, or null for an entry about the file set as a whole. */
  artifact: string | null;
  passed: boolean;
  message: string;
}

/** A blocking rule that failed. */
export type StructuralViolation = ReportEntry & { passed: false; severity: "blocking" };

/** An advisory rule that failed. */
export type AdvisoryWarning = ReportEntry & { passed: false; severity: "advisory" };

/** Produced fresh per validation run and frozen before it is returned. */
export interface ValidationReport {
  readonly entries: readonly ReportEntry[];
  readonly violations: readonly StructuralViolation[];
  readonly warnings: readonly AdvisoryWarning[];
  /** True when no blocking rule failed. */
  readonly valid: boolean;
}

// ─────────────────────────────────────────
// Generator / Validator options
// ─────────────────────────────────────────

export interface GenerateOptions {
  layout?: Layout;
  /** Override the namespace derived from the app name. */
  namespace?: string;
}

export interface ValidateOptions {
  rules?: readonly Rule[];
  /** Shared namespace; inferred from script global assignments when absent. */
  namespace?: string;
  /** Declared module order the shell and bridge must agree with. */
  dependencyOrder?: readonly string[];
}

// ─────────────────────────────────────────
// Pipeline orchestrator
// ─────────────────────────────────────────

export type PipelineStepName = "generate" | "validate";

export interface StepTiming {
  step: PipelineStepName;
  durationMs: number;
}

export type PipelineStepCallback = (
  step: PipelineStepName,
  data: { durationMs: number; fileCount?: number; issuesCount?: number }
) => void;

export interface PipelineOptions {
  appName: string;
  modules: readonly string[];
  layout?: Layout;
  namespace?: string;
  onStepComplete?: PipelineStepCallback;
}

export interface PipelineResult {
  files: FileArtifact[];
  report: ValidationReport;
  /** Namespace the scripts attach to. */
  namespace: string;
  timings: StepTiming[];
}
