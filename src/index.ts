/**
 * Library entry: generate and validate dual-mode static web scaffolds.
 */

export {
  runScaffold,
  generate,
  parseGenerateInput,
  scriptPath,
  validate,
  formatReport,
  buildContext,
  RULES,
  getRule,
} from "./pipeline/index.js";
export type * from "./pipeline/types.js";
export type { ArtifactRole, FileArtifact, Layout } from "./types/index.js";
export { ARTIFACT_ROLES, DEFAULT_LAYOUT } from "./types/index.js";
export { renderSystemPrompt, renderReadme } from "./prompts/index.js";
export { readProject, writeProject } from "./tools/projectFiles.js";
export { ScaffoldError, InputError, ProjectIoError, ConfigError, ErrorCode } from "./utils/errors.js";
