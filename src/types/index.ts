// ===========================================
// Artifact Types
// ===========================================

/**
 * Role a generated or loaded file plays in a dual-mode scaffold.
 * - shell-markup:  the HTML document that loads everything with classic tags
 * - stylesheet:    the single CSS file
 * - script:        one classic script per logical module
 * - bridge-script: the bundler entry that re-imports what the shell loads
 */
export type ArtifactRole = "shell-markup" | "stylesheet" | "script" | "bridge-script";

export const ARTIFACT_ROLES: readonly ArtifactRole[] = [
  "shell-markup",
  "stylesheet",
  "script",
  "bridge-script",
];

export interface FileArtifact {
  /** Relative path with forward slashes, e.g. `js/utils.js`. */
  path: string;
  content: string;
  role: ArtifactRole;
}

/** File names shared by the generator, the validator and the project reader. */
export interface Layout {
  shellFile: string;
  stylesheetFile: string;
  scriptDir: string;
  bridgeFile: string;
}

export const DEFAULT_LAYOUT: Readonly<Layout> = Object.freeze({
  shellFile: "index.html",
  stylesheetFile: "style.css",
  scriptDir: "js",
  bridgeFile: "index.js",
});

// ===========================================
// Config Types
// ===========================================

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface ScaffoldConfig {
  /** Directory `generate` writes into when no --out is given. */
  outDir: string;
  /** Namespace override; empty means derive it from the app name. */
  namespace: string;
  layout: Layout;

  // Logging
  logLevel: LogLevel;
  debug: boolean;
}

/** Defaults persisted between runs with `dualmode config set`. */
export interface StoredConfig {
  outDir?: string;
  namespace?: string;
  shellFile?: string;
  stylesheetFile?: string;
  scriptDir?: string;
  bridgeFile?: string;
}

export type StoredConfigKey = keyof StoredConfig;

export const STORED_CONFIG_KEYS: readonly StoredConfigKey[] = [
  "outDir",
  "namespace",
  "shellFile",
  "stylesheetFile",
  "scriptDir",
  "bridgeFile",
];
