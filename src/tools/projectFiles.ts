/**
 * Project files — moves artifacts between memory and a directory on disk.
 */

import { existsSync, mkdirSync, readdirSync, readFileSync, writeFileSync } from "fs";
import { dirname, join, relative, resolve, sep } from "path";
import { parseShell } from "../pipeline/inspect.js";
import { ProjectIoError, errorMessage } from "../utils/errors.js";
import { logger } from "../utils/logger.js";
import { normalizePath } from "../utils/naming.js";
import type { ArtifactRole, FileArtifact, Layout } from "../types/index.js";

export interface WriteOptions {
  /** Overwrite files that already exist. */
  force?: boolean;
}

export interface WriteResult {
  projectDir: string;
  /** Relative paths written, in artifact order. */
  files: string[];
  /** Total bytes written. */
  totalSize: number;
}

/** Resolve an artifact path under `root`, refusing paths that escape it. */
function resolveInside(root: string, path: string): string {
  const target = resolve(root, path);
  if (target !== root && !target.startsWith(root + sep)) {
    throw new ProjectIoError(`Artifact path escapes the project directory: ${path}`, path);
  }
  return target;
}

/**
 * Write artifacts under `dir`. Checks every target first, so either all files
 * are written or none is (apart from an I/O failure midway).
 */
export function writeProject(dir: string, files: readonly FileArtifact[], options: WriteOptions = {}): WriteResult {
  const projectDir = resolve(dir);
  const targets = files.map((f) => ({ artifact: f, target: resolveInside(projectDir, f.path) }));

  if (!options.force) {
    const existing = targets.filter((t) => existsSync(t.target)).map((t) => t.artifact.path);
    if (existing.length > 0) {
      throw new ProjectIoError(
        `Refusing to overwrite existing file(s): ${existing.join(", ")} (use --force)`,
        existing[0]
      );
    }
  }

  let totalSize = 0;
  for (const { artifact, target } of targets) {
    try {
      mkdirSync(dirname(target), { recursive: true });
      writeFileSync(target, artifact.content, "utf-8");
    } catch (error) {
      throw new ProjectIoError(`Could not write ${artifact.path}: ${errorMessage(error)}`, artifact.path, error);
    }
    totalSize += Buffer.byteLength(artifact.content, "utf-8");
    logger.debug(`Wrote ${artifact.path}`);
  }

  return { projectDir, files: files.map((f) => f.path), totalSize };
}

const SKIPPED_DIRECTORIES = new Set(["node_modules", "dist", "build"]);

/** Files the shell markup pulls in, as resolved project paths. */
export interface ShellLinks {
  scripts: ReadonlySet<string>;
  stylesheets: ReadonlySet<string>;
}

const NO_LINKS: ShellLinks = { scripts: new Set(), stylesheets: new Set() };

function isUnder(path: string, dir: string): boolean {
  const base = normalizePath(dir).replace(/\/+$/, "");
  return base === "" || base === "." ? !path.includes("/") : path.startsWith(`${base}/`);
}

/**
 * Role a file plays under `layout`, or null when it is not part of the scaffold.
 * Scripts live under `layout.scriptDir`; the stylesheet is `layout.stylesheetFile`.
 * Anything else counts only when the shell markup links it.
 */
export function roleFor(path: string, layout: Layout, links: ShellLinks = NO_LINKS): ArtifactRole | null {
  const normalized = normalizePath(path);
  if (normalized === normalizePath(layout.shellFile)) return "shell-markup";
  if (normalized === normalizePath(layout.bridgeFile)) return "bridge-script";
  if (normalized.endsWith(".css")) {
    return normalized === normalizePath(layout.stylesheetFile) || links.stylesheets.has(normalized)
      ? "stylesheet"
      : null;
  }
  if (normalized.endsWith(".js")) {
    return isUnder(normalized, layout.scriptDir) || links.scripts.has(normalized) ? "script" : null;
  }
  return null;
}

function walk(root: string, dir: string, out: string[]): void {
  for (const entry of readdirSync(dir, { withFileTypes: true })) {
    if (entry.name.startsWith(".")) continue;
    const full = join(dir, entry.name);
    if (entry.isDirectory()) {
      if (!SKIPPED_DIRECTORIES.has(entry.name)) walk(root, full, out);
    } else if (entry.isFile()) {
      out.push(normalizePath(relative(root, full)));
    }
  }
}

/**
 * Read a scaffold from disk. Files that play no role under `layout` (a bundler
 * config, a README) are ignored; the result is sorted by path.
 */
export function readProject(dir: string, layout: Layout): FileArtifact[] {
  const projectDir = resolve(dir);
  const paths: string[] = [];
  try {
    walk(projectDir, projectDir, paths);
  } catch (error) {
    throw new ProjectIoError(`Could not read project directory ${dir}: ${errorMessage(error)}`, dir, error);
  }

  const read = (path: string) => readFileSync(join(projectDir, path), "utf-8");
  const shellFile = normalizePath(layout.shellFile);
  let links = NO_LINKS;
  if (paths.includes(shellFile)) {
    const shell = parseShell({ path: shellFile, role: "shell-markup", content: read(shellFile) });
    links = {
      scripts: new Set(shell.loadOrder),
      stylesheets: new Set(shell.stylesheets.flatMap((l) => (l.resolved === null ? [] : [l.resolved]))),
    };
  }

  const artifacts: FileArtifact[] = [];
  for (const path of paths.sort()) {
    const role = roleFor(path, layout, links);
    if (role === null) continue;
    artifacts.push({ path, role, content: read(path) });
  }

  logger.debug(`Read ${artifacts.length} artifact(s) from ${projectDir}`);
  return artifacts;
}
