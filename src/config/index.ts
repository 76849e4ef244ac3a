import { config as dotenvConfig } from "dotenv";
import { fileURLToPath } from "url";
import { dirname, resolve } from "path";
import Conf from "conf";
import { ConfigError } from "../utils/errors.js";
import { resolveLogLevel } from "../utils/logger.js";
import { isNamespaceName } from "../utils/naming.js";
import {
  DEFAULT_LAYOUT,
  STORED_CONFIG_KEYS,
  type Layout,
  type ScaffoldConfig,
  type StoredConfig,
  type StoredConfigKey,
} from "../types/index.js";

// Get the directory of this module
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Load .env file from the project root (2 levels up from src/config)
dotenvConfig({ path: resolve(__dirname, "../../.env") });

// Also try loading from current working directory as fallback
dotenvConfig();

let store: Conf<StoredConfig> | null = null;

/**
 * Persistent store for defaults set with `dualmode config set`.
 * Created on first use so DUALMODE_CONFIG_DIR can be set beforehand.
 */
export function getConfigStore(): Conf<StoredConfig> {
  if (!store) {
    store = new Conf<StoredConfig>({
      projectName: "dualmode-scaffold",
      projectVersion: "1.0.0",
      cwd: process.env.DUALMODE_CONFIG_DIR || undefined,
      schema: {
        outDir: { type: "string" },
        namespace: { type: "string" },
        shellFile: { type: "string" },
        stylesheetFile: { type: "string" },
        scriptDir: { type: "string" },
        bridgeFile: { type: "string" },
      },
    });
  }
  return store;
}

/**
 * Get the full configuration: environment first, then stored defaults, then built-ins.
 */
export function getConfig(): ScaffoldConfig {
  const stored = getConfigStore().store;

  const layout: Layout = {
    shellFile: process.env.DUALMODE_SHELL_FILE || stored.shellFile || DEFAULT_LAYOUT.shellFile,
    stylesheetFile:
      process.env.DUALMODE_STYLESHEET_FILE || stored.stylesheetFile || DEFAULT_LAYOUT.stylesheetFile,
    scriptDir: process.env.DUALMODE_SCRIPT_DIR || stored.scriptDir || DEFAULT_LAYOUT.scriptDir,
    bridgeFile: process.env.DUALMODE_BRIDGE_FILE || stored.bridgeFile || DEFAULT_LAYOUT.bridgeFile,
  };

  return {
    outDir: process.env.DUALMODE_OUT_DIR || stored.outDir || ".",
    namespace: process.env.DUALMODE_NAMESPACE || stored.namespace || "",
    layout,

    // Logging
    logLevel: resolveLogLevel(),
    debug: process.env.DEBUG === "true",
  };
}

function isPlainRelative(path: string): boolean {
  return (
    path.length > 0 &&
    !path.startsWith("/") &&
    !path.includes("\\") &&
    !path.split("/").some((segment) => segment === ".." || segment === "")
  );
}

/**
 * Validate a configuration. Returns human-readable problems; empty means usable.
 */
export function validateConfig(config: ScaffoldConfig): string[] {
  const errors: string[] = [];
  const { shellFile, stylesheetFile, scriptDir, bridgeFile } = config.layout;

  if (!isPlainRelative(shellFile) || !shellFile.endsWith(".html")) {
    errors.push(`shellFile must be a relative .html path (got "${shellFile}")`);
  }
  if (!isPlainRelative(stylesheetFile) || !stylesheetFile.endsWith(".css")) {
    errors.push(`stylesheetFile must be a relative .css path (got "${stylesheetFile}")`);
  }
  if (!isPlainRelative(scriptDir)) {
    errors.push(`scriptDir must be a relative directory (got "${scriptDir}")`);
  }
  if (!isPlainRelative(bridgeFile) || !bridgeFile.endsWith(".js")) {
    errors.push(`bridgeFile must be a relative .js path (got "${bridgeFile}")`);
  }
  if (bridgeFile.startsWith(`${scriptDir}/`)) {
    errors.push("bridgeFile must not live inside scriptDir");
  }
  if (config.namespace && !isNamespaceName(config.namespace)) {
    errors.push(`namespace must be a JavaScript identifier other than a read-only global (got "${config.namespace}")`);
  }

  return errors;
}

export function isStoredConfigKey(key: string): key is StoredConfigKey {
  return STORED_CONFIG_KEYS.some((k) => k === key);
}

/**
 * Persist a single default. Rejects unknown keys and values that would make
 * the resulting configuration invalid.
 */
export function setStoredValue(key: string, value: string): void {
  if (!isStoredConfigKey(key)) {
    throw new ConfigError(`Unknown config key "${key}"`, { allowed: [...STORED_CONFIG_KEYS] });
  }

  const candidate = getConfig();
  if (key === "outDir") candidate.outDir = value;
  else if (key === "namespace") candidate.namespace = value;
  else candidate.layout = { ...candidate.layout, [key]: value };

  const errors = validateConfig(candidate);
  if (errors.length > 0) {
    throw new ConfigError(`Refusing to store ${key}: ${errors.join("; ")}`);
  }

  getConfigStore().set(key, value);
}

export function getStoredConfig(): StoredConfig {
  return getConfigStore().store;
}

export function clearConfig(): void {
  getConfigStore().clear();
}

export default {
  getConfig,
  validateConfig,
  getConfigStore,
  setStoredValue,
  getStoredConfig,
  clearConfig,
};
