/**
 * Unified Configuration System
 *
 * Provides a centralized configuration API for the treecodec packages.
 * Configuration is loaded from (in priority order):
 *
 * 1. Environment variables: TREECODEC_* (highest priority, for CI overrides)
 * 2. Config files: treecodec.config.js, .treecodecrc, package.json#treecodec
 * 3. Programmatic: config.set() calls
 * 4. Defaults (lowest priority)
 *
 * @example
 * ```typescript
 * import { config } from "@treecodec/core";
 *
 * config.getBoolean("reader.checkPartNames", true); // → true
 * config.set({ render: { indent: "  " } });
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";

// ============================================================================
// Types
// ============================================================================

/**
 * Options for the pull-side reader handed to `load()`.
 */
export interface ReaderConfig {
  /** Compare the expected part name passed to a read call with the stored one */
  checkPartNames?: boolean;
  /** Skip parts that `load()` left unread instead of failing on the footer */
  ignoreUnreadParts?: boolean;
}

/**
 * Options for the text renderer.
 */
export interface RenderConfig {
  /** Indent unit written once per nesting level */
  indent?: string;
}

/**
 * Full treecodec configuration schema.
 */
export interface TreecodecConfig {
  /** Enable debug logging */
  debug?: boolean;
  reader?: ReaderConfig;
  render?: RenderConfig;
  /** Custom user configuration */
  [key: string]: unknown;
}

// ============================================================================
// Global State
// ============================================================================

let configStore: Record<string, unknown> = {};
let configLoaded = false;
let configFilePath: string | undefined;

// ============================================================================
// Environment Variable Loading
// ============================================================================

/**
 * Load configuration from environment variables.
 * Variables prefixed with TREECODEC_ are parsed into the config object.
 *
 * Examples:
 *   TREECODEC_DEBUG=1                          → { debug: true }
 *   TREECODEC_READER__CHECK_PART_NAMES=false   → { reader: { checkPartNames: false } }
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): TreecodecConfig {
  const envConfig: TreecodecConfig = {};
  const PREFIX = "TREECODEC_";

  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(PREFIX) || value === undefined) continue;

    // Double underscore separates nesting levels, single underscore joins words
    const configPath = key
      .slice(PREFIX.length)
      .split("__")
      .map(toCamelCase)
      .join(".");

    setNestedValue(envConfig, configPath, parseEnvValue(value));
  }

  return envConfig;
}

function toCamelCase(segment: string): string {
  return segment
    .toLowerCase()
    .replace(/_([a-z0-9])/g, (_match, ch: string) => ch.toUpperCase());
}

function parseEnvValue(value: string): unknown {
  if (value === "1" || value === "true") return true;
  if (value === "0" || value === "false" || value === "") return false;
  if (/^\d+$/.test(value)) return parseInt(value, 10);
  return value;
}

// ============================================================================
// Utility Functions
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Set a nested value using dot notation.
 */
function setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split(".");
  let current: Record<string, unknown> = obj;

  for (const part of parts.slice(0, -1)) {
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    }
  }

  current[parts[parts.length - 1]] = value;
}

/**
 * Get a nested value using dot notation.
 */
function getNestedValue(obj: unknown, path: string): unknown {
  let current: unknown = obj;

  for (const part of path.split(".")) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[part];
  }

  return current;
}

/**
 * Deep merge objects (right takes precedence).
 */
function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>
): Record<string, unknown> {
  const result = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = result[key];

    if (isRecord(sourceValue) && isRecord(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else {
      result[key] = sourceValue;
    }
  }

  return result;
}

// ============================================================================
// Config File Loading
// ============================================================================

const MODULE_NAME = "treecodec";

/**
 * Load configuration from the first config file cosmiconfig finds.
 */
function loadConfigFromFiles(): Record<string, unknown> {
  const explorer = cosmiconfigSync(MODULE_NAME, {
    searchPlaces: [
      "package.json",
      `.${MODULE_NAME}rc`,
      `.${MODULE_NAME}rc.json`,
      `.${MODULE_NAME}rc.yaml`,
      `.${MODULE_NAME}rc.yml`,
      `.${MODULE_NAME}rc.js`,
      `.${MODULE_NAME}rc.cjs`,
      `${MODULE_NAME}.config.js`,
      `${MODULE_NAME}.config.cjs`,
    ],
  });
  const result = explorer.search();
  if (result && !result.isEmpty && isRecord(result.config)) {
    configFilePath = result.filepath;
    return result.config;
  }
  return {};
}

// ============================================================================
// Config Initialization
// ============================================================================

const DEFAULTS: TreecodecConfig = {
  debug: false,
  reader: {
    checkPartNames: true,
    ignoreUnreadParts: false,
  },
  render: {
    indent: "\t",
  },
};

/**
 * Initialize configuration from all sources.
 */
function initializeConfig(): void {
  if (configLoaded) return;

  const fileConfig = loadConfigFromFiles();
  const envConfig = loadConfigFromEnv();

  // Merge: defaults < fileConfig < envConfig
  configStore = deepMerge(deepMerge(DEFAULTS, fileConfig), envConfig);
  configLoaded = true;
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Get a configuration value by path. Use `getBoolean`/`getString` for keys
 * read by treecodec itself.
 */
function get(path: string): unknown {
  initializeConfig();
  return getNestedValue(configStore, path);
}

/**
 * Set configuration values programmatically.
 */
function set(values: Partial<TreecodecConfig>): void {
  initializeConfig();
  configStore = deepMerge(configStore, values);
}

/**
 * Check if a configuration path has a truthy value.
 */
function has(path: string): boolean {
  return !!get(path);
}

/**
 * Get all configuration values.
 */
function getAll(): Readonly<Record<string, unknown>> {
  initializeConfig();
  return configStore;
}

/**
 * Get the path to the loaded config file (if any).
 */
function getConfigFilePath(): string | undefined {
  initializeConfig();
  return configFilePath;
}

/**
 * Reset configuration to defaults (mainly for testing).
 */
function reset(): void {
  configStore = {};
  configLoaded = false;
  configFilePath = undefined;
}

function getBoolean(path: string, fallback: boolean): boolean {
  const value = get(path);
  return typeof value === "boolean" ? value : fallback;
}

function getString(path: string, fallback: string): string {
  const value = get(path);
  return typeof value === "string" ? value : fallback;
}

// ============================================================================
// Export: config object
// ============================================================================

/**
 * Unified configuration API.
 */
export const config = {
  get,
  set,
  has,
  getAll,
  getBoolean,
  getString,
  getConfigFilePath,
  reset,
} as const;

/**
 * Helper for creating type-safe configuration files.
 */
export function defineConfig(cfg: TreecodecConfig): TreecodecConfig {
  return cfg;
}
