/**
 * Unified Configuration System
 *
 * Provides a centralized configuration API for seqfuse pipelines.
 * Configuration is layered (later layers win):
 *
 * 1. Defaults
 * 2. Config files: package.json "seqfuse" key, .seqfuserc, .seqfuserc.json,
 *    seqfuse.config.js, etc.
 * 3. Environment variables: SEQFUSE_*
 * 4. Programmatic: config.set() calls, applied over everything loaded
 *
 * A config file that fails to load is skipped with a warning.
 *
 * @example
 * ```typescript
 * import { config } from "@seqfuse/core";
 *
 * config.get("debug")    // → boolean
 * config.get("fusion")   // → boolean
 *
 * // Turn off consumer fusion (results are identical, only slower)
 * config.set({ fusion: false });
 * ```
 *
 * @example Config file (.seqfuserc.json)
 * ```json
 * { "debug": true }
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";
import { createLogger } from "./logger.js";

// ============================================================================
// Types
// ============================================================================

/**
 * Full seqfuse configuration schema.
 */
export interface SeqfuseConfig {
  /** Trace pipeline executions through the logger */
  debug?: boolean;
  /** Merge adjacent map/filter consumers into one */
  fusion?: boolean;
  /** Custom user configuration */
  [key: string]: unknown;
}

// ============================================================================
// Global State
// ============================================================================

let configStore: Record<string, unknown> = {};
let configLoaded = false;
let configLoadError: unknown;

// ============================================================================
// Config File Loading (cosmiconfig)
// ============================================================================

const MODULE_NAME = "seqfuse";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Load configuration synchronously from files.
 * Uses cosmiconfig to search for config in standard locations.
 */
function loadConfigFromFiles(): Record<string, unknown> {
  try {
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
      return result.config;
    }
  } catch (error) {
    configLoadError = error;
    createLogger("config").warn("Failed to load config file, using defaults:", error);
  }

  return {};
}

// ============================================================================
// Environment Variable Loading
// ============================================================================

/**
 * Load configuration from environment variables.
 * Variables prefixed with SEQFUSE_ are parsed into the config object.
 *
 * Examples:
 *   SEQFUSE_DEBUG=1                  → { debug: true }
 *   SEQFUSE_FUSION=false             → { fusion: false }
 *   SEQFUSE_TRACE__CACHE=1           → { trace: { cache: true } }
 */
function loadConfigFromEnv(): Record<string, unknown> {
  const envConfig: Record<string, unknown> = {};
  const PREFIX = "SEQFUSE_";

  for (const [key, value] of Object.entries(process.env)) {
    if (!key.startsWith(PREFIX) || value === undefined) continue;

    // SEQFUSE_A__B becomes a.b
    const configPath = key
      .slice(PREFIX.length)
      .toLowerCase()
      .replace(/__/g, ".")
      .replace(/_/g, ".");

    let parsedValue: unknown;
    if (value === "1" || value === "true") {
      parsedValue = true;
    } else if (value === "0" || value === "false" || value === "") {
      parsedValue = false;
    } else if (/^\d+$/.test(value)) {
      parsedValue = parseInt(value, 10);
    } else {
      parsedValue = value;
    }

    setNestedValue(envConfig, configPath, parsedValue);
  }

  return envConfig;
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Set a nested value using dot notation.
 */
function setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split(".");
  let current: Record<string, unknown> = obj;

  for (let i = 0; i < parts.length - 1; i++) {
    const part = parts[i];
    const child = current[part];
    if (isRecord(child)) {
      current = child;
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
// Config Initialization
// ============================================================================

function initializeConfig(): void {
  if (configLoaded) return;

  const defaults: SeqfuseConfig = {
    debug: false,
    fusion: true,
  };

  const fileConfig = loadConfigFromFiles();
  const envConfig = loadConfigFromEnv();

  // Merge: defaults < fileConfig < envConfig
  configStore = deepMerge(deepMerge(defaults, fileConfig), envConfig);
  configLoaded = true;
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Get a configuration value by path.
 */
function get(path: string): unknown {
  initializeConfig();
  return getNestedValue(configStore, path);
}

/**
 * Set configuration values programmatically.
 */
function set(values: Partial<SeqfuseConfig>): void {
  initializeConfig();
  configStore = deepMerge(configStore, values);
}

/**
 * Check if a configuration path has a truthy value.
 */
function has(path: string): boolean {
  return !!get(path);
}

function getAll(): Readonly<Record<string, unknown>> {
  initializeConfig();
  return configStore;
}

/**
 * The error raised while reading the config file, if loading failed.
 */
function getLoadError(): unknown {
  initializeConfig();
  return configLoadError;
}

/**
 * Reset configuration to defaults (mainly for testing).
 */
function reset(): void {
  configStore = {};
  configLoaded = false;
  configLoadError = undefined;
}

/**
 * Unified configuration API.
 */
export const config = {
  get,
  set,
  has,
  getAll,
  getLoadError,
  reset,
} as const;

/** True when pipeline executions should be traced. */
export function isDebugEnabled(): boolean {
  return get("debug") === true;
}

/** False only when fusion has been switched off explicitly. */
export function isFusionEnabled(): boolean {
  return get("fusion") !== false;
}

/**
 * Helper for creating type-safe configuration files.
 */
export function defineConfig(cfg: SeqfuseConfig): SeqfuseConfig {
  return cfg;
}
