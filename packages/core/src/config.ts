/**
 * Unified Configuration System
 *
 * Centralized configuration for seqflow. Values are loaded from
 * (in priority order):
 *
 * 1. Environment variables: SEQFLOW_* (highest priority, for CI overrides)
 * 2. Programmatic: config.set() calls
 * 3. Config files: package.json#seqflow, .seqflowrc, seqflow.config.js, ...
 * 4. Defaults (lowest priority)
 *
 * @example
 * ```typescript
 * import { config } from "@seqflow/core";
 *
 * config.get("debug")              // → boolean
 * config.get("allocation.limit")   // → number
 *
 * config.set({ allocation: { limit: 10_000 } });
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";
import { ConfigError } from "./errors.js";

// ============================================================================
// Types
// ============================================================================

/**
 * Allocation limits applied by every combinator that allocates storage.
 */
export interface AllocationConfig {
  /** Largest element count a single buffer may hold */
  limit?: number;
}

/**
 * Full seqflow configuration schema.
 */
export interface SeqflowConfig {
  /** Echo ownership events through the tracer's writer */
  debug?: boolean;
  /** Record ownership events (allocate, release, borrow, ...) */
  trace?: boolean;
  allocation?: AllocationConfig;
  /** Custom user configuration */
  [key: string]: unknown;
}

/** Largest length a JavaScript array can have. */
export const MAX_ARRAY_LENGTH = 2 ** 32 - 1;

// ============================================================================
// Global State
// ============================================================================

let configStore: SeqflowConfig = {};
let envLayer: SeqflowConfig = {};
let configLoaded = false;
let configFilePath: string | undefined;

// ============================================================================
// Environment Variable Loading
// ============================================================================

/**
 * Load configuration from environment variables.
 * Variables prefixed with SEQFLOW_ are parsed into the config object.
 *
 * Examples:
 *   SEQFLOW_DEBUG=1                  → { debug: true }
 *   SEQFLOW_ALLOCATION_LIMIT=5000    → { allocation: { limit: 5000 } }
 *   SEQFLOW_ALLOCATION_LIMIT=0       → { allocation: { limit: 0 } }
 *
 * `1`/`0` and the empty string only mean true/false for the flag keys.
 */
const FLAG_KEYS: ReadonlySet<string> = new Set(["debug", "trace"]);

function parseFlag(value: string): boolean | string {
  if (value === "1" || value === "true") return true;
  if (value === "0" || value === "false" || value === "") return false;
  return value;
}

function parseValue(value: string): unknown {
  if (/^\d+$/.test(value)) return parseInt(value, 10);
  if (value === "true") return true;
  if (value === "false") return false;
  return value;
}

function loadConfigFromEnv(): SeqflowConfig {
  const envConfig: SeqflowConfig = {};
  const PREFIX = "SEQFLOW_";

  for (const [key, value] of Object.entries(process.env)) {
    if (!key.startsWith(PREFIX) || value === undefined) continue;

    // SEQFLOW_ALLOCATION_LIMIT → allocation.limit
    const configPath = key
      .slice(PREFIX.length)
      .toLowerCase()
      .replace(/__/g, ".")
      .replace(/_/g, ".");

    const parsedValue = FLAG_KEYS.has(configPath) ? parseFlag(value) : parseValue(value);
    setNestedValue(envConfig, configPath, parsedValue);
  }

  return envConfig;
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

  for (let i = 0; i < parts.length - 1; i++) {
    const part = parts[i];
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
function deepMerge(target: SeqflowConfig, source: Record<string, unknown>): SeqflowConfig {
  const result: SeqflowConfig = { ...target };

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
// Config File Loading (cosmiconfig)
// ============================================================================

const MODULE_NAME = "seqflow";

/**
 * Load configuration from the nearest seqflow config file, if any.
 */
function loadConfigFromFiles(): SeqflowConfig {
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

  let result: ReturnType<typeof explorer.search>;
  try {
    result = explorer.search();
  } catch (error) {
    throw new ConfigError(`Failed to load ${MODULE_NAME} configuration`, { cause: error });
  }

  if (!result || result.isEmpty) return {};

  if (!isRecord(result.config)) {
    throw new ConfigError(`${result.filepath}: configuration must be an object`);
  }

  configFilePath = result.filepath;
  return result.config;
}

// ============================================================================
// Config Initialization
// ============================================================================

function initializeConfig(): void {
  if (configLoaded) return;

  const defaults: SeqflowConfig = {
    debug: false,
    trace: false,
    allocation: {
      limit: MAX_ARRAY_LENGTH,
    },
  };

  const fileConfig = loadConfigFromFiles();
  envLayer = loadConfigFromEnv();

  // Merge: defaults < fileConfig < envLayer
  configStore = deepMerge(deepMerge(defaults, fileConfig), envLayer);
  configLoaded = true;
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Get a configuration value by path. The caller names the expected type;
 * values are not validated.
 */
function get<T = unknown>(path: string): T | undefined;
function get(path: string): unknown {
  initializeConfig();
  return getNestedValue(configStore, path);
}

/**
 * Set configuration values programmatically. Keys also given through
 * SEQFLOW_* environment variables keep their environment value.
 */
function set(values: Partial<SeqflowConfig>): void {
  initializeConfig();
  configStore = deepMerge(deepMerge(configStore, values), envLayer);
}

/**
 * Check if a configuration path has a truthy value.
 */
function has(path: string): boolean {
  return !!get(path);
}

function getAll(): Readonly<SeqflowConfig> {
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
  envLayer = {};
  configLoaded = false;
  configFilePath = undefined;
}

/**
 * The configuration singleton.
 */
export const config = {
  get,
  set,
  has,
  getAll,
  getConfigFilePath,
  reset,
};

/**
 * Current allocation limit, clamped to what a JavaScript array can hold.
 */
export function allocationLimit(): number {
  const limit = config.get<number>("allocation.limit");
  if (typeof limit !== "number" || !Number.isFinite(limit) || limit < 0) {
    return MAX_ARRAY_LENGTH;
  }
  return Math.min(Math.floor(limit), MAX_ARRAY_LENGTH);
}
