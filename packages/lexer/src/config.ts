/**
 * Configuration
 *
 * Configuration is loaded from (in priority order):
 *
 * 1. Programmatic: config.set() calls (highest priority)
 * 2. Environment variables: RULELEX_*
 * 3. Config files: rulelex.config.js, .rulelexrc, a "rulelex" key in package.json, etc.
 * 4. Defaults (lowest priority)
 *
 * @example
 * ```typescript
 * import { config } from "@rulelex/core";
 *
 * config.get("debug")   // → boolean
 * config.set({ debug: true });
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";

// ============================================================================
// Types
// ============================================================================

export interface RulelexConfig {
  /** Log lexer activity to the console */
  debug?: boolean;
  [key: string]: unknown;
}

type ConfigRecord = Record<string, unknown>;

// ============================================================================
// Global State
// ============================================================================

let configStore: ConfigRecord = {};
let configLoaded = false;
let configFilePath: string | undefined;

const MODULE_NAME = "rulelex";
const ENV_PREFIX = "RULELEX_";

const DEFAULTS: RulelexConfig = {
  debug: false,
};

// ============================================================================
// Config File Loading (cosmiconfig)
// ============================================================================

function loadConfigFromFiles(): ConfigRecord {
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
// Environment Variable Loading
// ============================================================================

/**
 * RULELEX_DEBUG=1                → { debug: true }
 * RULELEX_MAX_DEPTH=12          → { maxDepth: 12 }
 */
function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ConfigRecord {
  const envConfig: ConfigRecord = {};

  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;

    // MAX_DEPTH → maxDepth
    const name = key
      .slice(ENV_PREFIX.length)
      .toLowerCase()
      .replace(/_([a-z])/g, (_, c: string) => c.toUpperCase());

    if (value === "1" || value === "true") {
      envConfig[name] = true;
    } else if (value === "0" || value === "false" || value === "") {
      envConfig[name] = false;
    } else if (/^\d+$/.test(value)) {
      envConfig[name] = parseInt(value, 10);
    } else {
      envConfig[name] = value;
    }
  }

  return envConfig;
}

// ============================================================================
// Utility Functions
// ============================================================================

function isRecord(value: unknown): value is ConfigRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep merge objects (right takes precedence).
 */
function deepMerge(target: ConfigRecord, source: ConfigRecord): ConfigRecord {
  const result: ConfigRecord = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = result[key];
    result[key] =
      isRecord(sourceValue) && isRecord(targetValue)
        ? deepMerge(targetValue, sourceValue)
        : sourceValue;
  }

  return result;
}

// ============================================================================
// Config Initialization
// ============================================================================

function initializeConfig(): void {
  if (configLoaded) return;

  // Merge: defaults < fileConfig < envConfig
  configStore = deepMerge(deepMerge(DEFAULTS, loadConfigFromFiles()), loadConfigFromEnv());
  configLoaded = true;
}

// ============================================================================
// Public API
// ============================================================================

/** Get a top-level configuration value. */
function get(key: string): unknown {
  initializeConfig();
  return configStore[key];
}

/** Set configuration values programmatically. */
function set(values: Partial<RulelexConfig>): void {
  initializeConfig();
  configStore = deepMerge(configStore, values);
}

function getAll(): Readonly<ConfigRecord> {
  initializeConfig();
  return configStore;
}

/** Path of the loaded config file, if one was found. */
function getConfigFilePath(): string | undefined {
  initializeConfig();
  return configFilePath;
}

/** Reset configuration to defaults (mainly for testing). */
function reset(): void {
  configStore = {};
  configLoaded = false;
  configFilePath = undefined;
}

export function isDebugEnabled(): boolean {
  return get("debug") === true;
}

/** Unified configuration API. */
export const config = {
  get,
  set,
  getAll,
  getConfigFilePath,
  reset,
} as const;

export { loadConfigFromEnv };
