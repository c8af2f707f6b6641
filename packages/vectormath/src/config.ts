/**
 * Configuration
 *
 * Configuration is loaded from (in priority order):
 *
 * 1. Programmatic: config.set() calls (highest priority)
 * 2. Environment variables: VECTORMATH_*
 * 3. Config files: .vectormathrc, .vectormathrc.json, vectormath.config.js, etc.
 * 4. package.json: "vectormath" key
 * 5. Defaults (lowest priority)
 *
 * @example
 * ```typescript
 * import { config } from "vectormath";
 *
 * config.get("debug")          // → boolean
 * config.set({ strict: true }) // lenient operations now throw
 * ```
 *
 * @example Config file (.vectormathrc.json)
 * ```json
 * { "debug": true }
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";

// ============================================================================
// Types
// ============================================================================

export interface VectorMathConfig {
  /** Report failures that the lenient API collapses into an empty vector */
  debug: boolean;
  /**
   * Let toCartesian, toPolar and addCartesian throw their VectorMathError
   * instead of returning an empty vector.
   */
  strict: boolean;
}

export type VectorMathConfigKey = keyof VectorMathConfig;

// ============================================================================
// Global State
// ============================================================================

const DEFAULTS: VectorMathConfig = {
  debug: false,
  strict: false,
};

let configStore: VectorMathConfig = { ...DEFAULTS };
let configLoaded = false;
let configFilePath: string | undefined;
let searchFrom: string | undefined;

// ============================================================================
// Config File Loading (cosmiconfig)
// ============================================================================

const MODULE_NAME = "vectormath";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Keep only the known keys with a value of the right type.
 */
function pickKnown(raw: unknown): Partial<VectorMathConfig> {
  if (!isRecord(raw)) return {};
  const picked: Partial<VectorMathConfig> = {};
  if (typeof raw.debug === "boolean") picked.debug = raw.debug;
  if (typeof raw.strict === "boolean") picked.strict = raw.strict;
  return picked;
}

/**
 * Search for a config file in `from` (default: the working directory).
 */
function loadConfigFromFiles(from?: string): Partial<VectorMathConfig> {
  try {
    const explorer = cosmiconfigSync(MODULE_NAME, {
      searchPlaces: [
        "package.json",
        `.${MODULE_NAME}rc`,
        `.${MODULE_NAME}rc.json`,
        `.${MODULE_NAME}rc.yaml`,
        `.${MODULE_NAME}rc.yml`,
        `${MODULE_NAME}.config.js`,
        `${MODULE_NAME}.config.cjs`,
      ],
    });

    const result = explorer.search(from);
    if (result && !result.isEmpty) {
      configFilePath = result.filepath;
      return pickKnown(result.config);
    }
  } catch (error) {
    // A broken config file falls back to defaults
    console.warn(`[${MODULE_NAME}] Failed to load config file:`, error);
  }

  return {};
}

// ============================================================================
// Environment Variable Loading
// ============================================================================

const ENV_PREFIX = "VECTORMATH_";

function parseFlag(value: string): boolean | undefined {
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true") return true;
  if (normalized === "0" || normalized === "false" || normalized === "") return false;
  return undefined;
}

/**
 * Load configuration from environment variables.
 *
 *   VECTORMATH_DEBUG=1      → { debug: true }
 *   VECTORMATH_STRICT=false → { strict: false }
 */
function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<VectorMathConfig> {
  const envConfig: Partial<VectorMathConfig> = {};

  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;

    const flag = parseFlag(value);
    if (flag === undefined) continue;

    switch (key.slice(ENV_PREFIX.length).toLowerCase()) {
      case "debug":
        envConfig.debug = flag;
        break;
      case "strict":
        envConfig.strict = flag;
        break;
    }
  }

  return envConfig;
}

// ============================================================================
// Config Initialization
// ============================================================================

/**
 * Priority: env vars > config files > defaults
 */
function initializeConfig(): void {
  if (configLoaded) return;

  configStore = {
    ...DEFAULTS,
    ...loadConfigFromFiles(searchFrom),
    ...loadConfigFromEnv(),
  };

  configLoaded = true;
}

// ============================================================================
// Public API
// ============================================================================

function get<K extends VectorMathConfigKey>(key: K): VectorMathConfig[K] {
  initializeConfig();
  return configStore[key];
}

/**
 * Merge values into the loaded configuration.
 *
 * @example
 * config.set({ debug: true });
 */
function set(values: Partial<VectorMathConfig>): void {
  initializeConfig();
  configStore = { ...configStore, ...values };
}

function has(key: VectorMathConfigKey): boolean {
  return !!get(key);
}

function getAll(): Readonly<VectorMathConfig> {
  initializeConfig();
  return configStore;
}

/** Path of the config file that was loaded, if any */
function getConfigFilePath(): string | undefined {
  initializeConfig();
  return configFilePath;
}

export interface ConfigResetOptions {
  /** Directory the next load searches for a config file in */
  searchFrom?: string;
}

/**
 * Forget loaded values; the next read loads everything again (mainly for testing).
 */
function reset(options: ConfigResetOptions = {}): void {
  configStore = { ...DEFAULTS };
  configLoaded = false;
  configFilePath = undefined;
  searchFrom = options.searchFrom;
}

/**
 * Identity helper that types a `vectormath.config.js` export.
 */
export function defineConfig(values: Partial<VectorMathConfig>): Partial<VectorMathConfig> {
  return values;
}

export const config = {
  get,
  set,
  has,
  getAll,
  getConfigFilePath,
  reset,
};

export { loadConfigFromEnv, loadConfigFromFiles };
