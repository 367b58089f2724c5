/**
 * @fileoverview Host Configuration Loader
 *
 * Loads the host configuration from a YAML file and applies environment
 * overrides. Relative paths in the file are resolved against the file's
 * directory; relative paths from the environment against the working
 * directory.
 *
 * Environment overrides:
 * - MAPCORE_ENGINE_VERSION
 * - MAPCORE_PLUGIN_DIRS (comma-separated)
 * - MAPCORE_DATA_DIR
 * - MAPCORE_SETTINGS_DIR
 * - MAPCORE_LOG_LEVEL
 *
 * @module config/loadHostConfig
 */

import { readFileSync, existsSync } from "fs";
import { dirname, resolve } from "path";
import { parse as parseYaml } from "yaml";
import {
    Envelope,
    InvalidArgumentError,
    isLogLevel,
    type LogLevel,
} from "@mapcore/engine";

/**
 * Layer loaded through a data provider at startup.
 */
export interface LayerSourceConfig {
    name: string;

    /** Connection string handed to the data provider, e.g. "data/places.sqlite#cities" */
    source: string;
    visible: boolean;

    /** Extra options passed to createDataSource() */
    options?: Record<string, unknown>;
}

/**
 * Resolved host configuration
 */
export interface HostConfig {
    engineVersion: string;
    logLevel: LogLevel;

    /** Directories scanned for plugin manifests and modules */
    pluginDirs: string[];

    /** Parent of each plugin's data directory */
    dataDir: string;

    /** Directory of persisted plugin settings */
    settingsDir: string;

    canvas: {
        width: number;
        height: number;
        extent?: Envelope;
    };

    layers: LayerSourceConfig[];
}

type Env = Readonly<Record<string, string | undefined>>;

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readString(raw: Record<string, unknown>, key: string, fallback: string): string {
    const value = raw[key];
    if (value === undefined || value === null) {
        return fallback;
    }
    if (typeof value !== "string" || value.length === 0) {
        throw new InvalidArgumentError(key, `Invalid config: '${key}' must be a non-empty string`);
    }
    return value;
}

function readPositive(raw: Record<string, unknown>, key: string, fallback: number): number {
    const value = raw[key];
    if (value === undefined || value === null) {
        return fallback;
    }
    if (typeof value !== "number" || !(value > 0)) {
        throw new InvalidArgumentError(key, `Invalid config: '${key}' must be a positive number`);
    }
    return value;
}

function readExtent(value: unknown): Envelope | undefined {
    if (value === undefined || value === null) {
        return undefined;
    }
    if (!Array.isArray(value) || value.length !== 4 || !value.every(n => typeof n === "number")) {
        throw new InvalidArgumentError("canvas.extent", "Invalid config: 'canvas.extent' must be [minX, minY, maxX, maxY]");
    }
    const [minX, minY, maxX, maxY] = value.map(Number);
    return new Envelope(minX, minY, maxX, maxY);
}

function readLogLevel(value: unknown, key: string): LogLevel {
    if (!isLogLevel(value)) {
        throw new InvalidArgumentError(key, `Invalid config: '${key}' must be one of debug, info, warn, error`);
    }
    return value;
}

function readLayers(value: unknown, baseDir: string): LayerSourceConfig[] {
    if (value === undefined || value === null) {
        return [];
    }
    if (!Array.isArray(value)) {
        throw new InvalidArgumentError("layers", "Invalid config: 'layers' must be a list");
    }

    return value.map((raw: unknown, index) => {
        if (!isRecord(raw) || typeof raw.name !== "string" || typeof raw.source !== "string") {
            throw new InvalidArgumentError(
                `layers[${index}]`,
                `Invalid layer at index ${index}: missing or invalid 'name' or 'source'`
            );
        }
        const { visible, options } = raw;
        if (visible !== undefined && typeof visible !== "boolean") {
            throw new InvalidArgumentError(`layers[${index}].visible`, `Invalid layer at index ${index}: 'visible' must be a boolean`);
        }
        if (options !== undefined && !isRecord(options)) {
            throw new InvalidArgumentError(`layers[${index}].options`, `Invalid layer at index ${index}: 'options' must be a mapping`);
        }

        const layer: LayerSourceConfig = {
            name   : raw.name,
            source : resolve(baseDir, raw.source),
            visible: visible ?? true,
        };
        if (options) {
            layer.options = options;
        }
        return layer;
    });
}

/**
 * Override file values with MAPCORE_* environment variables.
 */
function applyEnv(config: HostConfig, env: Env): HostConfig {
    const result = { ...config };

    if (env.MAPCORE_ENGINE_VERSION) {
        result.engineVersion = env.MAPCORE_ENGINE_VERSION;
    }
    if (env.MAPCORE_PLUGIN_DIRS) {
        result.pluginDirs = env.MAPCORE_PLUGIN_DIRS
            .split(",")
            .map(dir => dir.trim())
            .filter(dir => dir.length > 0)
            .map(dir => resolve(dir));
    }
    if (env.MAPCORE_DATA_DIR) {
        result.dataDir = resolve(env.MAPCORE_DATA_DIR);
    }
    if (env.MAPCORE_SETTINGS_DIR) {
        result.settingsDir = resolve(env.MAPCORE_SETTINGS_DIR);
    }
    if (env.MAPCORE_LOG_LEVEL) {
        result.logLevel = readLogLevel(env.MAPCORE_LOG_LEVEL, "MAPCORE_LOG_LEVEL");
    }

    return result;
}

/**
 * Load the host configuration from a YAML file.
 *
 * @param filePath - Path to the host.yml file
 * @param env - Environment to read overrides from (default: process.env)
 * @throws Error if the file doesn't exist, InvalidArgumentError if a value is invalid
 *
 * @example
 * ```typescript
 * const config = loadHostConfig("./config/host.yml");
 * console.log(config.pluginDirs);
 * // ["/srv/map/plugins/system", "/srv/map/user/plugins"]
 * ```
 */
export function loadHostConfig(filePath: string, env: Env = process.env): HostConfig {
    if (!existsSync(filePath)) {
        throw new Error(`Host config file not found: ${filePath}`);
    }

    const baseDir = dirname(resolve(filePath));
    const parsed: unknown = parseYaml(readFileSync(filePath, "utf-8"));
    const raw = parsed ?? {};

    if (!isRecord(raw)) {
        throw new Error("Invalid host config format: expected a mapping");
    }

    const defaults = getDefaultHostConfig(baseDir);

    let pluginDirs = defaults.pluginDirs;
    if (raw.pluginDirs !== undefined) {
        const dirs: unknown = raw.pluginDirs;
        if (!Array.isArray(dirs) || !dirs.every((dir): dir is string => typeof dir === "string")) {
            throw new InvalidArgumentError("pluginDirs", "Invalid config: 'pluginDirs' must be a list of paths");
        }
        pluginDirs = dirs.map(dir => resolve(baseDir, dir));
    }

    const canvas = isRecord(raw.canvas) ? raw.canvas : {};

    const config: HostConfig = {
        engineVersion: readString(raw, "engineVersion", defaults.engineVersion),
        logLevel     : raw.logLevel === undefined ? defaults.logLevel : readLogLevel(raw.logLevel, "logLevel"),
        pluginDirs,
        dataDir      : resolve(baseDir, readString(raw, "dataDir", defaults.dataDir)),
        settingsDir  : resolve(baseDir, readString(raw, "settingsDir", defaults.settingsDir)),
        canvas       : {
            width : readPositive(canvas, "width", defaults.canvas.width),
            height: readPositive(canvas, "height", defaults.canvas.height),
            extent: readExtent(canvas.extent),
        },
        layers: readLayers(raw.layers, baseDir),
    };

    return applyEnv(config, env);
}

/**
 * Load the host configuration, falling back to defaults when the file is
 * missing or invalid.
 */
export function loadHostConfigWithFallback(filePath: string, env: Env = process.env): HostConfig {
    try {
        return loadHostConfig(filePath, env);
    }
    catch (error) {
        console.warn(`Failed to load host config from ${filePath}:`, error instanceof Error ? error.message : error);
        return applyEnv(getDefaultHostConfig(dirname(resolve(filePath))), env);
    }
}

/**
 * Default host configuration, with paths under `baseDir`.
 */
export function getDefaultHostConfig(baseDir: string = process.cwd()): HostConfig {
    return {
        engineVersion: "1.0.0",
        logLevel     : "info",
        pluginDirs   : [resolve(baseDir, "user", "plugins")],
        dataDir      : resolve(baseDir, "plugin-data"),
        settingsDir  : resolve(baseDir, "settings"),
        canvas       : {
            width : 1024,
            height: 768,
        },
        layers: [],
    };
}
