/**
 * Logger Contract
 *
 * Four-level structured logger shared by the engine and plugins.
 */

/**
 * Logger interface for engine components.
 */
export interface EngineLogger {
    debug(message: string, data?: Record<string, unknown>): void;
    info(message: string, data?: Record<string, unknown>): void;
    warn(message: string, data?: Record<string, unknown>): void;
    error(message: string, data?: Record<string, unknown>): void;
}

/**
 * Logger handed to plugins. Same shape as the engine logger; messages are
 * scoped to the plugin that emits them.
 */
export type PluginLogger = EngineLogger;

/**
 * Log levels in increasing severity.
 */
export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 0,
    info : 1,
    warn : 2,
    error: 3,
};

/**
 * Default console logger.
 *
 * @param prefix - Optional tag printed after the level
 * @param minLevel - Messages below this level are dropped (default "debug")
 */
export function createConsoleLogger(prefix?: string, minLevel: LogLevel = "debug"): EngineLogger {
    const tag = prefix ? ` [${prefix}]` : "";
    const enabled = (level: LogLevel) => LEVEL_ORDER[level] >= LEVEL_ORDER[minLevel];

    return {
        debug: (msg, data) => enabled("debug") && console.debug(`[DEBUG]${tag} ${msg}`, data ?? ""),
        info : (msg, data) => enabled("info") && console.info(`[INFO]${tag} ${msg}`, data ?? ""),
        warn : (msg, data) => enabled("warn") && console.warn(`[WARN]${tag} ${msg}`, data ?? ""),
        error: (msg, data) => enabled("error") && console.error(`[ERROR]${tag} ${msg}`, data ?? ""),
    };
}

/**
 * Logger that prefixes every message with `[scope]` and forwards to `parent`.
 */
export function createScopedLogger(parent: EngineLogger, scope: string): EngineLogger {
    return {
        debug: (msg, data) => parent.debug(`[${scope}] ${msg}`, data),
        info : (msg, data) => parent.info(`[${scope}] ${msg}`, data),
        warn : (msg, data) => parent.warn(`[${scope}] ${msg}`, data),
        error: (msg, data) => parent.error(`[${scope}] ${msg}`, data),
    };
}

/**
 * Whether a string names a log level.
 */
export function isLogLevel(value: unknown): value is LogLevel {
    return typeof value === "string" && value in LEVEL_ORDER;
}
