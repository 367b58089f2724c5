/**
 * @fileoverview Plugin Loader
 *
 * Loads plugins from:
 * - Manifest files (`*.plugin.yml` / `*.plugin.yaml`) naming a module,
 *   an export and optional initial settings
 * - Code files (JS exporting Plugin instances, or a factory as the
 *   `default` or `createPlugin` export)
 *
 * The loader only produces plugin objects; admission (version and
 * dependency checks) is the PluginManager's job.
 *
 * @module @mapcore/engine/plugins/PluginLoader
 */

import { readFileSync, readdirSync, existsSync, statSync } from "fs";
import { join, extname, dirname, resolve } from "path";
import { pathToFileURL } from "url";
import { parse as parseYaml } from "yaml";
import type { Plugin } from "../contracts/Plugin.js";
import { isPlugin } from "../contracts/Plugin.js";
import type { EngineLogger } from "../contracts/Logger.js";
import { createConsoleLogger } from "../contracts/Logger.js";
import { InvalidArgumentError, describeError } from "../contracts/Errors.js";

/**
 * Manifest file contents.
 */
export interface PluginManifest {
    /** Id the loaded plugin must report */
    id: string;

    /** Module path, relative to the manifest */
    module: string;

    /** Export to use (default: "default", then "createPlugin", then the first plugin instance) */
    export?: string;

    /** Set to false to skip the plugin (default true) */
    enabled?: boolean;

    /** Initial settings, applied through the plugin's settings object */
    settings?: Record<string, unknown>;
}

/**
 * Discovered manifest, valid or not.
 */
export interface PluginInfo {
    readonly manifestPath: string;
    readonly id: string;

    /** Absolute module path */
    readonly modulePath: string;
    readonly exportName?: string;
    readonly enabled: boolean;
    readonly settings?: Record<string, unknown>;
    readonly valid: boolean;
    readonly validationError?: string;
}

/**
 * Plugin loader configuration.
 */
export interface PluginLoaderConfig {
    /** Logger for plugin loading */
    logger?: EngineLogger;
}

const MANIFEST_SUFFIXES = [".plugin.yml", ".plugin.yaml"];
const CODE_EXTENSIONS = [".js", ".mjs"];

/**
 * Plugin Loader
 *
 * @example
 * ```typescript
 * const loader = new PluginLoader();
 *
 * const plugins = await loader.loadFromDirectories(["./user/plugins"]);
 * const report = await manager.load(plugins);
 * ```
 */
export class PluginLoader {
    private readonly logger: EngineLogger;

    constructor(config: PluginLoaderConfig = {}) {
        this.logger = config.logger ?? createConsoleLogger("PluginLoader");
    }

    /**
     * Find and parse every manifest in a directory. A missing directory
     * yields an empty list.
     */
    discover(dirPath: string): PluginInfo[] {
        if (!this.isDirectory(dirPath)) {
            return [];
        }

        return readdirSync(dirPath)
            .filter(isManifestFile)
            .sort()
            .map(file => this.readManifest(join(dirPath, file)));
    }

    /**
     * Parse one manifest. Problems are reported through `valid` and
     * `validationError` rather than thrown.
     */
    readManifest(manifestPath: string): PluginInfo {
        const invalid = (reason: string, id = ""): PluginInfo => ({
            manifestPath,
            id,
            modulePath     : "",
            enabled        : false,
            valid          : false,
            validationError: reason,
        });

        let parsed: unknown;
        try {
            parsed = parseYaml(readFileSync(manifestPath, "utf-8"));
        }
        catch (error) {
            return invalid(`Manifest could not be read: ${describeError(error)}`);
        }

        if (!isManifest(parsed)) {
            return invalid("Manifest must define string 'id' and 'module'");
        }
        if (parsed.export !== undefined && typeof parsed.export !== "string") {
            return invalid("'export' must be a string", parsed.id);
        }
        if (parsed.enabled !== undefined && typeof parsed.enabled !== "boolean") {
            return invalid("'enabled' must be a boolean", parsed.id);
        }
        if (parsed.settings !== undefined && !isRecord(parsed.settings)) {
            return invalid("'settings' must be a mapping", parsed.id);
        }

        return {
            manifestPath,
            id        : parsed.id,
            modulePath: resolve(dirname(manifestPath), parsed.module),
            exportName: parsed.export,
            enabled   : parsed.enabled ?? true,
            settings  : parsed.settings,
            valid     : true,
        };
    }

    /**
     * Import the module a manifest names and produce its plugin.
     *
     * @returns the plugin, or undefined when the manifest disables it
     * @throws InvalidArgumentError when the manifest is invalid, no plugin
     * export is found, or the plugin's id differs from the manifest's
     */
    async loadPlugin(info: PluginInfo): Promise<Plugin | undefined> {
        if (!info.valid) {
            throw new InvalidArgumentError("info", info.validationError ?? `Invalid manifest: ${info.manifestPath}`);
        }
        if (!info.enabled) {
            this.logger.info("Plugin disabled by manifest", { id: info.id, manifestPath: info.manifestPath });
            return undefined;
        }

        const module = await importModule(info.modulePath);

        let plugin: Plugin | undefined;
        if (info.exportName) {
            if (!(info.exportName in module)) {
                throw new InvalidArgumentError("export", `Module ${info.modulePath} has no export '${info.exportName}'`);
            }
            plugin = await materialize(module[info.exportName], true);
        }
        else {
            plugin = await materialize(module.default, true) ?? await materialize(module.createPlugin, true);
            for (const value of Object.values(module)) {
                if (plugin) {
                    break;
                }
                plugin = await materialize(value, false);
            }
        }

        if (!plugin) {
            throw new InvalidArgumentError("module", `Module ${info.modulePath} does not export a plugin`);
        }
        if (plugin.id !== info.id) {
            throw new InvalidArgumentError(
                "id",
                `Plugin id ${plugin.id} does not match manifest id ${info.id}`
            );
        }

        if (info.settings) {
            this.applyManifestSettings(plugin, info.settings);
        }

        this.logger.debug("Loaded plugin from manifest", { id: plugin.id, manifestPath: info.manifestPath });
        return plugin;
    }

    /**
     * Load every plugin a code file exports.
     *
     * Looks at named exports, the default export, and arrays under the
     * default export. Only `default` and `createPlugin` are called as
     * factories; other exported functions are left alone.
     */
    async loadCodeFile(filePath: string): Promise<Plugin[]> {
        const module = await importModule(resolve(filePath));
        const plugins: Plugin[] = [];
        const seen = new Set<Plugin>();

        const collect = async (value: unknown, exportName: string) => {
            const plugin = await materialize(value, FACTORY_EXPORTS.has(exportName));
            if (plugin && !seen.has(plugin)) {
                seen.add(plugin);
                plugins.push(plugin);
                this.logger.debug("Loaded code plugin", { id: plugin.id, export: exportName });
            }
        };

        for (const [key, value] of Object.entries(module)) {
            if (key === "default" && Array.isArray(value)) {
                for (const item of value) {
                    await collect(item, key);
                }
            }
            else {
                await collect(value, key);
            }
        }

        return plugins;
    }

    /**
     * Load all plugins from a directory: manifests first, then code files
     * that no manifest references. Per-file failures are logged and skipped.
     */
    async loadFromDirectory(dirPath: string): Promise<Plugin[]> {
        if (!this.isDirectory(dirPath)) {
            return [];
        }

        const plugins: Plugin[] = [];
        const manifests = this.discover(dirPath);
        const claimed = new Set<string>();

        for (const info of manifests) {
            if (info.modulePath) {
                claimed.add(info.modulePath);
            }
            if (!info.valid) {
                this.logger.warn("Invalid plugin manifest", { manifestPath: info.manifestPath, error: info.validationError });
                continue;
            }
            try {
                const plugin = await this.loadPlugin(info);
                if (plugin) {
                    plugins.push(plugin);
                }
            }
            catch (error) {
                this.logger.error("Failed to load plugin", { manifestPath: info.manifestPath, error: describeError(error) });
            }
        }

        for (const file of readdirSync(dirPath).sort()) {
            const filePath = resolve(dirPath, file);
            if (!CODE_EXTENSIONS.includes(extname(file).toLowerCase()) || claimed.has(filePath)) {
                continue;
            }
            try {
                plugins.push(...await this.loadCodeFile(filePath));
            }
            catch (error) {
                this.logger.error("Failed to load plugin file", { filePath, error: describeError(error) });
            }
        }

        this.logger.info("Plugins loaded from directory", { dirPath, plugins: plugins.length });
        return plugins;
    }

    /**
     * Load plugins from multiple directories.
     */
    async loadFromDirectories(dirPaths: readonly string[]): Promise<Plugin[]> {
        const plugins: Plugin[] = [];
        for (const dirPath of dirPaths) {
            plugins.push(...await this.loadFromDirectory(dirPath));
        }
        return plugins;
    }

    private applyManifestSettings(plugin: Plugin, values: Record<string, unknown>): void {
        const settings = plugin.getSettings();
        if (!settings) {
            this.logger.warn("Manifest settings ignored: plugin has no settings", { id: plugin.id });
            return;
        }
        settings.fromSerializedForm(JSON.stringify(values));
        plugin.applySettings(settings);
    }

    private isDirectory(dirPath: string): boolean {
        if (!existsSync(dirPath)) {
            this.logger.warn("Plugin directory does not exist", { dirPath });
            return false;
        }
        if (!statSync(dirPath).isDirectory()) {
            this.logger.warn("Plugin path is not a directory", { dirPath });
            return false;
        }
        return true;
    }
}

function isManifestFile(file: string): boolean {
    const lower = file.toLowerCase();
    return MANIFEST_SUFFIXES.some(suffix => lower.endsWith(suffix));
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Type guard for the required manifest fields.
 */
function isManifest(value: unknown): value is PluginManifest {
    return (
        isRecord(value) &&
        typeof value.id === "string" &&
        value.id.length > 0 &&
        typeof value.module === "string" &&
        value.module.length > 0
    );
}

const FACTORY_EXPORTS: ReadonlySet<string> = new Set(["default", "createPlugin"]);

function isFactory(value: unknown): value is () => unknown {
    return typeof value === "function" && value.length === 0 && !isPlugin(value);
}

async function importModule(modulePath: string): Promise<Record<string, unknown>> {
    const module: unknown = await import(pathToFileURL(modulePath).href);
    if (!isRecord(module)) {
        throw new InvalidArgumentError("module", `Module ${modulePath} has no exports`);
    }
    return module;
}

/**
 * Turn an export into a plugin: instances pass through, and when
 * `callFactory` is set a zero-argument factory is called (and awaited).
 * Anything else yields undefined.
 */
async function materialize(value: unknown, callFactory: boolean): Promise<Plugin | undefined> {
    if (isPlugin(value)) {
        return value;
    }
    if (callFactory && isFactory(value)) {
        let produced: unknown;
        try {
            produced = await value();
        }
        catch (error) {
            // Classes report length 0 too; calling one without `new` throws
            if (error instanceof TypeError && /class constructor/i.test(error.message)) {
                return undefined;
            }
            throw error;
        }
        return isPlugin(produced) ? produced : undefined;
    }
    return undefined;
}
