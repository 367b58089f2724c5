/**
 * @fileoverview Plugin Settings Store
 *
 * Persists plugin settings as `<directory>/<pluginId>.json`, one file per
 * plugin.
 *
 * @module @mapcore/engine/impl/PluginSettingsStore
 */

import { mkdir, readFile, writeFile } from "fs/promises";
import { join } from "path";
import type { PluginSettings } from "../contracts/PluginSettings.js";
import type { EngineLogger } from "../contracts/Logger.js";
import { createConsoleLogger } from "../contracts/Logger.js";
import { InvalidArgumentError, describeError } from "../contracts/Errors.js";

/**
 * Settings store configuration.
 */
export interface PluginSettingsStoreConfig {
    /** Directory holding the settings files */
    readonly directory: string;

    readonly logger?: EngineLogger;
}

/**
 * File-backed settings store.
 *
 * @example
 * ```typescript
 * const store = new PluginSettingsStore({ directory: "./settings" });
 *
 * await store.save("measure", plugin.getSettings());
 * await store.load("measure", settings); // true when the file was applied
 * ```
 */
export class PluginSettingsStore {
    private readonly directory: string;
    private readonly logger: EngineLogger;

    constructor(config: PluginSettingsStoreConfig) {
        this.directory = config.directory;
        this.logger    = config.logger ?? createConsoleLogger("PluginSettingsStore");
    }

    /**
     * Path of the settings file for a plugin.
     */
    pathFor(pluginId: string): string {
        if (!pluginId || /[\\/]/.test(pluginId) || pluginId === "." || pluginId === "..") {
            throw new InvalidArgumentError("pluginId", `Invalid plugin id for settings: ${pluginId}`);
        }
        return join(this.directory, `${pluginId}.json`);
    }

    /**
     * Read stored settings into `settings`.
     *
     * @returns true when stored values were applied; false when no file
     * exists or its contents were rejected (settings then keep the values
     * they held before the call)
     */
    async load(pluginId: string, settings: PluginSettings): Promise<boolean> {
        const filePath = this.pathFor(pluginId);

        let text: string;
        try {
            text = await readFile(filePath, "utf-8");
        }
        catch (error) {
            if (isMissingFile(error)) {
                return false;
            }
            throw error;
        }

        const previous = settings.toSerializedForm();
        try {
            settings.fromSerializedForm(text);
        }
        catch (error) {
            this.logger.warn("Stored settings could not be parsed", { pluginId, filePath, error: describeError(error) });
            settings.fromSerializedForm(previous);
            return false;
        }

        const result = settings.validate();
        if (!result.valid) {
            this.logger.warn("Stored settings are invalid", { pluginId, filePath, error: result.errorMessage });
            settings.fromSerializedForm(previous);
            return false;
        }

        this.logger.debug("Settings loaded", { pluginId, filePath });
        return true;
    }

    /**
     * Write settings, creating the directory when needed.
     *
     * @throws InvalidArgumentError when the settings do not validate
     */
    async save(pluginId: string, settings: PluginSettings): Promise<void> {
        const result = settings.validate();
        if (!result.valid) {
            throw new InvalidArgumentError("settings", result.errorMessage ?? `Settings for ${pluginId} are invalid`);
        }

        const filePath = this.pathFor(pluginId);
        await mkdir(this.directory, { recursive: true });
        await writeFile(filePath, settings.toSerializedForm(), "utf-8");

        this.logger.debug("Settings saved", { pluginId, filePath });
    }
}

function isMissingFile(error: unknown): boolean {
    return error instanceof Error && "code" in error && error.code === "ENOENT";
}
