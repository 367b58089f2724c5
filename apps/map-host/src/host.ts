/**
 * @fileoverview Map host wiring
 *
 * Builds the plugin manager and the host-owned services (layers, canvas,
 * settings store, loader) from a HostConfig, registers the built-in and
 * discovered plugins, and loads the configured layers through the data
 * providers.
 *
 * @module host
 */

import {
    PluginLoader,
    PluginManager,
    PluginSettingsStore,
    createConsoleLogger,
    describeError,
    type EngineLogger,
    type LoadReport,
    type Plugin,
    type StartReport,
} from "@mapcore/engine";
import { HeadlessMapCanvas } from "./adapters/map/HeadlessMapCanvas.js";
import { InMemoryLayerCollection, createLayer } from "./adapters/map/InMemoryLayerCollection.js";
import {
    AttributeStatisticsPlugin,
    MeasureToolPlugin,
    SelectToolPlugin,
    SqliteDataProviderPlugin,
} from "./domain/index.js";
import type { HostConfig, LayerSourceConfig } from "./config/index.js";

/**
 * Running host: the manager and everything the host owns.
 */
export interface Host {
    readonly manager: PluginManager;
    readonly layers: InMemoryLayerCollection;
    readonly canvas: HeadlessMapCanvas;
    readonly loader: PluginLoader;
    readonly settingsStore: PluginSettingsStore;
    readonly logger: EngineLogger;
}

export interface CreateHostOptions {
    /** Logger override (default: console logger at the configured level) */
    logger?: EngineLogger;
}

/**
 * Outcome of startHost().
 */
export interface HostStartReport {
    readonly load: LoadReport;
    readonly start: StartReport;

    /** Names of the layers loaded from data providers */
    readonly layers: string[];
}

/**
 * Fresh instances of the plugins shipped with the host.
 */
export function builtInPlugins(): Plugin[] {
    return [
        new SqliteDataProviderPlugin(),
        new MeasureToolPlugin(),
        new SelectToolPlugin(),
        new AttributeStatisticsPlugin(),
    ];
}

/**
 * Build a host from its configuration. Nothing is loaded or started.
 */
export function createHost(config: HostConfig, options: CreateHostOptions = {}): Host {
    const logger = options.logger ?? createConsoleLogger("map-host", config.logLevel);

    const layers = new InMemoryLayerCollection();
    const canvas = new HeadlessMapCanvas({
        extent: config.canvas.extent,
        width : config.canvas.width,
        height: config.canvas.height,
    });
    const settingsStore = new PluginSettingsStore({ directory: config.settingsDir, logger });
    const loader = new PluginLoader({ logger });

    const manager = new PluginManager({
        engineVersion : config.engineVersion,
        contextFactory: () => ({ mapCanvas: canvas, layers }),
        logger,
        settingsStore,
        dataRoot      : config.dataDir,
    });

    return { manager, layers, canvas, loader, settingsStore, logger };
}

/**
 * Register built-in and discovered plugins, start them in dependency
 * order, then load the configured layers.
 *
 * @param extraPlugins - Plugins registered after the built-ins and before discovered ones
 */
export async function startHost(
    host: Host,
    config: HostConfig,
    extraPlugins: readonly Plugin[] = []
): Promise<HostStartReport> {
    const discovered = await host.loader.loadFromDirectories(config.pluginDirs);
    host.logger.info(`Discovered ${discovered.length} plugin(s)`, { directories: config.pluginDirs });

    const load = await host.manager.load([...builtInPlugins(), ...extraPlugins, ...discovered]);
    for (const failure of load.failed) {
        host.logger.warn("Plugin rejected", { pluginId: failure.pluginId, error: failure.error.message });
    }

    const start = await host.manager.startAll();
    for (const failure of start.failed) {
        host.logger.warn("Plugin failed to start", { pluginId: failure.pluginId, error: failure.error.message });
    }

    const loadedLayers: string[] = [];
    for (const layer of config.layers) {
        if (await loadLayer(host, layer)) {
            loadedLayers.push(layer.name);
        }
    }

    return { load, start, layers: loadedLayers };
}

/**
 * Unload every plugin; settings are saved on the way out.
 */
export async function stopHost(host: Host): Promise<void> {
    await host.manager.unloadAll();
}

/**
 * Read one configured layer through the first data provider that accepts
 * its source.
 *
 * @returns true when the layer was added
 */
export async function loadLayer(host: Host, layer: LayerSourceConfig): Promise<boolean> {
    const provider = host.manager.findDataProvider(layer.source);
    if (!provider) {
        host.logger.warn("No data provider for layer source", { layer: layer.name, source: layer.source });
        return false;
    }

    try {
        const source = await host.manager.createDataSource(provider.id, layer.source, layer.options);
        if (!source) {
            host.logger.warn("Data provider declined layer source", { layer: layer.name, provider: provider.id });
            return false;
        }

        try {
            const features = await source.loadFeatures();
            host.layers.add(createLayer(layer.name, features, layer.visible));
            host.logger.info(`Loaded layer ${layer.name}`, { features: features.count, provider: provider.id });
        }
        finally {
            await source.close();
        }
        return true;
    }
    catch (error) {
        host.logger.error("Failed to load layer", { layer: layer.name, error: describeError(error) });
        return false;
    }
}
