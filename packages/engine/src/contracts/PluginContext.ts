/**
 * Plugin Context Contract
 *
 * The capability surface a host hands to each plugin at initialize time.
 * Exactly one context instance exists per plugin. Everything here is owned
 * by the host; the engine only guarantees the shape.
 */

import type { Envelope } from "./Geometry.js";
import type { EventBus } from "./EventBus.js";
import type { PluginLogger } from "./Logger.js";
import type { Plugin, PluginType } from "./Plugin.js";
import type { FeatureStore } from "../data/FeatureStore.js";

/**
 * Handle to the map view.
 */
export interface MapCanvas {
    /** Currently visible world extent, if the canvas has one */
    getViewExtent(): Envelope | undefined;

    /** Request a redraw */
    refresh(): void;
}

/**
 * Named feature layer.
 */
export interface Layer {
    readonly name: string;
    readonly features: FeatureStore;
    visible: boolean;
}

/**
 * Layers shared by all plugins. Plugins reach feature stores only
 * through this collection.
 */
export interface LayerCollection {
    get(name: string): Layer | undefined;
    list(): readonly Layer[];
    add(layer: Layer): void;
    remove(name: string): boolean;
}

/**
 * Read-only view of the plugin manager offered to plugins.
 */
export interface PluginManagerHandle {
    getPlugin(pluginId: string): Plugin | undefined;
    getPlugins(type: PluginType): Plugin[];
    isPluginEnabled(pluginId: string): boolean;
}

/**
 * Context handed to a plugin's initialize().
 */
export interface PluginContext {
    readonly mapCanvas: MapCanvas;
    readonly layers: LayerCollection;
    readonly pluginManager: PluginManagerHandle;
    readonly eventBus: EventBus;

    /** Logger scoped to the receiving plugin */
    readonly logger: PluginLogger;

    /** Directory reserved for the receiving plugin's files */
    readonly dataDirectory: string;
}
