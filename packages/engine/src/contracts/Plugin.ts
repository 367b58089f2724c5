/**
 * Plugin Contract
 *
 * A plugin is a self-describing extension with a lifecycle state machine,
 * a set of category flags, declared dependencies and optional capability
 * extensions (tool, analysis, data provider).
 *
 * Lifecycle:
 *
 *     NotInitialized → Initializing → Initialized → Started ⇄ Stopped
 *
 * with Error reachable from every state but Disabled, and Disabled
 * reachable from every state but itself. Disabled is terminal for an
 * instance; re-enabling means registering a fresh instance.
 */

import type { FlagSet } from "./FlagSet.js";
import type { Subscription } from "./EventBus.js";
import type { PluginContext } from "./PluginContext.js";
import type { PluginSettings } from "./PluginSettings.js";
import type { ToolCapability } from "./ToolPlugin.js";
import type { AnalysisCapability } from "./AnalysisPlugin.js";
import type { DataProviderCapability } from "./DataProviderPlugin.js";

/**
 * Lifecycle states.
 */
export enum PluginState {
    NotInitialized = "NotInitialized",
    Initializing   = "Initializing",
    Initialized    = "Initialized",
    Started        = "Started",
    Stopped        = "Stopped",
    Error          = "Error",
    Disabled       = "Disabled",
}

/**
 * Plugin categories. A plugin may occupy several at once.
 */
export enum PluginType {
    Tool         = "Tool",
    DataProvider = "DataProvider",
    Analysis     = "Analysis",
    Renderer     = "Renderer",
    Converter    = "Converter",
    UIExtension  = "UIExtension",
    Service      = "Service",
}

/**
 * Static description of a plugin.
 */
export interface PluginDescriptor {
    /** Identifier, stable across versions */
    readonly id: string;

    /** Human-readable name */
    readonly name: string;

    /** What the plugin does */
    readonly description: string;

    /** Semantic version of the plugin */
    readonly version: string;

    readonly author: string;

    /** Categories the plugin occupies */
    readonly types: FlagSet<PluginType>;

    /** Lowest host engine version the plugin accepts */
    readonly minEngineVersion: string;

    /** Ids of plugins that must be Started before this one initializes */
    readonly dependencies: readonly string[];
}

/**
 * Called after every state transition.
 */
export type StateChangeListener = (change: {
    readonly plugin: Plugin;
    readonly from: PluginState;
    readonly to: PluginState;
}) => void;

/**
 * Plugin interface.
 *
 * Hosts never call lifecycle methods directly; the PluginManager drives
 * every transition. Most plugins extend BasePlugin rather than implement
 * this from scratch.
 */
export interface Plugin extends PluginDescriptor {
    readonly state: PluginState;

    /** Most recent failure that put the plugin into Error */
    readonly lastError: Error | undefined;

    /**
     * Aborted when the plugin is stopped, disabled or disposed. Long-running
     * work polls or listens to it.
     */
    readonly stopSignal: AbortSignal;

    /** Present when the plugin behaves as an interactive tool */
    readonly tool?: ToolCapability;

    /** Present when the plugin runs analyses */
    readonly analysis?: AnalysisCapability;

    /** Present when the plugin provides data sources */
    readonly dataProvider?: DataProviderCapability;

    /**
     * NotInitialized → Initializing → Initialized | Error.
     *
     * @returns true when the plugin reached Initialized
     * @throws InvalidStateError when not NotInitialized
     */
    initialize(context: PluginContext): Promise<boolean>;

    /**
     * Initialized | Stopped → Started.
     *
     * @throws InvalidStateError from any other state
     */
    start(): Promise<void>;

    /**
     * Started → Stopped. Requests cooperative cancellation of in-flight work.
     *
     * @throws InvalidStateError from any other state
     */
    stop(): Promise<void>;

    /**
     * Any state but Disabled → Disabled.
     *
     * @throws InvalidStateError when already Disabled
     */
    disable(): Promise<void>;

    /**
     * Any state but Disabled → Error, recording `error`.
     *
     * @throws InvalidStateError when Disabled
     */
    fail(error: Error): void;

    /** Current settings, if the plugin has any */
    getSettings(): PluginSettings | undefined;

    /**
     * Replace the settings. Allowed in any state; plugins that cache
     * configuration pick the new values up at their next start().
     */
    applySettings(settings: PluginSettings): void;

    onStateChange(listener: StateChangeListener): Subscription;

    /** Release resources. Safe to call more than once. */
    dispose(): Promise<void>;
}

/**
 * Type guard to check if an object implements Plugin.
 *
 * @param obj - The object to check
 * @returns True if the object is plugin-shaped
 */
export function isPlugin(obj: unknown): obj is Plugin {
    if (typeof obj !== "object" || obj === null) {
        return false;
    }
    return (
        "id" in obj && typeof obj.id === "string" &&
        "version" in obj && typeof obj.version === "string" &&
        "minEngineVersion" in obj && typeof obj.minEngineVersion === "string" &&
        "dependencies" in obj && Array.isArray(obj.dependencies) &&
        "initialize" in obj && typeof obj.initialize === "function" &&
        "start" in obj && typeof obj.start === "function" &&
        "stop" in obj && typeof obj.stop === "function" &&
        "disable" in obj && typeof obj.disable === "function"
    );
}

/**
 * Whether a plugin takes part in dependency resolution and dispatch.
 */
export function isEnabled(plugin: Plugin): boolean {
    return plugin.state !== PluginState.Disabled;
}
