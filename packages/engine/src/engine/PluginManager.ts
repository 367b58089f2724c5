/**
 * @fileoverview Plugin Manager
 *
 * Owns the plugin registry and drives every lifecycle transition.
 *
 * Responsibilities:
 * - Admission: duplicate ids, engine version, dependency resolution
 * - Startup in dependency order, with failures propagated to dependents
 * - Shutdown in exact reverse of start order
 * - Dispatch to tool, analysis and data-provider capabilities
 * - Lifecycle, tool and progress events on the shared bus
 *
 * Lifecycle calls on one plugin are serialized through a per-plugin queue;
 * calls on different plugins may interleave.
 *
 * @module @mapcore/engine/engine/PluginManager
 */

import { extname, join } from "path";
import * as semver from "semver";
import type { Plugin, PluginDescriptor } from "../contracts/Plugin.js";
import { PluginState, PluginType, isEnabled, isPlugin } from "../contracts/Plugin.js";
import type {
    LayerCollection,
    MapCanvas,
    PluginContext,
    PluginManagerHandle,
} from "../contracts/PluginContext.js";
import type { EventBus, Subscription } from "../contracts/EventBus.js";
import { createEvent } from "../contracts/EventBus.js";
import type { EngineLogger } from "../contracts/Logger.js";
import { createConsoleLogger, createScopedLogger } from "../contracts/Logger.js";
import type { KeyEventArgs, MouseEventArgs, ToolPlugin } from "../contracts/ToolPlugin.js";
import { isToolPlugin } from "../contracts/ToolPlugin.js";
import type {
    AnalysisParameters,
    AnalysisPlugin,
    AnalysisResult,
    ProgressReporter,
    ProgressUpdate,
} from "../contracts/AnalysisPlugin.js";
import { isAnalysisPlugin } from "../contracts/AnalysisPlugin.js";
import type {
    DataProviderCapabilityFlag,
    DataProviderPlugin,
    DataSource,
    DataSourceMetadata,
} from "../contracts/DataProviderPlugin.js";
import { isDataProviderPlugin } from "../contracts/DataProviderPlugin.js";
import type { ValidationResult } from "../contracts/PluginSettings.js";
import { invalid } from "../contracts/PluginSettings.js";
import {
    CancelledError,
    DependencyError,
    ExecutionError,
    InvalidArgumentError,
    InvalidStateError,
    VersionError,
    describeError,
    toError,
} from "../contracts/Errors.js";
import type { PluginSettingsStore } from "../impl/PluginSettingsStore.js";
import { InMemoryEventBus } from "../impl/InMemoryEventBus.js";
import {
    type DependencyNode,
    dependencyClosure,
    dependentsOf,
    resolveDependencies,
} from "./DependencyResolver.js";

/**
 * Host-owned parts of a plugin context.
 */
export interface HostServices {
    readonly mapCanvas: MapCanvas;
    readonly layers: LayerCollection;
}

/**
 * Builds the host-owned context fields for one plugin. Called once per
 * plugin, the first time it is initialized.
 */
export type HostContextFactory = (plugin: PluginDescriptor) => HostServices;

/**
 * Plugin manager configuration.
 */
export interface PluginManagerConfig {
    /** Version of the running engine, compared to each plugin's minEngineVersion */
    readonly engineVersion: string;

    readonly contextFactory: HostContextFactory;

    /** Custom EventBus (default: InMemoryEventBus) */
    readonly eventBus?: EventBus;

    /** Logger for manager operations */
    readonly logger?: EngineLogger;

    /** Persisted settings, applied at registration and saved at unload */
    readonly settingsStore?: PluginSettingsStore;

    /** Parent of each plugin's data directory (default: "plugin-data") */
    readonly dataRoot?: string;
}

export interface PluginFailure {
    readonly pluginId: string;
    readonly error: Error;
}

export interface LoadReport {
    /** Admitted ids, in input order */
    readonly loaded: string[];
    readonly failed: PluginFailure[];
}

export interface StartReport {
    /** Ids started by this call, in start order */
    readonly started: string[];
    readonly failed: PluginFailure[];
}

/**
 * Outcome of offering an input event to the active tools.
 */
export interface DispatchResult {
    readonly handled: boolean;

    /** Id of the tool that claimed the event */
    readonly handledBy?: string;
}

export interface ExecuteAnalysisOptions {
    /** Caller-side cancellation */
    readonly signal?: AbortSignal;
    readonly onProgress?: ProgressReporter;
}

/**
 * Registry view of a plugin.
 */
export interface PluginMetadata {
    readonly id: string;
    readonly name: string;
    readonly description: string;
    readonly version: string;
    readonly author: string;
    readonly types: PluginType[];
    readonly minEngineVersion: string;
    readonly dependencies: readonly string[];
    readonly state: PluginState;
    readonly registeredAt: Date;
    readonly lastError?: string;
}

interface PluginRecord {
    readonly plugin: Plugin;
    readonly registeredAt: Date;
    readonly stateSubscription: Subscription;
    context?: PluginContext;
    queue: Promise<void>;
}

type ToolHandler = "onMouseDown" | "onMouseMove" | "onMouseUp";

/**
 * PluginManager - registry and supervisor for plugins.
 *
 * @example
 * ```typescript
 * const manager = new PluginManager({
 *     engineVersion : "1.5.0",
 *     contextFactory: () => ({ mapCanvas, layers }),
 * });
 *
 * const report = await manager.load([measureTool, statistics]);
 * await manager.startAll();
 *
 * manager.activateTool("measure");
 * manager.dispatchMouseDown(event);
 *
 * await manager.stopAll();
 * ```
 */
export class PluginManager implements PluginManagerHandle {
    private readonly config: {
        engineVersion: semver.SemVer;
        contextFactory: HostContextFactory;
        logger: EngineLogger;
        settingsStore: PluginSettingsStore | undefined;
        dataRoot: string;
    };

    private readonly records: Map<string, PluginRecord> = new Map();
    private readonly startedOrder: string[] = [];

    /** Active tool ids, most recently activated first */
    private readonly toolPriority: string[] = [];

    /** Public access to the event bus for external subscriptions */
    public readonly eventBus: EventBus;

    constructor(config: PluginManagerConfig) {
        const engineVersion = semver.coerce(config.engineVersion);
        if (!engineVersion) {
            throw new InvalidArgumentError("engineVersion", `Invalid engine version: ${config.engineVersion}`);
        }
        if (!config.contextFactory) {
            throw new InvalidArgumentError("contextFactory", "A context factory is required");
        }

        const logger = config.logger ?? createConsoleLogger();
        this.eventBus = config.eventBus ?? new InMemoryEventBus({ logger });

        this.config = {
            engineVersion,
            contextFactory: config.contextFactory,
            logger,
            settingsStore : config.settingsStore,
            dataRoot      : config.dataRoot ?? "plugin-data",
        };
    }

    /** Engine version plugins are checked against */
    get engineVersion(): string {
        return this.config.engineVersion.version;
    }

    // ------------------------------------------------------------------
    // Registration
    // ------------------------------------------------------------------

    /**
     * Admit a batch of plugins.
     *
     * Rejected plugins are never registered and never see a lifecycle call.
     * Unrelated plugins in the same batch still load.
     */
    async load(plugins: Iterable<Plugin>): Promise<LoadReport> {
        const loaded: string[] = [];
        const failed: PluginFailure[] = [];
        const batch: Plugin[] = [];
        const batchIds = new Set<string>();

        for (const candidate of plugins) {
            const error = this.checkAdmission(candidate, batchIds);
            if (error) {
                this.reject(isPlugin(candidate) ? candidate.id : "", error, failed);
                continue;
            }
            batch.push(candidate);
            batchIds.add(candidate.id);
        }

        const registered = [...this.records.values()].map(record => record.plugin);
        const disabled = new Set(registered.filter(p => !isEnabled(p)).map(p => p.id));
        const resolution = resolveDependencies(
            [...registered.filter(isEnabled), ...batch],
            { disabled }
        );

        for (const plugin of batch) {
            const error = resolution.failures.get(plugin.id);
            if (error) {
                this.reject(plugin.id, error, failed);
                continue;
            }
            await this.admit(plugin);
            loaded.push(plugin.id);
        }

        return { loaded, failed };
    }

    /**
     * Admit one plugin.
     *
     * @throws InvalidArgumentError, VersionError or DependencyError when rejected
     */
    async register(plugin: Plugin): Promise<void> {
        const report = await this.load([plugin]);
        const failure = report.failed[0];
        if (failure) {
            throw failure.error;
        }
    }

    // ------------------------------------------------------------------
    // Startup and shutdown
    // ------------------------------------------------------------------

    /**
     * Initialize and start every enabled plugin, dependencies first.
     *
     * A plugin that fails ends in Error; every plugin depending on one that
     * did not start is failed with a DependencyError instead of starting.
     */
    async startAll(): Promise<StartReport> {
        this.emit("engine:starting");
        this.config.logger.info("Starting plugins...", { count: this.records.size });

        const started: string[] = [];
        const failed: PluginFailure[] = [];
        const notStarted = new Set<string>();

        const { order, failures } = resolveDependencies(this.enabledNodes(), { disabled: this.disabledIds() });

        for (const [pluginId, error] of failures) {
            const record = this.records.get(pluginId);
            if (record) {
                await this.failRecord(record, error, "start");
            }
            notStarted.add(pluginId);
            failed.push({ pluginId, error });
        }

        for (const pluginId of order) {
            const record = this.records.get(pluginId);
            if (!record || record.plugin.state === PluginState.Started) {
                continue;
            }
            const plugin = record.plugin;

            const blocked = plugin.dependencies.filter(dep => notStarted.has(dep) || !this.isStarted(dep));
            if (blocked.length > 0) {
                const error = new DependencyError(
                    pluginId,
                    blocked,
                    `Plugin ${pluginId} cannot start: dependencies not started: ${blocked.join(", ")}`
                );
                await this.enqueue(record, async () => this.failPlugin(plugin, error));
                notStarted.add(pluginId);
                failed.push({ pluginId, error });
                continue;
            }

            try {
                await this.enqueue(record, () => this.bringUp(record));
                started.push(pluginId);
            }
            catch (error) {
                const failure = toError(error);
                notStarted.add(pluginId);
                failed.push({ pluginId, error: failure });
                this.reportFailure(pluginId, "start", failure);
            }
        }

        this.emit("engine:started", { started, failed: failed.map(f => f.pluginId) });
        this.config.logger.info("Plugins started", { started: started.length, failed: failed.length });

        return { started, failed };
    }

    /**
     * Stop started plugins in exact reverse of the order they started.
     * A failing stop is logged and does not prevent the rest.
     *
     * @returns ids stopped, in stop order
     */
    async stopAll(): Promise<string[]> {
        this.emit("engine:stopping");
        this.config.logger.info("Stopping plugins...", { count: this.startedOrder.length });

        const stopped: string[] = [];
        for (const pluginId of [...this.startedOrder].reverse()) {
            const record = this.records.get(pluginId);
            if (!record) {
                continue;
            }
            try {
                await this.enqueue(record, () => this.bringDown(record));
                stopped.push(pluginId);
            }
            catch (error) {
                this.reportFailure(pluginId, "stop", toError(error));
            }
        }

        this.emit("engine:stopped", { stopped });
        this.config.logger.info("Plugins stopped", { stopped: stopped.length });

        return stopped;
    }

    /**
     * @returns true when the plugin reached Initialized
     */
    async initializePlugin(pluginId: string): Promise<boolean> {
        const record = this.requireRecord(pluginId);
        return this.enqueue(record, () => record.plugin.initialize(this.contextFor(record)));
    }

    /**
     * Initialize (when needed) and start one plugin.
     *
     * @throws DependencyError when a dependency is not Started
     */
    async startPlugin(pluginId: string): Promise<void> {
        const record = this.requireRecord(pluginId);
        const blocked = record.plugin.dependencies.filter(dep => !this.isStarted(dep));
        if (blocked.length > 0) {
            throw new DependencyError(
                pluginId,
                blocked,
                `Plugin ${pluginId} cannot start: dependencies not started: ${blocked.join(", ")}`
            );
        }
        await this.enqueue(record, () => this.bringUp(record));
    }

    async stopPlugin(pluginId: string): Promise<void> {
        const record = this.requireRecord(pluginId);
        await this.enqueue(record, () => this.bringDown(record));
    }

    /**
     * Stop (when started) and disable a plugin. Disabled is terminal for
     * the instance.
     *
     * Plugins depending on it, directly or transitively, are stopped in
     * reverse start order and failed with a DependencyError first.
     */
    async disablePlugin(pluginId: string): Promise<void> {
        const record = this.requireRecord(pluginId);

        const dependents = dependentsOf(pluginId, this.enabledNodes());
        const stopOrder = [...this.startedOrder].reverse();
        const ordered = [...dependents].sort((a, b) => rank(stopOrder, a) - rank(stopOrder, b));
        for (const dependentId of ordered) {
            const dependent = this.records.get(dependentId);
            if (!dependent) {
                continue;
            }
            const error = new DependencyError(
                dependentId,
                [pluginId],
                `Plugin ${dependentId} cannot run: dependency ${pluginId} was disabled`
            );
            await this.failRecord(dependent, error, "dependency");
        }

        await this.enqueue(record, async () => {
            if (record.plugin.state === PluginState.Started) {
                try {
                    await this.bringDown(record);
                }
                catch (error) {
                    this.reportFailure(pluginId, "stop", toError(error));
                }
            }
            this.dropTool(pluginId);
            await record.plugin.disable();
        });
        this.config.logger.info("Plugin disabled", { pluginId });
    }

    /**
     * Remove a plugin from the registry: stop it, save its settings,
     * dispose it.
     *
     * @throws DependencyError while an enabled plugin depends on it
     */
    async unload(pluginId: string): Promise<void> {
        const record = this.requireRecord(pluginId);
        const dependents = [...this.records.values()]
            .map(r => r.plugin)
            .filter(p => isEnabled(p) && p.dependencies.includes(pluginId))
            .map(p => p.id);
        if (dependents.length > 0) {
            throw new DependencyError(
                pluginId,
                dependents,
                `Cannot unload ${pluginId}: required by ${dependents.join(", ")}`
            );
        }

        await this.enqueue(record, async () => {
            if (record.plugin.state === PluginState.Started) {
                await this.bringDown(record);
            }
            this.dropTool(pluginId);
            await this.saveSettings(pluginId);
            await record.plugin.dispose();
        });

        record.stateSubscription.unsubscribe();
        this.records.delete(pluginId);
        this.emit("plugin:unloaded", { pluginId });
        this.config.logger.info("Plugin unloaded", { pluginId });
    }

    /**
     * Stop everything, then unload in reverse registration order.
     */
    async unloadAll(): Promise<void> {
        await this.stopAll();
        for (const pluginId of [...this.records.keys()].reverse()) {
            try {
                await this.unload(pluginId);
            }
            catch (error) {
                this.reportFailure(pluginId, "unload", toError(error));
            }
        }
    }

    // ------------------------------------------------------------------
    // Settings
    // ------------------------------------------------------------------

    /**
     * Apply stored settings to a plugin.
     *
     * @returns true when stored settings were found and applied
     */
    async loadSettings(pluginId: string): Promise<boolean> {
        const plugin = this.requireRecord(pluginId).plugin;
        const store = this.config.settingsStore;
        const settings = plugin.getSettings();
        if (!store || !settings) {
            return false;
        }
        if (!(await store.load(pluginId, settings))) {
            return false;
        }
        plugin.applySettings(settings);
        return true;
    }

    /**
     * Persist a plugin's settings. Failures are logged.
     *
     * @returns true when settings were written
     */
    async saveSettings(pluginId: string): Promise<boolean> {
        const plugin = this.requireRecord(pluginId).plugin;
        const store = this.config.settingsStore;
        const settings = plugin.getSettings();
        if (!store || !settings) {
            return false;
        }
        try {
            await store.save(pluginId, settings);
            return true;
        }
        catch (error) {
            this.config.logger.warn("Failed to save plugin settings", { pluginId, error: describeError(error) });
            return false;
        }
    }

    // ------------------------------------------------------------------
    // Queries
    // ------------------------------------------------------------------

    /** Registered plugins in registration order */
    get plugins(): Plugin[] {
        return [...this.records.values()].map(record => record.plugin);
    }

    /** Ids of started plugins in the order they started */
    get startOrder(): string[] {
        return [...this.startedOrder];
    }

    getPlugin(pluginId: string): Plugin | undefined {
        return this.records.get(pluginId)?.plugin;
    }

    getPlugins(type: PluginType): Plugin[] {
        return this.plugins.filter(plugin => plugin.types.has(type));
    }

    isPluginEnabled(pluginId: string): boolean {
        const plugin = this.getPlugin(pluginId);
        return plugin !== undefined && isEnabled(plugin);
    }

    getPluginMetadata(pluginId: string): PluginMetadata | undefined {
        const record = this.records.get(pluginId);
        if (!record) {
            return undefined;
        }
        const { plugin } = record;
        return {
            id              : plugin.id,
            name            : plugin.name,
            description     : plugin.description,
            version         : plugin.version,
            author          : plugin.author,
            types           : plugin.types.toArray(),
            minEngineVersion: plugin.minEngineVersion,
            dependencies    : [...plugin.dependencies],
            state           : plugin.state,
            registeredAt    : record.registeredAt,
            lastError       : plugin.lastError?.message,
        };
    }

    /**
     * Transitive dependencies of a plugin in start order, ending with the
     * plugin itself.
     */
    resolveDependencies(pluginId: string): string[] {
        this.requireRecord(pluginId);
        return dependencyClosure(pluginId, this.plugins);
    }

    // ------------------------------------------------------------------
    // Tool dispatch
    // ------------------------------------------------------------------

    /**
     * Activate a tool and give it first claim on input.
     *
     * @throws InvalidArgumentError when the plugin is unknown or not a tool
     * @throws InvalidStateError when the plugin is not Started
     */
    activateTool(pluginId: string): void {
        const plugin = this.requireTool(pluginId);
        if (plugin.state !== PluginState.Started) {
            throw new InvalidStateError("activate tool", plugin.state);
        }

        plugin.tool.activate();
        this.removeFromPriority(pluginId);
        this.toolPriority.unshift(pluginId);

        this.emit("tool:activated", { pluginId, toolName: plugin.tool.toolName });
    }

    deactivateTool(pluginId: string): void {
        this.requireTool(pluginId);
        this.dropTool(pluginId);
    }

    /** Active tool ids, most recently activated first */
    get activeTools(): string[] {
        return [...this.toolPriority];
    }

    dispatchMouseDown(e: MouseEventArgs): DispatchResult {
        return this.dispatchMouse("onMouseDown", e);
    }

    dispatchMouseMove(e: MouseEventArgs): DispatchResult {
        return this.dispatchMouse("onMouseMove", e);
    }

    dispatchMouseUp(e: MouseEventArgs): DispatchResult {
        return this.dispatchMouse("onMouseUp", e);
    }

    dispatchKeyDown(e: KeyEventArgs): DispatchResult {
        return this.dispatch(e, (plugin) => plugin.tool.onKeyDown(e));
    }

    // ------------------------------------------------------------------
    // Analysis dispatch
    // ------------------------------------------------------------------

    /**
     * Validate parameters without running anything.
     *
     * @throws InvalidArgumentError when the plugin is unknown or not an analysis
     */
    validateAnalysis(pluginId: string, parameters: AnalysisParameters): ValidationResult {
        const plugin = this.requireAnalysis(pluginId);
        try {
            return plugin.analysis.validateParameters(parameters);
        }
        catch (error) {
            return invalid(describeError(error));
        }
    }

    /**
     * Run an analysis.
     *
     * The returned promise always settles: with the plugin's result, with a
     * failed result when it throws or parameters are invalid, or with a
     * cancelled result once the caller's signal or the plugin's stop signal
     * aborts, whether or not the plugin observes it.
     *
     * @throws InvalidArgumentError when the plugin is unknown or not an analysis
     * @throws InvalidStateError when the plugin is not Started
     */
    async executeAnalysis(
        pluginId: string,
        parameters: AnalysisParameters,
        options: ExecuteAnalysisOptions = {}
    ): Promise<AnalysisResult> {
        const plugin = this.requireAnalysis(pluginId);
        if (plugin.state !== PluginState.Started) {
            throw new InvalidStateError("execute analysis", plugin.state);
        }

        const startTime = Date.now();
        const elapsed = () => Date.now() - startTime;

        const validation = this.validateAnalysis(pluginId, parameters);
        if (!validation.valid) {
            return {
                success        : false,
                errorMessage   : validation.errorMessage ?? "Invalid parameters",
                errorKind      : "InvalidArgument",
                results        : {},
                executionTimeMs: elapsed(),
            };
        }

        const cancelled = (): AnalysisResult => ({
            success        : false,
            errorMessage   : `Analysis ${plugin.analysis.analysisName} was cancelled`,
            errorKind      : "Cancelled",
            results        : {},
            executionTimeMs: elapsed(),
        });

        const link = linkSignals([plugin.stopSignal, options.signal]);
        try {
            if (link.signal.aborted) {
                return cancelled();
            }

            const progress: ProgressReporter = (update) => this.forwardProgress(pluginId, update, options.onProgress);

            // A synchronous throw from execute() takes the same failure path as a rejection
            const run = Promise.resolve().then(() => plugin.analysis.execute(parameters, link.signal, progress)).then(
                (result): AnalysisResult => ({
                    ...result,
                    executionTimeMs: Number.isFinite(result.executionTimeMs) ? result.executionTimeMs : elapsed(),
                }),
                (error: unknown): AnalysisResult => {
                    if (error instanceof CancelledError || link.signal.aborted) {
                        return cancelled();
                    }
                    this.config.logger.warn("Analysis failed", { pluginId, error: describeError(error) });
                    return {
                        success        : false,
                        errorMessage   : describeError(error),
                        errorKind      : "ExecutionError",
                        results        : {},
                        executionTimeMs: elapsed(),
                    };
                }
            );

            const abort = new Promise<AnalysisResult>((resolve) => {
                link.signal.addEventListener("abort", () => resolve(cancelled()), { once: true });
            });

            return await Promise.race([run, abort]);
        }
        finally {
            link.dispose();
        }
    }

    // ------------------------------------------------------------------
    // Data-provider dispatch
    // ------------------------------------------------------------------

    /**
     * Whether a registered data provider declares a capability.
     */
    supportsCapability(pluginId: string, capability: DataProviderCapabilityFlag): boolean {
        const plugin = this.getPlugin(pluginId);
        return plugin !== undefined && isDataProviderPlugin(plugin) && plugin.dataProvider.capabilities.has(capability);
    }

    /**
     * First started data provider, in registration order, whose extensions
     * match the path's. A `#` suffix (table or layer name) is ignored.
     */
    findDataProvider(pathOrConnection: string): DataProviderPlugin | undefined {
        const hash = pathOrConnection.indexOf("#");
        const path = hash < 0 ? pathOrConnection : pathOrConnection.slice(0, hash);
        const extension = extname(path).toLowerCase();
        if (!extension) {
            return undefined;
        }
        for (const plugin of this.plugins) {
            if (
                isDataProviderPlugin(plugin) &&
                plugin.state === PluginState.Started &&
                plugin.dataProvider.supportedExtensions.some(ext => ext.toLowerCase() === extension)
            ) {
                return plugin;
            }
        }
        return undefined;
    }

    /**
     * @throws ExecutionError when the provider throws
     */
    async testConnection(pluginId: string, connection: string): Promise<boolean> {
        const plugin = this.requireStartedDataProvider(pluginId);
        return this.callProvider(pluginId, "test connection", () => plugin.dataProvider.testConnection(connection));
    }

    /**
     * @throws ExecutionError when the provider throws
     */
    async getDataSourceMetadata(pluginId: string, connection: string): Promise<DataSourceMetadata | undefined> {
        const plugin = this.requireStartedDataProvider(pluginId);
        return this.callProvider(pluginId, "read metadata", () => plugin.dataProvider.getMetadata(connection));
    }

    /**
     * @throws ExecutionError when the provider throws
     */
    async createDataSource(
        pluginId: string,
        connection: string,
        options?: Readonly<Record<string, unknown>>
    ): Promise<DataSource | undefined> {
        const plugin = this.requireStartedDataProvider(pluginId);
        return this.callProvider(
            pluginId,
            "create data source",
            async () => plugin.dataProvider.createDataSource(connection, options)
        );
    }

    // ------------------------------------------------------------------
    // Internals
    // ------------------------------------------------------------------

    private checkAdmission(candidate: Plugin, batchIds: ReadonlySet<string>): Error | undefined {
        if (!isPlugin(candidate)) {
            return new InvalidArgumentError("plugin", "Value is not a plugin");
        }
        if (!candidate.id) {
            return new InvalidArgumentError("id", "Plugin id is required");
        }
        if (this.records.has(candidate.id) || batchIds.has(candidate.id)) {
            return new InvalidArgumentError("id", `Plugin ${candidate.id} is already registered`);
        }

        const required = semver.coerce(candidate.minEngineVersion);
        if (!required) {
            return new VersionError(
                candidate.id,
                candidate.minEngineVersion,
                this.engineVersion,
                `Plugin ${candidate.id} declares an unparseable engine version: ${candidate.minEngineVersion}`
            );
        }
        if (semver.gt(required, this.config.engineVersion)) {
            return new VersionError(candidate.id, candidate.minEngineVersion, this.engineVersion);
        }

        return undefined;
    }

    private reject(pluginId: string, error: Error, failed: PluginFailure[]): void {
        failed.push({ pluginId, error });
        this.config.logger.warn("Plugin rejected", { pluginId, error: error.message });
        this.emit("plugin:rejected", { pluginId, error: error.message, kind: errorKind(error) });
    }

    private async admit(plugin: Plugin): Promise<void> {
        const stateSubscription = plugin.onStateChange(({ from, to }) => {
            this.emit("plugin:stateChanged", { pluginId: plugin.id, from, to });
        });

        this.records.set(plugin.id, {
            plugin,
            registeredAt: new Date(),
            stateSubscription,
            queue       : Promise.resolve(),
        });

        try {
            await this.loadSettings(plugin.id);
        }
        catch (error) {
            this.config.logger.warn("Stored settings not applied", { pluginId: plugin.id, error: describeError(error) });
        }

        this.config.logger.info("Plugin loaded", { pluginId: plugin.id, version: plugin.version });
        this.emit("plugin:loaded", { pluginId: plugin.id, version: plugin.version });
    }

    /**
     * Run `operation` after every earlier lifecycle call on the same plugin.
     */
    private enqueue<T>(record: PluginRecord, operation: () => Promise<T>): Promise<T> {
        const run = record.queue.then(operation, operation);
        record.queue = run.then(
            () => undefined,
            () => undefined
        );
        return run;
    }

    private async bringUp(record: PluginRecord): Promise<void> {
        const { plugin } = record;

        if (plugin.state === PluginState.NotInitialized) {
            const initialized = await plugin.initialize(this.contextFor(record));
            if (!initialized) {
                throw plugin.lastError ?? new ExecutionError(`Plugin ${plugin.id} failed to initialize`);
            }
        }
        if (plugin.state === PluginState.Started) {
            return;
        }

        await plugin.start();
        this.startedOrder.push(plugin.id);
        this.config.logger.debug("Plugin started", { pluginId: plugin.id });
    }

    private async bringDown(record: PluginRecord): Promise<void> {
        const { plugin } = record;
        this.dropTool(plugin.id);
        try {
            await plugin.stop();
        }
        finally {
            const index = this.startedOrder.indexOf(plugin.id);
            if (index >= 0) {
                this.startedOrder.splice(index, 1);
            }
        }
        this.config.logger.debug("Plugin stopped", { pluginId: plugin.id });
    }

    private failPlugin(plugin: Plugin, error: Error, operation = "start"): void {
        if (isEnabled(plugin)) {
            plugin.fail(error);
        }
        this.reportFailure(plugin.id, operation, error);
    }

    /**
     * Fail a plugin, bringing it down first when it is running.
     */
    private failRecord(record: PluginRecord, error: Error, operation: string): Promise<void> {
        return this.enqueue(record, async () => {
            if (record.plugin.state === PluginState.Started) {
                try {
                    await this.bringDown(record);
                }
                catch (stopError) {
                    this.reportFailure(record.plugin.id, "stop", toError(stopError));
                }
            }
            this.failPlugin(record.plugin, error, operation);
        });
    }

    private reportFailure(pluginId: string, operation: string, error: Error): void {
        this.config.logger.error(`Plugin ${operation} failed`, { pluginId, error: error.message });
        this.emit("plugin:error", { pluginId, operation, error: error.message, kind: errorKind(error) });
    }

    private contextFor(record: PluginRecord): PluginContext {
        if (!record.context) {
            const { plugin } = record;
            const host = this.config.contextFactory(plugin);
            record.context = {
                mapCanvas    : host.mapCanvas,
                layers       : host.layers,
                pluginManager: this,
                eventBus     : this.eventBus,
                logger       : createScopedLogger(this.config.logger, `plugin:${plugin.id}`),
                dataDirectory: join(this.config.dataRoot, plugin.id),
            };
        }
        return record.context;
    }

    private enabledNodes(): DependencyNode[] {
        return this.plugins.filter(isEnabled);
    }

    private disabledIds(): Set<string> {
        return new Set(this.plugins.filter(p => !isEnabled(p)).map(p => p.id));
    }

    private isStarted(pluginId: string): boolean {
        return this.getPlugin(pluginId)?.state === PluginState.Started;
    }

    private requireRecord(pluginId: string): PluginRecord {
        const record = this.records.get(pluginId);
        if (!record) {
            throw new InvalidArgumentError("pluginId", `Unknown plugin: ${pluginId}`);
        }
        return record;
    }

    private requireTool(pluginId: string): ToolPlugin {
        const plugin = this.requireRecord(pluginId).plugin;
        if (!isToolPlugin(plugin)) {
            throw new InvalidArgumentError("pluginId", `Plugin ${pluginId} is not a tool`);
        }
        return plugin;
    }

    private requireAnalysis(pluginId: string): AnalysisPlugin {
        const plugin = this.requireRecord(pluginId).plugin;
        if (!isAnalysisPlugin(plugin)) {
            throw new InvalidArgumentError("pluginId", `Plugin ${pluginId} is not an analysis plugin`);
        }
        return plugin;
    }

    private requireStartedDataProvider(pluginId: string): DataProviderPlugin {
        const plugin = this.requireRecord(pluginId).plugin;
        if (!isDataProviderPlugin(plugin)) {
            throw new InvalidArgumentError("pluginId", `Plugin ${pluginId} is not a data provider`);
        }
        if (plugin.state !== PluginState.Started) {
            throw new InvalidStateError("use data provider", plugin.state);
        }
        return plugin;
    }

    private async callProvider<T>(pluginId: string, operation: string, call: () => Promise<T>): Promise<T> {
        try {
            return await call();
        }
        catch (error) {
            this.reportFailure(pluginId, operation, toError(error));
            throw new ExecutionError(`Data provider ${pluginId} failed to ${operation}: ${describeError(error)}`, {
                cause: error,
            });
        }
    }

    private dispatchMouse(handler: ToolHandler, e: MouseEventArgs): DispatchResult {
        return this.dispatch(e, (plugin) => plugin.tool[handler](e));
    }

    private dispatch(e: { handled: boolean }, offer: (plugin: ToolPlugin) => boolean): DispatchResult {
        for (const pluginId of [...this.toolPriority]) {
            const plugin = this.getPlugin(pluginId);
            if (
                !plugin ||
                !isToolPlugin(plugin) ||
                plugin.state !== PluginState.Started ||
                !plugin.tool.isActive
            ) {
                continue;
            }

            let handled = false;
            try {
                handled = offer(plugin);
            }
            catch (error) {
                this.config.logger.error("Tool handler failed", { pluginId, error: describeError(error) });
                this.emit("plugin:error", { pluginId, operation: "input", error: describeError(error), kind: errorKind(error) });
            }

            if (handled) {
                e.handled = true;
                return { handled: true, handledBy: pluginId };
            }
        }
        return { handled: false };
    }

    private dropTool(pluginId: string): void {
        if (!this.toolPriority.includes(pluginId)) {
            return;
        }
        this.removeFromPriority(pluginId);

        const plugin = this.getPlugin(pluginId);
        if (plugin && isToolPlugin(plugin)) {
            try {
                plugin.tool.deactivate();
            }
            catch (error) {
                this.config.logger.warn("Tool deactivation failed", { pluginId, error: describeError(error) });
            }
            this.emit("tool:deactivated", { pluginId, toolName: plugin.tool.toolName });
        }
    }

    private removeFromPriority(pluginId: string): void {
        const index = this.toolPriority.indexOf(pluginId);
        if (index >= 0) {
            this.toolPriority.splice(index, 1);
        }
    }

    private forwardProgress(pluginId: string, update: ProgressUpdate, onProgress?: ProgressReporter): void {
        const clamped: ProgressUpdate = {
            ...update,
            progress: clampProgress(update.progress),
        };

        if (onProgress) {
            try {
                onProgress(clamped);
            }
            catch (error) {
                this.config.logger.warn("Progress callback failed", { pluginId, error: describeError(error) });
            }
        }

        this.emit("analysis:progress", {
            pluginId,
            progress : clamped.progress,
            message  : clamped.message,
            canCancel: clamped.canCancel,
        });
    }

    private emit(type: string, data?: Record<string, unknown>): void {
        this.eventBus.emit(createEvent(type, data));
    }
}

/** Position of `id` in `order`; ids not present sort last */
function rank(order: readonly string[], id: string): number {
    const index = order.indexOf(id);
    return index < 0 ? order.length : index;
}

function clampProgress(progress: number): number {
    if (Number.isNaN(progress)) {
        return 0;
    }
    return Math.min(100, Math.max(0, progress));
}

function errorKind(error: unknown): string {
    return typeof error === "object" && error !== null && "kind" in error && typeof error.kind === "string"
        ? error.kind
        : "Error";
}

/**
 * Signal aborted as soon as any input aborts. dispose() detaches from the
 * inputs so long-lived signals do not accumulate listeners.
 */
function linkSignals(inputs: ReadonlyArray<AbortSignal | undefined>): { signal: AbortSignal; dispose: () => void } {
    const controller = new AbortController();
    const detach: Array<() => void> = [];

    for (const input of inputs) {
        if (!input) {
            continue;
        }
        if (input.aborted) {
            controller.abort(input.reason);
            break;
        }
        const onAbort = () => controller.abort(input.reason);
        input.addEventListener("abort", onAbort, { once: true });
        detach.push(() => input.removeEventListener("abort", onAbort));
    }

    return {
        signal : controller.signal,
        dispose: () => detach.forEach(fn => fn()),
    };
}
