/**
 * @fileoverview Base Plugin
 *
 * Lifecycle state machine shared by every built-in plugin. Subclasses
 * supply behavior through the on* hooks; the transitions, their guards and
 * the cooperative stop signal live here.
 *
 * @module @mapcore/engine/plugins/BasePlugin
 */

import type {
    Plugin,
    PluginDescriptor,
    StateChangeListener,
} from "../contracts/Plugin.js";
import { PluginState, PluginType } from "../contracts/Plugin.js";
import type { PluginContext } from "../contracts/PluginContext.js";
import type { PluginSettings } from "../contracts/PluginSettings.js";
import { SettingsSnapshot } from "../impl/SettingsSnapshot.js";
import type { Subscription } from "../contracts/EventBus.js";
import { createEvent } from "../contracts/EventBus.js";
import type { PluginLogger } from "../contracts/Logger.js";
import { FlagSet } from "../contracts/FlagSet.js";
import {
    CancelledError,
    ExecutionError,
    InvalidArgumentError,
    InvalidStateError,
    describeError,
    toError,
} from "../contracts/Errors.js";

/**
 * Descriptor fields accepted by BasePlugin. Everything but id, name,
 * version and types has a default.
 */
export interface BasePluginInit {
    readonly id: string;
    readonly name: string;
    readonly version: string;
    readonly types: Iterable<PluginType>;
    readonly description?: string;
    readonly author?: string;

    /** Default "1.0.0" */
    readonly minEngineVersion?: string;
    readonly dependencies?: readonly string[];

    /** Initial settings */
    readonly settings?: PluginSettings;
}

const NOOP_LOGGER: PluginLogger = {
    debug: () => undefined,
    info : () => undefined,
    warn : () => undefined,
    error: () => undefined,
};

/**
 * Abstract plugin with the full lifecycle state machine.
 *
 * Settings may be applied in any state. Subclasses read activeSettings,
 * which is captured at start(), so new settings take effect at the next
 * start.
 *
 * @example
 * ```typescript
 * class HeartbeatPlugin extends BasePlugin {
 *     constructor() {
 *         super({ id: "heartbeat", name: "Heartbeat", version: "1.0.0", types: [PluginType.Service] });
 *     }
 *
 *     protected async onStart(): Promise<void> {
 *         this.logger.info("Beating");
 *     }
 * }
 * ```
 */
export abstract class BasePlugin implements Plugin, PluginDescriptor {
    readonly id: string;
    readonly name: string;
    readonly description: string;
    readonly version: string;
    readonly author: string;
    readonly types: FlagSet<PluginType>;
    readonly minEngineVersion: string;
    readonly dependencies: readonly string[];

    private currentState: PluginState = PluginState.NotInitialized;
    private failure: Error | undefined;
    private stopController = new AbortController();
    private readonly listeners = new Set<StateChangeListener>();
    private disposeStarted = false;

    /** Set once initialize() has been called */
    protected context: PluginContext | undefined;

    protected settings: PluginSettings | undefined;

    /** Read-only copy of the settings in effect since the last start() */
    protected activeSettings: PluginSettings | undefined;

    protected constructor(init: BasePluginInit) {
        if (!init.id) {
            throw new InvalidArgumentError("id", "Plugin id is required");
        }
        this.id               = init.id;
        this.name             = init.name;
        this.description      = init.description ?? "";
        this.version          = init.version;
        this.author           = init.author ?? "";
        this.types            = FlagSet.from(init.types);
        this.minEngineVersion = init.minEngineVersion ?? "1.0.0";
        this.dependencies     = [...(init.dependencies ?? [])];
        this.settings         = init.settings;
    }

    get state(): PluginState {
        return this.currentState;
    }

    get lastError(): Error | undefined {
        return this.failure;
    }

    get stopSignal(): AbortSignal {
        return this.stopController.signal;
    }

    async initialize(context: PluginContext): Promise<boolean> {
        if (this.currentState !== PluginState.NotInitialized) {
            throw new InvalidStateError("initialize", this.currentState);
        }
        if (!context) {
            throw new InvalidArgumentError("context", "Plugin context is required");
        }

        this.context = context;
        this.transition(PluginState.Initializing);

        let succeeded: boolean;
        try {
            succeeded = await this.onInitialize(context);
        }
        catch (error) {
            this.enterError(toError(error));
            return false;
        }

        // disable() or fail() may have run while the hook was pending
        if (this.state !== PluginState.Initializing) {
            return false;
        }
        if (!succeeded) {
            this.enterError(new ExecutionError(`Plugin ${this.id} reported initialization failure`));
            return false;
        }

        this.transition(PluginState.Initialized);
        return true;
    }

    async start(): Promise<void> {
        if (this.currentState !== PluginState.Initialized && this.currentState !== PluginState.Stopped) {
            throw new InvalidStateError("start", this.currentState);
        }

        this.stopController = new AbortController();
        this.activeSettings = this.settings ? new SettingsSnapshot(this.settings) : undefined;
        try {
            await this.onStart();
        }
        catch (error) {
            const failure = toError(error);
            this.enterError(failure);
            throw failure;
        }
        this.transition(PluginState.Started);
    }

    async stop(): Promise<void> {
        if (this.currentState !== PluginState.Started) {
            throw new InvalidStateError("stop", this.currentState);
        }

        this.stopController.abort(new CancelledError(`Plugin ${this.id} is stopping`));
        try {
            await this.onStop();
        }
        catch (error) {
            const failure = toError(error);
            this.enterError(failure);
            throw failure;
        }
        this.transition(PluginState.Stopped);
    }

    async disable(): Promise<void> {
        if (this.currentState === PluginState.Disabled) {
            throw new InvalidStateError("disable", this.currentState);
        }

        this.stopController.abort(new CancelledError(`Plugin ${this.id} is disabled`));
        try {
            await this.onDisable();
        }
        catch (error) {
            this.failure = toError(error);
            this.logger.warn("Disable hook failed", { error: describeError(error) });
        }
        this.transition(PluginState.Disabled);
    }

    fail(error: Error): void {
        if (this.currentState === PluginState.Disabled) {
            throw new InvalidStateError("fail", this.currentState);
        }
        this.stopController.abort(new CancelledError(`Plugin ${this.id} failed`));
        this.enterError(error);
    }

    getSettings(): PluginSettings | undefined {
        return this.settings;
    }

    /**
     * @throws InvalidArgumentError when the settings do not validate
     */
    applySettings(settings: PluginSettings): void {
        if (!settings) {
            throw new InvalidArgumentError("settings", "Settings are required");
        }
        const result = settings.validate();
        if (!result.valid) {
            throw new InvalidArgumentError("settings", result.errorMessage ?? "Settings are invalid");
        }
        this.settings = settings;
        this.onSettingsApplied(settings);
    }

    onStateChange(listener: StateChangeListener): Subscription {
        this.listeners.add(listener);
        return {
            unsubscribe: () => {
                this.listeners.delete(listener);
            },
        };
    }

    async dispose(): Promise<void> {
        if (this.disposeStarted) {
            return;
        }
        this.disposeStarted = true;
        this.stopController.abort(new CancelledError(`Plugin ${this.id} is disposed`));
        try {
            await this.onDispose();
        }
        finally {
            this.listeners.clear();
        }
    }

    toString(): string {
        return `${this.name} (${this.id}@${this.version}) [${this.currentState}]`;
    }

    // ------------------------------------------------------------------
    // Hooks
    // ------------------------------------------------------------------

    /**
     * Prepare the plugin. Return false (or throw) to fail initialization.
     */
    protected async onInitialize(_context: PluginContext): Promise<boolean> {
        return true;
    }

    protected async onStart(): Promise<void> {}

    /**
     * Release what onStart() acquired. stopSignal is already aborted.
     */
    protected async onStop(): Promise<void> {}

    protected async onDisable(): Promise<void> {}

    protected async onDispose(): Promise<void> {}

    protected onSettingsApplied(_settings: PluginSettings): void {}

    // ------------------------------------------------------------------
    // Helpers
    // ------------------------------------------------------------------

    /**
     * Logger from the context; silent before initialize().
     */
    protected get logger(): PluginLogger {
        return this.context?.logger ?? NOOP_LOGGER;
    }

    /**
     * Raise an event on the shared bus, tagged with this plugin's id.
     */
    protected publish(type: string, data: Record<string, unknown> = {}): void {
        this.context?.eventBus.emit(createEvent(type, { ...data, pluginId: this.id }));
    }

    private enterError(error: Error): void {
        this.failure = error;
        this.transition(PluginState.Error);
    }

    private transition(to: PluginState): void {
        const from = this.currentState;
        if (from === to) {
            return;
        }
        this.currentState = to;

        for (const listener of [...this.listeners]) {
            try {
                listener({ plugin: this, from, to });
            }
            catch (error) {
                this.logger.error("State listener failed", { from, to, error: describeError(error) });
            }
        }
    }
}
