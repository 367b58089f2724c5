/**
 * @fileoverview Base Tool Plugin
 *
 * Activation bookkeeping and no-op input handlers for interactive tools.
 * Subclasses override the handlers they care about and return true for
 * events they consume.
 *
 * @module @mapcore/engine/plugins/BaseToolPlugin
 */

import { PluginState, PluginType } from "../contracts/Plugin.js";
import type { KeyEventArgs, MouseEventArgs, ToolCapability } from "../contracts/ToolPlugin.js";
import { InvalidStateError } from "../contracts/Errors.js";
import { BasePlugin, type BasePluginInit } from "./BasePlugin.js";

export interface BaseToolPluginInit extends Omit<BasePluginInit, "types"> {
    /** Extra categories besides Tool */
    readonly types?: Iterable<PluginType>;
}

/**
 * @example
 * ```typescript
 * class PanTool extends BaseToolPlugin {
 *     readonly toolName = "Pan";
 *     readonly toolCategory = "Navigation";
 *
 *     constructor() {
 *         super({ id: "pan", name: "Pan", version: "1.0.0" });
 *     }
 *
 *     onMouseMove(e: MouseEventArgs): boolean {
 *         return e.button === MouseButton.Left;
 *     }
 * }
 * ```
 */
export abstract class BaseToolPlugin extends BasePlugin implements ToolCapability {
    abstract readonly toolName: string;
    abstract readonly toolCategory: string;
    readonly toolIcon?: string;

    private active = false;

    protected constructor(init: BaseToolPluginInit) {
        super({ ...init, types: [PluginType.Tool, ...(init.types ?? [])] });
    }

    get tool(): ToolCapability {
        return this;
    }

    get isActive(): boolean {
        return this.active;
    }

    /**
     * @throws InvalidStateError when the plugin is not Started
     */
    activate(): void {
        if (this.state !== PluginState.Started) {
            throw new InvalidStateError("activate tool", this.state);
        }
        if (this.active) {
            return;
        }
        this.active = true;
        this.onActivate();
    }

    deactivate(): void {
        if (!this.active) {
            return;
        }
        this.active = false;
        this.onDeactivate();
    }

    onMouseDown(_e: MouseEventArgs): boolean {
        return false;
    }

    onMouseMove(_e: MouseEventArgs): boolean {
        return false;
    }

    onMouseUp(_e: MouseEventArgs): boolean {
        return false;
    }

    onKeyDown(_e: KeyEventArgs): boolean {
        return false;
    }

    async stop(): Promise<void> {
        if (this.state === PluginState.Started) {
            this.deactivate();
        }
        await super.stop();
    }

    async disable(): Promise<void> {
        if (this.state !== PluginState.Disabled) {
            this.deactivate();
        }
        await super.disable();
    }

    protected onActivate(): void {}

    protected onDeactivate(): void {}
}
