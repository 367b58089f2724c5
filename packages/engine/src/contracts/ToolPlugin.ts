/**
 * Tool Plugin Contract
 *
 * Interactive tools receive mouse and keyboard input from the map view.
 * Handlers run synchronously on the dispatching call and must return
 * quickly: the first handler reporting `true` ends dispatch for that event.
 */

import type { Coordinate } from "./Geometry.js";
import type { FlagSet } from "./FlagSet.js";
import type { Plugin } from "./Plugin.js";

export enum MouseButton {
    Left     = "Left",
    Middle   = "Middle",
    Right    = "Right",
    XButton1 = "XButton1",
    XButton2 = "XButton2",
}

export enum ModifierKey {
    Alt     = "Alt",
    Control = "Control",
    Shift   = "Shift",
    Meta    = "Meta",
}

/**
 * Key names follow KeyboardEvent.key ("Escape", "Enter", "a", "ArrowUp").
 */
export type Key = "Escape" | "Enter" | " " | "Delete" | "Backspace" | (string & {});

/**
 * Mouse input. `handled` is set by the dispatcher once a tool claims it.
 */
export interface MouseEventArgs {
    /** Screen position in pixels */
    readonly x: number;
    readonly y: number;
    readonly button: MouseButton;
    readonly clickCount: number;
    readonly modifiers: FlagSet<ModifierKey>;

    /** Position in map coordinates, when the view can resolve one */
    readonly worldCoordinate?: Coordinate;
    handled: boolean;
}

/**
 * Keyboard input.
 */
export interface KeyEventArgs {
    readonly key: Key;
    readonly modifiers: FlagSet<ModifierKey>;
    handled: boolean;
}

/**
 * Tool behavior a plugin can expose.
 */
export interface ToolCapability {
    readonly toolName: string;
    readonly toolCategory: string;

    /** Resource path or data URI */
    readonly toolIcon?: string;

    readonly isActive: boolean;

    /**
     * @throws InvalidStateError when the owning plugin is not Started
     */
    activate(): void;
    deactivate(): void;

    /** @returns true when the event was handled */
    onMouseDown(e: MouseEventArgs): boolean;
    onMouseMove(e: MouseEventArgs): boolean;
    onMouseUp(e: MouseEventArgs): boolean;
    onKeyDown(e: KeyEventArgs): boolean;
}

/**
 * Plugin that exposes tool behavior.
 */
export type ToolPlugin = Plugin & { readonly tool: ToolCapability };

/**
 * Type guard to check if a plugin supports tool behavior.
 */
export function isToolPlugin(plugin: Plugin): plugin is ToolPlugin {
    return plugin.tool !== undefined;
}
