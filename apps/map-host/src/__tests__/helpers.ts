/**
 * @fileoverview Shared fixtures for map-host tests
 *
 * @module __tests__/helpers
 */

import { vi } from "vitest";
import {
    FlagSet,
    PluginManager,
    type EngineLogger,
    type KeyEventArgs,
    type ModifierKey,
    type MouseButton,
    type MouseEventArgs,
    type Plugin,
} from "@mapcore/engine";
import { HeadlessMapCanvas } from "../adapters/map/HeadlessMapCanvas.js";
import { InMemoryLayerCollection } from "../adapters/map/InMemoryLayerCollection.js";

export function createMockLogger() {
    return {
        debug: vi.fn(),
        info : vi.fn(),
        warn : vi.fn(),
        error: vi.fn(),
    } satisfies EngineLogger;
}

export interface TestHost {
    readonly manager: PluginManager;
    readonly canvas: HeadlessMapCanvas;
    readonly layers: InMemoryLayerCollection;
    readonly logger: ReturnType<typeof createMockLogger>;
}

/**
 * Manager over a headless canvas and in-memory layers, with `plugins`
 * loaded and started.
 */
export async function startPlugins(plugins: Plugin[], layers = new InMemoryLayerCollection()): Promise<TestHost> {
    const canvas = new HeadlessMapCanvas();
    const logger = createMockLogger();
    const manager = new PluginManager({
        engineVersion : "1.0.0",
        contextFactory: () => ({ mapCanvas: canvas, layers }),
        logger,
    });
    await manager.load(plugins);
    await manager.startAll();
    return { manager, canvas, layers, logger };
}

export function mouseAt(
    button: MouseButton,
    world: { x: number; y: number } | undefined,
    modifiers: ModifierKey[] = []
): MouseEventArgs {
    return {
        x              : 0,
        y              : 0,
        button,
        clickCount     : 1,
        modifiers      : FlagSet.of(...modifiers),
        worldCoordinate: world,
        handled        : false,
    };
}

export function key(name: string): KeyEventArgs {
    return { key: name, modifiers: FlagSet.empty(), handled: false };
}
