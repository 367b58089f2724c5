/**
 * @fileoverview Shared test doubles for engine tests
 *
 * @module @mapcore/engine/__tests__/helpers
 */

import { vi } from "vitest";
import { Envelope, GeometryType, type Geometry } from "../contracts/Geometry.js";
import type { EngineLogger } from "../contracts/Logger.js";
import type { LayerCollection, Layer, MapCanvas } from "../contracts/PluginContext.js";
import { FlagSet } from "../contracts/FlagSet.js";
import type { KeyEventArgs, ModifierKey, MouseButton, MouseEventArgs } from "../contracts/ToolPlugin.js";

/**
 * Planar box geometry; a point when min equals max.
 */
export class BoxGeometry implements Geometry {
    constructor(
        readonly minX: number,
        readonly minY: number,
        readonly maxX = minX,
        readonly maxY = minY
    ) {}

    get geometryType(): GeometryType {
        return this.minX === this.maxX && this.minY === this.maxY ? GeometryType.Point : GeometryType.Polygon;
    }

    get isValid(): boolean {
        return this.minX <= this.maxX && this.minY <= this.maxY;
    }

    envelope(): Envelope {
        return new Envelope(this.minX, this.minY, this.maxX, this.maxY);
    }

    intersects(envelope: Envelope): boolean {
        return this.envelope().intersects(envelope);
    }

    /** Distance between box centres */
    distance(other: Geometry): number {
        const a = this.envelope();
        const b = other.envelope();
        if (!b) {
            return NaN;
        }
        const dx = (a.minX + a.maxX) / 2 - (b.minX + b.maxX) / 2;
        const dy = (a.minY + a.maxY) / 2 - (b.minY + b.maxY) / 2;
        return Math.hypot(dx, dy);
    }

    copy(): BoxGeometry {
        return new BoxGeometry(this.minX, this.minY, this.maxX, this.maxY);
    }
}

export function point(x: number, y: number): BoxGeometry {
    return new BoxGeometry(x, y);
}

export function createMockLogger() {
    return {
        debug: vi.fn(),
        info : vi.fn(),
        warn : vi.fn(),
        error: vi.fn(),
    } satisfies EngineLogger;
}

export function createMockCanvas(): MapCanvas {
    return {
        getViewExtent: () => new Envelope(-180, -90, 180, 90),
        refresh      : vi.fn(),
    };
}

/**
 * Map-backed layer collection.
 */
export function createLayerCollection(initial: Layer[] = []): LayerCollection {
    const layers = new Map(initial.map(layer => [layer.name, layer]));
    return {
        get   : name => layers.get(name),
        list  : () => [...layers.values()],
        add   : (layer) => {
            layers.set(layer.name, layer);
        },
        remove: name => layers.delete(name),
    };
}

export function mouseEvent(
    button: MouseButton,
    world?: { x: number; y: number },
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

export function keyEvent(key: string, modifiers: ModifierKey[] = []): KeyEventArgs {
    return {
        key,
        modifiers: FlagSet.of(...modifiers),
        handled  : false,
    };
}
