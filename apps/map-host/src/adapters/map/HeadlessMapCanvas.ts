/**
 * @fileoverview Headless map canvas
 *
 * A map view without a display: it tracks the visible extent and a pixel
 * viewport so screen positions can be turned into world coordinates, and
 * counts redraw requests.
 *
 * @module adapters/map/HeadlessMapCanvas
 */

import {
    Envelope,
    InvalidArgumentError,
    type Coordinate,
    type MapCanvas,
} from "@mapcore/engine";

/**
 * Canvas configuration.
 */
export interface HeadlessMapCanvasConfig {
    /** Initial visible extent (default: whole world in lon/lat) */
    readonly extent?: Envelope;

    /** Viewport size in pixels (default: 1024 x 768) */
    readonly width?: number;
    readonly height?: number;

    /** Called on every refresh() */
    readonly onRefresh?: () => void;
}

const WORLD = new Envelope(-180, -90, 180, 90);

export class HeadlessMapCanvas implements MapCanvas {
    private extent: Envelope;
    private refreshes = 0;
    readonly width: number;
    readonly height: number;
    private readonly onRefresh?: () => void;

    constructor(config: HeadlessMapCanvasConfig = {}) {
        this.extent    = config.extent ?? WORLD;
        this.width     = config.width ?? 1024;
        this.height    = config.height ?? 768;
        this.onRefresh = config.onRefresh;

        if (!(this.width > 0) || !(this.height > 0)) {
            throw new InvalidArgumentError("viewport", "Viewport size must be positive");
        }
    }

    getViewExtent(): Envelope {
        return this.extent;
    }

    setViewExtent(extent: Envelope): void {
        this.extent = extent;
        this.refresh();
    }

    refresh(): void {
        this.refreshes += 1;
        this.onRefresh?.();
    }

    /** Number of refresh() calls so far */
    get refreshCount(): number {
        return this.refreshes;
    }

    /**
     * World coordinate under a pixel. Pixel (0, 0) is the top-left corner
     * of the view extent.
     */
    screenToWorld(x: number, y: number): Coordinate {
        return {
            x: this.extent.minX + (x / this.width) * this.extent.width,
            y: this.extent.maxY - (y / this.height) * this.extent.height,
        };
    }
}
