/**
 * @fileoverview In-memory layer collection
 *
 * Named layers shared by the host and its plugins, kept in insertion order.
 *
 * @module adapters/map/InMemoryLayerCollection
 */

import {
    FeatureStore,
    InvalidArgumentError,
    type Feature,
    type Layer,
    type LayerCollection,
} from "@mapcore/engine";

/**
 * Create a layer over a new store.
 */
export function createLayer(name: string, features: Iterable<Feature> = [], visible = true): Layer {
    if (!name) {
        throw new InvalidArgumentError("name", "Layer name is required");
    }
    return { name, features: new FeatureStore(features), visible };
}

export class InMemoryLayerCollection implements LayerCollection {
    private readonly layers: Map<string, Layer> = new Map();

    constructor(layers: Iterable<Layer> = []) {
        for (const layer of layers) {
            this.add(layer);
        }
    }

    get count(): number {
        return this.layers.size;
    }

    get(name: string): Layer | undefined {
        return this.layers.get(name);
    }

    list(): readonly Layer[] {
        return [...this.layers.values()];
    }

    /**
     * @throws InvalidArgumentError when a layer with the same name exists
     */
    add(layer: Layer): void {
        if (!layer?.name) {
            throw new InvalidArgumentError("layer", "Layer name is required");
        }
        if (this.layers.has(layer.name)) {
            throw new InvalidArgumentError("layer", `Layer already exists: ${layer.name}`);
        }
        this.layers.set(layer.name, layer);
    }

    remove(name: string): boolean {
        return this.layers.delete(name);
    }

    /** Layers with `visible` set, in order */
    visibleLayers(): Layer[] {
        return this.list().filter(layer => layer.visible);
    }
}
