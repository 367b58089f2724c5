/**
 * @fileoverview Feature Store
 *
 * Ordered in-memory container of features with spatial and attribute
 * queries.
 *
 * Concurrency: reads may interleave freely. Mutation (add, remove, set,
 * clear) must not overlap any other operation on the same store; callers
 * that mutate while iterating must synchronize externally or iterate over
 * toArray().
 *
 * @module @mapcore/engine/data/FeatureStore
 */

import type { AttributeValue } from "../contracts/AttributeValue.js";
import { attributeEquals } from "../contracts/AttributeValue.js";
import type { Envelope, GeometryType } from "../contracts/Geometry.js";
import { InvalidArgumentError } from "../contracts/Errors.js";
import type { Feature, FeatureId } from "./Feature.js";

/**
 * Feature collection with query support.
 *
 * - Insertion order is kept for enumeration.
 * - A feature instance can be held once; two instances sharing an id are
 *   both allowed.
 * - Removal is by reference.
 * - Queries return lazy iterables that rescan on each iteration.
 *
 * @example
 * ```typescript
 * const store = new FeatureStore([road, river]);
 *
 * [...store.getInExtent(new Envelope(-1, -1, 1, 1))];   // [road]
 * [...store.filterByAttribute("kind", "river")];        // [river]
 * store.extent;                                        // union of bounding boxes
 * ```
 */
export class FeatureStore implements Iterable<Feature> {
    private readonly features: Feature[] = [];
    private readonly members = new Set<Feature>();

    constructor(features: Iterable<Feature> = []) {
        this.addRange(features);
    }

    get count(): number {
        return this.features.length;
    }

    /**
     * Union of every feature's bounding box, recomputed on each read.
     * Undefined when the store is empty or no feature has geometry.
     */
    get extent(): Envelope | undefined {
        let extent: Envelope | undefined;
        for (const feature of this.features) {
            const box = feature.boundingBox;
            if (box) {
                extent = extent ? extent.expandToInclude(box) : box;
            }
        }
        return extent;
    }

    /**
     * Append a feature.
     *
     * @throws InvalidArgumentError when `feature` is absent or already held
     */
    add(feature: Feature): void {
        if (!feature) {
            throw new InvalidArgumentError("feature", "Feature is required");
        }
        if (this.members.has(feature)) {
            throw new InvalidArgumentError("feature", `Feature instance ${feature.id} is already in the store`);
        }
        this.features.push(feature);
        this.members.add(feature);
    }

    addRange(features: Iterable<Feature>): void {
        for (const feature of features) {
            this.add(feature);
        }
    }

    /**
     * Remove the given instance.
     *
     * @returns true when the instance was held
     */
    remove(feature: Feature): boolean {
        if (!this.members.delete(feature)) {
            return false;
        }
        this.features.splice(this.features.indexOf(feature), 1);
        return true;
    }

    clear(): void {
        this.features.length = 0;
        this.members.clear();
    }

    /**
     * @throws InvalidArgumentError when `index` is out of range
     */
    at(index: number): Feature {
        this.assertIndex(index);
        return this.features[index];
    }

    /**
     * Replace the feature at `index`.
     *
     * @throws InvalidArgumentError when `index` is out of range, `feature`
     *   is absent, or `feature` is already held at another position
     */
    set(index: number, feature: Feature): void {
        this.assertIndex(index);
        if (!feature) {
            throw new InvalidArgumentError("feature", "Feature is required");
        }
        const current = this.features[index];
        if (current === feature) {
            return;
        }
        if (this.members.has(feature)) {
            throw new InvalidArgumentError("feature", `Feature instance ${feature.id} is already in the store`);
        }
        this.members.delete(current);
        this.members.add(feature);
        this.features[index] = feature;
    }

    has(feature: Feature): boolean {
        return this.members.has(feature);
    }

    /**
     * First feature whose id equals `id`. O(n); duplicate ids are legal and
     * only the first in insertion order is returned.
     */
    getById(id: FeatureId): Feature | undefined {
        return this.features.find(f => f.id === id);
    }

    /**
     * Features whose bounding box intersects `envelope`. Features without
     * geometry are never returned.
     */
    getInExtent(envelope: Envelope): Iterable<Feature> {
        if (!envelope) {
            throw new InvalidArgumentError("envelope", "Envelope is required");
        }
        return this.query(f => {
            const box = f.boundingBox;
            return box !== undefined && box.intersects(envelope);
        });
    }

    /**
     * Features that have attribute `name` equal to `value`.
     */
    filterByAttribute(name: string, value: AttributeValue): Iterable<Feature> {
        if (typeof name !== "string" || name.length === 0) {
            throw new InvalidArgumentError("name", "Attribute name must be a non-empty string");
        }
        return this.query(f => {
            const stored = f.attributes.get(name);
            return stored !== undefined && attributeEquals(stored, value);
        });
    }

    filterByGeometryType(geometryType: GeometryType): Iterable<Feature> {
        return this.query(f => f.geometry?.geometryType === geometryType);
    }

    toArray(): Feature[] {
        return [...this.features];
    }

    [Symbol.iterator](): Iterator<Feature> {
        return this.features[Symbol.iterator]();
    }

    private query(predicate: (feature: Feature) => boolean): Iterable<Feature> {
        const features = this.features;
        return {
            *[Symbol.iterator]() {
                for (const feature of features) {
                    if (predicate(feature)) {
                        yield feature;
                    }
                }
            },
        };
    }

    private assertIndex(index: number): void {
        if (!Number.isInteger(index) || index < 0 || index >= this.features.length) {
            throw new InvalidArgumentError(
                "index",
                `Feature index ${index} out of range [0, ${this.features.length})`
            );
        }
    }
}
