/**
 * @fileoverview Unit tests for Feature and FeatureStore
 *
 * Tests cover:
 * - Feature identity, copies and transformation
 * - Store membership by instance
 * - Spatial, attribute and geometry-type queries
 * - Lazy query re-evaluation and extent
 *
 * @module @mapcore/engine/__tests__/FeatureStore
 */

import { describe, it, expect } from "vitest";
import { Feature } from "../data/Feature.js";
import { FeatureStore } from "../data/FeatureStore.js";
import { AttributeTable } from "../data/AttributeTable.js";
import { Envelope, GeometryType, type CoordinateTransformation } from "../contracts/Geometry.js";
import { InvalidArgumentError } from "../contracts/Errors.js";
import { BoxGeometry, point } from "./helpers.js";

describe("Feature", () => {
    // Scenario: A feature without an id gets a unique one
    it("should generate distinct ids", () => {
        const a = new Feature();
        const b = new Feature();

        expect(typeof a.id).toBe("string");
        expect(a.id).not.toBe(b.id);
    });

    // Scenario: Ids must be strings or finite numbers
    it("should reject a non-finite numeric id", () => {
        expect(() => new Feature({ id: Number.NaN })).toThrow(InvalidArgumentError);
    });

    // Scenario: Equality is by id only
    it("should compare by id", () => {
        const a = new Feature({ id: 7, attributes: { kind: "road" } });
        const b = new Feature({ id: 7, attributes: { kind: "river" } });

        expect(a.equals(b)).toBe(true);
        expect(a.equals(new Feature({ id: 8 }))).toBe(false);
        expect(a.equals("7")).toBe(false);
    });

    // Scenario: Bounding box follows the geometry
    it("should derive the bounding box from the geometry", () => {
        const feature = new Feature({ geometry: new BoxGeometry(0, 0, 2, 1) });

        expect(feature.boundingBox?.equals(new Envelope(0, 0, 2, 1))).toBe(true);

        feature.geometry = point(5, 5);
        expect(feature.boundingBox?.equals(new Envelope(5, 5, 5, 5))).toBe(true);

        feature.geometry = undefined;
        expect(feature.boundingBox).toBeUndefined();
    });

    // Scenario: A feature without geometry is valid
    it("should report validity from the geometry", () => {
        expect(new Feature().isValid).toBe(true);
        expect(new Feature({ geometry: new BoxGeometry(2, 2, 1, 1) }).isValid).toBe(false);
    });

    // Scenario: copy keeps the id, copyWithId assigns a new one
    it("should copy with independent geometry and attributes", () => {
        const original = new Feature({ id: "f1", geometry: point(1, 1), attributes: { kind: "road" } });

        const same = original.copy();
        const fresh = original.copyWithId();

        same.attributes.set("kind", "river");

        expect(same.id).toBe("f1");
        expect(same.equals(original)).toBe(true);
        expect(same.geometry).not.toBe(original.geometry);
        expect(original.getAttribute("kind")).toBe("road");
        expect(fresh.id).not.toBe("f1");
    });

    // Scenario: Distance delegates to the geometry
    it("should measure distance between geometries", () => {
        const a = new Feature({ geometry: point(0, 0) });
        const b = new Feature({ geometry: point(3, 4) });

        expect(a.distance(b)).toBe(5);
        expect(a.distance(new Feature())).toBe(Infinity);
    });

    // Scenario: transform replaces geometry and leaves attributes alone
    it("should transform the geometry only", () => {
        const shift: CoordinateTransformation = {
            transform: geometry => {
                const box = geometry.envelope();
                if (!box) {
                    return geometry;
                }
                return new BoxGeometry(box.minX + 10, box.minY, box.maxX + 10, box.maxY);
            },
        };
        const feature = new Feature({ geometry: point(1, 2), attributes: { kind: "road" } });

        feature.transform(shift);

        expect(feature.boundingBox?.minX).toBe(11);
        expect(feature.getAttribute("kind")).toBe("road");
    });

    // Scenario: An attribute table passed in is used as-is
    it("should take over a given attribute table", () => {
        const table = AttributeTable.from({ a: 1 });
        const feature = new Feature({ attributes: table });

        expect(feature.attributes).toBe(table);
    });
});

describe("FeatureStore", () => {
    const road = () => new Feature({ id: "road", geometry: new BoxGeometry(0, 0, 10, 1), attributes: { kind: "road" } });
    const well = () => new Feature({ id: "well", geometry: point(5, 5), attributes: { kind: "well", depth: 30 } });
    const note = () => new Feature({ id: "note", attributes: { kind: "note" } });

    describe("membership", () => {
        // Scenario: The same instance cannot be added twice
        it("should reject a duplicate instance", () => {
            const store = new FeatureStore();
            const feature = road();
            store.add(feature);

            expect(() => store.add(feature)).toThrow("Feature instance road is already in the store");
            expect(store.count).toBe(1);
        });

        // Scenario: Two instances sharing an id are both held
        it("should allow duplicate ids on different instances", () => {
            const first = road();
            const second = road();
            const store = new FeatureStore([first, second]);

            expect(store.count).toBe(2);
            expect(store.getById("road")).toBe(first);
        });

        // Scenario: Removal is by reference
        it("should remove by instance", () => {
            const held = road();
            const store = new FeatureStore([held]);

            expect(store.remove(road())).toBe(false);
            expect(store.remove(held)).toBe(true);
            expect(store.count).toBe(0);
        });

        // Scenario: Index access is bounds-checked
        it("should bounds-check at() and set()", () => {
            const store = new FeatureStore([road()]);

            expect(() => store.at(1)).toThrow("Feature index 1 out of range [0, 1)");
            expect(() => store.set(-1, well())).toThrow(InvalidArgumentError);
        });

        // Scenario: set() replaces in place
        it("should replace the feature at an index", () => {
            const replaced = road();
            const replacement = well();
            const store = new FeatureStore([replaced, note()]);

            store.set(0, replacement);

            expect(store.at(0)).toBe(replacement);
            expect(store.has(replaced)).toBe(false);
            expect(store.toArray().map(f => f.id)).toEqual(["well", "note"]);
        });
    });

    describe("queries", () => {
        // Scenario: Spatial query skips features without geometry
        it("should return features intersecting an envelope", () => {
            const store = new FeatureStore([road(), well(), note()]);

            const hits = [...store.getInExtent(new Envelope(4, 4, 6, 6))];

            expect(hits.map(f => f.id)).toEqual(["well"]);
        });

        // Scenario: Touching edges count as intersecting
        it("should treat touching envelopes as intersecting", () => {
            const store = new FeatureStore([road()]);

            expect([...store.getInExtent(new Envelope(10, 1, 12, 3))]).toHaveLength(1);
        });

        // Scenario: Attribute filter uses value equality
        it("should filter by attribute value", () => {
            const store = new FeatureStore([road(), well(), note()]);

            expect([...store.filterByAttribute("kind", "well")].map(f => f.id)).toEqual(["well"]);
            expect([...store.filterByAttribute("depth", "30")]).toEqual([]);
        });

        // Scenario: Geometry-type filter
        it("should filter by geometry type", () => {
            const store = new FeatureStore([road(), well(), note()]);

            expect([...store.filterByGeometryType(GeometryType.Point)].map(f => f.id)).toEqual(["well"]);
            expect([...store.filterByGeometryType(GeometryType.Polygon)].map(f => f.id)).toEqual(["road"]);
        });

        // Scenario: Queries rescan on every iteration
        it("should reflect changes made after the query was created", () => {
            const store = new FeatureStore([road()]);
            const roads = store.filterByAttribute("kind", "road");

            expect([...roads]).toHaveLength(1);

            store.add(new Feature({ id: "road-2", attributes: { kind: "road" } }));
            expect([...roads]).toHaveLength(2);
        });

        // Scenario: Empty attribute name is rejected
        it("should reject an empty attribute name", () => {
            const store = new FeatureStore();

            expect(() => store.filterByAttribute("", 1)).toThrow(InvalidArgumentError);
        });
    });

    describe("extent", () => {
        // Scenario: Extent is the union of bounding boxes
        it("should union every bounding box", () => {
            const store = new FeatureStore([road(), well(), note()]);

            expect(store.extent?.equals(new Envelope(0, 0, 10, 5))).toBe(true);
        });

        // Scenario: No geometry means no extent
        it("should be undefined without geometries", () => {
            expect(new FeatureStore().extent).toBeUndefined();
            expect(new FeatureStore([note()]).extent).toBeUndefined();
        });

        // Scenario: Extent is recomputed after removal
        it("should shrink when a feature is removed", () => {
            const far = new Feature({ geometry: point(100, 100) });
            const store = new FeatureStore([well(), far]);

            store.remove(far);

            expect(store.extent?.equals(new Envelope(5, 5, 5, 5))).toBe(true);
        });
    });

    describe("road, river and blank features", () => {
        // Scenario: Two points and a feature with no geometry, queried three ways
        it("should query by extent and attribute and bound only the geometries", () => {
            const f1 = new Feature({ id: "f1", geometry: point(0, 0), attributes: { kind: "road" } });
            const f2 = new Feature({ id: "f2", geometry: point(10, 10), attributes: { kind: "river" } });
            const f3 = new Feature({ id: "f3" });
            const store = new FeatureStore([f1, f2, f3]);

            expect([...store.getInExtent(new Envelope(-1, -1, 1, 1))]).toEqual([f1]);
            expect([...store.filterByAttribute("kind", "river")]).toEqual([f2]);
            expect(store.extent?.equals(new Envelope(0, 0, 10, 10))).toBe(true);
            expect(store.count).toBe(3);
        });
    });
});

describe("Envelope", () => {
    // Scenario: min greater than max is rejected
    it("should reject inverted bounds", () => {
        expect(() => new Envelope(1, 0, 0, 1)).toThrow(InvalidArgumentError);
    });

    // Scenario: Envelope operations
    it("should buffer, expand and contain", () => {
        const box = new Envelope(0, 0, 2, 2);

        expect(box.buffer(1).equals(new Envelope(-1, -1, 3, 3))).toBe(true);
        expect(box.expandToInclude(new Envelope(5, -1, 6, 0)).equals(new Envelope(0, -1, 6, 2))).toBe(true);
        expect(box.contains(2, 2)).toBe(true);
        expect(box.contains(2.1, 2)).toBe(false);
        expect(Envelope.fromPoints([3, 1], [-1, 4]).equals(new Envelope(-1, 1, 3, 4))).toBe(true);
        expect(box.width).toBe(2);
    });
});
