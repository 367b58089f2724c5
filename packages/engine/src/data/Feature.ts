/**
 * @fileoverview Feature
 *
 * Atomic unit of spatial data: identity, optional geometry, one attribute
 * table and an optional shared style.
 *
 * @module @mapcore/engine/data/Feature
 */

import { randomUUID } from "node:crypto";
import type { AttributeValue } from "../contracts/AttributeValue.js";
import type { CoordinateTransformation, Envelope, Geometry } from "../contracts/Geometry.js";
import { InvalidArgumentError } from "../contracts/Errors.js";
import { AttributeTable } from "./AttributeTable.js";

/**
 * Opaque feature identifier.
 */
export type FeatureId = string | number;

/**
 * Style object. Styles are shared: many features may reference one.
 * The engine never inspects them.
 */
export interface FeatureStyle {
    readonly name?: string;
    readonly [property: string]: unknown;
}

/**
 * Construction options for a Feature.
 */
export interface FeatureInit {
    /** Identifier (default: fresh UUID) */
    readonly id?: FeatureId;

    /** Geometry, owned by the feature */
    readonly geometry?: Geometry;

    /** Attributes; a table is taken over, a record is copied into a new table */
    readonly attributes?: AttributeTable | Readonly<Record<string, AttributeValue>>;

    /** Shared style reference */
    readonly style?: FeatureStyle;
}

/**
 * Spatial feature.
 *
 * Equality is by id only. `boundingBox` is derived from the geometry on
 * every read.
 *
 * @example
 * ```typescript
 * const road = new Feature({
 *     id        : "r-1",
 *     geometry  : point(0, 0),
 *     attributes: { kind: "road" },
 * });
 *
 * road.boundingBox;            // geometry.envelope()
 * road.getAttribute("kind");   // "road"
 * ```
 */
export class Feature {
    readonly id: FeatureId;
    readonly attributes: AttributeTable;
    geometry: Geometry | undefined;
    style: FeatureStyle | undefined;

    constructor(init: FeatureInit = {}) {
        if (init.id !== undefined && !isFeatureId(init.id)) {
            throw new InvalidArgumentError("id", "Feature id must be a string or a finite number");
        }
        this.id = init.id ?? randomUUID();
        this.geometry = init.geometry;
        this.style = init.style;
        this.attributes = init.attributes instanceof AttributeTable
            ? init.attributes
            : AttributeTable.from(init.attributes ?? {});
    }

    /**
     * True when there is no geometry or the geometry reports itself valid.
     */
    get isValid(): boolean {
        return this.geometry?.isValid ?? true;
    }

    get boundingBox(): Envelope | undefined {
        return this.geometry?.envelope();
    }

    getAttribute(name: string): AttributeValue | undefined {
        return this.attributes.get(name);
    }

    /**
     * Copy with independently owned geometry and attributes.
     *
     * The copy keeps the SAME id as the original, so it is `equals()` to it.
     * Use copyWithId() when the copy must be a new feature.
     */
    copy(): Feature {
        return this.copyWithId(this.id);
    }

    /**
     * Copy with independently owned geometry and attributes under a new id.
     */
    copyWithId(id: FeatureId = randomUUID()): Feature {
        return new Feature({
            id,
            geometry  : this.geometry?.copy(),
            attributes: this.attributes.copy(),
            style     : this.style,
        });
    }

    /**
     * Distance between geometries; Infinity when either side has none.
     */
    distance(other: Feature): number {
        if (!this.geometry || !other.geometry) {
            return Infinity;
        }
        return this.geometry.distance(other.geometry);
    }

    /**
     * Replace the geometry with its transformed form. Attributes and style
     * are untouched.
     */
    transform(transformation: CoordinateTransformation): void {
        if (!transformation) {
            throw new InvalidArgumentError("transformation");
        }
        if (this.geometry) {
            this.geometry = transformation.transform(this.geometry);
        }
    }

    equals(other: unknown): boolean {
        return other instanceof Feature && other.id === this.id;
    }

    /**
     * Key suitable for Map/Set lookups keyed by identity-as-id.
     */
    get hashKey(): FeatureId {
        return this.id;
    }

    toString(): string {
        const geometry = this.geometry?.geometryType ?? "none";
        return `Feature[id=${this.id}, geometry=${geometry}, attributes=${this.attributes.count}]`;
    }
}

function isFeatureId(value: unknown): value is FeatureId {
    return typeof value === "string" || (typeof value === "number" && Number.isFinite(value));
}
