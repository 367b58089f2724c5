/**
 * Geometry Contract
 *
 * The engine never computes geometry. Geometries come from an external
 * library that satisfies this capability; the engine only reads envelopes,
 * asks for copies and delegates distance.
 */

import { InvalidArgumentError } from "./Errors.js";

/**
 * Geometry kinds the engine can filter on.
 */
export enum GeometryType {
    Unknown            = "Unknown",
    Point              = "Point",
    LineString         = "LineString",
    Polygon            = "Polygon",
    MultiPoint         = "MultiPoint",
    MultiLineString    = "MultiLineString",
    MultiPolygon       = "MultiPolygon",
    GeometryCollection = "GeometryCollection",
}

/**
 * Minimal axis-aligned rectangle enclosing a geometry.
 *
 * Immutable; operations return new envelopes.
 */
export class Envelope {
    constructor(
        readonly minX: number,
        readonly minY: number,
        readonly maxX: number,
        readonly maxY: number
    ) {
        if ([minX, minY, maxX, maxY].some(n => Number.isNaN(n))) {
            throw new InvalidArgumentError("envelope", "Envelope coordinates must be numbers");
        }
        if (minX > maxX || minY > maxY) {
            throw new InvalidArgumentError(
                "envelope",
                `Envelope min exceeds max: (${minX}, ${minY}) > (${maxX}, ${maxY})`
            );
        }
    }

    /**
     * Smallest envelope containing every given point.
     */
    static fromPoints(...points: ReadonlyArray<readonly [number, number]>): Envelope {
        if (points.length === 0) {
            throw new InvalidArgumentError("points", "At least one point is required");
        }
        const xs = points.map(p => p[0]);
        const ys = points.map(p => p[1]);
        return new Envelope(Math.min(...xs), Math.min(...ys), Math.max(...xs), Math.max(...ys));
    }

    get width(): number {
        return this.maxX - this.minX;
    }

    get height(): number {
        return this.maxY - this.minY;
    }

    /**
     * Closed-interval overlap test: envelopes sharing only an edge intersect.
     */
    intersects(other: Envelope): boolean {
        return (
            this.minX <= other.maxX &&
            other.minX <= this.maxX &&
            this.minY <= other.maxY &&
            other.minY <= this.maxY
        );
    }

    contains(x: number, y: number): boolean {
        return x >= this.minX && x <= this.maxX && y >= this.minY && y <= this.maxY;
    }

    expandToInclude(other: Envelope): Envelope {
        return new Envelope(
            Math.min(this.minX, other.minX),
            Math.min(this.minY, other.minY),
            Math.max(this.maxX, other.maxX),
            Math.max(this.maxY, other.maxY)
        );
    }

    /**
     * Envelope grown by `distance` on every side.
     */
    buffer(distance: number): Envelope {
        return new Envelope(
            this.minX - distance,
            this.minY - distance,
            this.maxX + distance,
            this.maxY + distance
        );
    }

    equals(other: Envelope): boolean {
        return (
            this.minX === other.minX &&
            this.minY === other.minY &&
            this.maxX === other.maxX &&
            this.maxY === other.maxY
        );
    }

    toString(): string {
        return `Envelope[${this.minX}, ${this.minY}, ${this.maxX}, ${this.maxY}]`;
    }
}

/**
 * Geometry capability consumed by features and stores.
 */
export interface Geometry {
    /** Kind of geometry */
    readonly geometryType: GeometryType;

    /** Whether the geometry reports itself as valid */
    readonly isValid: boolean;

    /** Bounding box of the geometry; undefined when it has no coordinates */
    envelope(): Envelope | undefined;

    /** Whether the geometry touches the given envelope */
    intersects(envelope: Envelope): boolean;

    /** Distance to another geometry, in the geometry's own units */
    distance(other: Geometry): number;

    /** Independent deep copy */
    copy(): Geometry;
}

/**
 * Coordinate transformation capability.
 */
export interface CoordinateTransformation {
    transform(geometry: Geometry): Geometry;
}

/**
 * Planar position in world coordinates.
 */
export interface Coordinate {
    readonly x: number;
    readonly y: number;
}
