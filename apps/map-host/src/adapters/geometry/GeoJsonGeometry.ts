/**
 * @fileoverview GeoJSON geometry adapter
 *
 * Wraps a GeoJSON geometry (longitude/latitude, WGS84) so the engine can
 * use it through its Geometry capability. Spherical math comes from
 * d3-geo; distances are great-circle kilometres.
 *
 * @module adapters/geometry/GeoJsonGeometry
 */

import { geoBounds, geoCentroid, geoDistance } from "d3-geo";
import type { Geometry as GeoJsonObject, Position } from "geojson";
import {
    Envelope,
    GeometryType,
    type Geometry,
} from "@mapcore/engine";

/** Mean Earth radius in kilometres */
export const EARTH_RADIUS_KM = 6371;

const GEOMETRY_TYPES: Record<GeoJsonObject["type"], GeometryType> = {
    Point             : GeometryType.Point,
    LineString        : GeometryType.LineString,
    Polygon           : GeometryType.Polygon,
    MultiPoint        : GeometryType.MultiPoint,
    MultiLineString   : GeometryType.MultiLineString,
    MultiPolygon      : GeometryType.MultiPolygon,
    GeometryCollection: GeometryType.GeometryCollection,
};

/**
 * Great-circle distance between two [lon, lat] positions in kilometres.
 */
export function greatCircleKm(a: readonly [number, number], b: readonly [number, number]): number {
    return geoDistance([a[0], a[1]], [b[0], b[1]]) * EARTH_RADIUS_KM;
}

/**
 * GeoJSON-backed geometry.
 *
 * @example
 * ```typescript
 * const london = GeoJsonGeometry.point(-0.1276, 51.5072);
 * const paris  = GeoJsonGeometry.point(2.3522, 48.8566);
 *
 * london.distance(paris); // ~343.6 km
 * ```
 */
export class GeoJsonGeometry implements Geometry {
    constructor(readonly geoJson: GeoJsonObject) {}

    static point(lon: number, lat: number): GeoJsonGeometry {
        return new GeoJsonGeometry({ type: "Point", coordinates: [lon, lat] });
    }

    static lineString(positions: ReadonlyArray<readonly [number, number]>): GeoJsonGeometry {
        return new GeoJsonGeometry({
            type       : "LineString",
            coordinates: positions.map(([lon, lat]): Position => [lon, lat]),
        });
    }

    get geometryType(): GeometryType {
        return GEOMETRY_TYPES[this.geoJson.type] ?? GeometryType.Unknown;
    }

    get isValid(): boolean {
        return isValidGeometry(this.geoJson);
    }

    /**
     * Bounding box in degrees; undefined for an empty geometry such as a
     * MultiPoint without positions.
     */
    envelope(): Envelope | undefined {
        if (this.geoJson.type === "Point") {
            const [lon, lat] = this.geoJson.coordinates;
            return Number.isFinite(lon) && Number.isFinite(lat) ? new Envelope(lon, lat, lon, lat) : undefined;
        }

        const [[west, south], [east, north]] = geoBounds(this.geoJson);
        if (![west, south, east, north].every(Number.isFinite)) {
            return undefined;
        }
        // Bounds crossing the antimeridian come back with west > east
        if (west > east) {
            return new Envelope(-180, south, 180, north);
        }
        return new Envelope(west, south, east, north);
    }

    intersects(envelope: Envelope): boolean {
        return this.envelope()?.intersects(envelope) ?? false;
    }

    /**
     * Great-circle distance in kilometres: point to point for points,
     * centroid to centroid otherwise. NaN when either side is empty.
     */
    distance(other: Geometry): number {
        return greatCircleKm(this.anchor(), anchorOf(other));
    }

    copy(): GeoJsonGeometry {
        return new GeoJsonGeometry(structuredClone(this.geoJson));
    }

    /**
     * Representative [lon, lat]: the point itself, or the spherical centroid.
     */
    anchor(): [number, number] {
        if (this.geoJson.type === "Point") {
            const [lon, lat] = this.geoJson.coordinates;
            return [lon, lat];
        }
        return geoCentroid(this.geoJson);
    }

    toString(): string {
        return `GeoJsonGeometry[${this.geoJson.type}]`;
    }
}

function anchorOf(geometry: Geometry): [number, number] {
    if (geometry instanceof GeoJsonGeometry) {
        return geometry.anchor();
    }
    const envelope = geometry.envelope();
    if (!envelope) {
        return [NaN, NaN];
    }
    return [(envelope.minX + envelope.maxX) / 2, (envelope.minY + envelope.maxY) / 2];
}

function nonEmpty(items: readonly unknown[]): boolean {
    return items.length > 0;
}

function isValidPosition(position: Position): boolean {
    const [lon, lat] = position;
    return (
        Number.isFinite(lon) &&
        Number.isFinite(lat) &&
        lon >= -180 && lon <= 180 &&
        lat >= -90 && lat <= 90
    );
}

function isValidLine(positions: Position[]): boolean {
    return positions.length >= 2 && positions.every(isValidPosition);
}

function isValidRing(ring: Position[]): boolean {
    if (ring.length < 4 || !ring.every(isValidPosition)) {
        return false;
    }
    const first = ring[0];
    const last = ring[ring.length - 1];
    return first[0] === last[0] && first[1] === last[1];
}

function isValidGeometry(geometry: GeoJsonObject): boolean {
    switch (geometry.type) {
        case "Point":
            return isValidPosition(geometry.coordinates);
        case "MultiPoint":
            return nonEmpty(geometry.coordinates) && geometry.coordinates.every(isValidPosition);
        case "LineString":
            return isValidLine(geometry.coordinates);
        case "MultiLineString":
            return nonEmpty(geometry.coordinates) && geometry.coordinates.every(isValidLine);
        case "Polygon":
            return nonEmpty(geometry.coordinates) && geometry.coordinates.every(isValidRing);
        case "MultiPolygon":
            return nonEmpty(geometry.coordinates) &&
                geometry.coordinates.every(polygon => nonEmpty(polygon) && polygon.every(isValidRing));
        case "GeometryCollection":
            return nonEmpty(geometry.geometries) && geometry.geometries.every(isValidGeometry);
    }
}
