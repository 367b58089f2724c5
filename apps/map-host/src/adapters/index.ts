/**
 * @fileoverview Adapters barrel exports
 *
 * Host-side implementations of the engine's geometry, canvas and layer
 * capabilities, and the SQLite reader.
 *
 * @module adapters
 */

export { GeoJsonGeometry, greatCircleKm, EARTH_RADIUS_KM } from "./geometry/GeoJsonGeometry.js";
export { HeadlessMapCanvas, type HeadlessMapCanvasConfig } from "./map/HeadlessMapCanvas.js";
export { InMemoryLayerCollection, createLayer } from "./map/InMemoryLayerCollection.js";
export {
    SqliteReader,
    quoteIdentifier,
    fromSqliteInteger,
    type ColumnInfo,
    type TableInfo,
    type SqliteRow,
} from "./sqlite/SqliteReader.js";
