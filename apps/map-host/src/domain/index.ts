/**
 * @fileoverview Domain barrel exports
 *
 * Built-in plugins shipped with the map host.
 *
 * @module domain
 */

export * from "./plugins/index.js";
