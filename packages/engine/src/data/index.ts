/**
 * @fileoverview Feature model barrel exports
 *
 * @module @mapcore/engine/data
 */

export { AttributeTable } from "./AttributeTable.js";
export {
    Feature,
    type FeatureId,
    type FeatureInit,
    type FeatureStyle,
} from "./Feature.js";
export { FeatureStore } from "./FeatureStore.js";
