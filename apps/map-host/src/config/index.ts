/**
 * @fileoverview Configuration barrel exports
 *
 * @module config
 */

export {
    loadHostConfig,
    loadHostConfigWithFallback,
    getDefaultHostConfig,
    type HostConfig,
    type LayerSourceConfig,
} from "./loadHostConfig.js";
