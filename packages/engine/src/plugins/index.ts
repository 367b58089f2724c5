/**
 * @fileoverview Plugin base classes and loader barrel exports
 *
 * @module @mapcore/engine/plugins
 */

export { BasePlugin, type BasePluginInit } from "./BasePlugin.js";
export { BaseToolPlugin, type BaseToolPluginInit } from "./BaseToolPlugin.js";
export {
    BaseAnalysisPlugin,
    throwIfCancelled,
    type BaseAnalysisPluginInit,
} from "./BaseAnalysisPlugin.js";
export {
    PluginLoader,
    type PluginInfo,
    type PluginManifest,
    type PluginLoaderConfig,
} from "./PluginLoader.js";
