/**
 * @fileoverview Engine barrel exports
 *
 * @module @mapcore/engine/engine
 */

export {
    PluginManager,
    type PluginManagerConfig,
    type HostServices,
    type HostContextFactory,
    type PluginFailure,
    type LoadReport,
    type StartReport,
    type DispatchResult,
    type ExecuteAnalysisOptions,
    type PluginMetadata,
} from "./PluginManager.js";
export {
    resolveDependencies,
    dependencyClosure,
    dependentsOf,
    type DependencyNode,
    type DependencyResolution,
    type ResolveOptions,
} from "./DependencyResolver.js";
