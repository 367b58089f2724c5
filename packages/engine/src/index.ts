/**
 * @fileoverview Mapcore Engine
 *
 * Geospatial engine core with a supervised plugin runtime.
 *
 * The engine provides:
 * - Features with attribute tables, and an in-memory feature store with
 *   spatial and attribute queries
 * - A plugin lifecycle state machine and base classes for tools,
 *   analyses and data providers
 * - A plugin manager that orders startup by dependencies, stops in reverse,
 *   and dispatches input, analyses and data access to plugins
 * - Manifest and code-file plugin loading, and file-backed settings
 *
 * @module @mapcore/engine
 * @example
 * ```typescript
 * import { PluginManager, PluginLoader } from "@mapcore/engine";
 *
 * const manager = new PluginManager({
 *     engineVersion : "1.5.0",
 *     contextFactory: () => ({ mapCanvas, layers }),
 * });
 *
 * await manager.load(await new PluginLoader().loadFromDirectories(["./plugins"]));
 * await manager.startAll();
 * ```
 */

// ============================================================================
// Contract exports
// ============================================================================

export * from "./contracts/index.js";

// ============================================================================
// Feature model exports
// ============================================================================

export * from "./data/index.js";

// ============================================================================
// Implementation exports
// ============================================================================

export * from "./impl/index.js";

// ============================================================================
// Plugin exports
// ============================================================================

export * from "./plugins/index.js";

// ============================================================================
// Engine exports
// ============================================================================

export * from "./engine/index.js";
