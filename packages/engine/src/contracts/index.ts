/**
 * @fileoverview Contract barrel exports
 *
 * All interfaces and types that define the engine contract: geometry and
 * attribute values, plugin descriptors and capabilities, the plugin
 * context, settings, logging, events and errors.
 *
 * @module @mapcore/engine/contracts
 */

// Errors
export {
    MapcoreError,
    InvalidArgumentError,
    InvalidStateError,
    DependencyError,
    VersionError,
    ExecutionError,
    CancelledError,
    toError,
    describeError,
    isErrorKind,
    type ErrorKind,
} from "./Errors.js";

// Attribute values
export {
    attributeKind,
    attributeEquals,
    cloneAttributeValue,
    isAttributeValue,
    type AttributeValue,
    type AttributeKind,
} from "./AttributeValue.js";

// Geometry capability
export {
    Envelope,
    GeometryType,
    type Geometry,
    type Coordinate,
    type CoordinateTransformation,
} from "./Geometry.js";

export { FlagSet } from "./FlagSet.js";

// Logging
export {
    createConsoleLogger,
    createScopedLogger,
    isLogLevel,
    type EngineLogger,
    type PluginLogger,
    type LogLevel,
} from "./Logger.js";

// Plugin contract
export {
    PluginState,
    PluginType,
    isPlugin,
    isEnabled,
    type Plugin,
    type PluginDescriptor,
    type StateChangeListener,
} from "./Plugin.js";

export type {
    PluginContext,
    PluginManagerHandle,
    MapCanvas,
    Layer,
    LayerCollection,
} from "./PluginContext.js";

export {
    VALID,
    invalid,
    type PluginSettings,
    type ValidationResult,
} from "./PluginSettings.js";

// Capabilities
export {
    MouseButton,
    ModifierKey,
    isToolPlugin,
    type Key,
    type MouseEventArgs,
    type KeyEventArgs,
    type ToolCapability,
    type ToolPlugin,
} from "./ToolPlugin.js";

export {
    isAnalysisPlugin,
    validateAgainstDefinitions,
    type AnalysisCapability,
    type AnalysisParameter,
    type AnalysisParameters,
    type AnalysisPlugin,
    type AnalysisResult,
    type ParameterDataType,
    type ProgressReporter,
    type ProgressUpdate,
} from "./AnalysisPlugin.js";

export {
    DataProviderCapabilityFlag,
    DataSourceType,
    isDataProviderPlugin,
    type DataProviderCapability,
    type DataProviderPlugin,
    type DataSource,
    type DataSourceMetadata,
    type FieldMetadata,
} from "./DataProviderPlugin.js";

// EventBus contract
export type {
    EventBus,
    EventPayload,
    EventHandler,
    EventType,
    LifecycleEventType,
    PluginEventType,
    Subscription,
} from "./EventBus.js";
export { createEvent } from "./EventBus.js";
