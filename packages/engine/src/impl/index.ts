/**
 * @fileoverview Implementation barrel exports
 *
 * Concrete implementations of engine contracts.
 *
 * @module @mapcore/engine/impl
 */

export { InMemoryEventBus, type InMemoryEventBusConfig } from "./InMemoryEventBus.js";
export {
    RecordSettings,
    type SettingValue,
    type SettingsRecord,
    type SettingsValidator,
} from "./RecordSettings.js";
export { PluginSettingsStore, type PluginSettingsStoreConfig } from "./PluginSettingsStore.js";
export { SettingsSnapshot } from "./SettingsSnapshot.js";
