/**
 * @fileoverview Built-in plugins barrel exports
 *
 * @module domain/plugins
 */

export {
    MeasureToolPlugin,
    createMeasureSettings,
    type DistanceUnit,
    type Measurement,
} from "./MeasureToolPlugin.js";

export {
    SelectToolPlugin,
    createSelectSettings,
    type SelectedFeature,
} from "./SelectToolPlugin.js";

export {
    AttributeStatisticsPlugin,
    createStatisticsSettings,
    type AttributeStatistics,
} from "./AttributeStatisticsPlugin.js";

export {
    SqliteDataProviderPlugin,
    SqliteTableSource,
    parseConnection,
    type SqliteSourceOptions,
} from "./SqliteDataProviderPlugin.js";
