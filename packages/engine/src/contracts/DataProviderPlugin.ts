/**
 * Data Provider Plugin Contract
 *
 * Data providers turn external sources (files, databases, services) into
 * feature stores. Callers query capability flags before attempting an
 * operation. testConnection() and getMetadata() never modify the source.
 */

import type { Envelope } from "./Geometry.js";
import type { FlagSet } from "./FlagSet.js";
import type { Plugin } from "./Plugin.js";
import type { FeatureStore } from "../data/FeatureStore.js";

/**
 * Operations a provider supports.
 */
export enum DataProviderCapabilityFlag {
    Read           = "Read",
    Write          = "Write",
    Create         = "Create",
    Delete         = "Delete",
    SpatialIndex   = "SpatialIndex",
    AttributeIndex = "AttributeIndex",
    Transaction    = "Transaction",
    BulkInsert     = "BulkInsert",
}

export enum DataSourceType {
    Unknown    = "Unknown",
    File       = "File",
    Database   = "Database",
    WebService = "WebService",
    Memory     = "Memory",
}

/**
 * Description of one field (column) of a source.
 */
export interface FieldMetadata {
    readonly name: string;

    /** Source-native type name */
    readonly dataType: string;
    readonly length?: number;
    readonly precision?: number;
    readonly isNullable: boolean;
    readonly isPrimaryKey: boolean;
    readonly isIndexed: boolean;
}

/**
 * Read-only description of a data source.
 */
export interface DataSourceMetadata {
    readonly name: string;
    readonly description: string;
    readonly sourceType: DataSourceType;
    readonly extent?: Envelope;
    readonly spatialReference?: string;
    readonly featureCount?: number;
    readonly fields: readonly FieldMetadata[];
    readonly properties: Readonly<Record<string, unknown>>;
}

/**
 * Open source that can produce features.
 */
export interface DataSource {
    readonly name: string;

    /** Read every feature into a new store */
    loadFeatures(): Promise<FeatureStore>;

    close(): Promise<void>;
}

/**
 * Data-provider behavior a plugin can expose.
 */
export interface DataProviderCapability {
    /** Lower-case file extensions including the dot, e.g. ".sqlite" */
    readonly supportedExtensions: readonly string[];

    readonly capabilities: FlagSet<DataProviderCapabilityFlag>;

    /**
     * @returns the data source, or undefined when the connection is not for this provider
     */
    createDataSource(connection: string, options?: Readonly<Record<string, unknown>>): DataSource | undefined;

    /** Must not modify the source */
    testConnection(connection: string): Promise<boolean>;

    /** Must not modify the source */
    getMetadata(connection: string): Promise<DataSourceMetadata | undefined>;
}

/**
 * Plugin that exposes data-provider behavior.
 */
export type DataProviderPlugin = Plugin & { readonly dataProvider: DataProviderCapability };

/**
 * Type guard to check if a plugin supports data-provider behavior.
 */
export function isDataProviderPlugin(plugin: Plugin): plugin is DataProviderPlugin {
    return plugin.dataProvider !== undefined;
}
