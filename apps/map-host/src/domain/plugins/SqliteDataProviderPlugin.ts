/**
 * @fileoverview SQLite Data Provider Plugin
 *
 * Reads point tables from SQLite files. A connection string is a file
 * path, optionally followed by `#table`:
 *
 *     ./data/places.sqlite#cities
 *
 * Rows become point features built from two numeric columns (default
 * `x` and `y`); an `id` column, when present, becomes the feature id and
 * every other column becomes an attribute. Integers too large for a
 * number keep their exact decimal text.
 *
 * @module domain/plugins/SqliteDataProviderPlugin
 */

import { basename, extname } from "path";
import {
    AttributeTable,
    BasePlugin,
    DataProviderCapabilityFlag,
    DataSourceType,
    Envelope,
    Feature,
    FeatureStore,
    FlagSet,
    PluginType,
    isAttributeValue,
    type AttributeValue,
    type DataProviderCapability,
    type DataSource,
    type DataSourceMetadata,
    type FieldMetadata,
} from "@mapcore/engine";
import { SqliteReader, type SqliteRow } from "../../adapters/sqlite/SqliteReader.js";
import { GeoJsonGeometry } from "../../adapters/geometry/GeoJsonGeometry.js";

const SUPPORTED_EXTENSIONS = [".sqlite", ".db", ".gpkg"];

/**
 * Options accepted by createDataSource().
 */
export interface SqliteSourceOptions {
    /** Table to read when the connection has no `#table` */
    readonly table?: string;
    readonly xColumn?: string;
    readonly yColumn?: string;
}

/**
 * Split "path#table" into its parts.
 */
export function parseConnection(connection: string): { filePath: string; table?: string } {
    const hash = connection.lastIndexOf("#");
    if (hash < 0) {
        return { filePath: connection };
    }
    const table = connection.slice(hash + 1);
    return { filePath: connection.slice(0, hash), table: table || undefined };
}

function readOption(options: Readonly<Record<string, unknown>> | undefined, key: keyof SqliteSourceOptions): string | undefined {
    const value = options?.[key];
    return typeof value === "string" && value.length > 0 ? value : undefined;
}

function toAttributeValue(value: unknown): AttributeValue {
    return isAttributeValue(value) ? value : String(value);
}

/**
 * Data source over one table.
 */
export class SqliteTableSource implements DataSource {
    readonly name: string;
    private readonly reader: SqliteReader;

    constructor(
        filePath: string,
        readonly table: string,
        private readonly xColumn = "x",
        private readonly yColumn = "y",
        private readonly onClose?: (source: SqliteTableSource) => void
    ) {
        this.name   = `${basename(filePath)}#${table}`;
        this.reader = new SqliteReader(filePath);
    }

    async loadFeatures(): Promise<FeatureStore> {
        const store = new FeatureStore();
        for (const row of this.reader.readRows(this.table)) {
            store.add(this.toFeature(row));
        }
        return store;
    }

    async close(): Promise<void> {
        this.reader.close();
        this.onClose?.(this);
    }

    private toFeature(row: SqliteRow): Feature {
        const attributes = new AttributeTable();
        for (const [column, value] of Object.entries(row)) {
            if (column === "__rowid" || column === "id" || column === this.xColumn || column === this.yColumn) {
                continue;
            }
            attributes.add(column, toAttributeValue(value));
        }

        const x = row[this.xColumn];
        const y = row[this.yColumn];
        const geometry = typeof x === "number" && typeof y === "number" && Number.isFinite(x) && Number.isFinite(y)
            ? GeoJsonGeometry.point(x, y)
            : undefined;

        const rowId = row.id;
        const id = typeof rowId === "string" || typeof rowId === "number" ? rowId : row.__rowid;

        return new Feature({ id, geometry, attributes });
    }
}

export class SqliteDataProviderPlugin extends BasePlugin implements DataProviderCapability {
    readonly supportedExtensions = SUPPORTED_EXTENSIONS;
    readonly capabilities = FlagSet.of(
        DataProviderCapabilityFlag.Read,
        DataProviderCapabilityFlag.SpatialIndex,
        DataProviderCapabilityFlag.AttributeIndex
    );

    private readonly openSources = new Set<SqliteTableSource>();

    constructor() {
        super({
            id         : "sqlite-provider",
            name       : "SQLite Data Provider",
            description: "Reads point tables from SQLite databases",
            version    : "1.0.0",
            author     : "mapcore",
            types      : [PluginType.DataProvider],
        });
    }

    get dataProvider(): DataProviderCapability {
        return this;
    }

    /**
     * @returns undefined when the extension is not supported or no table is named
     */
    createDataSource(connection: string, options?: Readonly<Record<string, unknown>>): DataSource | undefined {
        const { filePath, table } = parseConnection(connection);
        const tableName = table ?? readOption(options, "table");
        if (!this.supports(filePath) || !tableName) {
            return undefined;
        }

        const source = new SqliteTableSource(
            filePath,
            tableName,
            readOption(options, "xColumn"),
            readOption(options, "yColumn"),
            (closed) => this.openSources.delete(closed)
        );
        this.openSources.add(source);
        return source;
    }

    async testConnection(connection: string): Promise<boolean> {
        const { filePath, table } = parseConnection(connection);
        if (!this.supports(filePath)) {
            return false;
        }

        const reader = new SqliteReader(filePath);
        try {
            return reader.ping() && (table === undefined || reader.hasTable(table));
        }
        catch (error) {
            this.logger.debug("Connection test failed", {
                filePath,
                error: error instanceof Error ? error.message : String(error),
            });
            return false;
        }
        finally {
            reader.close();
        }
    }

    /**
     * Without a table: one entry per table under `properties.tables`.
     * With a table: its fields, row count and the extent of its x/y columns.
     */
    async getMetadata(connection: string): Promise<DataSourceMetadata | undefined> {
        const { filePath, table } = parseConnection(connection);
        if (!this.supports(filePath)) {
            return undefined;
        }

        const reader = new SqliteReader(filePath);
        try {
            if (!table) {
                const tables = reader.listTables().map(name => reader.describeTable(name));
                return {
                    name        : basename(filePath),
                    description : `SQLite database with ${tables.length} table(s)`,
                    sourceType  : DataSourceType.Database,
                    featureCount: tables.reduce((sum, t) => sum + t.rowCount, 0),
                    fields      : [],
                    properties  : {
                        tables: tables.map(t => ({ name: t.name, rowCount: t.rowCount, columns: t.columns.map(c => c.name) })),
                    },
                };
            }

            if (!reader.hasTable(table)) {
                return undefined;
            }

            const info = reader.describeTable(table);
            const fields: FieldMetadata[] = info.columns.map(column => ({
                name        : column.name,
                dataType    : column.type,
                isNullable  : !column.notNull && !column.primaryKey,
                isPrimaryKey: column.primaryKey,
                isIndexed   : column.indexed,
            }));

            const hasPoints = ["x", "y"].every(name => info.columns.some(c => c.name === name));
            const bounds = hasPoints ? reader.bounds(table, "x", "y") : undefined;

            return {
                name        : `${basename(filePath)}#${table}`,
                description : `Table ${table}`,
                sourceType  : DataSourceType.Database,
                extent      : bounds ? new Envelope(...bounds) : undefined,
                featureCount: info.rowCount,
                fields,
                properties  : { table },
            };
        }
        finally {
            reader.close();
        }
    }

    protected async onStop(): Promise<void> {
        await this.closeSources();
    }

    protected async onDispose(): Promise<void> {
        await this.closeSources();
    }

    private supports(filePath: string): boolean {
        return this.supportedExtensions.includes(extname(filePath).toLowerCase());
    }

    private async closeSources(): Promise<void> {
        for (const source of [...this.openSources]) {
            await source.close();
        }
    }

    /**
     * Sources handed out and not yet closed.
     */
    get openSourceCount(): number {
        return this.openSources.size;
    }
}
