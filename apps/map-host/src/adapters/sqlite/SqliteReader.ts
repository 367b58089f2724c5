/**
 * SQLite Database Reader
 *
 * Read-only access to SQLite files holding point tables. The database is
 * always opened with `readonly` and `fileMustExist`, so nothing here can
 * create or modify a file.
 */

import Database from "better-sqlite3";

/**
 * Column as reported by PRAGMA table_info
 */
export interface ColumnInfo {
    name: string;
    type: string;
    notNull: boolean;
    primaryKey: boolean;
    indexed: boolean;
}

/**
 * Table summary
 */
export interface TableInfo {
    name: string;
    rowCount: number;
    columns: ColumnInfo[];
}

/**
 * Row with its rowid under `__rowid`. Integers outside the safe range
 * arrive as decimal strings.
 */
export type SqliteRow = Record<string, unknown> & { __rowid: number | string };

const MIN_SAFE = BigInt(Number.MIN_SAFE_INTEGER);
const MAX_SAFE = BigInt(Number.MAX_SAFE_INTEGER);

/**
 * A 64-bit integer as a number when it fits exactly, otherwise as its decimal text.
 */
export function fromSqliteInteger(value: bigint): number | string {
    return value >= MIN_SAFE && value <= MAX_SAFE ? Number(value) : value.toString();
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null;
}

/**
 * Quote an identifier for use in SQL text.
 */
export function quoteIdentifier(name: string): string {
    return `"${name.replace(/"/g, "\"\"")}"`;
}

/**
 * Read-only SQLite reader
 */
export class SqliteReader {
    private db: Database.Database | null = null;

    constructor(readonly filePath: string) {}

    /**
     * Open the database connection
     */
    open(): void {
        if (this.db) {
            return;
        }
        this.db = new Database(this.filePath, { readonly: true, fileMustExist: true });
    }

    /**
     * Close the database connection
     */
    close(): void {
        if (this.db) {
            this.db.close();
            this.db = null;
        }
    }

    /**
     * Run `SELECT 1` to prove the file is a readable database.
     */
    ping(): boolean {
        const row = this.connection().prepare("SELECT 1 AS ok").get();
        return isRecord(row) && row.ok === 1;
    }

    /**
     * User tables, in name order.
     */
    listTables(): string[] {
        const rows = this.connection()
            .prepare("SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name")
            .all();
        return rows.flatMap(row => (isRecord(row) && typeof row.name === "string" ? [row.name] : []));
    }

    hasTable(table: string): boolean {
        return this.listTables().includes(table);
    }

    describeTable(table: string): TableInfo {
        const db = this.connection();
        const quoted = quoteIdentifier(table);

        const indexed = new Set<string>();
        for (const index of db.prepare(`PRAGMA index_list(${quoted})`).all()) {
            if (!isRecord(index) || typeof index.name !== "string") {
                continue;
            }
            for (const column of db.prepare(`PRAGMA index_info(${quoteIdentifier(index.name)})`).all()) {
                if (isRecord(column) && typeof column.name === "string") {
                    indexed.add(column.name);
                }
            }
        }

        const columns: ColumnInfo[] = db.prepare(`PRAGMA table_info(${quoted})`).all().flatMap((row) => {
            if (!isRecord(row) || typeof row.name !== "string") {
                return [];
            }
            const primaryKey = typeof row.pk === "number" && row.pk > 0;
            return [{
                name      : row.name,
                type      : typeof row.type === "string" ? row.type : "",
                notNull   : row.notnull === 1,
                primaryKey,
                indexed   : primaryKey || indexed.has(row.name),
            }];
        });

        const countRow = db.prepare(`SELECT COUNT(*) AS n FROM ${quoted}`).get();
        const rowCount = isRecord(countRow) && typeof countRow.n === "number" ? countRow.n : 0;

        return { name: table, rowCount, columns };
    }

    /**
     * Bounds of two numeric columns, or undefined when the table has no
     * numeric rows.
     */
    bounds(table: string, xColumn: string, yColumn: string): [number, number, number, number] | undefined {
        const x = quoteIdentifier(xColumn);
        const y = quoteIdentifier(yColumn);
        const row = this.connection()
            .prepare(`SELECT MIN(${x}) AS minX, MIN(${y}) AS minY, MAX(${x}) AS maxX, MAX(${y}) AS maxY FROM ${quoteIdentifier(table)}`)
            .get();

        if (!isRecord(row)) {
            return undefined;
        }
        const values = [row.minX, row.minY, row.maxX, row.maxY];
        if (!values.every((v): v is number => typeof v === "number" && Number.isFinite(v))) {
            return undefined;
        }
        return [values[0], values[1], values[2], values[3]];
    }

    /**
     * Every row of a table, in rowid order.
     */
    readRows(table: string): SqliteRow[] {
        const rows = this.connection()
            .prepare(`SELECT rowid AS __rowid, * FROM ${quoteIdentifier(table)} ORDER BY rowid`)
            .safeIntegers(true)
            .all();

        return rows.flatMap((row) => {
            if (!isRecord(row) || typeof row.__rowid !== "bigint") {
                return [];
            }
            const values: Record<string, unknown> = {};
            for (const [column, value] of Object.entries(row)) {
                values[column] = typeof value === "bigint" ? fromSqliteInteger(value) : value;
            }
            return [{ ...values, __rowid: fromSqliteInteger(row.__rowid) }];
        });
    }

    private connection(): Database.Database {
        this.open();
        if (!this.db) {
            throw new Error(`Database not open: ${this.filePath}`);
        }
        return this.db;
    }
}
