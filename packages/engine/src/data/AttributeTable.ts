/**
 * @fileoverview Attribute Table
 *
 * Ordered name → value dictionary owned by exactly one Feature.
 *
 * @module @mapcore/engine/data/AttributeTable
 */

import type { AttributeValue } from "../contracts/AttributeValue.js";
import { attributeKind, cloneAttributeValue } from "../contracts/AttributeValue.js";
import { InvalidArgumentError } from "../contracts/Errors.js";

/**
 * Ordered attribute dictionary.
 *
 * Names are case-sensitive and unique. Insertion order is kept for
 * enumeration and index access; overwriting a name keeps its position.
 *
 * @example
 * ```typescript
 * const attrs = AttributeTable.from({ kind: "road", lanes: 2 });
 *
 * attrs.getString("kind");   // "road"
 * attrs.getNumber("kind");   // undefined (wrong kind)
 * attrs.getAt(1);            // 2
 * ```
 */
export class AttributeTable implements Iterable<[string, AttributeValue]> {
    // Map iteration order is insertion order, and re-setting a key keeps its slot
    private readonly attributes = new Map<string, AttributeValue>();

    /**
     * Build a table from a record or from ordered entries.
     */
    static from(
        source: Readonly<Record<string, AttributeValue>> | Iterable<readonly [string, AttributeValue]>
    ): AttributeTable {
        const table = new AttributeTable();
        const entries = isEntryIterable(source) ? source : Object.entries(source);
        for (const [name, value] of entries) {
            table.add(name, value);
        }
        return table;
    }

    get count(): number {
        return this.attributes.size;
    }

    /**
     * Insert an attribute, or overwrite it in place if the name exists.
     */
    add(name: string, value: AttributeValue): void {
        assertName(name);
        this.attributes.set(name, value);
    }

    /**
     * Indexer write. Same semantics as add().
     */
    set(name: string, value: AttributeValue): void {
        this.add(name, value);
    }

    /**
     * Value stored under `name`, or `undefined` when absent.
     * A stored `null` is returned as `null`.
     */
    get(name: string): AttributeValue | undefined {
        return this.attributes.get(name);
    }

    has(name: string): boolean {
        return this.attributes.has(name);
    }

    remove(name: string): boolean {
        return this.attributes.delete(name);
    }

    clear(): void {
        this.attributes.clear();
    }

    /**
     * Value at insertion position `index`.
     *
     * @throws InvalidArgumentError when `index` is out of range
     */
    getAt(index: number): AttributeValue {
        return this.entryAt(index)[1];
    }

    /**
     * Replace the value at insertion position `index`.
     *
     * @throws InvalidArgumentError when `index` is out of range
     */
    setAt(index: number, value: AttributeValue): void {
        const [name] = this.entryAt(index);
        this.attributes.set(name, value);
    }

    getString(name: string): string | undefined {
        const value = this.attributes.get(name);
        return typeof value === "string" ? value : undefined;
    }

    getNumber(name: string): number | undefined {
        const value = this.attributes.get(name);
        return typeof value === "number" ? value : undefined;
    }

    getBoolean(name: string): boolean | undefined {
        const value = this.attributes.get(name);
        return typeof value === "boolean" ? value : undefined;
    }

    getDate(name: string): Date | undefined {
        const value = this.attributes.get(name);
        return value instanceof Date ? value : undefined;
    }

    getBytes(name: string): Uint8Array | undefined {
        const value = this.attributes.get(name);
        return value instanceof Uint8Array ? value : undefined;
    }

    /**
     * Stored value when it has the same kind as `defaultValue`, otherwise
     * `defaultValue`.
     */
    getValue<T extends AttributeValue>(name: string, defaultValue: T): T;
    getValue(name: string, defaultValue: AttributeValue): AttributeValue {
        const value = this.attributes.get(name);
        if (value === undefined || attributeKind(value) !== attributeKind(defaultValue)) {
            return defaultValue;
        }
        return value;
    }

    names(): string[] {
        return [...this.attributes.keys()];
    }

    values(): AttributeValue[] {
        return [...this.attributes.values()];
    }

    entries(): Array<[string, AttributeValue]> {
        return [...this.attributes.entries()];
    }

    /**
     * Deep copy: dates and byte arrays are cloned.
     */
    copy(): AttributeTable {
        const table = new AttributeTable();
        for (const [name, value] of this.attributes) {
            table.attributes.set(name, cloneAttributeValue(value));
        }
        return table;
    }

    toRecord(): Record<string, AttributeValue> {
        return Object.fromEntries(this.attributes);
    }

    [Symbol.iterator](): Iterator<[string, AttributeValue]> {
        return this.attributes.entries();
    }

    toString(): string {
        const pairs = this.entries().map(([name, value]) => `${name}=${formatValue(value)}`);
        return `AttributeTable[${pairs.join(", ")}]`;
    }

    private entryAt(index: number): [string, AttributeValue] {
        if (!Number.isInteger(index) || index < 0 || index >= this.attributes.size) {
            throw new InvalidArgumentError(
                "index",
                `Attribute index ${index} out of range [0, ${this.attributes.size})`
            );
        }
        let i = 0;
        for (const entry of this.attributes) {
            if (i === index) {
                return entry;
            }
            i++;
        }
        throw new InvalidArgumentError("index", `Attribute index ${index} out of range`);
    }
}

function assertName(name: string): void {
    if (typeof name !== "string" || name.length === 0) {
        throw new InvalidArgumentError("name", "Attribute name must be a non-empty string");
    }
}

function isEntryIterable(
    source: Readonly<Record<string, AttributeValue>> | Iterable<readonly [string, AttributeValue]>
): source is Iterable<readonly [string, AttributeValue]> {
    return Symbol.iterator in source;
}

function formatValue(value: AttributeValue): string {
    if (value instanceof Date) {
        return value.toISOString();
    }
    if (value instanceof Uint8Array) {
        return `<${value.length} bytes>`;
    }
    return String(value);
}
