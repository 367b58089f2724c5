/**
 * Attribute Value Contract
 *
 * Attribute values are a closed union rather than an open object type, so
 * tables stay heterogeneous while every consumer can narrow exhaustively.
 */

/**
 * Any value an attribute table can hold.
 */
export type AttributeValue = string | number | boolean | Date | Uint8Array | null;

/**
 * Tag naming the variant of an AttributeValue.
 */
export type AttributeKind = "string" | "number" | "boolean" | "date" | "bytes" | "null";

/**
 * Tag of a value.
 *
 * @example
 * ```typescript
 * attributeKind("road");          // "string"
 * attributeKind(new Date());      // "date"
 * attributeKind(null);            // "null"
 * ```
 */
export function attributeKind(value: AttributeValue): AttributeKind {
    if (value === null) {
        return "null";
    }
    if (value instanceof Date) {
        return "date";
    }
    if (value instanceof Uint8Array) {
        return "bytes";
    }
    switch (typeof value) {
        case "string":
            return "string";
        case "number":
            return "number";
        default:
            return "boolean";
    }
}

/**
 * Value equality: same tag and equal payload.
 * Dates compare by time value, bytes by content.
 */
export function attributeEquals(a: AttributeValue, b: AttributeValue): boolean {
    if (a instanceof Date) {
        return b instanceof Date && a.getTime() === b.getTime();
    }
    if (a instanceof Uint8Array) {
        if (!(b instanceof Uint8Array) || a.length !== b.length) {
            return false;
        }
        return a.every((byte, i) => byte === b[i]);
    }
    if (typeof a === "number" && typeof b === "number" && Number.isNaN(a)) {
        return Number.isNaN(b);
    }
    return a === b;
}

/**
 * Copy of a value that shares no mutable state with the original.
 */
export function cloneAttributeValue<T extends AttributeValue>(value: T): T;
export function cloneAttributeValue(value: AttributeValue): AttributeValue {
    if (value instanceof Date) {
        return new Date(value.getTime());
    }
    if (value instanceof Uint8Array) {
        return new Uint8Array(value);
    }
    return value;
}

/**
 * Type guard for values accepted by attribute tables.
 */
export function isAttributeValue(value: unknown): value is AttributeValue {
    return (
        value === null ||
        typeof value === "string" ||
        typeof value === "number" ||
        typeof value === "boolean" ||
        value instanceof Date ||
        value instanceof Uint8Array
    );
}
