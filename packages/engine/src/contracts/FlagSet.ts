/**
 * Flag Set
 *
 * Immutable set over a fixed string enumeration. Used wherever an entity
 * occupies several categories at once (plugin types, provider
 * capabilities, modifier keys).
 */

/**
 * Immutable set of flags.
 *
 * @typeParam T - String enumeration the set ranges over
 *
 * @example
 * ```typescript
 * const types = FlagSet.of(PluginType.Tool, PluginType.Analysis);
 * types.has(PluginType.Tool);                 // true
 * types.union(FlagSet.of(PluginType.Service)); // Tool, Analysis, Service
 * ```
 */
export class FlagSet<T extends string> implements Iterable<T> {
    private readonly flags: ReadonlySet<T>;

    private constructor(flags: Iterable<T>) {
        this.flags = new Set(flags);
    }

    static of<T extends string>(...flags: T[]): FlagSet<T> {
        return new FlagSet(flags);
    }

    static from<T extends string>(flags: Iterable<T>): FlagSet<T> {
        return new FlagSet(flags);
    }

    static empty<T extends string>(): FlagSet<T> {
        return new FlagSet<T>([]);
    }

    get size(): number {
        return this.flags.size;
    }

    get isEmpty(): boolean {
        return this.flags.size === 0;
    }

    has(flag: T): boolean {
        return this.flags.has(flag);
    }

    /**
     * Whether every flag of `other` is present.
     */
    hasAll(other: Iterable<T>): boolean {
        for (const flag of other) {
            if (!this.flags.has(flag)) {
                return false;
            }
        }
        return true;
    }

    /**
     * Whether at least one flag of `other` is present.
     */
    hasAny(other: Iterable<T>): boolean {
        for (const flag of other) {
            if (this.flags.has(flag)) {
                return true;
            }
        }
        return false;
    }

    union(other: Iterable<T>): FlagSet<T> {
        return new FlagSet([...this.flags, ...other]);
    }

    with(flag: T): FlagSet<T> {
        return new FlagSet([...this.flags, flag]);
    }

    without(flag: T): FlagSet<T> {
        return new FlagSet([...this.flags].filter(f => f !== flag));
    }

    equals(other: FlagSet<T>): boolean {
        return this.size === other.size && this.hasAll(other);
    }

    toArray(): T[] {
        return [...this.flags];
    }

    [Symbol.iterator](): Iterator<T> {
        return this.flags.values();
    }

    toString(): string {
        return this.toArray().join(" | ");
    }
}
