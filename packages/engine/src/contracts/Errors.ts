/**
 * @fileoverview Engine error hierarchy
 *
 * Every failure the engine raises deliberately is a MapcoreError with a
 * `kind` discriminant. "Not found" is never an error: lookups return
 * `undefined` instead.
 *
 * @module @mapcore/engine/contracts/Errors
 */

/**
 * Discriminant shared by all engine errors.
 */
export type ErrorKind =
    | "InvalidArgument"
    | "InvalidState"
    | "DependencyError"
    | "VersionError"
    | "ExecutionError"
    | "Cancelled";

/**
 * Base class for engine errors.
 */
export abstract class MapcoreError extends Error {
    abstract readonly kind: ErrorKind;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * A required input was absent or malformed.
 */
export class InvalidArgumentError extends MapcoreError {
    readonly kind = "InvalidArgument" as const;

    constructor(readonly argument: string, message?: string) {
        super(message ?? `Invalid argument: ${argument}`);
    }
}

/**
 * A lifecycle operation was attempted from a state that does not allow it.
 */
export class InvalidStateError extends MapcoreError {
    readonly kind = "InvalidState" as const;

    constructor(
        readonly operation: string,
        readonly state: string,
        message?: string
    ) {
        super(message ?? `Cannot ${operation} in state ${state}`);
    }
}

/**
 * A plugin dependency is missing, disabled, failed, or part of a cycle.
 */
export class DependencyError extends MapcoreError {
    readonly kind = "DependencyError" as const;

    constructor(
        readonly pluginId: string,
        readonly dependencies: readonly string[],
        message?: string
    ) {
        super(message ?? `Plugin ${pluginId} has unmet dependencies: ${dependencies.join(", ")}`);
    }
}

/**
 * Host and plugin versions are incompatible.
 */
export class VersionError extends MapcoreError {
    readonly kind = "VersionError" as const;

    constructor(
        readonly pluginId: string,
        readonly required: string,
        readonly actual: string,
        message?: string
    ) {
        super(message ?? `Plugin ${pluginId} requires engine ${required}, host is ${actual}`);
    }
}

/**
 * An analysis or data-provider operation failed.
 */
export class ExecutionError extends MapcoreError {
    readonly kind = "ExecutionError" as const;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
    }
}

/**
 * Cooperative cancellation was observed.
 */
export class CancelledError extends MapcoreError {
    readonly kind = "Cancelled" as const;

    constructor(message = "Operation was cancelled") {
        super(message);
    }
}

/**
 * Narrow a thrown value to an Error.
 */
export function toError(error: unknown): Error {
    return error instanceof Error ? error : new Error(String(error));
}

/**
 * Message text of a thrown value, for logs and event payloads.
 */
export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Whether a thrown value is an engine error of the given kind.
 */
export function isErrorKind(error: unknown, kind: ErrorKind): error is MapcoreError {
    return error instanceof MapcoreError && error.kind === kind;
}
