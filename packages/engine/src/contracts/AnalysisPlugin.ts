/**
 * Analysis Plugin Contract
 *
 * Analyses are long-running, asynchronous and cancellable. They describe
 * their parameters, validate them without side effects, and report
 * progress while executing.
 */

import type { ErrorKind } from "./Errors.js";
import type { Plugin } from "./Plugin.js";
import type { ValidationResult } from "./PluginSettings.js";
import { VALID, invalid } from "./PluginSettings.js";

/**
 * Data types an analysis parameter may take.
 */
export type ParameterDataType = "string" | "number" | "boolean" | "date" | "envelope" | "stringArray";

/**
 * Parameter values passed to an analysis, keyed by parameter name.
 */
export type AnalysisParameters = Readonly<Record<string, unknown>>;

/**
 * Definition of one analysis input.
 */
export interface AnalysisParameter {
    readonly name: string;
    readonly displayName: string;
    readonly description: string;
    readonly dataType: ParameterDataType;
    readonly defaultValue?: unknown;
    readonly required: boolean;

    /** Inclusive bounds for numbers */
    readonly minValue?: number;
    readonly maxValue?: number;

    /** Closed set of accepted values */
    readonly allowedValues?: readonly unknown[];
}

/**
 * Progress notification.
 */
export interface ProgressUpdate {
    /** Percentage, 0–100 */
    readonly progress: number;
    readonly message?: string;

    /** Whether the work can still be cancelled */
    readonly canCancel: boolean;
}

/**
 * Progress sink handed to execute().
 */
export type ProgressReporter = (update: ProgressUpdate) => void;

/**
 * Structured analysis outcome. Failures are reported here, not thrown.
 */
export interface AnalysisResult {
    readonly success: boolean;
    readonly errorMessage?: string;

    /** Set when success is false */
    readonly errorKind?: Extract<ErrorKind, "ExecutionError" | "Cancelled" | "InvalidArgument">;

    readonly results: Readonly<Record<string, unknown>>;
    readonly executionTimeMs: number;
}

/**
 * Analysis behavior a plugin can expose.
 */
export interface AnalysisCapability {
    readonly analysisName: string;

    getParameters(): readonly AnalysisParameter[];

    /** Must not have side effects */
    validateParameters(parameters: AnalysisParameters): ValidationResult;

    /**
     * Run the analysis.
     *
     * @param parameters - Validated parameters
     * @param signal - Aborted on cancellation; observe it within bounded latency
     * @param progress - Progress sink
     */
    execute(
        parameters: AnalysisParameters,
        signal: AbortSignal,
        progress: ProgressReporter
    ): Promise<AnalysisResult>;
}

/**
 * Plugin that exposes analysis behavior.
 */
export type AnalysisPlugin = Plugin & { readonly analysis: AnalysisCapability };

/**
 * Type guard to check if a plugin supports analysis behavior.
 */
export function isAnalysisPlugin(plugin: Plugin): plugin is AnalysisPlugin {
    return plugin.analysis !== undefined;
}

/**
 * Check parameter values against their definitions: required presence,
 * data type, numeric range and allowed values. Unknown names are ignored.
 *
 * @example
 * ```typescript
 * validateAgainstDefinitions({ distance: -1 }, [
 *     { name: "distance", displayName: "Distance", description: "", dataType: "number", required: true, minValue: 0 },
 * ]);
 * // { valid: false, errorMessage: "Parameter distance must be >= 0" }
 * ```
 */
export function validateAgainstDefinitions(
    parameters: AnalysisParameters,
    definitions: readonly AnalysisParameter[]
): ValidationResult {
    for (const def of definitions) {
        const value = parameters[def.name];

        if (value === undefined || value === null) {
            if (def.required) {
                return invalid(`Parameter ${def.name} is required`);
            }
            continue;
        }

        if (!matchesDataType(value, def.dataType)) {
            return invalid(`Parameter ${def.name} must be of type ${def.dataType}`);
        }

        if (typeof value === "number") {
            if (def.minValue !== undefined && value < def.minValue) {
                return invalid(`Parameter ${def.name} must be >= ${def.minValue}`);
            }
            if (def.maxValue !== undefined && value > def.maxValue) {
                return invalid(`Parameter ${def.name} must be <= ${def.maxValue}`);
            }
        }

        if (def.allowedValues && !def.allowedValues.includes(value)) {
            return invalid(`Parameter ${def.name} must be one of: ${def.allowedValues.join(", ")}`);
        }
    }

    return VALID;
}

function matchesDataType(value: unknown, dataType: ParameterDataType): boolean {
    switch (dataType) {
        case "string":
            return typeof value === "string";
        case "number":
            return typeof value === "number" && Number.isFinite(value);
        case "boolean":
            return typeof value === "boolean";
        case "date":
            return value instanceof Date && !Number.isNaN(value.getTime());
        case "envelope":
            return (
                Array.isArray(value) &&
                value.length === 4 &&
                value.every(n => typeof n === "number" && Number.isFinite(n))
            );
        case "stringArray":
            return Array.isArray(value) && value.every(s => typeof s === "string");
    }
}
