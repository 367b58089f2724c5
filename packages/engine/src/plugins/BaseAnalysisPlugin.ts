/**
 * @fileoverview Base Analysis Plugin
 *
 * Wraps a subclass's run() so every execution produces a structured
 * AnalysisResult: thrown errors become failed results and observed
 * cancellation becomes a cancelled result.
 *
 * @module @mapcore/engine/plugins/BaseAnalysisPlugin
 */

import { PluginType } from "../contracts/Plugin.js";
import type {
    AnalysisCapability,
    AnalysisParameter,
    AnalysisParameters,
    AnalysisResult,
    ProgressReporter,
} from "../contracts/AnalysisPlugin.js";
import { validateAgainstDefinitions } from "../contracts/AnalysisPlugin.js";
import type { ValidationResult } from "../contracts/PluginSettings.js";
import { CancelledError, describeError } from "../contracts/Errors.js";
import { BasePlugin, type BasePluginInit } from "./BasePlugin.js";

export interface BaseAnalysisPluginInit extends Omit<BasePluginInit, "types"> {
    /** Extra categories besides Analysis */
    readonly types?: Iterable<PluginType>;
}

/**
 * Throw a CancelledError once `signal` has aborted. Call between units of
 * work inside run().
 */
export function throwIfCancelled(signal: AbortSignal): void {
    if (signal.aborted) {
        throw new CancelledError();
    }
}

export abstract class BaseAnalysisPlugin extends BasePlugin implements AnalysisCapability {
    abstract readonly analysisName: string;

    protected constructor(init: BaseAnalysisPluginInit) {
        super({ ...init, types: [PluginType.Analysis, ...(init.types ?? [])] });
    }

    get analysis(): AnalysisCapability {
        return this;
    }

    abstract getParameters(): readonly AnalysisParameter[];

    validateParameters(parameters: AnalysisParameters): ValidationResult {
        return validateAgainstDefinitions(parameters, this.getParameters());
    }

    async execute(
        parameters: AnalysisParameters,
        signal: AbortSignal,
        progress: ProgressReporter
    ): Promise<AnalysisResult> {
        const startTime = Date.now();

        try {
            throwIfCancelled(signal);
            const results = await this.run(parameters, signal, progress);
            return {
                success        : true,
                results,
                executionTimeMs: Date.now() - startTime,
            };
        }
        catch (error) {
            const wasCancelled = error instanceof CancelledError || signal.aborted;
            if (!wasCancelled) {
                this.logger.warn("Analysis failed", { analysis: this.analysisName, error: describeError(error) });
            }
            return {
                success        : false,
                errorMessage   : wasCancelled ? `Analysis ${this.analysisName} was cancelled` : describeError(error),
                errorKind      : wasCancelled ? "Cancelled" : "ExecutionError",
                results        : {},
                executionTimeMs: Date.now() - startTime,
            };
        }
    }

    /**
     * Do the work. Observe `signal` between units of work, e.g. with
     * throwIfCancelled().
     */
    protected abstract run(
        parameters: AnalysisParameters,
        signal: AbortSignal,
        progress: ProgressReporter
    ): Promise<Record<string, unknown>>;
}
