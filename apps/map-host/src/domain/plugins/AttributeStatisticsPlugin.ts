/**
 * @fileoverview Attribute Statistics Plugin
 *
 * Analysis computing count, sum, min, max and mean of a numeric attribute
 * over a layer, optionally limited to an extent. Non-numeric and missing
 * values are counted as skipped.
 *
 * @module domain/plugins/AttributeStatisticsPlugin
 */

import { setImmediate as yieldToEventLoop } from "timers/promises";
import {
    BaseAnalysisPlugin,
    Envelope,
    ExecutionError,
    RecordSettings,
    VALID,
    invalid,
    throwIfCancelled,
    type AnalysisParameter,
    type AnalysisParameters,
    type Feature,
    type ProgressReporter,
} from "@mapcore/engine";

type StatisticsSettingsValues = {
    /** Features processed between cancellation checks */
    batchSize: number;
};

const DEFAULT_SETTINGS: StatisticsSettingsValues = {
    batchSize: 250,
};

export function createStatisticsSettings(): RecordSettings<StatisticsSettingsValues> {
    return new RecordSettings<StatisticsSettingsValues>({ ...DEFAULT_SETTINGS }, (values) =>
        Number.isInteger(values.batchSize) && values.batchSize > 0
            ? VALID
            : invalid("batchSize must be a positive integer")
    );
}

const PARAMETERS: readonly AnalysisParameter[] = [
    {
        name       : "layer",
        displayName: "Layer",
        description: "Name of the layer to analyse",
        dataType   : "string",
        required   : true,
    },
    {
        name       : "attribute",
        displayName: "Attribute",
        description: "Numeric attribute to summarise",
        dataType   : "string",
        required   : true,
    },
    {
        name       : "extent",
        displayName: "Extent",
        description: "Optional [minX, minY, maxX, maxY] limiting the features considered",
        dataType   : "envelope",
        required   : false,
    },
];

/**
 * Statistics returned in AnalysisResult.results.
 */
export interface AttributeStatistics {
    readonly count: number;
    readonly skipped: number;
    readonly sum: number;
    readonly min: number | null;
    readonly max: number | null;
    readonly mean: number | null;
}

export class AttributeStatisticsPlugin extends BaseAnalysisPlugin {
    readonly analysisName = "Attribute Statistics";

    private batchSize = DEFAULT_SETTINGS.batchSize;

    constructor() {
        super({
            id         : "attribute-statistics",
            name       : "Attribute Statistics",
            description: "Summarises a numeric attribute over a layer",
            version    : "1.0.0",
            author     : "mapcore",
            settings   : createStatisticsSettings(),
        });
    }

    getParameters(): readonly AnalysisParameter[] {
        return PARAMETERS;
    }

    protected async onStart(): Promise<void> {
        this.batchSize = RecordSettings.snapshot(DEFAULT_SETTINGS, this.activeSettings).batchSize;
    }

    protected async run(
        parameters: AnalysisParameters,
        signal: AbortSignal,
        progress: ProgressReporter
    ): Promise<Record<string, unknown>> {
        const layerName = String(parameters.layer);
        const attribute = String(parameters.attribute);

        const layer = this.context?.layers.get(layerName);
        if (!layer) {
            throw new ExecutionError(`Layer not found: ${layerName}`);
        }

        const features = this.selectFeatures(layer.features.toArray(), parameters.extent);
        const total = features.length;

        let count = 0;
        let skipped = 0;
        let sum = 0;
        let min = Number.POSITIVE_INFINITY;
        let max = Number.NEGATIVE_INFINITY;

        progress({ progress: 0, message: `Analysing ${total} features`, canCancel: true });

        for (let i = 0; i < total; i++) {
            if (i > 0 && i % this.batchSize === 0) {
                await yieldToEventLoop();
                throwIfCancelled(signal);
                progress({ progress: (i / total) * 100, canCancel: true });
            }

            const value = features[i].attributes.getNumber(attribute);
            if (value === undefined || !Number.isFinite(value)) {
                skipped += 1;
                continue;
            }
            count += 1;
            sum += value;
            min = Math.min(min, value);
            max = Math.max(max, value);
        }

        throwIfCancelled(signal);
        progress({ progress: 100, message: "Done", canCancel: false });

        const statistics: AttributeStatistics = {
            count,
            skipped,
            sum,
            min : count > 0 ? min : null,
            max : count > 0 ? max : null,
            mean: count > 0 ? sum / count : null,
        };

        this.logger.debug("Statistics computed", { layer: layerName, attribute, count, skipped });
        return { ...statistics };
    }

    private selectFeatures(features: Feature[], extent: unknown): Feature[] {
        if (!Array.isArray(extent) || extent.length !== 4) {
            return features;
        }
        const [minX, minY, maxX, maxY] = extent.map(Number);
        const envelope = new Envelope(minX, minY, maxX, maxY);
        return features.filter(feature => feature.boundingBox?.intersects(envelope) ?? false);
    }
}
