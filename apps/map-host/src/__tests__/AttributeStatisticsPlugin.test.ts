/**
 * @fileoverview Unit tests for AttributeStatisticsPlugin
 *
 * @module __tests__/AttributeStatisticsPlugin
 */

import { describe, it, expect, beforeEach } from "vitest";
import { Feature, type AttributeValue } from "@mapcore/engine";
import {
    AttributeStatisticsPlugin,
    createStatisticsSettings,
} from "../domain/plugins/AttributeStatisticsPlugin.js";
import { GeoJsonGeometry } from "../adapters/geometry/GeoJsonGeometry.js";
import { InMemoryLayerCollection, createLayer } from "../adapters/map/InMemoryLayerCollection.js";
import { startPlugins, type TestHost } from "./helpers.js";

function well(position: number, depth?: AttributeValue): Feature {
    return new Feature({
        id        : `w${position}`,
        geometry  : GeoJsonGeometry.point(position, position),
        attributes: depth === undefined ? {} : { depth },
    });
}

function createLayers(): InMemoryLayerCollection {
    return new InMemoryLayerCollection([
        createLayer("wells", [well(0, 10), well(1, 20), well(2, "deep"), well(3), well(4, 30)]),
        createLayer("empty"),
    ]);
}

describe("AttributeStatisticsPlugin", () => {
    let statistics: AttributeStatisticsPlugin;

    beforeEach(() => {
        statistics = new AttributeStatisticsPlugin();
    });

    describe("with default settings", () => {
        let host: TestHost;

        beforeEach(async () => {
            host = await startPlugins([statistics], createLayers());
        });

        // Scenario: Numeric values summarised, others skipped
        it("should summarise a numeric attribute", async () => {
            const progress: number[] = [];

            const result = await host.manager.executeAnalysis(
                "attribute-statistics",
                { layer: "wells", attribute: "depth" },
                { onProgress: (update) => { progress.push(update.progress); } }
            );

            expect(result.success).toBe(true);
            expect(result.results).toEqual({ count: 3, skipped: 2, sum: 60, min: 10, max: 30, mean: 20 });
            expect(progress).toEqual([0, 100]);
        });

        // Scenario: Extent limits the features considered
        it("should restrict to an extent", async () => {
            const result = await host.manager.executeAnalysis("attribute-statistics", {
                layer    : "wells",
                attribute: "depth",
                extent   : [0, 0, 1.5, 1.5],
            });

            expect(result.results).toEqual({ count: 2, skipped: 0, sum: 30, min: 10, max: 20, mean: 15 });
        });

        // Scenario: Empty layer
        it("should return nulls for an empty layer", async () => {
            const result = await host.manager.executeAnalysis("attribute-statistics", { layer: "empty", attribute: "depth" });

            expect(result.results).toEqual({ count: 0, skipped: 0, sum: 0, min: null, max: null, mean: null });
        });

        // Scenario: Unknown layer is an execution failure
        it("should fail for an unknown layer", async () => {
            const result = await host.manager.executeAnalysis("attribute-statistics", { layer: "nope", attribute: "depth" });

            expect(result).toMatchObject({
                success     : false,
                errorKind   : "ExecutionError",
                errorMessage: "Layer not found: nope",
            });
        });

        // Scenario: Parameter validation
        it("should validate parameters", () => {
            expect(host.manager.validateAnalysis("attribute-statistics", { layer: "wells" })).toEqual({
                valid       : false,
                errorMessage: "Parameter attribute is required",
            });
            expect(host.manager.validateAnalysis("attribute-statistics", { layer: "wells", attribute: "depth", extent: [1, 2] })).toEqual({
                valid       : false,
                errorMessage: "Parameter extent must be of type envelope",
            });
        });
    });

    // Scenario: Cancellation observed between batches
    it("should stop when cancelled", async () => {
        const settings = createStatisticsSettings();
        settings.set("batchSize", 1);
        statistics.applySettings(settings);
        const host = await startPlugins([statistics], createLayers());
        const controller = new AbortController();

        const result = await host.manager.executeAnalysis(
            "attribute-statistics",
            { layer: "wells", attribute: "depth" },
            {
                signal    : controller.signal,
                onProgress: (update) => {
                    if (update.progress === 20) {
                        controller.abort();
                    }
                },
            }
        );

        expect(result).toMatchObject({
            success     : false,
            errorKind   : "Cancelled",
            errorMessage: "Analysis Attribute Statistics was cancelled",
        });
    });

    // Scenario: batchSize must be positive
    it("should reject a zero batch size", () => {
        const settings = createStatisticsSettings();
        settings.set("batchSize", 0);

        expect(() => statistics.applySettings(settings)).toThrow("batchSize must be a positive integer");
    });
});
