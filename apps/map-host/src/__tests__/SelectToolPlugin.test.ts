/**
 * @fileoverview Unit tests for SelectToolPlugin
 *
 * @module __tests__/SelectToolPlugin
 */

import { describe, it, expect, beforeEach } from "vitest";
import { Feature, ModifierKey, MouseButton, type EventPayload } from "@mapcore/engine";
import { SelectToolPlugin, createSelectSettings } from "../domain/plugins/SelectToolPlugin.js";
import { GeoJsonGeometry } from "../adapters/geometry/GeoJsonGeometry.js";
import { InMemoryLayerCollection, createLayer } from "../adapters/map/InMemoryLayerCollection.js";
import { key, mouseAt, startPlugins, type TestHost } from "./helpers.js";

function place(id: string, x: number, y: number): Feature {
    return new Feature({ id, geometry: GeoJsonGeometry.point(x, y) });
}

describe("SelectToolPlugin", () => {
    let select: SelectToolPlugin;
    let host: TestHost;
    let changes: EventPayload[];

    beforeEach(async () => {
        select = new SelectToolPlugin();
        const layers = new InMemoryLayerCollection([
            createLayer("cities", [place("a", 10, 10), place("b", 20, 20)]),
            createLayer("hidden", [place("h", 10, 10)], false),
        ]);
        host = await startPlugins([select], layers);
        host.manager.activateTool("select");
        changes = [];
        host.manager.eventBus.subscribe("selection:changed", (event) => {
            changes.push(event);
        });
    });

    const selectedIds = () => select.selection.map(s => `${s.layer}:${String(s.feature.id)}`);

    // Scenario: Click within tolerance selects from visible layers only
    it("should select features near the click", () => {
        const result = host.manager.dispatchMouseDown(mouseAt(MouseButton.Left, { x: 10.005, y: 10 }));

        expect(result.handledBy).toBe("select");
        expect(selectedIds()).toEqual(["cities:a"]);
        expect(changes[0]?.data).toEqual({
            count   : 1,
            features: [{ layer: "cities", id: "a" }],
            pluginId: "select",
        });
        expect(host.canvas.refreshCount).toBe(1);
    });

    // Scenario: Shift adds to the selection without duplicates
    it("should extend the selection with Shift", () => {
        host.manager.dispatchMouseDown(mouseAt(MouseButton.Left, { x: 10, y: 10 }));
        host.manager.dispatchMouseDown(mouseAt(MouseButton.Left, { x: 20, y: 20 }, [ModifierKey.Shift]));
        host.manager.dispatchMouseDown(mouseAt(MouseButton.Left, { x: 10, y: 10 }, [ModifierKey.Shift]));

        expect(selectedIds()).toEqual(["cities:a", "cities:b"]);
    });

    // Scenario: A plain click elsewhere replaces the selection
    it("should replace the selection on a plain click", () => {
        host.manager.dispatchMouseDown(mouseAt(MouseButton.Left, { x: 10, y: 10 }));
        host.manager.dispatchMouseDown(mouseAt(MouseButton.Left, { x: 50, y: 50 }));

        expect(select.selection).toEqual([]);
        expect(changes.map(c => c.data?.count)).toEqual([1, 0]);
    });

    // Scenario: Escape clears; with nothing selected it passes
    it("should clear the selection on Escape", () => {
        expect(host.manager.dispatchKeyDown(key("Escape")).handled).toBe(false);

        host.manager.dispatchMouseDown(mouseAt(MouseButton.Left, { x: 20, y: 20 }));
        expect(host.manager.dispatchKeyDown(key("Escape")).handled).toBe(true);
        expect(select.selection).toEqual([]);
    });

    // Scenario: Only left clicks with a coordinate select
    it("should ignore other buttons", () => {
        expect(host.manager.dispatchMouseDown(mouseAt(MouseButton.Right, { x: 10, y: 10 })).handled).toBe(false);
        expect(host.manager.dispatchMouseDown(mouseAt(MouseButton.Left, undefined)).handled).toBe(false);
    });

    // Scenario: Stopping clears the selection
    it("should clear the selection when stopped", async () => {
        host.manager.dispatchMouseDown(mouseAt(MouseButton.Left, { x: 10, y: 10 }));

        await host.manager.stopPlugin("select");

        expect(select.selection).toEqual([]);
    });

    // Scenario: Negative tolerance is invalid
    it("should reject a negative tolerance", () => {
        const settings = createSelectSettings();
        settings.set("tolerance", -1);

        expect(settings.validate()).toEqual({ valid: false, errorMessage: "tolerance must be a non-negative number" });
    });
});
