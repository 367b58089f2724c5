/**
 * @fileoverview Unit tests for RecordSettings and PluginSettingsStore
 *
 * @module @mapcore/engine/__tests__/Settings
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { RecordSettings } from "../impl/RecordSettings.js";
import { PluginSettingsStore } from "../impl/PluginSettingsStore.js";
import { PluginManager } from "../engine/PluginManager.js";
import { BasePlugin } from "../plugins/BasePlugin.js";
import { PluginType } from "../contracts/Plugin.js";
import { VALID, invalid } from "../contracts/PluginSettings.js";
import { InvalidArgumentError } from "../contracts/Errors.js";
import { createLayerCollection, createMockCanvas, createMockLogger } from "./helpers.js";

type UnitSettings = {
    units: string;
    precision: number;
    label: string | null;
};

function unitSettings(): RecordSettings<UnitSettings> {
    return new RecordSettings<UnitSettings>(
        { units: "km", precision: 2, label: null },
        v => (v.precision >= 0 ? VALID : invalid("precision must be >= 0"))
    );
}

describe("RecordSettings", () => {
    // Scenario: Serialize current values
    it("should serialize the current values", () => {
        const settings = unitSettings();
        settings.set("precision", 3);

        expect(settings.get("precision")).toBe(3);
        expect(settings.toSerializedForm()).toBe('{"units":"km","precision":3,"label":null}');
    });

    // Scenario: Unknown keys are ignored, known keys are read
    it("should read known keys and ignore unknown ones", () => {
        const settings = unitSettings();

        settings.fromSerializedForm('{"units":"mi","colour":"red","label":"Trail"}');

        expect(settings.values).toEqual({ units: "mi", precision: 2, label: "Trail" });
    });

    // Scenario: Wrong JSON type for a key
    it("should reject a value of the wrong type", () => {
        const settings = unitSettings();

        expect(() => settings.fromSerializedForm('{"precision":"high"}')).toThrow("Setting precision has the wrong type");
        expect(settings.get("precision")).toBe(2);
    });

    // Scenario: Malformed text
    it("should reject text that is not a JSON object", () => {
        const settings = unitSettings();

        expect(() => settings.fromSerializedForm("{oops")).toThrow(InvalidArgumentError);
        expect(() => settings.fromSerializedForm("[1, 2]")).toThrow("Settings must be a JSON object");
    });

    // Scenario: Reset and validate
    it("should reset to defaults and validate", () => {
        const settings = unitSettings();
        settings.set("precision", -1);

        expect(settings.validate()).toEqual({ valid: false, errorMessage: "precision must be >= 0" });

        settings.resetToDefaults();
        expect(settings.validate().valid).toBe(true);
        expect(settings.get("precision")).toBe(2);
    });

    // Scenario: Snapshot reads another settings object over defaults
    it("should snapshot values from another settings object", () => {
        const source = unitSettings();
        source.set("units", "m");

        const snapshot = RecordSettings.snapshot({ units: "km", precision: 0, label: null }, source);
        source.set("units", "ft");

        expect(snapshot).toEqual({ units: "m", precision: 2, label: null });
        expect(RecordSettings.snapshot({ units: "km" })).toEqual({ units: "km" });
    });
});

class UnitsPlugin extends BasePlugin {
    constructor() {
        super({ id: "units", name: "Units", version: "1.0.0", types: [PluginType.Service], settings: unitSettings() });
    }
}

describe("PluginSettingsStore", () => {
    let dir: string;
    let logger: ReturnType<typeof createMockLogger>;
    let store: PluginSettingsStore;

    beforeEach(() => {
        dir = mkdtempSync(join(tmpdir(), "mapcore-settings-"));
        logger = createMockLogger();
        store = new PluginSettingsStore({ directory: join(dir, "settings"), logger });
    });

    afterEach(() => {
        rmSync(dir, { recursive: true, force: true });
    });

    // Scenario: Save creates the directory; load reads it back
    it("should round-trip settings through a file", async () => {
        const saved = unitSettings();
        saved.set("units", "mi");

        await store.save("units", saved);
        const loaded = unitSettings();

        await expect(store.load("units", loaded)).resolves.toBe(true);
        expect(loaded.get("units")).toBe("mi");
        expect(readFileSync(join(dir, "settings", "units.json"), "utf-8")).toBe('{"units":"mi","precision":2,"label":null}');
    });

    // Scenario: No file means nothing to apply
    it("should return false when no file exists", async () => {
        await expect(store.load("units", unitSettings())).resolves.toBe(false);
    });

    // Scenario: Corrupt file leaves the current values alone
    it("should keep current values when the file cannot be parsed", async () => {
        const settings = unitSettings();
        await store.save("units", settings);
        writeFileSync(store.pathFor("units"), "not json", "utf-8");
        settings.set("precision", 5);

        await expect(store.load("units", settings)).resolves.toBe(false);

        expect(settings.get("precision")).toBe(5);
        expect(logger.warn).toHaveBeenCalledWith("Stored settings could not be parsed", expect.objectContaining({ pluginId: "units" }));
    });

    // Scenario: Stored values that fail validation are rejected; values applied earlier survive
    it("should reject stored values that do not validate", async () => {
        await store.save("units", unitSettings());
        writeFileSync(store.pathFor("units"), '{"units":"mi","precision":-4}', "utf-8");
        const settings = unitSettings();
        settings.set("precision", 7);

        await expect(store.load("units", settings)).resolves.toBe(false);

        expect(settings.toSerializedForm()).toBe('{"units":"km","precision":7,"label":null}');
        expect(logger.warn).toHaveBeenCalledWith("Stored settings are invalid", expect.objectContaining({
            error: "precision must be >= 0",
        }));
    });

    // Scenario: Invalid settings are never written
    it("should refuse to save invalid settings", async () => {
        const settings = unitSettings();
        settings.set("precision", -1);

        await expect(store.save("units", settings)).rejects.toThrow(InvalidArgumentError);
        expect(existsSync(join(dir, "settings"))).toBe(false);
    });

    // Scenario: Ids that would escape the directory
    it("should reject path-like plugin ids", () => {
        expect(() => store.pathFor("../escape")).toThrow(InvalidArgumentError);
        expect(() => store.pathFor("..")).toThrow(InvalidArgumentError);
    });

    // Scenario: Manager applies stored settings on load and saves on unload
    it("should be used by the plugin manager", async () => {
        const stored = unitSettings();
        stored.set("precision", 4);
        await store.save("units", stored);

        const manager = new PluginManager({
            engineVersion : "1.0.0",
            contextFactory: () => ({ mapCanvas: createMockCanvas(), layers: createLayerCollection() }),
            logger,
            settingsStore : store,
        });
        const plugin = new UnitsPlugin();

        await manager.load([plugin]);
        expect(plugin.getSettings()?.toSerializedForm()).toBe('{"units":"km","precision":4,"label":null}');

        const changed = unitSettings();
        changed.set("units", "nmi");
        plugin.applySettings(changed);
        await manager.unload("units");

        expect(readFileSync(store.pathFor("units"), "utf-8")).toBe('{"units":"nmi","precision":2,"label":null}');
    });
});
