/**
 * @fileoverview Unit tests for the host configuration loader
 *
 * @module __tests__/loadHostConfig
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join, resolve } from "path";
import { Envelope, InvalidArgumentError } from "@mapcore/engine";
import {
    getDefaultHostConfig,
    loadHostConfig,
    loadHostConfigWithFallback,
} from "../config/loadHostConfig.js";

describe("loadHostConfig", () => {
    let dir: string;

    const write = (content: string): string => {
        const path = join(dir, "host.yml");
        writeFileSync(path, content, "utf-8");
        return path;
    };

    beforeEach(() => {
        dir = mkdtempSync(join(tmpdir(), "mapcore-config-"));
    });

    afterEach(() => {
        rmSync(dir, { recursive: true, force: true });
        vi.restoreAllMocks();
    });

    // Scenario: Every field read, relative paths resolved against the file
    it("should read a complete file", () => {
        const path = write([
            "engineVersion: \"1.4.0\"",
            "logLevel: debug",
            "pluginDirs:",
            "  - plugins",
            "  - /opt/map/plugins",
            "dataDir: data",
            "settingsDir: state/settings",
            "canvas:",
            "  width: 800",
            "  height: 600",
            "  extent: [0, 0, 10, 10]",
            "layers:",
            "  - name: cities",
            "    source: data/places.sqlite#cities",
            "    visible: false",
            "    options:",
            "      xColumn: lon",
            "  - name: notes",
            "    source: /srv/notes.db#notes",
            "",
        ].join("\n"));

        const config = loadHostConfig(path, {});

        expect(config.engineVersion).toBe("1.4.0");
        expect(config.logLevel).toBe("debug");
        expect(config.pluginDirs).toEqual([join(dir, "plugins"), "/opt/map/plugins"]);
        expect(config.dataDir).toBe(join(dir, "data"));
        expect(config.settingsDir).toBe(join(dir, "state", "settings"));
        expect(config.canvas.width).toBe(800);
        expect(config.canvas.height).toBe(600);
        expect(config.canvas.extent?.equals(new Envelope(0, 0, 10, 10))).toBe(true);
        expect(config.layers).toEqual([
            { name: "cities", source: join(dir, "data/places.sqlite#cities"), visible: false, options: { xColumn: "lon" } },
            { name: "notes", source: "/srv/notes.db#notes", visible: true },
        ]);
    });

    // Scenario: Empty file yields defaults under the file's directory
    it("should default every field", () => {
        const config = loadHostConfig(write(""), {});

        expect(config).toEqual(getDefaultHostConfig(dir));
        expect(config.pluginDirs).toEqual([join(dir, "user", "plugins")]);
        expect(config.canvas).toEqual({ width: 1024, height: 768 });
    });

    // Scenario: Missing file
    it("should throw when the file is missing", () => {
        const path = join(dir, "nope.yml");

        expect(() => loadHostConfig(path, {})).toThrow(`Host config file not found: ${path}`);
    });

    // Scenario: Top level must be a mapping
    it("should reject a non-mapping document", () => {
        expect(() => loadHostConfig(write("- a\n- b\n"), {})).toThrow("Invalid host config format: expected a mapping");
    });

    // Scenario: Invalid values name their key
    it("should reject invalid values", () => {
        expect(() => loadHostConfig(write("logLevel: loud\n"), {}))
            .toThrow("Invalid config: 'logLevel' must be one of debug, info, warn, error");
        expect(() => loadHostConfig(write("canvas:\n  width: -1\n"), {}))
            .toThrow("Invalid config: 'width' must be a positive number");
        expect(() => loadHostConfig(write("pluginDirs: plugins\n"), {}))
            .toThrow(InvalidArgumentError);
        expect(() => loadHostConfig(write("canvas:\n  extent: [0, 0, 1]\n"), {}))
            .toThrow("Invalid config: 'canvas.extent' must be [minX, minY, maxX, maxY]");
        expect(() => loadHostConfig(write("layers:\n  - name: cities\n"), {}))
            .toThrow("Invalid layer at index 0: missing or invalid 'name' or 'source'");
        expect(() => loadHostConfig(write("layers:\n  - name: a\n    source: a.db\n    visible: maybe\n"), {}))
            .toThrow("Invalid layer at index 0: 'visible' must be a boolean");
    });

    // Scenario: Environment overrides file values
    it("should apply environment overrides", () => {
        const path = write("engineVersion: \"1.0.0\"\nlogLevel: info\n");

        const config = loadHostConfig(path, {
            MAPCORE_ENGINE_VERSION: "2.0.0",
            MAPCORE_PLUGIN_DIRS   : "a, b,,",
            MAPCORE_DATA_DIR      : "/var/map/data",
            MAPCORE_LOG_LEVEL     : "warn",
        });

        expect(config.engineVersion).toBe("2.0.0");
        expect(config.pluginDirs).toEqual([resolve("a"), resolve("b")]);
        expect(config.dataDir).toBe("/var/map/data");
        expect(config.settingsDir).toBe(join(dir, "settings"));
        expect(config.logLevel).toBe("warn");
    });

    // Scenario: Invalid level from the environment
    it("should reject an invalid environment log level", () => {
        expect(() => loadHostConfig(write(""), { MAPCORE_LOG_LEVEL: "chatty" }))
            .toThrow("Invalid config: 'MAPCORE_LOG_LEVEL' must be one of debug, info, warn, error");
    });

    // Scenario: Fallback warns and uses defaults
    it("should fall back to defaults with a warning", () => {
        const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
        const path = join(dir, "nope.yml");

        const config = loadHostConfigWithFallback(path, { MAPCORE_LOG_LEVEL: "error" });

        expect(config.logLevel).toBe("error");
        expect(config.dataDir).toBe(join(dir, "plugin-data"));
        expect(warn).toHaveBeenCalledWith(`Failed to load host config from ${path}:`, `Host config file not found: ${path}`);
    });
});
