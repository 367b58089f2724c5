/**
 * @fileoverview Unit tests for small contract helpers: FlagSet, loggers, errors
 *
 * @module @mapcore/engine/__tests__/contracts
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import { FlagSet } from "../contracts/FlagSet.js";
import { PluginType } from "../contracts/Plugin.js";
import { createConsoleLogger, createScopedLogger, isLogLevel } from "../contracts/Logger.js";
import {
    CancelledError,
    DependencyError,
    InvalidStateError,
    describeError,
    isErrorKind,
    toError,
} from "../contracts/Errors.js";
import { createMockLogger } from "./helpers.js";

describe("FlagSet", () => {
    // Scenario: Membership queries
    it("should answer has, hasAll and hasAny", () => {
        const flags = FlagSet.of<PluginType>(PluginType.Tool, PluginType.Analysis);

        expect(flags.has(PluginType.Tool)).toBe(true);
        expect(flags.hasAll([PluginType.Tool, PluginType.Analysis])).toBe(true);
        expect(flags.hasAll([PluginType.Tool, PluginType.Service])).toBe(false);
        expect(flags.hasAny([PluginType.Service, PluginType.Analysis])).toBe(true);
        expect(flags.hasAny([])).toBe(false);
    });

    // Scenario: Sets are immutable; operations return new sets
    it("should return new sets from with, without and union", () => {
        const base = FlagSet.of<PluginType>(PluginType.Tool);

        const more = base.with(PluginType.Renderer);
        const less = more.without(PluginType.Tool);

        expect(base.size).toBe(1);
        expect(more.toArray()).toEqual([PluginType.Tool, PluginType.Renderer]);
        expect(less.toArray()).toEqual([PluginType.Renderer]);
        expect(base.union([PluginType.Tool]).size).toBe(1);
    });

    // Scenario: Equality ignores order; duplicates collapse
    it("should compare by members", () => {
        const a = FlagSet.of(PluginType.Tool, PluginType.Service, PluginType.Tool);
        const b = FlagSet.from([PluginType.Service, PluginType.Tool]);

        expect(a.equals(b)).toBe(true);
        expect(a.size).toBe(2);
        expect(FlagSet.empty<PluginType>().isEmpty).toBe(true);
        expect(a.toString()).toBe("Tool | Service");
    });
});

describe("loggers", () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    // Scenario: Messages below the minimum level are dropped
    it("should filter console output by level", () => {
        const info = vi.spyOn(console, "info").mockImplementation(() => undefined);
        const debug = vi.spyOn(console, "debug").mockImplementation(() => undefined);
        const logger = createConsoleLogger("host", "info");

        logger.debug("hidden");
        logger.info("Loaded", { count: 2 });

        expect(debug).not.toHaveBeenCalled();
        expect(info).toHaveBeenCalledWith("[INFO] [host] Loaded", { count: 2 });
    });

    // Scenario: Scoped logger prefixes and forwards
    it("should prefix scoped messages", () => {
        const parent = createMockLogger();
        const scoped = createScopedLogger(parent, "plugin:measure");

        scoped.warn("Slow", { ms: 40 });

        expect(parent.warn).toHaveBeenCalledWith("[plugin:measure] Slow", { ms: 40 });
    });

    // Scenario: Level names
    it("should recognise level names", () => {
        expect(isLogLevel("warn")).toBe(true);
        expect(isLogLevel("verbose")).toBe(false);
        expect(isLogLevel(3)).toBe(false);
    });
});

describe("errors", () => {
    // Scenario: Errors carry a kind and a default message
    it("should build default messages", () => {
        expect(new InvalidStateError("start", "Disabled").message).toBe("Cannot start in state Disabled");
        expect(new DependencyError("b", ["a", "c"]).message).toBe("Plugin b has unmet dependencies: a, c");
        expect(new CancelledError().name).toBe("CancelledError");
    });

    // Scenario: Narrowing helpers
    it("should narrow thrown values", () => {
        expect(isErrorKind(new CancelledError(), "Cancelled")).toBe(true);
        expect(isErrorKind(new Error("x"), "Cancelled")).toBe(false);
        expect(toError("plain").message).toBe("plain");
        expect(describeError(42)).toBe("42");
    });
});
