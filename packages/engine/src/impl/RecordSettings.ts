/**
 * @fileoverview Record-backed plugin settings
 *
 * JSON settings over a flat typed record with defaults and an optional
 * validator. Parsed keys that are not in the defaults are ignored, and a
 * value whose JSON type differs from its default is rejected.
 *
 * @module @mapcore/engine/impl/RecordSettings
 */

import type { PluginSettings, ValidationResult } from "../contracts/PluginSettings.js";
import { VALID } from "../contracts/PluginSettings.js";
import { InvalidArgumentError } from "../contracts/Errors.js";

/**
 * Values a settings record may hold.
 */
export type SettingValue = string | number | boolean | null | readonly string[] | readonly number[];

export type SettingsRecord = Record<string, SettingValue>;

/**
 * Validator applied by validate(); return VALID or invalid(message).
 */
export type SettingsValidator<T extends SettingsRecord> = (values: Readonly<T>) => ValidationResult;

/**
 * @example
 * ```typescript
 * const settings = new RecordSettings(
 *     { units: "km", precision: 2 },
 *     v => v.precision >= 0 ? VALID : invalid("precision must be >= 0"),
 * );
 *
 * settings.set("precision", 3);
 * settings.toSerializedForm(); // '{"units":"km","precision":3}'
 * ```
 */
export class RecordSettings<T extends SettingsRecord> implements PluginSettings {
    private readonly defaults: Readonly<T>;
    private current: T;

    constructor(defaults: T, private readonly validator?: SettingsValidator<T>) {
        this.defaults = Object.freeze({ ...defaults });
        this.current = { ...defaults };
    }

    /**
     * Values of `source` read over `defaults`, detached from `source`.
     * Plugins use this to read their activeSettings at start.
     *
     * @throws InvalidArgumentError when `source` does not serialize to compatible JSON
     */
    static snapshot<T extends SettingsRecord>(defaults: T, source?: PluginSettings): Readonly<T> {
        const copy = new RecordSettings(defaults);
        if (source) {
            copy.fromSerializedForm(source.toSerializedForm());
        }
        return copy.values;
    }

    /** Current values, frozen */
    get values(): Readonly<T> {
        return Object.freeze({ ...this.current });
    }

    get<K extends keyof T>(key: K): T[K] {
        return this.current[key];
    }

    set<K extends keyof T>(key: K, value: T[K]): void {
        this.current[key] = value;
    }

    toSerializedForm(): string {
        return JSON.stringify(this.current);
    }

    /**
     * @throws InvalidArgumentError when the text is not a JSON object or a value has the wrong type
     */
    fromSerializedForm(text: string): void {
        let parsed: unknown;
        try {
            parsed = JSON.parse(text);
        }
        catch (error) {
            throw new InvalidArgumentError(
                "text",
                `Settings are not valid JSON: ${error instanceof Error ? error.message : String(error)}`
            );
        }

        if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
            throw new InvalidArgumentError("text", "Settings must be a JSON object");
        }

        const next: T = { ...this.current };
        for (const [key, value] of Object.entries(parsed)) {
            if (!Object.prototype.hasOwnProperty.call(this.defaults, key)) {
                continue;
            }
            const fallback = this.defaults[key];
            if (!sameShape(value, fallback)) {
                throw new InvalidArgumentError(key, `Setting ${key} has the wrong type`);
            }
            Object.assign(next, { [key]: value });
        }
        this.current = next;
    }

    resetToDefaults(): void {
        this.current = { ...this.defaults };
    }

    validate(): ValidationResult {
        return this.validator ? this.validator(this.values) : VALID;
    }
}

function sameShape(value: unknown, fallback: SettingValue): boolean {
    if (fallback === null) {
        return value === null || ["string", "number", "boolean"].includes(typeof value);
    }
    if (Array.isArray(fallback)) {
        return Array.isArray(value) && value.every(item => typeof item === "string" || typeof item === "number");
    }
    return typeof value === typeof fallback;
}
