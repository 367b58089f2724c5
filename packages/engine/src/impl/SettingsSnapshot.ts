/**
 * @fileoverview Settings Snapshot
 *
 * Read-only copy of a settings object, taken when a plugin starts.
 *
 * @module @mapcore/engine/impl/SettingsSnapshot
 */

import type { PluginSettings, ValidationResult } from "../contracts/PluginSettings.js";
import { InvalidStateError } from "../contracts/Errors.js";

export class SettingsSnapshot implements PluginSettings {
    private readonly text: string;
    private readonly result: ValidationResult;

    constructor(source: PluginSettings) {
        this.text   = source.toSerializedForm();
        this.result = source.validate();
    }

    toSerializedForm(): string {
        return this.text;
    }

    /**
     * @throws InvalidStateError always
     */
    fromSerializedForm(_text: string): void {
        throw new InvalidStateError("modify settings", "Snapshot", "Settings snapshot is read-only");
    }

    /**
     * @throws InvalidStateError always
     */
    resetToDefaults(): void {
        throw new InvalidStateError("reset settings", "Snapshot", "Settings snapshot is read-only");
    }

    validate(): ValidationResult {
        return this.result;
    }
}
