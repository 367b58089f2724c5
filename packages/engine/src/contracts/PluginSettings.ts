/**
 * Plugin Settings Contract
 *
 * The only persisted state the engine defines. Settings round-trip through
 * a textual form; the host decides where that text lives.
 */

/**
 * Outcome of validating settings or parameters.
 */
export interface ValidationResult {
    readonly valid: boolean;

    /** Human-readable reason when `valid` is false */
    readonly errorMessage?: string;
}

/**
 * Plugin settings interface.
 *
 * @example
 * ```typescript
 * const text = settings.toSerializedForm();
 * other.fromSerializedForm(text);
 *
 * const { valid, errorMessage } = other.validate();
 * ```
 */
export interface PluginSettings {
    /** Serialize to text */
    toSerializedForm(): string;

    /**
     * Replace the current values with those parsed from `text`.
     *
     * @throws InvalidArgumentError when the text cannot be parsed
     */
    fromSerializedForm(text: string): void;

    /** Restore default values */
    resetToDefaults(): void;

    /** Check the current values */
    validate(): ValidationResult;
}

export const VALID: ValidationResult = Object.freeze({ valid: true });

/**
 * Build a failed validation result.
 */
export function invalid(errorMessage: string): ValidationResult {
    return { valid: false, errorMessage };
}
