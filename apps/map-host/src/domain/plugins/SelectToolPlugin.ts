/**
 * @fileoverview Select Tool Plugin
 *
 * Click selection over visible layers. A left click selects the features
 * whose bounding box meets a small box around the clicked coordinate;
 * with Shift held the hits are added to the current selection. Escape
 * clears the selection.
 *
 * Publishes `selection:changed` whenever the selection changes.
 *
 * @module domain/plugins/SelectToolPlugin
 */

import {
    BaseToolPlugin,
    Envelope,
    ModifierKey,
    MouseButton,
    RecordSettings,
    VALID,
    invalid,
    type Feature,
    type KeyEventArgs,
    type MouseEventArgs,
} from "@mapcore/engine";

type SelectSettingsValues = {
    /** Half-width of the hit box, in map units */
    tolerance: number;
};

const DEFAULT_SETTINGS: SelectSettingsValues = {
    tolerance: 0.01,
};

export function createSelectSettings(): RecordSettings<SelectSettingsValues> {
    return new RecordSettings<SelectSettingsValues>({ ...DEFAULT_SETTINGS }, (values) =>
        values.tolerance >= 0 && Number.isFinite(values.tolerance)
            ? VALID
            : invalid("tolerance must be a non-negative number")
    );
}

/**
 * One selected feature and the layer it came from.
 */
export interface SelectedFeature {
    readonly layer: string;
    readonly feature: Feature;
}

export class SelectToolPlugin extends BaseToolPlugin {
    readonly toolName     = "Select Features";
    readonly toolCategory = "Selection";

    private selected: SelectedFeature[] = [];
    private tolerance = DEFAULT_SETTINGS.tolerance;

    constructor() {
        super({
            id         : "select",
            name       : "Select Tool",
            description: "Selects features of visible layers by clicking",
            version    : "1.0.0",
            author     : "mapcore",
            settings   : createSelectSettings(),
        });
    }

    get selection(): readonly SelectedFeature[] {
        return [...this.selected];
    }

    onMouseDown(e: MouseEventArgs): boolean {
        if (e.button !== MouseButton.Left || !e.worldCoordinate || !this.context) {
            return false;
        }

        const { x, y } = e.worldCoordinate;
        const box = new Envelope(x, y, x, y).buffer(this.tolerance);

        const hits: SelectedFeature[] = [];
        for (const layer of this.context.layers.list()) {
            if (!layer.visible) {
                continue;
            }
            for (const feature of layer.features.getInExtent(box)) {
                hits.push({ layer: layer.name, feature });
            }
        }

        if (e.modifiers.has(ModifierKey.Shift)) {
            const known = new Set(this.selected.map(s => s.feature));
            this.selected.push(...hits.filter(hit => !known.has(hit.feature)));
        }
        else {
            this.selected = hits;
        }

        this.publishSelection();
        return true;
    }

    onKeyDown(e: KeyEventArgs): boolean {
        if (e.key !== "Escape" || this.selected.length === 0) {
            return false;
        }
        this.selected = [];
        this.publishSelection();
        return true;
    }

    protected async onStart(): Promise<void> {
        this.tolerance = RecordSettings.snapshot(DEFAULT_SETTINGS, this.activeSettings).tolerance;
    }

    protected async onStop(): Promise<void> {
        this.selected = [];
    }

    private publishSelection(): void {
        this.publish("selection:changed", {
            count   : this.selected.length,
            features: this.selected.map(s => ({ layer: s.layer, id: s.feature.id })),
        });
        this.context?.mapCanvas.refresh();
    }
}
