/**
 * Example User Plugin
 * ===================
 *
 * A tool that reports the world coordinate under the mouse. It never
 * claims the event, so the tools behind it still see every move.
 *
 * To create your own plugin:
 * 1. Copy this file and its manifest (cursor-readout.plugin.yml)
 * 2. Change the id in both files; they must match
 * 3. Put your logic in the handlers or hooks
 * 4. Restart the host
 *
 * The manifest is discovered automatically from the user/plugins/ directory.
 */

import {
    BaseToolPlugin,
    RecordSettings,
    VALID,
    invalid,
    type MouseEventArgs,
} from "@mapcore/engine";

type CursorReadoutSettings = {
    /** Decimal places in the published coordinate */
    decimals: number;
};

const DEFAULTS: CursorReadoutSettings = { decimals: 4 };

export class CursorReadoutPlugin extends BaseToolPlugin {
    readonly toolName     = "Cursor Readout";
    readonly toolCategory = "Navigation";

    private decimals = DEFAULTS.decimals;

    constructor() {
        super({
            id         : "user-cursor-readout",
            name       : "Cursor Readout",
            description: "Example plugin - publishes the coordinate under the mouse",
            version    : "1.0.0",
            settings   : new RecordSettings<CursorReadoutSettings>({ ...DEFAULTS }, (values) =>
                Number.isInteger(values.decimals) && values.decimals >= 0
                    ? VALID
                    : invalid("decimals must be a non-negative integer")
            ),
        });
    }

    onMouseMove(e: MouseEventArgs): boolean {
        if (e.worldCoordinate) {
            this.publish("cursor:moved", {
                x: Number(e.worldCoordinate.x.toFixed(this.decimals)),
                y: Number(e.worldCoordinate.y.toFixed(this.decimals)),
            });
        }
        return false;
    }

    protected async onStart(): Promise<void> {
        this.decimals = RecordSettings.snapshot(DEFAULTS, this.activeSettings).decimals;
    }
}

export default () => new CursorReadoutPlugin();
