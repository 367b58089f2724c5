/**
 * @fileoverview Measure Tool Plugin
 *
 * Interactive distance measurement. Left clicks add vertices, a right
 * click or Enter completes the measurement, Escape discards it. Only
 * events carrying a world coordinate are handled.
 *
 * Publishes `measure:updated` after every change.
 *
 * @module domain/plugins/MeasureToolPlugin
 */

import {
    BaseToolPlugin,
    MouseButton,
    RecordSettings,
    VALID,
    invalid,
    type Coordinate,
    type KeyEventArgs,
    type MouseEventArgs,
} from "@mapcore/engine";
import { greatCircleKm } from "../../adapters/geometry/GeoJsonGeometry.js";

export type DistanceUnit = "km" | "mi" | "m";

type MeasureSettingsValues = {
    units: DistanceUnit;
    precision: number;
};

const DEFAULT_SETTINGS: MeasureSettingsValues = {
    units    : "km",
    precision: 2,
};

const KM_PER_UNIT: Record<DistanceUnit, number> = {
    km: 1,
    mi: 1.609344,
    m : 0.001,
};

function isDistanceUnit(value: string): value is DistanceUnit {
    return value in KM_PER_UNIT;
}

/**
 * Settings for the measure tool.
 */
export function createMeasureSettings(): RecordSettings<MeasureSettingsValues> {
    return new RecordSettings<MeasureSettingsValues>({ ...DEFAULT_SETTINGS }, (values) => {
        if (!isDistanceUnit(values.units)) {
            return invalid(`units must be one of: ${Object.keys(KM_PER_UNIT).join(", ")}`);
        }
        if (!Number.isInteger(values.precision) || values.precision < 0 || values.precision > 10) {
            return invalid("precision must be an integer between 0 and 10");
        }
        return VALID;
    });
}

/**
 * Completed or in-progress measurement.
 */
export interface Measurement {
    readonly points: readonly Coordinate[];

    /** Total length in the configured unit, rounded to the configured precision */
    readonly distance: number;
    readonly units: DistanceUnit;
    readonly completed: boolean;
}

/**
 * @example
 * ```typescript
 * await manager.register(new MeasureToolPlugin());
 * await manager.startAll();
 * manager.activateTool("measure");
 *
 * manager.eventBus.subscribe("measure:updated", (event) => {
 *     console.log(event.data);
 * });
 * ```
 */
export class MeasureToolPlugin extends BaseToolPlugin {
    readonly toolName     = "Measure Distance";
    readonly toolCategory = "Measurement";
    readonly toolIcon     = "icons/measure.svg";

    private points: Coordinate[] = [];
    private units: DistanceUnit = DEFAULT_SETTINGS.units;
    private precision = DEFAULT_SETTINGS.precision;
    private lastCompleted: Measurement | undefined;

    constructor() {
        super({
            id         : "measure",
            name       : "Measure Tool",
            description: "Measures great-circle distances along clicked points",
            version    : "1.0.0",
            author     : "mapcore",
            settings   : createMeasureSettings(),
        });
    }

    /** Points of the measurement in progress */
    get currentPoints(): readonly Coordinate[] {
        return [...this.points];
    }

    /** Most recently completed measurement */
    get lastMeasurement(): Measurement | undefined {
        return this.lastCompleted;
    }

    /**
     * Length of the measurement in progress, in the active unit.
     */
    get currentDistance(): number {
        return this.round(this.totalKm() / KM_PER_UNIT[this.units]);
    }

    onMouseDown(e: MouseEventArgs): boolean {
        if (!e.worldCoordinate) {
            return false;
        }

        if (e.button === MouseButton.Left) {
            this.points.push({ x: e.worldCoordinate.x, y: e.worldCoordinate.y });
            this.publishUpdate(false);
            return true;
        }
        if (e.button === MouseButton.Right) {
            return this.complete();
        }
        return false;
    }

    onKeyDown(e: KeyEventArgs): boolean {
        if (e.key === "Enter") {
            return this.complete();
        }
        if (e.key === "Escape") {
            const hadPoints = this.points.length > 0;
            this.clear();
            return hadPoints;
        }
        return false;
    }

    protected async onStart(): Promise<void> {
        const settings = RecordSettings.snapshot(DEFAULT_SETTINGS, this.activeSettings);
        this.units     = settings.units;
        this.precision = settings.precision;
    }

    protected onDeactivate(): void {
        this.points = [];
    }

    private complete(): boolean {
        if (this.points.length === 0) {
            return false;
        }
        this.lastCompleted = this.publishUpdate(true);
        this.logger.info("Measurement completed", {
            points  : this.lastCompleted.points.length,
            distance: this.lastCompleted.distance,
            units   : this.units,
        });
        this.points = [];
        return true;
    }

    private clear(): void {
        this.points = [];
        this.publish("measure:cleared");
    }

    private publishUpdate(completed: boolean): Measurement {
        const measurement: Measurement = {
            points  : [...this.points],
            distance: this.currentDistance,
            units   : this.units,
            completed,
        };
        this.publish("measure:updated", {
            points   : measurement.points.length,
            distance : measurement.distance,
            units    : measurement.units,
            completed: measurement.completed,
        });
        return measurement;
    }

    private totalKm(): number {
        let total = 0;
        for (let i = 1; i < this.points.length; i++) {
            const from = this.points[i - 1];
            const to = this.points[i];
            total += greatCircleKm([from.x, from.y], [to.x, to.y]);
        }
        return total;
    }

    private round(value: number): number {
        const factor = 10 ** this.precision;
        return Math.round(value * factor) / factor;
    }
}
