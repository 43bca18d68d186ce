/**
 * Weather Archive - Core Type Definitions
 *
 * A record is one day's observations. Every measurement is optional: an
 * absent field means "not measured", which is distinct from a zero reading.
 */

// =============================================================================
// Records
// =============================================================================

/**
 * One day's weather observation.
 * Immutable: the archive copies records in and out.
 */
export interface WeatherRecord {
    /** Unix epoch seconds (UTC) at the start of the observed day */
    readonly timestamp?: number;

    /** Maximum daily temperature (°C), single precision */
    readonly maxTemp?: number;

    /** Minimum daily temperature (°C), single precision */
    readonly minTemp?: number;

    /** Mean daily temperature (°C), single precision */
    readonly meanTemp?: number;

    /** Trace-gas concentration (parts per trillion), single precision */
    readonly gasConcentration?: number;
}

/** A record that can be placed in the archive. */
export type TimestampedRecord = WeatherRecord & { readonly timestamp: number };

/** The four measured fields of a record. */
export type MeasurementField = 'maxTemp' | 'minTemp' | 'meanTemp' | 'gasConcentration';

/** Names accepted by aggregate queries (the JSON keys of the measurements). */
export type VariableName = 'tmax' | 'tmin' | 'tmean' | 'ppt';

// =============================================================================
// Wire Format
// =============================================================================

/** JSON shape of a record in input documents and query output. */
export interface WeatherRecordJson {
    date?: string;
    tmax?: number;
    tmin?: number;
    tmean?: number;
    ppt?: number;
}

// =============================================================================
// Ranges
// =============================================================================

/** Inclusive day range, both ends as epoch seconds at day boundaries. */
export interface DateRange {
    start: number;
    end: number;
    /** Source text, `YYYY-MM-DD|YYYY-MM-DD` */
    text: string;
}

/** Inclusive range of calendar years. */
export interface YearRange {
    low: number;
    high: number;
    /** Source text, `YYYY|YYYY` */
    text: string;
}

// =============================================================================
// Results
// =============================================================================

export type Result<T> =
    | { ok: true; value: T }
    | { ok: false; error: string };
