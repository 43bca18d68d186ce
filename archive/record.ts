/**
 * Weather Archive - Record Model
 *
 * Construction, copying, equality and debug formatting for WeatherRecord.
 */

import type { MeasurementField, WeatherRecord } from './types';

export const MEASUREMENT_FIELDS: readonly MeasurementField[] = [
    'maxTemp',
    'minTemp',
    'meanTemp',
    'gasConcentration'
];

export interface RecordInit {
    timestamp?: number;
    maxTemp?: number;
    minTemp?: number;
    meanTemp?: number;
    gasConcentration?: number;
}

function toSingle(value: number | undefined): number | undefined {
    return value === undefined ? undefined : Math.fround(value);
}

/**
 * Build a record. Measurements are stored at single precision; undefined
 * fields are left off the object entirely.
 */
export function createRecord(init: RecordInit = {}): WeatherRecord {
    const record: {
        timestamp?: number;
        maxTemp?: number;
        minTemp?: number;
        meanTemp?: number;
        gasConcentration?: number;
    } = {};

    if (init.timestamp !== undefined) record.timestamp = Math.trunc(init.timestamp);
    for (const field of MEASUREMENT_FIELDS) {
        const value = toSingle(init[field]);
        if (value !== undefined) record[field] = value;
    }
    return Object.freeze(record);
}

/** Shallow copy with the timestamp replaced. */
export function withTimestamp(record: WeatherRecord, timestamp: number): WeatherRecord {
    return createRecord({ ...record, timestamp });
}

export function copyRecord(record: WeatherRecord): WeatherRecord {
    return createRecord(record);
}

/** All five fields compare equal; absent equals absent. */
export function recordsEqual(a: WeatherRecord, b: WeatherRecord): boolean {
    if (a.timestamp !== b.timestamp) return false;
    return MEASUREMENT_FIELDS.every((field) => a[field] === b[field]);
}

function show(value: number | undefined): string {
    return value === undefined ? '' : String(value);
}

/**
 * Debug rendering, one `field:\tvalue` line per field.
 * Absent fields print with an empty value.
 */
export function formatRecord(record: WeatherRecord): string {
    return [
        `timestamp:\t${show(record.timestamp)}`,
        `maxTemp:\t${show(record.maxTemp)}`,
        `minTemp:\t${show(record.minTemp)}`,
        `meanTemp:\t${show(record.meanTemp)}`,
        `gasConcentration:\t${show(record.gasConcentration)}`
    ].join('\n');
}
