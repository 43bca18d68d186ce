/**
 * Weather Archive - Record Codec
 *
 * Decodes generic JSON values into WeatherRecord and encodes records back to
 * their JSON shape. Decoding never throws: failures come back as results.
 */

import { dateStringToEpochSeconds, epochSecondsToDateString, findDateString } from './date';
import { createRecord } from './record';
import type { Result, WeatherRecord, WeatherRecordJson } from './types';

export const DATE_KEY = 'date';
export const TMAX_KEY = 'tmax';
export const TMIN_KEY = 'tmin';
export const TMEAN_KEY = 'tmean';
export const PPT_KEY = 'ppt';

/** Significant digits kept when writing measurements. */
export const OUTPUT_PRECISION = 6;

export type DecodeResult =
    | { ok: true; record: WeatherRecord }
    | { ok: false; error: string };

function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function numberField(source: Record<string, unknown>, key: string): number | undefined {
    const value = source[key];
    return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

function dateField(source: Record<string, unknown>, key: string): number | undefined {
    const value = source[key];
    if (typeof value !== 'string') return undefined;
    const found = findDateString(value);
    return found === undefined ? undefined : dateStringToEpochSeconds(found);
}

/**
 * Decode one record object.
 *
 * Keys that are missing or of the wrong type leave the field absent. Only a
 * non-object input (including arrays and null) is a failure.
 */
export function decodeRecord(value: unknown): DecodeResult {
    if (!isPlainObject(value)) {
        return { ok: false, error: 'JSON does not match payload format' };
    }

    return {
        ok: true,
        record: createRecord({
            timestamp: dateField(value, DATE_KEY),
            maxTemp: numberField(value, TMAX_KEY),
            minTemp: numberField(value, TMIN_KEY),
            meanTemp: numberField(value, TMEAN_KEY),
            gasConcentration: numberField(value, PPT_KEY)
        })
    };
}

function roundForOutput(value: number): number {
    return Number(value.toPrecision(OUTPUT_PRECISION));
}

/**
 * Encode a record. Only present fields produce keys.
 */
export function encodeRecord(record: WeatherRecord): WeatherRecordJson {
    const json: WeatherRecordJson = {};
    if (record.timestamp !== undefined) json.date = epochSecondsToDateString(record.timestamp);
    if (record.maxTemp !== undefined) json.tmax = roundForOutput(record.maxTemp);
    if (record.minTemp !== undefined) json.tmin = roundForOutput(record.minTemp);
    if (record.meanTemp !== undefined) json.tmean = roundForOutput(record.meanTemp);
    if (record.gasConcentration !== undefined) json.ppt = roundForOutput(record.gasConcentration);
    return json;
}

/** Parse JSON text without throwing. */
export function parseJsonDocument(text: string): Result<unknown> {
    try {
        const value: unknown = JSON.parse(text);
        return { ok: true, value };
    } catch (error) {
        return { ok: false, error: error instanceof Error ? error.message : String(error) };
    }
}

export function formatJson(value: unknown): string {
    return JSON.stringify(value, null, 2);
}
