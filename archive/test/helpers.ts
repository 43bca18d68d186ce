import { dateStringToEpochSeconds } from '../date';
import { createRecord, type RecordInit } from '../record';
import type { WeatherRecord } from '../types';

/** Epoch seconds for a YYYY-MM-DD fixture date. */
export function day(date: string): number {
    const seconds = dateStringToEpochSeconds(date);
    if (seconds === undefined) throw new Error(`Bad fixture date ${date}`);
    return seconds;
}

export function recordOn(date: string, init: Omit<RecordInit, 'timestamp'> = {}): WeatherRecord {
    return createRecord({ ...init, timestamp: day(date) });
}
