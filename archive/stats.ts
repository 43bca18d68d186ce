/**
 * Weather Archive - Range Statistics
 *
 * Per-variable mean over a range. Records missing the variable are skipped,
 * so only measured values contribute to the mean.
 */
/* eslint-disable no-console */

import type { WeatherArchive } from './archive';
import { epochSecondsToDateString } from './date';
import { resolveVariable } from './variables';
import type { WeatherRecord } from './types';

export interface MeanOptions {
    /** Called once for each record in range that lacks the variable. */
    onMissing?: (record: WeatherRecord, variable: string) => void;
}

export interface VariableSummary {
    /** NaN when no record in range carries the variable */
    mean: number;
    /** Records that contributed */
    count: number;
    /** Records in range without the variable */
    missing: number;
}

function logMissing(record: WeatherRecord, variable: string): void {
    console.warn('[mean] record missing variable; ignored', {
        date: record.timestamp === undefined ? null : epochSecondsToDateString(record.timestamp),
        variable
    });
}

/**
 * Mean, count and missing count for a variable over [beginSec, endSec].
 * Range semantics follow WeatherArchive.retrieveRange.
 *
 * @throws UnrecognizedVariableError for an unknown variable name
 */
export function summarizeVariable(
    archive: WeatherArchive,
    variable: string,
    beginSec: number,
    endSec: number,
    options: MeanOptions = {}
): VariableSummary {
    const field = resolveVariable(variable);
    const onMissing = options.onMissing ?? logMissing;

    let sum = 0;
    let count = 0;
    let missing = 0;
    for (const record of archive.retrieveRange(beginSec, endSec)) {
        const value = record[field];
        if (value === undefined) {
            missing++;
            onMissing(record, variable);
            continue;
        }
        sum += value;
        count++;
    }

    return { mean: count > 0 ? sum / count : NaN, count, missing };
}

/**
 * Mean of a variable over [beginSec, endSec]; NaN when the range holds no
 * usable value.
 */
export function meanOf(
    archive: WeatherArchive,
    variable: string,
    beginSec: number,
    endSec: number,
    options: MeanOptions = {}
): number {
    return summarizeVariable(archive, variable, beginSec, endSec, options).mean;
}
