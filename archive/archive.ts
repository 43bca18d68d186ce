/**
 * Weather Archive - Ordered Store
 *
 * Records keyed by day timestamp (epoch seconds, UTC). Keys are unique and
 * iterate in ascending order. Records are copied on the way in and out; no
 * caller ever holds a reference into storage.
 */

import { copyRecord } from './record';
import type { TimestampedRecord, WeatherRecord } from './types';

function hasTimestamp(record: WeatherRecord): record is TimestampedRecord {
    return record.timestamp !== undefined;
}

export class WeatherArchive {
    private readonly records = new Map<number, WeatherRecord>();

    /** Sorted ascending; mirrors the key set of `records`. */
    private readonly sortedKeys: number[] = [];

    get size(): number {
        return this.records.size;
    }

    /**
     * Insert or replace the record at its timestamp.
     * A record without a timestamp cannot be placed and is dropped.
     */
    addData(record: WeatherRecord): void {
        if (!hasTimestamp(record)) return;

        const key = record.timestamp;
        if (!this.records.has(key)) {
            this.sortedKeys.splice(this.lowerBound(key), 0, key);
        }
        this.records.set(key, copyRecord(record));
    }

    /**
     * Insert a batch in order.
     * @returns how many records carried a timestamp and were placed
     */
    addAll(records: Iterable<WeatherRecord>): number {
        let placed = 0;
        for (const record of records) {
            if (!hasTimestamp(record)) continue;
            this.addData(record);
            placed++;
        }
        return placed;
    }

    retrieve(timestamp: number): WeatherRecord | undefined {
        const record = this.records.get(timestamp);
        return record ? copyRecord(record) : undefined;
    }

    /**
     * Records from `beginSec` to `endSec` inclusive, ascending.
     *
     * Both ends are anchors. No record at exactly `beginSec` gives an empty
     * result, even if later keys fall inside the range. No record at exactly
     * `endSec` runs the result on through the last stored record.
     */
    retrieveRange(beginSec: number, endSec: number): WeatherRecord[] {
        if (beginSec > endSec || !this.records.has(beginSec)) return [];

        const stop = this.records.has(endSec) ? this.lowerBound(endSec) + 1 : this.sortedKeys.length;
        const out: WeatherRecord[] = [];
        for (let i = this.lowerBound(beginSec); i < stop; i++) {
            const record = this.records.get(this.sortedKeys[i]);
            if (record) out.push(copyRecord(record));
        }
        return out;
    }

    /** All timestamps, ascending. */
    keys(): number[] {
        return [...this.sortedKeys];
    }

    /** Index of the first key >= `key`. */
    private lowerBound(key: number): number {
        let lo = 0;
        let hi = this.sortedKeys.length;
        while (lo < hi) {
            const mid = (lo + hi) >>> 1;
            if (this.sortedKeys[mid] < key) lo = mid + 1;
            else hi = mid;
        }
        return lo;
    }
}
