import { describe, it, expect } from 'vitest';
import { copyRecord, createRecord, formatRecord, recordsEqual, withTimestamp } from '../record';

describe('Record Model', () => {

    it('leaves absent measurements off the record', () => {
        const record = createRecord({ timestamp: 100, maxTemp: 0 });
        expect(record).toEqual({ timestamp: 100, maxTemp: 0 });
        expect('minTemp' in record).toBe(false);
    });

    it('stores measurements at single precision', () => {
        const record = createRecord({ maxTemp: 28.758 });
        expect(record.maxTemp).toBe(Math.fround(28.758));
    });

    it('is frozen', () => {
        expect(Object.isFrozen(createRecord({ timestamp: 1 }))).toBe(true);
    });

    it('compares every field, absent equal to absent', () => {
        const a = createRecord({ timestamp: 10, maxTemp: 1, gasConcentration: 2 });
        const b = createRecord({ timestamp: 10, maxTemp: 1, gasConcentration: 2 });
        expect(recordsEqual(a, b)).toBe(true);
        expect(recordsEqual(createRecord(), createRecord())).toBe(true);
    });

    it('distinguishes absent from zero', () => {
        const measured = createRecord({ timestamp: 10, minTemp: 0 });
        const unmeasured = createRecord({ timestamp: 10 });
        expect(recordsEqual(measured, unmeasured)).toBe(false);
    });

    it('distinguishes a missing timestamp', () => {
        expect(recordsEqual(createRecord({ maxTemp: 1 }), createRecord({ timestamp: 0, maxTemp: 1 }))).toBe(false);
    });

    it('re-stamps without touching the original', () => {
        const original = createRecord({ timestamp: 10, meanTemp: 5 });
        const moved = withTimestamp(original, 20);
        expect(moved).toEqual({ timestamp: 20, meanTemp: 5 });
        expect(original.timestamp).toBe(10);
    });

    it('copies into a distinct but equal object', () => {
        const original = createRecord({ timestamp: 10, meanTemp: 5 });
        const copy = copyRecord(original);
        expect(copy).not.toBe(original);
        expect(recordsEqual(copy, original)).toBe(true);
    });

    it('formats one line per field with blanks for absent values', () => {
        const text = formatRecord(createRecord({ timestamp: 86400, maxTemp: 20.5 }));
        expect(text).toBe(
            'timestamp:\t86400\nmaxTemp:\t20.5\nminTemp:\t\nmeanTemp:\t\ngasConcentration:\t'
        );
    });
});
