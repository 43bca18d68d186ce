import { describe, it, expect } from 'vitest';
import { WeatherArchive } from '../archive';
import { addDays, epochSecondsToDateString } from '../date';
import { createSeededRandom, createSequenceRandom } from '../random';
import { sampleHistorical, yearSpan } from '../resample';
import { day, recordOn } from './helpers';

function juneArchive(): WeatherArchive {
    const archive = new WeatherArchive();
    archive.addData(recordOn('2020-06-01', { maxTemp: 20 }));
    archive.addData(recordOn('2021-06-01', { maxTemp: 25 }));
    archive.addData(recordOn('2022-06-01', { minTemp: 5 }));
    return archive;
}

/** Every June day of 2010-2020; maxTemp is the source year, minTemp the day of month. */
function decadeOfJunes(): WeatherArchive {
    const archive = new WeatherArchive();
    for (let year = 2010; year <= 2020; year++) {
        for (let d = 1; d <= 30; d++) {
            const date = `${year}-06-${String(d).padStart(2, '0')}`;
            archive.addData(recordOn(date, { maxTemp: year, minTemp: d }));
        }
    }
    return archive;
}

describe('Historical Resampling', () => {

    it('lists candidate years inclusively', () => {
        expect(yearSpan(2018, 2021)).toEqual([2018, 2019, 2020, 2021]);
        expect(yearSpan(2020, 2020)).toEqual([2020]);
        expect(yearSpan(2021, 2020)).toEqual([]);
    });

    it('takes the first shuffled year that has data and re-dates it', () => {
        // 0.99 leaves [2020, 2021, 2022] in order
        const result = sampleHistorical(
            juneArchive(), day('2023-06-01'), day('2023-06-01'), 2020, 2022, createSequenceRandom([0.99])
        );
        expect(result).toEqual([{ timestamp: day('2023-06-01'), maxTemp: 20 }]);
    });

    it('follows the shuffle order', () => {
        // 0 twice turns [2020, 2021, 2022] into [2021, 2022, 2020]
        const result = sampleHistorical(
            juneArchive(), day('2023-06-01'), day('2023-06-01'), 2020, 2022, createSequenceRandom([0])
        );
        expect(result).toEqual([{ timestamp: day('2023-06-01'), maxTemp: 25 }]);
    });

    it('keeps an observed record even when the queried variable is absent', () => {
        // [0, 0.9] turns [2020, 2021, 2022] into [2022, 2021, 2020]
        const result = sampleHistorical(
            juneArchive(), day('2023-06-01'), day('2023-06-01'), 2020, 2022, createSequenceRandom([0, 0.9])
        );
        expect(result).toEqual([{ timestamp: day('2023-06-01'), minTemp: 5 }]);
    });

    it('walks past years without data', () => {
        const archive = new WeatherArchive();
        archive.addData(recordOn('2018-06-01', { meanTemp: 14 }));
        // 0.99 keeps [2016, 2017, 2018]: two misses before the hit
        const result = sampleHistorical(
            archive, day('2023-06-01'), day('2023-06-01'), 2016, 2018, createSequenceRandom([0.99])
        );
        expect(result).toEqual([{ timestamp: day('2023-06-01'), meanTemp: 14 }]);
    });

    it('reshuffles for every day', () => {
        const archive = new WeatherArchive();
        for (const date of ['2020-06-01', '2020-06-02', '2021-06-01', '2021-06-02']) {
            archive.addData(recordOn(date, { maxTemp: Number(date.slice(0, 4)) }));
        }
        // day 1: 0.9 keeps [2020, 2021]; day 2: 0.1 swaps to [2021, 2020]
        const result = sampleHistorical(
            archive, day('2023-06-01'), day('2023-06-02'), 2020, 2021, createSequenceRandom([0.9, 0.1])
        );
        expect(result.map((r) => r.maxTemp)).toEqual([2020, 2021]);
        expect(result.map((r) => r.timestamp)).toEqual([day('2023-06-01'), day('2023-06-02')]);
    });

    it('omits days with no data in any candidate year', () => {
        const archive = new WeatherArchive();
        archive.addData(recordOn('2020-06-01', { maxTemp: 20 }));
        const result = sampleHistorical(
            archive, day('2023-05-31'), day('2023-06-02'), 2020, 2021, createSeededRandom(7)
        );
        expect(result).toEqual([{ timestamp: day('2023-06-01'), maxTemp: 20 }]);
    });

    it('skips Feb 29 in common candidate years', () => {
        const archive = new WeatherArchive();
        archive.addData(recordOn('2020-02-29', { maxTemp: 3 }));
        archive.addData(recordOn('2021-03-01', { maxTemp: 4 }));

        const leap = sampleHistorical(archive, day('2024-02-29'), day('2024-03-01'), 2019, 2021, createSeededRandom(1));
        expect(leap).toEqual([
            { timestamp: day('2024-02-29'), maxTemp: 3 },
            { timestamp: day('2024-03-01'), maxTemp: 4 }
        ]);

        const common = sampleHistorical(archive, day('2024-02-29'), day('2024-02-29'), 2021, 2023, createSeededRandom(1));
        expect(common).toEqual([]);
    });

    it('never leaves the requested days or years', () => {
        const start = day('2023-06-01');
        const end = day('2023-06-30');
        const result = sampleHistorical(decadeOfJunes(), start, end, 2012, 2014, createSeededRandom('bounds'));

        expect(result).toHaveLength(30);
        result.forEach((record, i) => {
            expect(record.timestamp).toBe(addDays(start, i));
            expect(record.maxTemp).toBeGreaterThanOrEqual(2012);
            expect(record.maxTemp).toBeLessThanOrEqual(2014);
            expect(record.minTemp).toBe(Number(epochSecondsToDateString(addDays(start, i)).slice(8)));
        });
    });

    it('returns no more records than requested days', () => {
        const result = sampleHistorical(juneArchive(), day('2023-05-25'), day('2023-06-05'), 2020, 2022);
        expect(result.length).toBeLessThanOrEqual(12);
        expect(result).toHaveLength(1);
        expect(result[0].timestamp).toBe(day('2023-06-01'));
    });

    it('repeats exactly under the same seed', () => {
        const archive = decadeOfJunes();
        const run = () =>
            sampleHistorical(archive, day('2023-06-01'), day('2023-06-30'), 2010, 2020, createSeededRandom('repeat'));
        expect(run()).toEqual(run());
    });

    it('is empty for a backwards date or year range', () => {
        const archive = juneArchive();
        expect(sampleHistorical(archive, day('2023-06-02'), day('2023-06-01'), 2020, 2022)).toEqual([]);
        expect(sampleHistorical(archive, day('2023-06-01'), day('2023-06-01'), 2022, 2020)).toEqual([]);
    });
});
