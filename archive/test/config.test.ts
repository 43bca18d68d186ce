import { describe, it, expect } from 'vitest';
import { DEFAULT_PORT, loadConfig } from '../config';

describe('loadConfig', () => {
    it('falls back to defaults on an empty environment', () => {
        expect(loadConfig({})).toEqual({ dataFile: undefined, port: DEFAULT_PORT, sampleSeed: undefined });
    });

    it('reads and trims values', () => {
        expect(
            loadConfig({ WEATHER_DATA_FILE: ' data/sample.json ', PORT: '8080', WEATHER_SAMPLE_SEED: 'test-seed' })
        ).toEqual({ dataFile: 'data/sample.json', port: 8080, sampleSeed: 'test-seed' });
    });

    it('treats blank values as unset', () => {
        expect(loadConfig({ WEATHER_DATA_FILE: '   ', WEATHER_SAMPLE_SEED: '' }).dataFile).toBeUndefined();
        expect(loadConfig({ WEATHER_SAMPLE_SEED: '' }).sampleSeed).toBeUndefined();
    });

    it('ignores ports it cannot use', () => {
        expect(loadConfig({ PORT: 'abc' }).port).toBe(DEFAULT_PORT);
        expect(loadConfig({ PORT: '0' }).port).toBe(DEFAULT_PORT);
        expect(loadConfig({ PORT: '70000' }).port).toBe(DEFAULT_PORT);
        expect(loadConfig({ PORT: '65535' }).port).toBe(65535);
    });
});
