/**
 * Weather Archive - Random Sources
 *
 * Resampling draws through a RandomSource so tests (and the CLI's --seed)
 * can fix the sequence.
 */

export interface RandomSource {
    /** Uniform float in [0, 1) */
    next(): number;
}

export const defaultRandomSource: RandomSource = {
    next: () => Math.random()
};

/** FNV-1a over the string, as an unsigned 32-bit integer. */
function hashString(s: string): number {
    let h = 2166136261;
    for (let i = 0; i < s.length; i++) {
        h ^= s.charCodeAt(i);
        h = Math.imul(h, 16777619);
    }
    return h >>> 0;
}

/**
 * Deterministic mulberry32 generator.
 * String seeds are hashed; numeric seeds are truncated to 32 bits.
 */
export function createSeededRandom(seed: number | string): RandomSource {
    let state = typeof seed === 'string' ? hashString(seed) : seed >>> 0;
    return {
        next(): number {
            state = (state + 0x6d2b79f5) >>> 0;
            let t = state;
            t = Math.imul(t ^ (t >>> 15), t | 1);
            t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
            return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
        }
    };
}

/**
 * Replays a fixed list of values, cycling when exhausted.
 * Values must lie in [0, 1).
 */
export function createSequenceRandom(values: readonly number[]): RandomSource {
    if (values.length === 0) throw new Error('Sequence random source needs at least one value');
    let i = 0;
    return {
        next(): number {
            const value = values[i % values.length];
            i++;
            return value;
        }
    };
}

/** Fisher-Yates shuffle in place. */
export function shuffleInPlace<T>(items: T[], random: RandomSource): T[] {
    for (let i = items.length - 1; i > 0; i--) {
        const j = Math.floor(random.next() * (i + 1));
        const tmp = items[i];
        items[i] = items[j];
        items[j] = tmp;
    }
    return items;
}
