export type RandomSource = () => number;

/**
 * Deterministic source in [0, 1) (mulberry32). Tests and reproducible
 * renders use this in place of `Math.random`.
 */
export const createSeededRandom = (seed: number): RandomSource => {
    let state = seed >>> 0;
    return () => {
        state = (state + 0x6d2b79f5) >>> 0;
        let t = state;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
};

// Partial Fisher-Yates over 0..total-1; returns min(count, total) distinct indices.
export const pickDistinctIndices = (
    total: number,
    count: number,
    random: RandomSource = Math.random
): number[] => {
    const take = Math.max(0, Math.min(count, total));
    const pool = Array.from({ length: total }, (_, i) => i);

    for (let i = 0; i < take; i++) {
        const offset = Math.min(total - i - 1, Math.floor(random() * (total - i)));
        const j = i + offset;
        const tmp = pool[i];
        pool[i] = pool[j];
        pool[j] = tmp;
    }

    return pool.slice(0, take);
};
