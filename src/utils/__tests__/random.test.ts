import { describe, it, expect } from 'vitest';
import { createSeededRandom, pickDistinctIndices } from '../random';

describe('createSeededRandom', () => {
    it('should stay inside [0, 1)', () => {
        const random = createSeededRandom(123);
        for (let i = 0; i < 1000; i++) {
            const value = random();
            expect(value).toBeGreaterThanOrEqual(0);
            expect(value).toBeLessThan(1);
        }
    });

    it('should repeat a sequence for the same seed', () => {
        const a = createSeededRandom(9);
        const b = createSeededRandom(9);
        expect([a(), a(), a()]).toEqual([b(), b(), b()]);
    });
});

describe('pickDistinctIndices', () => {
    it('should take the leading indices when the source returns 0', () => {
        expect(pickDistinctIndices(5, 2, () => 0)).toEqual([0, 1]);
    });

    it('should swap from the end when the source is close to 1', () => {
        expect(pickDistinctIndices(5, 2, () => 0.999)).toEqual([4, 0]);
    });

    it('should never exceed the population', () => {
        expect(pickDistinctIndices(1, 2, () => 0.5)).toEqual([0]);
        expect(pickDistinctIndices(0, 2, () => 0.5)).toEqual([]);
    });

    it('should return distinct indices', () => {
        const random = createSeededRandom(5);
        for (let i = 0; i < 50; i++) {
            const [a, b] = pickDistinctIndices(3, 2, random);
            expect(a).not.toBe(b);
        }
    });
});
