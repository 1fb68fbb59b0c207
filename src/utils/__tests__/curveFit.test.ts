import { describe, it, expect } from 'vitest';
import { fitLinear, formatLineEquation } from '../curveFit';

// Direct solution of the 2x2 normal equations [n Sx; Sx Sxx][b; m] = [Sy; Sxy]
const solveNormalEquations = (xs: number[], ys: number[]) => {
    const n = xs.length;
    let sx = 0, sy = 0, sxx = 0, sxy = 0;
    for (let i = 0; i < n; i++) {
        sx += xs[i];
        sy += ys[i];
        sxx += xs[i] * xs[i];
        sxy += xs[i] * ys[i];
    }
    const det = n * sxx - sx * sx;
    return {
        slope: (n * sxy - sx * sy) / det,
        intercept: (sy * sxx - sx * sxy) / det,
    };
};

describe('fitLinear', () => {
    it('should fit a sampled parabola with a flat line through its mean', () => {
        const fit = fitLinear([-2, -1, 0, 1, 2], [4, 1, 0, 1, 4]);
        expect(fit).not.toBeNull();
        expect(fit!.slope).toBe(0);
        expect(fit!.intercept).toBe(2);
        expect(fit!.r2).toBe(0);
        expect(fit!.equation).toBe('y = 0x + 2');
    });

    it('should match the normal-equation solution', () => {
        const xs = [0, 1, 2, 4];
        const ys = [1, 3, 2, 7];
        const expected = solveNormalEquations(xs, ys);
        const fit = fitLinear(xs, ys);

        expect(fit!.slope).toBeCloseTo(expected.slope, 9);
        expect(fit!.intercept).toBeCloseTo(expected.intercept, 9);
        expect(fit!.slope).toBeCloseTo(1.4, 9);
        expect(fit!.intercept).toBeCloseTo(0.8, 9);
        expect(fit!.equation).toBe('y = 1.4x + 0.8');
    });

    it('should report predictions at the input x values', () => {
        const fit = fitLinear([0, 1, 2], [-3, -1, 1]);
        expect(Array.from(fit!.predicted)).toEqual([-3, -1, 1]);
        expect(fit!.r2).toBe(1);
        expect(fit!.equation).toBe('y = 2x - 3');
    });

    it('should return NaN r2 when y is constant', () => {
        const fit = fitLinear([0, 1, 2], [5, 5, 5]);
        expect(fit!.slope).toBe(0);
        expect(Number.isNaN(fit!.r2)).toBe(true);
    });

    it('should return null for a singular system', () => {
        expect(fitLinear([1], [1])).toBeNull();
        expect(fitLinear([1, 1, 1], [1, 2, 3])).toBeNull();
        expect(fitLinear([1, 1], [1, 2])).toBeNull();
    });

    it('should return null when the sums overflow', () => {
        expect(fitLinear([1e308, 1.5e308, 1.7e308], [1, 2, 3])).toBeNull();
    });
});

describe('formatLineEquation', () => {
    it('should format to four significant digits', () => {
        expect(formatLineEquation(0.123456, -1234.5)).toBe('y = 0.1235x - 1235');
    });
});
