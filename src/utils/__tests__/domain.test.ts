import { describe, it, expect } from 'vitest';
import { linspace, parseDomainSpec, sampleDomain, validateDomainSpec } from '../domain';
import { DomainError } from '../errors';

describe('linspace', () => {
    it('should include both end points', () => {
        expect(Array.from(linspace(0, 1, 5))).toEqual([0, 0.25, 0.5, 0.75, 1]);
    });

    it('should end exactly on stop', () => {
        const values = linspace(-10, 10, 400);
        expect(values.length).toBe(400);
        expect(values[0]).toBe(-10);
        expect(values[399]).toBe(10);
    });

    it('should handle degenerate counts', () => {
        expect(Array.from(linspace(3, 4, 1))).toEqual([3]);
        expect(linspace(3, 4, 0).length).toBe(0);
    });
});

describe('parseDomainSpec', () => {
    it('should parse the text fields', () => {
        expect(parseDomainSpec({ xMin: ' -10 ', xMax: '10', pointCount: '400' })).toEqual({
            xMin: -10,
            xMax: 10,
            pointCount: 400,
        });
    });

    it('should truncate a fractional point count', () => {
        expect(parseDomainSpec({ xMin: '0', xMax: '1', pointCount: '12.9' }).pointCount).toBe(12);
    });

    it('should reject non-numeric fields', () => {
        expect(() => parseDomainSpec({ xMin: 'abc', xMax: '1', pointCount: '20' })).toThrow(
            'x-range and points must be numeric.'
        );
        expect(() => parseDomainSpec({ xMin: '0', xMax: '1', pointCount: '' })).toThrow(DomainError);
        expect(() => parseDomainSpec({ xMin: '0', xMax: '1', pointCount: '0b1111' })).toThrow(
            'x-range and points must be numeric.'
        );
        expect(() => parseDomainSpec({ xMin: '0x0', xMax: '1', pointCount: '20' })).toThrow(DomainError);
    });

    it('should reject an empty or inverted range', () => {
        expect(() => parseDomainSpec({ xMin: '2', xMax: '2', pointCount: '20' })).toThrow(
            'x max must be greater than x min.'
        );
        expect(() => parseDomainSpec({ xMin: '3', xMax: '2', pointCount: '20' })).toThrow(DomainError);
    });

    it('should reject fewer than 10 points', () => {
        expect(() => parseDomainSpec({ xMin: '0', xMax: '1', pointCount: '5' })).toThrow(
            'Use at least 10 points for a meaningful curve.'
        );
    });
});

describe('validateDomainSpec', () => {
    it('should reject a non-integer count', () => {
        expect(() => validateDomainSpec({ xMin: 0, xMax: 1, pointCount: 10.5 })).toThrow(DomainError);
    });

    it('should sample a valid spec', () => {
        expect(sampleDomain({ xMin: 0, xMax: 9, pointCount: 10 })[9]).toBe(9);
    });
});
