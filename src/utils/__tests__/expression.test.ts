import { describe, it, expect } from 'vitest';
import { evaluate, normalizeExpression } from '../expression';
import { linspace } from '../domain';
import { ExpressionError, ShapeMismatchError } from '../errors';

describe('evaluate', () => {
    const x = Float64Array.of(1, 2, 3);

    it('should square a linspace domain with the caret operator', () => {
        expect(Array.from(evaluate('x^2', linspace(-2, 2, 5)))).toEqual([4, 1, 0, 1, 4]);
    });

    it('should accept ** as exponentiation', () => {
        expect(Array.from(evaluate('x**2', linspace(-2, 2, 5)))).toEqual([4, 1, 0, 1, 4]);
    });

    it('should strip a leading "y ="', () => {
        expect(Array.from(evaluate('y = 2*x + 1', Float64Array.of(0, 1, 2)))).toEqual([1, 3, 5]);
    });

    it('should support implicit multiplication', () => {
        expect(Array.from(evaluate('2x', x))).toEqual([2, 4, 6]);
    });

    it('should return a vector of the domain length', () => {
        const domain = linspace(-10, 10, 400);
        const y = evaluate('sin(x) + 0.5*x', domain);
        expect(y).toBeInstanceOf(Float64Array);
        expect(y.length).toBe(400);
        expect(y[0]).toBeCloseTo(Math.sin(-10) - 5, 12);
    });

    it('should follow floating-point semantics for division by zero', () => {
        expect(Array.from(evaluate('1/0', x))).toEqual([Infinity, Infinity, Infinity]);
        expect(Array.from(evaluate('x/0', x))).toEqual([Infinity, Infinity, Infinity]);
        expect(Number.isNaN(evaluate('0/0', x)[0])).toBe(true);
    });

    it('should produce NaN outside a function domain', () => {
        const y = evaluate('log(x - 2)', x);
        expect(Number.isNaN(y[0])).toBe(true);
        expect(y[1]).toBe(-Infinity);
        expect(y[2]).toBe(0);
    });

    it('should broadcast an expression that does not use x', () => {
        expect(Array.from(evaluate('3', x))).toEqual([3, 3, 3]);
        expect(evaluate('pi', x)[2]).toBe(Math.PI);
    });

    it('should treat % between two operands as floored modulo', () => {
        expect(Array.from(evaluate('x % 2', x))).toEqual([1, 0, 1]);
    });

    it('should expose the elementary functions and constants', () => {
        const y = evaluate('pow(x, 2) + atan2(0, 1) + floor(e) + ceil(0.2) + abs(-1)', x);
        expect(Array.from(y)).toEqual([5, 8, 13]);
    });

    it('should resolve members of the numeric handle', () => {
        expect(Array.from(evaluate('np.sin(x)', x))).toEqual([Math.sin(1), Math.sin(2), Math.sin(3)]);
        expect(Array.from(evaluate('np.power(x, 2) + np.pi', x))).toEqual([1 + Math.PI, 4 + Math.PI, 9 + Math.PI]);
    });

    it('should be pure and leave the input untouched', () => {
        const domain = linspace(-1, 1, 11);
        const copy = Float64Array.from(domain);
        const first = evaluate('exp(-x)*sin(2*x)', domain);
        const second = evaluate('exp(-x)*sin(2*x)', domain);
        expect(Array.from(first)).toEqual(Array.from(second));
        expect(Array.from(domain)).toEqual(Array.from(copy));
    });

    it('should not hand back the input vector itself', () => {
        const y = evaluate('x', x);
        expect(y).not.toBe(x);
        expect(Array.from(y)).toEqual([1, 2, 3]);
    });

    describe('sandbox', () => {
        it('should reject statements and host access', () => {
            expect(() => evaluate("import os; os.system('x')", x)).toThrow(ExpressionError);
        });

        it('should reject unknown names', () => {
            expect(() => evaluate('foo(x)', x)).toThrow("Invalid expression: Unknown name 'foo'");
            expect(() => evaluate('constructor', x)).toThrow(ExpressionError);
            expect(() => evaluate('np.constructor', x)).toThrow(ExpressionError);
        });

        it('should reject member access on anything but np', () => {
            expect(() => evaluate('x.constructor', x)).toThrow(ExpressionError);
        });

        it('should reject assignments', () => {
            expect(() => evaluate('a = 3', x)).toThrow(ExpressionError);
        });

        it('should reject a postfix percent', () => {
            expect(() => evaluate('x + 10%', x)).toThrow(ExpressionError);
            expect(() => evaluate('10%', x)).toThrow("percentages are not supported; '%' is modulo");
        });

        it('should reject string literals', () => {
            expect(() => evaluate('"abc"', x)).toThrow(ExpressionError);
        });
    });

    describe('errors', () => {
        it('should reject an empty expression', () => {
            expect(() => evaluate('   ', x)).toThrow('Expression is empty.');
        });

        it('should wrap parse failures', () => {
            expect(() => evaluate('x +', x)).toThrow(ExpressionError);
        });

        it('should check argument counts', () => {
            expect(() => evaluate('pow(x)', x)).toThrow('Invalid expression: pow() takes 2 arguments, got 1');
            expect(() => evaluate('sin(x, 2)', x)).toThrow('Invalid expression: sin() takes 1 argument, got 2');
        });

        it('should reject a function used as a value', () => {
            expect(() => evaluate('sin + 1', x)).toThrow(ExpressionError);
        });

        it('should reject calling the variable', () => {
            expect(() => evaluate('x(2)', x)).toThrow(ExpressionError);
        });

        it('should raise a shape mismatch when x collapses to a scalar', () => {
            expect(() => evaluate('np.mean(x)', x)).toThrow(ShapeMismatchError);
        });
    });
});

describe('normalizeExpression', () => {
    it('should rewrite ** and drop a y = prefix', () => {
        expect(normalizeExpression('  Y = x**3 ')).toBe('x^3');
    });
});
