/**
 * Brent Root Finder Tests
 */

import { describe, it, expect } from 'vitest';
import { BrentRootFinder, type BrentConfig } from '../src/numeric/root-finding';
import { ErrorCodes, InvalidBracketError, MaxIterationsError } from '../src/core';
import { countCalls, cubic, CUBIC_ROOT, errorOf, rootOf } from './test-utils';

function createBrent(overrides: Partial<BrentConfig> = {}): BrentRootFinder {
    return new BrentRootFinder({
        x0: 1,
        x1: 2,
        tolerance: 1e-6,
        fn: cubic,
        maxIterations: 100,
        ...overrides,
    });
}

describe('BrentRootFinder', () => {
    describe('Convergence', () => {
        it('should find the root of x³ − x − 2 on [1, 2]', () => {
            const result = createBrent().findRoot();
            expect(Math.abs(rootOf(result) - CUBIC_ROOT)).toBeLessThan(1e-6);
            expect(result.iterations).toBe(7);
        });

        it('should accept a bracket given in descending order', () => {
            const result = createBrent({ x0: 2, x1: 1 }).findRoot();
            expect(Math.abs(rootOf(result) - CUBIC_ROOT)).toBeLessThan(1e-6);
        });

        it('should converge from a wide bracket', () => {
            const result = createBrent({ x0: -400, x1: 400, maxIterations: 200 }).findRoot();
            expect(Math.abs(rootOf(result) - CUBIC_ROOT)).toBeLessThan(1e-6);
        });

        it('should solve cos(x) = x to high precision', () => {
            const result = createBrent({
                x0: 0,
                x1: 1,
                tolerance: 1e-10,
                fn: x => Math.cos(x) - x,
            }).findRoot();
            expect(Math.abs(rootOf(result) - 0.7390851332151607)).toBeLessThan(1e-10);
        });
    });

    describe('Endpoints', () => {
        it('should return a bracket endpoint that is an exact root', () => {
            const result = createBrent({ x0: 2, x1: 5, fn: x => x - 2 }).findRoot();
            expect(result).toEqual({ ok: true, root: 2, iterations: 1 });
        });

        it('should reject a bracket without a sign change after two evaluations', () => {
            const counted = countCalls(x => x * x + 1);
            const result = createBrent({ x0: 0, x1: 5, fn: counted.fn }).findRoot();

            const error = errorOf(result);
            expect(error).toBeInstanceOf(InvalidBracketError);
            expect(error.code).toBe(ErrorCodes.INVALID_BRACKET);
            expect(error.message).toBe('F(a) and F(b) must be of opposite signs');
            expect(result.iterations).toBe(1);
            expect(counted.calls()).toBe(2);
        });
    });

    describe('Iteration budget', () => {
        it('should fail after maxIterations', () => {
            const result = createBrent({ tolerance: 1e-12, maxIterations: 2 }).findRoot();

            const error = errorOf(result);
            expect(error).toBeInstanceOf(MaxIterationsError);
            expect(error.message).toBe('Failed to converge');
            expect(result.iterations).toBe(2);
        });
    });

    describe('Convergence log', () => {
        it('should record the bracket first and one point per later iteration', () => {
            const finder = createBrent({ logConvergence: true });
            const result = finder.findRoot();

            const entries = finder.getConvergenceLog().getEntries();
            expect(entries[0]).toEqual({ iteration: 1, x: [1, 2], fx: [-2, 4] });
            expect(entries).toHaveLength(result.iterations);
            for (const entry of entries.slice(1)) {
                expect(entry.x).toHaveLength(1);
                expect(entry.fx).toEqual([cubic(entry.x[0])]);
            }
            const indices = entries.map(entry => entry.iteration);
            expect(indices).toEqual(Array.from({ length: entries.length }, (_, i) => i + 1));
        });

        it('should stay empty when logging is disabled', () => {
            const finder = createBrent();
            finder.findRoot();
            expect(finder.getConvergenceLog().length).toBe(0);
        });

        it('should reset the log between searches', () => {
            const finder = createBrent({ logConvergence: true });
            finder.findRoot();
            const firstLength = finder.getConvergenceLog().length;

            finder.findRoot();
            expect(finder.getConvergenceLog().length).toBe(firstLength);
        });
    });
});
