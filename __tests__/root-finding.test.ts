/**
 * Root Finding Strategy Tests
 * Bisection, Secant and Newton-Raphson under the iteration driver
 */

import { describe, it, expect } from 'vitest';
import {
    BisectionStrategy,
    SecantStrategy,
    NewtonRaphsonStrategy,
    IterationDriver,
} from '../src/numeric/root-finding';
import {
    ConfigurationError,
    ErrorCodes,
    MaxIterationsError,
    NumericalStallError,
} from '../src/core';
import {
    countCalls,
    cubic,
    cubicDerivative,
    CUBIC_ROOT,
    errorOf,
    rootOf,
} from './test-utils';

// ==================== Strategies ====================

describe('BisectionStrategy', () => {
    it('should start with the lower bound and the bracket midpoint', () => {
        const strategy = new BisectionStrategy(0, 2, 1e-6);
        expect(strategy.initialPoints()).toEqual([0, 1]);
    });

    it('should halve on a sign change and shift right otherwise', () => {
        const strategy = new BisectionStrategy(0, 2, 1e-6);
        strategy.initialPoints();

        // f = x² − 2: no sign change on [0, 1]
        expect(strategy.nextPoints([-2, -1])).toEqual([1, 2]);
        // sign change on [1, 2]
        expect(strategy.nextPoints([-1, 2])).toEqual([1, 1.5]);
    });

    it('should return a window end whose value is exactly zero', () => {
        const strategy = new BisectionStrategy(0, 2, 1e-6);
        strategy.initialPoints();

        expect(strategy.shouldStop([0, 1])).toEqual({ ok: true, root: 0 });
    });

    it('should restore the constructed bracket on reset', () => {
        const strategy = new BisectionStrategy(0, 2, 1e-6);
        strategy.initialPoints();
        strategy.nextPoints([-2, -1]);

        strategy.reset();
        expect(strategy.initialPoints()).toEqual([0, 1]);
    });

    it('should report evaluation arity 2 and no derivative', () => {
        const strategy = new BisectionStrategy(0, 1, 1e-6);
        expect(strategy.arity).toBe(2);
        expect(strategy.requiresDerivative).toBe(false);
    });
});

describe('SecantStrategy', () => {
    it('should evaluate both starting points first', () => {
        const strategy = new SecantStrategy(-400, 400, 1e-6);
        expect(strategy.initialPoints()).toEqual([-400, 400]);
    });

    it('should take the secant step and shift the window', () => {
        // f = 2x − 2: one secant step lands on the root
        const strategy = new SecantStrategy(0, 2, 1e-6);
        strategy.initialPoints();
        expect(strategy.nextPoints([-2, 2])).toEqual([2, 1]);
    });

    it('should stall when the function values coincide', () => {
        const strategy = new SecantStrategy(0, 1, 1e-6);
        strategy.initialPoints();

        const outcome = strategy.shouldStop([3, 3]);
        expect(outcome?.ok).toBe(false);
        if (outcome !== null && !outcome.ok) {
            expect(outcome.error).toBeInstanceOf(NumericalStallError);
            expect(outcome.error.message).toBe('Denominator too close to zero.');
        }
    });
});

describe('NewtonRaphsonStrategy', () => {
    it('should evaluate a single point and require a derivative', () => {
        const strategy = new NewtonRaphsonStrategy(3, 1e-6);
        expect(strategy.initialPoints()).toEqual([3]);
        expect(strategy.arity).toBe(1);
        expect(strategy.requiresDerivative).toBe(true);
    });

    it('should step by f/df', () => {
        const strategy = new NewtonRaphsonStrategy(3, 1e-6);
        strategy.initialPoints();
        // f = x² − 4 at 3: f = 5, df = 6
        expect(strategy.nextPoints([5], [6])).toEqual([3 - 5 / 6]);
    });

    it('should accept a converged step before testing the derivative', () => {
        // f = x³ near its triple root: f' is below machine epsilon but the step is tiny
        const strategy = new NewtonRaphsonStrategy(1e-9, 1e-6);
        strategy.initialPoints();

        expect(strategy.shouldStop([1e-27], [3e-18])).toEqual({ ok: true, root: 1e-9 - 1e-27 / 3e-18 });
    });

    it('should stall on a zero derivative with a non-zero value', () => {
        const strategy = new NewtonRaphsonStrategy(0, 1e-6);
        strategy.initialPoints();

        const outcome = strategy.shouldStop([-1], [0]);
        expect(outcome?.ok).toBe(false);
        if (outcome !== null && !outcome.ok) {
            expect(outcome.error.message).toBe('Derivative too close to zero.');
        }
    });

    it('should return the pending step target on convergence', () => {
        const strategy = new NewtonRaphsonStrategy(2, 1e-6);
        strategy.initialPoints();
        // f = x − 2 at the root: zero step
        expect(strategy.shouldStop([0], [1])).toEqual({ ok: true, root: 2 });
    });
});

// ==================== Iteration Driver ====================

describe('IterationDriver', () => {
    describe('Newton-Raphson', () => {
        it('should find the root of x³ − x − 2 from a distant guess', () => {
            const finder = new IterationDriver({
                strategy: new NewtonRaphsonStrategy(400, 1e-6),
                fn: cubic,
                derivative: cubicDerivative,
                maxIterations: 100,
                logConvergence: true,
            });

            const result = finder.findRoot();
            expect(Math.abs(rootOf(result) - CUBIC_ROOT)).toBeLessThan(1e-6);
            expect(result.iterations).toBe(18);
            expect(finder.getConvergenceLog().length).toBe(18);
        });

        it('should fail with a stall on a zero derivative', () => {
            const finder = new IterationDriver({
                strategy: new NewtonRaphsonStrategy(0, 1e-10),
                fn: x => x ** 3 - 1,
                derivative: x => 3 * x ** 2,
                maxIterations: 100,
            });

            const result = finder.findRoot();
            const error = errorOf(result);
            expect(error).toBeInstanceOf(NumericalStallError);
            expect(error.code).toBe(ErrorCodes.NUMERICAL_STALL);
            expect(result.iterations).toBe(1);
        });

        it('should exhaust the iteration budget on a diverging sequence', () => {
            // Newton on ∛x doubles the distance from the root every step
            const finder = new IterationDriver({
                strategy: new NewtonRaphsonStrategy(1, 1e-6),
                fn: x => Math.cbrt(x),
                derivative: x => 1 / (3 * Math.cbrt(x) ** 2),
                maxIterations: 20,
                logConvergence: true,
            });

            const result = finder.findRoot();
            const error = errorOf(result);
            expect(error).toBeInstanceOf(MaxIterationsError);
            expect(error.message).toBe('Maximum iterations reached without convergence.');
            expect(result.iterations).toBe(20);

            const entries = finder.getConvergenceLog().getEntries();
            expect(entries).toHaveLength(20);
            expect(entries[19].x[0]).toBeCloseTo(-524288, 6);
        });

        it('should converge next to a multiple root where the derivative vanishes', () => {
            const finder = new IterationDriver({
                strategy: new NewtonRaphsonStrategy(1e-9, 1e-6),
                fn: x => x ** 3,
                derivative: x => 3 * x ** 2,
                maxIterations: 100,
            });

            const result = finder.findRoot();
            expect(rootOf(result)).toBeCloseTo(2e-9 / 3, 15);
            expect(result.iterations).toBe(1);
        });

        it('should evaluate the derivative once per iteration', () => {
            const df = countCalls(x => 2 * x);
            const finder = new IterationDriver({
                strategy: new NewtonRaphsonStrategy(1.5, 1e-12),
                fn: x => x * x - 2,
                derivative: df.fn,
                maxIterations: 50,
            });

            const result = finder.findRoot();
            expect(rootOf(result)).toBeCloseTo(Math.SQRT2, 12);
            expect(df.calls()).toBe(result.iterations);
        });

        it('should reject a strategy that needs a missing derivative', () => {
            expect(() => new IterationDriver({
                strategy: new NewtonRaphsonStrategy(1, 1e-6),
                fn: cubic,
                maxIterations: 10,
            })).toThrow(ConfigurationError);
        });
    });

    describe('Secant', () => {
        it('should find the root of x³ − x − 2 from [-400, 400]', () => {
            const finder = new IterationDriver({
                strategy: new SecantStrategy(-400, 400, 1e-6),
                fn: cubic,
                maxIterations: 100,
                logConvergence: true,
            });

            const result = finder.findRoot();
            expect(Math.abs(rootOf(result) - CUBIC_ROOT)).toBeLessThan(1e-6);
            expect(result.iterations).toBe(13);
        });

        it('should record two points per iteration', () => {
            const finder = new IterationDriver({
                strategy: new SecantStrategy(-400, 400, 1e-6),
                fn: cubic,
                maxIterations: 100,
                logConvergence: true,
            });
            finder.findRoot();

            const entries = finder.getConvergenceLog().getEntries();
            expect(entries[0]).toEqual({ iteration: 1, x: [-400, 400], fx: [cubic(-400), cubic(400)] });
            for (const entry of entries) {
                expect(entry.x).toHaveLength(2);
                expect(entry.fx).toHaveLength(2);
            }
        });

        it('should fail with a stall on a flat function', () => {
            const finder = new IterationDriver({
                strategy: new SecantStrategy(0, 1, 1e-6),
                fn: () => 1,
                maxIterations: 10,
            });

            const result = finder.findRoot();
            expect(errorOf(result)).toBeInstanceOf(NumericalStallError);
            expect(result.iterations).toBe(1);
        });

        it('should fail after maxIterations', () => {
            const finder = new IterationDriver({
                strategy: new SecantStrategy(-400, 400, 1e-6),
                fn: cubic,
                maxIterations: 2,
            });

            const result = finder.findRoot();
            expect(errorOf(result).code).toBe(ErrorCodes.MAX_ITERATIONS);
            expect(result.iterations).toBe(2);
        });
    });

    describe('Bisection', () => {
        it('should find √2 within tolerance', () => {
            const finder = new IterationDriver({
                strategy: new BisectionStrategy(0, 2, 1e-9),
                fn: x => x * x - 2,
                maxIterations: 200,
            });

            const result = finder.findRoot();
            expect(Math.abs(rootOf(result) - Math.SQRT2)).toBeLessThan(1e-9);
            expect(result.iterations).toBe(44);
        });

        it('should find the root of x³ − x − 2 from [-400, 400]', () => {
            const finder = new IterationDriver({
                strategy: new BisectionStrategy(-400, 400, 1e-6),
                fn: cubic,
                maxIterations: 200,
            });

            expect(Math.abs(rootOf(finder.findRoot()) - CUBIC_ROOT)).toBeLessThan(1e-6);
        });

        it('should return an exact midpoint root after one iteration', () => {
            const finder = new IterationDriver({
                strategy: new BisectionStrategy(0, 10, 1e-6),
                fn: x => x - 5,
                maxIterations: 10,
            });

            expect(finder.findRoot()).toEqual({ ok: true, root: 5, iterations: 1 });
        });

        it('should return a lower bound that is an exact root', () => {
            const finder = new IterationDriver({
                strategy: new BisectionStrategy(0, 2, 1e-6),
                fn: x => x,
                maxIterations: 10,
            });

            expect(finder.findRoot()).toEqual({ ok: true, root: 0, iterations: 1 });
        });

        it('should log the evaluated windows', () => {
            const finder = new IterationDriver({
                strategy: new BisectionStrategy(0, 2, 1e-6),
                fn: x => x * x - 2,
                maxIterations: 3,
                logConvergence: true,
            });

            const result = finder.findRoot();
            expect(errorOf(result)).toBeInstanceOf(MaxIterationsError);
            expect(finder.getConvergenceLog().getEntries()).toEqual([
                { iteration: 1, x: [0, 1], fx: [-2, -1] },
                { iteration: 2, x: [1, 2], fx: [-1, 2] },
                { iteration: 3, x: [1, 1.5], fx: [-1, 0.25] },
            ]);
        });
    });

    describe('Convergence log', () => {
        it('should stay empty when logging is disabled', () => {
            const finder = new IterationDriver({
                strategy: new SecantStrategy(-400, 400, 1e-6),
                fn: cubic,
                maxIterations: 100,
            });

            expect(finder.findRoot().ok).toBe(true);
            expect(finder.getConvergenceLog().length).toBe(0);
        });

        it('should number iterations consecutively from 1', () => {
            const finder = new IterationDriver({
                strategy: new NewtonRaphsonStrategy(400, 1e-6),
                fn: cubic,
                derivative: cubicDerivative,
                maxIterations: 100,
                logConvergence: true,
            });
            finder.findRoot();

            const indices = finder.getConvergenceLog().getEntries().map(entry => entry.iteration);
            expect(indices).toEqual(Array.from({ length: indices.length }, (_, i) => i + 1));
        });
    });

    describe('Reuse', () => {
        it('should give identical results and logs on repeated searches', () => {
            const finder = new IterationDriver({
                strategy: new BisectionStrategy(0, 2, 1e-9),
                fn: x => x * x - 2,
                maxIterations: 200,
                logConvergence: true,
            });

            const first = finder.findRoot();
            const firstLength = finder.getConvergenceLog().length;
            const second = finder.findRoot();

            expect(second).toEqual(first);
            expect(finder.getConvergenceLog().length).toBe(firstLength);
        });

        it('should expose the strategy kind as the method', () => {
            const finder = new IterationDriver({
                strategy: new SecantStrategy(0, 1, 1e-6),
                fn: cubic,
                maxIterations: 10,
            });
            expect(finder.method).toBe('secant');
        });
    });
});
