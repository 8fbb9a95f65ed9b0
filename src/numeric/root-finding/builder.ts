/**
 * @module root-finding/builder
 * @description Validated construction of root finders
 *
 * Two phases: populate a field-optional `RootFinderConfig` (directly or via
 * `RootFinderBuilder`), then convert it in a single validating step. Nothing
 * is evaluated until `findRoot()` is called on the result.
 *
 * @example
 * ```typescript
 * const finder = new RootFinderBuilder('newton-raphson')
 *     .fn(x => x ** 3 - x - 2)
 *     .derivative(x => 3 * x ** 2 - 1)
 *     .initialGuess(400)
 *     .tolerance(1e-6)
 *     .maxIterations(100)
 *     .build();
 *
 * const result = finder.findRoot();
 * if (result.ok) console.log(result.root); // ≈ 1.5213797
 * ```
 */

import { ConfigurationError, UnsupportedMethodError } from '../../core/errors';
import type { Logger } from '../../core/logging';
import { BisectionStrategy } from './bisection';
import { BrentRootFinder } from './brent';
import {
    DEFAULT_LOG_CONVERGENCE,
    isImplementedMethod,
    validateRootFinderConfig,
    type RootFinderConfig,
} from './config';
import { IterationDriver, type IterativeStrategy } from './driver';
import { NewtonRaphsonStrategy } from './newton-raphson';
import { SecantStrategy } from './secant';
import type { RootFinder, RootFindingMethod, RootFunction } from './types';

// ==================== Factory ====================

/**
 * Validate a configuration and assemble the matching root finder
 *
 * Warnings (ignored fields, a zero-width bracket) do not stop construction and
 * are not reported here; call `validateRootFinderConfig` to read them.
 *
 * @throws UnsupportedMethodError for unimplemented method selectors
 * @throws ConfigurationError listing every missing or malformed parameter
 */
export function createRootFinder(config: RootFinderConfig): RootFinder {
    if (!isImplementedMethod(config.method)) {
        throw new UnsupportedMethodError(config.method);
    }

    const validation = validateRootFinderConfig(config);
    const { fn, tolerance, maxIterations } = config;
    if (!validation.valid || fn === undefined || tolerance === undefined || maxIterations === undefined) {
        throw new ConfigurationError(
            validation.errors[0] ?? 'Invalid root finder configuration',
            validation.errors
        );
    }

    const logConvergence = config.logConvergence ?? DEFAULT_LOG_CONVERGENCE;
    const loggers = config.loggers ?? [];

    if (config.method === 'newton-raphson') {
        const { initialGuess, derivative } = config;
        if (initialGuess === undefined || derivative === undefined) {
            throw new ConfigurationError('Initial guess and derivative must be specified for newton-raphson');
        }
        return new IterationDriver({
            strategy: new NewtonRaphsonStrategy(initialGuess, tolerance),
            fn,
            derivative,
            maxIterations,
            logConvergence,
            loggers,
        });
    }

    const { boundaries } = config;
    if (boundaries === undefined) {
        throw new ConfigurationError(`Boundaries must be specified for ${config.method}`);
    }
    const [x0, x1] = boundaries;

    if (config.method === 'brent') {
        return new BrentRootFinder({ x0, x1, tolerance, fn, maxIterations, logConvergence, loggers });
    }

    const strategy: IterativeStrategy = config.method === 'bisection'
        ? new BisectionStrategy(x0, x1, tolerance)
        : new SecantStrategy(x0, x1, tolerance);

    return new IterationDriver({ strategy, fn, maxIterations, logConvergence, loggers });
}

// ==================== Builder ====================

/**
 * Fluent accumulation of a `RootFinderConfig`
 */
export class RootFinderBuilder {
    private config: RootFinderConfig;

    constructor(method: RootFindingMethod) {
        this.config = { method };
    }

    /** Starting point for methods that need one (Newton-Raphson) */
    initialGuess(guess: number): this {
        this.config.initialGuess = guess;
        return this;
    }

    /** Bracketing pair for Bisection, Secant and Brent */
    boundaries(x0: number, x1: number): this {
        this.config.boundaries = [x0, x1];
        return this;
    }

    tolerance(tol: number): this {
        this.config.tolerance = tol;
        return this;
    }

    maxIterations(max: number): this {
        this.config.maxIterations = max;
        return this;
    }

    logConvergence(log: boolean): this {
        this.config.logConvergence = log;
        return this;
    }

    /** Target function; held by reference, never called during build */
    fn(fn: RootFunction): this {
        this.config.fn = fn;
        return this;
    }

    derivative(derivative: RootFunction): this {
        this.config.derivative = derivative;
        return this;
    }

    loggers(loggers: Logger[]): this {
        this.config.loggers = loggers;
        return this;
    }

    /** Snapshot of the accumulated configuration */
    toConfig(): RootFinderConfig {
        return { ...this.config };
    }

    build(): RootFinder {
        return createRootFinder(this.toConfig());
    }
}
