/**
 * @module root-finding/driver
 * @description Strategy-agnostic iteration loop
 *
 * Orchestrates the search loop: evaluate → record → stop test → next points.
 * The tolerance lives in the strategy; the driver only enforces the
 * iteration ceiling.
 */

import { ConfigurationError, MaxIterationsError } from '../../core/errors';
import type { Logger } from '../../core/logging';
import type { BisectionStrategy } from './bisection';
import { ConvergenceLog } from './convergence-log';
import type { NewtonRaphsonStrategy } from './newton-raphson';
import type { SecantStrategy } from './secant';
import { logIteration, logSearch } from './search-logging';
import type { RootFinder, RootFindingResult, RootFindingStrategy, RootFunction } from './types';

/**
 * Closed set of strategies that follow the common iteration contract
 */
export type IterativeStrategy = BisectionStrategy | SecantStrategy | NewtonRaphsonStrategy;

/**
 * Driver configuration
 */
export interface IterationDriverConfig {
    /** Strategy instance, owned by the driver from here on */
    strategy: IterativeStrategy;
    /** Target function */
    fn: RootFunction;
    /** Derivative of `fn`, evaluated at every point when present */
    derivative?: RootFunction;
    /** Iteration ceiling (positive integer) */
    maxIterations: number;
    /** Record every iteration in the convergence log */
    logConvergence?: boolean;
    /** Structured loggers notified of iterations and outcomes */
    loggers?: Logger[];
}

export class IterationDriver implements RootFinder {
    readonly method: IterativeStrategy['kind'];

    private readonly strategy: RootFindingStrategy;
    private readonly fn: RootFunction;
    private readonly derivative?: RootFunction;
    private readonly maxIterations: number;
    private readonly logConvergence: boolean;
    private readonly loggers: Logger[];
    private readonly convergenceLog = new ConvergenceLog();

    constructor(config: IterationDriverConfig) {
        if (config.strategy.requiresDerivative && config.derivative === undefined) {
            throw new ConfigurationError(`Derivative must be specified for ${config.strategy.kind}`);
        }

        this.strategy = config.strategy;
        this.method = config.strategy.kind;
        this.fn = config.fn;
        this.derivative = config.derivative;
        this.maxIterations = config.maxIterations;
        this.logConvergence = config.logConvergence ?? false;
        this.loggers = config.loggers ?? [];
    }

    findRoot(): RootFindingResult {
        const result = this.search();
        logSearch(this.loggers, this.method, result);
        return result;
    }

    getConvergenceLog(): ConvergenceLog {
        return this.convergenceLog;
    }

    private search(): RootFindingResult {
        this.convergenceLog.reset();
        this.strategy.reset();

        let iteration = 1;
        let points = this.strategy.initialPoints();

        while (true) {
            const values = points.map(x => this.fn(x));
            const derivative = this.derivative;
            const derivativeValues = derivative
                ? points.map(x => derivative(x))
                : [];

            if (this.logConvergence) {
                this.convergenceLog.addEntry(iteration, points, values);
            }
            logIteration(this.loggers, this.method, iteration, points, values);

            const outcome = this.strategy.shouldStop(values, derivativeValues);
            if (outcome !== null) {
                return outcome.ok
                    ? { ok: true, root: outcome.root, iterations: iteration }
                    : { ok: false, error: outcome.error, iterations: iteration };
            }

            if (iteration >= this.maxIterations) {
                return { ok: false, error: new MaxIterationsError(iteration), iterations: iteration };
            }

            iteration++;
            points = this.strategy.nextPoints(values, derivativeValues);
        }
    }
}
