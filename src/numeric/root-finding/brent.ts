/**
 * @module root-finding/brent
 * @description Brent's method: inverse quadratic interpolation, secant and
 * bisection steps inside a maintained bracket.
 *
 * Not driven by `IterationDriver`: the choice of step depends on three
 * retained points and the sizes of the last two steps.
 *
 * - `b`: best estimate so far, `|f(b)| <= |f(c)|`
 * - `c`: most recent point where `f` has the opposite sign to `f(b)`
 * - `a`: previous value of `b`
 * - `d`, `e`: last and second-to-last step sizes
 *
 * Reference: R. P. Brent, "Algorithms for Minimization without Derivatives",
 * Prentice-Hall, 1973, chapter 4.
 */

import { InvalidBracketError, MaxIterationsError } from '../../core/errors';
import type { Logger } from '../../core/logging';
import { ConvergenceLog } from './convergence-log';
import { logIteration, logSearch } from './search-logging';
import type { RootFinder, RootFindingResult, RootFunction } from './types';

/**
 * Brent finder configuration
 */
export interface BrentConfig {
    /** Bracket endpoints; `f` must change sign between them */
    x0: number;
    x1: number;
    /** Convergence threshold on bracket width and residual */
    tolerance: number;
    /** Target function */
    fn: RootFunction;
    /** Iteration ceiling (positive integer) */
    maxIterations: number;
    /** Record every evaluation in the convergence log */
    logConvergence?: boolean;
    /** Structured loggers notified of evaluations and outcomes */
    loggers?: Logger[];
}

function isStrictlyBetween(s: number, bound1: number, bound2: number): boolean {
    return bound1 < bound2
        ? s > bound1 && s < bound2
        : s > bound2 && s < bound1;
}

export class BrentRootFinder implements RootFinder {
    readonly method = 'brent' as const;

    private readonly x0: number;
    private readonly x1: number;
    private readonly tolerance: number;
    private readonly fn: RootFunction;
    private readonly maxIterations: number;
    private readonly logConvergence: boolean;
    private readonly loggers: Logger[];
    private readonly convergenceLog = new ConvergenceLog();

    constructor(config: BrentConfig) {
        this.x0 = config.x0;
        this.x1 = config.x1;
        this.tolerance = config.tolerance;
        this.fn = config.fn;
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

    private record(iteration: number, x: number[], fx: number[]): void {
        if (this.logConvergence) {
            this.convergenceLog.addEntry(iteration, x, fx);
        }
        logIteration(this.loggers, this.method, iteration, x, fx);
    }

    private search(): RootFindingResult {
        this.convergenceLog.reset();
        const tol = this.tolerance;
        const halfTol = 0.5 * tol;

        let a = this.x0;
        let b = this.x1;
        let fa = this.fn(a);
        let fb = this.fn(b);
        this.record(1, [a, b], [fa, fb]);

        if (fa * fb > 0) {
            return { ok: false, error: new InvalidBracketError(a, b, fa, fb), iterations: 1 };
        }
        if (fa === 0) {
            return { ok: true, root: a, iterations: 1 };
        }
        if (fb === 0) {
            return { ok: true, root: b, iterations: 1 };
        }

        let c = a;
        let fc = fa;
        let d = b - a;
        let e = d;

        for (let i = 1; i <= this.maxIterations; i++) {
            // Keep c on the opposite side of the root from b
            if (fb * fc > 0) {
                c = a;
                fc = fa;
                d = b - a;
                e = d;
            }

            // b is the best estimate
            if (Math.abs(fc) < Math.abs(fb)) {
                a = b;
                b = c;
                c = a;
                fa = fb;
                fb = fc;
                fc = fa;
            }

            const m = 0.5 * (c - b);
            if (Math.abs(m) < halfTol || Math.abs(fb) < tol) {
                return { ok: true, root: b, iterations: i };
            }

            let s = b + m;
            let interpolated = false;

            if (Math.abs(e) >= tol && Math.abs(fa) > Math.abs(fb)) {
                let candidate: number;
                if (fa !== fc && fb !== fc) {
                    // Inverse quadratic interpolation
                    candidate = a * fb * fc / ((fa - fb) * (fa - fc))
                        + b * fa * fc / ((fb - fa) * (fb - fc))
                        + c * fa * fb / ((fc - fa) * (fc - fb));
                } else {
                    // Secant
                    candidate = b - fb * (b - a) / (fb - fa);
                }

                if (
                    Number.isFinite(candidate) &&
                    isStrictlyBetween(candidate, (3 * c + b) / 4, b) &&
                    Math.abs(candidate - b) < 0.5 * Math.abs(e)
                ) {
                    s = candidate;
                    interpolated = true;
                }
            }

            if (interpolated) {
                e = d;
                d = s - b;
            } else {
                // Bisection
                d = m;
                e = d;
            }

            a = b;
            fa = fb;
            b = Math.abs(d) > halfTol ? b + d : b + (m > 0 ? halfTol : -halfTol);
            fb = this.fn(b);
            this.record(i + 1, [b], [fb]);
        }

        return {
            ok: false,
            error: new MaxIterationsError(this.maxIterations, 'Failed to converge'),
            iterations: this.maxIterations,
        };
    }
}
