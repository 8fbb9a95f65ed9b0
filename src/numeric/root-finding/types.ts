/**
 * @module root-finding/types
 * @description Type definitions shared by the root finding strategies
 */

import type { NumericError } from '../../core/errors';
import type { ConvergenceLog } from './convergence-log';

/**
 * Scalar function of one real variable
 */
export type RootFunction = (x: number) => number;

/**
 * Selectable root finding methods.
 * `InverseQuadraticInterpolation` is reserved and rejected at validation time.
 */
export const RootFindingMethods = {
    Bisection: 'bisection',
    Secant: 'secant',
    NewtonRaphson: 'newton-raphson',
    Brent: 'brent',
    InverseQuadraticInterpolation: 'inverse-quadratic-interpolation',
} as const;

export type RootFindingMethod = (typeof RootFindingMethods)[keyof typeof RootFindingMethods];

/**
 * Outcome of a strategy's stop test
 */
export type StopOutcome =
    | { ok: true; root: number }
    | { ok: false; error: NumericError };

/**
 * Result of a full root search
 */
export type RootFindingResult =
    | { ok: true; root: number; iterations: number }
    | { ok: false; error: NumericError; iterations: number };

/**
 * Common iteration contract driven by `IterationDriver`.
 *
 * Points and values are positionally aligned: `values[i]` is `f(points[i])`
 * for the points returned by the previous call.
 */
export interface RootFindingStrategy {
    /** Number of abscissas evaluated per iteration */
    readonly arity: number;
    /** Whether `derivativeValues` must be supplied */
    readonly requiresDerivative: boolean;

    /** First set of abscissas to evaluate */
    initialPoints(): number[];

    /** Consume evaluated values and produce the next abscissas */
    nextPoints(values: readonly number[], derivativeValues: readonly number[]): number[];

    /** `null` to continue, otherwise the converged root or a numerical failure */
    shouldStop(values: readonly number[], derivativeValues: readonly number[]): StopOutcome | null;

    /** Restore the state the strategy was constructed with */
    reset(): void;
}

/**
 * Top-level contract shared by driven strategies and Brent
 */
export interface RootFinder {
    readonly method: RootFindingMethod;

    /** Run a search; the convergence log is reset first */
    findRoot(): RootFindingResult;

    /** Trace of the most recent search (empty when logging is disabled) */
    getConvergenceLog(): ConvergenceLog;
}
