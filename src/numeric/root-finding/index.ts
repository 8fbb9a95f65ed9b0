/**
 * @module root-finding
 * @description Scalar root finding
 *
 * Provides:
 * - Bisection, Secant and Newton-Raphson strategies behind a common iteration contract
 * - IterationDriver: evaluates the target function and enforces the iteration ceiling
 * - BrentRootFinder: self-contained hybrid method
 * - RootFinderBuilder / createRootFinder: validated construction
 * - ConvergenceLog: per-iteration diagnostic trace
 */

export * from './types';
export * from './convergence-log';
export * from './bisection';
export * from './secant';
export * from './newton-raphson';
export * from './driver';
export * from './brent';
export * from './config';
export * from './builder';
