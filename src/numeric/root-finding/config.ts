/**
 * @module root-finding/config
 * @description Root finder configuration and validation
 *
 * A configuration is a plain record with optional fields. Validation reports
 * every problem at once and never calls the target function.
 */

import type { Logger } from '../../core/logging';
import { RootFindingMethods, type RootFindingMethod, type RootFunction } from './types';

// ==================== Types ====================

/**
 * Field-optional root finder configuration
 */
export interface RootFinderConfig {
    /** Method to run */
    method: RootFindingMethod;
    /** Starting point (Newton-Raphson) */
    initialGuess?: number;
    /** Bracketing pair (Bisection, Secant, Brent) */
    boundaries?: [number, number];
    /** Convergence threshold on argument and/or residual */
    tolerance?: number;
    /** Iteration ceiling */
    maxIterations?: number;
    /** Record a convergence log (default: false) */
    logConvergence?: boolean;
    /** Target function */
    fn?: RootFunction;
    /** Derivative of `fn` (Newton-Raphson) */
    derivative?: RootFunction;
    /** Structured loggers */
    loggers?: Logger[];
}

/**
 * Validation result for RootFinderConfig
 */
export interface ValidationResult {
    valid: boolean;
    errors: string[];
    warnings: string[];
}

// ==================== Constants ====================

export const DEFAULT_LOG_CONVERGENCE = false;

const BRACKETING_METHODS: readonly RootFindingMethod[] = [
    RootFindingMethods.Bisection,
    RootFindingMethods.Secant,
    RootFindingMethods.Brent,
];

const IMPLEMENTED_METHODS: readonly RootFindingMethod[] = [
    ...BRACKETING_METHODS,
    RootFindingMethods.NewtonRaphson,
];

// ==================== Validation ====================

export function isImplementedMethod(method: RootFindingMethod): boolean {
    return IMPLEMENTED_METHODS.includes(method);
}

export function isBracketingMethod(method: RootFindingMethod): boolean {
    return BRACKETING_METHODS.includes(method);
}

/**
 * Validate a RootFinderConfig
 */
export function validateRootFinderConfig(config: RootFinderConfig): ValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];

    if (!isImplementedMethod(config.method)) {
        errors.push(`Unsupported root finding method: ${config.method}`);
        return { valid: false, errors, warnings };
    }

    // Required fields
    if (typeof config.fn !== 'function') {
        errors.push('Function must be specified');
    }

    if (config.tolerance === undefined) {
        errors.push('Tolerance must be specified');
    } else if (!Number.isFinite(config.tolerance) || config.tolerance <= 0) {
        errors.push('Tolerance must be a positive finite number');
    }

    if (config.maxIterations === undefined) {
        errors.push('Max iterations must be specified');
    } else if (!Number.isInteger(config.maxIterations) || config.maxIterations < 1) {
        errors.push('Max iterations must be a positive integer');
    }

    // Method-specific fields
    if (config.method === RootFindingMethods.NewtonRaphson) {
        if (config.derivative === undefined) {
            errors.push('Derivative must be specified for newton-raphson');
        } else if (typeof config.derivative !== 'function') {
            errors.push('Derivative must be a function');
        }

        if (config.initialGuess === undefined) {
            errors.push('Initial guess must be specified for newton-raphson');
        } else if (!Number.isFinite(config.initialGuess)) {
            errors.push('Initial guess must be a finite number');
        }

        if (config.boundaries !== undefined) {
            warnings.push('Boundaries are ignored by newton-raphson');
        }
    } else if (isBracketingMethod(config.method)) {
        if (config.boundaries === undefined) {
            errors.push(`Boundaries must be specified for ${config.method}`);
        } else {
            const [x0, x1] = config.boundaries;
            if (!Number.isFinite(x0) || !Number.isFinite(x1)) {
                errors.push('Boundaries must be finite numbers');
            } else if (x0 === x1) {
                warnings.push('Boundaries coincide; the bracket has zero width');
            }
        }

        if (config.derivative !== undefined) {
            warnings.push(`Derivative is ignored by ${config.method}`);
        }
        if (config.initialGuess !== undefined) {
            warnings.push(`Initial guess is ignored by ${config.method}`);
        }
    }

    return {
        valid: errors.length === 0,
        errors,
        warnings,
    };
}
