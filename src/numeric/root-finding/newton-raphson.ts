/**
 * @module root-finding/newton-raphson
 * @description Newton-Raphson iteration `x ← x − f(x)/f'(x)`.
 *
 * The derivative is supplied by the caller; the driver evaluates it at every
 * point alongside the function.
 */

import { NumericalStallError } from '../../core/errors';
import type { RootFindingStrategy, StopOutcome } from './types';

export class NewtonRaphsonStrategy implements RootFindingStrategy {
    readonly kind = 'newton-raphson' as const;
    readonly arity = 1;
    readonly requiresDerivative = true;

    private x0: number;

    constructor(
        private readonly initialGuess: number,
        private readonly tolerance: number
    ) {
        this.x0 = initialGuess;
    }

    initialPoints(): number[] {
        return [this.x0];
    }

    nextPoints(values: readonly number[], derivativeValues: readonly number[]): number[] {
        this.x0 -= values[0] / derivativeValues[0];
        return [this.x0];
    }

    shouldStop(values: readonly number[], derivativeValues: readonly number[]): StopOutcome | null {
        const fx = values[0];
        const dfx = derivativeValues[0];

        // A zero derivative gives a non-finite candidate, which fails the step test
        const candidate = this.x0 - fx / dfx;
        if (Math.abs(this.x0 - candidate) < this.tolerance) {
            return { ok: true, root: candidate };
        }

        if (Math.abs(dfx) < Number.EPSILON) {
            return { ok: false, error: new NumericalStallError('derivative', dfx, this.x0) };
        }
        return null;
    }

    reset(): void {
        this.x0 = this.initialGuess;
    }
}
