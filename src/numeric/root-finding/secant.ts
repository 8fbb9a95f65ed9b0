/**
 * @module root-finding/secant
 * @description Secant method over the two most recent abscissas.
 */

import { NumericalStallError } from '../../core/errors';
import type { RootFindingStrategy, StopOutcome } from './types';

export class SecantStrategy implements RootFindingStrategy {
    readonly kind = 'secant' as const;
    readonly arity = 2;
    readonly requiresDerivative = false;

    private x0: number;
    private x1: number;
    /** Candidate for the next `x1`, returned on convergence */
    private x2: number;

    constructor(
        private readonly initialX0: number,
        private readonly initialX1: number,
        private readonly tolerance: number
    ) {
        this.x0 = initialX0;
        this.x1 = initialX1;
        this.x2 = initialX1;
    }

    initialPoints(): number[] {
        return [this.x0, this.x1];
    }

    nextPoints(values: readonly number[]): number[] {
        const [fx0, fx1] = values;
        this.x2 = this.x1 - fx1 * (this.x1 - this.x0) / (fx1 - fx0);
        this.x0 = this.x1;
        this.x1 = this.x2;
        return [this.x0, this.x1];
    }

    shouldStop(values: readonly number[]): StopOutcome | null {
        const [fx0, fx1] = values;

        if (Math.abs(this.x0 - this.x1) < this.tolerance) {
            return { ok: true, root: this.x2 };
        }
        if (Math.abs(fx0 - fx1) < Number.EPSILON) {
            return { ok: false, error: new NumericalStallError('denominator', fx1 - fx0, this.x1) };
        }
        return null;
    }

    reset(): void {
        this.x0 = this.initialX0;
        this.x1 = this.initialX1;
        this.x2 = this.initialX1;
    }
}
