/**
 * @module root-finding/bisection
 * @description Bisection over a sliding bracket.
 *
 * Each iteration evaluates both ends of the current window. A sign change
 * halves the window from the right; otherwise the window is restored to its
 * previous width and moved onto the right half. The value tested for
 * convergence is always the one at the most recently computed midpoint.
 * A window end whose value is exactly zero is returned as the root.
 */

import type { RootFindingStrategy, StopOutcome } from './types';

export class BisectionStrategy implements RootFindingStrategy {
    readonly kind = 'bisection' as const;
    readonly arity = 2;
    readonly requiresDerivative = false;

    private x0: number;
    private x1: number;
    /** True when the last computed midpoint is `x1`, false when it is `x0` */
    private searchLeft = true;

    constructor(
        private readonly lower: number,
        private readonly upper: number,
        private readonly tolerance: number
    ) {
        this.x0 = lower;
        this.x1 = upper;
    }

    initialPoints(): number[] {
        this.x1 = (this.x0 + this.x1) / 2;
        this.searchLeft = true;
        return [this.x0, this.x1];
    }

    nextPoints(values: readonly number[]): number[] {
        const [fx0, fx1] = values;

        if (fx0 * fx1 < 0) {
            this.x1 = (this.x0 + this.x1) / 2;
            this.searchLeft = true;
        } else {
            this.x1 = this.x1 * 2 - this.x0;
            this.x0 = (this.x0 + this.x1) / 2;
            this.searchLeft = false;
        }

        return [this.x0, this.x1];
    }

    shouldStop(values: readonly number[]): StopOutcome | null {
        const [fx0, fx1] = values;

        // Exact zeros at either end; the sign test in nextPoints cannot see them
        if (fx0 === 0) {
            return { ok: true, root: this.x0 };
        }
        if (fx1 === 0) {
            return { ok: true, root: this.x1 };
        }

        const mid = this.searchLeft ? this.x1 : this.x0;
        const fMid = this.searchLeft ? fx1 : fx0;

        if (Math.abs(fMid) < this.tolerance || Math.abs(this.x1 - this.x0) < this.tolerance) {
            return { ok: true, root: mid };
        }
        return null;
    }

    reset(): void {
        this.x0 = this.lower;
        this.x1 = this.upper;
        this.searchLeft = true;
    }
}
