/**
 * @module interpolation/interpolator
 * @description Piecewise linear, quadratic and cubic spline interpolation
 * over a value table, with configurable extrapolation.
 *
 * Coefficients are computed once at construction; every segment is evaluated
 * as `y_j + b_j·dx + c_j·dx² + d_j·dx³` with `dx = x − x_j`.
 *
 * @example
 * ```typescript
 * const spline = new Interpolator([0, 1, 2, 3], [0, 1, 8, 27], 'cubic', 'extend-spline');
 * spline.interpolate(1.5);
 * ```
 */

import { OutOfBoundsError, ValidationError } from '../../core/errors';
import type { ExtrapolationStrategy, InterpolationType, SplineCoefficients } from './types';

// ==================== Coefficients ====================

/**
 * Natural cubic spline (zero second derivative at both ends).
 * Tridiagonal system solved by forward elimination and back substitution.
 */
function cubicCoefficients(x: readonly number[], y: readonly number[], h: number[]): SplineCoefficients {
    const n = h.length;
    const alpha: number[] = new Array(n).fill(0);
    for (let i = 1; i < n; i++) {
        alpha[i] = 3 / h[i] * (y[i + 1] - y[i]) - 3 / h[i - 1] * (y[i] - y[i - 1]);
    }

    const l: number[] = new Array(n + 1).fill(1);
    const mu: number[] = new Array(n + 1).fill(0);
    const z: number[] = new Array(n + 1).fill(0);
    for (let i = 1; i < n; i++) {
        l[i] = 2 * (x[i + 1] - x[i - 1]) - h[i - 1] * mu[i - 1];
        mu[i] = h[i] / l[i];
        z[i] = (alpha[i] - h[i - 1] * z[i - 1]) / l[i];
    }

    const b: number[] = new Array(n).fill(0);
    const c: number[] = new Array(n + 1).fill(0);
    const d: number[] = new Array(n).fill(0);
    for (let j = n - 1; j >= 0; j--) {
        c[j] = z[j] - mu[j] * c[j + 1];
        b[j] = (y[j + 1] - y[j]) / h[j] - h[j] * (c[j + 1] + 2 * c[j]) / 3;
        d[j] = (c[j + 1] - c[j]) / (3 * h[j]);
    }

    return { b, c: c.slice(0, n), d };
}

/**
 * C¹ quadratic spline whose first segment is linear.
 * Each segment matches both of its end values and the slope of its predecessor.
 */
function quadraticCoefficients(slopes: number[], h: number[]): SplineCoefficients {
    const n = h.length;
    const b: number[] = new Array(n).fill(0);
    const c: number[] = new Array(n).fill(0);

    b[0] = slopes[0];
    for (let j = 0; j < n; j++) {
        c[j] = (slopes[j] - b[j]) / h[j];
        if (j + 1 < n) {
            b[j + 1] = 2 * slopes[j] - b[j];
        }
    }

    return { b, c, d: new Array(n).fill(0) };
}

export function computeSplineCoefficients(
    x: readonly number[],
    y: readonly number[],
    type: InterpolationType
): SplineCoefficients {
    if (type === 'constant-backward' || type === 'constant-forward') {
        return { b: [], c: [], d: [] };
    }

    const n = x.length - 1;
    const h: number[] = [];
    const slopes: number[] = [];
    for (let i = 0; i < n; i++) {
        h.push(x[i + 1] - x[i]);
        slopes.push((y[i + 1] - y[i]) / h[i]);
    }

    switch (type) {
        case 'linear':
            return { b: slopes, c: new Array(n).fill(0), d: new Array(n).fill(0) };
        case 'quadratic':
            return quadraticCoefficients(slopes, h);
        case 'cubic':
            return cubicCoefficients(x, y, h);
    }
}

// ==================== Interpolator ====================

export class Interpolator {
    private readonly xs: number[];
    private readonly ys: number[];
    private readonly coeffs: SplineCoefficients;

    /**
     * @throws ValidationError unless `xValues` and `yValues` have equal length,
     * at least two finite points, and strictly increasing abscissas
     */
    constructor(
        xValues: readonly number[],
        yValues: readonly number[],
        readonly interpolationType: InterpolationType,
        readonly extrapolationStrategy: ExtrapolationStrategy
    ) {
        if (xValues.length !== yValues.length || xValues.length < 2) {
            throw new ValidationError(
                'x_values and y_values must have the same length and contain at least two points.',
                { xLength: xValues.length, yLength: yValues.length }
            );
        }
        if (![...xValues, ...yValues].every(Number.isFinite)) {
            throw new ValidationError('x_values and y_values must be finite numbers.');
        }
        for (let i = 1; i < xValues.length; i++) {
            if (xValues[i] <= xValues[i - 1]) {
                throw new ValidationError('x_values must be strictly increasing.', { index: i });
            }
        }

        this.xs = [...xValues];
        this.ys = [...yValues];
        this.coeffs = computeSplineCoefficients(this.xs, this.ys, interpolationType);
    }

    get lowerBound(): number {
        return this.xs[0];
    }

    get upperBound(): number {
        return this.xs[this.xs.length - 1];
    }

    interpolate(x: number): number {
        if (Number.isNaN(x)) {
            throw new ValidationError('Cannot interpolate at NaN.');
        }
        if (x < this.lowerBound || x > this.upperBound) {
            return this.extrapolate(x);
        }

        const j = this.findSegment(x);
        if (x === this.xs[j]) return this.ys[j];
        if (x === this.xs[j + 1]) return this.ys[j + 1];

        switch (this.interpolationType) {
            case 'constant-backward':
                return this.ys[j];
            case 'constant-forward':
                return this.ys[j + 1];
            default:
                return this.evaluateSegment(j, x);
        }
    }

    private extrapolate(x: number): number {
        const isLeft = x < this.lowerBound;

        switch (this.extrapolationStrategy) {
            case 'none':
                throw new OutOfBoundsError(x, this.lowerBound, this.upperBound);
            case 'constant':
                return isLeft ? this.ys[0] : this.ys[this.ys.length - 1];
            case 'extend-spline':
                if (this.coeffs.b.length === 0) {
                    // Constant interpolation extends as a constant
                    return isLeft ? this.ys[0] : this.ys[this.ys.length - 1];
                }
                return this.evaluateSegment(isLeft ? 0 : this.xs.length - 2, x);
        }
    }

    /** Index j with xs[j] <= x < xs[j + 1], or the last segment at the upper bound */
    private findSegment(x: number): number {
        let lo = 0;
        let hi = this.xs.length - 1;
        while (hi - lo > 1) {
            const mid = (lo + hi) >> 1;
            if (this.xs[mid] <= x) {
                lo = mid;
            } else {
                hi = mid;
            }
        }
        return lo;
    }

    private evaluateSegment(j: number, x: number): number {
        const dx = x - this.xs[j];
        const { b, c, d } = this.coeffs;
        return this.ys[j] + b[j] * dx + c[j] * dx * dx + d[j] * dx * dx * dx;
    }
}
