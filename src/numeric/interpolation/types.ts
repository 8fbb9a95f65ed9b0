/**
 * @module interpolation/types
 * @description Type definitions for piecewise interpolation
 */

/**
 * Piecewise curve used between tabulated points
 */
export type InterpolationType =
    | 'linear'
    | 'quadratic'
    | 'cubic'
    /** Previous tabulated value */
    | 'constant-backward'
    /** Next tabulated value */
    | 'constant-forward';

/**
 * Behaviour outside the tabulated range
 */
export type ExtrapolationStrategy =
    /** Throw OutOfBoundsError */
    | 'none'
    /** Nearest end value */
    | 'constant'
    /** Evaluate the first/last segment polynomial */
    | 'extend-spline';

/**
 * Per-segment polynomial coefficients: y_j + b_j·dx + c_j·dx² + d_j·dx³
 */
export interface SplineCoefficients {
    b: number[];
    c: number[];
    d: number[];
}
