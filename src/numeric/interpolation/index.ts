/**
 * @module interpolation
 * @description Piecewise interpolation over value tables
 *
 * Independent of the root finding engine; an `Interpolator` can be handed to
 * a root finder as an ordinary function via `x => spline.interpolate(x)`.
 */

export * from './types';
export * from './interpolator';
