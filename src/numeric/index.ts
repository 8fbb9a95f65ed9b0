/**
 * @module src/numeric
 * @description Numerical Methods
 *
 * Contains:
 * - Root finding: Bisection, Secant, Newton-Raphson, Brent
 * - Interpolation: linear, quadratic and cubic splines
 */

import * as rootFinding from './root-finding';
import * as interpolation from './interpolation';

// Re-export as namespaces
export { rootFinding, interpolation };

// Direct exports for common functions
export * from './root-finding';
export * from './interpolation';
