/**
 * @packageDocumentation
 * @module rootsolve
 *
 * rootsolve: scalar root finding with interchangeable strategies
 *
 * ## Modules
 * - `core` - Errors and structured logging
 * - `numeric` - Root finding (Bisection, Secant, Newton-Raphson, Brent) and interpolation
 *
 * ## Usage Example
 * ```typescript
 * import { RootFinderBuilder } from 'rootsolve';
 *
 * const finder = new RootFinderBuilder('brent')
 *     .fn(x => Math.cos(x) - x)
 *     .boundaries(0, 1)
 *     .tolerance(1e-10)
 *     .maxIterations(100)
 *     .logConvergence(true)
 *     .build();
 *
 * const result = finder.findRoot();
 * const trace = finder.getConvergenceLog().getEntries();
 * ```
 *
 * @license MIT
 */

export * as core from './src/core';
export * as numeric from './src/numeric';

// ==================== Direct Exports ====================
export * from './src/core';
export * from './src/numeric/root-finding';
export * from './src/numeric/interpolation';

// ==================== Version ====================
export const VERSION = '1.0.0';
