/**
 * @module root-finding/search-logging
 * @description Forwarding of search progress to structured loggers
 */

import type { Logger } from '../../core/logging';
import type { RootFindingMethod, RootFindingResult } from './types';

export function logIteration(
    loggers: readonly Logger[],
    method: RootFindingMethod,
    iteration: number,
    x: readonly number[],
    fx: readonly number[]
): void {
    for (const logger of loggers) {
        logger.logIteration({ method, iteration, x: [...x], fx: [...fx] });
    }
}

export function logSearch(
    loggers: readonly Logger[],
    method: RootFindingMethod,
    result: RootFindingResult
): void {
    for (const logger of loggers) {
        if (result.ok) {
            logger.logSearch({ method, ok: true, iterations: result.iterations, root: result.root });
        } else {
            logger.logSearch({
                method,
                ok: false,
                iterations: result.iterations,
                errorCode: result.error.code,
                message: result.error.message,
            });
        }
        logger.flush();
    }
}
