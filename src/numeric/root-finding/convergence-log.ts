/**
 * @module root-finding/convergence-log
 * @description Append-only record of the points evaluated during a search
 */

import { ValidationError } from '../../core/errors';

/**
 * A single iteration's evaluations
 */
export interface IterationEntry {
    /** 1-based iteration index */
    iteration: number;
    /** Abscissas evaluated in this iteration */
    x: number[];
    /** Function values at the abscissas in `x` */
    fx: number[];
}

export class ConvergenceLog {
    private entries: IterationEntry[] = [];

    /**
     * Append an iteration. `x` and `fx` are copied.
     *
     * @throws ValidationError if `x` and `fx` differ in length
     */
    addEntry(iteration: number, x: readonly number[], fx: readonly number[]): void {
        if (x.length !== fx.length) {
            throw new ValidationError(
                'x and fx vectors must have the same length',
                { iteration, xLength: x.length, fxLength: fx.length }
            );
        }

        this.entries.push({ iteration, x: [...x], fx: [...fx] });
    }

    getEntries(): readonly IterationEntry[] {
        return this.entries;
    }

    get length(): number {
        return this.entries.length;
    }

    /** Clear the log for reuse */
    reset(): void {
        this.entries = [];
    }

    /** Export to JSON string */
    toJSON(): string {
        return JSON.stringify(this.entries, null, 2);
    }

    /** Export to JSONL string, one entry per line */
    toJSONL(): string {
        return this.entries.map(entry => JSON.stringify(entry)).join('\n');
    }
}
