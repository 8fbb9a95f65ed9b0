/**
 * @module core/errors
 * @description Unified error types and error codes for root finding and interpolation
 *
 * Construction problems are thrown synchronously. Search failures are carried
 * as error instances inside a `RootFindingResult` and never thrown.
 */

// ==================== Error Codes ====================

/**
 * Standard error codes for the rootsolve library
 */
export const ErrorCodes = {
    // Configuration Errors
    /** A required parameter is missing or malformed */
    INVALID_CONFIG: 'INVALID_CONFIG',
    /** The selected method has no implementation */
    UNSUPPORTED_METHOD: 'UNSUPPORTED_METHOD',

    // Search Errors
    /** Bracket endpoints do not have opposite-signed function values */
    INVALID_BRACKET: 'INVALID_BRACKET',
    /** A derivative or denominator fell below machine epsilon */
    NUMERICAL_STALL: 'NUMERICAL_STALL',
    /** Iteration budget exhausted without convergence */
    MAX_ITERATIONS: 'MAX_ITERATIONS',

    // Data Errors
    /** Generic validation failure */
    VALIDATION_ERROR: 'VALIDATION_ERROR',
    /** Argument outside the tabulated range with extrapolation disabled */
    OUT_OF_BOUNDS: 'OUT_OF_BOUNDS',

    /** Internal library error */
    INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

// ==================== Error Classes ====================

/**
 * Base error class for the library
 */
export class NumericError extends Error {
    readonly code: ErrorCode;
    readonly details?: unknown;
    readonly timestamp: number;

    constructor(code: ErrorCode, message: string, details?: unknown) {
        super(message);
        this.name = 'NumericError';
        this.code = code;
        this.details = details;
        this.timestamp = Date.now();

        // Maintain proper stack trace in V8
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, NumericError);
        }
    }

    /**
     * Convert to JSON-serializable object
     */
    toJSON(): {
        name: string;
        code: ErrorCode;
        message: string;
        details: unknown;
        timestamp: number;
    } {
        return {
            name: this.name,
            code: this.code,
            message: this.message,
            details: this.details,
            timestamp: this.timestamp,
        };
    }
}

/**
 * Configuration error (missing or malformed builder parameters)
 */
export class ConfigurationError extends NumericError {
    readonly errors: string[];

    constructor(message: string, errors: string[] = [message], code: ErrorCode = ErrorCodes.INVALID_CONFIG) {
        super(code, message, { errors });
        this.name = 'ConfigurationError';
        this.errors = errors;
    }
}

/**
 * Method selector without a strategy behind it
 */
export class UnsupportedMethodError extends ConfigurationError {
    readonly method: string;

    constructor(method: string) {
        const message = `Unsupported root finding method: ${method}`;
        super(message, [message], ErrorCodes.UNSUPPORTED_METHOD);
        this.name = 'UnsupportedMethodError';
        this.method = method;
    }
}

/**
 * Bracket without a guaranteed sign change
 */
export class InvalidBracketError extends NumericError {
    constructor(a: number, b: number, fa: number, fb: number) {
        super(
            ErrorCodes.INVALID_BRACKET,
            'F(a) and F(b) must be of opposite signs',
            { a, b, fa, fb }
        );
        this.name = 'InvalidBracketError';
    }
}

/**
 * Quantity that would be divided by fell below machine epsilon
 */
export type StallQuantity = 'derivative' | 'denominator';

/**
 * Numerical stall (near-zero derivative or difference of function values)
 */
export class NumericalStallError extends NumericError {
    readonly quantity: StallQuantity;

    constructor(quantity: StallQuantity, value: number, at: number) {
        super(
            ErrorCodes.NUMERICAL_STALL,
            quantity === 'derivative'
                ? 'Derivative too close to zero.'
                : 'Denominator too close to zero.',
            { value, at }
        );
        this.name = 'NumericalStallError';
        this.quantity = quantity;
    }
}

/**
 * Iteration budget exhausted
 */
export class MaxIterationsError extends NumericError {
    readonly iterations: number;

    constructor(iterations: number, message = 'Maximum iterations reached without convergence.') {
        super(ErrorCodes.MAX_ITERATIONS, message, { iterations });
        this.name = 'MaxIterationsError';
        this.iterations = iterations;
    }
}

/**
 * Validation error (malformed data tables or log entries)
 */
export class ValidationError extends NumericError {
    constructor(message: string, details?: unknown) {
        super(ErrorCodes.VALIDATION_ERROR, message, details);
        this.name = 'ValidationError';
    }
}

/**
 * Evaluation outside the tabulated range
 */
export class OutOfBoundsError extends NumericError {
    readonly x: number;

    constructor(x: number, lower: number, upper: number) {
        super(
            ErrorCodes.OUT_OF_BOUNDS,
            `Value x = ${x} is out of bounds and no extrapolation is enabled.`,
            { x, lower, upper }
        );
        this.name = 'OutOfBoundsError';
        this.x = x;
    }
}

// ==================== Error Utilities ====================

/**
 * Check if an error is a NumericError
 */
export function isNumericError(error: unknown): error is NumericError {
    return error instanceof NumericError;
}

/**
 * Check if an error has a specific error code
 */
export function hasErrorCode(error: unknown, code: ErrorCode): boolean {
    return isNumericError(error) && error.code === code;
}

/**
 * Wrap any error into a NumericError
 */
export function wrapError(error: unknown, defaultCode: ErrorCode = ErrorCodes.INTERNAL_ERROR): NumericError {
    if (isNumericError(error)) {
        return error;
    }

    if (error instanceof Error) {
        return new NumericError(defaultCode, error.message, {
            originalName: error.name,
            originalStack: error.stack,
        });
    }

    return new NumericError(defaultCode, String(error));
}
