/**
 * @module core
 * @description Shared infrastructure for the numeric modules
 *
 * ## Modules
 * - `errors`: Unified error types and codes
 * - `logging`: Structured search logging
 */

// ==================== Logging ====================

export type {
    LogLevel,
    BaseLogEntry,
    IterationLogEntry,
    SearchLogEntry,
    LogEntry,
    Logger,
    LoggerConfig,
} from './logging';

export {
    MultiLogger,
    ConsoleLogger,
    MemoryLogger,
    createLogger,
} from './logging';

// ==================== Errors ====================

export {
    ErrorCodes,
    NumericError,
    ConfigurationError,
    UnsupportedMethodError,
    InvalidBracketError,
    NumericalStallError,
    MaxIterationsError,
    ValidationError,
    OutOfBoundsError,
    isNumericError,
    hasErrorCode,
    wrapError,
} from './errors';

export type {
    ErrorCode,
    StallQuantity,
} from './errors';
