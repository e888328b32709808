import { type Logger } from './Logger';
import { NULL_LOGGER } from './NullLogger';

/**
 * Log at ERROR and throw. Always throws.
 *
 * A string is thrown as a plain `Error`; an `Error` instance (e.g. one of the typed errors in
 * `model/Errors`) is thrown as is, and its `code` is added to the log context when present.
 *
 * @param error - Message or error to log and throw.
 * @param logger - Logger to use, defaults to NULL_LOGGER.
 * @param context - Optional structured context for the log.
 */
export function fail(
	error: string | Error,
	logger: Logger = NULL_LOGGER,
	context?: Record<string, unknown>,
): never {
	const err = typeof error === 'string' ? new Error(error) : error;
	const code = 'code' in err ? { code: err.code } : {};
	logger.error(err.message, { ...code, ...(context ?? {}) });
	throw err;
}

/**
 * Throw if a Boolean condition is true. On return, the compiler knows the condition is false.
 *
 * @param condition - Condition that must be false to continue.
 * @param error - Message, or a factory for the typed error to throw.
 * @param logger - Logger to use, defaults to NULL_LOGGER.
 * @param context - Optional structured context for the log.
 */
export function failIf(
	condition: boolean,
	error: string | (() => Error),
	logger: Logger = NULL_LOGGER,
	context?: Record<string, unknown>,
): asserts condition is false {
	if (condition) fail(typeof error === 'string' ? error : error(), logger, context);
}

/**
 * Throw if a value is null or undefined. Value is narrowed thereafter.
 *
 * @typeParam T - The value type to check.
 */
export function failIfNullish<T>(
	value: T,
	error: string | (() => Error),
	logger: Logger = NULL_LOGGER,
	context?: Record<string, unknown>,
): asserts value is Exclude<T, null | undefined> {
	if (value == null) fail(typeof error === 'string' ? error : error(), logger, context);
}
