/**
 * Core type utilities for Lucidata.
 */

// ============================================================================
// TAGGED OUTCOMES
// ============================================================================

/**
 * The operation did what it was asked to do.
 */
export interface Succeeded<T> {
	readonly status: 'succeeded';
	readonly value: T;
}

/**
 * The operation failed, and a fixed safe substitute was returned instead.
 * `reason` says what went wrong so callers can report it.
 */
export interface FellBack<T> {
	readonly status: 'fallback';
	readonly value: T;
	readonly reason: string;
}

/**
 * The operation failed and there is nothing safe to substitute.
 */
export interface Failed<E> {
	readonly status: 'failed';
	readonly error: E;
}

/**
 * Result of an operation that always produces a value.
 */
export type Recoverable<T> = Succeeded<T> | FellBack<T>;

/**
 * Result of an operation that has no fallback.
 */
export type Fallible<T, E> = Succeeded<T> | Failed<E>;

export function succeeded<T>(value: T): Succeeded<T> {
	return { status: 'succeeded', value };
}

export function fellBack<T>(value: T, reason: string): FellBack<T> {
	return { status: 'fallback', value, reason };
}

export function failed<E>(error: E): Failed<E> {
	return { status: 'failed', error };
}

/**
 * Best-effort message extraction for values caught in `catch` blocks.
 */
export function errorMessage(error: unknown): string {
	if (error instanceof Error) {
		return error.message;
	}
	return String(error);
}
